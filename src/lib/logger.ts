/**
 * Standalone Logger Utility
 *
 * Provides consistent logging with environment-aware formatting.
 * Debug output is only written when VALIDATION_DEBUG is 'true'.
 */

export type LogMeta = Record<string, unknown>;

export class Logger {
    /**
     * Log debug message with context
     */
    debug(message: string, meta?: LogMeta) {
        if (process.env.VALIDATION_DEBUG !== 'true') {
            return;
        }
        console.info(this.formatLog('DEBUG', message, meta));
    }

    /**
     * Log info message with context
     */
    info(message: string, meta?: LogMeta) {
        console.info(this.formatLog('INFO', message, meta));
    }

    /**
     * Log warning message with context
     */
    warn(message: string, meta?: LogMeta) {
        console.warn(this.formatLog('WARN', message, meta));
    }

    /**
     * Log failure message with context
     */
    error(message: string, meta?: LogMeta) {
        console.error(this.formatLog('ERROR', message, meta));
    }

    /**
     * Format log message with environment-aware output
     */
    formatLog(level: string, message: string, meta?: LogMeta): string {
        if (process.env.NODE_ENV === 'production') {
            // Structured JSON for production log aggregation
            return JSON.stringify({
                timestamp: new Date().toISOString(),
                level,
                message,
                ...(meta && { meta })
            });
        }

        const metaStr = meta ? ` ${JSON.stringify(meta)}` : '';
        return `${level} ${message}${metaStr}`;
    }
}

/**
 * Global logger instance for the validation core and middleware
 */
export const logger = new Logger();
