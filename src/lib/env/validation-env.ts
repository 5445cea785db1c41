import { existsSync, readFileSync } from 'fs';
import path from 'path';
import { logger } from '../logger.js';

/**
 * Configuration file paths in order of precedence
 */
const CONFIG_PATHS = [
    './.config/field-rules/env.json',  // Project-local environment (current directory)
    path.join(process.env.HOME ?? '', '.config/field-rules/env.json')  // User environment
];

const DOTENV_PATH = '.env';

/**
 * Parse a single KEY=VALUE line from a .env file
 * Returns [key, value] tuple or null if line should be skipped
 */
export function parseEnvLine(line: string): [string, string] | null {
    const trimmed = line.trim();

    // Skip empty lines and comments
    if (!trimmed || trimmed.startsWith('#')) {
        return null;
    }

    const eqIndex = trimmed.indexOf('=');
    if (eqIndex === -1) {
        return null;
    }

    const key = trimmed.slice(0, eqIndex).trim();
    let value = trimmed.slice(eqIndex + 1).trim();

    if (!key) {
        return null;
    }

    if ((value.startsWith('"') && value.endsWith('"') && value.length >= 2) ||
        (value.startsWith("'") && value.endsWith("'") && value.length >= 2)) {
        value = value.slice(1, -1);
    } else {
        // Inline comments only apply to unquoted values
        const hashIndex = value.indexOf('#');
        if (hashIndex !== -1) {
            value = value.slice(0, hashIndex).trim();
        }
    }

    return [key, value];
}

export interface ValidationEnvSources {
    /** JSON config files in order of precedence */
    configPaths: readonly string[];
    /** .env file loaded after the JSON config */
    dotenvPath: string;
}

/**
 * ValidationEnv - Configuration for the validation engine
 *
 * Loads configuration in order of precedence:
 * 1. process.env (never overridden)
 * 2. ./.config/field-rules/env.json, then ~/.config/field-rules/env.json (first found wins)
 * 3. ./.env
 *
 * Recognized keys:
 * - VALIDATION_LANGUAGE       language of the message catalog (default: en)
 * - VALIDATION_MESSAGES_PATH  extra catalog file layered over the bundled one
 * - VALIDATION_DEBUG          'true' enables debug logging
 */
export class ValidationEnv {
    private static loaded = false;

    /**
     * Load configuration files into process.env
     * Safe to call multiple times - only loads once
     */
    static load(): void {
        if (this.loaded) {
            return;
        }
        this.loaded = true;
        this.loadFrom({ configPaths: CONFIG_PATHS, dotenvPath: DOTENV_PATH });
    }

    /**
     * Load the given sources into process.env, ignoring the load-once guard.
     * The first config file found wins; existing variables are never replaced.
     */
    static loadFrom(sources: ValidationEnvSources): void {
        for (const configPath of sources.configPaths) {
            if (!existsSync(configPath)) {
                continue;
            }

            let configData: unknown;
            try {
                configData = JSON.parse(readFileSync(configPath, 'utf8'));
            } catch (error) {
                logger.warn('Unreadable validation configuration', {
                    configPath,
                    error: error instanceof Error ? error.message : String(error)
                });
                continue;
            }

            if (typeof configData !== 'object' || configData === null || Array.isArray(configData)) {
                logger.warn('Invalid validation configuration - not an object', { configPath });
                continue;
            }

            const loadedCount = this.apply(Object.entries(configData));
            logger.debug('Loaded validation configuration', { configPath, variableCount: loadedCount });
            break;
        }

        if (existsSync(sources.dotenvPath)) {
            const entries = readFileSync(sources.dotenvPath, 'utf8')
                .split(/\r?\n/)
                .map(parseEnvLine)
                .filter((entry): entry is [string, string] => entry !== null);
            this.apply(entries);
        }
    }

    /**
     * Get configuration value with required validation
     * @throws Error if required=true and key not found
     */
    static get(key: string, defaultValue?: string, required: boolean = false): string {
        this.load();

        const value = process.env[key] || defaultValue;

        if (required && !value) {
            throw new Error(
                `${key} not found in configuration. ` +
                `Set it in the environment or in ~/.config/field-rules/env.json.`
            );
        }

        return value || '';
    }

    static isConfigLoaded(): boolean {
        return this.loaded;
    }

    private static apply(entries: Array<[string, unknown]>): number {
        let loadedCount = 0;

        for (const [key, value] of entries) {
            if (process.env[key] === undefined) {  // Don't override existing env vars
                process.env[key] = String(value);
                loadedCount++;
            }
        }

        return loadedCount;
    }
}
