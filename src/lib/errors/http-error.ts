/**
 * HttpError - Structured HTTP error for API responses
 *
 * Separates validation failures from HTTP transport concerns.
 * The validation core throws semantic errors, middleware handles HTTP details.
 */

export type ErrorDetails = Record<string, string | number | boolean | null>;

export type HttpErrorBody = {
    success: false;
    error: string;
    error_code?: string;
    status_code: number;
    details?: ErrorDetails;
};

export class HttpError extends Error {
    public readonly name = 'HttpError';

    constructor(
        public readonly statusCode: number,
        message: string,
        public readonly errorCode?: string,
        public readonly details?: ErrorDetails
    ) {
        super(message);

        // Maintain proper prototype chain for instanceof checks
        Object.setPrototypeOf(this, HttpError.prototype);
    }

    /**
     * Convert to JSON-serializable object for API responses
     */
    toJSON(): HttpErrorBody {
        return {
            success: false,
            error: this.message,
            error_code: this.errorCode,
            status_code: this.statusCode,
            ...(this.details && { details: this.details })
        };
    }
}

/**
 * Factory methods for the HTTP errors the validation layer produces
 */
export class HttpErrors {
    static badRequest(message: string, errorCode = 'BAD_REQUEST', details?: ErrorDetails) {
        return new HttpError(400, message, errorCode, details);
    }
}

export function isHttpError(error: unknown): error is HttpError {
    return error instanceof HttpError;
}
