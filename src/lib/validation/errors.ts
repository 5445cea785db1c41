/**
 * Validation Error Types
 *
 * Categorized error types for the validation core. Configuration errors point
 * at defects in rule declarations; validation errors point at bad input data.
 */

import { HttpErrors, type HttpError } from '../errors/http-error.js';
import type { FieldIdentifier } from './types.js';
import type { RequirementOutcome } from './requirements/requirement-engine.js';

/**
 * Base class for all validation-related errors
 */
export abstract class ValidationSystemError extends Error {
    public readonly code: string;

    constructor(message: string, code: string, options?: ErrorOptions) {
        super(message, options);
        this.name = this.constructor.name;
        this.code = code;
        Error.captureStackTrace?.(this, this.constructor);
    }
}

/**
 * ConfigurationError - Defect in the rule declarations themselves
 *
 * Raised during setup (parsing, compiling, requirement construction) or when a
 * rule receives a parameter it cannot work with. Never a user input error.
 */
export class ConfigurationError extends ValidationSystemError {
    constructor(message: string, code = 'CONFIGURATION_ERROR', options?: ErrorOptions) {
        super(message, code, options);
    }
}

/**
 * InvalidRuleError - Malformed rule string (e.g. empty name)
 */
export class InvalidRuleError extends ConfigurationError {
    constructor(message: string) {
        super(message, 'INVALID_RULE');
    }
}

/**
 * UnknownRuleError - A rule name that the registry does not know
 */
export class UnknownRuleError extends ValidationSystemError {
    public readonly ruleName: string;
    public readonly field?: FieldIdentifier;

    constructor(ruleName: string, message: string, field?: FieldIdentifier) {
        super(message, 'UNKNOWN_RULE');
        this.ruleName = ruleName;
        this.field = field;
    }
}

/**
 * FieldNotFoundError - Value lookup for a field that is not in the dataset
 */
export class FieldNotFoundError extends ValidationSystemError {
    public readonly field: FieldIdentifier;

    constructor(field: FieldIdentifier, message: string) {
        super(message, 'FIELD_NOT_FOUND');
        this.field = field;
    }
}

/**
 * MessageCatalogError - Catalog file could not be loaded or a key did not resolve
 */
export class MessageCatalogError extends ValidationSystemError {
    constructor(message: string, options?: ErrorOptions) {
        super(message, 'MESSAGE_CATALOG_ERROR', options);
    }
}

/**
 * ValidationError - User-facing failure for one field
 *
 * Terminal for the field's validation pass. Maps to HTTP 400.
 */
export class ValidationError extends ValidationSystemError {
    public readonly field?: FieldIdentifier;
    public readonly statusCode = 400;

    constructor(message: string, field?: FieldIdentifier, code = 'VALIDATION_ERROR', options?: ErrorOptions) {
        super(message, code, options);
        this.field = field;
    }

    toHttpError(): HttpError {
        return HttpErrors.badRequest(
            this.message,
            'VALIDATION_ERROR',
            this.field === undefined ? { reason: this.code } : { field: this.field, reason: this.code }
        );
    }
}

/**
 * RuleViolationError - A value rule rejected the field's value
 */
export class RuleViolationError extends ValidationError {
    constructor(message: string, field?: FieldIdentifier, options?: ErrorOptions, code = 'RULE_VIOLATION') {
        super(message, field, code, options);
    }
}

/**
 * RequiredRuleViolation - The 'required' rule was dispatched like a value rule
 */
export class RequiredRuleViolation extends RuleViolationError {
    constructor(message: string, field?: FieldIdentifier) {
        super(message, field, undefined, 'REQUIRED_RULE_VIOLATION');
    }
}

/**
 * RequirementError - Presence resolution failed for a field
 */
export class RequirementError extends ValidationError {
    public readonly outcome: RequirementOutcome;

    constructor(message: string, field: FieldIdentifier, outcome: RequirementOutcome, options?: ErrorOptions) {
        super(message, field, 'REQUIREMENT_FAILED', options);
        this.outcome = outcome;
    }
}
