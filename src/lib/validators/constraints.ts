/**
 * Constraint Rules
 *
 * Numeric ranges (min/max), string lengths (minlength/maxlength) and
 * patterns (regex). All bounds are inclusive.
 */

import { Rule } from './rule.js';
import { ConfigurationError, RuleViolationError } from '../validation/errors.js';
import { messages } from '../validation/messages.js';
import type { FieldIdentifier } from '../validation/types.js';

export class MinRule extends Rule {
    validate(field: FieldIdentifier, value: unknown, parameter: unknown): void {
        if (!this.nativeFunctions.isNumeric(value)) {
            throw new RuleViolationError(messages.get('field_must_be_numeric', field), field);
        }
        if (!this.nativeFunctions.isNumeric(parameter)) {
            throw new ConfigurationError(messages.get('min_requires_number'));
        }
        if (this.nativeFunctions.compareNumeric(value, parameter) >= 0) {
            return;
        }
        throw new RuleViolationError(messages.get('field_min_value', field, parameter), field);
    }
}

export class MaxRule extends Rule {
    validate(field: FieldIdentifier, value: unknown, parameter: unknown): void {
        if (!this.nativeFunctions.isNumeric(value)) {
            throw new RuleViolationError(messages.get('field_must_be_numeric', field), field);
        }
        if (!this.nativeFunctions.isNumeric(parameter)) {
            throw new ConfigurationError(messages.get('max_requires_number'));
        }
        if (this.nativeFunctions.compareNumeric(value, parameter) <= 0) {
            return;
        }
        throw new RuleViolationError(messages.get('field_max_value', field, parameter), field);
    }
}

export class MinLengthRule extends Rule {
    validate(field: FieldIdentifier, value: unknown, parameter: unknown): void {
        if (!this.nativeFunctions.isString(value)) {
            throw new RuleViolationError(messages.get('field_must_be_a_string', field), field);
        }
        if (!this.nativeFunctions.isIntegerLike(parameter)) {
            throw new ConfigurationError(messages.get('minlength_requires_integer'));
        }
        if (characterLength(value) >= Number(parameter)) {
            return;
        }
        throw new RuleViolationError(messages.get('field_min_length', field, parameter), field);
    }
}

export class MaxLengthRule extends Rule {
    validate(field: FieldIdentifier, value: unknown, parameter: unknown): void {
        if (!this.nativeFunctions.isString(value)) {
            throw new RuleViolationError(messages.get('field_must_be_a_string', field), field);
        }
        if (!this.nativeFunctions.isIntegerLike(parameter)) {
            throw new ConfigurationError(messages.get('maxlength_requires_integer'));
        }
        if (characterLength(value) <= Number(parameter)) {
            return;
        }
        throw new RuleViolationError(messages.get('field_max_length', field, parameter), field);
    }
}

export class RegexRule extends Rule {
    validate(field: FieldIdentifier, value: unknown, parameter: unknown): void {
        if (!this.nativeFunctions.isString(value)) {
            throw new RuleViolationError(messages.get('field_must_be_a_string', field), field);
        }
        if (!this.nativeFunctions.isString(parameter)) {
            throw new ConfigurationError(messages.get('regex_requires_pattern'));
        }
        if (this.nativeFunctions.matchRegex(value, parameter)) {
            return;
        }
        throw new RuleViolationError(messages.get('field_must_match_pattern', field, parameter), field);
    }
}

// Code points, so that "é" or an emoji counts once
function characterLength(value: string): number {
    return Array.from(value).length;
}
