/**
 * Type Rules
 *
 * string, numeric, integer, email and datetime. `numeric` and `integer`
 * accept the parameter 'strict' to reject string representations;
 * `datetime` takes a format such as `Y-m-d H:i:s`.
 */

import { Rule } from './rule.js';
import { ConfigurationError, RuleViolationError } from '../validation/errors.js';
import { messages } from '../validation/messages.js';
import type { FieldIdentifier } from '../validation/types.js';

const STRICT = 'strict';

export class StringRule extends Rule {
    validate(field: FieldIdentifier, value: unknown, _parameter: unknown): void {
        if (this.nativeFunctions.isString(value)) {
            return;
        }
        throw new RuleViolationError(messages.get('field_must_be_a_string', field), field);
    }
}

export class NumericRule extends Rule {
    validate(field: FieldIdentifier, value: unknown, parameter: unknown): void {
        let valid: boolean;

        if (parameter === STRICT) {
            valid = this.nativeFunctions.isNumber(value);
        } else if (parameter === null || parameter === undefined) {
            valid = this.nativeFunctions.isNumeric(value);
        } else {
            throw new ConfigurationError(messages.get('numeric_invalid_param'));
        }

        if (!valid) {
            throw new RuleViolationError(messages.get('field_must_be_numeric', field), field);
        }
    }
}

export class IntegerRule extends Rule {
    validate(field: FieldIdentifier, value: unknown, parameter: unknown): void {
        let valid: boolean;

        if (parameter === STRICT) {
            valid = this.nativeFunctions.isInteger(value);
        } else if (parameter === null || parameter === undefined) {
            valid = this.nativeFunctions.isIntegerLike(value);
        } else {
            throw new ConfigurationError(messages.get('integer_invalid_param'));
        }

        if (!valid) {
            throw new RuleViolationError(messages.get('field_must_be_an_integer', field), field);
        }
    }
}

export class EmailRule extends Rule {
    validate(field: FieldIdentifier, value: unknown, _parameter: unknown): void {
        if (this.nativeFunctions.isEmailAddress(value)) {
            return;
        }
        throw new RuleViolationError(messages.get('field_must_be_an_email', field), field);
    }
}

export class DatetimeRule extends Rule {
    validate(field: FieldIdentifier, value: unknown, parameter: unknown): void {
        if (!this.nativeFunctions.isString(value)) {
            throw new RuleViolationError(messages.get('field_must_be_a_string', field), field);
        }
        if (!this.nativeFunctions.isString(parameter)) {
            throw new ConfigurationError(messages.get('datetime_requires_format'));
        }
        if (this.nativeFunctions.matchDateTime(value, parameter)) {
            return;
        }
        throw new RuleViolationError(messages.get('field_must_match_datetime_format', field, parameter), field);
    }
}
