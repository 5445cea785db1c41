/**
 * Enum Rule
 *
 * The value must be one of an allowed list. Declared in rule strings as
 * `enum:draft,published`, or programmatically with an array parameter.
 * Comparison is case-sensitive on the string form of scalar values.
 */

import { Rule } from './rule.js';
import { ConfigurationError, RuleViolationError } from '../validation/errors.js';
import { messages } from '../validation/messages.js';
import type { FieldIdentifier } from '../validation/types.js';

export class EnumRule extends Rule {
    validate(field: FieldIdentifier, value: unknown, parameter: unknown): void {
        const allowedValues = this.allowedValues(parameter);

        if (isScalar(value) && allowedValues.includes(String(value))) {
            return;
        }

        throw new RuleViolationError(messages.get('field_must_be_one_of', field, allowedValues.join(', ')), field);
    }

    private allowedValues(parameter: unknown): string[] {
        let values: unknown[] = [];

        if (this.nativeFunctions.isString(parameter)) {
            values = parameter.split(',');
        } else if (this.nativeFunctions.isArray(parameter)) {
            values = parameter;
        }

        const allowed = values
            .filter(isScalar)
            .map(entry => String(entry).trim())
            .filter(entry => entry !== '');

        if (allowed.length === 0) {
            throw new ConfigurationError(messages.get('enum_requires_values'));
        }

        return allowed;
    }
}

function isScalar(value: unknown): value is string | number | boolean {
    return typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean';
}
