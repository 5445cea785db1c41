/**
 * Field Requirement Constraints
 *
 * Read-only view over the requirement rules of one field:
 * - `required`              the field must be present
 * - `requiredWithout:<f>`   the field and <f> are mutually exclusive, and
 *                           one of them must be present
 */

import { ConfigurationError } from '../errors.js';
import { messages } from '../messages.js';
import type { MetaRule } from '../meta-rules.js';
import type { FieldIdentifier } from '../types.js';

export const RULE_REQUIRED = 'required';
export const RULE_REQUIRED_WITHOUT = 'requiredwithout';

export class FieldRequirementConstraints {
    private constructor(
        private readonly required: boolean,
        private readonly requiredWithout: readonly FieldIdentifier[]
    ) {}

    /**
     * Build the constraints from a field's meta-rules.
     *
     * When `field` is given, a requiredWithout that names the field itself
     * is rejected here, before any dataset is consulted.
     */
    static fromMetaRules(metaRules: readonly MetaRule[], field?: FieldIdentifier): FieldRequirementConstraints {
        let isRequired = false;
        const requiredWithoutFields: FieldIdentifier[] = [];

        for (const metaRule of metaRules) {
            switch (metaRule.name.toLowerCase()) {
                case RULE_REQUIRED:
                    isRequired = true;
                    break;

                case RULE_REQUIRED_WITHOUT: {
                    const otherField = metaRule.parameter;
                    if (typeof otherField !== 'string' && typeof otherField !== 'number') {
                        throw new ConfigurationError(messages.get('requiredwithout_requires_field_name'));
                    }
                    if (field !== undefined && String(otherField) === String(field)) {
                        throw new ConfigurationError(messages.get('requiredwithout_cannot_reference_itself'));
                    }
                    requiredWithoutFields.push(otherField);
                    break;
                }
            }
        }

        return new FieldRequirementConstraints(isRequired, Object.freeze(requiredWithoutFields));
    }

    isRequired(): boolean {
        return this.required;
    }

    hasRequiredWithoutFields(): boolean {
        return this.requiredWithout.length > 0;
    }

    requiredWithoutFields(): readonly FieldIdentifier[] {
        return this.requiredWithout;
    }

    /**
     * "'b'" for a single field, "one of 'b', 'c'" for several
     */
    formatRequiredWithoutList(): string {
        if (this.requiredWithout.length > 1) {
            return `one of '${this.requiredWithout.join("', '")}'`;
        }
        if (this.requiredWithout.length === 1) {
            return `'${this.requiredWithout[0]}'`;
        }
        return '';
    }
}
