/**
 * Requirement Engine
 *
 * Resolves the presence of one field against its requirement constraints,
 * in this precedence order:
 *
 *   present, a requiredWithout field also present   -> MutuallyExclusiveConflict
 *   present                                          -> Valid
 *   absent, partner present, required                -> MissingRequired
 *   absent, partner present                          -> Valid (skip value rules)
 *   absent, required                                 -> MissingRequired
 *   absent, has requiredWithout declarations         -> MissingWithoutAlternative
 *   absent                                           -> Valid (skip value rules)
 *
 * Only presence is consulted; values are never read here.
 */

import { RequirementError } from '../errors.js';
import { messages } from '../messages.js';
import type { MetaRule } from '../meta-rules.js';
import type { FieldIdentifier, FieldPresence } from '../types.js';
import {
    FieldRequirementConstraints,
    RULE_REQUIRED,
    RULE_REQUIRED_WITHOUT
} from './field-requirement-constraints.js';

export enum RequirementOutcome {
    Valid = 'valid',
    MissingRequired = 'missing_required',
    MutuallyExclusiveConflict = 'mutually_exclusive_conflict',
    MissingWithoutAlternative = 'missing_without_alternative',
}

const REQUIREMENT_RULES: readonly string[] = [RULE_REQUIRED, RULE_REQUIRED_WITHOUT];

export class RequirementEngine {
    private readonly constraints: FieldRequirementConstraints;
    private readonly fieldExists: boolean;
    private readonly anyRequiredWithoutFieldExists: boolean;

    /**
     * @throws ConfigurationError for requiredWithout(self) or a requiredWithout without a field
     */
    constructor(
        private readonly field: FieldIdentifier,
        metaRules: readonly MetaRule[],
        dataset: FieldPresence
    ) {
        this.constraints = FieldRequirementConstraints.fromMetaRules(metaRules, field);
        this.fieldExists = dataset.hasField(field);
        this.anyRequiredWithoutFieldExists = this.constraints
            .requiredWithoutFields()
            .some(otherField => dataset.hasField(otherField));
    }

    resolve(): RequirementOutcome {
        if (this.fieldExists) {
            return this.anyRequiredWithoutFieldExists
                ? RequirementOutcome.MutuallyExclusiveConflict
                : RequirementOutcome.Valid;
        }

        if (this.constraints.isRequired()) {
            // Required wins over exclusivity
            return RequirementOutcome.MissingRequired;
        }

        if (!this.anyRequiredWithoutFieldExists && this.constraints.hasRequiredWithoutFields()) {
            return RequirementOutcome.MissingWithoutAlternative;
        }

        return RequirementOutcome.Valid;
    }

    /**
     * @throws RequirementError when the outcome is anything but Valid
     */
    validate(): void {
        const outcome = this.resolve();

        switch (outcome) {
            case RequirementOutcome.Valid:
                return;

            case RequirementOutcome.MutuallyExclusiveConflict:
                throw new RequirementError(
                    messages.get(
                        'only_one_of_fields_can_be_present',
                        this.field,
                        this.constraints.formatRequiredWithoutList()
                    ),
                    this.field,
                    outcome
                );

            case RequirementOutcome.MissingRequired:
                throw new RequirementError(
                    messages.get('required_field_missing', this.field),
                    this.field,
                    outcome
                );

            case RequirementOutcome.MissingWithoutAlternative:
                throw new RequirementError(
                    messages.get(
                        'either_field_or_other_must_be_present',
                        this.field,
                        this.constraints.formatRequiredWithoutList()
                    ),
                    this.field,
                    outcome
                );
        }
    }

    /**
     * Absent and either satisfied by a partner or not required
     */
    shouldSkipFurtherValidation(): boolean {
        if (this.fieldExists) {
            return false;
        }
        return this.anyRequiredWithoutFieldExists || !this.constraints.isRequired();
    }

    filterOutRequirementRules<T extends MetaRule>(metaRules: readonly T[]): T[] {
        return metaRules.filter(metaRule => !REQUIREMENT_RULES.includes(metaRule.name.toLowerCase()));
    }

    requirementConstraints(): FieldRequirementConstraints {
        return this.constraints;
    }
}
