/**
 * Validator
 *
 * Validates a dataset against per-field rule declarations:
 *
 *   const validator = new Validator({
 *       username: ['required', 'string', 'minLength:3'],
 *       email: ['requiredWithout:phone', 'email'],
 *       phone: ['requiredWithout:email', 'string'],
 *       age: ['nullable', 'integer', 'min:18'],
 *   }, {
 *       'username.required': 'Please choose a username.',
 *   });
 *
 *   const input = validator.validate(body);
 *   input.getField('username');
 *
 * Per field: presence is resolved first; a failure there stops the field.
 * Absent optional fields are skipped. `nullable` lets null through without
 * running the value rules. Value rules run in declaration order and the
 * first failure ends the field.
 */

import { logger } from '../logger.js';
import { CompiledRules } from './compiled-rules.js';
import { findCustomMessage } from './custom-messages.js';
import { DataAccessor } from './data-accessor.js';
import { RequirementError, ValidationError } from './errors.js';
import type { MetaRule } from './meta-rules.js';
import { RULE_REQUIRED, RULE_REQUIRED_WITHOUT } from './requirements/field-requirement-constraints.js';
import { RequirementEngine, RequirementOutcome } from './requirements/requirement-engine.js';
import type { RuleRegistry } from './rule-registry.js';
import type { CustomMessages, FieldIdentifier, RuleDefinitions } from './types.js';

export const RULE_NULLABLE = 'nullable';

const CUSTOM_RULE = 'custom';

export interface ValidatorOptions {
    /** Registry to dispatch rule names to; defaults to the built-in registry */
    registry?: RuleRegistry;
}

export interface FieldError {
    field: FieldIdentifier;
    rule: string;
    code: string;
    message: string;
}

export interface ValidationReport {
    valid: boolean;
    errors: FieldError[];
}

interface FieldFailure {
    rule: string;
    error: ValidationError;
}

export class Validator {
    private readonly compiledRules: CompiledRules;

    constructor(
        rules: RuleDefinitions,
        private readonly customMessages: CustomMessages = {},
        options: ValidatorOptions = {}
    ) {
        this.compiledRules = new CompiledRules(rules, customMessages, options.registry);
    }

    /**
     * Validate the dataset, stopping at the first failing field
     *
     * @throws ValidationError for invalid input
     * @throws ConfigurationError or UnknownRuleError for defective declarations
     */
    validate(data: object): DataAccessor {
        const dataAccessor = new DataAccessor(data);

        for (const [field, metaRules] of this.compiledRules.metaRulesCollection()) {
            const failure = this.validateField(field, metaRules, dataAccessor);
            if (failure !== null) {
                logger.debug('Validation failed', { field, rule: failure.rule, code: failure.error.code });
                throw failure.error;
            }
        }

        logger.debug('Validation passed', { fields: this.compiledRules.fields().length });
        return dataAccessor;
    }

    /**
     * Validate every field, collecting the first failure of each
     *
     * @throws ConfigurationError or UnknownRuleError for defective declarations
     */
    validateAll(data: object): ValidationReport {
        const dataAccessor = new DataAccessor(data);
        const errors: FieldError[] = [];

        for (const [field, metaRules] of this.compiledRules.metaRulesCollection()) {
            const failure = this.validateField(field, metaRules, dataAccessor);
            if (failure !== null) {
                errors.push({
                    field,
                    rule: failure.rule,
                    code: failure.error.code,
                    message: failure.error.message,
                });
            }
        }

        logger.debug('Validation report', { fields: this.compiledRules.fields().length, errors: errors.length });
        return { valid: errors.length === 0, errors };
    }

    private validateField(
        field: string,
        metaRules: readonly MetaRule[],
        dataAccessor: DataAccessor
    ): FieldFailure | null {
        const requirementEngine = new RequirementEngine(field, metaRules, dataAccessor);

        try {
            requirementEngine.validate();
        } catch (error) {
            if (error instanceof RequirementError) {
                return this.requirementFailure(field, error);
            }
            throw error;
        }

        if (requirementEngine.shouldSkipFurtherValidation()) {
            return null;
        }

        const valueRules = requirementEngine.filterOutRequirementRules(metaRules);
        const value = dataAccessor.getField(field);

        if (value === null && valueRules.some(metaRule => metaRule.name === RULE_NULLABLE)) {
            return null;
        }

        for (const metaRule of valueRules) {
            if (metaRule.name === RULE_NULLABLE) {
                continue;
            }
            try {
                metaRule.validate(field, value);
            } catch (error) {
                if (error instanceof ValidationError) {
                    return { rule: metaRule.name || CUSTOM_RULE, error };
                }
                throw error;
            }
        }

        return null;
    }

    private requirementFailure(field: string, error: RequirementError): FieldFailure {
        const rule = error.outcome === RequirementOutcome.MissingRequired
            ? RULE_REQUIRED
            : RULE_REQUIRED_WITHOUT;

        const customMessage = findCustomMessage(this.customMessages, field, rule);
        if (customMessage === null) {
            return { rule, error };
        }

        return {
            rule,
            error: new RequirementError(customMessage, field, error.outcome, { cause: error }),
        };
    }
}
