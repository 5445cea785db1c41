/**
 * Meta Rules
 *
 * A meta-rule is one rule bound to one field's rule list. StandardMetaRule
 * dispatches to the registry by name; CustomMetaRule wraps an inline predicate.
 */

import { RuleViolationError, UnknownRuleError } from './errors.js';
import { messages } from './messages.js';
import { defaultRuleRegistry, type RuleRegistry } from './rule-registry.js';
import type { FieldIdentifier, RulePredicate } from './types.js';

export interface MetaRule {
    readonly name: string;
    readonly parameter: unknown;
    readonly customMessage: string | null;
    validate(field: FieldIdentifier, value: unknown): void;
}

export class StandardMetaRule implements MetaRule {
    constructor(
        readonly name: string,
        readonly parameter: unknown = null,
        readonly customMessage: string | null = null,
        private readonly registry: RuleRegistry = defaultRuleRegistry
    ) {}

    /**
     * Dispatch to the named rule. A custom message replaces the text of a
     * rule violation; configuration errors always pass through untouched.
     */
    validate(field: FieldIdentifier, value: unknown): void {
        const rule = this.registry.create(this.name);
        if (rule === null) {
            throw new UnknownRuleError(this.name, messages.get('unknown_rule', this.name), field);
        }

        try {
            rule.validate(field, value, this.parameter);
        } catch (error) {
            if (this.customMessage !== null && error instanceof RuleViolationError) {
                throw new RuleViolationError(this.customMessage, field, { cause: error });
            }
            throw error;
        }
    }
}

export class CustomMetaRule implements MetaRule {
    readonly name = '';
    readonly parameter = null;
    readonly customMessage = null;

    constructor(private readonly predicate: RulePredicate) {}

    /**
     * Only an explicit `false` fails
     */
    validate(field: FieldIdentifier, value: unknown): void {
        if (this.predicate(value) !== false) {
            return;
        }
        throw new RuleViolationError(messages.get('field_failed_custom_validation', field), field);
    }
}
