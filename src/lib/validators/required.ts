/**
 * Required Rule
 *
 * Presence is resolved by the RequirementEngine before value rules run, and
 * requirement rules are filtered out of the dispatch list. This rule is only
 * registered so that 'required' is never reported as unknown; reaching it
 * through dispatch means a caller bypassed the requirement engine.
 */

import { Rule } from './rule.js';
import { RequiredRuleViolation } from '../validation/errors.js';
import { messages } from '../validation/messages.js';
import type { FieldIdentifier } from '../validation/types.js';

export class RequiredRule extends Rule {
    validate(field: FieldIdentifier, _value: unknown, _parameter: unknown): void {
        throw new RequiredRuleViolation(messages.get('required_rule_invoked_directly', field), field);
    }
}
