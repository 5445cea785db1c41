/**
 * Rule String Parser
 *
 * Grammar: `<name>` or `<name>:<parameter>`. The name is trimmed and
 * lower-cased; the parameter is trimmed and collapses to null when empty.
 */

import { InvalidRuleError } from './errors.js';
import { messages } from './messages.js';
import type { RuleSpec } from './types.js';

export function parseRule(rule: string): RuleSpec {
    const separator = rule.indexOf(':');

    let name: string;
    let parameter: string | null = null;

    if (separator === -1) {
        name = rule.trim();
    } else {
        name = rule.slice(0, separator).trim();
        parameter = rule.slice(separator + 1).trim();
        if (parameter === '') {
            parameter = null;
        }
    }

    if (name === '') {
        throw new InvalidRuleError(messages.get('rule_must_be_non_empty'));
    }

    return { name: name.toLowerCase(), parameter };
}
