/**
 * Compiled Rules
 *
 * Turns user-facing rule declarations into per-field meta-rule lists:
 *
 *   new CompiledRules({
 *       id: ['required', 'integer', 'min:1'],
 *       token: 'regex:/^[a-f0-9]{64}$/',
 *       country: value => ['US', 'CA', 'MX'].includes(String(value)),
 *   });
 *
 * Rule strings are parsed eagerly, so malformed strings fail here. Rule names
 * are only looked up at validation time.
 */

import { findCustomMessage } from './custom-messages.js';
import { CustomMetaRule, StandardMetaRule, type MetaRule } from './meta-rules.js';
import { parseRule } from './rule-parser.js';
import { defaultRuleRegistry, type RuleRegistry } from './rule-registry.js';
import type { CustomMessages, RuleDefinition, RuleDefinitions } from './types.js';

export class CompiledRules {
    private readonly collection: ReadonlyMap<string, readonly MetaRule[]>;

    constructor(
        rules: RuleDefinitions,
        customMessages: CustomMessages = {},
        registry: RuleRegistry = defaultRuleRegistry
    ) {
        const collection = new Map<string, readonly MetaRule[]>();

        for (const [field, definitions] of Object.entries(rules)) {
            const list: readonly RuleDefinition[] = isDefinitionList(definitions) ? definitions : [definitions];

            collection.set(field, list.map(definition => {
                if (typeof definition === 'function') {
                    return new CustomMetaRule(definition);
                }
                const { name, parameter } = parseRule(definition);
                return new StandardMetaRule(name, parameter, findCustomMessage(customMessages, field, name), registry);
            }));
        }

        this.collection = collection;
    }

    metaRulesCollection(): ReadonlyMap<string, readonly MetaRule[]> {
        return this.collection;
    }

    fields(): string[] {
        return Array.from(this.collection.keys());
    }
}

function isDefinitionList(
    definitions: RuleDefinition | readonly RuleDefinition[]
): definitions is readonly RuleDefinition[] {
    return Array.isArray(definitions);
}
