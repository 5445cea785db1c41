/**
 * Rule Registry
 *
 * Maps canonical (lower-cased) rule names to rule instances. Instances are
 * created once at construction and the map is never mutated afterwards, so a
 * registry can be shared between concurrent validation passes.
 *
 * Unknown names are reported as null rather than thrown, which lets callers
 * query the registry speculatively (e.g. to check rule declarations).
 */

import {
    DatetimeRule,
    EmailRule,
    EnumRule,
    IntegerRule,
    MaxLengthRule,
    MaxRule,
    MinLengthRule,
    MinRule,
    NumericRule,
    RegexRule,
    RequiredRule,
    StringRule,
    type Rule,
    type RuleConstructor
} from '../validators/index.js';
import { InvalidRuleError } from './errors.js';
import { messages } from './messages.js';
import { NativeFunctions } from './native-functions.js';

export const BUILTIN_RULES: Readonly<Record<string, RuleConstructor>> = {
    required: RequiredRule,
    string: StringRule,
    numeric: NumericRule,
    integer: IntegerRule,
    email: EmailRule,
    datetime: DatetimeRule,
    min: MinRule,
    max: MaxRule,
    minlength: MinLengthRule,
    maxlength: MaxLengthRule,
    regex: RegexRule,
    enum: EnumRule,
};

export class RuleRegistry {
    private readonly rules: ReadonlyMap<string, Rule>;

    /**
     * @param extraRules - Application rules layered over the built-in ones
     * @param nativeFunctions - Type predicates shared by every rule instance
     */
    constructor(
        extraRules: Readonly<Record<string, RuleConstructor>> = {},
        nativeFunctions: NativeFunctions = new NativeFunctions()
    ) {
        const rules = new Map<string, Rule>();

        for (const [name, RuleClass] of Object.entries({ ...BUILTIN_RULES, ...extraRules })) {
            rules.set(name.toLowerCase(), new RuleClass(nativeFunctions));
        }

        this.rules = rules;
    }

    /**
     * Look up the rule for a name; null when the name is not registered
     */
    create(name: string): Rule | null {
        if (name === '') {
            throw new InvalidRuleError(messages.get('rule_must_be_non_empty'));
        }
        return this.rules.get(name.toLowerCase()) ?? null;
    }

    has(name: string): boolean {
        return this.rules.has(name.toLowerCase());
    }

    names(): string[] {
        return Array.from(this.rules.keys());
    }
}

export const defaultRuleRegistry = new RuleRegistry();
