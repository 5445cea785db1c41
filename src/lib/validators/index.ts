/**
 * Rule Implementations
 *
 * Each rule validates one (field, value, parameter) triple. Rules hold no
 * state beyond a shared NativeFunctions reference.
 */

export { Rule, type RuleConstructor } from './rule.js';
export { RequiredRule } from './required.js';
export { StringRule, NumericRule, IntegerRule, EmailRule, DatetimeRule } from './types.js';
export { MinRule, MaxRule, MinLengthRule, MaxLengthRule, RegexRule } from './constraints.js';
export { EnumRule } from './enums.js';
