/**
 * Shared validation types
 */

/** Datasets may be keyed by name or by position */
export type FieldIdentifier = string | number;

/** Inline predicate used in place of a named rule */
export type RulePredicate = (value: unknown) => boolean;

/** One entry of a field's rule list: a rule string or an inline predicate */
export type RuleDefinition = string | RulePredicate;

/** User-facing rule declarations, keyed by field */
export type RuleDefinitions = Record<string, RuleDefinition | readonly RuleDefinition[]>;

/** Custom failure messages keyed "<field>.<rule>" */
export type CustomMessages = Record<string, string>;

/** Result of parsing a single rule string */
export interface RuleSpec {
    name: string;
    parameter: string | null;
}

/** Presence queries the requirement engine needs from a dataset */
export interface FieldPresence {
    hasField(field: FieldIdentifier): boolean;
}
