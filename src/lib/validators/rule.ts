/**
 * Base Rule Class
 *
 * A rule validates one (field, value, parameter) triple and throws on failure:
 * - RuleViolationError for values the rule rejects
 * - ConfigurationError for parameters the rule cannot work with
 */

import type { NativeFunctions } from '../validation/native-functions.js';
import type { FieldIdentifier } from '../validation/types.js';

export abstract class Rule {
    constructor(protected readonly nativeFunctions: NativeFunctions) {}

    abstract validate(field: FieldIdentifier, value: unknown, parameter: unknown): void;
}

export type RuleConstructor = new (nativeFunctions: NativeFunctions) => Rule;
