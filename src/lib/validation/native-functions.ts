/**
 * Native Functions
 *
 * Type predicates used by the rules. Kept behind one class so tests can
 * substitute individual checks.
 */

import { matchDateTimeFormat } from './datetime-format.js';

// Decimal or scientific notation, surrounding whitespace allowed ("12", " 1.5", "-.5", "1e3 ")
const NUMERIC_STRING_PATTERN = /^\s*[+-]?(\d+(\.\d*)?|\.\d+)([eE][+-]?\d+)?\s*$/;

// Optional sign, no leading zeros ("0", "-12", " +7 ")
const INTEGER_STRING_PATTERN = /^\s*[+-]?(0|[1-9]\d*)\s*$/;

// Integers of any size, for exact comparison ("9007199254740993", "-0012")
const BIG_INTEGER_PATTERN = /^\s*[+-]?\d+\s*$/;

const EMAIL_PATTERN = /^[^\s@]+@[^\s@]+\.[^\s@]+$/;

// Delimited pattern with trailing flags: /^[a-f0-9]{64}$/i
const DELIMITED_PATTERN = /^\/([\s\S]*)\/([a-z]*)$/;

export class NativeFunctions {
    /**
     * Finite numbers, bigints, and numeric strings
     */
    isNumeric(value: unknown): boolean {
        if (typeof value === 'number') {
            return Number.isFinite(value);
        }
        if (typeof value === 'bigint') {
            return true;
        }
        if (typeof value === 'string') {
            return NUMERIC_STRING_PATTERN.test(value);
        }
        return false;
    }

    /**
     * Finite numbers only (no strings)
     */
    isNumber(value: unknown): boolean {
        return typeof value === 'number' && Number.isFinite(value);
    }

    isString(value: unknown): value is string {
        return typeof value === 'string';
    }

    isInteger(value: unknown): boolean {
        return Number.isInteger(value);
    }

    /**
     * Safe integers, or strings that spell one
     */
    isIntegerLike(value: unknown): boolean {
        if (typeof value === 'number') {
            return Number.isSafeInteger(value);
        }
        if (typeof value === 'string') {
            return INTEGER_STRING_PATTERN.test(value) && Number.isSafeInteger(Number(value));
        }
        return false;
    }

    isEmailAddress(value: unknown): boolean {
        return typeof value === 'string' && EMAIL_PATTERN.test(value);
    }

    isArray(value: unknown): value is unknown[] {
        return Array.isArray(value);
    }

    /**
     * Order two numeric operands: negative, zero or positive.
     *
     * Integer operands on both sides compare exactly as bigints, so values
     * beyond 2^53 keep their order; anything else compares as numbers.
     */
    compareNumeric(left: unknown, right: unknown): number {
        const leftInteger = toBigInt(left);
        const rightInteger = toBigInt(right);

        if (leftInteger !== null && rightInteger !== null) {
            return leftInteger === rightInteger ? 0 : leftInteger < rightInteger ? -1 : 1;
        }

        return Math.sign(Number(left) - Number(right));
    }

    /**
     * Whether the value is the canonical rendering of a date in the format
     */
    matchDateTime(value: string, format: string): boolean {
        return matchDateTimeFormat(value, format);
    }

    /**
     * Test a value against a delimited (`/body/flags`) or bare pattern.
     * A pattern that does not compile never matches.
     */
    matchRegex(value: string, pattern: string): boolean {
        const compiled = compilePattern(pattern);
        return compiled !== null && compiled.test(value);
    }
}

function toBigInt(value: unknown): bigint | null {
    if (typeof value === 'bigint') {
        return value;
    }
    if (typeof value === 'number' && Number.isInteger(value)) {
        return BigInt(value);
    }
    if (typeof value === 'string' && BIG_INTEGER_PATTERN.test(value)) {
        return BigInt(value.trim().replace(/^\+/, ''));
    }
    return null;
}

function compilePattern(pattern: string): RegExp | null {
    const delimited = DELIMITED_PATTERN.exec(pattern);
    const source = delimited ? delimited[1] : pattern;
    const flags = delimited ? delimited[2] : '';

    try {
        return new RegExp(source, flags);
    } catch (error) {
        if (error instanceof SyntaxError) {
            return null;
        }
        throw error;
    }
}
