/**
 * Unit Tests: Native Functions
 */

import { describe, test, expect } from 'vitest';
import { NativeFunctions } from '@src/lib/validation/native-functions.js';

describe('Unit: NativeFunctions', () => {
    const natives = new NativeFunctions();

    describe('isNumeric', () => {
        test.each([
            [10],
            [-2.5],
            [0],
            ['12'],
            [' 1.5'],
            ['-.5'],
            ['1e3'],
            ['7 '],
        ])('should accept %s', (value) => {
            expect(natives.isNumeric(value)).toBe(true);
        });

        test.each([
            [''],
            ['abc'],
            ['12abc'],
            ['0x1A'],
            [true],
            [null],
            [undefined],
            [[1]],
            [{}],
            [Number.NaN],
            [Number.POSITIVE_INFINITY],
        ])('should reject %s', (value) => {
            expect(natives.isNumeric(value)).toBe(false);
        });
    });

    test('isNumeric should accept bigints', () => {
        expect(natives.isNumeric(10n)).toBe(true);
    });

    describe('isNumber', () => {
        test('should accept only finite numbers', () => {
            expect(natives.isNumber(3)).toBe(true);
            expect(natives.isNumber('3')).toBe(false);
            expect(natives.isNumber(Number.NaN)).toBe(false);
        });
    });

    describe('isIntegerLike', () => {
        test('should accept integers and integer strings', () => {
            expect(natives.isIntegerLike(42)).toBe(true);
            expect(natives.isIntegerLike('42')).toBe(true);
            expect(natives.isIntegerLike(' -7 ')).toBe(true);
            expect(natives.isIntegerLike('0')).toBe(true);
        });

        test('should reject fractions, leading zeros and booleans', () => {
            expect(natives.isIntegerLike(4.2)).toBe(false);
            expect(natives.isIntegerLike('4.0')).toBe(false);
            expect(natives.isIntegerLike('007')).toBe(false);
            expect(natives.isIntegerLike(true)).toBe(false);
        });

        test('should reject integers beyond the safe range', () => {
            expect(natives.isIntegerLike('9007199254740993')).toBe(false);
        });
    });

    describe('isEmailAddress', () => {
        test('should accept a simple address', () => {
            expect(natives.isEmailAddress('jane@example.com')).toBe(true);
        });

        test('should reject addresses without domain or with whitespace', () => {
            expect(natives.isEmailAddress('jane@example')).toBe(false);
            expect(natives.isEmailAddress('jane doe@example.com')).toBe(false);
            expect(natives.isEmailAddress(42)).toBe(false);
        });
    });

    describe('matchRegex', () => {
        test('should honour delimiters and flags', () => {
            expect(natives.matchRegex('ABC', '/^[a-c]+$/i')).toBe(true);
            expect(natives.matchRegex('ABC', '/^[a-c]+$/')).toBe(false);
        });

        test('should accept a bare pattern', () => {
            expect(natives.matchRegex('2025-01-31', '^\\d{4}-\\d{2}-\\d{2}$')).toBe(true);
        });

        test('should never match an uncompilable pattern', () => {
            expect(natives.matchRegex('abc', '/(unclosed/')).toBe(false);
            expect(natives.matchRegex('abc', '/abc/q')).toBe(false);
        });
    });

    describe('compareNumeric', () => {
        test('should order integers beyond 2^53 exactly', () => {
            expect(natives.compareNumeric('9007199254740992', '9007199254740993')).toBe(-1);
            expect(natives.compareNumeric(9007199254740993n, '9007199254740992')).toBe(1);
            expect(natives.compareNumeric(' +9007199254740993 ', 9007199254740993n)).toBe(0);
        });

        test('should mix safe integers and bigints', () => {
            expect(natives.compareNumeric(10, 10n)).toBe(0);
            expect(natives.compareNumeric(-3, '2')).toBe(-1);
        });

        test('should compare decimals as numbers', () => {
            expect(natives.compareNumeric('1.5', 1)).toBe(1);
            expect(natives.compareNumeric('1e3', '1000')).toBe(0);
            expect(natives.compareNumeric(0.1, '0.2')).toBe(-1);
        });
    });

    describe('matchDateTime', () => {
        test.each([
            ['2024-02-29', 'Y-m-d'],
            ['29/02/24', 'd/m/y'],
            ['1 March 2025', 'j F Y'],
            ['Mar 1, 2025 9:07 PM', 'M j, Y g:i A'],
            ['23:59:59', 'H:i:s'],
            ['2025-01-31T08:00:00', 'Y-m-d\\TH:i:s'],
        ])('should match %s against %s', (value, format) => {
            expect(natives.matchDateTime(value, format)).toBe(true);
        });

        test.each([
            ['2023-02-29', 'Y-m-d'],
            ['2024-04-31', 'Y-m-d'],
            ['2024-2-09', 'Y-m-d'],
            ['2024-13-01', 'Y-m-d'],
            ['24:00:00', 'H:i:s'],
            ['01 March 2025', 'j F Y'],
            ['9:07 pm', 'g:i A'],
            [' 2024-02-29', 'Y-m-d'],
        ])('should reject %s against %s', (value, format) => {
            expect(natives.matchDateTime(value, format)).toBe(false);
        });

        test('should never match a format with unsupported letters', () => {
            expect(natives.matchDateTime('Thursday', 'l')).toBe(false);
        });
    });
});
