import { afterEach, beforeEach, describe, test, expect, vi } from 'vitest';
import { mkdtempSync, rmSync, writeFileSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import { ValidationEnv, parseEnvLine } from '@src/lib/env/validation-env.js';

describe('Unit: parseEnvLine', () => {
    test.each([
        ['KEY=value', ['KEY', 'value']],
        ['  KEY = value  ', ['KEY', 'value']],
        ['KEY="quoted # value"', ['KEY', 'quoted # value']],
        ["KEY='single'", ['KEY', 'single']],
        ['KEY=value # comment', ['KEY', 'value']],
        ['KEY=', ['KEY', '']],
        ['KEY=a=b', ['KEY', 'a=b']],
    ])('should parse %s', (line, expected) => {
        expect(parseEnvLine(line)).toEqual(expected);
    });

    test.each([
        [''],
        ['   '],
        ['# comment'],
        ['NO_EQUALS'],
        ['=value'],
    ])('should skip %j', line => {
        expect(parseEnvLine(line)).toBeNull();
    });
});

describe('Unit: ValidationEnv', () => {
    afterEach(() => {
        delete process.env.VALIDATION_TEST_KEY;
    });

    test('should read values from the environment', () => {
        process.env.VALIDATION_TEST_KEY = 'fr';

        expect(ValidationEnv.get('VALIDATION_TEST_KEY')).toBe('fr');
        expect(ValidationEnv.isConfigLoaded()).toBe(true);
    });

    test('should fall back to the default', () => {
        expect(ValidationEnv.get('VALIDATION_TEST_KEY', 'en')).toBe('en');
        expect(ValidationEnv.get('VALIDATION_TEST_KEY')).toBe('');
    });

    test('should throw for missing required values', () => {
        expect(() => ValidationEnv.get('VALIDATION_TEST_KEY', undefined, true)).toThrow(
            'VALIDATION_TEST_KEY not found in configuration. Set it in the environment or in ~/.config/field-rules/env.json.'
        );
    });
});

describe('Unit: ValidationEnv.loadFrom', () => {
    const keys = ['FR_TEST_LANGUAGE', 'FR_TEST_PATH', 'FR_TEST_USER_ONLY', 'FR_TEST_DOTENV'];
    let directory: string;

    beforeEach(() => {
        directory = mkdtempSync(join(tmpdir(), 'field-rules-env-'));
        writeFileSync(join(directory, 'project.json'), JSON.stringify({
            FR_TEST_LANGUAGE: 'de',
            FR_TEST_PATH: '/project/messages.json',
        }));
        writeFileSync(join(directory, 'user.json'), JSON.stringify({
            FR_TEST_LANGUAGE: 'fr',
            FR_TEST_USER_ONLY: 'yes',
        }));
        writeFileSync(join(directory, '.env'), 'FR_TEST_LANGUAGE=es\nFR_TEST_DOTENV="from dotenv"\n');
    });

    afterEach(() => {
        for (const key of keys) {
            delete process.env[key];
        }
        rmSync(directory, { recursive: true, force: true });
        vi.restoreAllMocks();
    });

    test('should load the first config file found and ignore the rest', () => {
        ValidationEnv.loadFrom({
            configPaths: [join(directory, 'absent.json'), join(directory, 'project.json'), join(directory, 'user.json')],
            dotenvPath: join(directory, 'absent.env'),
        });

        expect(process.env.FR_TEST_LANGUAGE).toBe('de');
        expect(process.env.FR_TEST_PATH).toBe('/project/messages.json');
        expect(process.env.FR_TEST_USER_ONLY).toBeUndefined();
    });

    test('should never override variables that are already set', () => {
        process.env.FR_TEST_PATH = '/preset/messages.json';

        ValidationEnv.loadFrom({
            configPaths: [join(directory, 'project.json')],
            dotenvPath: join(directory, '.env'),
        });

        expect(process.env.FR_TEST_PATH).toBe('/preset/messages.json');
        expect(process.env.FR_TEST_LANGUAGE).toBe('de');
        expect(process.env.FR_TEST_DOTENV).toBe('from dotenv');
    });

    test('should load .env without a config file', () => {
        ValidationEnv.loadFrom({ configPaths: [], dotenvPath: join(directory, '.env') });

        expect(process.env.FR_TEST_LANGUAGE).toBe('es');
        expect(process.env.FR_TEST_DOTENV).toBe('from dotenv');
    });

    test('should warn about an unreadable config file and fall through to the next', () => {
        const consoleWarn = vi.spyOn(console, 'warn').mockImplementation(() => {});
        writeFileSync(join(directory, 'broken.json'), '{ not json');

        ValidationEnv.loadFrom({
            configPaths: [join(directory, 'broken.json'), join(directory, 'user.json')],
            dotenvPath: join(directory, 'absent.env'),
        });

        expect(process.env.FR_TEST_LANGUAGE).toBe('fr');
        expect(process.env.FR_TEST_USER_ONLY).toBe('yes');
        expect(consoleWarn).toHaveBeenCalledTimes(1);
    });

    test('should warn about a config file that is not an object', () => {
        const consoleWarn = vi.spyOn(console, 'warn').mockImplementation(() => {});
        const listPath = join(directory, 'list.json');
        writeFileSync(listPath, '["FR_TEST_LANGUAGE"]');

        ValidationEnv.loadFrom({ configPaths: [listPath], dotenvPath: join(directory, 'absent.env') });

        expect(process.env.FR_TEST_LANGUAGE).toBeUndefined();
        expect(consoleWarn).toHaveBeenCalledWith(
            `WARN Invalid validation configuration - not an object {"configPath":${JSON.stringify(listPath)}}`
        );
    });
});
