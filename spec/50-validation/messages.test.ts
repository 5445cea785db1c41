import { afterEach, describe, test, expect } from 'vitest';
import { fileURLToPath } from 'url';
import { MessageCatalogError } from '@src/lib/validation/errors.js';
import {
    DEFAULT_MESSAGES_PATH,
    MessageCatalog,
    formatMessage,
    messages
} from '@src/lib/validation/messages.js';

function fixture(name: string): string {
    return fileURLToPath(new URL(`../fixtures/validation/${name}`, import.meta.url));
}

describe('Unit: MessageCatalog', () => {
    const catalog = new MessageCatalog({ filePaths: [fixture('catalog.json')], language: 'en' });

    test('should substitute arguments in order', () => {
        expect(catalog.get('greeting', 'Jane')).toBe('Hello, Jane.');
    });

    test('should treat %% as a literal percent', () => {
        expect(catalog.get('discount', 20, 'members')).toBe('20% off for members');
    });

    test('should follow aliases, including chained ones', () => {
        expect(catalog.get('welcome', 'Jane')).toBe('Hello, Jane.');
        expect(catalog.get('salutation', 'Jane')).toBe('Hello, Jane.');
    });

    test('should detect alias cycles', () => {
        expect(() => catalog.get('loop_a')).toThrow(MessageCatalogError);
        expect(() => catalog.get('loop_a')).toThrow("Alias cycle detected with message 'loop_a'.");
    });

    test('should report unknown keys', () => {
        expect(() => catalog.get('missing')).toThrow("Message 'missing' not found.");
        expect(() => catalog.get('dangling')).toThrow("Message 'does_not_exist' not found.");
    });

    test('should answer whether a key exists', () => {
        expect(catalog.has('welcome')).toBe(true);
        expect(catalog.has('missing')).toBe(false);
    });

    test('should resolve the configured language', () => {
        const german = new MessageCatalog({ filePaths: [fixture('catalog.json')], language: 'de' });

        expect(german.get('welcome', 'Jane')).toBe('Hallo, Jane.');
    });

    test('should report a missing language', () => {
        const german = new MessageCatalog({ filePaths: [fixture('catalog.json')], language: 'de' });

        expect(() => german.get('english_only')).toThrow("Language 'de' not found for message 'english_only'.");
    });

    test('should let later files override earlier ones key by key', () => {
        const layered = new MessageCatalog({
            filePaths: [fixture('catalog.json'), fixture('catalog-override.json')],
            language: 'en',
        });

        expect(layered.get('greeting', 'Jane')).toBe('Hi, Jane!');
        expect(layered.get('welcome', 'Jane')).toBe('Hi, Jane!');
        expect(layered.get('english_only')).toBe('Only in English.');
    });

    test('should reject a catalog that is not an object', () => {
        const broken = new MessageCatalog({ filePaths: [fixture('not-an-object.json')] });

        expect(() => broken.get('greeting')).toThrow('Message catalog must contain an object at the root.');
    });

    test('should reject entries that are neither text maps nor aliases', () => {
        const broken = new MessageCatalog({ filePaths: [fixture('bad-unit.json')] });

        expect(() => broken.get('greeting')).toThrow(
            "Message 'greeting' must be an object of language-text pairs or an alias string."
        );
    });

    test('should wrap unreadable files', () => {
        const broken = new MessageCatalog({ filePaths: [fixture('absent.json')] });

        expect(() => broken.has('greeting')).toThrow(MessageCatalogError);
    });

    describe('defaults', () => {
        afterEach(() => {
            delete process.env.VALIDATION_MESSAGES_PATH;
        });

        test('should load the bundled catalog', () => {
            expect(new MessageCatalog().filePaths()).toEqual([DEFAULT_MESSAGES_PATH]);
            expect(messages.get('field_must_be_numeric', 'price')).toBe("Field 'price' must be numeric.");
        });

        test('should resolve the bundled alias for numbers', () => {
            expect(messages.get('field_must_be_a_number', 'price')).toBe("Field 'price' must be numeric.");
        });

        test('should take the language from the environment', () => {
            expect(new MessageCatalog().language()).toBe('en');
        });

        test('should layer VALIDATION_MESSAGES_PATH over the bundled catalog', () => {
            process.env.VALIDATION_MESSAGES_PATH = fixture('catalog-override.json');
            const overridden = new MessageCatalog();

            expect(overridden.filePaths()).toEqual([DEFAULT_MESSAGES_PATH, fixture('catalog-override.json')]);
            expect(overridden.get('field_must_be_numeric', 'price')).toBe("'price' needs a number.");
            expect(overridden.get('field_must_be_a_string', 'price')).toBe("Field 'price' must be a string.");
        });
    });
});

describe('Unit: formatMessage', () => {
    test('should leave text without placeholders alone', () => {
        expect(formatMessage('plain', 'Nothing to see.', ['ignored'])).toBe('Nothing to see.');
    });

    test('should reject too few arguments', () => {
        expect(() => formatMessage('pair', '%s and %s', ['one'])).toThrow("Too few arguments for message 'pair'.");
    });
});
