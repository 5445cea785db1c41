/**
 * Message Catalog
 *
 * Maps a message key plus positional arguments to localized text. The
 * catalog is a JSON object whose entries are either a map of language code
 * to text, or an alias string naming another key:
 *
 *   {
 *     "field_must_be_numeric": { "en": "Field '%s' must be numeric." },
 *     "field_must_be_a_number": "field_must_be_numeric"
 *   }
 *
 * Placeholders are `%s`, substituted in order; `%%` is a literal percent.
 */

import { readFileSync } from 'fs';
import { fileURLToPath } from 'url';
import { ValidationEnv } from '../env/validation-env.js';
import { MessageCatalogError } from './errors.js';

export const DEFAULT_MESSAGES_PATH = fileURLToPath(new URL('./messages.json', import.meta.url));

type TranslationUnit = ReadonlyMap<string, string> | string;

export interface MessageCatalogOptions {
    /** Catalog files, later files override earlier ones key by key */
    filePaths?: readonly string[];
    /** Language code; defaults to VALIDATION_LANGUAGE, then 'en' */
    language?: string;
}

export class MessageCatalog {
    private translations: Map<string, TranslationUnit> | null = null;

    constructor(private readonly options: MessageCatalogOptions = {}) {}

    /**
     * Resolve a message key and substitute positional arguments
     */
    get(key: string, ...args: unknown[]): string {
        return this.resolve(key, args, []);
    }

    /**
     * Whether the key (or an alias of it) exists in the catalog
     */
    has(key: string): boolean {
        return this.load().has(key);
    }

    language(): string {
        return this.options.language ?? ValidationEnv.get('VALIDATION_LANGUAGE', 'en');
    }

    filePaths(): readonly string[] {
        if (this.options.filePaths) {
            return this.options.filePaths;
        }
        const override = ValidationEnv.get('VALIDATION_MESSAGES_PATH');
        return override ? [DEFAULT_MESSAGES_PATH, override] : [DEFAULT_MESSAGES_PATH];
    }

    private resolve(key: string, args: unknown[], visited: string[]): string {
        if (visited.includes(key)) {
            throw new MessageCatalogError(`Alias cycle detected with message '${key}'.`);
        }

        const unit = this.load().get(key);
        if (unit === undefined) {
            throw new MessageCatalogError(`Message '${key}' not found.`);
        }

        if (typeof unit === 'string') {
            return this.resolve(unit, args, [...visited, key]);
        }

        const language = this.language();
        const text = unit.get(language);
        if (text === undefined) {
            throw new MessageCatalogError(`Language '${language}' not found for message '${key}'.`);
        }

        return formatMessage(key, text, args);
    }

    private load(): Map<string, TranslationUnit> {
        if (this.translations !== null) {
            return this.translations;
        }

        const translations = new Map<string, TranslationUnit>();
        for (const filePath of this.filePaths()) {
            for (const [key, unit] of loadCatalogFile(filePath)) {
                translations.set(key, unit);
            }
        }

        return this.translations = translations;
    }
}

/**
 * Substitute `%s` placeholders in order
 */
export function formatMessage(key: string, text: string, args: readonly unknown[]): string {
    let index = 0;

    return text.replace(/%%|%s/g, token => {
        if (token === '%%') {
            return '%';
        }
        if (index >= args.length) {
            throw new MessageCatalogError(`Too few arguments for message '${key}'.`);
        }
        return String(args[index++]);
    });
}

function loadCatalogFile(filePath: string): Map<string, TranslationUnit> {
    let root: unknown;
    try {
        root = JSON.parse(readFileSync(filePath, 'utf8'));
    } catch (error) {
        throw new MessageCatalogError(`Message catalog '${filePath}' could not be read.`, { cause: error });
    }

    if (typeof root !== 'object' || root === null || Array.isArray(root)) {
        throw new MessageCatalogError('Message catalog must contain an object at the root.');
    }

    const units = new Map<string, TranslationUnit>();
    for (const [key, unit] of Object.entries(root)) {
        if (key === '') {
            throw new MessageCatalogError('Message key cannot be empty.');
        }

        if (typeof unit === 'string') {
            units.set(key, unit); // Alias
            continue;
        }

        if (typeof unit !== 'object' || unit === null || Array.isArray(unit)) {
            throw new MessageCatalogError(
                `Message '${key}' must be an object of language-text pairs or an alias string.`);
        }

        const texts = new Map<string, string>();
        for (const [language, text] of Object.entries(unit)) {
            if (language === '') {
                throw new MessageCatalogError(`Language code cannot be empty in message '${key}'.`);
            }
            if (typeof text !== 'string') {
                throw new MessageCatalogError(`Text for '${key}' in '${language}' must be a string.`);
            }
            texts.set(language, text);
        }
        units.set(key, texts);
    }

    return units;
}

/**
 * Shared catalog used by the rules, meta-rules and requirement engine
 */
export const messages = new MessageCatalog();
