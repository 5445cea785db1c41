/**
 * YAML Rule Sets
 *
 * Rule declarations kept in YAML instead of code:
 *
 *   rules:
 *     username: [required, string, "minLength:3"]
 *     email: [required, email]
 *     role: "enum:admin,editor,viewer"
 *   messages:
 *     username.required: Please choose a username.
 */

import { readFileSync } from 'fs';
import { load as decodeYaml, YAMLException } from 'js-yaml';
import { ConfigurationError } from './errors.js';
import { messages as catalog } from './messages.js';
import type { CustomMessages, RuleDefinitions } from './types.js';

export interface RuleSet {
    rules: RuleDefinitions;
    messages: CustomMessages;
}

/**
 * Decode a YAML rule set document
 *
 * @throws ConfigurationError when the document is not a valid rule set
 */
export function loadRuleSetYaml(text: string): RuleSet {
    let document: unknown;
    try {
        document = decodeYaml(text);
    } catch (error) {
        if (error instanceof YAMLException) {
            throw invalid(error.reason || error.message, error);
        }
        throw error;
    }

    if (!isRecord(document)) {
        throw invalid('document must be a mapping');
    }

    if (!isRecord(document.rules)) {
        throw invalid("'rules' must be a mapping of field names to rules");
    }

    const rules: RuleDefinitions = {};
    for (const [field, definitions] of Object.entries(document.rules)) {
        if (typeof definitions === 'string') {
            rules[field] = definitions;
        } else if (Array.isArray(definitions) && definitions.every((entry): entry is string => typeof entry === 'string')) {
            rules[field] = definitions;
        } else {
            throw invalid(`rules for '${field}' must be a string or a list of strings`);
        }
    }

    const messages: CustomMessages = {};
    if (document.messages !== undefined && document.messages !== null) {
        if (!isRecord(document.messages)) {
            throw invalid("'messages' must be a mapping of 'field.rule' keys to text");
        }
        for (const [key, text] of Object.entries(document.messages)) {
            if (typeof text !== 'string') {
                throw invalid(`message '${key}' must be a string`);
            }
            messages[key] = text;
        }
    }

    return { rules, messages };
}

/**
 * Read and decode a YAML rule set file
 */
export function readRuleSetFile(filePath: string): RuleSet {
    return loadRuleSetYaml(readFileSync(filePath, 'utf8'));
}

function invalid(reason: string, cause?: unknown): ConfigurationError {
    return new ConfigurationError(catalog.get('ruleset_invalid', reason), 'INVALID_RULESET', { cause });
}

function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}
