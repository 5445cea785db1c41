import type { CustomMessages, FieldIdentifier } from './types.js';

/**
 * Find the custom message for a field/rule pair.
 *
 * Keys are "<field>.<rule>"; the field part may itself be dotted, so the
 * last dot separates the rule. Rule names compare case-insensitively.
 */
export function findCustomMessage(
    customMessages: CustomMessages,
    field: FieldIdentifier,
    rule: string
): string | null {
    for (const [key, message] of Object.entries(customMessages)) {
        const lastDot = key.lastIndexOf('.');
        if (lastDot === -1) {
            continue;
        }
        if (key.slice(0, lastDot) !== String(field)) {
            continue;
        }
        if (key.slice(lastDot + 1).toLowerCase() !== rule.toLowerCase()) {
            continue;
        }
        return message;
    }
    return null;
}
