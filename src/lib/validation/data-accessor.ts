/**
 * Data Accessor
 *
 * Presence and value lookups over the dataset being validated. Plain
 * objects, arrays and Maps are supported; string identifiers containing dots
 * walk nested containers (`address.city`, `items.0.sku`).
 *
 * A key that exists counts as present even when its value is null or
 * undefined.
 */

import { FieldNotFoundError } from './errors.js';
import { messages } from './messages.js';
import type { FieldIdentifier, FieldPresence } from './types.js';

export class DataAccessor implements FieldPresence {
    constructor(private readonly dataset: object) {}

    data(): object {
        return this.dataset;
    }

    hasField(field: FieldIdentifier): boolean {
        return this.lookup(field).found;
    }

    /**
     * @throws FieldNotFoundError when the field is absent
     */
    getField(field: FieldIdentifier): unknown {
        const result = this.lookup(field);
        if (!result.found) {
            throw new FieldNotFoundError(field, messages.get('field_does_not_exist', field));
        }
        return result.value;
    }

    getFieldOrDefault(field: FieldIdentifier, defaultValue: unknown = null): unknown {
        const result = this.lookup(field);
        return result.found ? result.value : defaultValue;
    }

    private lookup(field: FieldIdentifier): { found: boolean; value?: unknown } {
        const path = typeof field === 'string' && field.includes('.') ? field.split('.') : [field];

        let carry: unknown = this.dataset;
        for (const segment of path) {
            if (!hasSubfield(carry, segment)) {
                return { found: false };
            }
            carry = getSubfield(carry, segment);
        }

        return { found: true, value: carry };
    }
}

function hasSubfield(container: unknown, key: FieldIdentifier): boolean {
    if (container instanceof Map) {
        return container.has(key) || container.has(alternateKey(key));
    }
    if (typeof container === 'object' && container !== null) {
        return Object.hasOwn(container, String(key));
    }
    return false;
}

function getSubfield(container: unknown, key: FieldIdentifier): unknown {
    if (container instanceof Map) {
        return container.has(key) ? container.get(key) : container.get(alternateKey(key));
    }
    if (typeof container === 'object' && container !== null) {
        return Reflect.get(container, String(key));
    }
    return undefined;
}

// Map keys are typed: "0" and 0 are different keys
function alternateKey(key: FieldIdentifier): FieldIdentifier {
    if (typeof key === 'number') {
        return String(key);
    }
    return /^\d+$/.test(key) ? Number(key) : key;
}
