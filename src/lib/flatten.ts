export type JsonPrimitive = string | number | boolean | null;
export type JsonValue = JsonPrimitive | JsonValue[] | { [key: string]: JsonValue };
export type JsonObject = { [key: string]: JsonValue };

export type FlatRecord = Record<string, JsonPrimitive | JsonValue[]>;

function isJsonObject(value: JsonValue): value is JsonObject {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Flatten nested objects into dotted keys, e.g. `{ campaign: { id: '1' } }`
 * becomes `{ 'campaign.id': '1' }`. Arrays are kept whole as leaf values.
 */
export function flattenRecord(record: JsonObject, prefix = ''): FlatRecord {
    const flat: FlatRecord = {};

    for (const [key, value] of Object.entries(record)) {
        const path = prefix ? `${prefix}.${key}` : key;
        if (isJsonObject(value)) {
            Object.assign(flat, flattenRecord(value, path));
        } else {
            flat[path] = value;
        }
    }

    return flat;
}
