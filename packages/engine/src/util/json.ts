/**
 * @fileoverview JSON helpers
 *
 * Canonical (key-sorted) JSON text and a small string hash. Payload keys,
 * resolved-value ordering and token hashes are all derived from these.
 *
 * @module @spanwise/engine/util/json
 */

/**
 * Any value that survives a JSON round trip unchanged.
 */
export type JsonValue =
    | string
    | number
    | boolean
    | null
    | JsonValue[]
    | { [key: string]: JsonValue };

/**
 * Serialize a value to JSON with object keys sorted, so that structurally
 * equal values always produce the same text.
 *
 * Follows `JSON.stringify` for the awkward cases: `undefined` properties are
 * skipped, non-finite numbers and functions become `null`, dates become their
 * ISO string.
 *
 * @example
 * ```typescript
 * stableStringify({ b: 1, a: [true, null] });
 * // => '{"a":[true,null],"b":1}'
 * ```
 */
export function stableStringify(value: unknown): string {
    if (value === null || value === undefined) {
        return "null";
    }

    switch (typeof value) {
        case "number":
            return Number.isFinite(value) ? JSON.stringify(value) : "null";
        case "string":
        case "boolean":
            return JSON.stringify(value);
        case "bigint":
            return value.toString();
        case "function":
        case "symbol":
            return "null";
        default:
            break;
    }

    if (value instanceof Date) {
        return JSON.stringify(value.toISOString());
    }

    if (Array.isArray(value)) {
        return `[${value.map((item: unknown) => stableStringify(item)).join(",")}]`;
    }

    const entries: [string, unknown][] = Object.entries(value);
    const fields = entries
        .filter(([, field]) => field !== undefined)
        .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))
        .map(([key, field]) => `${JSON.stringify(key)}:${stableStringify(field)}`);

    return `{${fields.join(",")}}`;
}

/**
 * FNV-1a 32-bit hash of a string.
 */
export function fnv1a(text: string): number {
    let hash = 0x811c9dc5;
    for (let i = 0; i < text.length; i++) {
        hash ^= text.charCodeAt(i);
        hash = Math.imul(hash, 0x01000193) >>> 0;
    }
    return hash >>> 0;
}

/**
 * Type guard for {@link JsonValue}.
 */
export function isJsonValue(raw: unknown): raw is JsonValue {
    if (raw === null) {
        return true;
    }

    switch (typeof raw) {
        case "string":
        case "boolean":
            return true;
        case "number":
            return Number.isFinite(raw);
        case "object":
            break;
        default:
            return false;
    }

    if (Array.isArray(raw)) {
        return raw.every((item: unknown) => isJsonValue(item));
    }

    const entries: [string, unknown][] = Object.entries(raw);
    return entries.every(([, field]) => isJsonValue(field));
}

/**
 * Type guard for a plain (non-array) object.
 */
export function isRecord(raw: unknown): raw is Record<string, unknown> {
    return typeof raw === "object" && raw !== null && !Array.isArray(raw);
}
