/**
 * Narrowing helpers for vendor JSON bodies.
 */

export type JsonRecord = Record<string, unknown>;

export function isRecord(value: unknown): value is JsonRecord {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function readString(value: unknown, key: string): string | undefined {
    if (!isRecord(value)) {
        return undefined;
    }
    const field = value[key];
    return typeof field === 'string' ? field : undefined;
}

export function readRecord(value: unknown, key: string): JsonRecord | undefined {
    if (!isRecord(value)) {
        return undefined;
    }
    const field = value[key];
    return isRecord(field) ? field : undefined;
}

export function readArray(value: unknown, key: string): unknown[] | undefined {
    if (!isRecord(value)) {
        return undefined;
    }
    const field = value[key];
    return Array.isArray(field) ? field : undefined;
}

/**
 * A string with visible content; blank strings read as missing.
 */
export function asText(value: unknown): string | undefined {
    return typeof value === 'string' && value.trim().length > 0 ? value : undefined;
}

export function readText(value: unknown, key: string): string | undefined {
    return asText(readString(value, key));
}
