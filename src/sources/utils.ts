/**
 * Shared utilities for source adapters.
 *
 * Source payloads are untrusted JSON: every reader returns null (or an empty
 * array) for a missing or mistyped value instead of throwing.
 */

export type JsonRecord = Record<string, unknown>;

/** Maximum number of author names kept in a summary */
export const MAX_AUTHORS = 4;

/** Suffix appended when authors were dropped from a summary */
export const ET_AL = ' et al.';

export function isRecord(value: unknown): value is JsonRecord {
    return value !== null && typeof value === 'object' && !Array.isArray(value);
}

export function asRecord(value: unknown): JsonRecord | null {
    return isRecord(value) ? value : null;
}

export function asArray(value: unknown): unknown[] {
    return Array.isArray(value) ? value : [];
}

/**
 * Trimmed non-empty string, or null.
 */
export function asString(value: unknown): string | null {
    if (typeof value !== 'string') return null;
    const trimmed = value.trim();
    return trimmed || null;
}

/**
 * Integer value; numeric strings such as "2019" are accepted.
 */
export function asInteger(value: unknown): number | null {
    if (typeof value === 'number') {
        return Number.isInteger(value) ? value : null;
    }
    if (typeof value === 'string' && /^\s*-?\d+\s*$/.test(value)) {
        return parseInt(value, 10);
    }
    return null;
}

/**
 * Walk a path of object keys, e.g. `dig(data, 'resultList', 'result')`.
 */
export function dig(value: unknown, ...path: string[]): unknown {
    let current: unknown = value;
    for (const key of path) {
        const record = asRecord(current);
        if (!record) return undefined;
        current = record[key];
    }
    return current;
}

/**
 * Records of a JSON array; non-object items are skipped.
 */
export function recordsOf(value: unknown): JsonRecord[] {
    return asArray(value).filter(isRecord);
}

/**
 * Year from the leading four digits of a date string ("2021-03-04" → 2021).
 */
export function yearFromDateString(value: unknown): number | null {
    if (typeof value !== 'string') return null;
    const match = /^\s*(\d{4})/.exec(value);
    return match?.[1] ? parseInt(match[1], 10) : null;
}

/**
 * Join up to MAX_AUTHORS names, adding ET_AL when `total` exceeds the cap.
 * `total` is the length of the source's author list, including entries that
 * produced no name.
 */
export function formatAuthors(names: Array<string | null>, total: number = names.length): string {
    const kept = names
        .slice(0, MAX_AUTHORS)
        .filter((name): name is string => !!name);
    const tail = total > MAX_AUTHORS ? ET_AL : '';
    return kept.join(', ') + tail;
}

/**
 * Clamp a caller row count to a source's page-size range.
 */
export function pageSize(limit: number, max: number): number {
    return Math.max(1, Math.min(Math.floor(limit), max));
}
