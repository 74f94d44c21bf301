import { isValid } from 'date-fns';
import { toDate } from 'date-fns-tz';

export type RawRow = Record<string, unknown>;
export type NormalizedRow = Record<string, string | null>;

export interface NormalizeOptions {
    /** Columns parsed as timestamps; names may be given before or after sanitizing */
    timestampColumns?: readonly string[];
    /** Decoration columns removed from the output */
    dropColumns?: readonly string[];
}

/**
 * Warehouse-safe column name: lower case, with anything outside [a-z0-9_]
 * replaced by an underscore.
 */
export function sanitizeColumnName(name: string): string {
    return name
        .trim()
        .replace(/[^A-Za-z0-9_]+/g, '_')
        .replace(/^_+|_+$/g, '')
        .toLowerCase();
}

const SLASH_DATE = /^(\d{4})\/(\d{2})\/(\d{2})(.*)$/;

/**
 * Parse a timestamp cell into an ISO-8601 UTC string. Values without an offset
 * are read as UTC. Unparseable values become null.
 */
export function parseTimestamp(value: unknown): string | null {
    if (value === null || value === undefined || value === '') {
        return null;
    }
    if (value instanceof Date) {
        return isValid(value) ? value.toISOString() : null;
    }
    if (typeof value !== 'string' && typeof value !== 'number') {
        return null;
    }

    const text = String(value).trim();
    const slash = SLASH_DATE.exec(text);
    const candidate = slash ? `${slash[1]}-${slash[2]}-${slash[3]}${slash[4]}` : text;

    const parsed = typeof value === 'number' ? new Date(value) : toDate(candidate, { timeZone: 'UTC' });
    return isValid(parsed) ? parsed.toISOString() : null;
}

function toCellString(value: unknown): string | null {
    if (value === null || value === undefined) {
        return null;
    }
    if (typeof value === 'object') {
        return value instanceof Date ? value.toISOString() : JSON.stringify(value);
    }
    return String(value);
}

/**
 * Coerce rows into loader shape: sanitized column names, declared timestamp
 * columns as ISO strings, every other cell as a string.
 */
export function normalizeRows(rows: readonly RawRow[], options: NormalizeOptions = {}): NormalizedRow[] {
    const timestampColumns = new Set((options.timestampColumns ?? []).map(sanitizeColumnName));
    const dropColumns = new Set((options.dropColumns ?? []).map(sanitizeColumnName));

    return rows.map(row => {
        const normalized: NormalizedRow = {};
        for (const [rawName, value] of Object.entries(row)) {
            const name = sanitizeColumnName(rawName);
            if (!name || dropColumns.has(name)) {
                continue;
            }
            normalized[name] = timestampColumns.has(name) ? parseTimestamp(value) : toCellString(value);
        }
        return normalized;
    });
}
