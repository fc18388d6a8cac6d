/**
 * Naive timestamp codec.
 *
 * Timestamps are wall-clock values with no zone. They are carried as
 * milliseconds on a UTC axis so that differences are plain subtraction;
 * a trailing `Z` or `±hh:mm` designator is accepted and ignored.
 */

import { MS_PER_MINUTE } from './types.js';

export const TIMESTAMP_FORMAT = 'yyyy-MM-dd HH:mm:ss';

const NAIVE_TIMESTAMP =
    /^(\d{4})-(\d{2})-(\d{2})[ T](\d{2}):(\d{2}):(\d{2})(?:\.(\d{1,9}))?(?:Z|[+-]\d{2}(?::?\d{2})?)?$/i;

/**
 * Parse `yyyy-MM-dd HH:mm:ss` (optionally with fractional seconds or a zone designator).
 * Returns null when the value is not a valid calendar timestamp.
 */
export function parseNaiveTimestamp(value: string): number | null {
    const match = NAIVE_TIMESTAMP.exec(value.trim());
    if (!match) return null;

    const [year, month, day, hour, minute, second] = match.slice(1, 7).map(Number);
    const millis = match[7] ? Number(match[7].padEnd(3, '0').slice(0, 3)) : 0;

    if (hour > 23 || minute > 59 || second > 59) return null;

    // Date.UTC maps years 0-99 onto 1900-1999; setUTCFullYear does not.
    const check = new Date(0);
    check.setUTCFullYear(year, month - 1, day);
    check.setUTCHours(hour, minute, second, millis);
    const ms = check.getTime();
    if (
        check.getUTCFullYear() !== year ||
        check.getUTCMonth() !== month - 1 ||
        check.getUTCDate() !== day
    ) {
        return null;
    }
    return ms;
}

function pad(n: number, width: number = 2): string {
    return String(n).padStart(width, '0');
}

/** Render as `yyyy-MM-dd HH:mm:ss`; sub-second precision is dropped. */
export function formatNaiveTimestamp(ms: number): string {
    const d = new Date(ms);
    return `${pad(d.getUTCFullYear(), 4)}-${pad(d.getUTCMonth() + 1)}-${pad(d.getUTCDate())} ` +
        `${pad(d.getUTCHours())}:${pad(d.getUTCMinutes())}:${pad(d.getUTCSeconds())}`;
}

export function minutesToMs(minutes: number): number {
    return minutes * MS_PER_MINUTE;
}
