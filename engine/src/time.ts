/**
 * Limit Risk Engine - Timestamp Parsing
 * Heterogeneous date/time text -> Date, or INVALID
 *
 * Naive values are read as UTC wall-clock so lead times do not depend on
 * the host zone. Values carrying an explicit offset keep their instant.
 */

import { isValid, parse, parseISO } from 'date-fns';
import { INVALID, type Invalid, type RawCell } from './types';

const TIME_SUFFIXES = [' H:mm:ss', ' H:mm', ' h:mm:ss a', ' h:mm a', ''] as const;

// Month-first wins; day-first only matches once the first field exceeds 12.
// Four-digit years are tried before two-digit ones.
const NUMERIC_DATES = ['M/d/yyyy', 'M/d/yy', 'd/M/yyyy', 'd/M/yy'] as const;

const FALLBACK_FORMATS: readonly string[] = [
    ...NUMERIC_DATES.flatMap(date => TIME_SUFFIXES.map(time => date + time)),
    'yyyy/M/d H:mm:ss',
    'yyyy/M/d H:mm',
    'yyyy/M/d',
    'MMM d, yyyy h:mm a',
    'MMM d, yyyy H:mm',
    'MMM d, yyyy',
    'MMMM d, yyyy h:mm a',
    'MMMM d, yyyy H:mm',
    'MMMM d, yyyy',
    'd MMM yyyy H:mm',
    'd MMMM yyyy H:mm',
    'd MMM yyyy',
    'd MMMM yyyy',
];

// Fixed reference: two-digit years land in 1950-2049 regardless of today's date.
// Mid-year so its local year is 2000 in every zone.
const REFERENCE_DATE = new Date(Date.UTC(2000, 6, 1));

/** A `yyyy` token happily reads "25" as year 25 */
const MIN_YEAR = 1000;

const EXPLICIT_OFFSET = /\d{1,2}:\d{2}(?::\d{2}(?:\.\d+)?)?\s*(?:Z|[+-]\d{2}(?::?\d{2})?)$/i;

/** Re-read a parsed local Date's fields as UTC wall-clock */
function wallClockAsUtc(d: Date): Date {
    return new Date(Date.UTC(
        d.getFullYear(),
        d.getMonth(),
        d.getDate(),
        d.getHours(),
        d.getMinutes(),
        d.getSeconds(),
        d.getMilliseconds()
    ));
}

const plausible = (d: Date): boolean => isValid(d) && d.getFullYear() >= MIN_YEAR;

/**
 * Parse a timestamp cell. Never throws.
 */
export function parseTimestamp(raw: RawCell): Date | Invalid {
    if (raw === null || raw === undefined) return INVALID;
    const s = String(raw).trim();
    if (!s.length) return INVALID;

    const iso = parseISO(s);
    if (plausible(iso)) {
        return EXPLICIT_OFFSET.test(s) ? iso : wallClockAsUtc(iso);
    }

    for (const fmt of FALLBACK_FORMATS) {
        const d = parse(s, fmt, REFERENCE_DATE);
        if (plausible(d)) return wallClockAsUtc(d);
    }

    return INVALID;
}

/**
 * Hours between two timestamps (b - a). May be negative.
 */
export function hoursBetween(a: Date, b: Date): number {
    return (b.getTime() - a.getTime()) / 3_600_000;
}
