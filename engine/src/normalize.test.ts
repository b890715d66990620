import { afterEach, describe, it, expect } from 'vitest';

import { normalizeOdds, americanToDecimal } from './odds';
import { parseTimestamp, hoursBetween } from './time';
import { toFiniteNumber } from './math';
import { INVALID, isInvalid } from './types';

// ============================================================================
// ODDS NORMALIZATION
// ============================================================================

describe('normalizeOdds', () => {
    it('converts explicit positive American odds', () => {
        expect(normalizeOdds('+110')).toBeCloseTo(2.10, 10);
        expect(normalizeOdds('+250')).toBeCloseTo(3.5, 10);
    });

    it('converts negative American odds', () => {
        expect(normalizeOdds('-120')).toBeCloseTo(1.833333333, 8);
        expect(normalizeOdds('-100')).toBe(2);
    });

    it('keeps decimal odds inside the window unchanged', () => {
        expect(normalizeOdds('2.05')).toBe(2.05);
        expect(normalizeOdds('1.01')).toBe(1.01);
        expect(normalizeOdds(' 1.91 ')).toBe(1.91);
        expect(normalizeOdds(3.4)).toBe(3.4);
    });

    it('decimal wins the ambiguity up to and including 100', () => {
        // "+100" and "100" are both read as decimal 100, not even money
        expect(normalizeOdds('100')).toBe(100);
        expect(normalizeOdds('+100')).toBe(100);
        expect(normalizeOdds('+55')).toBe(55);
    });

    it('reads unsigned values above 100 as implicit positive American', () => {
        expect(normalizeOdds('110')).toBeCloseTo(2.10, 10);
        expect(normalizeOdds('100.5')).toBeCloseTo(2.005, 10);
        expect(normalizeOdds(150)).toBeCloseTo(2.5, 10);
    });

    it('"-" prefix takes precedence over the decimal window', () => {
        // 1 + 100/1.5
        expect(normalizeOdds('-1.5')).toBeCloseTo(67.6666667, 6);
        expect(normalizeOdds(-200)).toBe(1.5);
    });

    it('returns INVALID for unparseable or unclassifiable values', () => {
        expect(normalizeOdds('abc')).toBe(INVALID);
        expect(normalizeOdds('-abc')).toBe(INVALID);
        expect(normalizeOdds('')).toBe(INVALID);
        expect(normalizeOdds(null)).toBe(INVALID);
        expect(normalizeOdds(undefined)).toBe(INVALID);
        expect(normalizeOdds('1.005')).toBe(INVALID);
        expect(normalizeOdds('0.5')).toBe(INVALID);
        expect(normalizeOdds('0')).toBe(INVALID);
        expect(normalizeOdds('-0')).toBe(INVALID);
        expect(normalizeOdds('2.05x')).toBe(INVALID);
        expect(normalizeOdds('Infinity')).toBe(INVALID);
    });

    it('is idempotent on decimal values', () => {
        for (const x of ['1.01', '1.5', '2.05', '55', '100']) {
            const once = normalizeOdds(x);
            expect(isInvalid(once)).toBe(false);
            expect(normalizeOdds(String(once))).toBe(once);
        }
    });

    it('americanToDecimal handles both signs', () => {
        expect(americanToDecimal(150)).toBe(2.5);
        expect(americanToDecimal(-150)).toBeCloseTo(1.6666667, 6);
    });
});

describe('toFiniteNumber', () => {
    it('accepts numbers and numeric text', () => {
        expect(toFiniteNumber(50)).toBe(50);
        expect(toFiniteNumber(' 55.5 ')).toBe(55.5);
        expect(toFiniteNumber('1e2')).toBe(100);
    });

    it('rejects blanks, garbage and non-finite values', () => {
        expect(toFiniteNumber('')).toBeNull();
        expect(toFiniteNumber('   ')).toBeNull();
        expect(toFiniteNumber('fifty')).toBeNull();
        expect(toFiniteNumber(Number.NaN)).toBeNull();
        expect(toFiniteNumber(undefined)).toBeNull();
    });

    it('rejects hex, binary and octal literals', () => {
        expect(toFiniteNumber('0x10')).toBeNull();
        expect(toFiniteNumber('0b11')).toBeNull();
        expect(toFiniteNumber('0o7')).toBeNull();
        expect(toFiniteNumber('1.')).toBe(1);
        expect(toFiniteNumber('.5')).toBe(0.5);
        expect(toFiniteNumber('-2E-1')).toBe(-0.2);
        expect(normalizeOdds('0x2')).toBe(INVALID);
        expect(normalizeOdds('-0x64')).toBe(INVALID);
    });
});

// ============================================================================
// TIMESTAMP PARSING
// ============================================================================

function expectUtc(d: Date | typeof INVALID, y: number, mo: number, day: number, h: number, mi: number) {
    expect(isInvalid(d)).toBe(false);
    if (isInvalid(d)) return;
    expect(d.toISOString()).toBe(new Date(Date.UTC(y, mo - 1, day, h, mi)).toISOString());
}

describe('parseTimestamp', () => {
    const originalTz = process.env.TZ;

    afterEach(() => {
        if (originalTz === undefined) delete process.env.TZ;
        else process.env.TZ = originalTz;
    });

    it('reads space-separated ISO-like timestamps as UTC wall-clock', () => {
        expectUtc(parseTimestamp('2025-10-10 13:00:00'), 2025, 10, 10, 13, 0);
        expectUtc(parseTimestamp('2025-10-10T19:30'), 2025, 10, 10, 19, 30);
    });

    it('honours an explicit zone', () => {
        expectUtc(parseTimestamp('2025-10-10T19:30:00Z'), 2025, 10, 10, 19, 30);
        expectUtc(parseTimestamp('2025-10-10T19:30:00-04:00'), 2025, 10, 10, 23, 30);
    });

    it('parses slash and month-name forms', () => {
        expectUtc(parseTimestamp('10/10/2025 19:30'), 2025, 10, 10, 19, 30);
        expectUtc(parseTimestamp('10/10/2025 7:30 PM'), 2025, 10, 10, 19, 30);
        expectUtc(parseTimestamp('2025/10/9 10:00'), 2025, 10, 9, 10, 0);
        expectUtc(parseTimestamp('Oct 10, 2025 7:30 PM'), 2025, 10, 10, 19, 30);
        expectUtc(parseTimestamp('10 October 2025 19:30'), 2025, 10, 10, 19, 30);
    });

    it('reads two-digit years into 1950-2049', () => {
        expectUtc(parseTimestamp('10/10/25 7:30 PM'), 2025, 10, 10, 19, 30);
        expectUtc(parseTimestamp('1/2/99'), 1999, 1, 2, 0, 0);
    });

    it('falls back to day-first when the first field cannot be a month', () => {
        expectUtc(parseTimestamp('13/10/2025 19:30'), 2025, 10, 13, 19, 30);
        expectUtc(parseTimestamp('25/12/24'), 2024, 12, 25, 0, 0);
        // month-first still wins when both readings are valid
        expectUtc(parseTimestamp('3/4/2025'), 2025, 3, 4, 0, 0);
    });

    it('rejects free text that only carries a number', () => {
        for (const text of ['TBD 1', 'Game 7', 'Week 3', 'n/a 2', 'Result 12', 'W 5']) {
            expect(parseTimestamp(text)).toBe(INVALID);
        }
    });

    it('lead hours do not depend on the host zone', () => {
        process.env.TZ = 'America/New_York';
        // spans the 2025-11-02 fall-back change in that zone
        for (const [bet, event] of [
            ['2025-11-01 12:00', '2025-11-02 12:00'],
            ['11/1/2025 12:00', '11/2/2025 12:00'],
        ]) {
            const a = parseTimestamp(bet);
            const b = parseTimestamp(event);
            expect(isInvalid(a) || isInvalid(b) ? null : hoursBetween(a, b)).toBe(24);
        }
        expectUtc(parseTimestamp('2025-11-01 12:00'), 2025, 11, 1, 12, 0);
    });

    it('returns INVALID instead of throwing', () => {
        expect(parseTimestamp('not a date')).toBe(INVALID);
        expect(parseTimestamp('')).toBe(INVALID);
        expect(parseTimestamp(null)).toBe(INVALID);
        expect(parseTimestamp(undefined)).toBe(INVALID);
    });

    it('hoursBetween is signed', () => {
        const a = new Date(2025, 9, 10, 13, 0);
        const b = new Date(2025, 9, 10, 19, 30);
        expect(hoursBetween(a, b)).toBe(6.5);
        expect(hoursBetween(b, a)).toBe(-6.5);
    });
});
