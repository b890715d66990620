/**
 * Limit Risk Engine - Odds Normalization
 * Mixed American/Decimal odds -> decimal odds
 */

import { CONFIG } from './config';
import { inRange, toFiniteNumber } from './math';
import { INVALID, type Invalid, type RawCell } from './types';

const toText = (raw: RawCell): string => (raw === null || raw === undefined ? '' : String(raw).trim());

/**
 * American odds (+N / -N) to decimal odds
 */
export function americanToDecimal(american: number): number {
    if (american < 0) return 1 + 100 / Math.abs(american);
    return 1 + american / 100;
}

/**
 * Normalize a single odds cell to decimal odds.
 *
 * A leading "-" is always explicit negative American and is checked before
 * the decimal window, so "-1.5" becomes 1 + 100/1.5 rather than invalid.
 * Unsigned values inside [1.01, 100] are taken as decimal; "+" or a
 * magnitude of 100 and up means positive American.
 */
export function normalizeOdds(raw: RawCell): number | Invalid {
    const s = toText(raw);

    // negative American, bypasses the decimal window
    if (s.startsWith('-')) {
        const v = toFiniteNumber(s);
        // "-0" has no American reading
        if (v === null || v === 0) return INVALID;
        return americanToDecimal(v);
    }

    const v = toFiniteNumber(s);
    if (v === null) return INVALID;

    if (inRange(v, CONFIG.DECIMAL_ODDS_MIN, CONFIG.DECIMAL_ODDS_MAX)) return v;

    if (s.startsWith('+')) return americanToDecimal(v);
    if (v < 0) return americanToDecimal(v);
    if (v >= CONFIG.AMERICAN_ODDS_MIN_MAGNITUDE) return americanToDecimal(v);

    return INVALID;
}
