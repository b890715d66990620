/**
 * Limit Risk Engine - Record Cleaner
 * Normalizes odds and timestamps, derives lead time + CLV, drops unusable rows
 */

import { normalizeOdds } from './odds';
import { hoursBetween, parseTimestamp } from './time';
import { toFiniteNumber } from './math';
import { isInvalid, type CleanedRecord, type CleanResult, type WagerRecord } from './types';

/**
 * Closing line value in percent: (closing - placed) / placed * 100.
 * Positive means the bettor got a better price than the close.
 */
export function computeClvPercent(oddsPlacedDecimal: number, closingOddsDecimal: number): number {
    return ((closingOddsDecimal - oddsPlacedDecimal) / oddsPlacedDecimal) * 100;
}

/**
 * Clean one record. Returns null when any required field is unrecoverable.
 */
export function cleanRecord(record: WagerRecord): CleanedRecord | null {
    const oddsPlacedDecimal = normalizeOdds(record.oddsPlaced);
    if (isInvalid(oddsPlacedDecimal)) return null;

    const closingOddsDecimal = normalizeOdds(record.closingOdds);
    if (isInvalid(closingOddsDecimal)) return null;

    const stakeAmount = toFiniteNumber(record.stake);
    if (stakeAmount === null) return null;

    const betAt = parseTimestamp(record.betTime);
    const eventAt = parseTimestamp(record.eventTime);
    if (isInvalid(betAt) || isInvalid(eventAt)) return null;

    const leadHours = hoursBetween(betAt, eventAt);
    const clvPercent = computeClvPercent(oddsPlacedDecimal, closingOddsDecimal);
    if (!Number.isFinite(leadHours) || !Number.isFinite(clvPercent)) return null;

    return {
        ...record,
        oddsPlacedDecimal,
        closingOddsDecimal,
        stakeAmount,
        betAt,
        eventAt,
        leadHours,
        clvPercent,
    };
}

/**
 * Clean a full upload. Input order is kept; the input is not mutated.
 */
export function cleanRecords(records: readonly WagerRecord[]): CleanResult {
    const kept: CleanedRecord[] = [];
    for (const record of records) {
        const cleaned = cleanRecord(record);
        if (cleaned) kept.push(cleaned);
    }
    return { records: kept, dropped: records.length - kept.length };
}
