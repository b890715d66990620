/**
 * wagerSchema.ts
 * Zod schemas for wager-history uploads.
 *
 * ├─ WagerRowSchema        — one CSV row keyed by header name -> WagerRecord
 * └─ AnalyzeRequestSchema  — HTTP payload for api/limit-risk
 *
 * Cells stay raw strings here. Odds, stake and timestamps are normalized
 * by the engine's cleaner, which drops what it cannot read.
 */

import { z } from 'zod';
import type { WagerRecord } from '../../engine/src';

const cell = z.string().optional();

export const WagerRowSchema = z
    .object({
        Book: cell,
        Sport: cell,
        MarketType: cell,
        OddsPlaced: cell,
        ClosingOdds: cell,
        Stake: cell,
        BetTime: cell,
        EventTime: cell,
        /** Win/loss marker, displayed only */
        Result: cell,
    })
    .transform((row): WagerRecord => ({
        book: row.Book,
        sport: row.Sport,
        marketType: row.MarketType,
        oddsPlaced: row.OddsPlaced,
        closingOdds: row.ClosingOdds,
        stake: row.Stake,
        betTime: row.BetTime,
        eventTime: row.EventTime,
        result: row.Result,
    }));

export const AnalyzeRequestSchema = z.object({
    /** Full CSV text including the header row */
    csv: z.string().min(1, 'csv must not be empty'),
});
