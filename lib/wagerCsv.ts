/**
 * wagerCsv.ts
 * Delimited text -> header list + WagerRecord rows.
 */

import Papa from 'papaparse';
import { WagerRowSchema } from './schemas/wagerSchema';
import type { WagerRecord } from '../engine/src';

export interface ParsedWagerCsv {
    columns: string[];
    rows: WagerRecord[];
    /** Row-shape problems reported by the CSV parser (short/long rows, quoting) */
    parseErrors: number;
}

const cleanHeader = (h: string): string => h.replace(/^\uFEFF/, '').trim();

const EMPTY_RECORD: WagerRecord = {
    oddsPlaced: undefined,
    closingOdds: undefined,
    stake: undefined,
    betTime: undefined,
    eventTime: undefined,
};

export function parseWagerCsv(text: string): ParsedWagerCsv {
    const result = Papa.parse<Record<string, string>>(text, {
        header: true,
        skipEmptyLines: 'greedy',
        transformHeader: cleanHeader,
    });

    const rows: WagerRecord[] = [];
    for (const raw of result.data) {
        const parsed = WagerRowSchema.safeParse(raw);
        // unreadable rows reach the cleaner as empty records and get dropped there
        rows.push(parsed.success ? parsed.data : EMPTY_RECORD);
    }

    return {
        columns: result.meta.fields ?? [],
        rows,
        parseErrors: result.errors.length,
    };
}
