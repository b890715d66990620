/**
 * analyze.ts
 * CSV text -> AnalysisResult, with logging around the pure engine pass.
 */

import { analyzeWagers, type AnalysisResult } from '../engine/src';
import { parseWagerCsv } from './wagerCsv';
import { logger } from './logger';

const CONTEXT = 'LimitRisk';

export function analyzeCsv(text: string): AnalysisResult {
    const { columns, rows, parseErrors } = parseWagerCsv(text);
    if (parseErrors > 0) {
        logger.debug(CONTEXT, `CSV parser reported ${parseErrors} row issue(s)`);
    }

    const result = analyzeWagers(columns, rows);

    switch (result.status) {
        case 'missing_columns':
            logger.warn(CONTEXT, 'Missing required columns', { missing: result.missing });
            break;
        case 'no_valid_rows':
            logger.warn(CONTEXT, `No valid rows after cleaning (${result.dropped} dropped)`);
            break;
        case 'ok':
            logger.debug(CONTEXT, `Scored ${result.records.length} rows (${result.dropped} dropped)`, {
                score: result.profile.score,
                band: result.profile.band,
            });
            break;
    }

    return result;
}
