/**
 * Limit Risk Engine - Pipeline
 * Column validation + one linear pass: clean -> metrics -> score -> distributions
 *
 * Pure function. No side effects. Terminal conditions come back as result
 * statuses; nothing is thrown for row content.
 */

import { CONFIG } from './config';
import { cleanRecords } from './cleaner';
import { computeMetrics } from './metrics';
import { scoreRisk } from './scorer';
import { buildDistributions } from './distributions';
import type { AnalysisResult, WagerRecord } from './types';

/**
 * Required columns absent from the header, in required order
 */
export function findMissingColumns(columns: readonly string[]): string[] {
    const present = new Set(columns);
    return CONFIG.REQUIRED_COLUMNS.filter(c => !present.has(c));
}

export function analyzeWagers(columns: readonly string[], rows: readonly WagerRecord[]): AnalysisResult {
    // ============================================================================
    // 1. STRUCTURE
    // ============================================================================
    const missing = findMissingColumns(columns);
    if (missing.length > 0) {
        return { status: 'missing_columns', missing };
    }

    // ============================================================================
    // 2. CLEAN
    // ============================================================================
    const { records, dropped } = cleanRecords(rows);
    if (records.length === 0) {
        return { status: 'no_valid_rows', dropped };
    }

    // ============================================================================
    // 3. METRICS + PROFILE
    // ============================================================================
    const metrics = computeMetrics(records);
    const profile = scoreRisk(metrics);

    return {
        status: 'ok',
        records,
        dropped,
        metrics,
        profile,
        distributions: buildDistributions(records),
    };
}
