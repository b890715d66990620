/**
 * Limit Risk Engine - Metrics
 * Aggregate statistics over a cleaned dataset
 */

import { CONFIG } from './config';
import { mean, sampleStdDev } from './math';
import type { AggregateMetrics, Dataset } from './types';

/** Missing and empty categories share this group key. Other values group verbatim */
export const MISSING_CATEGORY = '';

const categoryKey = (value: string | undefined): string => value ?? MISSING_CATEGORY;

/**
 * Herfindahl index: sum of squared count shares per category.
 * 1.0 for a single category, 1/N for N equal categories, 0 for no values.
 */
export function herfindahl(values: readonly (string | undefined)[]): number {
    if (values.length === 0) return 0;
    const counts = new Map<string, number>();
    for (const value of values) {
        const key = categoryKey(value);
        counts.set(key, (counts.get(key) ?? 0) + 1);
    }
    let hhi = 0;
    for (const count of counts.values()) {
        const share = count / values.length;
        hhi += share * share;
    }
    return hhi;
}

/**
 * Coefficient of variation of stakes, in percent
 */
export function computeStakeCV(stakes: readonly number[]): number {
    return (sampleStdDev(stakes) / (mean(stakes) + CONFIG.STAKE_CV_EPSILON)) * 100;
}

/**
 * Fraction of records that beat the closing line
 */
export function computePosClvRate(dataset: Dataset): number {
    if (dataset.length === 0) return 0;
    return dataset.filter(r => r.clvPercent > 0).length / dataset.length;
}

/**
 * Compute all aggregate metrics in one pass over the dataset
 */
export function computeMetrics(dataset: Dataset): AggregateMetrics {
    const clv = dataset.map(r => r.clvPercent);
    const stakes = dataset.map(r => r.stakeAmount);
    const lead = dataset.map(r => r.leadHours);

    return {
        avgCLV: mean(clv),
        posCLVRate: computePosClvRate(dataset),
        stakeCV: computeStakeCV(stakes),
        marketHHI: herfindahl(dataset.map(r => r.marketType)),
        bookHHI: herfindahl(dataset.map(r => r.book)),
        leadMean: mean(lead),
        leadStd: sampleStdDev(lead),
        sampleSize: dataset.length,
    };
}
