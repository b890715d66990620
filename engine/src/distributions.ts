/**
 * Limit Risk Engine - Distributions
 * Chart series (histograms, top markets) for the presentation layer
 */

import { CONFIG } from './config';
import type { CategoryCount, Dataset, Distributions, HistogramBin } from './types';

/**
 * Equal-width histogram over [min, max]. The last bin is closed.
 * A constant series collapses to a single bin.
 */
export function histogram(values: readonly number[], bins: number = CONFIG.HISTOGRAM_BINS): HistogramBin[] {
    const finite = values.filter(v => Number.isFinite(v));
    if (finite.length === 0 || bins < 1) return [];

    const min = finite.reduce((a, b) => Math.min(a, b), Infinity);
    const max = finite.reduce((a, b) => Math.max(a, b), -Infinity);
    if (min === max) return [{ start: min, end: max, count: finite.length }];

    const width = (max - min) / bins;
    const out: HistogramBin[] = Array.from({ length: bins }, (_, i) => ({
        start: min + i * width,
        end: i === bins - 1 ? max : min + (i + 1) * width,
        count: 0,
    }));

    for (const v of finite) {
        const idx = Math.min(bins - 1, Math.floor((v - min) / width));
        out[idx].count++;
    }
    return out;
}

/**
 * Most frequent categories, ties kept in first-seen order. Missing and empty values are skipped.
 */
export function topCategories(values: readonly (string | undefined)[], limit: number): CategoryCount[] {
    const counts = new Map<string, number>();
    for (const value of values) {
        if (!value) continue;
        counts.set(value, (counts.get(value) ?? 0) + 1);
    }
    // Array.prototype.sort is stable, so insertion order breaks ties
    return [...counts.entries()]
        .map(([value, count]) => ({ value, count }))
        .sort((a, b) => b.count - a.count)
        .slice(0, limit);
}

export function buildDistributions(dataset: Dataset): Distributions {
    return {
        clv: histogram(dataset.map(r => r.clvPercent)),
        stake: histogram(dataset.map(r => r.stakeAmount)),
        leadHours: histogram(dataset.map(r => r.leadHours)),
        topMarkets: topCategories(dataset.map(r => r.marketType), CONFIG.TOP_MARKETS),
    };
}
