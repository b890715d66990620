/**
 * Limit Risk Engine - Risk Scorer
 * Metric -> sub-risk bands, weighted composite score
 */

import { CONFIG } from './config';
import { clamp01, roundTo } from './math';
import { recommend } from './recommendations';
import { SUB_RISK_KEYS, type AggregateMetrics, type RiskBand, type RiskProfile, type SubRisks } from './types';

interface RisingBand {
    floor: number;
    span: number;
}

interface FallingBand {
    ceiling: number;
    cap: number;
    span: number;
}

/** Higher value -> higher risk */
function risingRisk(value: number, band: RisingBand): number {
    return clamp01((value - band.floor) / band.span);
}

/** Lower value -> higher risk; value is capped before scaling */
function fallingRisk(value: number, band: FallingBand): number {
    return clamp01((band.ceiling - Math.min(value, band.cap)) / band.span);
}

/**
 * Map each aggregate metric to a 0-1 sub-risk
 */
export function computeSubRisks(metrics: AggregateMetrics): SubRisks {
    const bands = CONFIG.SUB_RISK_BANDS;
    return {
        clv: risingRisk(metrics.avgCLV, bands.clv),
        posclv: risingRisk(metrics.posCLVRate, bands.posclv),
        stake: fallingRisk(metrics.stakeCV, bands.stake),
        market: risingRisk(metrics.marketHHI, bands.market),
        book: risingRisk(metrics.bookHHI, bands.book),
        leadMean: risingRisk(metrics.leadMean, bands.leadMean),
        leadStd: fallingRisk(metrics.leadStd, bands.leadStd),
    };
}

/**
 * Weighted composite, 0-100 rounded to one decimal
 */
export function compositeScore(subRisks: SubRisks): number {
    let weighted = 0;
    for (const key of SUB_RISK_KEYS) {
        weighted += CONFIG.WEIGHTS[key] * clamp01(subRisks[key]);
    }
    return roundTo(100 * weighted, CONFIG.SCORE_DECIMALS);
}

/**
 * Dashboard badge for a composite score
 */
export function riskBand(score: number): RiskBand {
    if (score >= CONFIG.BAND_HIGH_MIN) return 'high';
    if (score >= CONFIG.BAND_ELEVATED_MIN) return 'elevated';
    return 'low';
}

/**
 * Full risk profile for a set of metrics. Total over finite inputs.
 */
export function scoreRisk(metrics: AggregateMetrics): RiskProfile {
    const subRisks = computeSubRisks(metrics);
    const score = compositeScore(subRisks);
    return {
        subRisks,
        score,
        band: riskBand(score),
        recommendations: recommend(subRisks),
    };
}
