/**
 * Limit Risk Engine - Type Definitions
 * Canonical data contracts for the entire pipeline
 */

// ============================================================================
// INVALID MARKER
// ============================================================================

/** Returned by normalizers instead of throwing. Only the cleaner consumes it. */
export const INVALID: unique symbol = Symbol('INVALID');
export type Invalid = typeof INVALID;

export function isInvalid<T>(value: T | Invalid): value is Invalid {
    return value === INVALID;
}

// ============================================================================
// INPUT CONTRACT (what ingestion must produce)
// ============================================================================

export type RawCell = string | number | null | undefined;

export interface WagerRecord {
    readonly book?: string;
    readonly sport?: string;
    readonly marketType?: string;
    readonly oddsPlaced: RawCell;
    readonly closingOdds: RawCell;
    readonly stake: RawCell;
    readonly betTime: RawCell;
    readonly eventTime: RawCell;
    /** Carried through for display, never scored */
    readonly result?: string;
}

// ============================================================================
// CLEANED DATASET
// ============================================================================

export interface CleanedRecord extends WagerRecord {
    readonly oddsPlacedDecimal: number;
    readonly closingOddsDecimal: number;
    readonly stakeAmount: number;
    readonly betAt: Date;
    readonly eventAt: Date;
    /** eventAt - betAt in hours. Negative when the bet went in after the start. */
    readonly leadHours: number;
    readonly clvPercent: number;
}

export type Dataset = readonly CleanedRecord[];

export interface CleanResult {
    records: Dataset;
    dropped: number;
}

// ============================================================================
// METRICS + PROFILE
// ============================================================================

export interface AggregateMetrics {
    readonly avgCLV: number;
    readonly posCLVRate: number;
    readonly stakeCV: number;
    readonly marketHHI: number;
    readonly bookHHI: number;
    readonly leadMean: number;
    readonly leadStd: number;
    readonly sampleSize: number;
}

export const SUB_RISK_KEYS = ['clv', 'posclv', 'stake', 'market', 'book', 'leadMean', 'leadStd'] as const;

export type SubRiskKey = typeof SUB_RISK_KEYS[number];

export type SubRisks = Readonly<Record<SubRiskKey, number>>;

export type RiskBand = 'low' | 'elevated' | 'high';

export interface RiskProfile {
    readonly subRisks: SubRisks;
    /** 0-100, one decimal place */
    readonly score: number;
    readonly band: RiskBand;
    readonly recommendations: readonly string[];
}

// ============================================================================
// DISTRIBUTIONS (chart series for the presentation layer)
// ============================================================================

export interface HistogramBin {
    start: number;
    end: number;
    count: number;
}

export interface CategoryCount {
    value: string;
    count: number;
}

export interface Distributions {
    clv: HistogramBin[];
    stake: HistogramBin[];
    leadHours: HistogramBin[];
    topMarkets: CategoryCount[];
}

// ============================================================================
// PIPELINE OUTPUT
// ============================================================================

export interface AnalysisOk {
    status: 'ok';
    records: Dataset;
    dropped: number;
    metrics: AggregateMetrics;
    profile: RiskProfile;
    distributions: Distributions;
}

export interface AnalysisMissingColumns {
    status: 'missing_columns';
    missing: string[];
}

export interface AnalysisNoValidRows {
    status: 'no_valid_rows';
    dropped: number;
}

export type AnalysisResult = AnalysisOk | AnalysisMissingColumns | AnalysisNoValidRows;
