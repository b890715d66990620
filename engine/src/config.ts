/**
 * Limit Risk Engine - Configuration
 * All tunable heuristics in one place
 */

export const CONFIG = {
    // ============================================================================
    // ODDS NORMALIZATION
    // ============================================================================

    /** Values inside this window are read as decimal odds, never American */
    DECIMAL_ODDS_MIN: 1.01,
    DECIMAL_ODDS_MAX: 100.0,

    /** Unsigned values at or above this are implicit positive American odds */
    AMERICAN_ODDS_MIN_MAGNITUDE: 100,

    // ============================================================================
    // METRICS
    // ============================================================================

    /** Keeps the stake CV defined when every stake is equal */
    STAKE_CV_EPSILON: 1e-9,

    // ============================================================================
    // SUB-RISK BANDS: risk = clamp01((value - floor) / span), after an optional cap
    // ============================================================================

    SUB_RISK_BANDS: {
        /** 1% average CLV is fine, 5%+ looks sharp */
        clv: { floor: 1.0, span: 4.0 },
        /** Beating the close more than 55% of the time becomes suspicious */
        posclv: { floor: 0.55, span: 0.25 },
        /** Low stake variance reads as automated. Inverted: (ceiling - min(cv, cap)) / span */
        stake: { ceiling: 12.0, cap: 30.0, span: 12.0 },
        market: { floor: 0.20, span: 0.60 },
        book: { floor: 0.25, span: 0.60 },
        /** Betting far ahead of events reads as model-driven */
        leadMean: { floor: 12.0, span: 48.0 },
        /** Consistent timing reads as automated. Inverted like stake */
        leadStd: { ceiling: 6.0, cap: 24.0, span: 6.0 },
    },

    // ============================================================================
    // COMPOSITE WEIGHTS (sum = 1.00)
    // ============================================================================

    WEIGHTS: {
        clv: 0.28,
        posclv: 0.12,
        stake: 0.16,
        market: 0.14,
        book: 0.10,
        leadMean: 0.10,
        leadStd: 0.10,
    },

    SCORE_DECIMALS: 1,

    // ============================================================================
    // RECOMMENDATIONS + BANDS
    // ============================================================================

    /** A sub-risk strictly above this emits its advisory */
    RECOMMENDATION_THRESHOLD: 0.6,

    /** Score cut-offs for the dashboard badge */
    BAND_HIGH_MIN: 66,
    BAND_ELEVATED_MIN: 40,

    // ============================================================================
    // INPUT + CHARTS
    // ============================================================================

    REQUIRED_COLUMNS: [
        'Book',
        'Sport',
        'MarketType',
        'OddsPlaced',
        'ClosingOdds',
        'Stake',
        'BetTime',
        'EventTime',
    ],
    OPTIONAL_COLUMNS: ['Result'],

    HISTOGRAM_BINS: 20,
    TOP_MARKETS: 10,
} as const;

export type ConfigType = typeof CONFIG;
