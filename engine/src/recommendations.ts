/**
 * Limit Risk Engine - Recommendations
 * Sub-risks above threshold -> advisory strings
 */

import { CONFIG } from './config';
import { SUB_RISK_KEYS, type SubRiskKey, type SubRisks } from './types';

export const RECOMMENDATIONS: Readonly<Record<SubRiskKey, string>> = {
    clv: 'High positive CLV: mix in later bets or smaller edges to look less sharp.',
    posclv: 'Large share beating the close: add some neutral/coin-flip markets.',
    stake: 'Stake sizes too consistent: vary stakes ±10–25% around your base.',
    market: 'Market concentration high: add 2–3 different markets or sports weekly.',
    book: 'Book concentration high: spread action across additional legal books.',
    leadMean: 'You bet very early on average: add some closer-to-start bets.',
    leadStd: 'Bet timing is very consistent: randomize time-of-day you place bets.',
};

export const RECREATIONAL_MESSAGE =
    'Profile looks reasonably recreational. Keep rotating markets, stakes, and timing.';

export function recommend(subRisks: SubRisks): string[] {
    const recs = SUB_RISK_KEYS
        .filter(key => subRisks[key] > CONFIG.RECOMMENDATION_THRESHOLD)
        .map(key => RECOMMENDATIONS[key]);
    return recs.length ? recs : [RECREATIONAL_MESSAGE];
}
