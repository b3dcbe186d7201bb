import type { Tier } from '../../types';
import { TIER_RULES } from '../../config/screenerConfig';

export interface TierInputs {
    interestCoverage: number;
    roic: number;            // decimal
    fortressMargin: boolean; // multi-year margin above the fortress threshold
    positiveMargin: boolean;
    zScore: number;
}

export interface TierThresholds {
    MIN_INTEREST_COVERAGE: number;
    MIN_ROIC: number;
}

/**
 * Quality tier from margins and balance-sheet safety.
 *
 * 1. Hard stops: can't cover interest, or poor return on capital -> Risky
 * 2. Fortress = fortress margin AND safe Z-Score (>= 2.99)
 * 3. Strong   = positive margin AND out of the distress zone (>= 1.81)
 * 4. Everything else -> Risky
 */
export const classifyTier = (inputs: TierInputs, thresholds: TierThresholds): Tier => {
    if (inputs.interestCoverage < thresholds.MIN_INTEREST_COVERAGE) return 'Risky';
    if (inputs.roic < thresholds.MIN_ROIC) return 'Risky';

    if (inputs.fortressMargin && inputs.zScore >= TIER_RULES.ALTMAN_Z_SAFE) return 'Fortress';
    if (inputs.positiveMargin && inputs.zScore >= TIER_RULES.ALTMAN_Z_DISTRESS) return 'Strong';

    return 'Risky';
};
