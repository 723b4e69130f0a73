export interface RegimeConfig {
    minBars: number;              // Below this the regime is NEUTRAL
    shortMaPeriod: number;
    longMaPeriod: number;
    slopeLookback: number;        // Long-MA points spanned by the slope
    trendSlopeThreshold: number;  // |slope| above this is a trend
    volatilityThreshold: number;  // Annualized, above this is VOLATILE
    annualizationPeriods: number;
}

export interface SynthesisConfig {
    strongThreshold: number;      // |score| above this upgrades to STRONG
    weakThreshold: number;        // |score| above this confirms the trend
}

export interface TradePlanConfig {
    stopLossFraction: number;     // Stop distance as a fraction of entry
    rewardRatio: number;          // Target distance as a multiple of stop distance
}

export interface RiskLimits {
    maxRiskPerTrade: number;      // Fraction of portfolio at risk per trade
    maxDrawdown: number;          // Fraction below peak that trips the breaker
}

export const DEFAULT_REGIME_CONFIG: RegimeConfig = {
    minBars: 20,
    shortMaPeriod: 10,
    longMaPeriod: 30,
    slopeLookback: 10,
    trendSlopeThreshold: 0.5,
    volatilityThreshold: 0.3,
    annualizationPeriods: 252
};

export const DEFAULT_SYNTHESIS_CONFIG: SynthesisConfig = {
    strongThreshold: 0.5,
    weakThreshold: 0.15
};

export const DEFAULT_TRADE_PLAN: TradePlanConfig = {
    stopLossFraction: 0.05,
    rewardRatio: 2.0
};

export const DEFAULT_RISK_LIMITS: RiskLimits = {
    maxRiskPerTrade: 0.02,
    maxDrawdown: 0.10
};
