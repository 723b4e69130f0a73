import { Regime, REGIME_LABELS } from '../types/analysis';
import { Direction, Signal, SignalAction } from '../types/trading';
import { DEFAULT_SYNTHESIS_CONFIG, SynthesisConfig } from '../config/AnalysisConfig';

/**
 * Combines the price-action regime with a signed sentiment score ([-1, 1])
 * into a single recommendation. Stateless: the same inputs always give the
 * same signal and the same rationale text.
 */
export class RecommendationSynthesizer {
    private readonly config: SynthesisConfig;

    constructor(config: Partial<SynthesisConfig> = {}) {
        this.config = { ...DEFAULT_SYNTHESIS_CONFIG, ...config };
    }

    public synthesize(sentimentScore: number, regime: Regime): Signal {
        const { strongThreshold, weakThreshold } = this.config;
        const label = REGIME_LABELS[regime];
        const score = sentimentScore.toFixed(2);

        if (regime === 'TRENDING_UP' && sentimentScore > strongThreshold) {
            return this.createSignal('STRONG_BUY', regime, sentimentScore,
                `The stock is in a strong '${label}' pattern with very positive market sentiment (score: ${score}). This indicates a high-confidence buying opportunity.`);
        }

        if (regime === 'TRENDING_UP' && sentimentScore > weakThreshold) {
            return this.createSignal('BUY', regime, sentimentScore,
                `The stock is in a '${label}' pattern and the market sentiment is positive (score: ${score}). This alignment suggests a potential buying opportunity.`);
        }

        if (regime === 'TRENDING_DOWN' && sentimentScore < -strongThreshold) {
            return this.createSignal('STRONG_SELL', regime, sentimentScore,
                `The stock is in a strong '${label}' pattern with very negative market sentiment (score: ${score}). This indicates a high-confidence selling or shorting opportunity.`);
        }

        if (regime === 'TRENDING_DOWN' && sentimentScore < -weakThreshold) {
            return this.createSignal('SELL', regime, sentimentScore,
                `The stock is in a '${label}' pattern and the market sentiment is negative (score: ${score}). This alignment suggests a potential selling or shorting opportunity.`);
        }

        if (regime === 'VOLATILE' || regime === 'RANGE_BOUND') {
            return this.createSignal('HOLD', regime, sentimentScore,
                `The market personality is '${label}' (sentiment score: ${score}), which suggests a lack of a clear directional trend. It is advisable to wait for a clearer market structure before entering a trade.`);
        }

        // Trend against sentiment, weak sentiment, or NEUTRAL
        return this.createSignal('HOLD', regime, sentimentScore,
            `The market signals are conflicting. The personality is '${label}' but sentiment is neutral or contrary (score: ${score}). It's best to stay on the sidelines.`);
    }

    private createSignal(action: SignalAction, regime: Regime, sentimentScore: number, rationale: string): Signal {
        return Object.freeze({
            action,
            direction: directionOf(action),
            actionable: action !== 'HOLD',
            rationale,
            regime,
            sentimentScore
        });
    }
}

export const directionOf = (action: SignalAction): Direction => {
    switch (action) {
        case 'STRONG_BUY':
        case 'BUY':
            return 'LONG';
        case 'STRONG_SELL':
        case 'SELL':
            return 'SHORT';
        case 'HOLD':
        default:
            return 'FLAT';
    }
};
