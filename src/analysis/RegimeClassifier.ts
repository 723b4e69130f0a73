import { PriceSeries } from '../types/market';
import { Regime, RegimeAnalysis, REGIME_LABELS } from '../types/analysis';
import { DEFAULT_REGIME_CONFIG, RegimeConfig } from '../config/AnalysisConfig';
import { annualizeVolatility, calculateReturns, calculateSMASeries, last } from './indicators';

export class RegimeClassifier {
    private readonly config: RegimeConfig;

    constructor(config: Partial<RegimeConfig> = {}) {
        this.config = { ...DEFAULT_REGIME_CONFIG, ...config };
    }

    public classify(series: PriceSeries): Regime {
        return this.analyze(series).regime;
    }

    /**
     * Classify the series and keep the statistics behind the decision.
     * Never throws: too little data (or no array at all) yields NEUTRAL.
     */
    public analyze(series: PriceSeries): RegimeAnalysis {
        const barCount = Array.isArray(series) ? series.length : 0;

        if (barCount < this.config.minBars) {
            return {
                regime: 'NEUTRAL',
                barCount,
                shortMa: null,
                longMa: null,
                slope: 0,
                volatility: 0,
                description: `Insufficient data (${barCount} of ${this.config.minBars} bars)`
            };
        }

        const closes = series.map(bar => (bar ? Number(bar.close) : NaN));

        const shortMa = calculateSMASeries(closes, this.config.shortMaPeriod);
        const longMa = calculateSMASeries(closes, this.config.longMaPeriod);
        const slope = this.calculateSlope(longMa);
        const volatility = annualizeVolatility(calculateReturns(closes), this.config.annualizationPeriods);

        const regime = this.decide(slope, volatility);

        return {
            regime,
            barCount,
            shortMa: last(shortMa),
            longMa: last(longMa),
            slope,
            volatility,
            description: `${REGIME_LABELS[regime]} (slope: ${slope.toFixed(3)}, volatility: ${(volatility * 100).toFixed(1)}%)`
        };
    }

    /**
     * Average per-bar change of the long MA over the last `slopeLookback` points
     */
    private calculateSlope(longMa: number[]): number {
        const lookback = this.config.slopeLookback;
        if (longMa.length <= lookback) return 0;

        const slope = (longMa[longMa.length - 1] - longMa[longMa.length - lookback]) / lookback;
        return Number.isFinite(slope) ? slope : 0;
    }

    private decide(slope: number, volatility: number): Regime {
        if (Math.abs(slope) > this.config.trendSlopeThreshold) {
            return slope > 0 ? 'TRENDING_UP' : 'TRENDING_DOWN';
        }
        if (volatility > this.config.volatilityThreshold) {
            return 'VOLATILE';
        }
        return 'RANGE_BOUND';
    }
}
