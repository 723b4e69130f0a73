import { PriceSource } from '../engine/PriceSource';
import { NEUTRAL_SIGNED_READING, SentimentSource, toSignedScore } from '../engine/SentimentSource';
import { RegimeClassifier } from '../analysis/RegimeClassifier';
import { RecommendationSynthesizer } from '../analysis/RecommendationSynthesizer';
import { RiskManager } from '../execution/RiskManager';
import { planTrade } from '../execution/TradePlanner';
import { TradePlanConfig } from '../config/AnalysisConfig';
import { OutputSize, PriceSeriesResult, SentimentReading, TimeFrame, TIME_FRAME_LABELS } from '../types/market';
import { AnalysisResult, SIGNAL_LABELS } from '../types/trading';
import { REGIME_LABELS } from '../types/analysis';
import { logger } from '../utils/logger';

export interface AdvisoryAgentDeps {
  priceSource: PriceSource;
  sentimentSource: SentimentSource;
  riskManager: RiskManager;
  classifier?: RegimeClassifier;
  synthesizer?: RecommendationSynthesizer;
  tradePlan?: Partial<TradePlanConfig>;
  now?: () => number;
}

/**
 * Runs one advisory pass for a symbol:
 * prices -> (regime || sentiment) -> signal -> risk parameters.
 *
 * Only a missing price series aborts the pass. Every other failure falls
 * back to a neutral value so a recommendation is always produced.
 */
export class AdvisoryAgent {
  private readonly priceSource: PriceSource;
  private readonly sentimentSource: SentimentSource;
  private readonly riskManager: RiskManager;
  private readonly classifier: RegimeClassifier;
  private readonly synthesizer: RecommendationSynthesizer;
  private readonly tradePlan: Partial<TradePlanConfig>;
  private readonly now: () => number;

  constructor(deps: AdvisoryAgentDeps) {
    this.priceSource = deps.priceSource;
    this.sentimentSource = deps.sentimentSource;
    this.riskManager = deps.riskManager;
    this.classifier = deps.classifier ?? new RegimeClassifier();
    this.synthesizer = deps.synthesizer ?? new RecommendationSynthesizer();
    this.tradePlan = deps.tradePlan ?? {};
    this.now = deps.now ?? Date.now;
  }

  public async analyze(
    rawSymbol: string,
    timeFrame: TimeFrame = 'DAILY',
    outputSize: OutputSize = 'compact',
  ): Promise<AnalysisResult> {
    const symbol = rawSymbol.trim().toUpperCase();
    const timeFrameLabel = TIME_FRAME_LABELS[timeFrame];

    if (symbol === '') {
      return { error: 'A stock symbol is required.' };
    }

    logger.info({ symbol, timeFrame: timeFrameLabel }, 'Starting analysis');

    // 1. Prices
    const { series, error } = await this.fetchPrices(symbol, timeFrame, outputSize);
    if (series.length === 0 || error !== null) {
      logger.error({ symbol, timeFrame: timeFrameLabel, error }, 'Failed to collect price data. Aborting analysis.');
      const detail = error ?? 'The symbol may be invalid or the API may be unavailable.';
      return {
        error: `Could not retrieve ${timeFrameLabel} price data for ${symbol}. ${detail}`,
      };
    }

    const latestPrice = series[series.length - 1].close;

    // 2. Regime and sentiment are independent; classify while sentiment is in flight
    const sentimentPromise = this.fetchSentiment(symbol);
    const regimeAnalysis = this.classifier.analyze(series);
    const sentiment = await sentimentPromise;

    logger.info({ symbol, regime: REGIME_LABELS[regimeAnalysis.regime], detail: regimeAnalysis.description }, 'Regime detected');

    // 3. Signal
    const signal = this.synthesizer.synthesize(toSignedScore(sentiment), regimeAnalysis.regime);

    // 4. Risk parameters
    const riskParameters = planTrade(this.riskManager, latestPrice, signal, this.tradePlan);

    logger.info({
      symbol,
      signal: SIGNAL_LABELS[signal.action],
      actionable: signal.actionable,
      positionSize: riskParameters.positionSize,
    }, 'Analysis complete');

    return {
      symbol,
      timeFrame,
      latestPrice,
      priceSeries: series,
      sentiment,
      regime: regimeAnalysis.regime,
      regimeAnalysis,
      riskParameters,
      signal,
      generatedAt: this.now(),
    };
  }

  /**
   * One evaluation tick of the portfolio value. Returns true when the
   * drawdown limit is breached; halting is left to the caller.
   */
  public recordPortfolioValue(currentValue: number): boolean {
    return this.riskManager.checkDrawdown(currentValue);
  }

  private async fetchPrices(symbol: string, timeFrame: TimeFrame, outputSize: OutputSize): Promise<PriceSeriesResult> {
    try {
      return await this.priceSource.getPriceSeries(symbol, timeFrame, outputSize);
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      return { series: [], error: message };
    }
  }

  private async fetchSentiment(symbol: string): Promise<SentimentReading> {
    try {
      return await this.sentimentSource.getSentiment(symbol);
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      logger.warn({ symbol, source: this.sentimentSource.name, error: message }, 'Sentiment unavailable, using neutral reading');
      return NEUTRAL_SIGNED_READING(
        this.sentimentSource.name,
        `Sentiment for ${symbol} is unavailable (${message}). A neutral score is used.`,
      );
    }
  }
}
