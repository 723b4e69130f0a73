import { SentimentSource } from '../SentimentSource';
import { SentimentReading } from '../../types/market';
import { logger } from '../../utils/logger';
import { RandomFn } from './SimulatedPriceSource';

export const SIMULATED_SENTIMENT_SUMMARY =
  "Sentiment analysis is simulated. The agent's recommendation is primarily based on the stock's market personality (price action).";

/**
 * Neutral-biased random score in [-0.5, 0.5) on the signed scale
 */
export class SimulatedSentimentSource implements SentimentSource {
  public name = 'Simulated';

  constructor(private readonly random: RandomFn = Math.random) {}

  public async getSentiment(symbol: string): Promise<SentimentReading> {
    logger.info({ symbol }, 'Generating simulated sentiment');

    return {
      score: this.random() - 0.5,
      summary: SIMULATED_SENTIMENT_SUMMARY,
      scale: 'SIGNED',
      source: this.name,
      isFallback: false,
    };
  }
}
