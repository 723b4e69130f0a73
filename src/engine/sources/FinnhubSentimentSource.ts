import { z } from 'zod';
import { SentimentSource } from '../SentimentSource';
import { FinnhubApiClient } from '../../client/FinnhubApiClient';
import { SentimentReading } from '../../types/market';
import { logger } from '../../utils/logger';

export const newsSentimentSchema = z.object({
  symbol: z.string().optional(),
  companyNewsScore: z.number().min(0).max(1),
  buzz: z.object({
    articlesInLastWeek: z.number(),
    buzz: z.number(),
    weeklyAverage: z.number(),
  }).partial().optional(),
  sentiment: z.object({
    bearishPercent: z.number(),
    bullishPercent: z.number(),
  }).partial().optional(),
});

export type NewsSentiment = z.infer<typeof newsSentimentSchema>;

// Finnhub scores news on [0, 1]; 0.5 is neutral
export const NEUTRAL_UNIT_SCORE = 0.5;

export class FinnhubSentimentSource implements SentimentSource {
  public name = 'Finnhub News';

  constructor(private readonly client: FinnhubApiClient) {}

  public async getSentiment(symbol: string): Promise<SentimentReading> {
    try {
      const response = await this.client.get('/news-sentiment', { symbol: symbol.toUpperCase() }, newsSentimentSchema);

      return {
        score: response.companyNewsScore,
        summary: summarize(symbol, response),
        scale: 'UNIT',
        source: this.name,
        isFallback: false,
      };
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      logger.warn({ error: message, symbol }, 'News sentiment unavailable, using neutral score');

      return {
        score: NEUTRAL_UNIT_SCORE,
        summary: `News sentiment for ${symbol} is unavailable (${message}). A neutral score is used.`,
        scale: 'UNIT',
        source: this.name,
        isFallback: true,
      };
    }
  }
}

export const summarize = (symbol: string, news: NewsSentiment): string => {
  const parts = [`News score for ${symbol}: ${news.companyNewsScore.toFixed(2)} (0 bearish, 1 bullish).`];

  const bullish = news.sentiment?.bullishPercent;
  const bearish = news.sentiment?.bearishPercent;
  if (bullish !== undefined && bearish !== undefined) {
    parts.push(`Bullish ${(bullish * 100).toFixed(0)}% / bearish ${(bearish * 100).toFixed(0)}% of articles.`);
  }

  const articles = news.buzz?.articlesInLastWeek;
  if (articles !== undefined) {
    parts.push(`${articles} articles in the last week.`);
  }

  return parts.join(' ');
};
