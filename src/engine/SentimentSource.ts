import { SentimentReading } from '../types/market';

/**
 * Supplies a sentiment reading for one symbol. The score is never undefined;
 * on failure a source returns its own neutral default with isFallback set.
 */
export interface SentimentSource {
  name: string;
  getSentiment(symbol: string): Promise<SentimentReading>;
}

export const NEUTRAL_SIGNED_READING = (source: string, summary: string): SentimentReading => ({
  score: 0,
  summary,
  scale: 'SIGNED',
  source,
  isFallback: true,
});

/**
 * Maps any reading onto [-1, 1]. UNIT scores map linearly (0.5 -> 0);
 * non-finite scores count as neutral.
 */
export const toSignedScore = (reading: SentimentReading): number => {
  if (!Number.isFinite(reading.score)) return 0;

  const signed = reading.scale === 'UNIT' ? reading.score * 2 - 1 : reading.score;
  return Math.max(-1, Math.min(1, signed));
};
