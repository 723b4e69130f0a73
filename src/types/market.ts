export type TimeFrame = 'DAILY' | 'WEEKLY' | 'INTRADAY_60M';
export type OutputSize = 'compact' | 'full';

export const TIME_FRAME_LABELS: Record<TimeFrame, string> = {
  DAILY: 'Daily',
  WEEKLY: 'Weekly',
  INTRADAY_60M: 'Intraday (60min)',
};

export interface PriceBar {
  timestamp: number; // epoch ms
  open: number;
  high: number;
  low: number;
  close: number;
  volume: number;
}

// Ordered by strictly increasing timestamp; non-empty when valid
export type PriceSeries = PriceBar[];

export interface PriceSeriesResult {
  series: PriceSeries;
  error: string | null;
}

export type SentimentScale = 'SIGNED' | 'UNIT'; // [-1, 1] | [0, 1]

export interface SentimentReading {
  score: number;
  summary: string;
  scale: SentimentScale;
  source: string;
  isFallback: boolean;
}
