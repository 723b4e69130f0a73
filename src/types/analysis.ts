export type Regime = 'TRENDING_UP' | 'TRENDING_DOWN' | 'VOLATILE' | 'RANGE_BOUND' | 'NEUTRAL';

export const REGIMES: readonly Regime[] = [
  'TRENDING_UP',
  'TRENDING_DOWN',
  'VOLATILE',
  'RANGE_BOUND',
  'NEUTRAL',
];

export const REGIME_LABELS: Record<Regime, string> = {
  TRENDING_UP: 'Trending Up',
  TRENDING_DOWN: 'Trending Down',
  VOLATILE: 'Volatile',
  RANGE_BOUND: 'Range-Bound',
  NEUTRAL: 'Neutral',
};

export interface RegimeAnalysis {
  regime: Regime;
  barCount: number;
  shortMa: number | null;
  longMa: number | null;
  slope: number; // per bar, over the long MA
  volatility: number; // annualized
  description: string;
}
