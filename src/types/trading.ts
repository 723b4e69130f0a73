import { Regime, RegimeAnalysis } from './analysis';
import { PriceSeries, SentimentReading, TimeFrame } from './market';

export type SignalAction = 'STRONG_BUY' | 'BUY' | 'HOLD' | 'SELL' | 'STRONG_SELL';
export type Direction = 'LONG' | 'SHORT' | 'FLAT';

export const SIGNAL_LABELS: Record<SignalAction, string> = {
  STRONG_BUY: 'STRONG BUY',
  BUY: 'BUY',
  HOLD: 'HOLD',
  SELL: 'SELL',
  STRONG_SELL: 'STRONG SELL',
};

export interface Signal {
  readonly action: SignalAction;
  readonly direction: Direction;
  readonly actionable: boolean;
  readonly rationale: string;
  readonly regime: Regime;
  readonly sentimentScore: number;
}

export interface RiskParameters {
  entryPrice: number;
  stopLossPrice: number;
  targetPrice: number;
  positionSize: number; // whole shares, 0 = do not trade
  riskRewardRatio: number;
  riskRewardLabel: string; // e.g. "1:2"
  riskAmount: number; // currency lost if the stop is hit
  portfolioValue: number;
}

export interface PortfolioRiskState {
  portfolioValue: number;
  peakPortfolioValue: number;
  maxRiskPerTrade: number;
  maxDrawdown: number;
}

export interface AnalysisReport {
  symbol: string;
  timeFrame: TimeFrame;
  latestPrice: number;
  priceSeries: PriceSeries;
  sentiment: SentimentReading;
  regime: Regime;
  regimeAnalysis: RegimeAnalysis;
  riskParameters: RiskParameters;
  signal: Signal;
  generatedAt: number;
}

export interface AnalysisFailure {
  error: string;
}

export type AnalysisResult = AnalysisReport | AnalysisFailure;

export const isAnalysisFailure = (result: AnalysisResult): result is AnalysisFailure =>
  'error' in result;
