import { RiskManager } from './RiskManager';
import { RiskParameters, Signal, SignalAction } from '../types/trading';
import { directionOf } from '../analysis/RecommendationSynthesizer';
import { DEFAULT_TRADE_PLAN, TradePlanConfig } from '../config/AnalysisConfig';

/**
 * Stop-loss for the signal's direction: below entry for longs, above for
 * shorts, 0 when flat.
 */
export const deriveStopLoss = (
  entryPrice: number,
  action: SignalAction,
  stopLossFraction: number = DEFAULT_TRADE_PLAN.stopLossFraction,
): number => {
  switch (directionOf(action)) {
    case 'LONG':
      return entryPrice * (1 - stopLossFraction);
    case 'SHORT':
      return entryPrice * (1 + stopLossFraction);
    default:
      return 0;
  }
};

export const formatRiskReward = (rewardRatio: number): string => `1:${rewardRatio}`;

/**
 * Attaches executable parameters to a signal. Non-actionable signals get a
 * zeroed plan (no stop, no target, no shares).
 */
export const planTrade = (
  riskManager: RiskManager,
  entryPrice: number,
  signal: Signal,
  config: Partial<TradePlanConfig> = {},
): RiskParameters => {
  const { stopLossFraction, rewardRatio } = { ...DEFAULT_TRADE_PLAN, ...config };

  const base = {
    entryPrice,
    riskRewardRatio: rewardRatio,
    riskRewardLabel: formatRiskReward(rewardRatio),
    portfolioValue: riskManager.portfolioValue,
  };

  if (!signal.actionable || signal.direction === 'FLAT') {
    return { ...base, stopLossPrice: 0, targetPrice: 0, positionSize: 0, riskAmount: 0 };
  }

  const stopLossPrice = deriveStopLoss(entryPrice, signal.action, stopLossFraction);
  const positionSize = riskManager.positionSize(entryPrice, stopLossPrice);
  const targetPrice = riskManager.targetPrice(entryPrice, stopLossPrice, rewardRatio);

  return {
    ...base,
    stopLossPrice,
    targetPrice,
    positionSize,
    riskAmount: positionSize * Math.abs(entryPrice - stopLossPrice),
  };
};
