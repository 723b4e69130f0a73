import { PortfolioRiskState } from '../types/trading';
import { DEFAULT_RISK_LIMITS, RiskLimits } from '../config/AnalysisConfig';
import { formatCurrency, formatPercent } from '../utils/format';
import { logger } from '../utils/logger';

const log = logger.child({ module: 'RiskManager' });

/**
 * Sizes positions against a per-trade risk budget and watches drawdown from
 * the running portfolio peak.
 *
 * One instance per session. All methods are synchronous, so callers that
 * share an instance are serialized by the event loop; the state only moves
 * through checkDrawdown().
 */
export class RiskManager {
  private state: PortfolioRiskState;

  constructor(portfolioValue: number, limits: Partial<RiskLimits> = {}) {
      const { maxRiskPerTrade, maxDrawdown } = { ...DEFAULT_RISK_LIMITS, ...limits };

      this.state = {
          portfolioValue,
          peakPortfolioValue: portfolioValue,
          maxRiskPerTrade,
          maxDrawdown
      };

      log.info({ portfolioValue: formatCurrency(portfolioValue), maxRiskPerTrade, maxDrawdown }, 'Risk Manager initialized');
  }

  public getState(): PortfolioRiskState {
      return { ...this.state };
  }

  public get portfolioValue(): number {
      return this.state.portfolioValue;
  }

  /**
   * Currency amount that may be lost on a single trade
   */
  public riskAmount(): number {
      return this.state.portfolioValue * this.state.maxRiskPerTrade;
  }

  /**
   * Whole shares such that a stop-out loses no more than the risk budget.
   * Direction-agnostic; returns 0 for unusable prices.
   */
  public positionSize(entryPrice: number, stopLossPrice: number): number {
    if (!this.isValidPricePair(entryPrice, stopLossPrice)) {
        log.warn({ entryPrice, stopLossPrice }, 'Invalid entry or stop-loss price. Cannot calculate position size.');
        return 0;
    }

    const riskPerShare = Math.abs(entryPrice - stopLossPrice);
    const size = Math.floor(this.riskAmount() / riskPerShare);

    if (!Number.isFinite(size) || size < 0) return 0;

    log.debug({ size, riskPerShare }, 'Calculated position size');
    return size;
  }

  /**
   * Price at `rewardRatio` times the stop distance, on the far side of entry
   * from the stop: above entry for longs, below for shorts.
   */
  public targetPrice(entryPrice: number, stopLossPrice: number, rewardRatio: number = 2.0): number {
    if (entryPrice === stopLossPrice || !Number.isFinite(entryPrice) || !Number.isFinite(stopLossPrice)) {
        log.warn({ entryPrice, stopLossPrice }, 'Entry equals stop-loss. Cannot calculate target price.');
        return 0;
    }

    const rewardPerShare = Math.abs(entryPrice - stopLossPrice) * rewardRatio;

    return entryPrice > stopLossPrice
        ? entryPrice + rewardPerShare
        : entryPrice - rewardPerShare;
  }

  /**
   * Drawdown of the current value against the stored peak, without updating it
   */
  public currentDrawdown(): number {
      return this.drawdownOf(this.state.portfolioValue);
  }

  /**
   * Records one evaluation tick. Raises the peak if needed, then reports
   * whether the fall from peak exceeds the drawdown limit.
   * Must be called exactly once per tick; the peak never decreases.
   */
  public checkDrawdown(currentPortfolioValue: number): boolean {
    this.state.portfolioValue = currentPortfolioValue;
    if (currentPortfolioValue > this.state.peakPortfolioValue) {
        this.state.peakPortfolioValue = currentPortfolioValue;
    }

    const drawdown = this.drawdownOf(currentPortfolioValue);

    if (drawdown > this.state.maxDrawdown) {
        log.error({
            severity: 'critical',
            drawdown: formatPercent(drawdown),
            maxDrawdown: formatPercent(this.state.maxDrawdown),
            peakValue: formatCurrency(this.state.peakPortfolioValue),
            currentValue: formatCurrency(currentPortfolioValue)
        }, 'MAX DRAWDOWN EXCEEDED');
        return true;
    }

    return false;
  }

  private drawdownOf(value: number): number {
      const peak = this.state.peakPortfolioValue;
      if (!(peak > 0)) return 0;
      return (peak - value) / peak;
  }

  private isValidPricePair(entryPrice: number, stopLossPrice: number): boolean {
      return Number.isFinite(entryPrice)
          && Number.isFinite(stopLossPrice)
          && entryPrice > 0
          && stopLossPrice > 0
          && entryPrice !== stopLossPrice;
  }
}
