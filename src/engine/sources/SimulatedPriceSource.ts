import { PriceSource } from '../PriceSource';
import { OutputSize, PriceBar, PriceSeriesResult, TimeFrame, TIME_FRAME_LABELS } from '../../types/market';
import { logger } from '../../utils/logger';

export type RandomFn = () => number;

export const BAR_INTERVAL_MS: Record<TimeFrame, number> = {
  DAILY: 24 * 60 * 60 * 1000,
  WEEKLY: 7 * 24 * 60 * 60 * 1000,
  INTRADAY_60M: 60 * 60 * 1000,
};

export const SIMULATED_BAR_COUNT: Record<OutputSize, number> = {
  compact: 100,
  full: 500,
};

export interface SimulatedPriceOptions {
  random?: RandomFn;
  now?: () => number;
  startPrice?: number;
}

/**
 * Random-walk OHLCV series, used whenever no market data vendor is configured
 */
export class SimulatedPriceSource implements PriceSource {
  public name = 'Simulated';
  private readonly random: RandomFn;
  private readonly now: () => number;
  private readonly startPrice: number;

  constructor(options: SimulatedPriceOptions = {}) {
    this.random = options.random ?? Math.random;
    this.now = options.now ?? Date.now;
    this.startPrice = options.startPrice ?? 100;
  }

  public async getPriceSeries(symbol: string, timeFrame: TimeFrame, outputSize: OutputSize): Promise<PriceSeriesResult> {
    const count = SIMULATED_BAR_COUNT[outputSize];
    const interval = BAR_INTERVAL_MS[timeFrame];
    const end = this.now();

    logger.info({ symbol, timeFrame: TIME_FRAME_LABELS[timeFrame], bars: count }, 'Generating simulated price data');

    const series: PriceBar[] = [];
    let close = this.startPrice;

    for (let i = 0; i < count; i++) {
      close = Math.max(0.01, close + this.gaussian());

      const open = Math.max(0.01, close - this.random() * 2);
      const high = Math.max(open, close) + this.random();
      const low = Math.max(0.01, Math.min(open, close) - this.random());

      series.push({
        timestamp: end - (count - 1 - i) * interval,
        open,
        high,
        low,
        close,
        volume: 1_000_000 + Math.floor(this.random() * 9_000_000),
      });
    }

    return { series, error: null };
  }

  // Box-Muller standard normal
  private gaussian(): number {
    const u1 = 1 - this.random(); // (0, 1]
    const u2 = this.random();
    return Math.sqrt(-2 * Math.log(u1)) * Math.cos(2 * Math.PI * u2);
  }
}
