import { OutputSize, PriceSeriesResult, TimeFrame } from '../types/market';

/**
 * Supplies an ordered OHLCV series for one symbol. Implementations do not
 * throw: failures come back as an empty series with a non-null error.
 */
export interface PriceSource {
  name: string;
  getPriceSeries(symbol: string, timeFrame: TimeFrame, outputSize: OutputSize): Promise<PriceSeriesResult>;
}
