import { z } from 'zod';
import { PriceSource } from '../PriceSource';
import { FinnhubApiClient } from '../../client/FinnhubApiClient';
import { OutputSize, PriceBar, PriceSeriesResult, TimeFrame, TIME_FRAME_LABELS } from '../../types/market';
import { logger } from '../../utils/logger';

const RESOLUTIONS: Record<TimeFrame, string> = {
  DAILY: 'D',
  WEEKLY: 'W',
  INTRADAY_60M: '60',
};

// Calendar days requested per call
const LOOKBACK_DAYS: Record<TimeFrame, Record<OutputSize, number>> = {
  DAILY: { compact: 365, full: 5 * 365 },
  WEEKLY: { compact: 365, full: 10 * 365 },
  INTRADAY_60M: { compact: 30, full: 90 },
};

const DAY_SECONDS = 24 * 60 * 60;

export const candleResponseSchema = z.object({
  s: z.string(),
  t: z.array(z.number()).optional(),
  o: z.array(z.number()).optional(),
  h: z.array(z.number()).optional(),
  l: z.array(z.number()).optional(),
  c: z.array(z.number()).optional(),
  v: z.array(z.number()).optional(),
});

export type CandleResponse = z.infer<typeof candleResponseSchema>;

export class FinnhubPriceSource implements PriceSource {
  public name = 'Finnhub';

  constructor(
    private readonly client: FinnhubApiClient,
    private readonly now: () => number = Date.now,
  ) {}

  public async getPriceSeries(symbol: string, timeFrame: TimeFrame, outputSize: OutputSize): Promise<PriceSeriesResult> {
    const to = Math.floor(this.now() / 1000);
    const from = to - LOOKBACK_DAYS[timeFrame][outputSize] * DAY_SECONDS;

    try {
      logger.info({ symbol, timeFrame: TIME_FRAME_LABELS[timeFrame] }, 'Fetching price data from Finnhub');

      const response = await this.client.get('/stock/candle', {
        symbol: symbol.toUpperCase(),
        resolution: RESOLUTIONS[timeFrame],
        from,
        to,
      }, candleResponseSchema);

      const series = toPriceSeries(response);

      if (response.s !== 'ok' || series.length === 0) {
        logger.error({ symbol, status: response.s }, 'Finnhub returned no candles');
        return {
          series: [],
          error: `Finnhub API returned no data for ${symbol}. This could be due to an invalid symbol or an API key with insufficient permissions for this data.`,
        };
      }

      logger.info({ symbol, bars: series.length }, 'Fetched price data');
      return { series, error: null };
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      logger.error({ error: message, symbol }, 'Error fetching candles from Finnhub');
      return {
        series: [],
        error: `Finnhub API error for ${symbol}: ${message}. Please check if the symbol is correct and your API key is valid.`,
      };
    }
  }
}

/**
 * Zips Finnhub's column arrays into bars, ordered by time.
 * Rows missing any column and repeated timestamps are dropped.
 */
export const toPriceSeries = (response: CandleResponse): PriceBar[] => {
  const { t = [], o = [], h = [], l = [], c = [], v = [] } = response;
  const length = Math.min(t.length, o.length, h.length, l.length, c.length, v.length);

  const bars: PriceBar[] = [];
  for (let i = 0; i < length; i++) {
    bars.push({
      timestamp: t[i] * 1000,
      open: o[i],
      high: h[i],
      low: l[i],
      close: c[i],
      volume: v[i],
    });
  }

  bars.sort((a, b) => a.timestamp - b.timestamp);

  // Timestamps must be strictly increasing; keep the first bar for each
  return bars.filter((bar, i) => i === 0 || bar.timestamp !== bars[i - 1].timestamp);
};
