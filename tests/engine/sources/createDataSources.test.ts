import { AdvisorSettings } from '../../../src/config/env';
import {
  createDataSources,
  FinnhubPriceSource,
  FinnhubSentimentSource,
  SimulatedPriceSource,
  SimulatedSentimentSource,
} from '../../../src/engine/sources';

const settings = (finnhubApiKey: string | null): AdvisorSettings => ({
  finnhubApiKey,
  finnhubApiUrl: 'http://localhost',
  requestTimeoutMs: 1000,
  portfolioValue: 100000,
  maxRiskPerTrade: 0.02,
  maxDrawdown: 0.1,
});

describe('createDataSources', () => {
  it('simulates everything without credentials', () => {
    const sources = createDataSources(settings(null));

    expect(sources.simulated).toBe(true);
    expect(sources.priceSource).toBeInstanceOf(SimulatedPriceSource);
    expect(sources.sentimentSource).toBeInstanceOf(SimulatedSentimentSource);
  });

  it('uses Finnhub when a key is configured', () => {
    const sources = createDataSources(settings('test-key'));

    expect(sources.simulated).toBe(false);
    expect(sources.priceSource).toBeInstanceOf(FinnhubPriceSource);
    expect(sources.sentimentSource).toBeInstanceOf(FinnhubSentimentSource);
  });
});
