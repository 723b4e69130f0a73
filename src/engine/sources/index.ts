import { AdvisorSettings } from '../../config/env';
import { FinnhubApiClient } from '../../client/FinnhubApiClient';
import { PriceSource } from '../PriceSource';
import { SentimentSource } from '../SentimentSource';
import { FinnhubPriceSource } from './FinnhubPriceSource';
import { FinnhubSentimentSource } from './FinnhubSentimentSource';
import { SimulatedPriceSource } from './SimulatedPriceSource';
import { SimulatedSentimentSource } from './SimulatedSentimentSource';
import { logger } from '../../utils/logger';

export interface DataSources {
  priceSource: PriceSource;
  sentimentSource: SentimentSource;
  simulated: boolean;
}

/**
 * Vendor-backed sources when credentials are configured, simulated ones otherwise
 */
export const createDataSources = (settings: AdvisorSettings): DataSources => {
  if (!settings.finnhubApiKey) {
    logger.warn('No market data API key configured. Running in simulation mode.');
    return {
      priceSource: new SimulatedPriceSource(),
      sentimentSource: new SimulatedSentimentSource(),
      simulated: true,
    };
  }

  const client = new FinnhubApiClient({
    apiKey: settings.finnhubApiKey,
    baseUrl: settings.finnhubApiUrl,
    timeoutMs: settings.requestTimeoutMs,
  });

  logger.info('Market data API key configured. Running in live mode.');
  return {
    priceSource: new FinnhubPriceSource(client),
    sentimentSource: new FinnhubSentimentSource(client),
    simulated: false,
  };
};

export { SimulatedPriceSource } from './SimulatedPriceSource';
export { SimulatedSentimentSource } from './SimulatedSentimentSource';
export { FinnhubPriceSource } from './FinnhubPriceSource';
export { FinnhubSentimentSource } from './FinnhubSentimentSource';
