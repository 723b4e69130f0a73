import axios, { AxiosInstance } from 'axios';
import { z } from 'zod';
import { logger } from '../utils/logger';

export interface FinnhubClientOptions {
  apiKey: string;
  baseUrl: string;
  timeoutMs: number;
}

export type QueryParams = Record<string, string | number>;

export class FinnhubApiClient {
  private readonly axiosInstance: AxiosInstance;
  private readonly apiKey: string;

  constructor(options: FinnhubClientOptions) {
    this.apiKey = options.apiKey;

    this.axiosInstance = axios.create({
      baseURL: options.baseUrl.replace(/\/+$/, ''),
      timeout: options.timeoutMs,
      headers: { 'User-Agent': 'price-action-advisor' },
    });
  }

  /**
   * GET a path and validate the body against `schema`.
   * Transport and schema errors are logged and rethrown.
   */
  public async get<T>(path: string, params: QueryParams, schema: z.ZodType<T, z.ZodTypeDef, unknown>): Promise<T> {
    try {
      const response = await this.axiosInstance.get<unknown>(path, {
        params: { ...params, token: this.apiKey },
      });

      const parsed = schema.safeParse(response.data);
      if (!parsed.success) {
        throw new Error(`Unexpected Finnhub response for ${path}: ${parsed.error.issues[0]?.message ?? 'invalid body'}`);
      }
      return parsed.data;
    } catch (error) {
      if (axios.isAxiosError(error) && error.response) {
        logger.error({
          status: error.response.status,
          data: error.response.data,
          url: error.config?.url,
        }, 'Finnhub API Request Failed');
      }
      throw error;
    }
  }
}
