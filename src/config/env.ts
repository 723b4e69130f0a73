import { z } from 'zod';
import dotenv from 'dotenv';
import path from 'path';
import { DEFAULT_RISK_LIMITS } from './AnalysisConfig';

export class ConfigError extends Error {
  constructor(message: string, public readonly issues: string[]) {
    super(message);
    this.name = 'ConfigError';
  }
}

const envSchema = z.object({
  NODE_ENV: z
    .enum(['development', 'production', 'test'])
    .default('development'),
  LOG_LEVEL: z
    .enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'])
    .default('info'),
  FINNHUB_API_KEY: z.string().optional(),
  FINNHUB_API_URL: z.string().url().default('https://finnhub.io/api/v1'),
  REQUEST_TIMEOUT_MS: z.coerce.number().int().positive().default(10000),
  PORTFOLIO_VALUE: z.coerce.number().positive().default(100000),
  MAX_RISK_PER_TRADE: z.coerce.number().gt(0).lte(1).default(DEFAULT_RISK_LIMITS.maxRiskPerTrade),
  MAX_DRAWDOWN: z.coerce.number().gt(0).lte(1).default(DEFAULT_RISK_LIMITS.maxDrawdown),
});

export type Env = z.infer<typeof envSchema>;

/**
 * Explicit settings handed to each collaborator at construction.
 * Nothing below the entry point reads process.env.
 */
export interface AdvisorSettings {
  finnhubApiKey: string | null;
  finnhubApiUrl: string;
  requestTimeoutMs: number;
  portfolioValue: number;
  maxRiskPerTrade: number;
  maxDrawdown: number;
}

/**
 * Loads `.env` from the directory the advisor is launched in
 */
export const loadDotenv = (directory: string = process.cwd()): void => {
  dotenv.config({ path: path.join(directory, '.env') });
};

export const loadEnv = (source: NodeJS.ProcessEnv = process.env): Env => {
  const parsed = envSchema.safeParse(source);

  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
    throw new ConfigError('Invalid environment variables', issues);
  }

  return parsed.data;
};

export const toAdvisorSettings = (env: Env): AdvisorSettings => ({
  // An empty key in .env means "not configured"
  finnhubApiKey: env.FINNHUB_API_KEY && env.FINNHUB_API_KEY.trim() !== '' ? env.FINNHUB_API_KEY.trim() : null,
  finnhubApiUrl: env.FINNHUB_API_URL,
  requestTimeoutMs: env.REQUEST_TIMEOUT_MS,
  portfolioValue: env.PORTFOLIO_VALUE,
  maxRiskPerTrade: env.MAX_RISK_PER_TRADE,
  maxDrawdown: env.MAX_DRAWDOWN,
});
