import fs from 'fs';
import os from 'os';
import path from 'path';
import { ConfigError, loadDotenv, loadEnv, toAdvisorSettings } from '../../src/config/env';

describe('env', () => {
  it('applies defaults to an empty environment', () => {
    const env = loadEnv({});

    expect(env).toEqual({
      NODE_ENV: 'development',
      LOG_LEVEL: 'info',
      FINNHUB_API_URL: 'https://finnhub.io/api/v1',
      REQUEST_TIMEOUT_MS: 10000,
      PORTFOLIO_VALUE: 100000,
      MAX_RISK_PER_TRADE: 0.02,
      MAX_DRAWDOWN: 0.1,
    });
  });

  it('coerces numeric variables', () => {
    const env = loadEnv({ PORTFOLIO_VALUE: '25000', MAX_RISK_PER_TRADE: '0.01', REQUEST_TIMEOUT_MS: '2500' });

    expect(env.PORTFOLIO_VALUE).toBe(25000);
    expect(env.MAX_RISK_PER_TRADE).toBe(0.01);
    expect(env.REQUEST_TIMEOUT_MS).toBe(2500);
  });

  it('throws a ConfigError listing invalid variables', () => {
    let caught: unknown;
    try {
      loadEnv({ PORTFOLIO_VALUE: '-5', LOG_LEVEL: 'loud' });
    } catch (error) {
      caught = error;
    }

    expect(caught).toBeInstanceOf(ConfigError);
    if (caught instanceof ConfigError) {
      expect(caught.issues).toHaveLength(2);
      expect(caught.issues.some(issue => issue.startsWith('PORTFOLIO_VALUE:'))).toBe(true);
      expect(caught.issues.some(issue => issue.startsWith('LOG_LEVEL:'))).toBe(true);
    }
  });

  it('rejects a drawdown limit above 100%', () => {
    expect(() => loadEnv({ MAX_DRAWDOWN: '1.5' })).toThrow(ConfigError);
  });

  describe('toAdvisorSettings', () => {
    it('treats a blank API key as unconfigured', () => {
      expect(toAdvisorSettings(loadEnv({ FINNHUB_API_KEY: '   ' })).finnhubApiKey).toBeNull();
      expect(toAdvisorSettings(loadEnv({})).finnhubApiKey).toBeNull();
    });

    it('maps the environment onto explicit settings', () => {
      const settings = toAdvisorSettings(loadEnv({ FINNHUB_API_KEY: ' test-key ', PORTFOLIO_VALUE: '5000' }));

      expect(settings).toEqual({
        finnhubApiKey: 'test-key',
        finnhubApiUrl: 'https://finnhub.io/api/v1',
        requestTimeoutMs: 10000,
        portfolioValue: 5000,
        maxRiskPerTrade: 0.02,
        maxDrawdown: 0.1,
      });
    });
  });

  describe('loadDotenv', () => {
    const variable = 'ADVISOR_DOTENV_CHECK';
    let directory: string;

    beforeEach(() => {
      directory = fs.mkdtempSync(path.join(os.tmpdir(), 'advisor-env-'));
      fs.writeFileSync(path.join(directory, '.env'), `${variable}=loaded\n`);
      delete process.env[variable];
    });

    afterEach(() => {
      jest.restoreAllMocks();
      delete process.env[variable];
      fs.rmSync(directory, { recursive: true, force: true });
    });

    it('reads .env from the working directory by default', () => {
      jest.spyOn(process, 'cwd').mockReturnValue(directory);

      loadDotenv();

      expect(process.env[variable]).toBe('loaded');
    });

    it('reads .env from an explicit directory', () => {
      loadDotenv(directory);

      expect(process.env[variable]).toBe('loaded');
    });
  });
});
