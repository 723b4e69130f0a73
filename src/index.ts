#!/usr/bin/env node
import { z } from 'zod';
import { logger, setLogLevel } from './utils/logger';
import { ConfigError, loadDotenv, loadEnv, toAdvisorSettings } from './config/env';
import { createDataSources } from './engine/sources';
import { RiskManager } from './execution/RiskManager';
import { AdvisoryAgent } from './core/AdvisoryAgent';
import { formatReport } from './notification/ReportFormatter';
import { isAnalysisFailure } from './types/trading';
import { OutputSize, TimeFrame } from './types/market';

const TIME_FRAME_ARGS: Record<'daily' | 'weekly' | 'intraday', TimeFrame> = {
  daily: 'DAILY',
  weekly: 'WEEKLY',
  intraday: 'INTRADAY_60M',
};

const argsSchema = z.tuple([
  z.string().trim().min(1, 'A stock symbol is required'),
  z.string().toLowerCase().pipe(z.enum(['daily', 'weekly', 'intraday'])).default('daily'),
  z.string().toLowerCase().pipe(z.enum(['compact', 'full'])).default('compact'),
]);

export interface CliArgs {
  symbol: string;
  timeFrame: TimeFrame;
  outputSize: OutputSize;
}

export const parseArgs = (argv: string[]): CliArgs => {
  const [symbol, timeFrame, outputSize] = argsSchema.parse([argv[0], argv[1], argv[2]]);
  return { symbol, timeFrame: TIME_FRAME_ARGS[timeFrame], outputSize };
};

const USAGE = 'Usage: price-action-advisor <SYMBOL> [daily|weekly|intraday] [compact|full]';

const main = async () => {
  loadDotenv();
  const env = loadEnv();
  setLogLevel(env.LOG_LEVEL);
  const settings = toAdvisorSettings(env);

  const args = parseArgs(process.argv.slice(2));
  const { priceSource, sentimentSource } = createDataSources(settings);

  const agent = new AdvisoryAgent({
    priceSource,
    sentimentSource,
    riskManager: new RiskManager(settings.portfolioValue, {
      maxRiskPerTrade: settings.maxRiskPerTrade,
      maxDrawdown: settings.maxDrawdown,
    }),
  });

  const result = await agent.analyze(args.symbol, args.timeFrame, args.outputSize);
  process.stdout.write(`${formatReport(result)}\n`);

  if (isAnalysisFailure(result)) {
    process.exitCode = 1;
  }
};

if (require.main === module) {
  main().catch((err: unknown) => {
    if (err instanceof ConfigError) {
      logger.error({ issues: err.issues }, err.message);
    } else if (err instanceof z.ZodError) {
      logger.error({ issues: err.issues.map(issue => issue.message) }, USAGE);
    } else {
      logger.error(err, 'Uncaught error in main process');
    }
    process.exit(1);
  });
}
