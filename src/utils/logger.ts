import pino from 'pino';

// The configured level is applied by the entry point once the env is validated
export const logger = pino({
  name: 'price-action-advisor',
  level: process.env.NODE_ENV === 'test' ? 'silent' : 'info',
});

export type LogLevel = 'fatal' | 'error' | 'warn' | 'info' | 'debug' | 'trace' | 'silent';

export const setLogLevel = (level: LogLevel): void => {
  logger.level = level;
};
