import { pino, type Logger } from 'pino';
import type { Config } from './config.js';

/**
 * Root logger. Pretty-printed in development.
 */
export function createLogger(config: Pick<Config, 'logLevel' | 'nodeEnv'>): Logger {
  return pino({
    level: config.logLevel,
    base: { service: 'stepwise-server' },
    transport:
      config.nodeEnv === 'development'
        ? { target: 'pino-pretty', options: { colorize: true } }
        : undefined,
  });
}
