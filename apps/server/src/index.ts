import type { Server } from 'node:http';
import { Redis } from 'ioredis';
import type { ISessionStoreFactory } from '@stepwise/core/ports';
import {
  InMemorySessionStoreFactory,
  RedisSessionStoreFactory,
  ZodFormValidator,
} from '@stepwise/adapters/wizard';
import { getConfig } from './config.js';
import { createLogger } from './logger.js';
import { createApp } from './app.js';

// Load configuration first (will throw if invalid)
const config = getConfig();
const logger = createLogger(config);

let server: Server | null = null;
let sessions: ISessionStoreFactory | null = null;

/**
 * Main entry point
 */
async function main(): Promise<void> {
  logger.info({ env: config.nodeEnv }, 'Starting wizard server');

  if (config.redisUrl) {
    sessions = new RedisSessionStoreFactory({
      redis: new Redis(config.redisUrl),
      logger,
      ttlSeconds: config.sessionTtlSeconds,
    });
    logger.info('Using Redis session store');
  } else {
    sessions = new InMemorySessionStoreFactory({ logger });
    logger.warn('REDIS_URL not set, sessions are kept in memory');
  }

  const app = createApp({
    config,
    logger,
    sessions,
    validator: new ZodFormValidator(),
  });

  server = app.listen(config.port, () => {
    logger.info({ port: config.port }, 'Wizard server listening');
  });
}

/**
 * Graceful shutdown
 */
async function shutdown(signal: string): Promise<void> {
  logger.info({ signal }, 'Shutdown signal received, starting graceful shutdown');

  const current = server;
  if (current) {
    await new Promise<void>((resolve, reject) => {
      current.close((error) => (error ? reject(error) : resolve()));
    });
    logger.info('HTTP server closed');
  }

  await sessions?.close();
  logger.info('Shutdown complete');
}

process.on('SIGTERM', () => {
  shutdown('SIGTERM')
    .then(() => process.exit(0))
    .catch((error: unknown) => {
      logger.error({ error }, 'Error during shutdown');
      process.exit(1);
    });
});

process.on('SIGINT', () => {
  shutdown('SIGINT')
    .then(() => process.exit(0))
    .catch((error: unknown) => {
      logger.error({ error }, 'Error during shutdown');
      process.exit(1);
    });
});

main().catch((error: unknown) => {
  logger.fatal({ error }, 'Failed to start wizard server');
  process.exit(1);
});
