/**
 * Shared test doubles for the wizard adapters.
 */

import { vi } from 'vitest';
import type { Logger } from 'pino';
import type { RedisClient } from '../redis-session-store.js';

// =============================================================================
// Mock Redis Client
// =============================================================================

export class MockRedisClient implements RedisClient {
  readonly store = new Map<string, { value: string; ttl: number }>();
  quitCalled = false;

  async get(key: string): Promise<string | null> {
    return this.store.get(key)?.value ?? null;
  }

  async setex(key: string, seconds: number, value: string): Promise<unknown> {
    this.store.set(key, { value, ttl: seconds });
    return 'OK';
  }

  async del(...keys: string[]): Promise<number> {
    let count = 0;
    for (const key of keys) {
      if (this.store.delete(key)) count++;
    }
    return count;
  }

  async quit(): Promise<unknown> {
    this.quitCalled = true;
    return 'OK';
  }
}

// =============================================================================
// Mock Logger
// =============================================================================

export const createMockLogger = () => {
  const logger = {
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    debug: vi.fn(),
    child: vi.fn(),
  };
  logger.child.mockReturnValue(logger);
  return logger;
};

export type MockLogger = ReturnType<typeof createMockLogger>;

export const asLogger = (logger: MockLogger): Logger => logger as unknown as Logger;
