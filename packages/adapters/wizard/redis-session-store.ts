/**
 * RedisSessionStore
 *
 * Redis-backed session backend. Each session is one JSON blob under
 * `stepwise:session:{id}`, loaded on open and written back with SETEX on
 * save, so the TTL slides with every flush.
 *
 * Redis errors propagate to the caller; only an unreadable blob is
 * recovered from (logged and treated as an empty session).
 */

import type { Logger } from 'pino';
import {
  DEFAULT_SESSION_TTL_SECONDS,
  MAX_SESSION_TTL_SECONDS,
  SESSION_KEY_PREFIX,
  type ISessionStore,
  type ISessionStoreFactory,
} from '@stepwise/core/ports';
import {
  SessionAttributes,
  deserializeAttributes,
  serializeAttributes,
} from './session-attributes.js';

// =============================================================================
// Types
// =============================================================================

/**
 * Redis client interface.
 * Matches ioredis and node-redis clients.
 */
export interface RedisClient {
  get(key: string): Promise<string | null>;
  setex(key: string, seconds: number, value: string): Promise<unknown>;
  del(...keys: string[]): Promise<number>;
  quit(): Promise<unknown>;
}

/**
 * Options for creating RedisSessionStoreFactory.
 */
export interface RedisSessionStoreOptions {
  /** Redis client */
  redis: RedisClient;
  /** Logger instance */
  logger: Logger;
  /** Custom TTL in seconds (default: 7200) */
  ttlSeconds?: number;
  /** Key prefix (default: stepwise:session:) */
  keyPrefix?: string;
}

// =============================================================================
// Session Store
// =============================================================================

export class RedisSessionStore extends SessionAttributes {
  constructor(
    id: string,
    private readonly redis: RedisClient,
    private readonly key: string,
    private readonly ttlSeconds: number,
    attributes: Record<string, unknown> = {}
  ) {
    super(id, attributes);
  }

  async save(): Promise<void> {
    await this.redis.setex(this.key, this.ttlSeconds, serializeAttributes(this.attributes));
  }
}

// =============================================================================
// Factory
// =============================================================================

export class RedisSessionStoreFactory implements ISessionStoreFactory {
  private readonly redis: RedisClient;
  private readonly log: Logger;
  private readonly keyPrefix: string;
  public readonly ttlSeconds: number;

  constructor(options: RedisSessionStoreOptions) {
    const ttlSeconds = options.ttlSeconds ?? DEFAULT_SESSION_TTL_SECONDS;
    if (!Number.isInteger(ttlSeconds) || ttlSeconds <= 0 || ttlSeconds > MAX_SESSION_TTL_SECONDS) {
      throw new RangeError(`Session TTL must be between 1 and ${MAX_SESSION_TTL_SECONDS} seconds`);
    }

    this.redis = options.redis;
    this.log = options.logger.child({ component: 'RedisSessionStoreFactory' });
    this.keyPrefix = options.keyPrefix ?? SESSION_KEY_PREFIX;
    this.ttlSeconds = ttlSeconds;
  }

  async open(sessionId: string): Promise<ISessionStore> {
    const key = this.keyFor(sessionId);
    const payload = await this.redis.get(key);

    let attributes: Record<string, unknown> = {};
    if (payload !== null) {
      const parsed = deserializeAttributes(payload);
      if (parsed === null) {
        this.log.warn({ sessionId }, 'Discarding unreadable session payload');
      } else {
        attributes = parsed;
      }
    }

    this.log.debug({ sessionId, existing: payload !== null }, 'Session opened');
    return new RedisSessionStore(sessionId, this.redis, key, this.ttlSeconds, attributes);
  }

  async destroy(sessionId: string): Promise<boolean> {
    const deleted = await this.redis.del(this.keyFor(sessionId));
    if (deleted > 0) {
      this.log.info({ sessionId }, 'Session destroyed');
    }
    return deleted > 0;
  }

  async close(): Promise<void> {
    await this.redis.quit();
    this.log.info('Redis session store closed');
  }

  keyFor(sessionId: string): string {
    return `${this.keyPrefix}${sessionId}`;
  }
}

/**
 * Create a Redis-backed session store factory.
 *
 * @param options - Store options
 * @returns Session store factory instance
 */
export function createRedisSessionStoreFactory(
  options: RedisSessionStoreOptions
): ISessionStoreFactory {
  return new RedisSessionStoreFactory(options);
}
