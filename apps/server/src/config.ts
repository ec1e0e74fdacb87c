/**
 * Server Configuration
 *
 * Environment variables validated with zod. Parsed once and cached; an
 * invalid environment throws ConfigError listing every offending variable.
 */

import { z } from 'zod';
import { DEFAULT_SESSION_TTL_SECONDS, MAX_SESSION_TTL_SECONDS } from '@stepwise/core/ports';

const envSchema = z.object({
  NODE_ENV: z.enum(['development', 'test', 'production']).default('development'),
  PORT: z.coerce.number().int().min(1).max(65535).default(3000),
  LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),
  REDIS_URL: z.string().url().optional(),
  SESSION_TTL_SECONDS: z.coerce.number().int().positive().max(MAX_SESSION_TTL_SECONDS).default(DEFAULT_SESSION_TTL_SECONDS),
  SESSION_HEADER: z
    .string()
    .regex(/^[a-z0-9-]+$/, 'must be a lower-case header name')
    .default('x-session-id'),
  SESSION_COOKIE: z
    .string()
    .regex(/^[A-Za-z0-9_-]+$/, 'must be a cookie name of letters, digits, dashes or underscores')
    .default('stepwise_session'),
  FORM_NAMESPACE: z
    .string()
    .min(1)
    .regex(/^[^.]+$/, 'must not contain dots')
    .default('multistep-form'),
});

export interface Config {
  nodeEnv: 'development' | 'test' | 'production';
  port: number;
  logLevel: string;
  redisUrl: string | null;
  sessionTtlSeconds: number;
  sessionHeader: string;
  sessionCookie: string;
  formNamespace: string;
}

/**
 * Configuration error
 */
export class ConfigError extends Error {
  constructor(public readonly issues: string[]) {
    super(`Invalid configuration:\n  ${issues.join('\n  ')}`);
    this.name = 'ConfigError';
  }
}

/**
 * Parse configuration from an environment object.
 */
export function parseConfig(env: Record<string, string | undefined>): Config {
  const result = envSchema.safeParse(env);
  if (!result.success) {
    throw new ConfigError(
      result.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`)
    );
  }

  const parsed = result.data;
  return {
    nodeEnv: parsed.NODE_ENV,
    port: parsed.PORT,
    logLevel: parsed.LOG_LEVEL,
    redisUrl: parsed.REDIS_URL ?? null,
    sessionTtlSeconds: parsed.SESSION_TTL_SECONDS,
    sessionHeader: parsed.SESSION_HEADER,
    sessionCookie: parsed.SESSION_COOKIE,
    formNamespace: parsed.FORM_NAMESPACE,
  };
}

let cachedConfig: Config | null = null;

/**
 * Get configuration (parsed from process.env on first call).
 *
 * @throws ConfigError if the environment is invalid
 */
export function getConfig(): Config {
  if (!cachedConfig) {
    cachedConfig = parseConfig(process.env);
  }
  return cachedConfig;
}

/**
 * Drop the cached configuration (tests).
 */
export function resetConfig(): void {
  cachedConfig = null;
}
