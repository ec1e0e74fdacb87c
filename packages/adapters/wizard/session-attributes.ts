/**
 * SessionAttributes
 *
 * Base for session store adapters: an in-memory attribute bag addressed
 * with dot-notation keys. Subclasses decide how `save()` reaches durable
 * storage.
 */

import { z } from 'zod';
import type { ISessionStore } from '@stepwise/core/ports';

type Attributes = Record<string, unknown>;

const SessionPayloadSchema = z.record(z.string(), z.unknown());

/** Segments that would reach an object's prototype chain */
const RESERVED_SEGMENTS: ReadonlySet<string> = new Set(['__proto__', 'constructor', 'prototype']);

export abstract class SessionAttributes implements ISessionStore {
  protected attributes: Attributes;

  protected constructor(
    public readonly id: string,
    attributes: Attributes = {}
  ) {
    this.attributes = attributes;
  }

  get(key: string, fallback?: unknown): unknown {
    let current: unknown = this.attributes;
    for (const segment of key.split('.')) {
      if (!isAttributes(current) || !Object.hasOwn(current, segment)) {
        return fallback;
      }
      current = current[segment];
    }
    return current;
  }

  put(key: string, value: unknown): void {
    const segments = splitKey(key);
    const leaf = segments.pop();
    if (leaf === undefined || leaf === '') {
      throw new RangeError(`Invalid session key "${key}"`);
    }

    let target = this.attributes;
    for (const segment of segments) {
      const child = target[segment];
      if (isAttributes(child)) {
        target = child;
      } else {
        const created: Attributes = {};
        target[segment] = created;
        target = created;
      }
    }
    target[leaf] = value;
  }

  increment(key: string, amount = 1): number {
    const current = this.get(key, 0);
    const value = (typeof current === 'number' && Number.isFinite(current) ? current : 0) + amount;
    this.put(key, value);
    return value;
  }

  forget(key: string): void {
    const segments = splitKey(key);
    const leaf = segments.pop();
    if (leaf === undefined) {
      return;
    }
    const parent = segments.length === 0 ? this.attributes : this.get(segments.join('.'));
    if (isAttributes(parent)) {
      delete parent[leaf];
    }
  }

  all(): Attributes {
    return structuredClone(this.attributes);
  }

  abstract save(): Promise<void>;
}

function splitKey(key: string): string[] {
  const segments = key.split('.');
  if (segments.some((segment) => RESERVED_SEGMENTS.has(segment))) {
    throw new RangeError(`Invalid session key "${key}"`);
  }
  return segments;
}

export function isAttributes(value: unknown): value is Attributes {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Serialize attributes for storage.
 */
export function serializeAttributes(attributes: Attributes): string {
  return JSON.stringify(attributes);
}

/**
 * Parse a stored payload.
 *
 * @returns Attributes, or null when the payload is not a JSON object
 */
export function deserializeAttributes(payload: string): Attributes | null {
  let parsed: unknown;
  try {
    parsed = JSON.parse(payload);
  } catch {
    return null;
  }
  const result = SessionPayloadSchema.safeParse(parsed);
  return result.success && isAttributes(result.data) ? result.data : null;
}
