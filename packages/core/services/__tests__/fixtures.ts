/**
 * Test doubles for the wizard services.
 */

import { vi } from 'vitest';
import type { Logger } from 'pino';
import { z } from 'zod';
import type { FormData, FormMessages, FormRules } from '../../domain/multi-step-form.js';
import {
  FormValidationError,
  type FieldErrors,
  type FormRequest,
  type IFormValidator,
  type ISessionStore,
} from '../../ports/index.js';

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

// =============================================================================
// Session
// =============================================================================

/**
 * Session with one level of dot nesting and a counted, observable save.
 */
export class FakeSession implements ISessionStore {
  readonly id = 'test-session';
  saves = 0;
  persisted: Record<string, unknown> = {};

  constructor(private attributes: Record<string, unknown> = {}) {}

  get(key: string, fallback?: unknown): unknown {
    const [head = '', field] = key.split('.', 2);
    const value = this.attributes[head];
    if (field === undefined) {
      return value === undefined ? fallback : value;
    }
    if (typeof value === 'object' && value !== null && Object.hasOwn(value, field)) {
      return Object.entries(value).find(([name]) => name === field)?.[1];
    }
    return fallback;
  }

  put(key: string, value: unknown): void {
    const [head = '', field] = key.split('.', 2);
    if (field === undefined) {
      this.attributes[head] = value;
      return;
    }
    const current = this.attributes[head];
    const bucket = typeof current === 'object' && current !== null ? Object.fromEntries(Object.entries(current)) : {};
    this.attributes[head] = { ...bucket, [field]: value };
  }

  increment(key: string, amount = 1): number {
    const current = this.get(key, 0);
    const value = (typeof current === 'number' ? current : 0) + amount;
    this.put(key, value);
    return value;
  }

  forget(key: string): void {
    delete this.attributes[key];
  }

  all(): Record<string, unknown> {
    return structuredClone(this.attributes);
  }

  async save(): Promise<void> {
    this.saves++;
    this.persisted = structuredClone(this.attributes);
  }
}

// =============================================================================
// Request
// =============================================================================

export interface FakeRequestInit {
  method?: string;
  url?: string;
  input?: FormData;
  json?: boolean;
}

export class FakeFormRequest implements FormRequest {
  readonly method: string;
  readonly url: string;
  private readonly fields: FormData;
  private readonly json: boolean;

  constructor(init: FakeRequestInit = {}) {
    this.method = init.method ?? 'GET';
    this.url = init.url ?? '/wizard';
    this.fields = init.input ?? {};
    this.json = init.json ?? false;
  }

  input(): FormData {
    return { ...this.fields };
  }

  get(key: string): unknown {
    return this.fields[key];
  }

  wantsJson(): boolean {
    return this.json;
  }
}

export const getRequest = (init: Omit<FakeRequestInit, 'method'> = {}) =>
  new FakeFormRequest({ ...init, method: 'GET' });

export const postRequest = (input: FormData, init: Omit<FakeRequestInit, 'method' | 'input'> = {}) =>
  new FakeFormRequest({ ...init, method: 'POST', input });

// =============================================================================
// Validator
// =============================================================================

/**
 * Validator applying rules as one zod object; messages keyed by field only.
 */
export class SchemaValidator implements IFormValidator {
  readonly calls: FormRules[] = [];

  validate(input: FormData, rules: FormRules, messages: FormMessages): FormData {
    this.calls.push(rules);
    const result = z.object(rules).safeParse(input);
    if (result.success) {
      return result.data;
    }
    const errors: FieldErrors = {};
    for (const issue of result.error.issues) {
      const field = issue.path.join('.');
      (errors[field] ??= []).push(messages[field] ?? issue.message);
    }
    throw new FormValidationError(errors);
  }
}
