/**
 * SessionBucket
 *
 * Namespaced accumulator of submitted field values plus the persisted step
 * pointer, stored as one object under the namespace key of the session:
 *
 *   session[namespace] = { ...fields, form_step: <pointer> }
 *
 * An absent namespace key is an empty bucket. Field data only changes
 * through `merge` (additive) or `replace` (wholesale); `persist` flushes
 * the session as a unit.
 */

import {
  FORM_STEP_FIELD,
  mergeBucket,
  type FormData,
} from '../domain/multi-step-form.js';
import type { ISessionStore } from '../ports/session-store.js';

export class SessionBucket {
  constructor(
    private readonly session: ISessionStore,
    public readonly namespace: string
  ) {}

  /**
   * Current bucket contents (shallow copy).
   */
  load(): FormData {
    const value = this.session.get(this.namespace, {});
    return isRecord(value) ? { ...value } : {};
  }

  /**
   * Read one field of the bucket.
   */
  get(field: string, fallback: unknown = null): unknown {
    return this.session.get(this.key(field), fallback);
  }

  /**
   * Raw persisted step pointer, or undefined when none was persisted.
   */
  step(): unknown {
    return this.session.get(this.key(FORM_STEP_FIELD));
  }

  /**
   * Shallow-merge fields into the bucket. When `step` is given it is stamped
   * into the step field after the merge.
   */
  merge(fields: FormData, step?: number): FormData {
    const merged = step === undefined ? { ...this.load(), ...fields } : mergeBucket(this.load(), fields, step);
    this.session.put(this.namespace, merged);
    return merged;
  }

  /**
   * Replace the whole bucket, discarding every accumulated field.
   */
  replace(data: FormData): void {
    this.session.put(this.namespace, { ...data });
  }

  /**
   * Overwrite the step pointer.
   */
  setStep(step: number): void {
    this.session.put(this.key(FORM_STEP_FIELD), step);
  }

  /**
   * Flush the session to durable storage.
   */
  persist(): Promise<void> {
    return this.session.save();
  }

  private key(field: string): string {
    return `${this.namespace}.${field}`;
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}
