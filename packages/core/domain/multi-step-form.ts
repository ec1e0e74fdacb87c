/**
 * Multi-Step Form Domain Types
 *
 * Defines the linear, integer-indexed step state machine that drives a
 * wizard form across several HTTP round-trips.
 *
 * States are the step numbers 1..lastStep plus the transient reset
 * sentinel 0, which only the advance transition understands:
 *
 *   0 ──advance──▶ 1 ──advance──▶ 2 ──▶ … ──▶ lastStep ⟲ (absorbing)
 */

import type { ZodTypeAny } from 'zod';

// =============================================================================
// Constants
// =============================================================================

/**
 * Request/bucket field carrying the step indicator.
 */
export const FORM_STEP_FIELD = 'form_step';

/**
 * Namespace used when none is configured.
 */
export const DEFAULT_FORM_NAMESPACE = 'multistep-form';

/**
 * Step every form starts on.
 */
export const FIRST_STEP = 1;

/**
 * Sentinel written by reset; resolves to FIRST_STEP on the next advance.
 */
export const RESET_STEP = 0;

/**
 * Hook selector matching every step.
 */
export const WILDCARD = '*';

// =============================================================================
// Form Data
// =============================================================================

/**
 * Accumulated or submitted field values, keyed by field name.
 */
export type FormData = Record<string, unknown>;

/**
 * Field rules handed to the validator, keyed by field name.
 */
export type FormRules = Record<string, ZodTypeAny>;

/**
 * Custom validation messages keyed by `field` or `field.issueCode`.
 */
export type FormMessages = Record<string, string>;

// =============================================================================
// Step Configuration
// =============================================================================

/**
 * Static configuration registered for one step.
 */
export interface StepDefinition {
  /** Validation rules for the fields submitted on this step */
  rules?: FormRules;
  /** Custom validation messages */
  messages?: FormMessages;
  /** Extra render data surfaced to views and JSON payloads (never persisted) */
  data?: FormData;
}

/**
 * Step configuration with every section present.
 * Unregistered steps resolve to the empty configuration.
 */
export interface StepConfig {
  rules: FormRules;
  messages: FormMessages;
  data: FormData;
}

// =============================================================================
// State Machine
// =============================================================================

/**
 * Parse a raw step value (request input or persisted pointer).
 *
 * @returns Integer step, or null when the value is absent or not an integer
 */
export function parseStep(value: unknown): number | null {
  if (typeof value === 'number') {
    return Number.isInteger(value) ? value : null;
  }
  if (typeof value === 'string' && /^-?\d+$/.test(value.trim())) {
    return Number.parseInt(value.trim(), 10);
  }
  return null;
}

/**
 * Resolve the active step.
 * Precedence: explicit per-request override, then the persisted pointer,
 * then FIRST_STEP.
 */
export function resolveStep(override: unknown, persisted: unknown): number {
  return parseStep(override) ?? parseStep(persisted) ?? FIRST_STEP;
}

/**
 * Compute the step to persist after a successful submission.
 *
 * @param resolved - Step the submission was resolved to
 * @param lastStep - Terminal step
 * @returns Next step, or null when nothing must be persisted (terminal)
 */
export function nextStep(resolved: number, lastStep: number): number | null {
  if (resolved === RESET_STEP) {
    return FIRST_STEP;
  }
  if (isTerminalStep(resolved, lastStep)) {
    return null;
  }
  return resolved + 1;
}

/**
 * Check whether a step is the terminal (absorbing) state.
 */
export function isTerminalStep(step: number, lastStep: number): boolean {
  return step >= lastStep;
}

/**
 * Shallow-merge validated fields into a bucket and stamp the step pointer.
 * Keys in `fields` overwrite existing keys; every other key is retained.
 */
export function mergeBucket(bucket: FormData, fields: FormData, step: number): FormData {
  return { ...bucket, ...fields, [FORM_STEP_FIELD]: step };
}
