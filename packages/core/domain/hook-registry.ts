/**
 * Hook Registry
 *
 * User-supplied callbacks for one pipeline phase (before-validation or
 * after-validation), keyed by a specific step or by the wildcard.
 *
 * Dispatch precedence: the wildcard callback runs first. A non-empty result
 * from it is returned immediately and the step-specific callback is never
 * invoked, so a wildcard hook can veto any step.
 */

import { WILDCARD } from './multi-step-form.js';

// =============================================================================
// Types
// =============================================================================

/**
 * Tagged hook selector.
 */
export type HookSelector =
  | { kind: 'wildcard' }
  | { kind: 'step'; step: number };

/**
 * Selector accepted at registration: a step number or '*'.
 */
export type HookSelectorInput = number | typeof WILDCARD;

/**
 * Hook callback. `null`/`undefined` means "continue the pipeline".
 */
export type HookCallback<TContext, TResult> = (
  context: TContext
) => TResult | null | undefined | void | Promise<TResult | null | undefined | void>;

// =============================================================================
// Selector Helpers
// =============================================================================

export function toHookSelector(input: HookSelectorInput): HookSelector {
  if (input === WILDCARD) {
    return { kind: 'wildcard' };
  }
  if (!Number.isInteger(input)) {
    throw new RangeError(`Hook selector must be an integer step or '${WILDCARD}', got ${input}`);
  }
  return { kind: 'step', step: input };
}

function selectorKey(selector: HookSelector): string {
  return selector.kind === 'wildcard' ? WILDCARD : `step:${selector.step}`;
}

// =============================================================================
// Registry
// =============================================================================

export class HookRegistry<TContext, TResult> {
  private readonly hooks = new Map<string, HookCallback<TContext, TResult>>();

  /**
   * Register a callback. The last registration for a selector wins.
   */
  register(selector: HookSelectorInput | HookSelector, callback: HookCallback<TContext, TResult>): this {
    const tagged = typeof selector === 'object' ? selector : toHookSelector(selector);
    this.hooks.set(selectorKey(tagged), callback);
    return this;
  }

  get(selector: HookSelector): HookCallback<TContext, TResult> | undefined {
    return this.hooks.get(selectorKey(selector));
  }

  has(selector: HookSelector): boolean {
    return this.hooks.has(selectorKey(selector));
  }

  /**
   * Run the wildcard callback, then (only if it produced nothing) the
   * callback registered for `step`.
   *
   * @returns The first non-empty result, or null
   */
  async dispatch(step: number, context: TContext): Promise<Awaited<TResult> | null> {
    const wildcard = await invoke(this.get({ kind: 'wildcard' }), context);
    if (wildcard !== null) {
      return wildcard;
    }
    return invoke(this.get({ kind: 'step', step }), context);
  }
}

async function invoke<TContext, TResult>(
  callback: HookCallback<TContext, TResult> | undefined,
  context: TContext
): Promise<Awaited<TResult> | null> {
  if (!callback) {
    return null;
  }
  const result = await callback(context);
  return isPresent(result) ? result : null;
}

function isPresent<T>(value: T | null | undefined | void): value is T {
  return value !== null && value !== undefined;
}
