/**
 * Step Registry
 *
 * Holds per-step configuration keyed by step number.
 * The highest registered key is the terminal step; it gates both the legal
 * range of the step indicator and advancement.
 */

import { FIRST_STEP, type StepConfig, type StepDefinition } from './multi-step-form.js';

export class StepRegistry {
  private readonly steps = new Map<number, StepDefinition>();

  /**
   * Register or overwrite the configuration for a step.
   */
  addStep(step: number, config: StepDefinition = {}): this {
    if (!Number.isInteger(step) || step < FIRST_STEP) {
      throw new RangeError(`Step must be a positive integer, got ${step}`);
    }
    this.steps.set(step, config);
    return this;
  }

  has(step: number): boolean {
    return this.steps.has(step);
  }

  /**
   * Configuration for a step; the empty configuration when unregistered.
   */
  get(step: number): StepConfig {
    const definition = this.steps.get(step);
    return {
      rules: definition?.rules ?? {},
      messages: definition?.messages ?? {},
      data: definition?.data ?? {},
    };
  }

  /**
   * Maximum registered step, or FIRST_STEP when nothing is registered.
   */
  lastStep(): number {
    let last: number | null = null;
    for (const step of this.steps.keys()) {
      if (last === null || step > last) {
        last = step;
      }
    }
    return last ?? FIRST_STEP;
  }

  /**
   * Registered step numbers in ascending order.
   */
  keys(): number[] {
    return [...this.steps.keys()].sort((a, b) => a - b);
  }

  get size(): number {
    return this.steps.size;
  }
}
