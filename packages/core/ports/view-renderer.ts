/**
 * IViewRenderer Interface
 *
 * Port for the template renderer used by the templated response path.
 */

import type { FormData, StepConfig } from '../domain/multi-step-form.js';

/**
 * Read-only view of a form instance handed to templates as `form`.
 */
export interface FormView {
  readonly namespace: string;
  currentStep(): number;
  isStep(step?: number): boolean;
  lastStep(): number;
  stepConfig(step?: number): StepConfig;
  getValue(key: string, fallback?: unknown): unknown;
  toArray(): FormData;
}

/**
 * Template context: constructor data plus the form itself.
 */
export type ViewContext = FormData & { form: FormView };

export interface IViewRenderer {
  /**
   * Render a template.
   *
   * @param templateId - Template identifier
   * @param context - Merged context data
   * @returns Response body
   */
  render(templateId: string, context: ViewContext): string;
}
