/**
 * IFormValidator Interface
 *
 * Port for the validation rule engine. Applies declared field rules to raw
 * input and either returns the validated fields (only those covered by a
 * rule) or throws a FormValidationError carrying per-field messages.
 */

import type { FormData, FormMessages, FormRules } from '../domain/multi-step-form.js';

/**
 * Validation messages grouped by field.
 */
export type FieldErrors = Record<string, string[]>;

export interface IFormValidator {
  /**
   * Validate input against rules.
   *
   * @param input - Raw submitted fields
   * @param rules - Effective ruleset
   * @param messages - Custom messages keyed by `field` or `field.issueCode`
   * @returns Validated fields; extraneous input is dropped
   * @throws FormValidationError when any rule fails
   */
  validate(input: FormData, rules: FormRules, messages: FormMessages): FormData;
}

/**
 * Raised when submitted input fails validation.
 * Recoverable by the caller; nothing was persisted.
 */
export class FormValidationError extends Error {
  readonly statusCode = 422;
  readonly errors: FieldErrors;

  constructor(errors: FieldErrors, message = 'The given data was invalid.') {
    super(message);
    this.name = 'FormValidationError';
    this.errors = errors;
  }

  /**
   * Fields that failed.
   */
  fields(): string[] {
    return Object.keys(this.errors);
  }

  /**
   * First message for a field, if any.
   */
  first(field: string): string | undefined {
    return this.errors[field]?.[0];
  }
}

export function isFormValidationError(error: unknown): error is FormValidationError {
  return error instanceof FormValidationError;
}
