/**
 * ZodFormValidator
 *
 * IFormValidator backed by zod. Step rules are zod schemas keyed by field;
 * they are combined into one object schema so fields without a rule are
 * stripped from the result.
 */

import { z, type ZodError } from 'zod';
import {
  FormValidationError,
  type FieldErrors,
  type IFormValidator,
} from '@stepwise/core/ports';
import type { FormData, FormMessages, FormRules } from '@stepwise/core/domain';

/**
 * Errors not tied to a field are reported under this key.
 */
export const FORM_ERROR_KEY = '_form';

export class ZodFormValidator implements IFormValidator {
  validate(input: FormData, rules: FormRules, messages: FormMessages): FormData {
    const result = z.object(rules).safeParse(input);
    if (result.success) {
      return result.data;
    }
    throw new FormValidationError(collectFieldErrors(result.error, messages));
  }
}

/**
 * Group zod issues by field path, resolving custom messages by
 * `field.issueCode`, then `field`, then zod's own message.
 */
export function collectFieldErrors(error: ZodError, messages: FormMessages = {}): FieldErrors {
  const errors: FieldErrors = {};
  for (const issue of error.issues) {
    const field = issue.path.length > 0 ? issue.path.join('.') : FORM_ERROR_KEY;
    const message = messages[`${field}.${issue.code}`] ?? messages[field] ?? issue.message;
    (errors[field] ??= []).push(message);
  }
  return errors;
}

/**
 * Create a zod-backed form validator.
 */
export function createZodFormValidator(): IFormValidator {
  return new ZodFormValidator();
}
