/**
 * ZodFormValidator Tests
 */

import { describe, it, expect } from 'vitest';
import { z } from 'zod';
import { FormValidationError } from '@stepwise/core/ports';
import { FORM_ERROR_KEY, ZodFormValidator, collectFieldErrors } from '../zod-form-validator.js';

function validationError(run: () => unknown): FormValidationError {
  try {
    run();
  } catch (error) {
    if (error instanceof FormValidationError) {
      return error;
    }
    throw error;
  }
  throw new Error('Expected a FormValidationError');
}

describe('ZodFormValidator', () => {
  const validator = new ZodFormValidator();

  it('should return only fields covered by a rule', () => {
    const result = validator.validate(
      { name: ' Ada ', form_step: '1', is_admin: 'true' },
      { name: z.string().trim(), form_step: z.coerce.number() },
      {}
    );

    expect(result).toEqual({ name: 'Ada', form_step: 1 });
  });

  it('should group messages by field', () => {
    const error = validationError(() =>
      validator.validate({ email: 'nope', age: 'x' }, { email: z.string().email(), age: z.coerce.number() }, {})
    );

    expect(error.fields().sort()).toEqual(['age', 'email']);
    expect(error.first('email')).toBe('Invalid email');
    expect(error.statusCode).toBe(422);
  });

  it('should prefer field.code messages over field messages', () => {
    const error = validationError(() =>
      validator.validate(
        { username: 'ab' },
        { username: z.string().min(3) },
        { 'username.too_small': 'Too short.', username: 'Invalid username.' }
      )
    );

    expect(error.errors).toEqual({ username: ['Too short.'] });
  });

  it('should fall back to the field message', () => {
    const error = validationError(() =>
      validator.validate({}, { terms: z.literal('yes') }, { terms: 'Accept the terms.' })
    );

    expect(error.errors).toEqual({ terms: ['Accept the terms.'] });
  });
});

describe('collectFieldErrors', () => {
  it('should report path-less issues under the form key', () => {
    const result = z
      .string()
      .refine(() => false, { message: 'Form rejected' })
      .safeParse('anything');
    if (result.success) {
      throw new Error('Expected a failed parse');
    }

    expect(collectFieldErrors(result.error)).toEqual({ [FORM_ERROR_KEY]: ['Form rejected'] });
  });

  it('should join nested paths with dots', () => {
    const result = z.object({ address: z.object({ city: z.string() }) }).safeParse({ address: {} });
    if (result.success) {
      throw new Error('Expected a failed parse');
    }

    expect(collectFieldErrors(result.error, { 'address.city': 'City is required.' })).toEqual({
      'address.city': ['City is required.'],
    });
  });
});
