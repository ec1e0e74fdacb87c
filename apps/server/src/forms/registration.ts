/**
 * Registration Wizard
 *
 * Three steps: account → profile → confirm.
 *
 * Completing the confirm step resets the form, keeping only the email and
 * the completion time; from then on the wildcard before-hook refuses every
 * submission for that session.
 */

import { z } from 'zod';
import { jsonResponse } from '@stepwise/core/ports';
import type { WizardController } from '@stepwise/core/services';

export const REGISTRATION_VIEW = 'registration';

export const ACCOUNT_STEP = 1;
export const PROFILE_STEP = 2;
export const CONFIRM_STEP = 3;

export interface RegistrationOptions {
  /** Clock used for the completion timestamp */
  clock?: () => Date;
}

/**
 * Build the registration form definition.
 */
export function defineRegistration(options: RegistrationOptions = {}): (form: WizardController) => void {
  const clock = options.clock ?? (() => new Date());

  return (form) => {
    form
      .addStep(ACCOUNT_STEP, {
        rules: {
          email: z.string().trim().toLowerCase().email(),
          username: z.string().trim().min(3).max(20),
        },
        messages: {
          email: 'Enter a valid email address.',
          'username.too_small': 'Username must be at least 3 characters.',
        },
        data: { title: 'Create your account' },
      })
      .addStep(PROFILE_STEP, {
        rules: {
          name: z.string().trim().min(1),
          company: z.string().trim().max(100).optional(),
        },
        messages: {
          'name.too_small': 'Tell us your name.',
        },
        data: { title: 'Tell us about yourself' },
      })
      .addStep(CONFIRM_STEP, {
        rules: {
          accept_terms: z.enum(['on', 'yes', 'true', '1']),
        },
        messages: {
          accept_terms: 'You must accept the terms to continue.',
        },
        data: { title: 'Review and confirm' },
      })
      .beforeStep('*', (wizard) => {
        if (wizard.getValue('completed_at') !== null) {
          return jsonResponse({ message: 'Registration has already been completed.' }, 409);
        }
        return null;
      })
      .onStep(CONFIRM_STEP, (wizard) => {
        wizard.reset({
          email: wizard.getValue('email'),
          completed_at: clock().toISOString(),
        });
      });
  };
}
