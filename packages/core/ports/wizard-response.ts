/**
 * Wizard Responses
 *
 * Transport-neutral response model produced by the wizard pipeline and by
 * hooks. The HTTP adapter turns these into real responses.
 */

import type { FormData } from '../domain/multi-step-form.js';

/**
 * Structured (non-templated) payload.
 */
export interface WizardPayload {
  /** Constructor data merged with the current step's extra data */
  data: FormData;
  /** Current bucket contents */
  form: FormData;
}

export type WizardResponse =
  | { kind: 'view'; status: number; body: string }
  | { kind: 'json'; status: number; body: unknown }
  | { kind: 'redirect'; status: number; location: string };

export function viewResponse(body: string, status = 200): WizardResponse {
  return { kind: 'view', status, body };
}

export function jsonResponse(body: unknown, status = 200): WizardResponse {
  return { kind: 'json', status, body };
}

export function redirectResponse(location: string, status = 302): WizardResponse {
  return { kind: 'redirect', status, location };
}
