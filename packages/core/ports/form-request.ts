/**
 * FormRequest Interface
 *
 * Port for the inbound HTTP request as the wizard sees it. Transport
 * parsing and content negotiation live in the adapter.
 */

import type { FormData } from '../domain/multi-step-form.js';

export interface FormRequest {
  /** Upper-case HTTP method */
  readonly method: string;

  /** URL the request was made to; target of redirect-to-self */
  readonly url: string;

  /**
   * Every submitted field (query and body).
   */
  input(): FormData;

  /**
   * One submitted field, or undefined.
   */
  get(key: string): unknown;

  /**
   * Whether the caller prefers a structured (JSON) response.
   */
  wantsJson(): boolean;
}

/**
 * Methods served by the read path; everything else is a submission.
 */
export const READ_METHODS: readonly string[] = ['GET', 'HEAD'];

export function isReadRequest(request: FormRequest): boolean {
  return READ_METHODS.includes(request.method.toUpperCase());
}
