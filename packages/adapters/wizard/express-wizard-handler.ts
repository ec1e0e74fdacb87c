/**
 * Express Wizard Handler
 *
 * Serves a multi-step form from an express route. Per request it opens the
 * caller's session, builds a WizardController, applies the form definition,
 * runs the pipeline, flushes the session and sends the result.
 *
 * Sessions are identified by a header (default `x-session-id`) for API
 * callers and by a cookie (default `stepwise_session`, read through
 * cookie-parser's `req.cookies`) for browsers. A missing or malformed id
 * starts a new session; the id is echoed back in both carriers.
 */

import { randomUUID } from 'node:crypto';
import type { Request, Response, NextFunction, RequestHandler } from 'express';
import type { Logger } from 'pino';
import type { FormData } from '@stepwise/core/domain';
import {
  isFormValidationError,
  type IFormValidator,
  type ISessionStoreFactory,
  type IViewRenderer,
  type WizardResponse,
} from '@stepwise/core/ports';
import { WizardController } from '@stepwise/core/services';
import { ExpressFormRequest } from './express-form-request.js';
import { isAttributes } from './session-attributes.js';

// =============================================================================
// Types
// =============================================================================

/**
 * Options for creating a wizard route handler.
 */
export interface WizardHandlerOptions {
  /** Session backend */
  sessions: ISessionStoreFactory;
  /** Validation engine */
  validator: IFormValidator;
  /** Logger instance */
  logger: Logger;
  /** Form definition applied to every controller */
  define: (form: WizardController) => unknown;
  /** Template identifier (null: structured payloads only) */
  view?: string | null;
  /** Template renderer, required with `view` */
  renderer?: IViewRenderer;
  /** Extra render context, static or per request */
  data?: FormData | ((req: Request) => FormData);
  /** Session namespace */
  namespace?: string;
  /** Header carrying the session id (default: x-session-id) */
  sessionHeader?: string;
  /** Cookie carrying the session id (default: stepwise_session; null disables) */
  sessionCookie?: string | null;
}

export const DEFAULT_SESSION_HEADER = 'x-session-id';
export const DEFAULT_SESSION_COOKIE = 'stepwise_session';

const SESSION_ID_PATTERN = /^[A-Za-z0-9_-]{8,128}$/;

// =============================================================================
// Helpers
// =============================================================================

/**
 * Async handler wrapper
 */
export function asyncHandler(
  fn: (req: Request, res: Response, next: NextFunction) => Promise<void>
): RequestHandler {
  return (req: Request, res: Response, next: NextFunction) => {
    Promise.resolve(fn(req, res, next)).catch(next);
  };
}

function isSessionId(value: unknown): value is string {
  return typeof value === 'string' && SESSION_ID_PATTERN.test(value);
}

/**
 * Session id from the request header, then the session cookie, or a fresh one.
 */
export function resolveSessionId(
  req: Request,
  header: string = DEFAULT_SESSION_HEADER,
  cookie: string | null = DEFAULT_SESSION_COOKIE
): string {
  const fromHeader = req.get(header);
  if (isSessionId(fromHeader)) {
    return fromHeader;
  }
  if (cookie !== null) {
    const cookies: unknown = req.cookies;
    const fromCookie = isAttributes(cookies) ? cookies[cookie] : undefined;
    if (isSessionId(fromCookie)) {
      return fromCookie;
    }
  }
  return randomUUID();
}

/**
 * Write a wizard response to an express response.
 */
export function sendWizardResponse(res: Response, response: WizardResponse): void {
  switch (response.kind) {
    case 'view':
      res.status(response.status).type('html').send(response.body);
      return;
    case 'json':
      res.status(response.status).json(response.body);
      return;
    case 'redirect':
      res.redirect(response.status, response.location);
      return;
  }
}

// =============================================================================
// Handler Factory
// =============================================================================

/**
 * Create an express handler serving a multi-step form.
 *
 * @param options - Handler options
 * @returns Express request handler (mount for GET and POST)
 */
export function createWizardHandler(options: WizardHandlerOptions): RequestHandler {
  const log = options.logger.child({ component: 'WizardHandler' });
  const header = options.sessionHeader ?? DEFAULT_SESSION_HEADER;
  const cookie = options.sessionCookie === undefined ? DEFAULT_SESSION_COOKIE : options.sessionCookie;

  return asyncHandler(async (req: Request, res: Response) => {
    const sessionId = resolveSessionId(req, header, cookie);
    res.setHeader(header, sessionId);
    if (cookie !== null) {
      res.cookie(cookie, sessionId, { httpOnly: true, sameSite: 'lax', path: '/' });
    }

    const session = await options.sessions.open(sessionId);
    const form = new WizardController({
      request: new ExpressFormRequest(req),
      session,
      validator: options.validator,
      renderer: options.renderer,
      logger: options.logger,
      view: options.view,
      data: typeof options.data === 'function' ? options.data(req) : options.data,
      namespace: options.namespace,
    }).tap(options.define);

    let response: WizardResponse;
    try {
      response = await form.toResponse();
    } catch (error) {
      if (!isFormValidationError(error)) {
        throw error;
      }
      response = form.toErrorResponse(error);
    }

    await session.save();

    log.debug(
      { sessionId, method: req.method, kind: response.kind, status: response.status },
      'Wizard request handled'
    );
    sendWizardResponse(res, response);
  });
}
