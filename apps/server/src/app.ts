import express, { type Express } from 'express';
import cookieParser from 'cookie-parser';
import type { Logger } from 'pino';
import type { ISessionStoreFactory, IFormValidator } from '@stepwise/core/ports';
import { ViewRegistryRenderer, createWizardHandler } from '@stepwise/adapters/wizard';
import type { Config } from './config.js';
import { createErrorHandler, notFoundHandler, requestIdMiddleware } from './api/middleware.js';
import { REGISTRATION_VIEW, defineRegistration, type RegistrationOptions } from './forms/registration.js';
import { registrationView } from './views/registration.js';

/**
 * Dependencies for the app factory
 */
export interface AppDeps {
  config: Pick<Config, 'sessionHeader' | 'sessionCookie' | 'formNamespace'>;
  logger: Logger;
  sessions: ISessionStoreFactory;
  validator: IFormValidator;
  registration?: RegistrationOptions;
}

/**
 * Build the express application.
 */
export function createApp(deps: AppDeps): Express {
  const app = express();

  app.disable('x-powered-by');
  app.use(requestIdMiddleware);
  app.use(cookieParser());
  app.use(express.json());
  app.use(express.urlencoded({ extended: false }));

  const renderer = new ViewRegistryRenderer({ [REGISTRATION_VIEW]: registrationView });

  const registration = createWizardHandler({
    sessions: deps.sessions,
    validator: deps.validator,
    renderer,
    logger: deps.logger,
    view: REGISTRATION_VIEW,
    data: { appName: 'Stepwise' },
    namespace: `${deps.config.formNamespace}-registration`,
    sessionHeader: deps.config.sessionHeader,
    sessionCookie: deps.config.sessionCookie,
    define: defineRegistration(deps.registration),
  });

  app.get('/health', (_req, res) => {
    res.status(200).json({ status: 'ok' });
  });

  app.route('/register').get(registration).post(registration);

  app.use(notFoundHandler);
  app.use(createErrorHandler(deps.logger));

  return app;
}
