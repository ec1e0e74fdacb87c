/**
 * Wizard Adapters
 *
 * Exports adapter implementations for the multi-step form core:
 * - InMemorySessionStore / RedisSessionStore - session backends
 * - ZodFormValidator - validation engine
 * - ViewRegistryRenderer - template renderer
 * - ExpressFormRequest / createWizardHandler - HTTP transport
 */

// Session attribute bag
export {
  SessionAttributes,
  isAttributes,
  serializeAttributes,
  deserializeAttributes,
} from './session-attributes.js';

// In-Memory Session Store
export {
  InMemorySessionStore,
  InMemorySessionStoreFactory,
  type InMemorySessionStoreOptions,
} from './in-memory-session-store.js';

// Redis Session Store
export {
  RedisSessionStore,
  RedisSessionStoreFactory,
  createRedisSessionStoreFactory,
  type RedisClient,
  type RedisSessionStoreOptions,
} from './redis-session-store.js';

// Validator
export {
  ZodFormValidator,
  createZodFormValidator,
  collectFieldErrors,
  FORM_ERROR_KEY,
} from './zod-form-validator.js';

// Renderer
export {
  ViewRegistryRenderer,
  ViewNotFoundError,
  type View,
} from './view-registry-renderer.js';

// Express
export { ExpressFormRequest } from './express-form-request.js';
export {
  createWizardHandler,
  sendWizardResponse,
  resolveSessionId,
  asyncHandler,
  DEFAULT_SESSION_HEADER,
  DEFAULT_SESSION_COOKIE,
  type WizardHandlerOptions,
} from './express-wizard-handler.js';
