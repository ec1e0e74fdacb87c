/**
 * Core Ports
 *
 * Contracts between the wizard core and its external collaborators:
 * session backend, HTTP request, validation engine and view renderer.
 */

// Session Store Interface
export * from './session-store.js';

// Inbound Request Interface
export * from './form-request.js';

// Validator Interface
export * from './form-validator.js';

// View Renderer Interface
export * from './view-renderer.js';

// Response Model
export * from './wizard-response.js';
