/**
 * Core Domain
 *
 * Step state machine, step registry and hook registry for multi-step forms.
 * Pure types and logic, independent of transport and storage.
 */

export * from './multi-step-form.js';
export * from './step-registry.js';
export * from './hook-registry.js';
