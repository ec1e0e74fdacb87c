/**
 * Core Services
 *
 * Session bucket and the wizard controller that orchestrates the step
 * pipeline over the core ports.
 */

export { SessionBucket } from './session-bucket.js';

export {
  WizardController,
  createWizardController,
  stepIndicatorRule,
  type WizardHook,
  type WizardControllerOptions,
} from './wizard-controller.js';
