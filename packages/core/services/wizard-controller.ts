/**
 * WizardController
 *
 * Drives one multi-step form instance for one request.
 *
 * Read requests render the current view of the form. Submissions run the
 * pipeline below; every stage may end the request early:
 *
 *   1. before hooks (wildcard, then step-specific); no mutation on veto
 *   2. validation; FormValidationError propagates, no mutation
 *   3. save: validated fields merged into the bucket and persisted
 *   4. after hooks; a veto does NOT roll back stage 3
 *   5. advance: 0 → 1, n → n+1, terminal step is absorbing
 *   6. render for structured callers, redirect-to-self otherwise
 *
 * The controller holds no state between requests apart from the session
 * bucket; construct one per request.
 */

import type { Logger } from 'pino';
import { z, type ZodTypeAny } from 'zod';
import {
  DEFAULT_FORM_NAMESPACE,
  FIRST_STEP,
  FORM_STEP_FIELD,
  RESET_STEP,
  nextStep,
  parseStep,
  resolveStep,
  type FormData,
  type FormRules,
  type StepConfig,
  type StepDefinition,
} from '../domain/multi-step-form.js';
import { StepRegistry } from '../domain/step-registry.js';
import {
  HookRegistry,
  type HookCallback,
  type HookSelectorInput,
} from '../domain/hook-registry.js';
import { isReadRequest, type FormRequest } from '../ports/form-request.js';
import {
  isFormValidationError,
  type FormValidationError,
  type IFormValidator,
} from '../ports/form-validator.js';
import type { ISessionStore } from '../ports/session-store.js';
import type { FormView, IViewRenderer } from '../ports/view-renderer.js';
import {
  jsonResponse,
  redirectResponse,
  viewResponse,
  type WizardPayload,
  type WizardResponse,
} from '../ports/wizard-response.js';
import { SessionBucket } from './session-bucket.js';

// =============================================================================
// Types
// =============================================================================

/**
 * Hook callback. Receives the controller; returning a response ends the
 * request with it.
 */
export type WizardHook = HookCallback<WizardController, WizardResponse>;

/**
 * Options for creating a WizardController.
 */
export interface WizardControllerOptions {
  /** Inbound request */
  request: FormRequest;
  /** Session loaded for this request */
  session: ISessionStore;
  /** Validation engine */
  validator: IFormValidator;
  /** Logger instance */
  logger: Logger;
  /** Template identifier; null serves structured payloads only */
  view?: string | null;
  /** Template renderer (required when `view` is set) */
  renderer?: IViewRenderer;
  /** Extra context merged into every render */
  data?: FormData;
  /** Session namespace (default: multistep-form) */
  namespace?: string;
}

interface Template {
  view: string;
  renderer: IViewRenderer;
}

// =============================================================================
// Step Indicator Rule
// =============================================================================

/**
 * Mandatory rule on the step indicator: an integer (or integer string, as
 * read by parseStep) within [FIRST_STEP, lastStep].
 */
export function stepIndicatorRule(lastStep: number): ZodTypeAny {
  const range = `The form step must be between ${FIRST_STEP} and ${lastStep}.`;
  return z.preprocess(
    (value) => parseStep(value) ?? value,
    z
      .number({
        required_error: 'The form step is required.',
        invalid_type_error: 'The form step must be a number.',
      })
      .int('The form step must be an integer.')
      .min(FIRST_STEP, range)
      .max(lastStep, range)
  );
}

// =============================================================================
// Implementation
// =============================================================================

export class WizardController implements FormView {
  public namespace: string = DEFAULT_FORM_NAMESPACE;
  public readonly steps = new StepRegistry();
  public readonly before = new HookRegistry<WizardController, WizardResponse>();
  public readonly after = new HookRegistry<WizardController, WizardResponse>();

  private request: FormRequest;
  private readonly session: ISessionStore;
  private readonly validator: IFormValidator;
  private readonly template: Template | null;
  private readonly data: FormData;
  private readonly log: Logger;

  /** Per-request step override set by reset; never persisted directly */
  private stepOverride: number | null = null;

  constructor(options: WizardControllerOptions) {
    this.request = options.request;
    this.session = options.session;
    this.validator = options.validator;
    this.data = options.data ?? {};
    this.log = options.logger.child({ component: 'WizardController' });

    const view = options.view ?? null;
    if (view !== null && !options.renderer) {
      throw new TypeError(`A renderer is required to serve view "${view}"`);
    }
    this.template = view !== null && options.renderer ? { view, renderer: options.renderer } : null;

    if (options.namespace !== undefined) {
      this.namespaced(options.namespace);
    }
  }

  // ===========================================================================
  // Configuration
  // ===========================================================================

  /**
   * Set the session namespace.
   */
  namespaced(namespace: string): this {
    if (namespace.length === 0 || namespace.includes('.')) {
      throw new RangeError(`Invalid form namespace "${namespace}"`);
    }
    this.namespace = namespace;
    return this;
  }

  /**
   * Hand the controller to a configurator (reusable form definitions).
   */
  tap(configure: (form: this) => unknown): this {
    configure(this);
    return this;
  }

  /**
   * Register a before-validation hook for a step or '*'.
   */
  beforeStep(selector: HookSelectorInput, hook: WizardHook): this {
    this.before.register(selector, hook);
    return this;
  }

  /**
   * Register an after-validation hook for a step or '*'.
   */
  onStep(selector: HookSelectorInput, hook: WizardHook): this {
    this.after.register(selector, hook);
    return this;
  }

  /**
   * Register or overwrite a step's configuration.
   */
  addStep(step: number, config: StepDefinition = {}): this {
    this.steps.addStep(step, config);
    return this;
  }

  // ===========================================================================
  // Step Resolution
  // ===========================================================================

  /**
   * Active step: per-request override, then the persisted pointer, then 1.
   */
  currentStep(): number {
    if (this.stepOverride !== null) {
      return this.stepOverride;
    }
    return resolveStep(this.request.get(FORM_STEP_FIELD), this.bucket.step());
  }

  isStep(step: number = FIRST_STEP): boolean {
    return this.currentStep() === step;
  }

  lastStep(): number {
    return this.steps.lastStep();
  }

  /**
   * Configuration for a step (default: the current step).
   */
  stepConfig(step?: number): StepConfig {
    return this.steps.get(step ?? this.currentStep());
  }

  // ===========================================================================
  // Bucket Access
  // ===========================================================================

  getValue(key: string, fallback: unknown = null): unknown {
    return this.bucket.get(key, fallback);
  }

  /**
   * Merge one value into the bucket. Flushed by the next persist.
   */
  setValue(key: string, value: unknown): this {
    this.bucket.merge({ [key]: value });
    return this;
  }

  /**
   * Discard accumulated data and restart the sequence: the bucket is
   * replaced with `data` and the current request resolves to the reset
   * sentinel so its advance lands on step 1.
   *
   * Synchronous; inside the pipeline the replaced bucket is persisted before
   * the response is produced, even when a hook ends the request.
   */
  reset(data: FormData = {}): this {
    this.stepOverride = RESET_STEP;
    this.bucket.replace(data);
    this.log.info({ namespace: this.namespace, keys: Object.keys(data) }, 'Form reset');
    return this;
  }

  toArray(): FormData {
    return this.bucket.load();
  }

  toMap(): Map<string, unknown> {
    return new Map(Object.entries(this.toArray()));
  }

  // ===========================================================================
  // Request Handling
  // ===========================================================================

  /**
   * Produce the response for the bound request (or `request`, rebinding it).
   *
   * @throws FormValidationError when a submission fails validation
   */
  async toResponse(request?: FormRequest): Promise<WizardResponse> {
    if (request) {
      this.request = request;
    }
    if (isReadRequest(this.request)) {
      return this.renderResponse();
    }
    return this.handleRequest();
  }

  /**
   * Structured payload for the current step.
   */
  toPayload(): WizardPayload {
    return {
      data: { ...this.data, ...this.stepConfig().data },
      form: this.toArray(),
    };
  }

  /**
   * Response for a submission that failed validation: the view re-rendered
   * with `errors` and `old` input for templated callers, otherwise
   * `422 { message, errors }`.
   */
  toErrorResponse(error: FormValidationError): WizardResponse {
    if (this.template && !this.request.wantsJson()) {
      const body = this.template.renderer.render(this.template.view, {
        ...this.data,
        errors: error.errors,
        old: this.request.input(),
        form: this,
      });
      return viewResponse(body, error.statusCode);
    }
    return jsonResponse({ message: error.message, errors: error.errors }, error.statusCode);
  }

  protected renderResponse(): WizardResponse {
    if (this.template && !this.request.wantsJson()) {
      const body = this.template.renderer.render(this.template.view, { ...this.data, form: this });
      return viewResponse(body);
    }
    return jsonResponse(this.toPayload());
  }

  protected async handleRequest(): Promise<WizardResponse> {
    const vetoed = await this.before.dispatch(this.currentStep(), this);
    if (vetoed) {
      this.log.debug({ namespace: this.namespace, step: this.currentStep() }, 'Before hook ended request');
      await this.persistReset();
      return vetoed;
    }

    await this.save(this.validate());

    const interrupted = await this.after.dispatch(this.currentStep(), this);
    if (interrupted) {
      this.log.debug({ namespace: this.namespace, step: this.currentStep() }, 'After hook ended request');
      await this.persistReset();
      return interrupted;
    }

    await this.advance();

    if (!this.request.wantsJson()) {
      return redirectResponse(this.request.url);
    }
    return this.renderResponse();
  }

  /**
   * Validate the request against the current step's rules plus the step
   * indicator rule.
   *
   * @returns Validated fields only
   */
  protected validate(): FormData {
    const step = this.currentStep();
    const config = this.stepConfig(step);
    const rules: FormRules = {
      ...config.rules,
      [FORM_STEP_FIELD]: stepIndicatorRule(this.lastStep()),
    };

    try {
      return this.validator.validate(this.request.input(), rules, config.messages);
    } catch (error) {
      if (isFormValidationError(error)) {
        this.log.warn({ namespace: this.namespace, step, fields: error.fields() }, 'Form step failed validation');
      }
      throw error;
    }
  }

  /**
   * Merge validated fields into the bucket, stamp the resolved step and
   * persist.
   */
  protected async save(fields: FormData): Promise<void> {
    this.bucket.merge(fields, this.currentStep());
    await this.bucket.persist();
  }

  /**
   * Persist the step that follows the resolved one.
   */
  protected async advance(): Promise<void> {
    const resolved = this.currentStep();
    const next = nextStep(resolved, this.lastStep());
    if (next === null) {
      this.log.debug({ namespace: this.namespace, step: resolved }, 'Terminal step, not advancing');
      return;
    }
    this.bucket.setStep(next);
    await this.bucket.persist();
    this.log.debug({ namespace: this.namespace, from: resolved, to: next }, 'Step advanced');
  }

  /**
   * Flush a reset made by a hook that ended the request.
   */
  private async persistReset(): Promise<void> {
    if (this.stepOverride !== null) {
      await this.bucket.persist();
    }
  }

  private get bucket(): SessionBucket {
    return new SessionBucket(this.session, this.namespace);
  }
}

// =============================================================================
// Factory
// =============================================================================

/**
 * Create a wizard controller.
 *
 * @param options - Controller options
 * @returns Wizard controller instance
 */
export function createWizardController(options: WizardControllerOptions): WizardController {
  return new WizardController(options);
}
