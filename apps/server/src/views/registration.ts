import type { ViewContext } from '@stepwise/core/ports';
import { ACCOUNT_STEP, CONFIRM_STEP, PROFILE_STEP } from '../forms/registration.js';

interface FieldSpec {
  name: string;
  label: string;
  type: 'text' | 'email' | 'checkbox';
}

const FIELDS: Record<number, FieldSpec[]> = {
  [ACCOUNT_STEP]: [
    { name: 'email', label: 'Email', type: 'email' },
    { name: 'username', label: 'Username', type: 'text' },
  ],
  [PROFILE_STEP]: [
    { name: 'name', label: 'Full name', type: 'text' },
    { name: 'company', label: 'Company', type: 'text' },
  ],
  [CONFIRM_STEP]: [{ name: 'accept_terms', label: 'I accept the terms', type: 'checkbox' }],
};

const ESCAPES: Record<string, string> = {
  '&': '&amp;',
  '<': '&lt;',
  '>': '&gt;',
  '"': '&quot;',
  "'": '&#39;',
};

export function escapeHtml(value: unknown): string {
  const text = value === null || value === undefined ? '' : String(value);
  return text.replace(/[&<>"']/g, (char) => ESCAPES[char] ?? char);
}

function stringRecord(value: unknown): Record<string, unknown> {
  return typeof value === 'object' && value !== null ? Object.fromEntries(Object.entries(value)) : {};
}

function errorsFor(errors: Record<string, unknown>, field: string): string[] {
  const messages = errors[field];
  return Array.isArray(messages) ? messages.map((message) => String(message)) : [];
}

function renderField(field: FieldSpec, value: unknown, errors: string[]): string {
  const id = `field-${field.name}`;
  const input =
    field.type === 'checkbox'
      ? `<input id="${id}" type="checkbox" name="${field.name}" value="yes">`
      : `<input id="${id}" type="${field.type}" name="${field.name}" value="${escapeHtml(value)}">`;
  const messages = errors.map((message) => `<p class="error">${escapeHtml(message)}</p>`).join('');
  return `<div class="field"><label for="${id}">${escapeHtml(field.label)}</label>${input}${messages}</div>`;
}

/**
 * Registration page for the current step.
 */
export function registrationView(context: ViewContext): string {
  const { form } = context;
  const errors = stringRecord(context['errors']);
  const old = stringRecord(context['old']);
  const completedAt = form.getValue('completed_at');

  if (completedAt !== null) {
    return [
      `<h1>${escapeHtml(context['appName'])}</h1>`,
      `<p>Registration completed for ${escapeHtml(form.getValue('email'))}.</p>`,
    ].join('\n');
  }

  const step = form.currentStep();
  const config = form.stepConfig(step);
  const fields = (FIELDS[step] ?? [])
    .map((field) => renderField(field, old[field.name] ?? form.getValue(field.name), errorsFor(errors, field.name)))
    .join('\n');

  return [
    `<h1>${escapeHtml(context['appName'])}</h1>`,
    `<h2>${escapeHtml(config.data['title'])}</h2>`,
    `<p>Step ${step} of ${form.lastStep()}</p>`,
    `<form method="post">`,
    `<input type="hidden" name="form_step" value="${step}">`,
    fields,
    `<button type="submit">${step === form.lastStep() ? 'Finish' : 'Continue'}</button>`,
    `</form>`,
  ].join('\n');
}
