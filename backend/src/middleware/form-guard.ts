import type { APIGatewayProxyResult } from 'aws-lambda';
import { ERRORS, type RequestSource, type SecurityCheck, type SessionStore } from '@formguard/shared';
import { Honeypot } from '../checks/honeypot.js';
import { FormTimer } from '../checks/form-timer.js';
import { DynamicFormField } from '../checks/dynamic-form-field.js';
import { error } from '../utils/response.js';
import { config } from '../config.js';

export interface FormGuardChecks {
  honeypot: Honeypot | null;
  formTimer: FormTimer | null;
  dynamicField: DynamicFormField | null;
}

export interface FormGuardResult {
  valid: boolean;
  isRequest: boolean;
  checks: FormGuardChecks;
  errorResponse: APIGatewayProxyResult | null;
}

export interface FormGuardOptions {
  now?: () => number;
  recentNames?: Set<string>;
}

// Builds every check enabled for this environment. Constructing a check
// evaluates it, and the session-backed ones rotate their stored state, so
// call this exactly once per request.
export function createChecks(
  request: RequestSource,
  session: SessionStore,
  options: FormGuardOptions = {},
): FormGuardChecks {
  const { features, formGuard } = config;
  return {
    honeypot: features.honeypotEnabled ? new Honeypot(request, formGuard.honeypotFieldName) : null,
    formTimer: features.formTimerEnabled
      ? new FormTimer(request, session, {
          useSession: formGuard.formTimerUseSession,
          sessionFieldName: formGuard.formTimerSessionFieldName,
          formFieldName: formGuard.formTimerFieldName,
          minRequestTime: formGuard.minRequestTimeSeconds,
          now: options.now,
        })
      : null,
    dynamicField: features.dynamicFieldEnabled
      ? new DynamicFormField(
          request,
          session,
          formGuard.dynamicFieldValue,
          formGuard.dynamicFieldSessionFieldName,
          options.recentNames,
        )
      : null,
  };
}

function enabledChecks(checks: FormGuardChecks): SecurityCheck[] {
  return [checks.honeypot, checks.formTimer, checks.dynamicField].filter(
    (check): check is Honeypot | FormTimer | DynamicFormField => check !== null,
  );
}

// Runs the enabled checks against a form submission. A submission passes only
// when every enabled check saw its data and found it valid; with no check
// enabled everything passes.
//
// Returns { valid: true } on success, or { errorResponse } with a 403 body so
// handlers can return early.
export function validateFormGuard(
  request: RequestSource,
  session: SessionStore,
  options: FormGuardOptions = {},
): FormGuardResult {
  const checks = createChecks(request, session, options);
  const active = enabledChecks(checks);

  const isRequest = active.some((check) => check.isRequest());
  const valid = active.every((check) => check.isValidRequest());

  if (!valid) {
    const message = isRequest ? ERRORS.FORM_REJECTED : ERRORS.FORM_DATA_MISSING;
    return { valid, isRequest, checks, errorResponse: error(message, 403) };
  }
  return { valid, isRequest, checks, errorResponse: null };
}

// Markup the next render must embed for the enabled checks to work.
export function buildGuardMarkup(checks: FormGuardChecks, asXhtml = false): { fields: string; css: string } {
  const fields: string[] = [];
  let css = '';
  if (checks.honeypot) {
    fields.push(checks.honeypot.buildFormField(true, config.formGuard.hideClassName));
    css = checks.honeypot.buildCss(config.formGuard.hideClassName);
  }
  if (checks.formTimer) {
    const timerField = checks.formTimer.buildHiddenFieldHtml(asXhtml);
    if (timerField) fields.push(timerField);
  }
  if (checks.dynamicField) {
    fields.push(checks.dynamicField.buildHiddenFieldHtml(asXhtml));
  }
  return { fields: fields.join('\n'), css };
}
