import {
  FORM_TIMER_CONFIG,
  type RequestSource,
  type SecurityCheck,
  type SessionStore,
} from '@formguard/shared';
import { closeTag } from '../utils/html.js';

export interface FormTimerOptions {
  // Carry the render stamp in the session (true) or in a hidden form field (false).
  useSession: boolean;
  sessionFieldName: string;
  formFieldName?: string | null;
  minRequestTime?: number;
  // Wall clock in seconds.
  now?: () => number;
}

function clampMinRequestTime(seconds: number): number {
  // NaN never beats the floor.
  return seconds >= FORM_TIMER_CONFIG.DEFAULT_MIN_REQUEST_TIME
    ? seconds
    : FORM_TIMER_CONFIG.DEFAULT_MIN_REQUEST_TIME;
}

// Locale-formatted floats use a comma separator.
function parseStamp(raw: string): number {
  return parseFloat(raw.replace(/,/g, '.'));
}

export function encodeStamp(stamp: number): string {
  return FORM_TIMER_CONFIG.STAMP_PREFIX + Buffer.from(String(stamp), 'utf8').toString('base64');
}

export function decodeStamp(value: string): number {
  const encoded = value.slice(FORM_TIMER_CONFIG.STAMP_PREFIX.length);
  return parseStamp(Buffer.from(encoded, 'base64').toString('utf8'));
}

/**
 * Minimum-elapsed-time check between rendering a form and submitting it.
 *
 * The render stamp travels either in the session or in an encoded hidden
 * field. A submission is valid when at least `minRequestTime` seconds (never
 * less than 1.5) passed between the previous stamp and this request.
 */
export class FormTimer implements SecurityCheck {
  private useSession: boolean;
  private sessionFieldName: string;
  private formFieldName: string | null;
  private minRequestTime: number;
  private readonly currentFormStamp: number;
  private lastFormStamp: number | null = null;
  private requestSeen = false;
  private validRequest = false;

  constructor(
    private readonly request: RequestSource,
    private readonly session: SessionStore,
    options: FormTimerOptions,
  ) {
    this.useSession = options.useSession;
    this.sessionFieldName = options.sessionFieldName;
    this.formFieldName = options.formFieldName ?? null;
    this.minRequestTime = clampMinRequestTime(
      options.minRequestTime ?? FORM_TIMER_CONFIG.DEFAULT_MIN_REQUEST_TIME,
    );
    this.currentFormStamp = (options.now ?? (() => Date.now() / 1000))();
    this.reload();
  }

  getUseSession(): boolean {
    return this.useSession;
  }

  getSessionFieldName(): string {
    return this.sessionFieldName;
  }

  getFormFieldName(): string | null {
    return this.formFieldName;
  }

  getMinRequestTime(): number {
    return this.minRequestTime;
  }

  getCurrentFormStamp(): number {
    return this.currentFormStamp;
  }

  getLastFormStamp(): number | null {
    return this.lastFormStamp;
  }

  isRequest(): boolean {
    return this.requestSeen;
  }

  isValidRequest(): boolean {
    return this.validRequest;
  }

  setUseSession(useSession: boolean): this {
    this.useSession = useSession;
    return this;
  }

  setSessionFieldName(sessionFieldName: string): this {
    this.sessionFieldName = sessionFieldName;
    return this;
  }

  setFormFieldName(formFieldName: string | null): this {
    this.formFieldName = formFieldName;
    return this;
  }

  setMinRequestTime(minRequestTime: number = FORM_TIMER_CONFIG.DEFAULT_MIN_REQUEST_TIME): this {
    this.minRequestTime = clampMinRequestTime(minRequestTime);
    return this;
  }

  // Session mode has nothing to transport through markup.
  buildHiddenFieldHtml(asXhtml = false, id?: string | null): string {
    if (this.useSession || !this.formFieldName) {
      return '';
    }
    return closeTag(
      `<input type="hidden" name="${this.formFieldName}" value="${encodeStamp(this.currentFormStamp)}"`,
      asXhtml,
      id,
    );
  }

  reload(): void {
    this.requestSeen = false;
    this.validRequest = false;

    if (this.useSession && this.sessionFieldName) {
      if (this.session.fieldExists(this.sessionFieldName)) {
        this.requestSeen = true;
        this.lastFormStamp = parseStamp(String(this.session.getFieldValue(this.sessionFieldName, '')));
        this.validRequest = this.hasElapsed(this.lastFormStamp);
      }
      this.session.setFieldValue(this.sessionFieldName, this.currentFormStamp);
      return;
    }

    if (this.formFieldName && this.request.hasField('POST', this.formFieldName)) {
      this.requestSeen = true;
      this.lastFormStamp = decodeStamp(this.request.getField('POST', this.formFieldName) ?? '');
      this.validRequest = this.hasElapsed(this.lastFormStamp);
    }
  }

  private hasElapsed(lastFormStamp: number): boolean {
    if (Number.isNaN(lastFormStamp)) return false;
    return lastFormStamp + this.minRequestTime <= this.currentFormStamp;
  }
}
