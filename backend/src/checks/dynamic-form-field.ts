import {
  DYNAMIC_FIELD_CONFIG,
  type RequestSource,
  type SecurityCheck,
  type SessionStore,
} from '@formguard/shared';
import { buildRandomWord } from '../utils/random-word.js';
import { closeTag, escapeHtml } from '../utils/html.js';

/**
 * Hidden field whose name rotates on every render.
 *
 * The name rendered last time is kept in the session. A submission is valid
 * only when it carries a field under exactly that name with the expected
 * value, which a client replaying a stale form or guessing a fixed name
 * cannot supply.
 *
 * Two tabs of one session race on the stored name: the last reload wins and
 * the other tab's next submission is rejected.
 */
export class DynamicFormField implements SecurityCheck {
  private sessionFieldName: string;
  private inName = '';
  private outName = '';
  private requestSeen = false;
  private validRequest = false;

  constructor(
    private readonly request: RequestSource,
    private readonly session: SessionStore,
    private value: string = DYNAMIC_FIELD_CONFIG.DEFAULT_VALUE,
    sessionFieldName: string = DYNAMIC_FIELD_CONFIG.DEFAULT_SESSION_FIELD_NAME,
    private readonly recentNames: Set<string> = new Set(),
  ) {
    this.sessionFieldName = sessionFieldName || DYNAMIC_FIELD_CONFIG.DEFAULT_SESSION_FIELD_NAME;
    this.reload();
  }

  // Name the current submission had to use; empty before the first render.
  getInName(): string {
    return this.inName;
  }

  // Name to render for the next submission.
  getOutName(): string {
    return this.outName;
  }

  getValue(): string {
    return this.value;
  }

  getSessionFieldName(): string {
    return this.sessionFieldName;
  }

  isRequest(): boolean {
    return this.requestSeen;
  }

  isValidRequest(): boolean {
    return this.validRequest;
  }

  setValue(value: string): this {
    this.value = value;
    return this;
  }

  setSessionFieldName(sessionFieldName: string): this {
    this.sessionFieldName = sessionFieldName;
    return this;
  }

  buildHiddenFieldHtml(asXhtml = false, id?: string | null): string {
    return closeTag(
      `<input type="hidden" name="${this.outName}" value="${escapeHtml(this.value)}"`,
      asXhtml,
      id,
    );
  }

  reload(): void {
    this.requestSeen = false;
    this.validRequest = false;
    this.inName = '';

    const stored = String(this.session.getFieldValue(this.sessionFieldName, ''));
    if (stored) {
      this.recentNames.add(stored);
    }
    this.outName = buildRandomWord(
      DYNAMIC_FIELD_CONFIG.NAME_MIN_LENGTH,
      DYNAMIC_FIELD_CONFIG.NAME_MAX_LENGTH,
      this.recentNames,
    );

    // Rotate before validating, so the next render always expects the new name.
    this.session.setFieldValue(this.sessionFieldName, this.outName);

    // First render: nothing to validate yet.
    if (!stored) return;

    this.inName = stored;

    this.requestSeen = true;
    if (
      this.request.hasField('POST', this.inName) &&
      this.request.getField('POST', this.inName) === this.value
    ) {
      this.validRequest = true;
    }
  }
}
