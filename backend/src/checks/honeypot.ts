import {
  HONEYPOT_CONFIG,
  type RequestMethod,
  type RequestSource,
  type SecurityCheck,
} from '@formguard/shared';

// Decoy field check. The field is hidden from humans with CSS, so a legitimate
// client submits it empty; automation that fills every field gives itself away.
// A textarea is the default because browser autofill rarely touches one.
export class Honeypot implements SecurityCheck {
  private requestSeen = false;
  private validRequest = false;

  constructor(
    private readonly request: RequestSource,
    private fieldName: string,
    private requestMethod: RequestMethod = 'POST',
  ) {
    this.reload();
  }

  getFieldName(): string {
    return this.fieldName;
  }

  getRequestMethod(): RequestMethod {
    return this.requestMethod;
  }

  isRequest(): boolean {
    return this.requestSeen;
  }

  isValidRequest(): boolean {
    return this.validRequest;
  }

  setFieldName(fieldName: string): this {
    this.fieldName = fieldName;
    return this;
  }

  setRequestMethod(requestMethod: RequestMethod): this {
    this.requestMethod = requestMethod;
    return this;
  }

  buildFormField(asTextArea = true, hideClassName: string = HONEYPOT_CONFIG.HIDE_CLASS_NAME): string {
    if (asTextArea) {
      return `<textarea name="${this.fieldName}" class="${hideClassName}" rows="${HONEYPOT_CONFIG.TEXTAREA_ROWS}"></textarea>`;
    }
    return `<input type="text" name="${this.fieldName}" class="${hideClassName}" value="">`;
  }

  buildCss(hideClassName: string = HONEYPOT_CONFIG.HIDE_CLASS_NAME): string {
    return `.${hideClassName} { display: none; visibility: hidden; }`;
  }

  toString(): string {
    return this.buildFormField();
  }

  reload(): void {
    this.requestSeen = false;
    this.validRequest = false;

    if (!this.request.hasField(this.requestMethod, this.fieldName)) return;

    this.requestSeen = true;
    this.validRequest = this.request.getField(this.requestMethod, this.fieldName) === '';
  }
}
