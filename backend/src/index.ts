export { Honeypot } from './checks/honeypot.js';
export { FormTimer, encodeStamp, decodeStamp, type FormTimerOptions } from './checks/form-timer.js';
export { DynamicFormField } from './checks/dynamic-form-field.js';
export { SessionHelper, extractFieldNameElements } from './session/session-helper.js';
export { buildRandomWord } from './utils/random-word.js';
export { escapeHtml } from './utils/html.js';
export { createRequestSource } from './utils/request.js';
