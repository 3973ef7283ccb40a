// API path prefixes
export const API_PATHS = {
  FORM: '/form',
} as const;

// Honeypot defaults
export const HONEYPOT_CONFIG = {
  HIDE_CLASS_NAME: 'inv1s1ble',
  TEXTAREA_ROWS: 5,
} as const;

// Form timer configuration
export const FORM_TIMER_CONFIG = {
  DEFAULT_MIN_REQUEST_TIME: 1.5, // seconds, also the floor
  STAMP_PREFIX: 'Uk7',
} as const;

// Dynamic form field configuration
export const DYNAMIC_FIELD_CONFIG = {
  DEFAULT_VALUE: '1',
  DEFAULT_SESSION_FIELD_NAME: 'DynamicFormField.LastFieldName',
  NAME_MIN_LENGTH: 6,
  NAME_MAX_LENGTH: 12,
} as const;

// Random word alphabet
export const RANDOM_WORD = {
  WORD_CHARS: 'abcdefghijklmnopqrstuvwxyzABCDEFGHIJKLMNOPQRSTUVWXYZ0123456789_',
  LEADING_CHARS: 'abcdefghijklmnopqrstuvwxyzABCDEFGHIJKLMNOPQRSTUVWXYZ_',
  MIN_LENGTH: 2,
  DEFAULT_MIN_LENGTH: 5,
  DEFAULT_MAX_LENGTH: 12,
} as const;

// Error messages
export const ERRORS = {
  FORM_REJECTED: 'Form submission rejected',
  FORM_DATA_MISSING: 'Form submission is missing guard data',
  NOT_FOUND: 'Not found',
  INTERNAL: 'Internal server error',
} as const;
