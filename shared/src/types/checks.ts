// Which part of the request a check reads its field from.
export type RequestMethod = 'POST' | 'GET';

// Read-only view of the inbound request parameters, keyed by method source.
export interface RequestSource {
  hasField(method: RequestMethod, name: string): boolean;
  getField(method: RequestMethod, name: string): string | null;
}

/**
 * Common surface of every anti-automation check.
 *
 * `isRequest` says whether the current request carries the data the check
 * needs; it says nothing about validity. `isValidRequest` is never true
 * without `isRequest`. Both are only recomputed by `reload`.
 */
export interface SecurityCheck {
  isRequest(): boolean;
  isValidRequest(): boolean;
  reload(): void;
}
