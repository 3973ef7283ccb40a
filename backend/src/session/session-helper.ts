import type { SessionData, SessionScalar, SessionStore, SessionValue } from '@formguard/shared';

type SessionMap = { [inner: string]: SessionScalar };

function isSessionMap(value: SessionValue | null | undefined): value is SessionMap {
  return typeof value === 'object' && value !== null;
}

// Own keys only, so names like `constructor` never resolve to prototype members.
function ownValue<V>(record: Record<string, V>, key: string): V | undefined {
  return Object.hasOwn(record, key) ? record[key] : undefined;
}

// null, undefined, '', 0, false and an empty map all mean "remove the key"
// when writing; those come back as null.
function storableValue(value: SessionValue | null | undefined): SessionValue | null {
  if (value === null || value === undefined || value === '' || value === 0 || value === false) {
    return null;
  }
  if (isSessionMap(value) && Object.keys(value).length === 0) {
    return null;
  }
  return value;
}

/**
 * Splits a field name into `[outer, inner]` for compound names like
 * `outer[inner]` or `outer.inner`. Names without a separator, and names that
 * do not split into exactly two parts, come back as a single element.
 */
export function extractFieldNameElements(fieldName: string): [string] | [string, string] {
  if (!fieldName.includes('[') && !fieldName.includes('.')) {
    return [fieldName];
  }
  const elements = fieldName.split(/[[.]/);
  if (elements.length !== 2) {
    return [fieldName];
  }
  return [elements[0], elements[1].replace(/^[\s[\]]+|[\s[\]]+$/g, '')];
}

// Reads and writes single values of a session record, with one level of
// nested-key addressing. The record is owned by the caller, which persists it.
export class SessionHelper implements SessionStore {
  private changed = false;

  constructor(private readonly session: SessionData = {}) {}

  get data(): SessionData {
    return this.session;
  }

  // True once any setFieldValue call has written to the record.
  get dirty(): boolean {
    return this.changed;
  }

  fieldExists(fieldName: string): boolean {
    return this.lookup(fieldName) !== undefined;
  }

  getFieldValue<T extends SessionValue | null>(fieldName: string, defaultValue: T): SessionValue | T {
    return this.lookup(fieldName) ?? defaultValue;
  }

  setFieldValue(fieldName: string, value: SessionValue | null | undefined): boolean {
    const elements = extractFieldNameElements(fieldName);
    const stored = storableValue(value);

    if (elements.length === 1) {
      if (stored === null) {
        delete this.session[fieldName];
      } else {
        this.session[fieldName] = stored;
      }
      this.changed = true;
      return true;
    }

    // Deeper nesting is not supported.
    if (isSessionMap(stored)) {
      return false;
    }
    const [outer, inner] = elements;
    if (ownValue(this.session, outer) === undefined) {
      this.session[outer] = {};
    }
    const map = ownValue(this.session, outer);
    if (!isSessionMap(map)) {
      return false;
    }
    if (stored === null) {
      delete map[inner];
    } else {
      map[inner] = stored;
    }
    this.changed = true;
    return true;
  }

  // A stored null reads as missing, whatever the record was loaded from.
  private lookup(fieldName: string): SessionValue | undefined {
    const elements = extractFieldNameElements(fieldName);
    if (elements.length === 1) {
      return ownValue(this.session, fieldName) ?? undefined;
    }
    const map = ownValue(this.session, elements[0]);
    if (!isSessionMap(map)) {
      return undefined;
    }
    return ownValue(map, elements[1]) ?? undefined;
  }
}
