export type SessionScalar = string | number | boolean;

// One level of nesting only: compound names address `outer` -> `inner`.
export type SessionValue = SessionScalar | { [inner: string]: SessionScalar };

export type SessionData = Record<string, SessionValue>;

export interface SessionStore {
  fieldExists(fieldName: string): boolean;
  getFieldValue<T extends SessionValue | null>(fieldName: string, defaultValue: T): SessionValue | T;
  setFieldValue(fieldName: string, value: SessionValue | null | undefined): boolean;
}

export interface SessionRecord {
  sessionId: string;
  data: SessionData;
  updatedAt: string;
  expiresAt: number;
}
