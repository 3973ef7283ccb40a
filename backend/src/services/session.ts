import { v4 as uuidv4, validate as uuidValidate } from 'uuid';
import type { APIGatewayProxyEvent } from 'aws-lambda';
import { getSession, putSession } from '../utils/dynamodb.js';
import { getHeader } from '../utils/request.js';
import { SessionHelper } from '../session/session-helper.js';
import { config } from '../config.js';

export interface LoadedSession {
  sessionId: string;
  helper: SessionHelper;
  isNew: boolean;
}

// Reads the session id from the Cookie header. Ids that are not UUIDs are
// ignored so a forged cookie cannot address arbitrary table keys.
export function readSessionId(event: APIGatewayProxyEvent): string | null {
  const header = getHeader(event, 'cookie');
  if (!header) return null;
  for (const part of header.split(';')) {
    const eq = part.indexOf('=');
    if (eq === -1) continue;
    if (part.slice(0, eq).trim() !== config.session.cookieName) continue;
    const value = part.slice(eq + 1).trim();
    return uuidValidate(value) ? value : null;
  }
  return null;
}

// Loads the caller's session, or starts a new empty one when the cookie is
// missing or the stored session has expired.
export async function loadSession(event: APIGatewayProxyEvent): Promise<LoadedSession> {
  const sessionId = readSessionId(event);
  if (sessionId) {
    const record = await getSession(sessionId);
    if (record) {
      return { sessionId, helper: new SessionHelper(record.data), isNew: false };
    }
  }
  return { sessionId: uuidv4(), helper: new SessionHelper(), isNew: true };
}

export async function saveSession(session: LoadedSession): Promise<void> {
  if (!session.isNew && !session.helper.dirty) return;
  await putSession(session.sessionId, session.helper.data, config.session.ttlSeconds);
}

export function sessionCookie(sessionId: string): string {
  return `${config.session.cookieName}=${sessionId}; Path=/; Max-Age=${config.session.ttlSeconds}; HttpOnly; Secure; SameSite=Lax`;
}
