import { DynamoDBClient } from '@aws-sdk/client-dynamodb';
import { DynamoDBDocumentClient, GetCommand, PutCommand } from '@aws-sdk/lib-dynamodb';
import type { SessionData, SessionRecord, SessionScalar } from '@formguard/shared';
import { SESSIONS_TABLE } from '../config.js';

const client = new DynamoDBClient({});
const docClient = DynamoDBDocumentClient.from(client);

interface StoredSession {
  sessionId: string;
  data: object;
  updatedAt: string;
  expiresAt: number;
}

function isStoredSession(item: Record<string, unknown> | undefined): item is StoredSession & Record<string, unknown> {
  return (
    item !== undefined &&
    typeof item.sessionId === 'string' &&
    typeof item.data === 'object' &&
    item.data !== null &&
    !Array.isArray(item.data) &&
    typeof item.updatedAt === 'string' &&
    typeof item.expiresAt === 'number'
  );
}

function isSessionScalar(value: unknown): value is SessionScalar {
  return typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean';
}

// Members that are not scalars or one-level maps of scalars (nulls included)
// are dropped.
function toSessionData(raw: object): SessionData {
  const data: SessionData = {};
  for (const [key, value] of Object.entries(raw)) {
    if (isSessionScalar(value)) {
      data[key] = value;
    } else if (typeof value === 'object' && value !== null && !Array.isArray(value)) {
      const map: { [inner: string]: SessionScalar } = {};
      for (const [inner, member] of Object.entries(value)) {
        if (isSessionScalar(member)) map[inner] = member;
      }
      data[key] = map;
    }
  }
  return data;
}

// DynamoDB deletes expired items lazily, so expiry is checked on read as well.
export async function getSession(sessionId: string): Promise<SessionRecord | null> {
  const result = await docClient.send(
    new GetCommand({
      TableName: SESSIONS_TABLE,
      Key: { sessionId },
    }),
  );
  const item = result.Item;
  if (!isStoredSession(item)) return null;
  if (item.expiresAt <= Math.floor(Date.now() / 1000)) return null;
  return {
    sessionId: item.sessionId,
    data: toSessionData(item.data),
    updatedAt: item.updatedAt,
    expiresAt: item.expiresAt,
  };
}

export async function putSession(sessionId: string, data: SessionData, ttlSeconds: number): Promise<void> {
  const now = Date.now();
  const record: SessionRecord = {
    sessionId,
    data,
    updatedAt: new Date(now).toISOString(),
    expiresAt: Math.floor(now / 1000) + ttlSeconds,
  };
  await docClient.send(
    new PutCommand({
      TableName: SESSIONS_TABLE,
      Item: record,
    }),
  );
}
