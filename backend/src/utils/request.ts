import type { APIGatewayProxyEvent } from 'aws-lambda';
import type { RequestMethod, RequestSource } from '@formguard/shared';

type FieldMap = Map<string, string>;

export function getHeader(event: APIGatewayProxyEvent, name: string): string | undefined {
  const wanted = name.toLowerCase();
  for (const [key, value] of Object.entries(event.headers ?? {})) {
    if (key.toLowerCase() === wanted && value !== undefined) return value;
  }
  return undefined;
}

function decodeBody(event: APIGatewayProxyEvent): string {
  if (!event.body) return '';
  return event.isBase64Encoded ? Buffer.from(event.body, 'base64').toString('utf8') : event.body;
}

// JSON bodies must be an object; scalar members become strings, anything else is ignored.
function parseJsonFields(body: string): FieldMap {
  const fields: FieldMap = new Map();
  let parsed: unknown;
  try {
    parsed = JSON.parse(body);
  } catch {
    return fields;
  }
  if (typeof parsed !== 'object' || parsed === null || Array.isArray(parsed)) {
    return fields;
  }
  for (const [key, value] of Object.entries(parsed)) {
    if (typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean') {
      fields.set(key, String(value));
    }
  }
  return fields;
}

// First occurrence of a repeated key wins.
function parseFormFields(body: string): FieldMap {
  const fields: FieldMap = new Map();
  for (const [key, value] of new URLSearchParams(body)) {
    if (!fields.has(key)) fields.set(key, value);
  }
  return fields;
}

function parsePostFields(event: APIGatewayProxyEvent): FieldMap {
  if (event.httpMethod.toUpperCase() !== 'POST') return new Map();
  const body = decodeBody(event);
  if (!body) return new Map();
  const contentType = getHeader(event, 'content-type') ?? '';
  return contentType.toLowerCase().startsWith('application/json')
    ? parseJsonFields(body)
    : parseFormFields(body);
}

function parseQueryFields(event: APIGatewayProxyEvent): FieldMap {
  const fields: FieldMap = new Map();
  for (const [key, value] of Object.entries(event.queryStringParameters ?? {})) {
    if (value !== undefined) fields.set(key, value);
  }
  return fields;
}

// Adapts an API Gateway event to the RequestSource the checks read from.
export function createRequestSource(event: APIGatewayProxyEvent): RequestSource {
  const sources: Record<RequestMethod, FieldMap> = {
    POST: parsePostFields(event),
    GET: parseQueryFields(event),
  };
  return {
    hasField: (method, name) => sources[method].has(name),
    getField: (method, name) => sources[method].get(name) ?? null,
  };
}

// Picks the named POST fields that are present.
export function postFields(request: RequestSource, names: readonly string[]): Record<string, string> {
  const out: Record<string, string> = {};
  for (const name of names) {
    const value = request.getField('POST', name);
    if (value !== null) out[name] = value;
  }
  return out;
}
