import type { APIGatewayProxyEvent, APIGatewayProxyResult } from 'aws-lambda';
import { API_PATHS, ERRORS, type FormSubmissionResponse } from '@formguard/shared';
import { success, error, html } from '../utils/response.js';
import { createRequestSource, postFields } from '../utils/request.js';
import { buildGuardMarkup, createChecks, validateFormGuard } from '../middleware/form-guard.js';
import { loadSession, saveSession, sessionCookie, type LoadedSession } from '../services/session.js';

// Fields of the demo form that are echoed back on acceptance.
export const FORM_FIELDS = ['name', 'message'] as const;

export async function handler(event: APIGatewayProxyEvent): Promise<APIGatewayProxyResult> {
  const path = event.path;
  const method = event.httpMethod;

  try {
    // GET /form
    if (path === API_PATHS.FORM && method === 'GET') {
      return await handleRender(event);
    }
    // POST /form
    if (path === API_PATHS.FORM && method === 'POST') {
      return await handleSubmit(event);
    }

    return error(ERRORS.NOT_FOUND, 404);
  } catch (err) {
    console.error('Form handler error:', err);
    return error(ERRORS.INTERNAL, 500);
  }
}

function renderPage(fields: string, css: string): string {
  return [
    '<!DOCTYPE html>',
    '<html>',
    '<head>',
    '<meta charset="utf-8">',
    '<title>Contact</title>',
    css ? `<style>${css}</style>` : '',
    '</head>',
    '<body>',
    `<form method="post" action="${API_PATHS.FORM}">`,
    '<label>Name <input type="text" name="name"></label>',
    '<label>Message <textarea name="message" rows="5"></textarea></label>',
    fields,
    '<button type="submit">Send</button>',
    '</form>',
    '</body>',
    '</html>',
  ]
    .filter((line) => line !== '')
    .join('\n');
}

async function persist(session: LoadedSession): Promise<Record<string, string>> {
  await saveSession(session);
  return { 'Set-Cookie': sessionCookie(session.sessionId) };
}

async function handleRender(event: APIGatewayProxyEvent): Promise<APIGatewayProxyResult> {
  const session = await loadSession(event);
  const checks = createChecks(createRequestSource(event), session.helper);
  const { fields, css } = buildGuardMarkup(checks);
  const headers = await persist(session);
  return html(renderPage(fields, css), 200, headers);
}

async function handleSubmit(event: APIGatewayProxyEvent): Promise<APIGatewayProxyResult> {
  const session = await loadSession(event);
  const request = createRequestSource(event);
  const guard = validateFormGuard(request, session.helper);
  const headers = await persist(session);

  if (guard.errorResponse) {
    return { ...guard.errorResponse, headers: { ...guard.errorResponse.headers, ...headers } };
  }

  const response: FormSubmissionResponse = {
    accepted: true,
    fields: postFields(request, FORM_FIELDS),
  };
  return success(response, 200, headers);
}
