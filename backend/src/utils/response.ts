import type { APIGatewayProxyResult } from 'aws-lambda';
import type { ApiError, ApiResponse } from '@formguard/shared';

type Headers = Record<string, string>;

function corsHeaders(): Headers {
  return {
    'Access-Control-Allow-Origin': process.env.FRONTEND_ORIGIN ?? '*',
    'Access-Control-Allow-Headers': 'Content-Type',
    'Access-Control-Allow-Methods': 'GET,POST,OPTIONS',
  };
}

export function success<T>(data: T, statusCode = 200, headers: Headers = {}): APIGatewayProxyResult {
  const body: ApiResponse<T> = { success: true, data };
  return {
    statusCode,
    headers: { ...corsHeaders(), ...headers },
    body: JSON.stringify(body),
  };
}

export function error(message: string, statusCode = 400, headers: Headers = {}): APIGatewayProxyResult {
  const body: ApiError = { error: message, statusCode };
  return {
    statusCode,
    headers: { ...corsHeaders(), ...headers },
    body: JSON.stringify(body),
  };
}

export function html(markup: string, statusCode = 200, headers: Headers = {}): APIGatewayProxyResult {
  return {
    statusCode,
    headers: { ...corsHeaders(), 'Content-Type': 'text/html; charset=utf-8', ...headers },
    body: markup,
  };
}
