import { isInteger, isLosslessNumber, isSafeNumber, LosslessNumber, parse, stringify } from 'lossless-json';
import { TransportError, type ErrorSource } from '../errors/index.js';

/** Fixed per-call timeout, token refresh included */
export const REQUEST_TIMEOUT_MS = 20_000;

export type HttpMethod = 'GET' | 'POST';

export interface HttpRequest {
  method: HttpMethod;
  url: string;
  /** Query string parameters */
  params?: Record<string, string>;
  headers?: Record<string, string>;
  /** Sent as an application/json body */
  json?: unknown;
  /** Sent as an application/x-www-form-urlencoded body */
  form?: Record<string, string>;
  /** Which API is being called, for error reporting */
  source: ErrorSource;
}

export interface HttpResult {
  status: number;
  /** Parsed JSON, or `{ raw }` with the exact body text */
  data: unknown;
}

// Integers past 2^53 (Strava segment effort ids) stay exact as LosslessNumber
function parseNumber(value: string): number | LosslessNumber {
  return isInteger(value) && !isSafeNumber(value) ? new LosslessNumber(value) : parseFloat(value);
}

/**
 * Parse a response body as JSON, falling back to the raw text.
 */
export function parseBody(text: string): unknown {
  try {
    return parse(text, null, parseNumber);
  } catch {
    return { raw: text };
  }
}

/**
 * Serialize a parsed body, writing large integers back digit for digit.
 */
export function stringifyBody(value: unknown, space?: number): string {
  return stringify(value, undefined, space) ?? 'null';
}

/**
 * Copy of a parsed body safe for plain `JSON.stringify`: large integers
 * become their decimal string.
 */
export function toPlainJson(value: unknown): unknown {
  if (isLosslessNumber(value)) {
    return value.toString();
  }
  if (Array.isArray(value)) {
    return value.map(toPlainJson);
  }
  if (isJsonObject(value)) {
    return Object.fromEntries(Object.entries(value).map(([key, entry]) => [key, toPlainJson(entry)]));
  }
  return value;
}

export function isJsonObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function buildUrl(url: string, params?: Record<string, string>): string {
  const target = new URL(url);
  if (params) {
    Object.entries(params).forEach(([key, value]) => {
      target.searchParams.set(key, value);
    });
  }
  return target.toString();
}

function buildInit(request: HttpRequest): RequestInit {
  const headers: Record<string, string> = {
    Accept: 'application/json',
    ...request.headers,
  };
  let body: string | URLSearchParams | undefined;

  if (request.json !== undefined) {
    headers['Content-Type'] = 'application/json';
    body = JSON.stringify(request.json);
  } else if (request.form) {
    headers['Content-Type'] = 'application/x-www-form-urlencoded';
    body = new URLSearchParams(request.form);
  }

  return {
    method: request.method,
    headers,
    body,
    signal: AbortSignal.timeout(REQUEST_TIMEOUT_MS),
  };
}

/**
 * Perform a single HTTP call. Non-2xx statuses are returned, not thrown;
 * only failures that never produce a response raise a TransportError.
 */
export async function sendRequest(request: HttpRequest): Promise<HttpResult> {
  const url = buildUrl(request.url, request.params);

  try {
    const response = await fetch(url, buildInit(request));
    const text = await response.text();
    return { status: response.status, data: parseBody(text) };
  } catch (error) {
    throw TransportError.fromCause(request.url, request.source, error);
  }
}
