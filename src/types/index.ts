import type { StravaActivityResult } from '../clients/strava.js';

// Calendar date range, both ends YYYY-MM-DD
export interface DateRange {
  oldest: string;
  newest: string;
}

// Body for POST /athlete/{id}/events
export interface EventPayload {
  category: string;
  start_date_local: string; // YYYY-MM-DDTHH:MM:SS, no offset
  type: string;
  name: string;
  description: string;
}

export interface RequestInfo {
  url: string;
  params?: Record<string, string>;
  payload?: EventPayload;
}

/**
 * Uniform shape every proxied call returns. Upstream non-2xx statuses are
 * passed through here, not raised.
 */
export interface RequestEnvelope {
  status: number;
  request: RequestInfo;
  data: unknown;
}

export interface ToolError {
  error: string;
  request?: RequestInfo;
}

export interface ActivityEnvelope extends RequestEnvelope {
  strava?: StravaActivityResult | ToolError;
}

export type ToolResult<T extends RequestEnvelope = RequestEnvelope> = T | ToolError;

export function isToolError(result: object): result is ToolError {
  return 'error' in result && typeof result.error === 'string';
}
