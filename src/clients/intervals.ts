import type { IntervalsConfig } from '../config/index.js';
import type { DateRange, EventPayload, RequestEnvelope } from '../types/index.js';
import { sendRequest, type HttpMethod } from './http.js';

export const INTERVALS_API_BASE = 'https://intervals.icu/api/v1';

/**
 * Thin Intervals.icu client. Responses are returned as envelopes whatever
 * their status; only transport failures throw.
 */
export class IntervalsClient {
  private config: IntervalsConfig;
  private authHeader: string;

  constructor(config: IntervalsConfig) {
    this.config = config;
    // Basic auth with the literal username API_KEY
    const credentials = Buffer.from(`API_KEY:${config.apiKey}`).toString('base64');
    this.authHeader = `Basic ${credentials}`;
  }

  private async request(
    method: HttpMethod,
    url: string,
    options: { params?: Record<string, string>; payload?: EventPayload } = {}
  ): Promise<RequestEnvelope> {
    console.log(`[Intervals] ${method} ${url}`);

    const { status, data } = await sendRequest({
      method,
      url,
      params: options.params,
      json: options.payload,
      headers: { Authorization: this.authHeader },
      source: 'intervals',
    });

    if (status >= 400) {
      console.warn(`[Intervals] ${method} ${url} returned ${status}`);
    }

    return { status, request: { url, ...options }, data };
  }

  private athleteUrl(endpoint: string): string {
    return `${INTERVALS_API_BASE}/athlete/${encodeURIComponent(this.config.athleteId)}${endpoint}`;
  }

  private activityUrl(activityId: string, endpoint = ''): string {
    return `${INTERVALS_API_BASE}/activity/${encodeURIComponent(activityId)}${endpoint}`;
  }

  /**
   * Get calendar events within a date range
   */
  async getEvents(range: DateRange): Promise<RequestEnvelope> {
    return this.request('GET', this.athleteUrl('/events'), {
      params: { oldest: range.oldest, newest: range.newest },
    });
  }

  /**
   * Create a calendar event (e.g. a planned workout)
   */
  async createEvent(payload: EventPayload): Promise<RequestEnvelope> {
    return this.request('POST', this.athleteUrl('/events'), { payload });
  }

  /**
   * Get wellness records within a date range
   */
  async getWellness(range: DateRange): Promise<RequestEnvelope> {
    return this.request('GET', this.athleteUrl('/wellness'), {
      params: { oldest: range.oldest, newest: range.newest },
    });
  }

  async getActivity(activityId: string): Promise<RequestEnvelope> {
    return this.request('GET', this.activityUrl(activityId));
  }

  /**
   * Get the comment thread for an activity
   */
  async getActivityMessages(activityId: string): Promise<RequestEnvelope> {
    return this.request('GET', this.activityUrl(activityId, '/messages'));
  }
}
