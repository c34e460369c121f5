import type { IntervalsConfig } from '../config/index.js';
import { IntervalsClient } from '../clients/intervals.js';
import { StravaClient } from '../clients/strava.js';
import { ApiError, ConfigError, TransportError } from '../errors/index.js';
import type {
  ActivityEnvelope,
  EventPayload,
  RequestEnvelope,
  ToolError,
  ToolResult,
} from '../types/index.js';
import { isStravaHosted } from '../utils/activity-source.js';
import { CALENDAR_TIMEZONE, getTrailingRange, systemClock, type Clock } from '../utils/date-range.js';
import { assertDate, assertDateTime } from '../utils/validation.js';
import type { ActivityInput, CreateEventInput, DateRangeInput } from './types.js';

/** Length of the default event window, in days before today */
const TRAILING_WINDOW_DAYS = 28;

/**
 * Turn one of our errors into an `{ error }` result. Anything else is
 * returned as null and left to the caller.
 */
export function toToolError(error: unknown): ToolError | null {
  if (error instanceof TransportError) {
    return { error: error.message, request: { url: error.url } };
  }
  if (error instanceof ApiError) {
    return { error: error.message };
  }
  return null;
}

/**
 * The six proxied operations. Each one checks config, then validates its
 * inputs, before any request goes out.
 */
export class ProxyTools {
  constructor(
    private config: IntervalsConfig,
    private intervals: IntervalsClient,
    private strava: StravaClient,
    private clock: Clock = systemClock
  ) {}

  private async run<T extends RequestEnvelope>(operation: () => Promise<T>): Promise<ToolResult<T>> {
    try {
      return await operation();
    } catch (error) {
      const result = toToolError(error);
      if (result) {
        console.warn(`[Tool] ${result.error}`);
        return result;
      }
      throw error;
    }
  }

  private requireApiKey(): void {
    if (!this.config.apiKey) {
      throw new ConfigError(['INTERVALS_API_KEY'], 'intervals');
    }
  }

  private requireAthlete(): void {
    this.requireApiKey();
    if (!this.config.athleteId) {
      throw new ConfigError(['INTERVALS_ATHLETE_ID'], 'intervals');
    }
  }

  /**
   * Calendar events for the last 4 weeks, up to and including today in Berlin.
   */
  async getLast4wEvents(): Promise<ToolResult> {
    return this.run(async () => {
      this.requireAthlete();
      const range = getTrailingRange(TRAILING_WINDOW_DAYS, CALENDAR_TIMEZONE, this.clock());
      return this.intervals.getEvents(range);
    });
  }

  async getEvents(params: DateRangeInput): Promise<ToolResult> {
    return this.run(async () => {
      this.requireAthlete();
      const oldest = assertDate('oldest', params.oldest);
      const newest = assertDate('newest', params.newest);
      return this.intervals.getEvents({ oldest, newest });
    });
  }

  /**
   * Create a planned calendar event. `start_date_local` is sent as-is,
   * interpreted by Intervals.icu in the athlete's own timezone.
   */
  async createEvent(params: CreateEventInput): Promise<ToolResult> {
    return this.run(async () => {
      this.requireAthlete();
      const payload: EventPayload = {
        category: params.category,
        start_date_local: assertDateTime('start_date_local', params.start_date_local),
        type: params.type,
        name: params.name,
        description: params.description ?? '',
      };
      return this.intervals.createEvent(payload);
    });
  }

  async getWellnessRecords(params: DateRangeInput): Promise<ToolResult> {
    return this.run(async () => {
      this.requireAthlete();
      const oldest = assertDate('oldest', params.oldest);
      const newest = assertDate('newest', params.newest);
      return this.intervals.getWellness({ oldest, newest });
    });
  }

  /**
   * Fetch an activity. When Intervals.icu only has a Strava stub for it, the
   * Strava detail is fetched as well and returned under `strava`.
   */
  async getActivity(params: ActivityInput): Promise<ToolResult<ActivityEnvelope>> {
    return this.run(async (): Promise<ActivityEnvelope> => {
      this.requireApiKey();
      const envelope = await this.intervals.getActivity(params.activity_id);

      if (!isStravaHosted(envelope.data)) {
        return envelope;
      }

      console.log(`[Tool] Activity ${params.activity_id} is hosted on Strava, fetching detail from Strava`);
      try {
        const strava = await this.strava.fetchActivity(params.activity_id);
        return { ...envelope, strava };
      } catch (error) {
        const strava = toToolError(error);
        if (!strava) {
          throw error;
        }
        console.warn(`[Tool] Strava lookup for activity ${params.activity_id} failed: ${strava.error}`);
        return { ...envelope, strava };
      }
    });
  }

  async getActivityComments(params: ActivityInput): Promise<ToolResult> {
    return this.run(async () => {
      this.requireApiKey();
      return this.intervals.getActivityMessages(params.activity_id);
    });
  }
}
