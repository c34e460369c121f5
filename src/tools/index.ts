import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import type { IntervalsConfig, StravaConfig } from '../config/index.js';
import { IntervalsClient } from '../clients/intervals.js';
import { StravaClient } from '../clients/strava.js';
import { isJsonObject, stringifyBody, toPlainJson } from '../clients/http.js';
import { isToolError, type ToolResult } from '../types/index.js';
import type { Clock } from '../utils/date-range.js';
import { ProxyTools } from './proxy.js';
import { ActivityParams, CreateEventParams, DateRangeParams } from './types.js';
import type { ActivityInput, CreateEventInput, DateRangeInput } from './types.js';

export interface ToolResponse {
  content: Array<{ type: 'text'; text: string }>;
  structuredContent: Record<string, unknown>;
  isError?: true;
  [key: string]: unknown;
}

/**
 * Build a response for an unexpected failure. Expected failures (missing
 * config, bad input, transport errors) never get here: the tools already
 * turned them into `{ error }` results.
 */
function buildErrorResponse(error: unknown): ToolResponse {
  const message = error instanceof Error ? error.message : 'An unknown error occurred';
  const structuredContent = { error: `Unexpected error: ${message}` };

  return {
    content: [{ type: 'text' as const, text: JSON.stringify(structuredContent, null, 2) }],
    structuredContent,
    isError: true,
  };
}

/**
 * Wraps a tool handler so both the text content and structuredContent carry
 * the result, and nothing the handler throws escapes to the transport.
 * Integers past 2^53 are exact numbers in the text and decimal strings in
 * structuredContent.
 */
function withToolResponse<TArgs>(
  toolName: string,
  handler: (args: TArgs) => Promise<ToolResult>
): (args: TArgs) => Promise<ToolResponse> {
  return async (args: TArgs) => {
    console.log(`[Tool] Calling tool: ${toolName}`);
    try {
      const result = await handler(args);
      const structuredContent = toPlainJson(result);
      const response: ToolResponse = {
        content: [{ type: 'text' as const, text: stringifyBody(result, 2) }],
        structuredContent: isJsonObject(structuredContent) ? structuredContent : {},
      };
      if (isToolError(result)) {
        response.isError = true;
      }
      return response;
    } catch (error) {
      console.error(`[Tool] ${toolName} failed:`, error);
      return buildErrorResponse(error);
    }
  };
}

export interface ToolsConfig {
  intervals: IntervalsConfig;
  strava: StravaConfig;
}

export class ToolRegistry {
  private proxyTools: ProxyTools;

  constructor(config: ToolsConfig, clock?: Clock) {
    const intervalsClient = new IntervalsClient(config.intervals);
    const stravaClient = new StravaClient(config.strava);

    this.proxyTools = new ProxyTools(config.intervals, intervalsClient, stravaClient, clock);
  }

  /**
   * Register all tools with the MCP server
   */
  registerTools(server: McpServer): void {
    server.tool(
      'get_last4w_events',
      `Fetches the user's Intervals.icu calendar events for the last 4 weeks, up to and including today.

<notes>
- "Today" is the current date in Europe/Berlin.
- The response is the raw Intervals.icu payload under "data", with the HTTP status and request alongside.
</notes>`,
      {},
      withToolResponse('get_last4w_events', async () => this.proxyTools.getLast4wEvents())
    );

    server.tool(
      'get_events',
      `Fetches the user's Intervals.icu calendar events (planned workouts, races, notes) between two dates, inclusive.

<instructions>
- Both dates must be in YYYY-MM-DD format.
</instructions>`,
      DateRangeParams,
      withToolResponse('get_events', async (args: DateRangeInput) => this.proxyTools.getEvents(args))
    );

    server.tool(
      'create_event',
      `Creates a planned workout or other event on the user's Intervals.icu calendar.

<instructions>
- category is usually WORKOUT.
- type is the sport, e.g. Ride, Run or Swim.
- start_date_local must be YYYY-MM-DDTHH:MM:SS, in the user's local time, without a timezone offset.
- description is optional and uses Intervals.icu workout syntax, one step per line, with a blank line between blocks. For example:
  - 15m Z2

  3x
  - 10m Z4
  - 5m Z1

  - 10m Z1
</instructions>`,
      CreateEventParams,
      withToolResponse('create_event', async (args: CreateEventInput) => this.proxyTools.createEvent(args))
    );

    server.tool(
      'get_wellness_records',
      `Fetches the user's Intervals.icu wellness records (e.g. resting HR, HRV, sleep, weight, fitness and fatigue) between two dates, inclusive.

<instructions>
- Both dates must be in YYYY-MM-DD format.
</instructions>`,
      DateRangeParams,
      withToolResponse('get_wellness_records', async (args: DateRangeInput) =>
        this.proxyTools.getWellnessRecords(args)
      )
    );

    server.tool(
      'get_activity',
      `Fetches a single completed activity from Intervals.icu.

<notes>
- Activities imported from Strava can't be read through the Intervals.icu API; it only returns a stub for them. In that case the activity is also fetched from Strava and returned under "strava".
- If Strava refreshed its access token during the call, the new token values are included in the "strava" block.
</notes>`,
      ActivityParams,
      withToolResponse('get_activity', async (args: ActivityInput) => this.proxyTools.getActivity(args))
    );

    server.tool(
      'get_activity_comments',
      `Fetches the comment thread for an Intervals.icu activity.

<notes>
- Works for any activity ID get_activity accepts, including Strava-imported ones.
- The response is the raw Intervals.icu message list under "data", with the HTTP status and request alongside.
</notes>`,
      ActivityParams,
      withToolResponse('get_activity_comments', async (args: ActivityInput) =>
        this.proxyTools.getActivityComments(args)
      )
    );
  }
}
