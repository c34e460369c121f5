import { z } from 'zod';

// Formats are checked by the tools themselves so a bad value comes back as
// a plain { error } result instead of an MCP validation failure.
export const DateParamSchema = z.string().describe('Date in ISO format (YYYY-MM-DD)');

export const ActivityIdSchema = z
  .string()
  .describe('Intervals.icu activity ID (e.g., "i111325719"), or the Strava activity ID for imported activities');

// Tool parameter shapes
export const DateRangeParams = {
  oldest: DateParamSchema.describe('Start date (YYYY-MM-DD)'),
  newest: DateParamSchema.describe('End date (YYYY-MM-DD)'),
};

export const CreateEventParams = {
  category: z.string().describe('Event category, e.g. "WORKOUT"'),
  start_date_local: z.string().describe('Local start time as YYYY-MM-DDTHH:MM:SS (no timezone offset)'),
  type: z.string().describe('Sport type, e.g. "Ride", "Run", "Swim"'),
  name: z.string().describe('Event name'),
  description: z
    .string()
    .optional()
    .describe('Optional workout description in Intervals.icu workout syntax, one step per line'),
};

export const ActivityParams = {
  activity_id: ActivityIdSchema,
};

const DateRangeSchema = z.object(DateRangeParams);
const CreateEventSchema = z.object(CreateEventParams);
const ActivitySchema = z.object(ActivityParams);

// Type exports
export type DateRangeInput = z.infer<typeof DateRangeSchema>;
export type CreateEventInput = z.infer<typeof CreateEventSchema>;
export type ActivityInput = z.infer<typeof ActivitySchema>;
