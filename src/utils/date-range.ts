/**
 * Calendar date helpers using date-fns-tz for timezone-aware "today"
 */

import { format, parseISO, subDays } from 'date-fns';
import { formatInTimeZone } from 'date-fns-tz';
import type { DateRange } from '../types/index.js';

/** Civil time zone the default event window is computed in */
export const CALENDAR_TIMEZONE = 'Europe/Berlin';

/** Returns "now"; injected so tests can pin the current instant */
export type Clock = () => Date;

export const systemClock: Clock = () => new Date();

/**
 * Get the calendar date of `now` in the given timezone as YYYY-MM-DD.
 *
 * @example
 * getTodayInTimezone('Europe/Berlin', new Date('2024-06-15T22:30:00Z'))
 * // Returns: '2024-06-16'
 */
export function getTodayInTimezone(timezone: string, now: Date): string {
  return formatInTimeZone(now, timezone, 'yyyy-MM-dd');
}

/**
 * Date range ending today (in `timezone`) and starting `days` calendar days
 * earlier. days=28 gives 29 calendar dates, both ends inclusive.
 */
export function getTrailingRange(days: number, timezone: string, now: Date): DateRange {
  const newest = getTodayInTimezone(timezone, now);
  // Subtract on the calendar date, not the instant, so DST shifts don't matter
  const oldest = format(subDays(parseISO(newest), days), 'yyyy-MM-dd');
  return { oldest, newest };
}
