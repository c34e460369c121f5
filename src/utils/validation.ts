import { ValidationError } from '../errors/index.js';

export const DATE_PATTERN = /^\d{4}-\d{2}-\d{2}$/;
export const DATETIME_PATTERN = /^\d{4}-\d{2}-\d{2}T\d{2}:\d{2}:\d{2}$/;

export const DATE_FORMAT = 'YYYY-MM-DD';
export const DATETIME_FORMAT = 'YYYY-MM-DDTHH:MM:SS';

/**
 * Throws a ValidationError unless `value` is a calendar date (YYYY-MM-DD).
 * Only the shape is checked; whether the date exists is left to the API.
 */
export function assertDate(field: string, value: string): string {
  if (!DATE_PATTERN.test(value)) {
    throw new ValidationError(field, DATE_FORMAT, value);
  }
  return value;
}

/**
 * Throws a ValidationError unless `value` is a local datetime with no
 * offset and no fractional seconds (YYYY-MM-DDTHH:MM:SS).
 */
export function assertDateTime(field: string, value: string): string {
  if (!DATETIME_PATTERN.test(value)) {
    throw new ValidationError(field, DATETIME_FORMAT, value);
  }
  return value;
}
