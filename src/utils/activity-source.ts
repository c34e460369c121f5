import { isJsonObject } from '../clients/http.js';

/** Value of `source` on Intervals.icu stubs for activities imported from Strava */
export const STRAVA_SOURCE = 'STRAVA';

const UNAVAILABLE_NOTE = 'not available via the API';

/**
 * True when an Intervals.icu activity body is a stub for an activity that
 * lives on Strava. Intervals.icu can't serve those through its API, so the
 * detail has to come from Strava instead.
 */
export function isStravaHosted(body: unknown): boolean {
  if (!isJsonObject(body)) {
    return false;
  }

  if (body.source === STRAVA_SOURCE) {
    return true;
  }

  const note = body._note;
  return typeof note === 'string' && note.includes(STRAVA_SOURCE) && note.includes(UNAVAILABLE_NOTE);
}
