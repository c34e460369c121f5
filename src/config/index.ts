/**
 * Process-wide configuration, read once at startup and injected everywhere.
 * Absent values are empty strings: a missing credential is reported when a
 * tool needs it, never at startup.
 */

export const DEFAULT_PORT = 8000;

export interface IntervalsConfig {
  apiKey: string;
  athleteId: string;
}

export interface StravaConfig {
  clientId: string;
  clientSecret: string;
  accessToken: string;
  refreshToken: string;
}

export interface AppConfig {
  port: number;
  /** When set, /mcp requires this bearer token */
  mcpAuthToken: string;
  intervals: IntervalsConfig;
  strava: StravaConfig;
}

export type Env = Record<string, string | undefined>;

function read(env: Env, key: string): string {
  return env[key]?.trim() ?? '';
}

function parsePort(value: string): number {
  const port = parseInt(value, 10);
  return Number.isInteger(port) && port > 0 ? port : DEFAULT_PORT;
}

/**
 * Get configuration from environment variables.
 */
export function loadConfig(env: Env = process.env): AppConfig {
  return {
    port: parsePort(read(env, 'PORT')),
    mcpAuthToken: read(env, 'MCP_AUTH_TOKEN'),
    intervals: {
      apiKey: read(env, 'INTERVALS_API_KEY'),
      athleteId: read(env, 'INTERVALS_ATHLETE_ID'),
    },
    strava: {
      clientId: read(env, 'STRAVA_CLIENT_ID'),
      clientSecret: read(env, 'STRAVA_CLIENT_SECRET'),
      accessToken: read(env, 'STRAVA_ACCESS_TOKEN'),
      refreshToken: read(env, 'STRAVA_REFRESH_TOKEN'),
    },
  };
}

/**
 * Every required Strava env var that is absent, by name.
 */
export function getMissingStravaFields(strava: StravaConfig): string[] {
  const missing: string[] = [];
  if (!strava.clientId) missing.push('STRAVA_CLIENT_ID');
  if (!strava.clientSecret) missing.push('STRAVA_CLIENT_SECRET');
  if (!strava.refreshToken && !strava.accessToken) {
    missing.push('STRAVA_REFRESH_TOKEN or STRAVA_ACCESS_TOKEN');
  }
  return missing;
}

export function isStravaConfigured(strava: StravaConfig): boolean {
  return getMissingStravaFields(strava).length === 0;
}

/**
 * Startup summary. Never includes secret values.
 */
export function describeConfig(config: AppConfig): string[] {
  const { intervals, strava } = config;
  const lines = [
    intervals.apiKey
      ? `Intervals.icu: configured for athlete ${intervals.athleteId || '(missing INTERVALS_ATHLETE_ID)'}`
      : 'Intervals.icu: not configured (missing INTERVALS_API_KEY)',
  ];

  const missing = getMissingStravaFields(strava);
  if (missing.length === 0) {
    const mode = strava.accessToken ? 'static access token' : 'refresh token';
    lines.push(`Strava: configured (${mode})`);
  } else {
    lines.push(`Strava: not configured (missing ${missing.join(', ')})`);
  }

  lines.push(`MCP auth: ${config.mcpAuthToken ? 'bearer token required' : 'open'}`);
  return lines;
}
