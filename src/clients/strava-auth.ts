import type { StravaConfig } from '../config/index.js';
import { ConfigError, UpstreamAuthError } from '../errors/index.js';
import { isJsonObject, sendRequest } from './http.js';

export const STRAVA_TOKEN_URL = 'https://www.strava.com/oauth/token';

export interface TokenTriple {
  accessToken: string;
  refreshToken: string;
  /** Epoch seconds */
  expiresAt: number;
}

/**
 * Mask a token for logging (show first 4 and last 4 characters)
 */
export function maskToken(token: string): string {
  if (token.length <= 12) return '***';
  return `${token.slice(0, 4)}...${token.slice(-4)}`;
}

function readString(body: Record<string, unknown>, key: string): string {
  const value = body[key];
  return typeof value === 'string' ? value : '';
}

function readNumber(body: Record<string, unknown>, key: string): number {
  const value = body[key];
  return typeof value === 'number' ? value : 0;
}

/**
 * Exchange the configured refresh token for a new access token.
 *
 * The returned triple is not stored anywhere; callers that want to keep it
 * must persist it themselves. Fields missing from the response come back as
 * empty strings (or 0 for `expiresAt`) rather than an error.
 */
export async function refreshStravaToken(strava: StravaConfig): Promise<TokenTriple> {
  const missing: string[] = [];
  if (!strava.clientId) missing.push('STRAVA_CLIENT_ID');
  if (!strava.clientSecret) missing.push('STRAVA_CLIENT_SECRET');
  if (!strava.refreshToken) missing.push('STRAVA_REFRESH_TOKEN');
  if (missing.length > 0) {
    throw new ConfigError(missing, 'strava');
  }

  console.log(`[Strava] Refreshing access token using refresh token ${maskToken(strava.refreshToken)}`);

  const { status, data } = await sendRequest({
    method: 'POST',
    url: STRAVA_TOKEN_URL,
    form: {
      client_id: strava.clientId,
      client_secret: strava.clientSecret,
      refresh_token: strava.refreshToken,
      grant_type: 'refresh_token',
    },
    source: 'strava',
  });

  if (status >= 400) {
    console.error(`[Strava] Token refresh failed with ${status}`);
    throw UpstreamAuthError.fromRefreshResponse(status, data);
  }

  const body = isJsonObject(data) ? data : {};
  const tokens: TokenTriple = {
    accessToken: readString(body, 'access_token'),
    refreshToken: readString(body, 'refresh_token'),
    expiresAt: readNumber(body, 'expires_at'),
  };

  console.log(`[Strava] Token refresh successful, expires at ${tokens.expiresAt}`);
  return tokens;
}
