import type { StravaConfig } from '../config/index.js';
import { getMissingStravaFields } from '../config/index.js';
import { ConfigError, TransportError, UpstreamAuthError } from '../errors/index.js';
import { sendRequest, type HttpResult } from './http.js';
import { refreshStravaToken, type TokenTriple } from './strava-auth.js';

export const STRAVA_API_BASE = 'https://www.strava.com/api/v3';

export type TokenRefresher = (strava: StravaConfig) => Promise<TokenTriple>;

/**
 * Activity response, plus the refreshed token triple when a refresh happened
 * during the call so the caller has a chance to persist it.
 */
export interface StravaActivityResult extends HttpResult, Partial<TokenTriple> {}

export class StravaClient {
  private config: StravaConfig;
  private refresh: TokenRefresher;

  constructor(config: StravaConfig, refresh: TokenRefresher = refreshStravaToken) {
    this.config = config;
    this.refresh = refresh;
  }

  private async getActivity(
    activityId: string,
    token: string,
    params?: Record<string, string>
  ): Promise<HttpResult> {
    console.log(`[Strava] Fetching activity ${activityId}`);
    return sendRequest({
      method: 'GET',
      url: `${STRAVA_API_BASE}/activities/${encodeURIComponent(activityId)}`,
      params,
      headers: { Authorization: `Bearer ${token}` },
      source: 'strava',
    });
  }

  /**
   * Fetch a Strava activity with a single refresh-and-retry on 401.
   *
   * The bearer token only lives on this call's stack: a refreshed token is
   * never written back to the shared config, so concurrent calls can't see
   * each other's tokens.
   */
  async fetchActivity(activityId: string): Promise<StravaActivityResult> {
    const missing = getMissingStravaFields(this.config);
    if (missing.length > 0) {
      throw new ConfigError(missing, 'strava');
    }

    let refreshed: TokenTriple | undefined;
    let token = this.config.accessToken;
    if (!token) {
      refreshed = await this.refresh(this.config);
      token = refreshed.accessToken;
    }

    let response = await this.getActivity(activityId, token, { include_all_efforts: 'true' });

    if (response.status === 401 && this.config.refreshToken) {
      console.log(`[Strava] Got 401 on activity ${activityId}, refreshing token and retrying once...`);
      try {
        refreshed = await this.refresh(this.config);
      } catch (error) {
        if (error instanceof UpstreamAuthError) {
          throw UpstreamAuthError.afterUnauthorized(activityId, error);
        }
        if (error instanceof TransportError) {
          throw TransportError.afterUnauthorized(activityId, error);
        }
        throw error;
      }
      token = refreshed.accessToken;

      // The retry goes out without include_all_efforts
      response = await this.getActivity(activityId, token);
    }

    return refreshed ? { ...response, ...refreshed } : response;
  }
}
