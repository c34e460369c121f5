import { describe, it, expect } from 'vitest';
import {
  DEFAULT_PORT,
  describeConfig,
  getMissingStravaFields,
  isStravaConfigured,
  loadConfig,
} from '../../src/config/index.js';

describe('config', () => {
  describe('loadConfig', () => {
    it('should read every value from the environment', () => {
      const config = loadConfig({
        PORT: '9000',
        MCP_AUTH_TOKEN: 'test-mcp-token',
        INTERVALS_API_KEY: 'test-api-key',
        INTERVALS_ATHLETE_ID: 'i12345',
        STRAVA_CLIENT_ID: 'test-client-id',
        STRAVA_CLIENT_SECRET: 'test-client-secret',
        STRAVA_ACCESS_TOKEN: 'test-access-token',
        STRAVA_REFRESH_TOKEN: 'test-refresh-token',
      });

      expect(config).toEqual({
        port: 9000,
        mcpAuthToken: 'test-mcp-token',
        intervals: { apiKey: 'test-api-key', athleteId: 'i12345' },
        strava: {
          clientId: 'test-client-id',
          clientSecret: 'test-client-secret',
          accessToken: 'test-access-token',
          refreshToken: 'test-refresh-token',
        },
      });
    });

    it('should never throw on an empty environment', () => {
      const config = loadConfig({});

      expect(config.port).toBe(DEFAULT_PORT);
      expect(config.intervals).toEqual({ apiKey: '', athleteId: '' });
      expect(config.strava).toEqual({ clientId: '', clientSecret: '', accessToken: '', refreshToken: '' });
    });

    it('should fall back to the default port for unusable values', () => {
      expect(loadConfig({ PORT: 'abc' }).port).toBe(8000);
      expect(loadConfig({ PORT: '0' }).port).toBe(8000);
    });

    it('should treat whitespace-only values as absent', () => {
      expect(loadConfig({ INTERVALS_API_KEY: '   ' }).intervals.apiKey).toBe('');
    });
  });

  describe('getMissingStravaFields', () => {
    const complete = {
      clientId: 'test-client-id',
      clientSecret: 'test-client-secret',
      accessToken: '',
      refreshToken: 'test-refresh-token',
    };

    it('should return nothing when configured with a refresh token', () => {
      expect(getMissingStravaFields(complete)).toEqual([]);
      expect(isStravaConfigured(complete)).toBe(true);
    });

    it('should accept an access token in place of a refresh token', () => {
      const config = { ...complete, accessToken: 'test-access-token', refreshToken: '' };
      expect(isStravaConfigured(config)).toBe(true);
    });

    it('should list every missing field, not just the first', () => {
      const empty = { clientId: '', clientSecret: '', accessToken: '', refreshToken: '' };
      expect(getMissingStravaFields(empty)).toEqual([
        'STRAVA_CLIENT_ID',
        'STRAVA_CLIENT_SECRET',
        'STRAVA_REFRESH_TOKEN or STRAVA_ACCESS_TOKEN',
      ]);
      expect(isStravaConfigured(empty)).toBe(false);
    });

    it('should require the client secret even with tokens present', () => {
      const config = { ...complete, clientSecret: '', accessToken: 'test-access-token' };
      expect(getMissingStravaFields(config)).toEqual(['STRAVA_CLIENT_SECRET']);
    });
  });

  describe('describeConfig', () => {
    it('should summarize without printing secrets', () => {
      const config = loadConfig({
        INTERVALS_API_KEY: 'test-api-key',
        INTERVALS_ATHLETE_ID: 'i12345',
        STRAVA_CLIENT_ID: 'test-client-id',
        STRAVA_CLIENT_SECRET: 'test-client-secret',
        STRAVA_REFRESH_TOKEN: 'test-refresh-token',
      });

      expect(describeConfig(config)).toEqual([
        'Intervals.icu: configured for athlete i12345',
        'Strava: configured (refresh token)',
        'MCP auth: open',
      ]);
    });

    it('should name what is missing', () => {
      expect(describeConfig(loadConfig({ STRAVA_CLIENT_ID: 'x', MCP_AUTH_TOKEN: 'test-mcp-token' }))).toEqual([
        'Intervals.icu: not configured (missing INTERVALS_API_KEY)',
        'Strava: not configured (missing STRAVA_CLIENT_SECRET, STRAVA_REFRESH_TOKEN or STRAVA_ACCESS_TOKEN)',
        'MCP auth: bearer token required',
      ]);
    });
  });
});
