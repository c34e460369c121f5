import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import {
  STRAVA_AUTHORIZE_URL,
  buildAuthorizationUrl,
  exchangeCodeForTokens,
  getRedirectUri,
} from '../../src/scripts/strava-oauth.js';

describe('strava-oauth', () => {
  describe('getRedirectUri', () => {
    it('should use STRAVA_REDIRECT_URI when set', () => {
      expect(getRedirectUri({ STRAVA_REDIRECT_URI: 'https://example.com/callback', PORT: '3000' })).toBe(
        'https://example.com/callback'
      );
    });

    it('should fall back to localhost on PORT', () => {
      expect(getRedirectUri({ PORT: '3000' })).toBe('http://localhost:3000/callback');
    });

    it('should fall back to the default port', () => {
      expect(getRedirectUri({})).toBe('http://localhost:8000/callback');
    });
  });

  describe('buildAuthorizationUrl', () => {
    it('should request read access to all activities', () => {
      const url = new URL(buildAuthorizationUrl('test-client-id', 'http://localhost:8000/callback'));

      expect(`${url.origin}${url.pathname}`).toBe(STRAVA_AUTHORIZE_URL);
      expect(url.searchParams.get('client_id')).toBe('test-client-id');
      expect(url.searchParams.get('redirect_uri')).toBe('http://localhost:8000/callback');
      expect(url.searchParams.get('response_type')).toBe('code');
      expect(url.searchParams.get('approval_prompt')).toBe('auto');
      expect(url.searchParams.get('scope')).toBe('read,activity:read_all');
    });
  });

  describe('exchangeCodeForTokens', () => {
    const mockFetch = vi.fn();

    beforeEach(() => {
      vi.stubGlobal('fetch', mockFetch);
    });

    afterEach(() => {
      vi.unstubAllGlobals();
      mockFetch.mockReset();
    });

    it('should post the code as a form and return the tokens', async () => {
      mockFetch.mockResolvedValueOnce(
        new Response(
          JSON.stringify({ access_token: 'test-access', refresh_token: 'test-refresh', expires_at: 1700000000 })
        )
      );

      const tokens = await exchangeCodeForTokens('test-code', 'test-client-id', 'test-secret');

      expect(tokens).toEqual({ access_token: 'test-access', refresh_token: 'test-refresh', expires_at: 1700000000 });
      const [url, init] = mockFetch.mock.calls[0];
      expect(url).toBe('https://www.strava.com/oauth/token');
      expect(init.method).toBe('POST');
      expect(init.body.toString()).toBe(
        'client_id=test-client-id&client_secret=test-secret&code=test-code&grant_type=authorization_code'
      );
    });

    it('should throw when Strava rejects the code', async () => {
      mockFetch.mockResolvedValueOnce(new Response('{"message":"Bad Request"}', { status: 400 }));

      await expect(exchangeCodeForTokens('bad-code', 'test-client-id', 'test-secret')).rejects.toThrow(
        'Token exchange failed: 400 - {"message":"Bad Request"}'
      );
    });

    it('should throw on a response without tokens', async () => {
      mockFetch.mockResolvedValueOnce(new Response('{"access_token":"test-access"}'));

      await expect(exchangeCodeForTokens('test-code', 'test-client-id', 'test-secret')).rejects.toThrow(
        'Invalid token response from Strava: {"access_token":"test-access"}'
      );
    });
  });
});
