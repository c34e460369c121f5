#!/usr/bin/env tsx
/**
 * Strava OAuth Setup Script
 *
 * Obtains an initial Strava access/refresh token pair and prints the env
 * lines to set. Nothing is written to disk.
 * Run with: npm run strava:auth
 *
 * Requirements:
 * - STRAVA_CLIENT_ID and STRAVA_CLIENT_SECRET in environment
 *
 * Redirect URI:
 * - STRAVA_REDIRECT_URI if set
 * - Otherwise http://localhost:{PORT}/callback
 */

import * as readline from 'readline';
import { DEFAULT_PORT, loadConfig, type Env } from '../config/index.js';
import { sendRequest, stringifyBody } from '../clients/http.js';
import { STRAVA_TOKEN_URL, maskToken } from '../clients/strava-auth.js';

export const STRAVA_AUTHORIZE_URL = 'https://www.strava.com/oauth/authorize';
export const STRAVA_SCOPE = 'read,activity:read_all';

interface TokenResponse {
  access_token: string;
  refresh_token: string;
  expires_at: number;
}

export function getRedirectUri(env: Env = process.env): string {
  if (env.STRAVA_REDIRECT_URI) {
    return env.STRAVA_REDIRECT_URI;
  }

  const port = env.PORT || String(DEFAULT_PORT);
  return `http://localhost:${port}/callback`;
}

export function buildAuthorizationUrl(clientId: string, redirectUri: string): string {
  const params = new URLSearchParams({
    client_id: clientId,
    redirect_uri: redirectUri,
    response_type: 'code',
    approval_prompt: 'auto',
    scope: STRAVA_SCOPE,
  });

  return `${STRAVA_AUTHORIZE_URL}?${params.toString()}`;
}

function isTokenResponse(value: unknown): value is TokenResponse {
  if (typeof value !== 'object' || value === null) {
    return false;
  }
  return (
    'access_token' in value && typeof value.access_token === 'string' &&
    'refresh_token' in value && typeof value.refresh_token === 'string' &&
    'expires_at' in value && typeof value.expires_at === 'number'
  );
}

/**
 * Exchange an authorization code for the first token pair.
 */
export async function exchangeCodeForTokens(
  code: string,
  clientId: string,
  clientSecret: string
): Promise<TokenResponse> {
  const { status, data } = await sendRequest({
    method: 'POST',
    url: STRAVA_TOKEN_URL,
    form: {
      client_id: clientId,
      client_secret: clientSecret,
      code,
      grant_type: 'authorization_code',
    },
    source: 'strava',
  });

  if (status >= 400) {
    throw new Error(`Token exchange failed: ${status} - ${stringifyBody(data)}`);
  }
  if (!isTokenResponse(data)) {
    throw new Error(`Invalid token response from Strava: ${stringifyBody(data)}`);
  }

  return data;
}

async function main() {
  console.log('\nStrava OAuth Setup\n');

  const { strava } = loadConfig();
  const redirectUri = getRedirectUri();

  if (!strava.clientId || !strava.clientSecret) {
    console.error('Missing required environment variables:');
    if (!strava.clientId) console.error('   - STRAVA_CLIENT_ID');
    if (!strava.clientSecret) console.error('   - STRAVA_CLIENT_SECRET');
    console.error('\nSet these in your .env file and try again.');
    process.exit(1);
  }

  console.log('Step 1: Open this URL in your browser to authorize:\n');
  console.log(`   ${buildAuthorizationUrl(strava.clientId, redirectUri)}\n`);
  console.log("Step 2: After authorizing, you'll be redirected to:");
  console.log(`   ${redirectUri}?code=AUTHORIZATION_CODE\n`);
  console.log('Step 3: Copy the authorization code (the "code" parameter).\n');

  const rl = readline.createInterface({
    input: process.stdin,
    output: process.stdout,
  });

  const code = await new Promise<string>((resolve) => {
    rl.question('Enter the authorization code: ', (answer) => {
      rl.close();
      resolve(answer.trim());
    });
  });

  if (!code) {
    console.error('No authorization code provided.');
    process.exit(1);
  }

  console.log('\nExchanging code for tokens...');
  const tokens = await exchangeCodeForTokens(code, strava.clientId, strava.clientSecret);

  console.log(`\nSuccess! Access token ${maskToken(tokens.access_token)} expires at ${new Date(tokens.expires_at * 1000).toISOString()}.`);
  console.log('Set these in your environment:\n');
  console.log(`STRAVA_ACCESS_TOKEN=${tokens.access_token}`);
  console.log(`STRAVA_REFRESH_TOKEN=${tokens.refresh_token}\n`);
  console.log('Leave STRAVA_ACCESS_TOKEN unset to refresh a new one on every call instead.\n');
}

// Only run main() when executed directly, not when imported
const isMainModule = process.argv[1]?.endsWith('strava-oauth.js') ||
                     process.argv[1]?.endsWith('strava-oauth.ts');

if (isMainModule) {
  main().catch((error) => {
    console.error('Failed to complete Strava authorization:', error);
    process.exit(1);
  });
}
