/**
 * OAuth2Client factory for Google API calls.
 *
 * Clients built here carry only an access token. Refresh belongs to the
 * CredentialManager, so the client is never given a refresh token or an
 * expiry of its own.
 */

import { google } from 'googleapis';
import type { OAuth2Client } from 'google-auth-library';
import type { GetAccessTokenOptions } from '../auth/credential-manager.js';
import { getHttpStatus } from '../auth/oauth-errors.js';
import type { AccessTokenSnapshot } from '../auth/types.js';

/** The part of the CredentialManager the tool layer depends on. */
export interface TokenProvider {
  getValidAccessToken(identity: string, options?: GetAccessTokenOptions): Promise<AccessTokenSnapshot>;
  invalidate(identity: string): Promise<void>;
}

export function createAccessTokenClient(token: AccessTokenSnapshot): OAuth2Client {
  const oauth2Client = new google.auth.OAuth2();
  oauth2Client.setCredentials({ access_token: token.accessToken });
  return oauth2Client;
}

/**
 * Run one Google API call with a valid bearer token.
 *
 * If the API answers 401 the stored credential is invalidated and the call is
 * retried once with whatever a fresh `getValidAccessToken` returns.
 *
 * @example
 * const labels = await withGoogleAuth(manager, 'me@example.com', GMAIL_SCOPES, auth =>
 *   createGmailClient(auth).users.labels.list({ userId: 'me' })
 * );
 */
export async function withGoogleAuth<T>(
  tokens: TokenProvider,
  identity: string,
  requiredScopes: readonly string[],
  call: (auth: OAuth2Client) => Promise<T>
): Promise<T> {
  const token = await tokens.getValidAccessToken(identity, { requiredScopes });

  try {
    return await call(createAccessTokenClient(token));
  } catch (error) {
    if (getHttpStatus(error) !== 401) {
      throw error;
    }

    console.error(`[Google] Access token for ${identity} was rejected, invalidating and retrying once`);
    await tokens.invalidate(identity);
    const retryToken = await tokens.getValidAccessToken(identity, { requiredScopes });
    return call(createAccessTokenClient(retryToken));
  }
}
