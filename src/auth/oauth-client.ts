import { CodeChallengeMethod, OAuth2Client } from 'google-auth-library';
import type { Credentials } from 'google-auth-library';
import { generators } from 'openid-client';
import type { ClientConfig } from '../config/oauth.js';
import { SCOPES } from '../config/oauth.js';
import { AuthorizationServerError, toAuthServerError } from './oauth-errors.js';
import type { AuthorizationRequest, AuthorizationServer, Credential } from './types.js';

const DEFAULT_TOKEN_LIFETIME_MS = 60 * 60 * 1000;

export interface GoogleAuthorizationServerOptions {
  scopes?: readonly string[];
  now?: () => number;
}

function parseScopes(scope: string | undefined): string[] | undefined {
  if (!scope) return undefined;
  const scopes = scope.split(/\s+/).filter(Boolean);
  return scopes.length > 0 ? scopes : undefined;
}

/**
 * Authorization-code grant against Google with a loopback redirect URI.
 * Each exchange or refresh uses its own OAuth2Client so no token state is
 * shared between calls.
 */
export class GoogleAuthorizationServer implements AuthorizationServer {
  private readonly scopes: readonly string[];
  private readonly now: () => number;

  constructor(private readonly config: ClientConfig, options: GoogleAuthorizationServerOptions = {}) {
    this.scopes = options.scopes ?? SCOPES;
    this.now = options.now ?? Date.now;
  }

  private createClient(redirectUri?: string): OAuth2Client {
    return new OAuth2Client({
      clientId: this.config.clientId,
      clientSecret: this.config.clientSecret,
      redirectUri,
      endpoints: { oauth2TokenUrl: this.config.tokenUri }
    });
  }

  createAuthorizationRequest(redirectUri: string): AuthorizationRequest {
    const codeVerifier = generators.codeVerifier();
    const codeChallenge = generators.codeChallenge(codeVerifier);
    const state = generators.state();

    const url = this.createClient(redirectUri).generateAuthUrl({
      access_type: 'offline',
      prompt: 'consent',
      scope: [...this.scopes],
      state,
      code_challenge: codeChallenge,
      code_challenge_method: CodeChallengeMethod.S256,
      redirect_uri: redirectUri
    });

    return { url, state, codeVerifier };
  }

  async exchangeCode(code: string, codeVerifier: string, redirectUri: string): Promise<Credential> {
    try {
      const { tokens } = await this.createClient(redirectUri).getToken({
        code,
        codeVerifier,
        redirect_uri: redirectUri
      });
      return this.toCredential(tokens, undefined);
    } catch (error) {
      throw toAuthServerError(error, 'new sign-in', 'exchange');
    }
  }

  async refresh(credential: Credential, identity: string): Promise<Credential> {
    const client = this.createClient();
    client.setCredentials({
      access_token: credential.accessToken,
      refresh_token: credential.refreshToken,
      expiry_date: credential.expiresAt
    });

    try {
      const { credentials } = await client.refreshAccessToken();
      return this.toCredential(credentials, credential);
    } catch (error) {
      throw toAuthServerError(error, identity, 'refresh');
    }
  }

  async lookupEmail(accessToken: string): Promise<string | undefined> {
    try {
      const info = await this.createClient().getTokenInfo(accessToken);
      return info.email;
    } catch (error) {
      throw toAuthServerError(error, 'new sign-in', 'exchange');
    }
  }

  /**
   * Build a Credential from a token endpoint response.
   * Google normally keeps the refresh token and scopes on refresh; keep the
   * previous values unless it sent new ones.
   */
  private toCredential(tokens: Credentials, previous: Credential | undefined): Credential {
    if (!tokens.access_token) {
      throw new AuthorizationServerError('Token endpoint response did not include an access_token', undefined);
    }

    return {
      accessToken: tokens.access_token,
      refreshToken: tokens.refresh_token ?? previous?.refreshToken,
      expiresAt: tokens.expiry_date ?? this.now() + DEFAULT_TOKEN_LIFETIME_MS,
      scopes: parseScopes(tokens.scope) ?? previous?.scopes ?? [...this.scopes],
      tokenUri: this.config.tokenUri,
      clientId: this.config.clientId
    };
  }
}
