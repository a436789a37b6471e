/**
 * Types shared by the credential manager, the authorization server adapter
 * and the consent flow.
 */

/** One authorized identity's access to the declared scopes. */
export interface Credential {
  accessToken: string;
  /** Absent when Google did not issue one; the credential then dies at expiry. */
  refreshToken?: string;
  /** Access token expiry (ms since epoch) */
  expiresAt: number;
  scopes: string[];
  tokenUri: string;
  clientId: string;
}

/** What a caller gets: enough to attach one bearer token to one request. */
export interface AccessTokenSnapshot {
  readonly identity: string;
  readonly accessToken: string;
  readonly expiresAt: number;
  readonly scopes: readonly string[];
}

export interface AuthorizationRequest {
  url: string;
  state: string;
  codeVerifier: string;
}

/**
 * The OAuth2 authorization server as seen by the credential layer.
 * Implementations throw AuthError subclasses only.
 */
export interface AuthorizationServer {
  createAuthorizationRequest(redirectUri: string): AuthorizationRequest;
  exchangeCode(code: string, codeVerifier: string, redirectUri: string): Promise<Credential>;
  refresh(credential: Credential, identity: string): Promise<Credential>;
  /** Email address the access token belongs to, when the userinfo.email scope was granted. */
  lookupEmail(accessToken: string): Promise<string | undefined>;
}

export type CredentialState = 'missing' | 'valid' | 'expiring' | 'expired';

export interface CredentialStatus {
  identity: string;
  state: CredentialState;
  expiresAt: string | null;
  hasRefreshToken: boolean;
  scopes: string[];
}
