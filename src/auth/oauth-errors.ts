/**
 * OAuth error taxonomy and classification.
 *
 * Every failure the credential layer can surface is an AuthError subclass
 * carrying a stable `code` and a `retryable` flag, so the tool layer can tell
 * "try again in a moment" apart from "the user has to sign in again".
 */

const SETUP_HINT = 'Run `npm run authenticate` to sign in again.';

export type AuthErrorCode =
  | 'no_credential'
  | 'consent_timeout'
  | 'consent_denied'
  | 'consent_state_mismatch'
  | 'refresh_rejected'
  | 'transient_network'
  | 'persistence'
  | 'insufficient_scope'
  | 'invalid_identity'
  | 'client_config'
  | 'authorization_server';

export class AuthError extends Error {
  readonly code: AuthErrorCode;
  readonly retryable: boolean;

  constructor(code: AuthErrorCode, message: string, options?: { cause?: unknown; retryable?: boolean }) {
    super(message, options?.cause === undefined ? undefined : { cause: options.cause });
    this.name = new.target.name;
    this.code = code;
    this.retryable = options?.retryable ?? false;
  }
}

export class NoCredentialError extends AuthError {
  constructor(identity: string, reason = 'No stored Google credential') {
    super('no_credential', `${reason} for ${identity}. ${SETUP_HINT}`);
  }
}

export class ConsentTimeoutError extends AuthError {
  constructor(timeoutMs: number) {
    super('consent_timeout', `Google sign-in was not completed within ${Math.round(timeoutMs / 1000)}s. Start the sign-in again.`);
  }
}

export class ConsentDeniedError extends AuthError {
  constructor(reason: string) {
    super('consent_denied', `Google sign-in was refused: ${reason}`);
  }
}

export class ConsentStateMismatchError extends AuthError {
  constructor() {
    super('consent_state_mismatch', 'OAuth callback state did not match the pending sign-in request');
  }
}

export class RefreshRejectedError extends AuthError {
  constructor(identity: string, cause?: unknown) {
    super('refresh_rejected', `Google revoked or expired the refresh token for ${identity}. ${SETUP_HINT}`, { cause });
  }
}

export class TransientNetworkError extends AuthError {
  constructor(message: string, cause?: unknown) {
    super('transient_network', message, { cause, retryable: true });
  }
}

export class PersistenceError extends AuthError {
  readonly path: string;

  constructor(path: string, operation: string, cause?: unknown) {
    super('persistence', `Failed to ${operation} credential file ${path}`, { cause });
    this.path = path;
  }
}

export class InsufficientScopeError extends AuthError {
  readonly requiredScopes: readonly string[];

  constructor(identity: string, requiredScopes: readonly string[]) {
    super(
      'insufficient_scope',
      `The credential for ${identity} was not granted any of: ${requiredScopes.join(', ')}. ${SETUP_HINT}`
    );
    this.requiredScopes = requiredScopes;
  }
}

export class InvalidIdentityError extends AuthError {
  constructor(identity: string) {
    super('invalid_identity', `Invalid account identity: ${JSON.stringify(identity)}`);
  }
}

export class ClientConfigError extends AuthError {
  constructor(message: string, cause?: unknown) {
    super('client_config', message, { cause });
  }
}

export class AuthorizationServerError extends AuthError {
  readonly status: number | undefined;

  constructor(message: string, status: number | undefined, cause?: unknown) {
    super('authorization_server', message, { cause });
    this.status = status;
  }
}

export function isAuthError(error: unknown): error is AuthError {
  return error instanceof AuthError;
}

function getProperty(value: unknown, key: string): unknown {
  if (typeof value !== 'object' || value === null || !(key in value)) return undefined;
  return Reflect.get(value, key);
}

/** HTTP status of a gaxios-style error (`error.response.status`, or an HTTP `error.code`). */
export function getHttpStatus(error: unknown): number | undefined {
  const status = getProperty(getProperty(error, 'response'), 'status');
  if (typeof status === 'number') return status;

  const code = getProperty(error, 'code');
  if (typeof code === 'number') return code;
  if (typeof code === 'string' && /^\d{3}$/.test(code)) return parseInt(code, 10);
  return undefined;
}

/** The OAuth `error` field from a token endpoint response body, if any. */
export function getOAuthErrorCode(error: unknown): string | undefined {
  const value = getProperty(getProperty(getProperty(error, 'response'), 'data'), 'error');
  return typeof value === 'string' ? value : undefined;
}

/**
 * Check if error is from a revoked or invalid refresh token.
 *
 * Google answers `invalid_grant` when the refresh token was revoked by the
 * user, expired, or was never valid.
 */
export function isRevokedTokenError(error: unknown): boolean {
  if (getOAuthErrorCode(error) === 'invalid_grant') return true;

  const message = error instanceof Error ? error.message : '';
  return message.includes('invalid_grant') || message.includes('Token has been expired or revoked');
}

const TRANSIENT_SYSTEM_CODES = new Set([
  'ECONNRESET',
  'ECONNREFUSED',
  'ENOTFOUND',
  'EAI_AGAIN',
  'ETIMEDOUT',
  'EPIPE',
  'ECONNABORTED'
]);

const HTTP_CLIENT_ERROR_NAMES = new Set(['GaxiosError', 'FetchError']);

/** Connectivity failures, 5xx and 429 responses are worth retrying; anything else is not. */
export function isTransientError(error: unknown): boolean {
  const status = getHttpStatus(error);
  if (status !== undefined) {
    return status >= 500 || status === 429;
  }

  const code = getProperty(error, 'code');
  if (typeof code === 'string' && TRANSIENT_SYSTEM_CODES.has(code)) return true;

  // An HTTP client error without a response never reached the server.
  return error instanceof Error
    && HTTP_CLIENT_ERROR_NAMES.has(error.name)
    && getProperty(error, 'response') === undefined;
}

/**
 * Translate a failure talking to the token endpoint into the taxonomy.
 * AuthErrors pass through untouched. `invalid_grant` only means a revoked
 * refresh token when the request was a refresh; for a code exchange it means
 * a stale authorization code.
 */
export function toAuthServerError(
  error: unknown,
  identity: string,
  action: 'refresh' | 'exchange'
): AuthError {
  if (isAuthError(error)) return error;

  if (action === 'refresh' && isRevokedTokenError(error)) {
    return new RefreshRejectedError(identity, error);
  }

  const detail = error instanceof Error ? error.message : String(error);
  if (isTransientError(error)) {
    return new TransientNetworkError(`Could not reach Google to ${describeAction(action)}: ${detail}`, error);
  }

  return new AuthorizationServerError(`Google rejected the request to ${describeAction(action)}: ${detail}`, getHttpStatus(error), error);
}

function describeAction(action: 'refresh' | 'exchange'): string {
  return action === 'refresh' ? 'refresh the access token' : 'exchange the authorization code';
}

export interface ToolErrorPayload {
  error: string;
  code: number;
  message: string;
  retryable: boolean;
}

/**
 * Create the error body returned by MCP tools for credential failures.
 */
export function toToolErrorPayload(error: AuthError): ToolErrorPayload {
  switch (error.code) {
    case 'no_credential':
    case 'refresh_rejected':
    case 'consent_timeout':
    case 'consent_denied':
    case 'consent_state_mismatch':
      return { error: 'authentication_required', code: 401, message: error.message, retryable: error.code === 'consent_timeout' };
    case 'insufficient_scope':
      return { error: 'insufficient_scope', code: 403, message: error.message, retryable: false };
    case 'transient_network':
      return { error: 'auth_unavailable', code: 503, message: error.message, retryable: true };
    default:
      return { error: error.code, code: 500, message: error.message, retryable: error.retryable };
  }
}
