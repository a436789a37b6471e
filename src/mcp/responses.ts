/**
 * MCP tool result helpers shared by every Google API handler.
 */
import type { CallToolResult } from '@modelcontextprotocol/sdk/types.js';
import type { OAuth2Client } from 'google-auth-library';
import { getHttpStatus, isAuthError, toToolErrorPayload } from '../auth/oauth-errors.js';
import type { CredentialStatus } from '../auth/types.js';
import { withGoogleAuth } from '../google/oauth-client-factory.js';
import type { TokenProvider } from '../google/oauth-client-factory.js';

export type GoogleApiName = 'gmail' | 'drive' | 'calendar';

const API_LABELS: Record<GoogleApiName, string> = {
  gmail: 'Gmail',
  drive: 'Drive',
  calendar: 'Calendar'
};

/** What tool handlers need from the credential layer. */
export interface WorkspaceCredentials extends TokenProvider {
  resolveIdentity(preferred?: string): Promise<string>;
  describe(identity: string): Promise<CredentialStatus>;
}

export interface ToolContext {
  credentials: WorkspaceCredentials;
  /** Account to act as; defaults to the most recently stored credential */
  account?: string;
}

export function jsonResult(data: unknown): CallToolResult {
  return {
    content: [{ type: 'text', text: JSON.stringify(data, null, 2) }]
  };
}

export function errorResult(payload: { error: string; code: number; message: string }): CallToolResult {
  return {
    content: [{ type: 'text', text: JSON.stringify(payload, null, 2) }],
    isError: true
  };
}

/**
 * Handle Google API and credential errors and return the matching MCP response.
 */
export function handleGoogleApiError(api: GoogleApiName, error: unknown): CallToolResult {
  const label = API_LABELS[api];

  if (isAuthError(error)) {
    return errorResult(toToolErrorPayload(error));
  }

  const code = getHttpStatus(error) ?? 500;
  const message = error instanceof Error ? error.message : `Unknown ${label} API error`;

  if (code === 401) {
    return errorResult({
      error: 'token_expired',
      code: 401,
      message: 'Google rejected the access token. Run `npm run authenticate` to sign in again.'
    });
  }

  const lower = message.toLowerCase();
  if (code === 429 || (code === 403 && (lower.includes('rate') || lower.includes('quota')))) {
    return errorResult({
      error: 'rate_limited',
      code,
      message: `${label} API rate limit exceeded. Please wait a moment and try again.`
    });
  }

  if (code === 403 && lower.includes('insufficient')) {
    return errorResult({
      error: 'insufficient_scope',
      code: 403,
      message: `${label} access not authorized. Run \`npm run authenticate\` to grant ${label} permissions.`
    });
  }

  console.error(`[MCP] ${label} API error (${code}):`, message);
  return errorResult({ error: `${api}_api_error`, code, message });
}

/**
 * Resolve the account, call Google with a valid token and wrap the result.
 */
export async function runGoogleTool<T>(
  context: ToolContext,
  api: GoogleApiName,
  requiredScopes: readonly string[],
  call: (auth: OAuth2Client) => Promise<T>
): Promise<CallToolResult> {
  try {
    const identity = await context.credentials.resolveIdentity(context.account);
    const result = await withGoogleAuth(context.credentials, identity, requiredScopes, call);
    return jsonResult(result);
  } catch (error) {
    return handleGoogleApiError(api, error);
  }
}
