/**
 * OAuth configuration loaded from environment variables and the Google
 * client secret file.
 */
import { readFile } from 'fs/promises';
import { homedir } from 'os';
import { join } from 'path';
import { z } from 'zod';
import { ClientConfigError } from '../auth/oauth-errors.js';

function getEnvVar(name: string, defaultValue?: string): string {
  const value = process.env[name];
  if (!value) {
    if (defaultValue !== undefined) {
      return defaultValue;
    }
    throw new Error(`Missing required environment variable: ${name}`);
  }
  return value;
}

function getEnvNumber(name: string, defaultValue: number): number {
  const raw = getEnvVar(name, String(defaultValue));
  const value = Number(raw);
  if (!Number.isFinite(value) || value < 0) {
    throw new Error(`Environment variable ${name} must be a non-negative number, got: ${raw}`);
  }
  return value;
}

function expandHome(path: string): string {
  return path === '~' || path.startsWith('~/') ? join(homedir(), path.slice(1)) : path;
}

export const GOOGLE_TOKEN_URI = 'https://oauth2.googleapis.com/token';

/** Permissions requested at consent time. */
export const SCOPES = [
  'https://www.googleapis.com/auth/gmail.modify',
  'https://www.googleapis.com/auth/gmail.send',
  'https://www.googleapis.com/auth/gmail.labels',
  'https://www.googleapis.com/auth/gmail.settings.basic',
  'https://www.googleapis.com/auth/drive',
  'https://www.googleapis.com/auth/documents',
  'https://www.googleapis.com/auth/spreadsheets',
  'https://www.googleapis.com/auth/presentations',
  'https://www.googleapis.com/auth/forms.body',
  'https://www.googleapis.com/auth/tasks',
  'https://www.googleapis.com/auth/calendar',
  'https://www.googleapis.com/auth/chat.spaces',
  'https://www.googleapis.com/auth/chat.messages',
  'https://www.googleapis.com/auth/chat.memberships',
  'https://www.googleapis.com/auth/userinfo.email'
] as const;

export const credentialsConfig = {
  credentialsDir: expandHome(getEnvVar('GOOGLE_WORKSPACE_CREDENTIALS_DIR', '~/.google_workspace_mcp/credentials')),
  clientSecretPath: expandHome(getEnvVar('GOOGLE_CLIENT_SECRET_PATH', '~/google-workspace-mcp/client_secret.json')),
  account: process.env.GOOGLE_WORKSPACE_ACCOUNT || undefined,
  interactive: getEnvVar('GOOGLE_WORKSPACE_INTERACTIVE', 'false') === 'true',
  consentTimeoutMs: getEnvNumber('GOOGLE_CONSENT_TIMEOUT_MS', 5 * 60 * 1000),
  safetyMarginMs: getEnvNumber('GOOGLE_TOKEN_SAFETY_MARGIN_MS', 60 * 1000),
  logLevel: getEnvVar('LOG_LEVEL', 'info')
} as const;

/** OAuth client identity, read once at startup. */
export interface ClientConfig {
  readonly clientId: string;
  readonly clientSecret: string;
  readonly tokenUri: string;
}

const clientSecretEntrySchema = z.object({
  client_id: z.string().min(1),
  client_secret: z.string().min(1),
  token_uri: z.string().url().optional()
});

const clientSecretFileSchema = z.union([
  z.object({ installed: clientSecretEntrySchema }),
  z.object({ web: clientSecretEntrySchema })
]);

/**
 * Load the OAuth client configuration.
 * GOOGLE_CLIENT_ID / GOOGLE_CLIENT_SECRET win over the client secret file.
 */
export async function loadClientConfig(
  env: NodeJS.ProcessEnv = process.env,
  clientSecretPath: string = credentialsConfig.clientSecretPath
): Promise<ClientConfig> {
  if (env.GOOGLE_CLIENT_ID && env.GOOGLE_CLIENT_SECRET) {
    return Object.freeze({
      clientId: env.GOOGLE_CLIENT_ID,
      clientSecret: env.GOOGLE_CLIENT_SECRET,
      tokenUri: GOOGLE_TOKEN_URI
    });
  }

  let raw: string;
  try {
    raw = await readFile(clientSecretPath, 'utf-8');
  } catch (error) {
    throw new ClientConfigError(
      `Google OAuth client not configured: set GOOGLE_CLIENT_ID and GOOGLE_CLIENT_SECRET, ` +
        `or save the Desktop app client secret JSON to ${clientSecretPath}`,
      error
    );
  }

  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch (error) {
    throw new ClientConfigError(`Client secret file ${clientSecretPath} is not valid JSON`, error);
  }

  const parsed = clientSecretFileSchema.safeParse(json);
  if (!parsed.success) {
    throw new ClientConfigError(
      `Client secret file ${clientSecretPath} must contain an "installed" or "web" entry with client_id and client_secret`,
      parsed.error
    );
  }

  const entry = 'installed' in parsed.data ? parsed.data.installed : parsed.data.web;
  return Object.freeze({
    clientId: entry.client_id,
    clientSecret: entry.client_secret,
    tokenUri: entry.token_uri ?? GOOGLE_TOKEN_URI
  });
}
