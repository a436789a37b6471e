#!/usr/bin/env node
/**
 * Sign in to Google and store the credential.
 *
 * Usage: npm run authenticate [-- account@example.com]
 */
import 'dotenv/config';

import { credentialsConfig } from '../config/oauth.js';
import { createCredentialManager } from '../workspace.js';

const account = process.argv[2] || credentialsConfig.account;

try {
  const manager = await createCredentialManager({ interactive: true });
  const identity = await manager.authenticate(account);
  const status = await manager.describe(identity);

  console.error(`[Auth] Signed in as ${identity}`);
  console.error(`[Auth] Access token valid until ${status.expiresAt}, refresh token stored: ${status.hasRefreshToken}`);
  console.error(`[Auth] Credential saved under ${credentialsConfig.credentialsDir}`);
} catch (err) {
  console.error('[Auth] Authentication failed:', err instanceof Error ? err.message : err);
  process.exit(1);
}
