/**
 * Wiring shared by the stdio server and the authenticate command.
 */
import { CredentialManager } from './auth/credential-manager.js';
import { GoogleAuthorizationServer } from './auth/oauth-client.js';
import { credentialsConfig, loadClientConfig } from './config/oauth.js';
import { FileCredentialStore } from './storage/credential-store.js';

export interface WorkspaceOptions {
  /** Overrides GOOGLE_WORKSPACE_INTERACTIVE */
  interactive?: boolean;
}

export async function createCredentialManager(options: WorkspaceOptions = {}): Promise<CredentialManager> {
  const clientConfig = await loadClientConfig();

  return new CredentialManager({
    store: new FileCredentialStore({ directory: credentialsConfig.credentialsDir }),
    authServer: new GoogleAuthorizationServer(clientConfig),
    interactive: options.interactive ?? credentialsConfig.interactive,
    safetyMarginMs: credentialsConfig.safetyMarginMs,
    consentOptions: {
      timeoutMs: credentialsConfig.consentTimeoutMs,
      logLevel: credentialsConfig.logLevel
    }
  });
}
