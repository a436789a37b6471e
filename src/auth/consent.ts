/**
 * Interactive consent: authorization-code grant through the user's browser.
 *
 * A short-lived Fastify listener on a loopback ephemeral port receives the
 * redirect. The listener is closed on every exit path (success, denial,
 * timeout, cancellation), so the port is free again when this resolves or
 * rejects.
 */
import Fastify from 'fastify';
import open from 'open';
import type { FastifyReply } from 'fastify';
import {
  ConsentDeniedError,
  ConsentStateMismatchError,
  ConsentTimeoutError,
  isAuthError
} from './oauth-errors.js';
import { withBackoff } from './retry.js';
import type { RetryOptions } from './retry.js';
import type { AuthorizationRequest, AuthorizationServer, Credential } from './types.js';

export const CALLBACK_PATH = '/oauth2callback';
export const DEFAULT_CONSENT_TIMEOUT_MS = 5 * 60 * 1000;

export interface ConsentOptions {
  authServer: AuthorizationServer;
  /** Launches the authorization URL (default: system browser); failures fall back to printing it. */
  openBrowser?: (url: string) => Promise<unknown>;
  timeoutMs?: number;
  signal?: AbortSignal;
  host?: string;
  /** 0 picks an ephemeral port */
  port?: number;
  retry?: RetryOptions;
  logLevel?: string;
}

type Outcome = { code: string } | { error: unknown };

const HTML_ESCAPES: Record<string, string> = { '&': '&amp;', '<': '&lt;', '>': '&gt;', '"': '&quot;', "'": '&#39;' };

function escapeHtml(text: string): string {
  return text.replace(/[&<>"']/g, char => HTML_ESCAPES[char] ?? char);
}

function page(title: string, message: string): string {
  return `<!DOCTYPE html>
<html lang="en">
<head><meta charset="UTF-8"><title>${title}</title></head>
<body style="font-family: -apple-system, BlinkMacSystemFont, 'Segoe UI', Roboto, sans-serif; text-align: center; padding: 4em;">
  <h1>${title}</h1>
  <p>${message}</p>
</body>
</html>`;
}

function sendPage(reply: FastifyReply, status: number, title: string, message: string): FastifyReply {
  return reply.code(status).type('text/html').send(page(title, message));
}

function abortReason(signal: AbortSignal): unknown {
  return signal.reason ?? new Error('Consent flow aborted');
}

export function launchBrowser(url: string): Promise<unknown> {
  return open(url);
}

export async function runInteractiveConsent(options: ConsentOptions): Promise<Credential> {
  const { authServer } = options;
  const openBrowser = options.openBrowser ?? launchBrowser;
  const timeoutMs = options.timeoutMs ?? DEFAULT_CONSENT_TIMEOUT_MS;
  const host = options.host ?? '127.0.0.1';

  if (options.signal?.aborted) {
    throw abortReason(options.signal);
  }

  let pending: AuthorizationRequest | undefined;
  let outcome: Outcome | undefined;
  let notify: (() => void) | undefined;

  const settle = (result: Outcome): void => {
    if (outcome) return;
    outcome = result;
    notify?.();
  };

  const waitForCode = (): Promise<string> =>
    new Promise<string>((resolve, reject) => {
      const deliver = (): void => {
        if (!outcome) return;
        if ('code' in outcome) resolve(outcome.code);
        else reject(outcome.error);
      };
      if (outcome) deliver();
      else notify = deliver;
    });

  const app = Fastify({
    logger: options.logLevel === 'debug' ? { level: 'debug', stream: process.stderr } : false
  });

  app.get(CALLBACK_PATH, async (request, reply) => {
    if (outcome) {
      return sendPage(reply, 410, 'Sign-in already finished', 'You can close this window.');
    }
    if (!pending) {
      return sendPage(reply, 503, 'Sign-in not ready', 'Please retry from the application.');
    }

    const params = new URLSearchParams(request.url.split('?')[1] ?? '');
    const error = params.get('error');
    if (error) {
      console.error(`[Consent] Authorization refused: ${error}`);
      settle({ error: new ConsentDeniedError(error) });
      return sendPage(reply, 400, 'Access was not granted', `Google returned: ${escapeHtml(error)}. You can close this window.`);
    }

    if (params.get('state') !== pending.state) {
      console.error('[Consent] Callback state mismatch, aborting sign-in');
      settle({ error: new ConsentStateMismatchError() });
      return sendPage(reply, 400, 'Sign-in rejected', 'The sign-in request did not match. Please start again.');
    }

    const code = params.get('code');
    if (!code) {
      return sendPage(reply, 400, 'Missing authorization code', 'The callback did not include a code.');
    }

    settle({ code });
    return sendPage(reply, 200, 'Authentication successful', 'You can close this window and return to your assistant.');
  });

  const timer = setTimeout(() => settle({ error: new ConsentTimeoutError(timeoutMs) }), timeoutMs);
  const onAbort = (): void => {
    if (options.signal) settle({ error: abortReason(options.signal) });
  };
  options.signal?.addEventListener('abort', onAbort, { once: true });

  try {
    await app.listen({ host, port: options.port ?? 0 });
    const address = app.server.address();
    if (!address || typeof address === 'string') {
      throw new Error('Consent listener did not bind to a TCP port');
    }

    const redirectUri = `http://${host}:${address.port}${CALLBACK_PATH}`;
    const authRequest = authServer.createAuthorizationRequest(redirectUri);
    pending = authRequest;

    console.error(`[Consent] Waiting up to ${Math.round(timeoutMs / 1000)}s for Google sign-in on ${redirectUri}`);
    console.error(`[Consent] If no browser opens, visit:\n${authRequest.url}`);
    try {
      await openBrowser(authRequest.url);
    } catch (error) {
      console.warn('[Consent] Could not launch a browser, open the URL above manually:', error instanceof Error ? error.message : error);
    }

    const code = await waitForCode();

    const credential = await withBackoff(
      () => authServer.exchangeCode(code, authRequest.codeVerifier, redirectUri),
      error => isAuthError(error) && error.retryable,
      options.retry,
      'Authorization code exchange'
    );
    console.error('[Consent] Authorization code exchanged for tokens');
    return credential;
  } finally {
    clearTimeout(timer);
    options.signal?.removeEventListener('abort', onAbort);
    await app.close();
  }
}
