/**
 * Credential manager: one OAuth2 credential per Google account.
 *
 * Per identity the manager moves between three situations on every call:
 * - valid (expiry beyond the safety margin): the cached token is returned, no I/O;
 * - expired or about to expire: one refresh, shared by every concurrent caller;
 * - nothing usable: interactive consent when allowed, NoCredentialError otherwise.
 *
 * Anything that writes the credential file (refresh, consent, invalidate,
 * authenticate) runs under a per-identity lock, so there is at most one such
 * operation per identity in this process.
 */
import { runInteractiveConsent } from './consent.js';
import type { ConsentOptions } from './consent.js';
import {
  AuthorizationServerError,
  InsufficientScopeError,
  NoCredentialError,
  RefreshRejectedError,
  toAuthServerError
} from './oauth-errors.js';
import { withBackoff } from './retry.js';
import type { RetryOptions } from './retry.js';
import type {
  AccessTokenSnapshot,
  AuthorizationServer,
  Credential,
  CredentialStatus
} from './types.js';
import type { CredentialStore } from '../storage/types.js';

export const DEFAULT_SAFETY_MARGIN_MS = 60 * 1000;

export type ConsentRunner = () => Promise<Credential>;

export interface CredentialManagerOptions {
  store: CredentialStore;
  authServer: AuthorizationServer;
  /** Whether consent may be started when no usable credential exists (default: false) */
  interactive?: boolean;
  /** Treat tokens expiring within this window as expired (default: 60s) */
  safetyMarginMs?: number;
  retry?: RetryOptions;
  /** Replaces the browser consent flow entirely */
  consent?: ConsentRunner;
  /** Options for the default browser consent flow */
  consentOptions?: Omit<ConsentOptions, 'authServer' | 'signal'>;
  now?: () => number;
}

export interface GetAccessTokenOptions {
  interactive?: boolean;
  /** The credential must hold at least one of these scopes */
  requiredScopes?: readonly string[];
  /** Cancels this caller's wait only; a shared refresh keeps running */
  signal?: AbortSignal;
}

function abortable<T>(promise: Promise<T>, signal: AbortSignal | undefined): Promise<T> {
  if (!signal) return promise;
  if (signal.aborted) return Promise.reject(signal.reason);

  return new Promise<T>((resolve, reject) => {
    const onAbort = (): void => reject(signal.reason);
    signal.addEventListener('abort', onAbort, { once: true });
    promise.then(
      value => {
        signal.removeEventListener('abort', onAbort);
        resolve(value);
      },
      error => {
        signal.removeEventListener('abort', onAbort);
        reject(error);
      }
    );
  });
}

export class CredentialManager {
  private readonly store: CredentialStore;
  private readonly authServer: AuthorizationServer;
  private readonly interactive: boolean;
  private readonly safetyMarginMs: number;
  private readonly retry: RetryOptions | undefined;
  private readonly consent: ConsentRunner;
  private readonly now: () => number;

  private readonly cache = new Map<string, Credential>();
  private readonly loads = new Map<string, Promise<Credential | null>>();
  private readonly renewals = new Map<string, Promise<Credential>>();
  private readonly locks = new Map<string, Promise<void>>();
  /** Bumped whenever the stored credential is discarded; loads from an older generation are dropped. */
  private readonly generations = new Map<string, number>();

  constructor(options: CredentialManagerOptions) {
    this.store = options.store;
    this.authServer = options.authServer;
    this.interactive = options.interactive ?? false;
    this.safetyMarginMs = options.safetyMarginMs ?? DEFAULT_SAFETY_MARGIN_MS;
    this.retry = options.retry;
    this.now = options.now ?? Date.now;
    this.consent = options.consent ?? (() => runInteractiveConsent({
      ...options.consentOptions,
      authServer: options.authServer,
      retry: options.consentOptions?.retry ?? options.retry
    }));
  }

  /**
   * Return an access token that is valid beyond the safety margin.
   *
   * @throws NoCredentialError when nothing usable is stored and consent is not allowed
   * @throws RefreshRejectedError when Google revoked the refresh token (the file is deleted)
   * @throws TransientNetworkError when refresh kept failing; the stored credential is kept
   * @throws InsufficientScopeError when none of `requiredScopes` was granted
   */
  async getValidAccessToken(identity: string, options: GetAccessTokenOptions = {}): Promise<AccessTokenSnapshot> {
    const interactive = options.interactive ?? this.interactive;

    let credential = await abortable(this.current(identity), options.signal);
    if (!credential || !this.isFresh(credential)) {
      credential = await abortable(this.renew(identity, interactive), options.signal);
    }

    if (credential.expiresAt <= this.now()) {
      throw new AuthorizationServerError(`Google issued an already expired access token for ${identity}`, undefined);
    }

    const granted = credential.scopes;
    const required = options.requiredScopes;
    if (required && required.length > 0 && !required.some(scope => granted.includes(scope))) {
      throw new InsufficientScopeError(identity, required);
    }

    return Object.freeze({
      identity,
      accessToken: credential.accessToken,
      expiresAt: credential.expiresAt,
      scopes: Object.freeze([...credential.scopes])
    });
  }

  /**
   * Delete the stored credential so the next call goes through consent.
   * Idempotent.
   */
  async invalidate(identity: string): Promise<void> {
    this.assertIdentity(identity);
    await this.withLock(identity, async () => {
      this.forget(identity);
      await this.store.remove(identity);
      console.error(`[Credentials] Invalidated stored credential for ${identity}`);
    });
  }

  /**
   * Run interactive consent unconditionally and store the result.
   * Without an identity the signed-in account's email is used.
   *
   * @returns the identity the credential was stored under
   */
  async authenticate(identity?: string): Promise<string> {
    if (identity) {
      this.assertIdentity(identity);
      await this.withLock(identity, async () => this.commit(identity, await this.consent()));
      return identity;
    }

    const credential = await this.consent();
    const email = await this.authServer.lookupEmail(credential.accessToken);
    if (!email) {
      throw new AuthorizationServerError(
        'Could not determine the signed-in account (userinfo.email not granted); pass the account email explicitly',
        undefined
      );
    }
    this.assertIdentity(email);
    await this.withLock(email, () => this.commit(email, credential));
    return email;
  }

  /**
   * The preferred identity, or the most recently written credential file.
   */
  async resolveIdentity(preferred?: string): Promise<string> {
    if (preferred) {
      this.assertIdentity(preferred);
      return preferred;
    }

    const [latest] = await this.store.listIdentities();
    if (!latest) {
      throw new NoCredentialError('any account', 'No stored Google credential found');
    }
    return latest;
  }

  /** State of the stored credential; never touches the network. */
  async describe(identity: string): Promise<CredentialStatus> {
    const credential = await this.current(identity);
    if (!credential) {
      return { identity, state: 'missing', expiresAt: null, hasRefreshToken: false, scopes: [] };
    }

    const now = this.now();
    const state = credential.expiresAt <= now ? 'expired' : this.isFresh(credential) ? 'valid' : 'expiring';
    return {
      identity,
      state,
      expiresAt: new Date(credential.expiresAt).toISOString(),
      hasRefreshToken: Boolean(credential.refreshToken),
      scopes: [...credential.scopes]
    };
  }

  /** The store rejects identities that are not a plain file name. */
  private assertIdentity(identity: string): void {
    this.store.pathFor(identity);
  }

  private isFresh(credential: Credential): boolean {
    return credential.expiresAt > this.now() + this.safetyMarginMs;
  }

  /** Cached credential, loading it once from the store on first access. */
  private async current(identity: string): Promise<Credential | null> {
    const cached = this.cache.get(identity);
    if (cached) return cached;

    const generation = this.generations.get(identity) ?? 0;
    let loading = this.loads.get(identity);
    if (!loading) {
      const started = this.store.load(identity).finally(() => {
        if (this.loads.get(identity) === started) this.loads.delete(identity);
      });
      this.loads.set(identity, started);
      loading = started;
    }

    const loaded = await loading;
    if ((this.generations.get(identity) ?? 0) !== generation) {
      // Discarded while the file was being read
      return this.cache.get(identity) ?? null;
    }
    if (loaded && !this.cache.has(identity)) {
      this.cache.set(identity, loaded);
    }
    return this.cache.get(identity) ?? loaded;
  }

  /** Drop the cached credential and any read still in flight. */
  private forget(identity: string): void {
    this.cache.delete(identity);
    this.loads.delete(identity);
    this.generations.set(identity, (this.generations.get(identity) ?? 0) + 1);
  }

  /** Join the renewal already running for this identity, or start one. */
  private renew(identity: string, interactive: boolean): Promise<Credential> {
    const running = this.renewals.get(identity);
    if (running) return running;

    const renewal = this.withLock(identity, () => this.runRenewal(identity, interactive))
      .finally(() => this.renewals.delete(identity));
    this.renewals.set(identity, renewal);
    return renewal;
  }

  private async runRenewal(identity: string, interactive: boolean): Promise<Credential> {
    // Another operation may have replaced the credential while this one waited for the lock.
    const credential = await this.current(identity);
    if (credential && this.isFresh(credential)) {
      return credential;
    }

    if (credential?.refreshToken) {
      return this.refresh(identity, credential);
    }

    if (!interactive) {
      throw new NoCredentialError(
        identity,
        credential ? 'Stored Google credential expired and has no refresh token' : undefined
      );
    }

    console.error(`[Credentials] No usable credential for ${identity}, starting interactive consent`);
    return this.commit(identity, await this.consent());
  }

  private async refresh(identity: string, credential: Credential): Promise<Credential> {
    const secondsLeft = Math.floor((credential.expiresAt - this.now()) / 1000);
    console.error(`[Credentials] Refreshing access token for ${identity}: expiresIn=${secondsLeft}s`);

    let refreshed: Credential;
    try {
      refreshed = await withBackoff(
        () => this.authServer.refresh(credential, identity),
        error => toAuthServerError(error, identity, 'refresh').retryable,
        this.retry,
        `Token refresh for ${identity}`
      );
    } catch (error) {
      const authError = toAuthServerError(error, identity, 'refresh');
      if (authError instanceof RefreshRejectedError) {
        console.error(`[Credentials] Refresh token for ${identity} revoked or expired, removing stored credential`);
        this.forget(identity);
        await this.store.remove(identity);
      }
      throw authError;
    }

    console.error(`[Credentials] Token refreshed for ${identity}, newExpiresAt=${new Date(refreshed.expiresAt).toISOString()}`);
    return this.commit(identity, refreshed);
  }

  /**
   * Make `credential` current in memory, then persist it.
   * A failed write still leaves the new token usable in memory.
   */
  private async commit(identity: string, credential: Credential): Promise<Credential> {
    this.cache.set(identity, credential);
    await this.store.save(identity, credential);
    return credential;
  }

  /** Run `operation` after every earlier locked operation for `identity` has settled. */
  private withLock<T>(identity: string, operation: () => Promise<T>): Promise<T> {
    const previous = this.locks.get(identity) ?? Promise.resolve();
    const run = previous.then(operation);
    const tail = run.then(() => undefined, () => undefined);
    this.locks.set(identity, tail);
    void tail.then(() => {
      if (this.locks.get(identity) === tail) this.locks.delete(identity);
    });
    return run;
  }
}
