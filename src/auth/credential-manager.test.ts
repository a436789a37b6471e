import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import type { Mock } from 'vitest';
import {
  FakeAuthorizationServer,
  MemoryCredentialStore,
  deferred,
  makeCredential
} from '../testing/fakes.js';
import { CredentialManager } from './credential-manager.js';
import type { CredentialManagerOptions } from './credential-manager.js';
import {
  AuthorizationServerError,
  InsufficientScopeError,
  NoCredentialError,
  PersistenceError,
  RefreshRejectedError,
  TransientNetworkError
} from './oauth-errors.js';
import type { Credential } from './types.js';

const USER = 'user@example.com';
const HOUR = 60 * 60 * 1000;
const START = Date.parse('2025-06-01T12:00:00.000Z');

describe('CredentialManager', () => {
  let now: number;
  let store: MemoryCredentialStore;
  let authServer: FakeAuthorizationServer;
  let sleep: Mock<(ms: number) => Promise<void>>;
  let consent: Mock<() => Promise<Credential>>;

  function createManager(options: Partial<CredentialManagerOptions> = {}): CredentialManager {
    return new CredentialManager({
      store,
      authServer,
      consent,
      retry: { sleep },
      now: () => now,
      ...options
    });
  }

  beforeEach(() => {
    now = START;
    store = new MemoryCredentialStore();
    authServer = new FakeAuthorizationServer();
    sleep = vi.fn<(ms: number) => Promise<void>>(async () => undefined);
    consent = vi.fn<() => Promise<Credential>>(async () => makeCredential({ accessToken: 'consented-token', expiresAt: now + HOUR }));
    vi.spyOn(console, 'error').mockImplementation(() => undefined);
    vi.spyOn(console, 'warn').mockImplementation(() => undefined);
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  describe('getValidAccessToken', () => {
    it('returns a valid stored token without refreshing', async () => {
      store.seed(USER, makeCredential({ expiresAt: START + HOUR }));
      const manager = createManager();

      const first = await manager.getValidAccessToken(USER);
      const second = await manager.getValidAccessToken(USER);

      expect(first).toEqual({
        identity: USER,
        accessToken: 'test-access-token',
        expiresAt: START + HOUR,
        scopes: ['https://www.googleapis.com/auth/drive']
      });
      expect(second.accessToken).toBe('test-access-token');
      expect(authServer.refresh).not.toHaveBeenCalled();
      expect(store.load).toHaveBeenCalledTimes(1);
    });

    it('returns a frozen snapshot', async () => {
      store.seed(USER, makeCredential({ expiresAt: START + HOUR }));
      const token = await createManager().getValidAccessToken(USER);

      expect(Object.isFrozen(token)).toBe(true);
      expect(Object.isFrozen(token.scopes)).toBe(true);
    });

    it('refreshes a token inside the safety margin', async () => {
      store.seed(USER, makeCredential({ expiresAt: START + 30_000 }));
      authServer.refresh.mockResolvedValue(makeCredential({ accessToken: 'refreshed-token', expiresAt: START + HOUR }));

      const token = await createManager().getValidAccessToken(USER);

      expect(token.accessToken).toBe('refreshed-token');
      expect(authServer.refresh).toHaveBeenCalledTimes(1);
      expect(store.records.get(USER)?.accessToken).toBe('refreshed-token');
    });

    it('honours a custom safety margin', async () => {
      store.seed(USER, makeCredential({ expiresAt: START + 30_000 }));

      const token = await createManager({ safetyMarginMs: 10_000 }).getValidAccessToken(USER);

      expect(token.accessToken).toBe('test-access-token');
      expect(authServer.refresh).not.toHaveBeenCalled();
    });

    it('shares one refresh between concurrent callers', async () => {
      store.seed(USER, makeCredential({ expiresAt: START - 1000 }));
      const gate = deferred<Credential>();
      authServer.refresh.mockImplementation(() => gate.promise);
      const manager = createManager();

      const calls = Array.from({ length: 10 }, () => manager.getValidAccessToken(USER));
      await vi.waitFor(() => expect(authServer.refresh).toHaveBeenCalledTimes(1));
      gate.resolve(makeCredential({ accessToken: 'refreshed-token', expiresAt: START + HOUR }));
      const tokens = await Promise.all(calls);

      expect(tokens.map(token => token.accessToken)).toEqual(Array(10).fill('refreshed-token'));
      expect(authServer.refresh).toHaveBeenCalledTimes(1);
      expect(store.save).toHaveBeenCalledTimes(1);
    });

    it('deletes the credential when the refresh token is revoked', async () => {
      store.seed(USER, makeCredential({ expiresAt: START - 1000 }));
      authServer.refresh.mockRejectedValue(new RefreshRejectedError(USER));
      const manager = createManager();

      await expect(manager.getValidAccessToken(USER)).rejects.toBeInstanceOf(RefreshRejectedError);
      expect(authServer.refresh).toHaveBeenCalledTimes(1);
      expect(store.records.has(USER)).toBe(false);

      await expect(manager.getValidAccessToken(USER)).rejects.toBeInstanceOf(NoCredentialError);
      expect(authServer.refresh).toHaveBeenCalledTimes(1);
    });

    it('retries transient refresh failures with backoff', async () => {
      store.seed(USER, makeCredential({ expiresAt: START - 1000 }));
      authServer.refresh
        .mockRejectedValueOnce(new TransientNetworkError('offline'))
        .mockRejectedValueOnce(new TransientNetworkError('offline'))
        .mockResolvedValueOnce(makeCredential({ accessToken: 'refreshed-token', expiresAt: START + HOUR }));

      const token = await createManager().getValidAccessToken(USER);

      expect(token.accessToken).toBe('refreshed-token');
      expect(authServer.refresh).toHaveBeenCalledTimes(3);
      expect(sleep.mock.calls).toEqual([[200], [400]]);
    });

    it('keeps the stored credential when refresh keeps failing', async () => {
      const stale = makeCredential({ expiresAt: START - 1000 });
      store.seed(USER, stale);
      authServer.refresh.mockRejectedValue(new TransientNetworkError('offline'));

      await expect(createManager().getValidAccessToken(USER)).rejects.toBeInstanceOf(TransientNetworkError);

      expect(authServer.refresh).toHaveBeenCalledTimes(3);
      expect(store.records.get(USER)).toEqual(stale);
      expect(store.remove).not.toHaveBeenCalled();
    });

    it('fails without consent when nothing is stored and not interactive', async () => {
      await expect(createManager().getValidAccessToken(USER)).rejects.toBeInstanceOf(NoCredentialError);
      expect(consent).not.toHaveBeenCalled();
    });

    it('keeps an expired credential without a refresh token on disk', async () => {
      store.seed(USER, makeCredential({ refreshToken: undefined, expiresAt: START - 1000 }));

      await expect(createManager().getValidAccessToken(USER)).rejects.toThrow(
        'Stored Google credential expired and has no refresh token for user@example.com'
      );
      expect(store.records.has(USER)).toBe(true);
    });

    it('runs consent once for concurrent interactive callers', async () => {
      const manager = createManager({ interactive: true });

      const tokens = await Promise.all([
        manager.getValidAccessToken(USER),
        manager.getValidAccessToken(USER),
        manager.getValidAccessToken(USER)
      ]);

      expect(tokens.map(token => token.accessToken)).toEqual(['consented-token', 'consented-token', 'consented-token']);
      expect(consent).toHaveBeenCalledTimes(1);
      expect(store.records.get(USER)?.accessToken).toBe('consented-token');
    });

    it('lets a caller opt into consent per call', async () => {
      const token = await createManager().getValidAccessToken(USER, { interactive: true });
      expect(token.accessToken).toBe('consented-token');
    });

    it('checks that a required scope was granted', async () => {
      store.seed(USER, makeCredential({ expiresAt: START + HOUR }));
      const manager = createManager();

      await expect(
        manager.getValidAccessToken(USER, { requiredScopes: ['https://www.googleapis.com/auth/gmail.readonly'] })
      ).rejects.toBeInstanceOf(InsufficientScopeError);

      const token = await manager.getValidAccessToken(USER, {
        requiredScopes: ['https://www.googleapis.com/auth/gmail.readonly', 'https://www.googleapis.com/auth/drive']
      });
      expect(token.accessToken).toBe('test-access-token');
    });

    it('rejects a token the server issued already expired', async () => {
      store.seed(USER, makeCredential({ expiresAt: START - 1000 }));
      authServer.refresh.mockResolvedValue(makeCredential({ accessToken: 'refreshed-token', expiresAt: START }));

      await expect(createManager().getValidAccessToken(USER)).rejects.toBeInstanceOf(AuthorizationServerError);
    });

    it('detaches an aborted caller without cancelling the shared refresh', async () => {
      store.seed(USER, makeCredential({ expiresAt: START - 1000 }));
      const gate = deferred<Credential>();
      authServer.refresh.mockImplementation(() => gate.promise);
      const manager = createManager();
      const controller = new AbortController();

      const abandoned = manager.getValidAccessToken(USER, { signal: controller.signal });
      const waiting = manager.getValidAccessToken(USER);
      const abandonedResult = expect(abandoned).rejects.toThrow('caller went away');
      await vi.waitFor(() => expect(authServer.refresh).toHaveBeenCalledTimes(1));

      controller.abort(new Error('caller went away'));
      await abandonedResult;

      gate.resolve(makeCredential({ accessToken: 'refreshed-token', expiresAt: START + HOUR }));
      expect((await waiting).accessToken).toBe('refreshed-token');
      expect(authServer.refresh).toHaveBeenCalledTimes(1);
    });

    it('rejects at once when the signal is already aborted', async () => {
      store.seed(USER, makeCredential({ expiresAt: START + HOUR }));
      const controller = new AbortController();
      controller.abort(new Error('too late'));

      await expect(createManager().getValidAccessToken(USER, { signal: controller.signal })).rejects.toThrow('too late');
    });

    it('keeps a refreshed token in memory when saving it fails', async () => {
      store.seed(USER, makeCredential({ expiresAt: START - 1000 }));
      authServer.refresh.mockResolvedValue(makeCredential({ accessToken: 'refreshed-token', expiresAt: START + HOUR }));
      store.failSaves = new PersistenceError('memory://user@example.com.json', 'write');
      const manager = createManager();

      await expect(manager.getValidAccessToken(USER)).rejects.toBeInstanceOf(PersistenceError);
      const token = await manager.getValidAccessToken(USER);

      expect(token.accessToken).toBe('refreshed-token');
      expect(authServer.refresh).toHaveBeenCalledTimes(1);
    });
  });

  describe('invalidate', () => {
    it('discards a credential read that was still in flight', async () => {
      store.seed(USER, makeCredential({ accessToken: 'revoked-token', expiresAt: START + HOUR }));
      const gate = deferred<Credential | null>();
      store.load.mockImplementationOnce(() => gate.promise);
      const manager = createManager();

      const pending = manager.getValidAccessToken(USER);
      const pendingResult = expect(pending).rejects.toBeInstanceOf(NoCredentialError);
      await vi.waitFor(() => expect(store.load).toHaveBeenCalledTimes(1));
      await manager.invalidate(USER);
      gate.resolve(makeCredential({ accessToken: 'revoked-token', expiresAt: START + HOUR }));

      await pendingResult;
      await expect(manager.getValidAccessToken(USER)).rejects.toBeInstanceOf(NoCredentialError);
      expect(store.records.has(USER)).toBe(false);
      expect(store.save).not.toHaveBeenCalled();
    });

    it('removes the credential and is idempotent', async () => {
      store.seed(USER, makeCredential({ expiresAt: START + HOUR }));
      const manager = createManager();
      await manager.getValidAccessToken(USER);

      await manager.invalidate(USER);
      await manager.invalidate(USER);

      expect(store.records.has(USER)).toBe(false);
      expect(store.remove).toHaveBeenCalledTimes(2);
      await expect(manager.getValidAccessToken(USER)).rejects.toBeInstanceOf(NoCredentialError);
    });
  });

  describe('authenticate', () => {
    it('stores the credential under the signed-in email', async () => {
      const identity = await createManager().authenticate();

      expect(identity).toBe(USER);
      expect(authServer.lookupEmail).toHaveBeenCalledWith('consented-token');
      expect(store.records.get(USER)?.accessToken).toBe('consented-token');
    });

    it('uses an explicit identity without looking up the email', async () => {
      const identity = await createManager().authenticate('work@example.com');

      expect(identity).toBe('work@example.com');
      expect(authServer.lookupEmail).not.toHaveBeenCalled();
      expect(store.records.has('work@example.com')).toBe(true);
    });

    it('replaces a credential that is still valid', async () => {
      store.seed(USER, makeCredential({ expiresAt: START + HOUR }));
      const manager = createManager();
      await manager.getValidAccessToken(USER);

      await manager.authenticate(USER);

      expect((await manager.getValidAccessToken(USER)).accessToken).toBe('consented-token');
    });

    it('fails when the email cannot be determined', async () => {
      authServer.lookupEmail.mockResolvedValue(undefined);

      await expect(createManager().authenticate()).rejects.toBeInstanceOf(AuthorizationServerError);
      expect(store.save).not.toHaveBeenCalled();
    });
  });

  describe('resolveIdentity', () => {
    it('prefers the configured account', async () => {
      store.seed('other@example.com', makeCredential());
      expect(await createManager().resolveIdentity(USER)).toBe(USER);
    });

    it('falls back to the most recently stored credential', async () => {
      store.seed('old@example.com', makeCredential());
      store.seed('new@example.com', makeCredential());
      expect(await createManager().resolveIdentity()).toBe('new@example.com');
    });

    it('fails when nothing is stored', async () => {
      await expect(createManager().resolveIdentity()).rejects.toThrow(
        'No stored Google credential found for any account. Run `npm run authenticate` to sign in again.'
      );
    });
  });

  describe('describe', () => {
    it.each([
      ['valid', START + HOUR],
      ['expiring', START + 30_000],
      ['expired', START - 1000]
    ])('reports a %s credential', async (state, expiresAt) => {
      store.seed(USER, makeCredential({ expiresAt }));

      expect(await createManager().describe(USER)).toEqual({
        identity: USER,
        state,
        expiresAt: new Date(expiresAt).toISOString(),
        hasRefreshToken: true,
        scopes: ['https://www.googleapis.com/auth/drive']
      });
      expect(authServer.refresh).not.toHaveBeenCalled();
    });

    it('reports a missing credential', async () => {
      expect(await createManager().describe(USER)).toEqual({
        identity: USER,
        state: 'missing',
        expiresAt: null,
        hasRefreshToken: false,
        scopes: []
      });
    });
  });
});
