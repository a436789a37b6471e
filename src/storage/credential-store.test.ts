import { mkdtemp, readFile, readdir, rm, stat, symlink, utimes, writeFile } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { InvalidIdentityError } from '../auth/oauth-errors.js';
import type { Credential } from '../auth/types.js';
import { FileCredentialStore } from './credential-store.js';

const credential: Credential = {
  accessToken: 'test-access-token',
  refreshToken: 'test-refresh-token',
  expiresAt: Date.parse('2030-01-01T00:00:00.000Z'),
  scopes: ['https://www.googleapis.com/auth/drive'],
  tokenUri: 'https://oauth2.googleapis.com/token',
  clientId: 'test-client-id'
};

describe('FileCredentialStore', () => {
  let directory: string;
  let store: FileCredentialStore;

  beforeEach(async () => {
    directory = await mkdtemp(join(tmpdir(), 'credential-store-'));
    store = new FileCredentialStore({ directory: join(directory, 'credentials') });
    vi.spyOn(console, 'error').mockImplementation(() => undefined);
    vi.spyOn(console, 'warn').mockImplementation(() => undefined);
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    await rm(directory, { recursive: true, force: true });
  });

  it('returns null when nothing is stored', async () => {
    expect(await store.load('user@example.com')).toBeNull();
    expect(await store.listIdentities()).toEqual([]);
  });

  it('saves and loads a credential', async () => {
    await store.save('user@example.com', credential);
    expect(await store.load('user@example.com')).toEqual(credential);
  });

  it('writes the authorized-user JSON layout without the client secret', async () => {
    await store.save('user@example.com', credential);
    const json: unknown = JSON.parse(await readFile(store.pathFor('user@example.com'), 'utf-8'));
    expect(json).toEqual({
      token: 'test-access-token',
      refresh_token: 'test-refresh-token',
      token_uri: 'https://oauth2.googleapis.com/token',
      client_id: 'test-client-id',
      scopes: ['https://www.googleapis.com/auth/drive'],
      expiry: '2030-01-01T00:00:00.000Z'
    });
  });

  it('restricts the file to its owner', async () => {
    await store.save('user@example.com', credential);
    const info = await stat(store.pathFor('user@example.com'));
    expect(info.mode & 0o777).toBe(0o600);
  });

  it('leaves no temp files behind', async () => {
    await store.save('user@example.com', credential);
    await store.save('user@example.com', { ...credential, accessToken: 'test-access-token-2' });
    expect(await readdir(join(directory, 'credentials'))).toEqual(['user@example.com.json']);
    expect((await store.load('user@example.com'))?.accessToken).toBe('test-access-token-2');
  });

  it('loads files written without a refresh token or scopes', async () => {
    await store.save('user@example.com', credential);
    await writeFile(store.pathFor('user@example.com'), JSON.stringify({
      token: 'test-access-token',
      refresh_token: null,
      token_uri: 'https://oauth2.googleapis.com/token',
      client_id: 'test-client-id',
      client_secret: 'test-secret',
      expiry: '2030-01-01T00:00:00Z'
    }));

    expect(await store.load('user@example.com')).toEqual({
      accessToken: 'test-access-token',
      refreshToken: undefined,
      expiresAt: Date.parse('2030-01-01T00:00:00Z'),
      scopes: [],
      tokenUri: 'https://oauth2.googleapis.com/token',
      clientId: 'test-client-id'
    });
  });

  it('treats corrupt or malformed files as absent', async () => {
    await store.save('user@example.com', credential);
    await writeFile(store.pathFor('user@example.com'), '{not json');
    expect(await store.load('user@example.com')).toBeNull();

    await writeFile(store.pathFor('user@example.com'), JSON.stringify({ token: 'test-access-token' }));
    expect(await store.load('user@example.com')).toBeNull();
    expect(console.warn).toHaveBeenCalledTimes(2);
  });

  it('removes idempotently', async () => {
    await store.save('user@example.com', credential);
    await store.remove('user@example.com');
    await store.remove('user@example.com');
    expect(await store.load('user@example.com')).toBeNull();
  });

  it.each(['', '.', '..', '../escape', 'a/b', 'a\\b', 'nul\0byte'])('rejects unsafe identity %j', async identity => {
    expect(() => store.pathFor(identity)).toThrow(InvalidIdentityError);
    await expect(store.load(identity)).rejects.toBeInstanceOf(InvalidIdentityError);
  });

  it('lists identities newest first', async () => {
    await store.save('old@example.com', credential);
    await store.save('new@example.com', credential);
    await utimes(store.pathFor('old@example.com'), new Date('2024-01-01'), new Date('2024-01-01'));
    await utimes(store.pathFor('new@example.com'), new Date('2025-01-01'), new Date('2025-01-01'));

    expect(await store.listIdentities()).toEqual(['new@example.com', 'old@example.com']);
  });

  it('skips a credential file that vanished while listing', async () => {
    await store.save('kept@example.com', credential);
    await symlink(join(directory, 'missing-target.json'), join(directory, 'credentials', 'gone@example.com.json'));

    expect(await store.listIdentities()).toEqual(['kept@example.com']);
  });
});
