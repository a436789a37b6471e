/**
 * File-backed credential store.
 *
 * One JSON file per identity under the credentials directory, readable by the
 * owning user only. Writes go to a temp file in the same directory and are
 * renamed over the target, so a crash never leaves a half-written credential.
 */

import crypto from 'crypto';
import { mkdir, readFile, readdir, rename, rm, stat, writeFile } from 'fs/promises';
import { join } from 'path';
import type { Credential } from '../auth/types.js';
import { InvalidIdentityError, PersistenceError } from '../auth/oauth-errors.js';
import { storedCredentialSchema } from './types.js';
import type { CredentialStore, CredentialStoreConfig, StoredCredentialRecord } from './types.js';

const FILE_SUFFIX = '.json';
const FILE_MODE = 0o600;
const DIRECTORY_MODE = 0o700;

function errnoCode(error: unknown): string | undefined {
  if (typeof error !== 'object' || error === null || !('code' in error)) return undefined;
  return typeof error.code === 'string' ? error.code : undefined;
}

function assertSafeIdentity(identity: string): void {
  if (
    identity.length === 0 ||
    identity === '.' ||
    identity === '..' ||
    identity.includes('/') ||
    identity.includes('\\') ||
    identity.includes('\0')
  ) {
    throw new InvalidIdentityError(identity);
  }
}

export function toStoredRecord(credential: Credential): StoredCredentialRecord {
  return {
    token: credential.accessToken,
    refresh_token: credential.refreshToken ?? null,
    token_uri: credential.tokenUri,
    client_id: credential.clientId,
    scopes: [...credential.scopes],
    expiry: new Date(credential.expiresAt).toISOString()
  };
}

export function fromStoredRecord(record: StoredCredentialRecord): Credential {
  return {
    accessToken: record.token,
    refreshToken: record.refresh_token ?? undefined,
    expiresAt: Date.parse(record.expiry),
    scopes: record.scopes,
    tokenUri: record.token_uri,
    clientId: record.client_id
  };
}

export class FileCredentialStore implements CredentialStore {
  private readonly directory: string;

  constructor(config: CredentialStoreConfig) {
    this.directory = config.directory;
  }

  pathFor(identity: string): string {
    assertSafeIdentity(identity);
    return join(this.directory, `${identity}${FILE_SUFFIX}`);
  }

  /**
   * Load the credential for an identity.
   * Returns null if the file is missing or its content is unusable.
   */
  async load(identity: string): Promise<Credential | null> {
    const path = this.pathFor(identity);

    let raw: string;
    try {
      raw = await readFile(path, 'utf-8');
    } catch (error) {
      if (errnoCode(error) === 'ENOENT') {
        return null;
      }
      throw new PersistenceError(path, 'read', error);
    }

    let json: unknown;
    try {
      json = JSON.parse(raw);
    } catch (error) {
      console.warn(`[CredentialStore] Ignoring unreadable credential file ${path}:`, error instanceof Error ? error.message : error);
      return null;
    }

    const parsed = storedCredentialSchema.safeParse(json);
    if (!parsed.success) {
      console.warn(`[CredentialStore] Ignoring malformed credential file ${path}: ${parsed.error.issues.map(issue => issue.path.join('.') || issue.message).join(', ')}`);
      return null;
    }

    return fromStoredRecord(parsed.data);
  }

  async save(identity: string, credential: Credential): Promise<void> {
    const path = this.pathFor(identity);
    const tempPath = `${path}.${process.pid}.${crypto.randomBytes(6).toString('hex')}.tmp`;
    const body = `${JSON.stringify(toStoredRecord(credential), null, 2)}\n`;

    try {
      await mkdir(this.directory, { recursive: true, mode: DIRECTORY_MODE });
      await writeFile(tempPath, body, { encoding: 'utf-8', mode: FILE_MODE });
      await rename(tempPath, path);
    } catch (error) {
      await rm(tempPath, { force: true });
      throw new PersistenceError(path, 'write', error);
    }

    console.error(`[CredentialStore] Saved credential for ${identity}, expiry: ${new Date(credential.expiresAt).toISOString()}`);
  }

  /** Delete the credential file. No error if nothing was stored. */
  async remove(identity: string): Promise<void> {
    const path = this.pathFor(identity);
    try {
      await rm(path, { force: true });
    } catch (error) {
      throw new PersistenceError(path, 'delete', error);
    }
  }

  async listIdentities(): Promise<string[]> {
    let names: string[];
    try {
      names = await readdir(this.directory);
    } catch (error) {
      if (errnoCode(error) === 'ENOENT') {
        return [];
      }
      throw new PersistenceError(this.directory, 'list', error);
    }

    const entries = await Promise.all(
      names
        .filter(name => name.endsWith(FILE_SUFFIX))
        .map(async name => {
          const path = join(this.directory, name);
          try {
            const info = await stat(path);
            return { identity: name.slice(0, -FILE_SUFFIX.length), modifiedAt: info.mtimeMs };
          } catch (error) {
            // Removed since readdir
            if (errnoCode(error) === 'ENOENT') return null;
            throw new PersistenceError(path, 'inspect', error);
          }
        })
    );

    return entries
      .filter((entry): entry is { identity: string; modifiedAt: number } => entry !== null && entry.identity.length > 0)
      .sort((a, b) => b.modifiedAt - a.modifiedAt)
      .map(entry => entry.identity);
  }
}
