/**
 * TypeScript types for on-disk credential storage.
 */
import { z } from 'zod';
import type { Credential } from '../auth/types.js';

/**
 * Record stored in `<identity>.json`.
 * Google's "authorized user" layout, so files written by other Google
 * tooling load as-is; extra keys such as `client_secret` are ignored.
 */
export const storedCredentialSchema = z.object({
  /** Access token */
  token: z.string().min(1),
  refresh_token: z.string().min(1).nullish(),
  token_uri: z.string().url(),
  client_id: z.string().min(1),
  scopes: z.array(z.string()).default([]),
  /** ISO-8601 access token expiry */
  expiry: z.string().refine(value => !Number.isNaN(Date.parse(value)), 'expiry must be an ISO-8601 timestamp')
});

export type StoredCredentialRecord = z.infer<typeof storedCredentialSchema>;

/**
 * Configuration for the file credential store.
 */
export interface CredentialStoreConfig {
  /** Directory holding one JSON file per identity */
  directory: string;
}

/**
 * Persistence for one Credential per identity.
 * `load` returns null when nothing usable is stored.
 */
export interface CredentialStore {
  load(identity: string): Promise<Credential | null>;
  save(identity: string, credential: Credential): Promise<void>;
  remove(identity: string): Promise<void>;
  /** Known identities, most recently written first */
  listIdentities(): Promise<string[]>;
  pathFor(identity: string): string;
}
