// src/core/credentials/CredentialStore.ts

import Keyv from 'keyv';
import { z } from 'zod';
import type { ClientCredentials } from '../auth/types';
import type { Logger } from '../../observability/Logger';
import { CredentialEncryption, type DecryptedCredentials } from './CredentialEncryption';
import { SyncError } from '../../utils/errors';

export interface CredentialStoreConfig {
  encryption?: {
    key: string;
    /** Keys retired by a rotation; records sealed under them are re-sealed on read */
    previousKeys?: string[];
    algorithm: 'aes-256-gcm';
  };
}

const StoredCredentialsSchema = z.object({
  username: z.string(),
  clientId: z.string().min(1),
  clientSecret: z.string().min(1),
  updatedAt: z.string().datetime(),
});

type StoredCredentials = z.infer<typeof StoredCredentialsSchema>;

/**
 * Client id/secret of each account's script app, keyed by username.
 * Passwords are never stored; callers supply them per run.
 *
 * Backed by Keyv, so any Keyv adapter can be passed in place of the default
 * in-memory map.
 */
export class CredentialStore {
  private store: Keyv<string>;
  private encryption?: CredentialEncryption;

  constructor(
    config: CredentialStoreConfig,
    private logger: Logger,
    store?: Keyv<string>
  ) {
    this.store = store ?? new Keyv<string>();

    if (config.encryption) {
      this.encryption = new CredentialEncryption(config.encryption.key, config.encryption.previousKeys);
    }
  }

  async setClientCredentials(username: string, credentials: ClientCredentials): Promise<void> {
    const stored: StoredCredentials = {
      username,
      clientId: credentials.clientId,
      clientSecret: credentials.clientSecret,
      updatedAt: new Date().toISOString(),
    };

    await this.write(username, JSON.stringify(stored));

    this.logger.info('Client credentials saved', { username, encrypted: !!this.encryption });
  }

  async getClientCredentials(username: string): Promise<ClientCredentials | null> {
    const raw = await this.store.get(this.createKey(username));
    if (raw === undefined) {
      this.logger.debug('Client credentials not found', { username });
      return null;
    }

    let opened: DecryptedCredentials;
    let parsed: StoredCredentials;
    try {
      opened = this.open(username, raw);
      parsed = StoredCredentialsSchema.parse(JSON.parse(opened.plaintext));
    } catch (error: unknown) {
      throw new SyncError(`Stored credentials for ${username} are corrupt`, 'CREDENTIALS_CORRUPT', {
        username,
        reason: error instanceof Error ? error.message : String(error),
      });
    }

    if (opened.stale) {
      await this.write(username, opened.plaintext);
      this.logger.info('Client credentials re-encrypted with the current key', { username });
    }

    return { clientId: parsed.clientId, clientSecret: parsed.clientSecret };
  }

  async deleteClientCredentials(username: string): Promise<boolean> {
    const deleted = await this.store.delete(this.createKey(username));
    this.logger.info('Client credentials deleted', { username, deleted });
    return deleted;
  }

  private async write(username: string, serialized: string): Promise<void> {
    const key = this.createKey(username);
    await this.store.set(key, this.encryption ? this.encryption.encrypt(serialized, key) : serialized);
  }

  private open(username: string, raw: string): DecryptedCredentials {
    return this.encryption
      ? this.encryption.decrypt(raw, this.createKey(username))
      : { plaintext: raw, stale: false };
  }

  // Reddit usernames are case-insensitive
  private createKey(username: string): string {
    return `credentials:${username.toLowerCase()}`;
  }
}
