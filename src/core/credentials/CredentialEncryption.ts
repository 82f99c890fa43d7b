// src/core/credentials/CredentialEncryption.ts

import * as crypto from 'crypto';

const HEX_KEY = /^[0-9a-f]{64}$/i;

export interface DecryptedCredentials {
  plaintext: string;
  /** True when a previous key opened the record; it should be written again under the current key */
  stale: boolean;
}

/**
 * AES-256-GCM for stored client credentials.
 *
 * Each record is bound to its account through the GCM associated data, so a
 * record copied under another username fails authentication.
 * Payload: iv:authTag:ciphertext, all hex.
 */
export class CredentialEncryption {
  private keys: Buffer[];

  constructor(currentKey: string, previousKeys: string[] = []) {
    this.keys = [currentKey, ...previousKeys].map((key, index) => {
      if (!HEX_KEY.test(key)) {
        throw new Error(
          index === 0
            ? 'Encryption key must be a 32-byte hex string (64 hexadecimal characters)'
            : 'All previous encryption keys must be 32-byte hex strings (64 hexadecimal characters)'
        );
      }
      return Buffer.from(key, 'hex');
    });
  }

  encrypt(plaintext: string, account: string): string {
    const [key] = this.keys;
    if (!key) {
      throw new Error('No encryption key configured');
    }

    const iv = crypto.randomBytes(12);
    const cipher = crypto.createCipheriv('aes-256-gcm', key, iv);
    cipher.setAAD(Buffer.from(account, 'utf8'));

    const ciphertext = Buffer.concat([cipher.update(plaintext, 'utf8'), cipher.final()]);

    return [iv, cipher.getAuthTag(), ciphertext].map((part) => part.toString('hex')).join(':');
  }

  decrypt(payload: string, account: string): DecryptedCredentials {
    const [iv, authTag, ciphertext, ...rest] = payload.split(':');
    if (!iv || !authTag || ciphertext === undefined || rest.length > 0) {
      throw new Error('Malformed encrypted payload');
    }

    for (const [index, key] of this.keys.entries()) {
      try {
        const decipher = crypto.createDecipheriv('aes-256-gcm', key, Buffer.from(iv, 'hex'));
        decipher.setAAD(Buffer.from(account, 'utf8'));
        decipher.setAuthTag(Buffer.from(authTag, 'hex'));

        const plaintext = Buffer.concat([
          decipher.update(Buffer.from(ciphertext, 'hex')),
          decipher.final(),
        ]).toString('utf8');
        return { plaintext, stale: index > 0 };
      } catch {
        // Not sealed under this key
        continue;
      }
    }

    throw new Error('Failed to decrypt credentials with any available key');
  }
}
