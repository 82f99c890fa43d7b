// tests/unit/backend.test.ts

import { describe, it, expect } from 'vitest';
import { createCredentialBackend } from '../../src/core/credentials/backend';
import { SyncError } from '../../src/utils/errors';
import { createTestLogger } from '../helpers/InMemorySession';

describe('createCredentialBackend', () => {
  it('should keep credentials in memory without a URI', async () => {
    const backend = createCredentialBackend(undefined, createTestLogger());

    await backend.set('credentials:old_account', 'value');

    expect(await backend.get('credentials:old_account')).toBe('value');
    await expect(backend.disconnect()).resolves.toBeUndefined();
  });

  it('should reject a URI scheme with no Keyv adapter', () => {
    const error = (() => {
      try {
        createCredentialBackend('ftp://files.example.test/credentials', createTestLogger());
        return undefined;
      } catch (e: unknown) {
        return e;
      }
    })();

    expect(error).toBeInstanceOf(SyncError);
    expect(error).toMatchObject({
      code: 'UNSUPPORTED_CREDENTIAL_STORE',
      message: 'Unsupported credential store URI scheme "ftp"',
      details: { supported: ['redis', 'postgres', 'postgresql'] },
    });
  });
});
