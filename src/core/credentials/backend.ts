// src/core/credentials/backend.ts

import Keyv from 'keyv';
import type { Logger } from '../../observability/Logger';
import { SyncError } from '../../utils/errors';

const NAMESPACE = 'reddit-account-sync';

// URI schemes Keyv resolves to an installed adapter (@keyv/redis, @keyv/postgres)
export const PERSISTENT_SCHEMES = ['redis', 'postgres', 'postgresql'] as const;

/**
 * Keyv backend for the credential store.
 *
 * Without a URI the store lives in memory for the life of the process.
 */
export function createCredentialBackend(uri: string | undefined, logger: Logger): Keyv<string> {
  if (!uri) {
    return new Keyv<string>({ namespace: NAMESPACE });
  }

  const [scheme = ''] = uri.split(':');
  if (!PERSISTENT_SCHEMES.some((supported) => supported === scheme)) {
    throw new SyncError(
      `Unsupported credential store URI scheme "${scheme}"`,
      'UNSUPPORTED_CREDENTIAL_STORE',
      { supported: [...PERSISTENT_SCHEMES] }
    );
  }

  const store = new Keyv<string>(uri, { namespace: NAMESPACE });
  store.on('error', (error: unknown) => {
    logger.error('Credential store error', {
      scheme,
      error: error instanceof Error ? error.message : String(error),
    });
  });

  logger.debug('Credential store connected', { scheme });
  return store;
}
