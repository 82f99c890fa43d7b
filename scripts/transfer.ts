#!/usr/bin/env tsx

/**
 * Copy subscriptions, friends, saved items and preferences from one Reddit
 * account to another.
 *
 * Reads both accounts from the environment (or .env):
 *   SOURCE_USERNAME, SOURCE_PASSWORD, SOURCE_CLIENT_ID, SOURCE_CLIENT_SECRET, SOURCE_AUTH_CODE
 *   DESTINATION_USERNAME, DESTINATION_PASSWORD, DESTINATION_CLIENT_ID, DESTINATION_CLIENT_SECRET,
 *   DESTINATION_AUTH_CODE
 * AUTH_CODE is only needed for accounts with two-factor authentication.
 *
 * A client id/secret pair is remembered per username in the credential store;
 * on later runs it may be left out and only the password is needed. Point
 * CREDENTIAL_STORE_URI at redis:// or postgres:// to keep it between runs, and
 * set CREDENTIAL_ENCRYPTION_KEY (64 hex chars) to encrypt it at rest.
 * CREDENTIAL_PREVIOUS_KEYS lists retired keys, comma-separated.
 *
 * Optional: DRY_RUN=1, SYNC_TARGETS=subscriptions,friends, LOG_LEVEL, USER_AGENT
 *
 * Usage:
 *   tsx scripts/transfer.ts
 *   npm run transfer
 */

import dotenv from 'dotenv';
import { z } from 'zod';
import { AccountSyncSDK, ALL_TARGETS, type AccountLogin, type SyncTarget } from '../src/index';

dotenv.config();

const TargetSchema = z.enum(['subscriptions', 'friends', 'savedItems', 'preferences']);

const EnvSchema = z.object({
  SOURCE_USERNAME: z.string().min(1),
  SOURCE_PASSWORD: z.string().min(1),
  SOURCE_CLIENT_ID: z.string().optional(),
  SOURCE_CLIENT_SECRET: z.string().optional(),
  SOURCE_AUTH_CODE: z.string().optional(),
  DESTINATION_USERNAME: z.string().min(1),
  DESTINATION_PASSWORD: z.string().min(1),
  DESTINATION_CLIENT_ID: z.string().optional(),
  DESTINATION_CLIENT_SECRET: z.string().optional(),
  DESTINATION_AUTH_CODE: z.string().optional(),
  DRY_RUN: z.enum(['0', '1', 'true', 'false']).optional(),
  SYNC_TARGETS: z.string().optional(),
  LOG_LEVEL: z.enum(['debug', 'info', 'warn', 'error']).optional(),
  USER_AGENT: z.string().optional(),
  CREDENTIAL_STORE_URI: z.string().optional(),
  CREDENTIAL_ENCRYPTION_KEY: z.string().optional(),
  CREDENTIAL_PREVIOUS_KEYS: z.string().optional(),
});

type Env = z.infer<typeof EnvSchema>;

// Empty values from a .env template count as absent
function loginFor(env: Env, prefix: 'SOURCE' | 'DESTINATION'): AccountLogin {
  return prefix === 'SOURCE'
    ? {
        username: env.SOURCE_USERNAME,
        password: env.SOURCE_PASSWORD,
        clientId: env.SOURCE_CLIENT_ID || undefined,
        clientSecret: env.SOURCE_CLIENT_SECRET || undefined,
        authCode: env.SOURCE_AUTH_CODE || undefined,
      }
    : {
        username: env.DESTINATION_USERNAME,
        password: env.DESTINATION_PASSWORD,
        clientId: env.DESTINATION_CLIENT_ID || undefined,
        clientSecret: env.DESTINATION_CLIENT_SECRET || undefined,
        authCode: env.DESTINATION_AUTH_CODE || undefined,
      };
}

function splitList(raw: string | undefined): string[] {
  return (raw ?? '')
    .split(',')
    .map((entry) => entry.trim())
    .filter((entry) => entry.length > 0);
}

function parseTargets(raw: string | undefined): readonly SyncTarget[] {
  const targets = splitList(raw);
  return targets.length === 0 ? ALL_TARGETS : targets.map((target) => TargetSchema.parse(target));
}

async function main(): Promise<void> {
  const parsed = EnvSchema.safeParse(process.env);
  if (!parsed.success) {
    console.error('Missing or invalid environment:');
    for (const issue of parsed.error.errors) {
      console.error(`  ${issue.path.join('.')}: ${issue.message}`);
    }
    process.exitCode = 1;
    return;
  }
  const env = parsed.data;

  const sdk = AccountSyncSDK.init({
    http: {
      retry: {
        maxRetries: 3,
        baseDelay: 1000,
        maxDelay: 10000,
        retryableStatusCodes: [429, 500, 502, 503, 504],
      },
      userAgent: env.USER_AGENT,
    },
    rateLimit: { qps: 1, concurrency: 1 },
    logging: { level: env.LOG_LEVEL ?? 'info', format: 'pretty' },
    credentialStore: {
      uri: env.CREDENTIAL_STORE_URI || undefined,
      encryption: env.CREDENTIAL_ENCRYPTION_KEY
        ? {
            key: env.CREDENTIAL_ENCRYPTION_KEY,
            previousKeys: splitList(env.CREDENTIAL_PREVIOUS_KEYS),
            algorithm: 'aes-256-gcm',
          }
        : undefined,
    },
  });

  try {
    // Log in to both accounts up front so a typo fails before any mutation
    const [source, destination] = await Promise.all([
      sdk.login(loginFor(env, 'SOURCE')),
      sdk.login(loginFor(env, 'DESTINATION')),
    ]);

    const result = await sdk.run(source, destination, {
      targets: parseTargets(env.SYNC_TARGETS),
      dryRun: env.DRY_RUN === '1' || env.DRY_RUN === 'true',
    });

    console.log(JSON.stringify(result, null, 2));

    if (!result.success) {
      process.exitCode = 1;
    }
  } finally {
    await sdk.close();
  }
}

main().catch((error: unknown) => {
  console.error('Transfer failed:', error instanceof Error ? error.message : error);
  process.exitCode = 1;
});
