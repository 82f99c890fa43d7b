// src/sdk.ts

import type Keyv from 'keyv';
import type { AccountCredentials, AccountLogin } from './core/auth/types';
import type { AccountSession, RunOptions, RunResult } from './core/sync/types';
import type { RedditSessionOptions } from './connectors/reddit/types';
import type { SessionDeps } from './connectors/types';
import { AuthCore } from './core/auth/AuthCore';
import { AccessTokenProvider } from './core/auth/AccessTokenProvider';
import { HttpCore } from './core/http/HttpCore';
import { CredentialStore } from './core/credentials/CredentialStore';
import { createCredentialBackend } from './core/credentials/backend';
import { SyncOrchestrator } from './core/sync/SyncOrchestrator';
import { RedditSession } from './connectors/reddit/RedditSession';
import { Logger } from './observability/Logger';
import { MetricsCollector } from './observability/MetricsCollector';
import { validateConfig, type InitConfig } from './config/ConfigValidator';
import { CredentialsNotFoundError } from './utils/errors';

export interface SDKOptions {
  /** Keyv instance backing the credential store; overrides `credentialStore.uri` */
  credentialBackend?: Keyv<string>;
  session?: RedditSessionOptions;
}

export class AccountSyncSDK {
  private logger: Logger;
  private metrics: MetricsCollector;
  private auth: AuthCore;
  private http: HttpCore;
  private orchestrator: SyncOrchestrator;
  private store: CredentialStore;
  private credentialBackend: Keyv<string>;

  /**
   * Build all dependencies before anything uses them
   */
  private constructor(
    config: InitConfig,
    private options: SDKOptions
  ) {
    this.logger = new Logger(config.logging);
    this.metrics = new MetricsCollector(config.metrics);
    this.http = new HttpCore(config.http, this.metrics, this.logger, config.rateLimit);
    this.auth = new AuthCore(
      {
        tokenEndpoint: config.auth?.tokenEndpoint,
        userAgent: config.http.userAgent,
        timeout: config.http.timeout,
      },
      this.logger
    );
    this.credentialBackend =
      options.credentialBackend ?? createCredentialBackend(config.credentialStore?.uri, this.logger);
    this.store = new CredentialStore(config.credentialStore ?? {}, this.logger, this.credentialBackend);
    this.orchestrator = new SyncOrchestrator(this.logger, this.metrics);
  }

  /**
   * Initialize the account sync SDK
   *
   * @throws {z.ZodError} If the configuration is invalid
   *
   * @example
   * ```typescript
   * const sdk = AccountSyncSDK.init({
   *   http: {
   *     retry: {
   *       maxRetries: 3,
   *       baseDelay: 1000,
   *       maxDelay: 10000,
   *       retryableStatusCodes: [429, 500, 502, 503, 504]
   *     },
   *     userAgent: 'node:my-sync:v1.0.0 (by /u/old_account)'
   *   },
   *   rateLimit: { qps: 1, concurrency: 1 }
   * });
   * ```
   */
  static init(config: unknown, options: SDKOptions = {}): AccountSyncSDK {
    const validatedConfig = validateConfig(config);
    const sdk = new AccountSyncSDK(validatedConfig, options);

    sdk.logger.info('SDK initialized', {
      userAgent: validatedConfig.http.userAgent,
      rateLimit: validatedConfig.rateLimit,
      encryptedCredentials: !!validatedConfig.credentialStore?.encryption,
    });

    return sdk;
  }

  /**
   * Log in with a password grant and return a session on that account
   *
   * @throws {AuthError} If Reddit rejects the credentials
   *
   * @example
   * ```typescript
   * const source = await sdk.authenticate({
   *   username: 'old_account',
   *   password: process.env.SOURCE_PASSWORD,
   *   clientId: process.env.SOURCE_CLIENT_ID,
   *   clientSecret: process.env.SOURCE_CLIENT_SECRET,
   * });
   * ```
   */
  async authenticate(credentials: AccountCredentials): Promise<RedditSession> {
    const token = await this.auth.authenticate(credentials);
    const provider = new AccessTokenProvider(this.auth, credentials, this.logger, token);

    this.logger.info('Account authenticated', {
      account: credentials.username,
      expiresAt: token.expiresAt?.toISOString(),
    });

    const deps: SessionDeps = { http: this.http, logger: this.logger };
    return new RedditSession(deps, credentials.username, provider, this.options.session);
  }

  /**
   * Same as authenticate(), with the client id/secret read from the credential store
   *
   * @throws {CredentialsNotFoundError} If no client credentials were saved for the account
   */
  async authenticateStored(
    username: string,
    password: string,
    authCode?: string
  ): Promise<RedditSession> {
    const client = await this.store.getClientCredentials(username);
    if (!client) {
      throw new CredentialsNotFoundError(`No client credentials stored for ${username}`, { username });
    }
    return this.authenticate({ username, password, authCode, ...client });
  }

  /**
   * Log in, remembering the script-app client for next time.
   *
   * With a client id and secret, logs in and saves them for the username once
   * Reddit accepts them. Without, falls back to the saved ones, so later runs
   * only need the password.
   *
   * @throws {CredentialsNotFoundError} If no client is given and none was saved
   */
  async login(login: AccountLogin): Promise<RedditSession> {
    const { username, password, authCode, clientId, clientSecret } = login;

    if (!clientId || !clientSecret) {
      return this.authenticateStored(username, password, authCode);
    }

    const session = await this.authenticate({ username, password, authCode, clientId, clientSecret });
    await this.store.setClientCredentials(username, { clientId, clientSecret });
    return session;
  }

  /**
   * Converge `destination` to `source`
   *
   * Never rejects for remote failures; inspect `success`, the per-category
   * reports and `preferences` on the result.
   *
   * @example
   * ```typescript
   * const result = await sdk.run(source, destination, { targets: ['subscriptions', 'friends'] });
   * if (!result.success) {
   *   console.error(result.categories);
   * }
   * ```
   */
  async run(
    source: AccountSession,
    destination: AccountSession,
    options: RunOptions = {}
  ): Promise<RunResult> {
    return this.orchestrator.run(source, destination, options);
  }

  get credentials(): CredentialStore {
    return this.store;
  }

  /**
   * Release the credential store's connection, if it holds one
   */
  async close(): Promise<void> {
    await this.credentialBackend.disconnect();
  }

  /**
   * Prometheus text exposition of the SDK's metrics
   */
  async getMetrics(): Promise<string> {
    return this.metrics.getMetrics();
  }
}
