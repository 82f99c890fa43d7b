// src/core/auth/AuthCore.ts

import { Issuer, custom, type TokenSet as GrantedTokenSet } from 'openid-client';
import type { AccountCredentials, AuthConfig, TokenSet } from './types';
import type { Logger } from '../../observability/Logger';
import { AuthError } from '../../utils/errors';
import { withSpan } from '../../observability/tracing';
import { DEFAULT_USER_AGENT } from '../http/HttpCore';

export const REDDIT_TOKEN_ENDPOINT = 'https://www.reddit.com/api/v1/access_token';

/**
 * Password-grant authentication for Reddit script apps
 */
export class AuthCore {
  private issuer: Issuer;
  private userAgent: string;

  constructor(
    private config: AuthConfig,
    private logger: Logger
  ) {
    this.userAgent = config.userAgent ?? DEFAULT_USER_AGENT;
    this.issuer = new Issuer({
      issuer: 'https://www.reddit.com',
      token_endpoint: config.tokenEndpoint ?? REDDIT_TOKEN_ENDPOINT,
      // Reddit requires client_secret_basic authentication
      token_endpoint_auth_methods_supported: ['client_secret_basic'],
    });
  }

  /**
   * Exchange username/password (and optional 2FA code) for an access token
   *
   * @throws {AuthError} If Reddit rejects the credentials or the endpoint is unreachable
   */
  async authenticate(credentials: AccountCredentials): Promise<TokenSet> {
    return withSpan(
      'Auth password-grant',
      async () => {
        const client = new this.issuer.Client({
          client_id: credentials.clientId,
          client_secret: credentials.clientSecret,
          token_endpoint_auth_method: 'client_secret_basic',
        });
        client[custom.http_options] = (_url, options) => ({
          ...options,
          headers: { ...options.headers, 'User-Agent': this.userAgent },
          timeout: this.config.timeout ?? options.timeout,
        });

        // Reddit takes the two-factor code appended to the password
        const password = credentials.authCode
          ? `${credentials.password}:${credentials.authCode}`
          : credentials.password;

        let tokenSet: GrantedTokenSet;
        try {
          tokenSet = await client.grant({
            grant_type: 'password',
            username: credentials.username,
            password,
          });
        } catch (error: unknown) {
          const message = error instanceof Error ? error.message : String(error);
          this.logger.error('Password grant failed', { username: credentials.username, error: message });
          throw new AuthError(`Authentication failed for ${credentials.username}`, {
            username: credentials.username,
            cause: message,
          });
        }

        // Reddit answers bad credentials with 200 and { "error": "invalid_grant" }
        if (!tokenSet.access_token) {
          const reason = typeof tokenSet.error === 'string' ? tokenSet.error : 'missing access_token';
          this.logger.error('Password grant rejected', { username: credentials.username, reason });
          throw new AuthError(`Authentication failed for ${credentials.username}: ${reason}`, {
            username: credentials.username,
            reason,
          });
        }

        this.logger.debug('Password grant successful', {
          username: credentials.username,
          tokenType: tokenSet.token_type,
          scope: tokenSet.scope,
          expiresIn: tokenSet.expires_in,
        });

        return {
          accessToken: tokenSet.access_token,
          expiresAt: tokenSet.expires_at ? new Date(tokenSet.expires_at * 1000) : undefined,
          scope: tokenSet.scope,
          tokenType: tokenSet.token_type,
        };
      },
      { 'auth.username': credentials.username }
    );
  }
}
