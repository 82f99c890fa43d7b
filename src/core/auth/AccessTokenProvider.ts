// src/core/auth/AccessTokenProvider.ts

import type { AccountCredentials, TokenSet } from './types';
import type { AuthCore } from './AuthCore';
import type { Logger } from '../../observability/Logger';

export interface AccessTokenSource {
  getAccessToken(): Promise<string>;
}

/**
 * Holds one account's token and re-authenticates shortly before it expires.
 * Password grants issue no refresh token, so renewal is a new grant.
 */
export class AccessTokenProvider implements AccessTokenSource {
  private token?: TokenSet;
  private pending?: Promise<TokenSet>;
  protected preRefreshMarginMs: number = 5 * 60 * 1000; // 5 minutes

  constructor(
    private auth: AuthCore,
    private credentials: AccountCredentials,
    private logger: Logger,
    initialToken?: TokenSet
  ) {
    this.token = initialToken;
  }

  get account(): string {
    return this.credentials.username;
  }

  async getAccessToken(): Promise<string> {
    const current = this.token;
    if (current && !this.isExpiring(current)) {
      return current.accessToken;
    }

    if (current) {
      this.logger.info('Renewing access token', {
        account: this.account,
        expiresAt: current.expiresAt?.toISOString(),
      });
    }
    const renewed = await this.renewWithDedup();
    return renewed.accessToken;
  }

  private isExpiring(token: TokenSet): boolean {
    return token.expiresAt !== undefined && token.expiresAt.getTime() <= Date.now() + this.preRefreshMarginMs;
  }

  /**
   * Concurrent callers share one in-flight grant
   */
  private async renewWithDedup(): Promise<TokenSet> {
    if (this.pending) {
      this.logger.debug('Token renewal already in progress, waiting', { account: this.account });
      return this.pending;
    }

    this.pending = this.auth.authenticate(this.credentials);
    try {
      this.token = await this.pending;
      return this.token;
    } finally {
      this.pending = undefined;
    }
  }
}
