// src/core/auth/types.ts

/**
 * Credentials of a Reddit "script" app owned by the account.
 * `authCode` is the current two-factor code, when the account has 2FA enabled.
 */
export interface AccountCredentials {
  username: string;
  password: string;
  clientId: string;
  clientSecret: string;
  authCode?: string;
}

export interface ClientCredentials {
  clientId: string;
  clientSecret: string;
}

/**
 * Login where the script-app client may be omitted once it has been remembered
 */
export type AccountLogin = Omit<AccountCredentials, keyof ClientCredentials> & Partial<ClientCredentials>;

export interface TokenSet {
  accessToken: string;
  expiresAt?: Date;
  scope?: string;
  tokenType?: string;
}

export interface AuthConfig {
  tokenEndpoint?: string;
  userAgent?: string;
  timeout?: number;
}
