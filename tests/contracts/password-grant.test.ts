/**
 * Contract test: Reddit password grant
 *
 * Script apps log in with grant_type=password and HTTP basic client auth.
 * Accounts with two-factor authentication append the current code to the
 * password. Bad credentials come back as 200 with { "error": "invalid_grant" }.
 */

import { describe, it, expect, beforeAll, afterAll, beforeEach, afterEach } from 'vitest';
import nock from 'nock';
import { AuthCore } from '../../src/core/auth/AuthCore';
import type { AccountCredentials } from '../../src/core/auth/types';
import { DEFAULT_USER_AGENT } from '../../src/core/http/HttpCore';
import { AuthError } from '../../src/utils/errors';
import { createTestLogger } from '../helpers/InMemorySession';
import { formOf } from '../helpers/form';

const TOKEN_HOST = 'https://www.reddit.com';

describe('Password Grant Contract', () => {
  const credentials: AccountCredentials = {
    username: 'old_account',
    password: 'test-password',
    clientId: 'test-client',
    clientSecret: 'test-secret',
  };
  let auth: AuthCore;

  beforeAll(() => {
    nock.disableNetConnect();
  });

  afterAll(() => {
    nock.enableNetConnect();
  });

  beforeEach(() => {
    auth = new AuthCore({}, createTestLogger());
  });

  afterEach(() => {
    nock.cleanAll();
  });

  it('should exchange username and password for an access token', async () => {
    let sent: Record<string, string> = {};
    nock(TOKEN_HOST)
      .post('/api/v1/access_token', (body: unknown) => {
        sent = formOf(body);
        return true;
      })
      .basicAuth({ user: 'test-client', pass: 'test-secret' })
      .matchHeader('user-agent', DEFAULT_USER_AGENT)
      .reply(200, {
        access_token: 'test-access-token',
        token_type: 'bearer',
        expires_in: 86400,
        scope: '*',
      });

    const before = Date.now();
    const token = await auth.authenticate(credentials);

    expect(sent).toEqual({ grant_type: 'password', username: 'old_account', password: 'test-password' });
    expect(token.accessToken).toBe('test-access-token');
    expect(token.tokenType).toBe('bearer');
    expect(token.scope).toBe('*');
    expect(token.expiresAt?.getTime()).toBeGreaterThanOrEqual(before + 86_399_000);
  });

  it('should append the two-factor code to the password', async () => {
    let sent: Record<string, string> = {};
    nock(TOKEN_HOST)
      .post('/api/v1/access_token', (body: unknown) => {
        sent = formOf(body);
        return true;
      })
      .reply(200, { access_token: 'test-access-token', token_type: 'bearer', expires_in: 3600 });

    await auth.authenticate({ ...credentials, authCode: '123456' });

    expect(sent.password).toBe('test-password:123456');
  });

  it('should use a configured token endpoint and User-Agent', async () => {
    const custom = new AuthCore(
      {
        tokenEndpoint: 'https://auth.example.test/token',
        userAgent: 'node:custom-sync:v2.0.0',
      },
      createTestLogger()
    );
    nock('https://auth.example.test')
      .post('/token')
      .matchHeader('user-agent', 'node:custom-sync:v2.0.0')
      .reply(200, { access_token: 'custom-token', token_type: 'bearer' });

    const token = await custom.authenticate(credentials);

    expect(token.accessToken).toBe('custom-token');
    expect(token.expiresAt).toBeUndefined();
  });

  it('should reject an invalid_grant answer', async () => {
    nock(TOKEN_HOST).post('/api/v1/access_token').reply(200, { error: 'invalid_grant' });

    const error = await auth.authenticate(credentials).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(AuthError);
    expect(error).toMatchObject({ code: 'AUTH_ERROR' });
    expect(error instanceof Error ? error.message : '').toMatch(/^Authentication failed for old_account/);
  });

  it('should reject a 401 from the token endpoint', async () => {
    nock(TOKEN_HOST).post('/api/v1/access_token').reply(401, { message: 'Unauthorized', error: 401 });

    await expect(auth.authenticate(credentials)).rejects.toThrow(AuthError);
  });
});
