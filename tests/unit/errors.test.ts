/**
 * Error Classes Unit Tests
 *
 * Codes, inheritance and the RemoteUnavailableError wrapping used by the
 * sync pipeline.
 */

import { describe, it, expect } from 'vitest';
import {
  SyncError,
  RemoteUnavailableError,
  UnsupportedItemKindError,
  InvalidBulkRequestError,
  AuthError,
  CredentialsNotFoundError,
  ApiError,
  ApiClientError,
  ApiServerError,
  RateLimitError,
  NetworkError,
  NetworkTimeoutError,
  CircuitBreakerOpenError,
  toRemoteUnavailable,
} from '../../src/utils/errors';

describe('Error Classes', () => {
  describe('SyncError', () => {
    it('should create error with message and code', () => {
      const error = new SyncError('Test error', 'TEST_CODE');
      expect(error.message).toBe('Test error');
      expect(error.code).toBe('TEST_CODE');
      expect(error.name).toBe('SyncError');
      expect(error.details).toBeUndefined();
    });

    it('should create error with details', () => {
      const details = { account: 'old_account', category: 'friends' };
      const error = new SyncError('Test error', 'TEST_CODE', details);
      expect(error.details).toEqual(details);
    });
  });

  describe('reconciliation errors', () => {
    it('should carry REMOTE_UNAVAILABLE and the cause', () => {
      const cause = new Error('socket hang up');
      const error = new RemoteUnavailableError('socket hang up', { account: 'a' }, { cause });

      expect(error).toBeInstanceOf(SyncError);
      expect(error.code).toBe('REMOTE_UNAVAILABLE');
      expect(error.cause).toBe(cause);
    });

    it('should name the unsupported kind', () => {
      const error = new UnsupportedItemKindError('t5', { id: 'abc' });

      expect(error.code).toBe('UNSUPPORTED_ITEM_KIND');
      expect(error.message).toBe('Unsupported saved item kind: t5');
      expect(error.kind).toBe('t5');
      expect(error.details).toEqual({ id: 'abc', kind: 't5' });
    });

    it('should default the bulk request message', () => {
      const error = new InvalidBulkRequestError();

      expect(error.code).toBe('INVALID_BULK_REQUEST');
      expect(error.message).toBe('Bulk request requires at least one item');
    });
  });

  describe('auth errors', () => {
    it('should distinguish missing stored credentials', () => {
      const error = new CredentialsNotFoundError('No client credentials stored for x');

      expect(error).toBeInstanceOf(AuthError);
      expect(error.code).toBe('CREDENTIALS_NOT_FOUND');
      expect(new AuthError('denied').code).toBe('AUTH_ERROR');
    });
  });

  describe('API errors', () => {
    it('should merge status into details', () => {
      const error = new ApiError('Teapot', 418, { account: 'a' });

      expect(error.status).toBe(418);
      expect(error.code).toBe('API_ERROR');
      expect(error.details).toEqual({ account: 'a', status: 418 });
    });

    it('should default client and server statuses', () => {
      expect(new ApiClientError('bad').status).toBe(400);
      expect(new ApiClientError('bad').code).toBe('API_CLIENT_ERROR');
      expect(new ApiServerError('down').status).toBe(500);
      expect(new ApiServerError('down').code).toBe('API_SERVER_ERROR');
    });

    it('should expose retryAfter on rate limit errors', () => {
      const error = new RateLimitError('Slow down', 30);

      expect(error.status).toBe(429);
      expect(error.code).toBe('RATE_LIMIT_EXCEEDED');
      expect(error.retryAfter).toBe(30);
      expect(error.details).toEqual({ retryAfter: 30, status: 429 });
    });
  });

  describe('network errors', () => {
    it('should set specific codes', () => {
      expect(new NetworkError('down').code).toBe('NETWORK_ERROR');
      expect(new NetworkTimeoutError().message).toBe('Request timeout');
      expect(new NetworkTimeoutError().code).toBe('NETWORK_TIMEOUT');
      expect(new CircuitBreakerOpenError('open').code).toBe('CIRCUIT_BREAKER_OPEN');
      expect(new CircuitBreakerOpenError('open')).toBeInstanceOf(NetworkError);
    });
  });

  describe('toRemoteUnavailable', () => {
    it('should pass RemoteUnavailableError through unchanged', () => {
      const original = new RemoteUnavailableError('gone');

      expect(toRemoteUnavailable(original, { account: 'a' })).toBe(original);
    });

    it('should keep the upstream code of a SyncError', () => {
      const wrapped = toRemoteUnavailable(new ApiServerError('Server error: 502', 502), {
        account: 'a',
      });

      expect(wrapped.message).toBe('Server error: 502');
      expect(wrapped.details).toEqual({ account: 'a', upstreamCode: 'API_SERVER_ERROR' });
    });

    it('should wrap non-Error values', () => {
      const wrapped = toRemoteUnavailable('plain string');

      expect(wrapped.message).toBe('plain string');
      expect(wrapped.details).toEqual({});
      expect(wrapped.cause).toBe('plain string');
    });
  });
});
