// tests/unit/SnapshotFetcher.test.ts

import { describe, it, expect, beforeEach, vi } from 'vitest';
import { SnapshotFetcher } from '../../src/core/sync/SnapshotFetcher';
import { MetricsCollector } from '../../src/observability/MetricsCollector';
import { NetworkTimeoutError, RemoteUnavailableError } from '../../src/utils/errors';
import { InMemorySession, createTestLogger, createTestMetrics } from '../helpers/InMemorySession';

describe('SnapshotFetcher', () => {
  let fetcher: SnapshotFetcher;
  let metrics: MetricsCollector;

  beforeEach(() => {
    metrics = createTestMetrics();
    fetcher = new SnapshotFetcher(createTestLogger(), metrics);
  });

  it('should key subscriptions by lowercased name', async () => {
    const session = new InMemorySession('old_account', { subscriptions: ['AskScience', 'python'] });

    const snapshot = await fetcher.fetch(session, 'subscriptions');

    expect(snapshot.category).toBe('subscriptions');
    expect(snapshot.account).toBe('old_account');
    expect([...snapshot.items.entries()]).toEqual([
      ['askscience', 'AskScience'],
      ['python', 'python'],
    ]);
  });

  it('should keep the first occurrence of a repeated item', async () => {
    const session = new InMemorySession('old_account', { friends: ['Alice', 'bob', 'alice'] });

    const snapshot = await fetcher.fetch(session, 'friends');

    expect(snapshot.items.size).toBe(2);
    expect(snapshot.items.get('alice')).toBe('Alice');
  });

  it('should key saved items by id', async () => {
    const session = new InMemorySession('old_account', {
      saved: [
        { id: 'abc', kind: 'post' },
        { id: 'def', kind: 'comment' },
      ],
    });

    const snapshot = await fetcher.fetch(session, 'savedItems');

    expect(snapshot.items.get('def')).toEqual({ id: 'def', kind: 'comment' });
    expect(snapshot.items.size).toBe(2);
  });

  it('should return an empty snapshot for an empty listing', async () => {
    const snapshot = await fetcher.fetch(new InMemorySession('old_account'), 'friends');

    expect(snapshot.items.size).toBe(0);
  });

  it('should wrap listing failures in RemoteUnavailableError', async () => {
    const session = new InMemorySession('old_account');
    session.failOn('listSaved', new NetworkTimeoutError('Request timeout'));

    const error = await fetcher.fetch(session, 'savedItems').catch((e: unknown) => e);

    expect(error).toBeInstanceOf(RemoteUnavailableError);
    expect(error).toMatchObject({
      code: 'REMOTE_UNAVAILABLE',
      message: 'Request timeout',
      details: { account: 'old_account', category: 'savedItems', upstreamCode: 'NETWORK_TIMEOUT' },
    });
  });

  it('should record fetch duration with the outcome', async () => {
    const recordLatency = vi.spyOn(metrics, 'recordLatency');
    const session = new InMemorySession('old_account');
    session.failOn('listFriends', new Error('boom'));

    await fetcher.fetch(session, 'subscriptions');
    await fetcher.fetch(session, 'friends').catch(() => undefined);

    expect(recordLatency).toHaveBeenCalledWith('snapshot_fetch_duration', expect.any(Number), {
      category: 'subscriptions',
      status: 'success',
    });
    expect(recordLatency).toHaveBeenCalledWith('snapshot_fetch_duration', expect.any(Number), {
      category: 'friends',
      status: 'failed',
    });
  });
});
