// tests/unit/SyncOrchestrator.test.ts

import { describe, it, expect, beforeEach } from 'vitest';
import { SyncOrchestrator } from '../../src/core/sync/SyncOrchestrator';
import { CATEGORY_ORDER } from '../../src/core/sync/types';
import { ApiServerError } from '../../src/utils/errors';
import { InMemorySession, createTestLogger, createTestMetrics } from '../helpers/InMemorySession';

describe('SyncOrchestrator', () => {
  let orchestrator: SyncOrchestrator;
  let source: InMemorySession;
  let destination: InMemorySession;

  beforeEach(() => {
    orchestrator = new SyncOrchestrator(createTestLogger(), createTestMetrics());
    source = new InMemorySession('old_account', {
      subscriptions: ['a', 'B', 'c'],
      friends: ['alice', 'bob'],
      saved: [
        { id: 'p1', kind: 'post' },
        { id: 'c1', kind: 'comment' },
      ],
      preferences: { lang: 'en', over_18: true },
    });
    destination = new InMemorySession('new_account', {
      subscriptions: ['b', 'd'],
      friends: ['bob', 'mallory'],
      saved: [
        { id: 'p1', kind: 'post' },
        { id: 'x9', kind: 'post' },
      ],
      preferences: { lang: 'de' },
    });
  });

  it('should converge the destination to the source', async () => {
    const result = await orchestrator.run(source, destination);

    expect(result.success).toBe(true);
    expect(result.source).toBe('old_account');
    expect(result.destination).toBe('new_account');
    expect(result.dryRun).toBe(false);

    expect(result.categories.subscriptions).toMatchObject({
      status: 'completed',
      planned: { toAdd: 2, toRemove: 1 },
      applied: 3,
    });
    expect(result.categories.friends).toMatchObject({
      status: 'completed',
      planned: { toAdd: 1, toRemove: 1 },
      applied: 2,
    });
    expect(result.categories.savedItems).toMatchObject({
      status: 'completed',
      planned: { toAdd: 1, toRemove: 1 },
      applied: 2,
    });
    expect(result.preferences).toEqual({ status: 'copied', keyCount: 2 });

    expect(destination.callsTo('unsubscribeBulk')).toEqual([['d', []]]);
    expect(destination.callsTo('subscribeBulk')).toEqual([['a', ['c']]]);
    expect(destination.callsTo('unfriend')).toEqual([['mallory']]);
    expect(destination.callsTo('friend')).toEqual([['alice']]);
    expect(destination.callsTo('unsave')).toEqual([['x9', 'post']]);
    expect(destination.callsTo('save')).toEqual([['c1', 'comment']]);
    expect(destination.preferences).toEqual({ lang: 'en', over_18: true });
  });

  it('should plan nothing on a second run', async () => {
    await orchestrator.run(source, destination);
    const mutationsAfterFirstRun = destination.mutationCount;

    const second = await orchestrator.run(source, destination, {
      targets: ['subscriptions', 'friends', 'savedItems'],
    });

    expect(second.success).toBe(true);
    for (const category of CATEGORY_ORDER) {
      expect(second.categories[category]?.planned).toEqual({ toAdd: 0, toRemove: 0 });
      expect(second.categories[category]?.applied).toBe(0);
    }
    expect(destination.mutationCount).toBe(mutationsAfterFirstRun);
  });

  it('should mutate categories in a fixed order', async () => {
    await orchestrator.run(source, destination);

    const mutations = destination.calls
      .map((call) => call.method)
      .filter((method) => !method.startsWith('list') && method !== 'getPreferences');

    expect(mutations).toEqual([
      'unsubscribeBulk',
      'subscribeBulk',
      'unfriend',
      'friend',
      'unsave',
      'save',
      'setPreferences',
    ]);
  });

  it('should never mutate the source', async () => {
    await orchestrator.run(source, destination);

    expect(source.mutationCount).toBe(0);
  });

  it('should abort only the category whose snapshot failed', async () => {
    source.failOn('listFriends', new ApiServerError('Server error: 503', 503));

    const result = await orchestrator.run(source, destination);

    expect(result.success).toBe(false);
    expect(result.categories.friends).toEqual({
      category: 'friends',
      status: 'aborted',
      planned: { toAdd: 0, toRemove: 0 },
      applied: 0,
      skippedDuplicate: 0,
      failed: 0,
      failures: [],
      error: { code: 'REMOTE_UNAVAILABLE', message: 'Server error: 503' },
    });
    expect(destination.callsTo('friend')).toEqual([]);
    expect(destination.callsTo('unfriend')).toEqual([]);
    expect(result.categories.subscriptions?.status).toBe('completed');
    expect(result.categories.savedItems?.status).toBe('completed');
    expect(result.preferences?.status).toBe('copied');
  });

  it('should report item failures and still finish', async () => {
    destination.failOn('friend', new Error('Timeout'), 'alice');

    const result = await orchestrator.run(source, destination);

    expect(result.success).toBe(false);
    expect(result.categories.friends?.failures).toEqual([
      { item: 'alice', action: 'add', code: 'REMOTE_UNAVAILABLE', message: 'Timeout' },
    ]);
    expect(result.categories.savedItems?.applied).toBe(2);
  });

  it('should report a failed preference copy without throwing', async () => {
    destination.failOn('setPreferences', new Error('forbidden'));

    const result = await orchestrator.run(source, destination);

    expect(result.success).toBe(false);
    expect(result.preferences).toEqual({
      status: 'failed',
      code: 'REMOTE_UNAVAILABLE',
      message: 'forbidden',
    });
  });

  it('should compute plans without mutating in a dry run', async () => {
    const result = await orchestrator.run(source, destination, { dryRun: true });

    expect(result.dryRun).toBe(true);
    expect(result.success).toBe(true);
    expect(destination.mutationCount).toBe(0);
    expect(result.categories.subscriptions).toMatchObject({
      status: 'planned',
      planned: { toAdd: 2, toRemove: 1 },
      applied: 0,
    });
    expect(result.preferences).toEqual({ status: 'planned', keyCount: 2 });
  });

  it('should only touch the selected targets', async () => {
    const result = await orchestrator.run(source, destination, { targets: ['friends'] });

    expect(Object.keys(result.categories)).toEqual(['friends']);
    expect(result.preferences).toBeUndefined();
    expect(source.callsTo('listSubscriptions')).toEqual([]);
    expect(source.callsTo('getPreferences')).toEqual([]);
    expect(destination.callsTo('subscribeBulk')).toEqual([]);
  });

  it('should return a frozen result with a run id', async () => {
    const result = await orchestrator.run(source, destination);

    expect(Object.isFrozen(result)).toBe(true);
    expect(Object.isFrozen(result.categories)).toBe(true);
    expect(result.runId).toMatch(/^[0-9a-f-]{36}$/);
    expect(result.finishedAt.getTime()).toBeGreaterThanOrEqual(result.startedAt.getTime());
  });
});
