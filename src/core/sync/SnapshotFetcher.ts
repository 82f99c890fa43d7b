// src/core/sync/SnapshotFetcher.ts

import type { AccountSession, Category, CategoryItem, CategorySnapshot } from './types';
import type { Logger } from '../../observability/Logger';
import type { MetricsCollector } from '../../observability/MetricsCollector';
import { identityKey } from './identity';
import { toRemoteUnavailable } from '../../utils/errors';

const LISTINGS: { [C in Category]: (session: AccountSession) => AsyncIterable<CategoryItem<C>> } = {
  subscriptions: (session) => session.listSubscriptions(),
  friends: (session) => session.listFriends(),
  savedItems: (session) => session.listSaved(),
};

export class SnapshotFetcher {
  constructor(
    private logger: Logger,
    private metrics: MetricsCollector
  ) {}

  /**
   * Drain one category listing into an immutable snapshot
   *
   * Pages until the session's sequence ends. Items repeated across pages are
   * kept once (first occurrence wins).
   *
   * @throws {RemoteUnavailableError} If the session fails at any point of the listing
   */
  async fetch<C extends Category>(session: AccountSession, category: C): Promise<CategorySnapshot<C>> {
    const startTime = Date.now();
    const items = new Map<string, CategoryItem<C>>();
    let duplicates = 0;

    const listing = LISTINGS[category];

    try {
      for await (const item of listing(session)) {
        const key = identityKey(item);
        if (items.has(key)) {
          duplicates++;
          continue;
        }
        items.set(key, item);
      }
    } catch (error: unknown) {
      this.metrics.recordLatency('snapshot_fetch_duration', Date.now() - startTime, {
        category,
        status: 'failed',
      });
      this.logger.error('Snapshot fetch failed', {
        account: session.account,
        category,
        fetchedSoFar: items.size,
        error: error instanceof Error ? error.message : String(error),
      });
      throw toRemoteUnavailable(error, { account: session.account, category });
    }

    this.metrics.recordLatency('snapshot_fetch_duration', Date.now() - startTime, {
      category,
      status: 'success',
    });
    this.logger.debug('Snapshot fetched', {
      account: session.account,
      category,
      itemCount: items.size,
      duplicates,
    });

    return {
      category,
      account: session.account,
      items,
      fetchedAt: new Date(),
    };
  }
}
