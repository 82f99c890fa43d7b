// src/core/sync/Reconciler.ts

import type {
  AccountSession,
  AnyDiffResult,
  Category,
  DiffResult,
  MutationOutcome,
  ReconcileAction,
  ReconcileReport,
  SavedItem,
} from './types';
import type { Logger } from '../../observability/Logger';
import type { MetricsCollector } from '../../observability/MetricsCollector';
import { ReportTally } from './report';
import { isSavedItemKind } from './identity';
import {
  InvalidBulkRequestError,
  UnsupportedItemKindError,
  toRemoteUnavailable,
} from '../../utils/errors';

export interface BulkRequest {
  primary: string;
  others: string[];
}

/**
 * Split a list into the primary item and the auxiliary list the subscribe
 * endpoints expect.
 *
 * @throws {InvalidBulkRequestError} If the list is empty
 */
export function bulkRequest(items: readonly string[]): BulkRequest {
  const [primary, ...others] = items;
  if (primary === undefined) {
    throw new InvalidBulkRequestError();
  }
  return { primary, others };
}

/**
 * Applies a diff to the destination account. Never throws for a single
 * failed item or call; failures land in the returned report.
 */
export class Reconciler {
  constructor(
    private logger: Logger,
    private metrics: MetricsCollector
  ) {}

  async reconcile(session: AccountSession, result: AnyDiffResult): Promise<ReconcileReport> {
    const tally = ReportTally.forDiff(result);

    switch (result.category) {
      case 'subscriptions':
        await this.reconcileSubscriptions(session, result, tally);
        break;
      case 'friends':
        await this.reconcileFriends(session, result, tally);
        break;
      case 'savedItems':
        await this.reconcileSaved(session, result, tally);
        break;
    }

    const report = tally.build('completed');
    this.logger.info('Category reconciled', {
      account: session.account,
      category: report.category,
      applied: report.applied,
      skippedDuplicate: report.skippedDuplicate,
      failed: report.failed,
    });
    return report;
  }

  /**
   * One bulk call per direction. The listing may lag behind a bulk subscribe,
   * so the call's own result is taken as final.
   */
  private async reconcileSubscriptions(
    session: AccountSession,
    result: DiffResult<'subscriptions'>,
    tally: ReportTally
  ): Promise<void> {
    if (result.toRemove.length > 0) {
      const { primary, others } = bulkRequest(result.toRemove);
      await this.applyBulk(session, 'subscriptions', 'remove', result.toRemove, tally, () =>
        session.unsubscribeBulk(primary, others)
      );
    }

    if (result.toAdd.length > 0) {
      const { primary, others } = bulkRequest(result.toAdd);
      await this.applyBulk(session, 'subscriptions', 'add', result.toAdd, tally, () =>
        session.subscribeBulk(primary, others)
      );
    }
  }

  private async reconcileFriends(
    session: AccountSession,
    result: DiffResult<'friends'>,
    tally: ReportTally
  ): Promise<void> {
    for (const handle of result.toRemove) {
      await this.applyOne(session, 'friends', 'remove', handle, tally, () => session.unfriend(handle));
    }
    for (const handle of result.toAdd) {
      await this.applyOne(session, 'friends', 'add', handle, tally, () => session.friend(handle));
    }
  }

  private async reconcileSaved(
    session: AccountSession,
    result: DiffResult<'savedItems'>,
    tally: ReportTally
  ): Promise<void> {
    for (const item of result.toRemove) {
      await this.applySaved(session, 'remove', item, tally);
    }
    for (const item of result.toAdd) {
      await this.applySaved(session, 'add', item, tally);
    }
  }

  private async applySaved(
    session: AccountSession,
    action: ReconcileAction,
    item: SavedItem,
    tally: ReportTally
  ): Promise<void> {
    const { id, kind } = item;

    if (!isSavedItemKind(kind)) {
      const error = new UnsupportedItemKindError(kind, { account: session.account, id });
      this.logger.warn('Skipping saved item of unsupported kind', {
        account: session.account,
        id,
        kind,
      });
      tally.recordFailure(id, action, error.code, error.message);
      this.count('savedItems', action, 'failed');
      return;
    }

    await this.applyOne(session, 'savedItems', action, id, tally, () =>
      action === 'add' ? session.save(id, kind) : session.unsave(id, kind)
    );
  }

  private async applyOne(
    session: AccountSession,
    category: Category,
    action: ReconcileAction,
    item: string,
    tally: ReportTally,
    call: () => Promise<MutationOutcome>
  ): Promise<void> {
    try {
      const outcome = await call();
      if (outcome === 'unchanged') {
        this.logger.debug('Item already in desired state', { account: session.account, category, action, item });
        tally.recordSkipped();
      } else {
        tally.recordApplied();
      }
      this.count(category, action, outcome);
    } catch (error: unknown) {
      const failure = toRemoteUnavailable(error, { account: session.account, category, item });
      this.logger.warn('Item mutation failed', {
        account: session.account,
        category,
        action,
        item,
        error: failure.message,
      });
      tally.recordFailure(item, action, failure.code, failure.message);
      this.count(category, action, 'failed');
    }
  }

  private async applyBulk(
    session: AccountSession,
    category: Category,
    action: ReconcileAction,
    items: readonly string[],
    tally: ReportTally,
    call: () => Promise<MutationOutcome>
  ): Promise<void> {
    try {
      const outcome = await call();
      if (outcome === 'unchanged') {
        tally.recordSkipped(items.length);
      } else {
        tally.recordApplied(items.length);
      }
      this.count(category, action, outcome, items.length);
    } catch (error: unknown) {
      const failure = toRemoteUnavailable(error, { account: session.account, category });
      this.logger.warn('Bulk mutation failed', {
        account: session.account,
        category,
        action,
        itemCount: items.length,
        error: failure.message,
      });
      for (const item of items) {
        tally.recordFailure(item, action, failure.code, failure.message);
      }
      this.count(category, action, 'failed', items.length);
    }
  }

  private count(category: Category, action: ReconcileAction, outcome: string, value: number = 1): void {
    this.metrics.incrementCounter('sync_items_total', { category, action, outcome }, value);
  }
}
