// src/core/sync/SyncOrchestrator.ts

import type {
  AccountSession,
  AnyDiffResult,
  Category,
  DiffResult,
  PreferenceCopyOutcome,
  ReconcileReport,
  RunOptions,
  RunResult,
  SyncTarget,
} from './types';
import { ALL_TARGETS, CATEGORY_ORDER } from './types';
import type { Logger } from '../../observability/Logger';
import type { MetricsCollector } from '../../observability/MetricsCollector';
import { SnapshotFetcher } from './SnapshotFetcher';
import { Reconciler } from './Reconciler';
import { PreferenceCopier } from './PreferenceCopier';
import { diff, isEmptyDiff } from './diff';
import { ReportTally, abortedReport, plannedReport } from './report';
import { generateCorrelationId, withCategorySpan } from '../../observability/tracing';
import { SyncError, toRemoteUnavailable } from '../../utils/errors';

type FetchOutcome =
  | { ok: true; result: AnyDiffResult }
  | { ok: false; category: Category; code: string; message: string };

export class SyncOrchestrator {
  private fetcher: SnapshotFetcher;
  private reconciler: Reconciler;
  private copier: PreferenceCopier;

  constructor(
    private logger: Logger,
    private metrics: MetricsCollector
  ) {
    this.fetcher = new SnapshotFetcher(logger, metrics);
    this.reconciler = new Reconciler(logger, metrics);
    this.copier = new PreferenceCopier(logger);
  }

  /**
   * Converge `destination` to `source` for every selected target.
   *
   * Snapshot pairs for all categories are fetched concurrently; mutations are
   * then issued one category at a time in a fixed order (subscriptions,
   * friends, saved items, preferences). Never rejects: every failure is
   * described in the returned result.
   */
  async run(
    source: AccountSession,
    destination: AccountSession,
    options: RunOptions = {}
  ): Promise<RunResult> {
    const runId = generateCorrelationId();
    const startedAt = new Date();
    const dryRun = options.dryRun ?? false;
    const targets = new Set<SyncTarget>(options.targets ?? ALL_TARGETS);
    const categories = CATEGORY_ORDER.filter((category) => targets.has(category));

    this.logger.info('Sync run started', {
      runId,
      source: source.account,
      destination: destination.account,
      targets: [...targets],
      dryRun,
    });

    const fetched = await Promise.all(
      categories.map((category) => this.fetchDiff(source, destination, category))
    );

    const reportList: ReconcileReport[] = [];
    for (const outcome of fetched) {
      reportList.push(await this.reconcileCategory(runId, destination, outcome, dryRun));
    }
    const reports: Partial<Record<Category, ReconcileReport>> = Object.fromEntries(
      reportList.map((report) => [report.category, report])
    );

    let preferences: PreferenceCopyOutcome | undefined;
    if (targets.has('preferences')) {
      preferences = await this.copyPreferences(runId, source, destination, dryRun);
    }

    const success =
      reportList.every((report) => report.status !== 'aborted' && report.failed === 0) &&
      preferences?.status !== 'failed';

    const result: RunResult = Object.freeze({
      runId,
      source: source.account,
      destination: destination.account,
      startedAt,
      finishedAt: new Date(),
      dryRun,
      categories: Object.freeze(reports),
      preferences,
      success,
    });

    this.metrics.incrementCounter('sync_runs_total', { status: success ? 'success' : 'partial' });
    this.logger.info('Sync run finished', {
      runId,
      success,
      durationMs: result.finishedAt.getTime() - startedAt.getTime(),
      categories: Object.fromEntries(
        reportList.map((report) => [
          report.category,
          { status: report.status, applied: report.applied, failed: report.failed },
        ])
      ),
      preferences: preferences?.status,
    });

    return result;
  }

  private async fetchDiff(
    source: AccountSession,
    destination: AccountSession,
    category: Category
  ): Promise<FetchOutcome> {
    try {
      switch (category) {
        case 'subscriptions':
          return { ok: true, result: await this.diffCategory(source, destination, 'subscriptions') };
        case 'friends':
          return { ok: true, result: await this.diffCategory(source, destination, 'friends') };
        case 'savedItems':
          return { ok: true, result: await this.diffCategory(source, destination, 'savedItems') };
      }
    } catch (error: unknown) {
      const failure = error instanceof SyncError ? error : toRemoteUnavailable(error, { category });
      return { ok: false, category, code: failure.code, message: failure.message };
    }
  }

  private async diffCategory<C extends Category>(
    source: AccountSession,
    destination: AccountSession,
    category: C
  ): Promise<DiffResult<C>> {
    const [sourceSnapshot, destinationSnapshot] = await Promise.all([
      this.fetcher.fetch(source, category),
      this.fetcher.fetch(destination, category),
    ]);
    return diff(sourceSnapshot, destinationSnapshot);
  }

  private async reconcileCategory(
    runId: string,
    destination: AccountSession,
    outcome: FetchOutcome,
    dryRun: boolean
  ): Promise<ReconcileReport> {
    if (!outcome.ok) {
      this.logger.error('Category aborted, snapshot unavailable', {
        runId,
        category: outcome.category,
        code: outcome.code,
        error: outcome.message,
      });
      return abortedReport(outcome.category, outcome.code, outcome.message);
    }

    const { result } = outcome;
    return withCategorySpan(result.category, runId, async () => {
      this.logger.info('Category diffed', {
        runId,
        category: result.category,
        toAdd: result.toAdd.length,
        toRemove: result.toRemove.length,
      });

      if (dryRun) {
        return plannedReport(result);
      }
      if (isEmptyDiff(result)) {
        return ReportTally.forDiff(result).build('completed');
      }

      try {
        return await this.reconciler.reconcile(destination, result);
      } catch (error: unknown) {
        const failure = error instanceof SyncError ? error : toRemoteUnavailable(error);
        this.logger.error('Category reconcile failed', {
          runId,
          category: result.category,
          error: failure.message,
        });
        return abortedReport(result.category, failure.code, failure.message);
      }
    });
  }

  private async copyPreferences(
    runId: string,
    source: AccountSession,
    destination: AccountSession,
    dryRun: boolean
  ): Promise<PreferenceCopyOutcome> {
    return withCategorySpan('preferences', runId, async () => {
      try {
        return await this.copier.copy(source, destination, { dryRun });
      } catch (error: unknown) {
        const failure = error instanceof SyncError ? error : toRemoteUnavailable(error);
        this.logger.error('Preference copy failed', { runId, code: failure.code, error: failure.message });
        return Object.freeze({ status: 'failed' as const, code: failure.code, message: failure.message });
      }
    });
  }
}
