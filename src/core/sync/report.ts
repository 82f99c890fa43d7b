// src/core/sync/report.ts

import type {
  Category,
  DiffResult,
  ItemFailure,
  ReconcileAction,
  ReconcileReport,
  ReconcileStatus,
} from './types';

/**
 * Mutable counters for one category while it is being reconciled.
 * `build()` hands out a frozen ReconcileReport.
 */
export class ReportTally {
  private applied = 0;
  private skippedDuplicate = 0;
  private failures: ItemFailure[] = [];

  constructor(
    private category: Category,
    private planned: { toAdd: number; toRemove: number }
  ) {}

  static forDiff(result: DiffResult<Category>): ReportTally {
    return new ReportTally(result.category, {
      toAdd: result.toAdd.length,
      toRemove: result.toRemove.length,
    });
  }

  recordApplied(count: number = 1): void {
    this.applied += count;
  }

  recordSkipped(count: number = 1): void {
    this.skippedDuplicate += count;
  }

  recordFailure(item: string, action: ReconcileAction, code: string, message: string): void {
    this.failures.push({ item, action, code, message });
  }

  build(status: ReconcileStatus): ReconcileReport {
    return freezeReport({
      category: this.category,
      status,
      planned: { ...this.planned },
      applied: this.applied,
      skippedDuplicate: this.skippedDuplicate,
      failed: this.failures.length,
      failures: this.failures.map((failure) => Object.freeze({ ...failure })),
    });
  }
}

export function plannedReport(result: DiffResult<Category>): ReconcileReport {
  return ReportTally.forDiff(result).build('planned');
}

export function abortedReport(category: Category, code: string, message: string): ReconcileReport {
  return freezeReport({
    category,
    status: 'aborted',
    planned: { toAdd: 0, toRemove: 0 },
    applied: 0,
    skippedDuplicate: 0,
    failed: 0,
    failures: [],
    error: { code, message },
  });
}

function freezeReport(report: ReconcileReport): ReconcileReport {
  Object.freeze(report.planned);
  Object.freeze(report.failures);
  if (report.error) Object.freeze(report.error);
  return Object.freeze(report);
}
