/**
 * Per-run ingestion summary, returned to the caller and never persisted.
 */

import type { FetchFailureReason } from '@/fetch/fetcher';
import type { SecurityId, SnapshotDate } from '@/types/snapshot';
import type { Cadence, DateWindow } from './candidates';

export type JobFailureReason = FetchFailureReason | 'io_failure' | 'invalid_snapshot';

export interface JobFailure {
  date: SnapshotDate;
  reason: JobFailureReason;
  message: string;
  attempts: number;
}

export interface SecurityReport {
  fetched: SnapshotDate[];
  /** Fetched, but the stored record already had identical content. */
  unchanged: SnapshotDate[];
  noData: SnapshotDate[];
  failed: JobFailure[];
  skippedExisting: number;
  skippedNoData: number;
}

export interface ReportTotals {
  securities: number;
  enqueued: number;
  fetched: number;
  unchanged: number;
  noData: number;
  failed: number;
  skippedExisting: number;
  skippedNoData: number;
  attempts: number;
}

export interface IngestionReport {
  runId: string;
  startedAt: string;
  finishedAt: string;
  durationMs: number;
  window: DateWindow;
  cadence: Cadence;
  force: boolean;
  deadlineExceeded: boolean;
  cancelled: boolean;
  securities: Record<SecurityId, SecurityReport>;
  totals: ReportTotals;
}

function emptySecurityReport(): SecurityReport {
  return { fetched: [], unchanged: [], noData: [], failed: [], skippedExisting: 0, skippedNoData: 0 };
}

/** Mutated synchronously between awaits, so workers can share one instance. */
export class ReportAccumulator {
  private readonly bySecurity = new Map<SecurityId, SecurityReport>();
  private enqueued = 0;
  private attempts = 0;

  private entry(security: SecurityId): SecurityReport {
    let report = this.bySecurity.get(security);
    if (!report) {
      report = emptySecurityReport();
      this.bySecurity.set(security, report);
    }
    return report;
  }

  addSecurity(security: SecurityId, skippedExisting: number, skippedNoData: number, enqueued: number): void {
    const report = this.entry(security);
    report.skippedExisting += skippedExisting;
    report.skippedNoData += skippedNoData;
    this.enqueued += enqueued;
  }

  recordFetched(security: SecurityId, date: SnapshotDate, status: 'written' | 'unchanged', attempts: number): void {
    const report = this.entry(security);
    report.fetched.push(date);
    if (status === 'unchanged') {
      report.unchanged.push(date);
    }
    this.attempts += attempts;
  }

  recordNoData(security: SecurityId, date: SnapshotDate, attempts: number): void {
    this.entry(security).noData.push(date);
    this.attempts += attempts;
  }

  recordFailure(security: SecurityId, failure: JobFailure): void {
    this.entry(security).failed.push(failure);
    this.attempts += failure.attempts;
  }

  build(meta: Omit<IngestionReport, 'securities' | 'totals'>): IngestionReport {
    const securities: Record<SecurityId, SecurityReport> = {};
    const totals: ReportTotals = {
      securities: this.bySecurity.size,
      enqueued: this.enqueued,
      fetched: 0,
      unchanged: 0,
      noData: 0,
      failed: 0,
      skippedExisting: 0,
      skippedNoData: 0,
      attempts: this.attempts,
    };

    for (const security of Array.from(this.bySecurity.keys()).sort()) {
      const report = this.entry(security);
      const sorted: SecurityReport = {
        fetched: [...report.fetched].sort(),
        unchanged: [...report.unchanged].sort(),
        noData: [...report.noData].sort(),
        failed: [...report.failed].sort((a, b) => a.date.localeCompare(b.date)),
        skippedExisting: report.skippedExisting,
        skippedNoData: report.skippedNoData,
      };
      securities[security] = sorted;
      totals.fetched += sorted.fetched.length;
      totals.unchanged += sorted.unchanged.length;
      totals.noData += sorted.noData.length;
      totals.failed += sorted.failed.length;
      totals.skippedExisting += sorted.skippedExisting;
      totals.skippedNoData += sorted.skippedNoData;
    }

    return { ...meta, securities, totals };
  }
}
