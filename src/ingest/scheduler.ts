/**
 * Ingestion scheduler
 *
 * Computes the missing (security, date) pairs for a window, runs them through
 * the rate-limited fetcher on a bounded worker pool and commits every success
 * to the snapshot store. A partially failed run keeps its successful writes;
 * the report lists every date left unresolved.
 */

import type { SchedulerConfig } from '@/core/config';
import {
  CancelledError,
  CorruptRecordError,
  DeadlineExceededError,
  errorMessage,
} from '@/core/errors';
import { daysBetween, getRunId, today } from '@/core/time';
import { partitionSecurityIds } from '@/core/universe';
import type { FetchJob, RateLimitedFetcher } from '@/fetch/fetcher';
import type { SnapshotStore } from '@/store/types';
import type { OwnershipSnapshot, SecurityId } from '@/types/snapshot';
import { sha256 } from '@/utils/hash';
import { createChildLogger } from '@/utils/logger';
import { assertWindow, candidateDates, computeGaps, type Cadence, type DateWindow } from './candidates';
import { ReportAccumulator, type IngestionReport } from './report';

const logger = createChildLogger('scheduler');

export interface IngestionRunRequest {
  securities: readonly SecurityId[];
  window: DateWindow;
  cadence?: Cadence;
  /** Re-fetch dates that are already stored or marked as having no data. */
  force?: boolean;
  signal?: AbortSignal;
}

export interface SchedulerOptions {
  now?: () => Date;
}

async function runWithConcurrency<T>(
  items: T[],
  worker: (item: T) => Promise<void>,
  concurrency: number
): Promise<void> {
  let index = 0;
  const workers = Array.from({ length: concurrency }, async () => {
    while (index < items.length) {
      const current = items[index];
      index += 1;
      await worker(current);
    }
  });

  await Promise.all(workers);
}

export class IngestionScheduler {
  private readonly now: () => Date;

  constructor(
    private readonly store: SnapshotStore,
    private readonly fetcher: RateLimitedFetcher,
    private readonly config: SchedulerConfig,
    options: SchedulerOptions = {}
  ) {
    this.now = options.now ?? (() => new Date());
  }

  /** min(worker count, fetcher concurrency cap) */
  get effectiveConcurrency(): number {
    return Math.max(1, Math.min(this.config.workerCount, this.fetcher.maxConcurrency));
  }

  async run(request: IngestionRunRequest): Promise<IngestionReport> {
    const window = assertWindow(request.window);
    const cadence = request.cadence ?? 'weekly';
    const force = request.force ?? false;
    const { valid: securities, invalid } = partitionSecurityIds(request.securities);
    const startedAt = this.now();
    const runId = getRunId(
      today(startedAt),
      sha256(JSON.stringify({ securities, invalid, window, cadence, force, at: startedAt.toISOString() }))
    );

    const controller = new AbortController();
    const onExternalAbort = () => {
      const reason: unknown = request.signal?.reason;
      controller.abort(reason instanceof DeadlineExceededError ? reason : new CancelledError());
    };
    if (request.signal?.aborted) {
      onExternalAbort();
    } else {
      request.signal?.addEventListener('abort', onExternalAbort, { once: true });
    }

    let deadlineTimer: ReturnType<typeof setTimeout> | undefined;
    if (this.config.runDeadlineMs !== null) {
      const deadlineMs = this.config.runDeadlineMs;
      deadlineTimer = setTimeout(() => {
        logger.warn({ runId, deadlineMs }, 'Run deadline reached, abandoning pending jobs');
        controller.abort(new DeadlineExceededError(`Run deadline of ${deadlineMs}ms exceeded`));
      }, deadlineMs);
    }

    const report = new ReportAccumulator();

    try {
      const published = cadence === 'published' ? await this.fetcher.listPublishedDates(controller.signal) : undefined;
      const candidates = candidateDates(window, cadence, this.config.candidateWeekday, published);

      logger.info(
        {
          runId,
          securities: securities.length,
          window,
          cadence,
          candidates: candidates.length,
          concurrency: this.effectiveConcurrency,
          source: this.fetcher.sourceName,
          force,
        },
        'Starting ingestion run'
      );

      for (const id of invalid) {
        logger.warn({ runId, security: id }, 'Skipping malformed security id');
        report.addSecurity(id, 0, 0, 0);
        for (const date of candidates) {
          report.recordFailure(id, { date, reason: 'permanent', message: 'invalid security id', attempts: 0 });
        }
      }

      const jobs: FetchJob[] = [];
      for (const security of securities) {
        try {
          const gaps = await computeGaps(this.store, security, candidates, force);
          report.addSecurity(security, gaps.skippedExisting, gaps.skippedNoData, gaps.missing.length);
          jobs.push(...gaps.missing.map((date) => ({ security, date })));
        } catch (error) {
          logger.error({ runId, security, error: errorMessage(error) }, 'Could not read stored dates');
          report.addSecurity(security, 0, 0, 0);
          for (const date of candidates) {
            report.recordFailure(security, { date, reason: 'io_failure', message: errorMessage(error), attempts: 0 });
          }
        }
      }

      logger.info({ runId, jobs: jobs.length }, 'Fetch jobs enqueued');
      await runWithConcurrency(jobs, (job) => this.runJob(job, controller.signal, report), this.effectiveConcurrency);
    } finally {
      if (deadlineTimer !== undefined) clearTimeout(deadlineTimer);
      request.signal?.removeEventListener('abort', onExternalAbort);
    }

    const finishedAt = this.now();
    const abortReason: unknown = controller.signal.aborted ? controller.signal.reason : undefined;
    const result = report.build({
      runId,
      startedAt: startedAt.toISOString(),
      finishedAt: finishedAt.toISOString(),
      durationMs: finishedAt.getTime() - startedAt.getTime(),
      window,
      cadence,
      force,
      deadlineExceeded: abortReason instanceof DeadlineExceededError,
      cancelled: abortReason instanceof CancelledError,
    });

    logger.info({ runId, ...result.totals, durationMs: result.durationMs }, 'Ingestion run finished');
    return result;
  }

  private async runJob(job: FetchJob, signal: AbortSignal, report: ReportAccumulator): Promise<void> {
    const outcome = await this.fetcher.execute(job, signal);

    switch (outcome.status) {
      case 'success':
        // A fetch that completed is committed even if the run was aborted meanwhile.
        await this.commit(job, outcome.snapshot, outcome.attempts, report);
        return;
      case 'no_data':
        report.recordNoData(job.security, job.date, outcome.attempts);
        await this.markNoDataIfSettled(job);
        return;
      case 'failed':
        logger.warn(
          { security: job.security, date: job.date, reason: outcome.reason, error: outcome.message },
          'Fetch job failed'
        );
        report.recordFailure(job.security, {
          date: job.date,
          reason: outcome.reason,
          message: outcome.message,
          attempts: outcome.attempts,
        });
        return;
    }
  }

  private async commit(
    job: FetchJob,
    snapshot: OwnershipSnapshot,
    attempts: number,
    report: ReportAccumulator
  ): Promise<void> {
    if (snapshot.security !== job.security || snapshot.date !== job.date) {
      report.recordFailure(job.security, {
        date: job.date,
        reason: 'invalid_snapshot',
        message: `Source returned ${snapshot.security}@${snapshot.date} for ${job.security}@${job.date}`,
        attempts,
      });
      return;
    }

    try {
      const result = await this.store.put(snapshot);
      report.recordFetched(job.security, job.date, result.status, attempts);
    } catch (error) {
      const reason = error instanceof CorruptRecordError ? 'invalid_snapshot' : 'io_failure';
      logger.error({ security: job.security, date: job.date, reason, error: errorMessage(error) }, 'Snapshot not stored');
      report.recordFailure(job.security, { date: job.date, reason, message: errorMessage(error), attempts });
    }
  }

  /**
   * Recent dates may still be published late, so the marker is only written
   * once the date is older than the grace period.
   */
  private async markNoDataIfSettled(job: FetchJob): Promise<void> {
    const age = daysBetween(job.date, today(this.now()));
    if (age <= this.config.noDataGraceDays) {
      return;
    }
    try {
      await this.store.markNoData(job.security, job.date);
    } catch (error) {
      logger.warn({ security: job.security, date: job.date, error: errorMessage(error) }, 'Could not record no-data marker');
    }
  }
}
