/**
 * Rate-limited, retrying fetcher.
 *
 * Each job walks pending -> in_flight -> one of
 *   success | no_data | permanent_failure | transient_failure
 * and transient_failure loops back to pending until `maxAttempts` attempts
 * have been made.
 */

import type { FetchConfig } from '@/core/config';
import {
  CancelledError,
  DeadlineExceededError,
  IngestionError,
  NoDataError,
  PermanentFetchError,
  TransientFetchError,
  abortError,
} from '@/core/errors';
import { sleep as abortableSleep } from '@/core/time';
import { createChildLogger } from '@/utils/logger';
import type { SnapshotSource } from '@/providers/types';
import type { OwnershipSnapshot, SecurityId, SnapshotDate } from '@/types/snapshot';
import { backoffDelay } from './backoff';
import { classifyFetchError } from './classify';
import type { RateLimiter } from './rate_limiter';

const logger = createChildLogger('fetcher');

export interface FetchJob {
  security: SecurityId;
  date: SnapshotDate;
}

export type JobState =
  | 'pending'
  | 'in_flight'
  | 'success'
  | 'no_data'
  | 'permanent_failure'
  | 'transient_failure';

export type FetchFailureReason = 'permanent' | 'transient_exhausted' | 'deadline_exceeded' | 'cancelled';

export type FetchOutcome =
  | { status: 'success'; snapshot: OwnershipSnapshot; attempts: number }
  | { status: 'no_data'; message: string; attempts: number }
  | { status: 'failed'; reason: FetchFailureReason; message: string; attempts: number; error: IngestionError };

export type RetryConfig = Pick<FetchConfig, 'maxAttempts' | 'backoffBaseMs' | 'backoffJitterMs'>;

export interface FetcherOptions {
  random?: () => number;
  sleep?: (ms: number, signal?: AbortSignal) => Promise<void>;
  onStateChange?: (job: FetchJob, state: JobState, attempt: number) => void;
}

function raceAbort<T>(promise: Promise<T>, signal?: AbortSignal): Promise<T> {
  if (!signal) return promise;
  if (signal.aborted) return Promise.reject(abortError(signal));

  return new Promise<T>((resolve, reject) => {
    const onAbort = () => reject(abortError(signal));
    signal.addEventListener('abort', onAbort, { once: true });
    promise.then(
      (value) => {
        signal.removeEventListener('abort', onAbort);
        resolve(value);
      },
      (error: unknown) => {
        signal.removeEventListener('abort', onAbort);
        reject(error);
      }
    );
  });
}

function terminalFailure(error: IngestionError, attempts: number): FetchOutcome {
  let reason: FetchFailureReason;
  if (error instanceof DeadlineExceededError) {
    reason = 'deadline_exceeded';
  } else if (error instanceof CancelledError) {
    reason = 'cancelled';
  } else if (error instanceof TransientFetchError) {
    reason = 'transient_exhausted';
  } else {
    reason = 'permanent';
  }
  return { status: 'failed', reason, message: error.message, attempts, error };
}

export class RateLimitedFetcher {
  private readonly config: RetryConfig;
  private readonly random: () => number;
  private readonly sleep: (ms: number, signal?: AbortSignal) => Promise<void>;
  private readonly onStateChange?: FetcherOptions['onStateChange'];
  private attemptCount = 0;

  constructor(
    private readonly source: SnapshotSource,
    private readonly limiter: RateLimiter,
    config: RetryConfig,
    options: FetcherOptions = {}
  ) {
    this.config = { ...config, maxAttempts: Math.max(1, config.maxAttempts) };
    this.random = options.random ?? Math.random;
    this.sleep = options.sleep ?? abortableSleep;
    this.onStateChange = options.onStateChange;
  }

  get maxConcurrency(): number {
    return this.limiter.maxConcurrency;
  }

  get sourceName(): string {
    return this.source.name;
  }

  /** Source calls made so far, retries included. */
  getAttemptCount(): number {
    return this.attemptCount;
  }

  private transition(job: FetchJob, state: JobState, attempt: number): void {
    logger.debug({ security: job.security, date: job.date, state, attempt }, 'Fetch job state');
    this.onStateChange?.(job, state, attempt);
  }

  get listsPublishedDates(): boolean {
    return this.source.listPublishedDates !== undefined;
  }

  /** The source's published record dates, fetched under the rate limiter. */
  async listPublishedDates(signal?: AbortSignal): Promise<SnapshotDate[]> {
    if (!this.source.listPublishedDates) {
      throw new PermanentFetchError(`Source ${this.source.name} does not list published dates`);
    }
    const list = this.source.listPublishedDates.bind(this.source);
    try {
      return await this.limiter.run(() => raceAbort(list(signal), signal), signal);
    } catch (error) {
      throw classifyFetchError(error, signal);
    }
  }

  private async attempt(job: FetchJob, signal?: AbortSignal): Promise<OwnershipSnapshot> {
    if (this.source.isKnownUnpublished?.(job.date)) {
      throw new NoDataError(`${job.date} is not a published record date`);
    }
    await this.limiter.acquire(signal);
    try {
      this.attemptCount++;
      return await raceAbort(this.source.fetchSnapshot(job.security, job.date, signal), signal);
    } finally {
      this.limiter.release();
    }
  }

  /** Runs one job to a terminal outcome; never rejects. */
  async execute(job: FetchJob, signal?: AbortSignal): Promise<FetchOutcome> {
    let attempt = 0;
    this.transition(job, 'pending', attempt);

    while (true) {
      if (signal?.aborted) {
        return terminalFailure(abortError(signal), attempt);
      }

      attempt++;
      this.transition(job, 'in_flight', attempt);

      let error: IngestionError;
      try {
        const snapshot = await this.attempt(job, signal);
        this.transition(job, 'success', attempt);
        return { status: 'success', snapshot, attempts: attempt };
      } catch (caught) {
        error = classifyFetchError(caught, signal);
      }

      if (error instanceof NoDataError) {
        this.transition(job, 'no_data', attempt);
        return { status: 'no_data', message: error.message, attempts: attempt };
      }
      if (!(error instanceof TransientFetchError)) {
        if (!(error instanceof DeadlineExceededError || error instanceof CancelledError)) {
          this.transition(job, 'permanent_failure', attempt);
        }
        return terminalFailure(error, attempt);
      }

      this.transition(job, 'transient_failure', attempt);
      if (attempt >= this.config.maxAttempts) {
        logger.warn(
          { security: job.security, date: job.date, attempts: attempt, error: error.message },
          'Transient failures exhausted retries'
        );
        return terminalFailure(error, attempt);
      }

      const delay = backoffDelay(attempt, this.config, this.random);
      logger.info(
        { security: job.security, date: job.date, attempt, delayMs: Math.round(delay), error: error.message },
        'Transient fetch failure, backing off'
      );
      this.transition(job, 'pending', attempt);
      try {
        await this.sleep(delay, signal);
      } catch (caught) {
        return terminalFailure(classifyFetchError(caught, signal), attempt);
      }
    }
  }

  /** Throwing form of `execute`. */
  async fetch(security: SecurityId, date: SnapshotDate, signal?: AbortSignal): Promise<OwnershipSnapshot> {
    const outcome = await this.execute({ security, date }, signal);
    switch (outcome.status) {
      case 'success':
        return outcome.snapshot;
      case 'no_data':
        throw new NoDataError(outcome.message);
      case 'failed':
        throw outcome.error;
    }
  }
}
