/**
 * Rate limiter for the disclosure source.
 * Caps in-flight requests and spaces request starts by a minimum interval.
 */

import { sleep } from '@/core/time';
import { abortError } from '@/core/errors';
import { createChildLogger } from '@/utils/logger';

const logger = createChildLogger('rate_limiter');

export interface RateLimiterConfig {
  maxConcurrency: number;
  minIntervalMs: number;
}

interface Waiter {
  resolve: () => void;
  reject: (error: Error) => void;
  signal?: AbortSignal;
  onAbort?: () => void;
}

export class RateLimiter {
  private activeRequests = 0;
  private nextSlotAt = 0;
  private totalAcquired = 0;
  private waitQueue: Waiter[] = [];
  private readonly config: RateLimiterConfig;

  constructor(
    config: Partial<RateLimiterConfig> = {},
    private readonly now: () => number = Date.now
  ) {
    this.config = {
      maxConcurrency: Math.max(1, config.maxConcurrency ?? 2),
      minIntervalMs: Math.max(0, config.minIntervalMs ?? 1000),
    };
  }

  get maxConcurrency(): number {
    return this.config.maxConcurrency;
  }

  private waitForConcurrency(signal?: AbortSignal): Promise<void> {
    if (this.activeRequests < this.config.maxConcurrency) {
      this.activeRequests++;
      return Promise.resolve();
    }

    return new Promise<void>((resolve, reject) => {
      const waiter: Waiter = { resolve, reject, signal };
      if (signal) {
        waiter.onAbort = () => {
          this.waitQueue = this.waitQueue.filter((w) => w !== waiter);
          reject(abortError(signal));
        };
        signal.addEventListener('abort', waiter.onAbort, { once: true });
      }
      this.waitQueue.push(waiter);
    });
  }

  /**
   * Waits for a concurrency slot, then for the next start time. The start time
   * is reserved synchronously, so two callers never share one slot.
   */
  async acquire(signal?: AbortSignal): Promise<void> {
    if (signal?.aborted) {
      throw abortError(signal);
    }

    await this.waitForConcurrency(signal);

    const current = this.now();
    const startAt = Math.max(current, this.nextSlotAt);
    this.nextSlotAt = startAt + this.config.minIntervalMs;

    const waitTime = startAt - current;
    if (waitTime > 0) {
      logger.debug({ waitTime }, 'Rate limit reached, waiting');
      try {
        await sleep(waitTime, signal);
      } catch (error) {
        this.release();
        throw signal ? abortError(signal) : error;
      }
    }
    this.totalAcquired++;
  }

  release(): void {
    const next = this.waitQueue.shift();
    if (next) {
      // Hand the slot straight to the next waiter; activeRequests is unchanged.
      if (next.signal && next.onAbort) {
        next.signal.removeEventListener('abort', next.onAbort);
      }
      next.resolve();
      return;
    }
    this.activeRequests = Math.max(0, this.activeRequests - 1);
  }

  async run<T>(fn: () => Promise<T>, signal?: AbortSignal): Promise<T> {
    await this.acquire(signal);
    try {
      return await fn();
    } finally {
      this.release();
    }
  }

  getStats(): { activeRequests: number; queued: number; totalAcquired: number } {
    return {
      activeRequests: this.activeRequests,
      queued: this.waitQueue.length,
      totalAcquired: this.totalAcquired,
    };
  }
}
