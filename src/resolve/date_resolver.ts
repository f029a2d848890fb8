/**
 * Maps arbitrary target dates onto dates actually present in the store.
 *
 * Each security's date listing is read once per resolver and binary-searched,
 * so resolving many targets costs one `listDates` call.
 */

import { NoDataAvailableError, OutOfToleranceError } from '@/core/errors';
import { daysBetween, isSnapshotDate } from '@/core/time';
import { normalizeSecurityId } from '@/core/universe';
import type { SnapshotStore } from '@/store/types';
import type { SecurityId, SnapshotDate } from '@/types/snapshot';

export type ResolveDirection = 'nearest' | 'on-or-before' | 'on-or-after';

export interface ResolveOptions {
  /** Largest accepted calendar-day distance between target and result. */
  maxToleranceDays?: number;
}

/** First index whose date is >= target (dates.length when none). */
export function lowerBound(dates: readonly SnapshotDate[], target: SnapshotDate): number {
  let lo = 0;
  let hi = dates.length;
  while (lo < hi) {
    const mid = (lo + hi) >>> 1;
    if (dates[mid] < target) {
      lo = mid + 1;
    } else {
      hi = mid;
    }
  }
  return lo;
}

/** Pure lookup over an ascending date list; null when nothing satisfies the direction. */
export function findCandidate(
  dates: readonly SnapshotDate[],
  target: SnapshotDate,
  direction: ResolveDirection
): SnapshotDate | null {
  const index = lowerBound(dates, target);
  const after = index < dates.length ? dates[index] : null;
  const before = index > 0 ? dates[index - 1] : null;

  switch (direction) {
    case 'on-or-after':
      return after;
    case 'on-or-before':
      return after === target ? after : before;
    case 'nearest': {
      if (after === null) return before;
      if (before === null) return after;
      const afterDistance = daysBetween(target, after);
      const beforeDistance = daysBetween(before, target);
      // Equal distance resolves to the earlier date.
      return beforeDistance <= afterDistance ? before : after;
    }
  }
}

export class DateResolver {
  private readonly index = new Map<SecurityId, Promise<SnapshotDate[]>>();

  constructor(private readonly store: SnapshotStore) {}

  /** Ascending stored dates for `security`, read once and cached. */
  dates(security: SecurityId): Promise<SnapshotDate[]> {
    const id = normalizeSecurityId(security);
    let listing = this.index.get(id);
    if (!listing) {
      listing = this.store.listDates(id);
      this.index.set(id, listing);
      listing.catch(() => {
        if (this.index.get(id) === listing) this.index.delete(id);
      });
    }
    return listing;
  }

  invalidate(security?: SecurityId): void {
    if (security === undefined) {
      this.index.clear();
    } else {
      this.index.delete(normalizeSecurityId(security));
    }
  }

  async resolve(
    security: SecurityId,
    target: SnapshotDate,
    direction: ResolveDirection = 'nearest',
    options: ResolveOptions = {}
  ): Promise<SnapshotDate> {
    const id = normalizeSecurityId(security);
    return resolveAgainst(id, await this.dates(id), target, direction, options);
  }

  /** Resolves a batch of targets against a single listing; results keep input order. */
  async resolveMany(
    security: SecurityId,
    targets: readonly SnapshotDate[],
    direction: ResolveDirection = 'nearest',
    options: ResolveOptions = {}
  ): Promise<SnapshotDate[]> {
    const id = normalizeSecurityId(security);
    const dates = await this.dates(id);
    return targets.map((target) => resolveAgainst(id, dates, target, direction, options));
  }
}

function resolveAgainst(
  security: SecurityId,
  dates: readonly SnapshotDate[],
  target: SnapshotDate,
  direction: ResolveDirection,
  options: ResolveOptions
): SnapshotDate {
  if (!isSnapshotDate(target)) {
    throw new Error(`Invalid target date: ${target}`);
  }
  if (dates.length === 0) {
    throw new NoDataAvailableError(security);
  }

  const candidate = findCandidate(dates, target, direction);
  if (candidate === null) {
    throw new NoDataAvailableError(security, `no snapshot ${direction} ${target}`);
  }

  const distance = Math.abs(daysBetween(target, candidate));
  if (options.maxToleranceDays !== undefined && distance > options.maxToleranceDays) {
    throw new OutOfToleranceError(security, target, candidate, distance, options.maxToleranceDays);
  }
  return candidate;
}
