import { NoDataAvailableError } from '@/core/errors';
import { isSnapshotDate } from '@/core/time';
import { normalizeSecurityId } from '@/core/universe';
import type { SecurityId, SnapshotDate } from '@/types/snapshot';
import { findCandidate, type DateResolver } from './date_resolver';

export interface ResolvedWindow {
  security: SecurityId;
  requested: { start: SnapshotDate; end: SnapshotDate };
  start: SnapshotDate;
  end: SnapshotDate;
  /** Stored dates in [start, end], ascending. */
  dates: SnapshotDate[];
  warnings: string[];
}

/**
 * Snaps a requested window onto stored dates. The start prefers the first
 * stored date on or after it and the end the last one on or before it; when
 * either side has nothing in range it falls back outward and says so.
 */
export async function resolveWindow(
  resolver: DateResolver,
  security: SecurityId,
  start: SnapshotDate,
  end: SnapshotDate
): Promise<ResolvedWindow> {
  if (!isSnapshotDate(start) || !isSnapshotDate(end)) {
    throw new Error(`Invalid window ${start}..${end}; expected YYYY-MM-DD dates`);
  }
  const id = normalizeSecurityId(security);
  const all = await resolver.dates(id);
  if (all.length === 0) {
    throw new NoDataAvailableError(id);
  }

  const warnings: string[] = [];

  let resolvedStart = findCandidate(all, start, 'on-or-after');
  if (resolvedStart === null) {
    resolvedStart = all[all.length - 1];
    warnings.push(`No snapshot on or after ${start}; start falls back to ${resolvedStart}`);
  }

  let resolvedEnd = findCandidate(all, end, 'on-or-before');
  if (resolvedEnd === null) {
    resolvedEnd = all[0];
    warnings.push(`No snapshot on or before ${end}; end moves forward to ${resolvedEnd}`);
  }

  if (resolvedStart > resolvedEnd) {
    warnings.push(`No snapshot inside ${start}..${end}; using ${resolvedEnd}..${resolvedStart}`);
    [resolvedStart, resolvedEnd] = [resolvedEnd, resolvedStart];
  }

  const from = resolvedStart;
  const to = resolvedEnd;
  return {
    security: id,
    requested: { start, end },
    start: from,
    end: to,
    dates: all.filter((date) => date >= from && date <= to),
    warnings,
  };
}
