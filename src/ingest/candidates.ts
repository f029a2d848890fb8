import { enumerateDays, enumerateWeekday, isSnapshotDate } from '@/core/time';
import type { SnapshotStore } from '@/store/types';
import type { SecurityId, SnapshotDate } from '@/types/snapshot';

/**
 * - weekly:    every `candidateWeekday` in the window
 * - daily:     every calendar day in the window
 * - published: the source's own published record dates inside the window
 */
export type Cadence = 'daily' | 'weekly' | 'published';

export interface DateWindow {
  start: SnapshotDate;
  end: SnapshotDate;
}

export function assertWindow(window: DateWindow): DateWindow {
  if (!isSnapshotDate(window.start) || !isSnapshotDate(window.end)) {
    throw new Error(`Invalid window ${window.start}..${window.end}; expected YYYY-MM-DD dates`);
  }
  if (window.start > window.end) {
    throw new Error(`Window start ${window.start} is after end ${window.end}`);
  }
  return window;
}

/**
 * Candidate dates in `[start, end]`, ascending. Weekly candidates fall on
 * `weekday` (0 = Sunday); the published cadence needs the source's date list.
 */
export function candidateDates(
  window: DateWindow,
  cadence: Cadence,
  weekday: number,
  published?: readonly SnapshotDate[]
): SnapshotDate[] {
  switch (cadence) {
    case 'daily':
      return enumerateDays(window.start, window.end);
    case 'weekly':
      return enumerateWeekday(window.start, window.end, weekday);
    case 'published':
      if (!published) {
        throw new Error('The published cadence needs a list of published dates');
      }
      return Array.from(
        new Set(published.filter((date) => isSnapshotDate(date) && date >= window.start && date <= window.end))
      ).sort();
  }
}

export interface GapResult {
  security: SecurityId;
  missing: SnapshotDate[];
  skippedExisting: number;
  skippedNoData: number;
}

/** Candidates not yet stored and not marked as having no disclosure. */
export async function computeGaps(
  store: SnapshotStore,
  security: SecurityId,
  candidates: readonly SnapshotDate[],
  force = false
): Promise<GapResult> {
  if (force) {
    return { security, missing: [...candidates], skippedExisting: 0, skippedNoData: 0 };
  }

  const noData = new Set(await store.listNoDataDates(security));
  const missing: SnapshotDate[] = [];
  let skippedExisting = 0;
  let skippedNoData = 0;

  for (const date of candidates) {
    if (await store.exists(security, date)) {
      skippedExisting++;
    } else if (noData.has(date)) {
      skippedNoData++;
    } else {
      missing.push(date);
    }
  }

  return { security, missing, skippedExisting, skippedNoData };
}
