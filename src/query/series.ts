/**
 * Read-side helpers for reports: load a window of snapshots and pivot them
 * into date x bracket tables.
 */

import { DateResolver } from '@/resolve/date_resolver';
import { resolveWindow, type ResolvedWindow } from '@/resolve/window';
import type { SnapshotStore } from '@/store/types';
import type { OwnershipSnapshot, SecurityId, SnapshotDate } from '@/types/snapshot';
import { createChildLogger } from '@/utils/logger';

const logger = createChildLogger('series');

export interface SnapshotSeries {
  window: ResolvedWindow;
  snapshots: OwnershipSnapshot[];
  /** Window warnings plus one entry per unreadable record. */
  warnings: string[];
}

export async function loadSnapshotSeries(
  store: SnapshotStore,
  security: SecurityId,
  start: SnapshotDate,
  end: SnapshotDate,
  resolver: DateResolver = new DateResolver(store)
): Promise<SnapshotSeries> {
  const window = await resolveWindow(resolver, security, start, end);
  const warnings = [...window.warnings];
  const snapshots: OwnershipSnapshot[] = [];

  for (const date of window.dates) {
    const result = await store.read(window.security, date);
    if (result.status === 'ok') {
      snapshots.push(result.snapshot);
    } else if (result.status === 'corrupt') {
      logger.warn({ security: window.security, date, errors: result.errors }, 'Skipping corrupt snapshot');
      warnings.push(`Skipped corrupt record ${window.security}@${date}`);
    } else {
      warnings.push(`Record ${window.security}@${date} disappeared while loading`);
    }
  }

  return { window, snapshots, warnings };
}

export interface TableRow {
  date: SnapshotDate;
  /** One value per column; null where the snapshot lacks that bracket. */
  values: Array<number | null>;
}

export interface DistributionTables {
  columns: string[];
  holders: TableRow[];
  shares: TableRow[];
  /** Share of `totalShares` per bracket, in percent, 2 decimals. */
  percent: TableRow[];
}

function round2(value: number): number {
  return Math.round(value * 100) / 100;
}

export function buildDistributionTables(snapshots: readonly OwnershipSnapshot[]): DistributionTables {
  if (snapshots.length === 0) {
    throw new Error('No snapshots to build tables from');
  }

  const sorted = [...snapshots].sort((a, b) => a.date.localeCompare(b.date));
  const columns = sorted[0].brackets.map((bracket) => bracket.label);

  const holders: TableRow[] = [];
  const shares: TableRow[] = [];
  const percent: TableRow[] = [];

  for (const snapshot of sorted) {
    const byId = new Map(snapshot.brackets.map((bracket) => [bracket.bracketId, bracket]));
    const pick = (fn: (id: number) => number | null): TableRow => ({
      date: snapshot.date,
      values: columns.map((_, index) => fn(index + 1)),
    });

    holders.push(pick((id) => byId.get(id)?.holderCount ?? null));
    shares.push(pick((id) => byId.get(id)?.shareCount ?? null));
    percent.push(
      pick((id) => {
        const bracket = byId.get(id);
        return bracket ? round2((bracket.shareCount / snapshot.totalShares) * 100) : null;
      })
    );
  }

  return { columns, holders, shares, percent };
}
