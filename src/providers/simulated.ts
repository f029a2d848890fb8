/**
 * Deterministic offline source.
 *
 * Produces a 15-tier distribution seeded by (security, date), so repeated runs
 * write byte-identical records and exercise the store's idempotence.
 */

import { NoDataError } from '@/core/errors';
import { sha256 } from '@/utils/hash';
import type { SnapshotSource } from '@/providers/types';
import type { Bracket, OwnershipSnapshot, SecurityId, SnapshotDate } from '@/types/snapshot';
import { DISTRIBUTION_BRACKET_LABELS } from './brackets';

export interface SimulatedSourceOptions {
  /** Dates treated as "no disclosure published". */
  noDataDates?: readonly SnapshotDate[];
  fetchedAt?: string;
}

function seededRandom(seedText: string): () => number {
  let state = Number.parseInt(sha256(seedText).slice(0, 8), 16) >>> 0;
  return () => {
    state = (state + 0x6d2b79f5) >>> 0;
    let t = state;
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
}

export function simulateDistribution(security: SecurityId, date: SnapshotDate, fetchedAt: string): OwnershipSnapshot {
  const random = seededRandom(`${security}@${date}`);
  const baseHolders = 100_000 + Math.floor(50_000 * random());

  const brackets: Bracket[] = DISTRIBUTION_BRACKET_LABELS.map((label, index) => {
    // Retail tiers hold most accounts; the top tier holds most shares.
    const holderWeight = 0.45 / (index + 1) ** 1.6;
    const holderCount = Math.max(1, Math.floor(baseHolders * holderWeight * (0.9 + 0.2 * random())));
    const averageShares = 500 * 2 ** index * (0.8 + 0.4 * random());
    return {
      bracketId: index + 1,
      label,
      holderCount,
      shareCount: Math.floor(holderCount * averageShares),
    };
  });

  const totalShares = brackets.reduce((sum, b) => sum + b.shareCount, 0);
  const totalHolders = brackets.reduce((sum, b) => sum + b.holderCount, 0);

  return {
    security,
    date,
    totalShares,
    totalHolders,
    brackets,
    source: 'simulated',
    fetchedAt,
  };
}

export class SimulatedSource implements SnapshotSource {
  readonly name = 'simulated';
  private readonly noDataDates: Set<SnapshotDate>;
  private readonly fetchedAt: string | undefined;

  constructor(options: SimulatedSourceOptions = {}) {
    this.noDataDates = new Set(options.noDataDates ?? []);
    this.fetchedAt = options.fetchedAt;
  }

  async fetchSnapshot(security: SecurityId, date: SnapshotDate): Promise<OwnershipSnapshot> {
    if (this.noDataDates.has(date)) {
      throw new NoDataError(`No simulated distribution for ${date}`);
    }
    // A fixed timestamp keeps the serialised record stable across runs.
    return simulateDistribution(security, date, this.fetchedAt ?? `${date}T00:00:00.000Z`);
  }
}
