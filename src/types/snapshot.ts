/**
 * Shareholding distribution snapshot types.
 *
 * A snapshot is one security's published distribution table for one date:
 * the holder and share counts per ownership-size tier ("bracket").
 */

/** Upper-cased, trimmed security code such as `2330`. */
export type SecurityId = string;

/** Calendar date formatted `YYYY-MM-DD`; lexicographic order is chronological. */
export type SnapshotDate = string;

export interface Bracket {
  /** 1-based tier ordinal; a snapshot's brackets run 1..N without gaps. */
  bracketId: number;
  label: string;
  holderCount: number;
  shareCount: number;
}

export interface OwnershipSnapshot {
  security: SecurityId;
  date: SnapshotDate;
  totalShares: number;
  totalHolders?: number;
  brackets: Bracket[];
  /** Source name, e.g. `tdcc` or `simulated`. */
  source: string;
  /** ISO timestamp of the fetch that produced the record. */
  fetchedAt: string;
}

export interface StoreKey {
  security: SecurityId;
  date: SnapshotDate;
}
