/**
 * Snapshot store contract.
 *
 * One record per (security, date). The concrete backing (JSON files per date,
 * SQLite rows) is an implementation choice; callers only see this interface.
 */

import type { OwnershipSnapshot, SecurityId, SnapshotDate, StoreKey } from '@/types/snapshot';

export interface PutResult {
  /** `unchanged` when the stored bytes already matched the incoming record. */
  status: 'written' | 'unchanged';
  key: StoreKey;
  contentHash: string;
}

export type StoreReadResult =
  | { status: 'ok'; snapshot: OwnershipSnapshot }
  | { status: 'not_found' }
  | { status: 'corrupt'; errors: string[] };

export interface SnapshotStore {
  readonly kind: string;

  /** Validates and writes (or overwrites) the record at `(security, date)` atomically. */
  put(snapshot: OwnershipSnapshot): Promise<PutResult>;

  /** Cheap existence check; never reads the record body. */
  exists(security: SecurityId, date: SnapshotDate): Promise<boolean>;

  /** Ascending, duplicate-free dates; a fresh array on every call. */
  listDates(security: SecurityId): Promise<SnapshotDate[]>;

  /** Rejects with NotFoundError or CorruptRecordError. */
  get(security: SecurityId, date: SnapshotDate): Promise<OwnershipSnapshot>;

  /** Non-throwing read: corrupt records come back as a value. */
  read(security: SecurityId, date: SnapshotDate): Promise<StoreReadResult>;

  listSecurities(): Promise<SecurityId[]>;

  /** Durable marker for a date the source confirmed has no disclosure. */
  markNoData(security: SecurityId, date: SnapshotDate): Promise<void>;

  listNoDataDates(security: SecurityId): Promise<SnapshotDate[]>;

  close(): void;
}
