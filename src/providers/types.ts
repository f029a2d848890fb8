/**
 * Shared types for disclosure sources.
 *
 * A source performs exactly one attempt per call and reports failures through
 * the fetch error taxonomy (NoDataError, TransientFetchError,
 * PermanentFetchError). Retrying and pacing belong to the fetcher.
 */
import type { OwnershipSnapshot, SecurityId, SnapshotDate } from '@/types/snapshot';

export interface SnapshotSource {
  readonly name: string;
  fetchSnapshot(security: SecurityId, date: SnapshotDate, signal?: AbortSignal): Promise<OwnershipSnapshot>;
  /** Record dates the source has published, ascending. */
  listPublishedDates?(signal?: AbortSignal): Promise<SnapshotDate[]>;
  /**
   * True when the source already knows, without a request, that nothing is
   * published for `date`. Checked before the rate limiter.
   */
  isKnownUnpublished?(date: SnapshotDate): boolean;
  close?(): void;
}

export type { SourceKind } from '@/core/config';
