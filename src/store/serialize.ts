import { sha256 } from '@/utils/hash';
import type { OwnershipSnapshot } from '@/types/snapshot';

/**
 * Canonical on-disk form: fixed key order, two-space indent, trailing newline.
 * Identical snapshots always serialise to identical bytes.
 */
export function serializeSnapshot(snapshot: OwnershipSnapshot): string {
  const canonical = {
    security: snapshot.security,
    date: snapshot.date,
    totalShares: snapshot.totalShares,
    ...(snapshot.totalHolders !== undefined ? { totalHolders: snapshot.totalHolders } : {}),
    brackets: snapshot.brackets.map((b) => ({
      bracketId: b.bracketId,
      label: b.label,
      holderCount: b.holderCount,
      shareCount: b.shareCount,
    })),
    source: snapshot.source,
    fetchedAt: snapshot.fetchedAt,
  };
  return `${JSON.stringify(canonical, null, 2)}\n`;
}

export function snapshotContentHash(body: string): string {
  return sha256(body);
}
