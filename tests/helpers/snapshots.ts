import { NoDataError, PermanentFetchError, TransientFetchError } from '@/core/errors';
import type { SnapshotSource } from '@/providers/types';
import type { OwnershipSnapshot, SecurityId, SnapshotDate } from '@/types/snapshot';

export function makeSnapshot(
  security: SecurityId,
  date: SnapshotDate,
  overrides: Partial<OwnershipSnapshot> = {}
): OwnershipSnapshot {
  return {
    security,
    date,
    totalShares: 10_000,
    totalHolders: 60,
    brackets: [
      { bracketId: 1, label: '1-999', holderCount: 50, shareCount: 2_000 },
      { bracketId: 2, label: '1,000-5,000', holderCount: 8, shareCount: 3_000 },
      { bracketId: 3, label: '5,001-10,000', holderCount: 2, shareCount: 5_000 },
    ],
    source: 'test',
    fetchedAt: '2024-01-01T00:00:00.000Z',
    ...overrides,
  };
}

export type ScriptedResult = 'ok' | 'no_data' | 'transient' | 'permanent' | 'hang' | OwnershipSnapshot;

/**
 * In-process source. Results are scripted per `security@date` key and consumed
 * one per call; unscripted keys succeed.
 */
export class FakeSource implements SnapshotSource {
  readonly name = 'fake';
  calls: string[] = [];
  active = 0;
  maxActive = 0;
  private readonly scripts = new Map<string, ScriptedResult[]>();

  constructor(private readonly delayMs = 0) {}

  script(security: SecurityId, date: SnapshotDate, ...results: ScriptedResult[]): this {
    this.scripts.set(`${security}@${date}`, results);
    return this;
  }

  async fetchSnapshot(security: SecurityId, date: SnapshotDate): Promise<OwnershipSnapshot> {
    const key = `${security}@${date}`;
    this.calls.push(key);
    const next = this.scripts.get(key)?.shift() ?? 'ok';

    this.active++;
    this.maxActive = Math.max(this.maxActive, this.active);
    try {
      if (this.delayMs > 0) {
        await new Promise((resolve) => setTimeout(resolve, this.delayMs));
      }
      if (next === 'hang') {
        return await new Promise<OwnershipSnapshot>(() => undefined);
      }
      if (next === 'no_data') throw new NoDataError(`nothing for ${key}`);
      if (next === 'transient') throw new TransientFetchError(`flaky ${key}`, 503);
      if (next === 'permanent') throw new PermanentFetchError(`rejected ${key}`, 404);
      if (next === 'ok') return makeSnapshot(security, date);
      return next;
    } finally {
      this.active--;
    }
  }
}

/** FakeSource that also lists its published record dates. */
export class PublishingFakeSource extends FakeSource {
  listCalls = 0;

  constructor(
    private readonly published: readonly SnapshotDate[],
    delayMs = 0
  ) {
    super(delayMs);
  }

  async listPublishedDates(): Promise<SnapshotDate[]> {
    this.listCalls++;
    return [...this.published];
  }

  isKnownUnpublished(date: SnapshotDate): boolean {
    return !this.published.includes(date);
  }
}
