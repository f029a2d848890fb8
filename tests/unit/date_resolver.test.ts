import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { DateResolver, findCandidate, lowerBound } from '@/resolve/date_resolver';
import { SqliteSnapshotStore } from '@/store/sqlite_store';
import { NoDataAvailableError, OutOfToleranceError } from '@/core/errors';
import { makeSnapshot } from '../helpers/snapshots';

let store: SqliteSnapshotStore;

async function seed(security: string, dates: string[]): Promise<void> {
  for (const date of dates) {
    await store.put(makeSnapshot(security, date));
  }
}

describe('DateResolver', () => {
  beforeEach(() => {
    store = new SqliteSnapshotStore(':memory:');
  });

  afterEach(() => {
    store.close();
  });

  it('breaks nearest ties toward the earlier date', async () => {
    await seed('2330', ['2024-01-05', '2024-01-07']);
    const resolver = new DateResolver(store);

    expect(await resolver.resolve('2330', '2024-01-06', 'nearest')).toBe('2024-01-05');
  });

  it('picks the closer neighbour when distances differ', async () => {
    await seed('2330', ['2024-01-05', '2024-01-12', '2024-01-19']);
    const resolver = new DateResolver(store);

    expect(await resolver.resolve('2330', '2024-01-11')).toBe('2024-01-12');
    expect(await resolver.resolve('2330', '2024-01-01')).toBe('2024-01-05');
    expect(await resolver.resolve('2330', '2024-03-01')).toBe('2024-01-19');
    expect(await resolver.resolve('2330', '2024-01-12')).toBe('2024-01-12');
  });

  it('honours on-or-before and on-or-after', async () => {
    await seed('2330', ['2024-01-05', '2024-01-12']);
    const resolver = new DateResolver(store);

    expect(await resolver.resolve('2330', '2024-01-10', 'on-or-before')).toBe('2024-01-05');
    expect(await resolver.resolve('2330', '2024-01-12', 'on-or-before')).toBe('2024-01-12');
    expect(await resolver.resolve('2330', '2024-01-06', 'on-or-after')).toBe('2024-01-12');
    await expect(resolver.resolve('2330', '2024-01-01', 'on-or-before')).rejects.toBeInstanceOf(
      NoDataAvailableError
    );
    await expect(resolver.resolve('2330', '2024-01-13', 'on-or-after')).rejects.toBeInstanceOf(
      NoDataAvailableError
    );
  });

  it('rejects NoDataAvailableError for a security with no dates', async () => {
    const resolver = new DateResolver(store);

    await expect(resolver.resolve('2330', '2024-01-06')).rejects.toBeInstanceOf(NoDataAvailableError);
  });

  it('rejects OutOfToleranceError when the best date is too far away', async () => {
    await seed('2330', ['2024-01-01']);
    const resolver = new DateResolver(store);

    const error = await resolver
      .resolve('2330', '2024-02-10', 'nearest', { maxToleranceDays: 7 })
      .catch((caught: unknown) => caught);

    expect(error).toBeInstanceOf(OutOfToleranceError);
    expect(error).toMatchObject({ candidate: '2024-01-01', distanceDays: 40, maxToleranceDays: 7 });
    expect(await resolver.resolve('2330', '2024-01-08', 'nearest', { maxToleranceDays: 7 })).toBe('2024-01-01');
  });

  it('reads the date listing once per security', async () => {
    await seed('2330', ['2024-01-05', '2024-01-12', '2024-01-19']);
    const listDates = vi.spyOn(store, 'listDates');
    const resolver = new DateResolver(store);

    const resolved = await resolver.resolveMany('2330', ['2024-01-04', '2024-01-13', '2024-01-30']);
    await resolver.resolve('2330', '2024-01-10');

    expect(resolved).toEqual(['2024-01-05', '2024-01-12', '2024-01-19']);
    expect(listDates).toHaveBeenCalledTimes(1);
  });

  it('re-reads the listing after invalidate', async () => {
    await seed('2330', ['2024-01-05']);
    const resolver = new DateResolver(store);
    expect(await resolver.resolve('2330', '2024-01-20')).toBe('2024-01-05');

    await seed('2330', ['2024-01-19']);
    expect(await resolver.resolve('2330', '2024-01-20')).toBe('2024-01-05');

    resolver.invalidate('2330');
    expect(await resolver.resolve('2330', '2024-01-20')).toBe('2024-01-19');
  });
});

describe('lowerBound / findCandidate', () => {
  const dates = ['2024-01-05', '2024-01-12', '2024-01-19'];

  it('finds the first index not before the target', () => {
    expect(lowerBound(dates, '2024-01-01')).toBe(0);
    expect(lowerBound(dates, '2024-01-12')).toBe(1);
    expect(lowerBound(dates, '2024-01-13')).toBe(2);
    expect(lowerBound(dates, '2024-02-01')).toBe(3);
  });

  it('returns null when no date satisfies the direction', () => {
    expect(findCandidate(dates, '2024-01-20', 'on-or-after')).toBeNull();
    expect(findCandidate(dates, '2024-01-04', 'on-or-before')).toBeNull();
    expect(findCandidate([], '2024-01-04', 'nearest')).toBeNull();
  });
});
