import { describe, expect, it } from 'vitest';
import {
  daysBetween,
  enumerateDays,
  enumerateWeekday,
  getRunId,
  isSnapshotDate,
  normalizeSnapshotDate,
  shiftDate,
  sleep,
  tryNormalizeSnapshotDate,
} from '@/core/time';

describe('snapshot dates', () => {
  it('accepts only real calendar days', () => {
    expect(isSnapshotDate('2024-02-29')).toBe(true);
    expect(isSnapshotDate('2023-02-29')).toBe(false);
    expect(isSnapshotDate('2024-1-5')).toBe(false);
    expect(isSnapshotDate(20240105)).toBe(false);
  });

  it('normalises compact and slashed forms', () => {
    expect(tryNormalizeSnapshotDate('20240105')).toBe('2024-01-05');
    expect(tryNormalizeSnapshotDate(' 2024/01/05 ')).toBe('2024-01-05');
    expect(tryNormalizeSnapshotDate('請選擇')).toBeNull();
    expect(() => normalizeSnapshotDate('2024-13-01')).toThrow('Invalid date: 2024-13-01. Expected YYYY-MM-DD.');
  });

  it('does calendar arithmetic across month and year ends', () => {
    expect(shiftDate('2023-12-29', 7)).toBe('2024-01-05');
    expect(daysBetween('2024-01-05', '2024-03-01')).toBe(56);
    expect(daysBetween('2024-03-01', '2024-01-05')).toBe(-56);
  });

  it('enumerates days and weekdays inclusively', () => {
    expect(enumerateDays('2024-02-28', '2024-03-01')).toEqual(['2024-02-28', '2024-02-29', '2024-03-01']);
    expect(enumerateWeekday('2024-01-01', '2024-01-31', 5)).toEqual([
      '2024-01-05',
      '2024-01-12',
      '2024-01-19',
      '2024-01-26',
    ]);
    expect(enumerateWeekday('2024-01-05', '2024-01-05', 5)).toEqual(['2024-01-05']);
    expect(enumerateWeekday('2024-01-31', '2024-01-01', 5)).toEqual([]);
  });

  it('builds run ids from the date and an input hash prefix', () => {
    expect(getRunId('2024-01-05', 'abcdef0123456789')).toBe('2024-01-05__abcdef01');
  });
});

describe('sleep', () => {
  it('rejects with the abort reason', async () => {
    const controller = new AbortController();
    const pending = sleep(10_000, controller.signal);
    controller.abort(new Error('stop'));

    await expect(pending).rejects.toThrow('stop');
  });
});
