/**
 * Time utilities for consistent snapshot date handling.
 *
 * Snapshot dates are plain `YYYY-MM-DD` strings. Arithmetic goes through
 * date-fns calendar functions on local midnight, so day distances never depend
 * on the time of day or DST transitions.
 */

import {
  addDays,
  differenceInCalendarDays,
  eachDayOfInterval,
  format,
  getDay,
  isValid,
  parseISO,
  subDays,
} from 'date-fns';
import type { SnapshotDate } from '@/types/snapshot';

const SNAPSHOT_DATE_PATTERN = /^\d{4}-\d{2}-\d{2}$/;

export function formatDate(date: Date): SnapshotDate {
  return format(date, 'yyyy-MM-dd');
}

export function isSnapshotDate(value: unknown): value is SnapshotDate {
  if (typeof value !== 'string' || !SNAPSHOT_DATE_PATTERN.test(value)) {
    return false;
  }
  const parsed = parseISO(value);
  return isValid(parsed) && formatDate(parsed) === value;
}

export function parseSnapshotDate(value: string): Date {
  if (!isSnapshotDate(value)) {
    throw new Error(`Invalid date: ${value}. Expected a real calendar day (YYYY-MM-DD).`);
  }
  return parseISO(value);
}

/**
 * Accepts `YYYY-MM-DD`, `YYYY/MM/DD` and `YYYYMMDD`, the shapes that show up in
 * provider forms and older data directories. Returns null for anything else.
 */
export function tryNormalizeSnapshotDate(value: string): SnapshotDate | null {
  const trimmed = value.trim();
  const compact = /^(\d{4})(\d{2})(\d{2})$/.exec(trimmed);
  const candidate = compact
    ? `${compact[1]}-${compact[2]}-${compact[3]}`
    : trimmed.replace(/\//g, '-');
  return isSnapshotDate(candidate) ? candidate : null;
}

export function normalizeSnapshotDate(value: string): SnapshotDate {
  const normalized = tryNormalizeSnapshotDate(value);
  if (normalized === null) {
    throw new Error(`Invalid date: ${value}. Expected YYYY-MM-DD.`);
  }
  return normalized;
}

export function shiftDate(date: SnapshotDate, days: number): SnapshotDate {
  return formatDate(addDays(parseSnapshotDate(date), days));
}

/** Signed calendar-day difference `b - a`. */
export function daysBetween(a: SnapshotDate, b: SnapshotDate): number {
  return differenceInCalendarDays(parseSnapshotDate(b), parseSnapshotDate(a));
}

/** Every calendar day in `[start, end]`, ascending; empty when start > end. */
export function enumerateDays(start: SnapshotDate, end: SnapshotDate): SnapshotDate[] {
  if (start > end) return [];
  return eachDayOfInterval({ start: parseSnapshotDate(start), end: parseSnapshotDate(end) }).map(formatDate);
}

/** Dates in `[start, end]` that fall on `weekday` (0 = Sunday … 6 = Saturday). */
export function enumerateWeekday(start: SnapshotDate, end: SnapshotDate, weekday: number): SnapshotDate[] {
  if (start > end) return [];
  const first = parseSnapshotDate(start);
  const offset = (weekday - getDay(first) + 7) % 7;
  const out: SnapshotDate[] = [];
  for (let cursor = addDays(first, offset); formatDate(cursor) <= end; cursor = addDays(cursor, 7)) {
    out.push(formatDate(cursor));
  }
  return out;
}

export function today(now: Date = new Date()): SnapshotDate {
  return formatDate(now);
}

export function daysAgo(days: number, now: Date = new Date()): SnapshotDate {
  return formatDate(subDays(now, days));
}

export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve, reject) => {
    if (signal?.aborted) {
      reject(signal.reason);
      return;
    }
    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);
    const onAbort = () => {
      clearTimeout(timer);
      reject(signal?.reason);
    };
    signal?.addEventListener('abort', onAbort, { once: true });
  });
}

/** Run ids sort by date and stay unique per set of inputs. */
export function getRunId(runDate: SnapshotDate, inputsHash: string): string {
  return `${runDate}__${inputsHash.substring(0, 8)}`;
}
