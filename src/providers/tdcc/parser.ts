/**
 * HTML parsers for the depository's shareholding-distribution query page.
 *
 * The page carries a form whose `scaDate` select lists the published record
 * dates, and (after a query) a table of 15 ownership tiers followed by an
 * adjustment row and a total row.
 */

import * as cheerio from 'cheerio';
import { NoDataError, TransientFetchError } from '@/core/errors';
import { isSnapshotDate, tryNormalizeSnapshotDate } from '@/core/time';
import { BRACKET_COUNT } from '@/providers/brackets';
import type { Bracket, OwnershipSnapshot, SecurityId, SnapshotDate } from '@/types/snapshot';

export const NO_DATA_MARKERS = ['查無此資料', '查無資料', '無此資料'];
const TOTAL_ROW_LABEL = '合計';

export interface QueryForm {
  publishedDates: SnapshotDate[];
  /** Hidden inputs that must be echoed back with the query. */
  hiddenFields: Record<string, string>;
}

export function parseQueryForm(html: string): QueryForm {
  const $ = cheerio.load(html);

  const dates = new Set<SnapshotDate>();
  $('select[name="scaDate"] option, select#scaDate option').each((_, el) => {
    // Placeholder options such as "請選擇" normalise to null.
    const date = tryNormalizeSnapshotDate($(el).attr('value') ?? $(el).text());
    if (date) {
      dates.add(date);
    }
  });

  const hiddenFields: Record<string, string> = {};
  $('input[type="hidden"]').each((_, el) => {
    const name = $(el).attr('name');
    if (name) {
      hiddenFields[name] = $(el).attr('value') ?? '';
    }
  });

  return { publishedDates: Array.from(dates).sort(), hiddenFields };
}

export function parseCount(text: string): number | null {
  const cleaned = text.replace(/[,\s]/g, '');
  if (!/^-?\d+$/.test(cleaned)) return null;
  return Number.parseInt(cleaned, 10);
}

interface DistributionRow {
  ordinal: number;
  label: string;
  holders: number;
  shares: number;
}

function readRows(cells: string[][]): DistributionRow[] {
  const rows: DistributionRow[] = [];
  for (const row of cells) {
    if (row.length < 4) continue;
    const ordinal = parseCount(row[0]);
    const holders = parseCount(row[2]);
    const shares = parseCount(row[3]);
    if (ordinal === null || holders === null || shares === null) continue;
    rows.push({ ordinal, label: row[1], holders, shares });
  }
  return rows;
}

function tableCells($: cheerio.CheerioAPI): string[][][] {
  return $('table')
    .toArray()
    .map((table) =>
      $(table)
        .find('tr')
        .toArray()
        .map((tr) =>
          $(tr)
            .find('td')
            .toArray()
            .map((td) => $(td).text().trim())
        )
    );
}

export interface DistributionPageContext {
  security: SecurityId;
  date: SnapshotDate;
  fetchedAt: string;
  source?: string;
}

/**
 * Turns a query result page into a snapshot. Throws NoDataError for the
 * "no data" page and TransientFetchError when the distribution table is
 * missing or incomplete.
 */
export function parseDistributionPage(html: string, context: DistributionPageContext): OwnershipSnapshot {
  const $ = cheerio.load(html);
  const pageText = $('body').text();

  if (NO_DATA_MARKERS.some((marker) => pageText.includes(marker))) {
    throw new NoDataError(`No distribution published for ${context.security} on ${context.date}`);
  }

  const rows =
    tableCells($)
      .map(readRows)
      .find((candidate) => candidate.length > 0 && candidate[0].ordinal === 1) ?? [];

  if (rows.length === 0) {
    throw new TransientFetchError(`Distribution table not found for ${context.security} on ${context.date}`);
  }

  const tiers = rows.filter((row) => row.ordinal >= 1 && row.ordinal <= BRACKET_COUNT);
  if (tiers.length !== BRACKET_COUNT) {
    throw new TransientFetchError(
      `Expected ${BRACKET_COUNT} tiers for ${context.security} on ${context.date}, found ${tiers.length}`
    );
  }

  const brackets: Bracket[] = tiers.map((row, index) => ({
    bracketId: index + 1,
    label: row.label,
    holderCount: row.holders,
    shareCount: row.shares,
  }));

  const total = rows.find((row) => row.label.includes(TOTAL_ROW_LABEL));
  const tierShares = brackets.reduce((sum, b) => sum + b.shareCount, 0);
  const tierHolders = brackets.reduce((sum, b) => sum + b.holderCount, 0);

  if (!isSnapshotDate(context.date)) {
    throw new Error(`Invalid snapshot date: ${context.date}`);
  }

  return {
    security: context.security,
    date: context.date,
    totalShares: total?.shares ?? tierShares,
    totalHolders: total?.holders ?? tierHolders,
    brackets,
    source: context.source ?? 'tdcc',
    fetchedAt: context.fetchedAt,
  };
}
