/**
 * Universe sourced from the public stock-code table.
 *
 * Keeps 4-digit listed codes whose names match none of the exclusion keywords
 * (ETFs, bonds, warrants, leveraged products), deduplicated in page order.
 */

import axios, { type AxiosAdapter, type AxiosInstance } from 'axios';
import * as cheerio from 'cheerio';
import { existsSync, readFileSync } from 'fs';
import { join } from 'path';
import type { TlsPolicy } from '@/core/config';
import { ConfigError } from '@/core/errors';
import type { UniverseProvider } from '@/core/universe';
import { createHttpsAgent } from '@/fetch/tls';
import { createChildLogger } from '@/utils/logger';
import type { SecurityId } from '@/types/snapshot';

const logger = createChildLogger('stock_table_universe');

export const STOCK_TABLE_URL = 'https://moneydj.emega.com.tw/js/StockTable.htm';

const CODE_PATTERN = /^\d{4}$/;
const LABELLED_CODE_PATTERN = /^(.+?)\s*[(（]\s*(\d{4})\s*[)）]$/;

export interface StockListing {
  code: SecurityId;
  name: string;
}

export function loadExclusionKeywords(projectRoot: string = process.cwd()): string[] {
  const filePath = join(projectRoot, 'config', 'universe_exclusions.json');
  if (!existsSync(filePath)) {
    return [];
  }
  const parsed: unknown = JSON.parse(readFileSync(filePath, 'utf-8'));
  if (
    typeof parsed !== 'object' ||
    parsed === null ||
    !('keywords' in parsed) ||
    !Array.isArray(parsed.keywords)
  ) {
    throw new ConfigError(`${filePath} must contain { "keywords": [...] }`);
  }
  return parsed.keywords.filter((keyword): keyword is string => typeof keyword === 'string' && keyword !== '');
}

/**
 * Reads `<td>code</td><td>name</td>` rows, falling back to anchor labels
 * shaped like `台積電(2330)`.
 */
export function parseStockTable(html: string): StockListing[] {
  const $ = cheerio.load(html);
  const listings: StockListing[] = [];

  $('tr').each((_, tr) => {
    const cells = $(tr)
      .find('td')
      .toArray()
      .map((td) => $(td).text().trim());
    if (cells.length >= 2 && CODE_PATTERN.test(cells[0])) {
      listings.push({ code: cells[0], name: cells[1] });
    }
  });

  if (listings.length === 0) {
    $('a').each((_, a) => {
      const match = LABELLED_CODE_PATTERN.exec($(a).text().trim());
      if (match) {
        listings.push({ code: match[2], name: match[1].trim() });
      }
    });
  }

  return listings;
}

export function filterEquityListings(listings: readonly StockListing[], exclusions: readonly string[]): StockListing[] {
  const upperExclusions = exclusions.map((keyword) => keyword.toUpperCase());
  const seen = new Set<string>();
  const kept: StockListing[] = [];

  for (const listing of listings) {
    if (seen.has(listing.code)) continue;
    seen.add(listing.code);

    const name = listing.name.toUpperCase();
    if (upperExclusions.some((keyword) => name.includes(keyword))) {
      logger.debug({ code: listing.code, name: listing.name }, 'Excluding non-equity listing');
      continue;
    }
    kept.push(listing);
  }

  return kept;
}

export interface StockTableUniverseOptions {
  tls: TlsPolicy;
  requestTimeoutMs: number;
  projectRoot?: string;
  url?: string;
  exclusions?: readonly string[];
  adapter?: AxiosAdapter;
}

export class StockTableUniverseProvider implements UniverseProvider {
  readonly name = 'Stock table';
  private readonly http: AxiosInstance;
  private readonly url: string;
  private readonly exclusions: readonly string[];

  constructor(options: StockTableUniverseOptions) {
    this.url = options.url ?? STOCK_TABLE_URL;
    this.exclusions = options.exclusions ?? loadExclusionKeywords(options.projectRoot);
    this.http = axios.create({
      timeout: options.requestTimeoutMs,
      responseType: 'text',
      httpsAgent: options.adapter ? undefined : createHttpsAgent(options.tls),
      adapter: options.adapter,
    });
  }

  async listListings(): Promise<StockListing[]> {
    const response = await this.http.get<string>(this.url);
    const listings = filterEquityListings(parseStockTable(response.data), this.exclusions);
    logger.info({ count: listings.length }, 'Loaded eligible securities from stock table');
    return listings;
  }

  async listEligibleSecurities(): Promise<SecurityId[]> {
    return (await this.listListings()).map((listing) => listing.code);
  }
}
