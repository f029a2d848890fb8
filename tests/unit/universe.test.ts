import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { mkdirSync, mkdtempSync, rmSync, writeFileSync } from 'fs';
import { join } from 'path';
import { tmpdir } from 'os';
import { fileURLToPath } from 'url';
import type { AxiosAdapter } from 'axios';
import {
  StaticUniverseProvider,
  isSecurityId,
  loadUniverse,
  normalizeSecurityId,
  normalizeSecurityList,
  partitionSecurityIds,
} from '@/core/universe';
import {
  StockTableUniverseProvider,
  filterEquityListings,
  loadExclusionKeywords,
  parseStockTable,
} from '@/providers/stock_table_universe';

const STOCK_TABLE_HTML = `
<table>
  <tr><td>代號</td><td>名稱</td></tr>
  <tr><td>2330</td><td>台積電</td></tr>
  <tr><td>0050</td><td>元大台灣50 ETF</td></tr>
  <tr><td>2317</td><td>鴻海</td></tr>
  <tr><td>00679B</td><td>元大美債20年</td></tr>
  <tr><td>6488</td><td>環球晶</td></tr>
  <tr><td>2330</td><td>台積電</td></tr>
  <tr><td>7001</td><td>國泰永續高股息基金</td></tr>
</table>`;

describe('security ids', () => {
  it('normalises case and whitespace', () => {
    expect(normalizeSecurityId(' abc ')).toBe('ABC');
    expect(isSecurityId('../etc')).toBe(false);
    expect(isSecurityId('..')).toBe(false);
    expect(normalizeSecurityList(['2330', ' 2330', 42, 'bad/id', '2317'])).toEqual(['2330', '2317']);
  });

  it('splits requested ids into valid and malformed', () => {
    expect(partitionSecurityIds(['2330', 'BRK/B', ' 2330', '', 'BRK/B', '2317'])).toEqual({
      valid: ['2330', '2317'],
      invalid: ['BRK/B', ''],
    });
  });
});

describe('universe packs', () => {
  let tempDir: string;

  beforeEach(() => {
    tempDir = mkdtempSync(join(tmpdir(), 'universe-'));
    mkdirSync(join(tempDir, 'config', 'universes'), { recursive: true });
    writeFileSync(
      join(tempDir, 'config', 'universes', 'watch.json'),
      JSON.stringify({ name: 'Watch', symbols: ['2330', '2317', '2330'] })
    );
  });

  afterEach(() => {
    rmSync(tempDir, { recursive: true, force: true });
  });

  it('loads a named pack and de-duplicates its symbols', async () => {
    expect(loadUniverse(tempDir, 'watch').symbols).toEqual(['2330', '2317']);

    const provider = StaticUniverseProvider.fromPack(tempDir, 'watch');
    expect(provider.name).toBe('Watch');
    expect(await provider.listEligibleSecurities()).toEqual(['2330', '2317']);
  });

  it('throws for a missing pack', () => {
    expect(() => loadUniverse(tempDir, 'missing')).toThrow('Universe pack not found');
  });
});

describe('stock table universe', () => {
  const exclusions = ['ETF', '債', '基金'];

  it('parses code and name rows', () => {
    expect(parseStockTable(STOCK_TABLE_HTML).map((l) => l.code)).toEqual([
      '2330',
      '0050',
      '2317',
      '6488',
      '2330',
      '7001',
    ]);
  });

  it('falls back to anchor labels', () => {
    const html = '<div><a href="#">台積電(2330)</a><a href="#">鴻海（2317）</a><a href="#">More</a></div>';
    expect(parseStockTable(html)).toEqual([
      { code: '2330', name: '台積電' },
      { code: '2317', name: '鴻海' },
    ]);
  });

  it('drops excluded names and duplicate codes', () => {
    const kept = filterEquityListings(parseStockTable(STOCK_TABLE_HTML), exclusions);

    expect(kept.map((l) => l.code)).toEqual(['2330', '2317', '6488']);
  });

  it('reads the exclusion keyword file', () => {
    const keywords = loadExclusionKeywords(fileURLToPath(new URL('../../', import.meta.url)));
    expect(keywords).toContain('ETF');
    expect(keywords).toContain('權證');
  });

  it('lists eligible securities through the HTTP client', async () => {
    const adapter: AxiosAdapter = async (config) => ({
      data: STOCK_TABLE_HTML,
      status: 200,
      statusText: 'OK',
      headers: {},
      config,
    });
    const provider = new StockTableUniverseProvider({
      tls: { mode: 'always' },
      requestTimeoutMs: 1000,
      exclusions,
      adapter,
    });

    expect(await provider.listEligibleSecurities()).toEqual(['2330', '2317', '6488']);
  });
});
