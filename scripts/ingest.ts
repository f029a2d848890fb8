/**
 * Ingestion Run Script
 * Fetches missing weekly distribution snapshots for the configured universe.
 *
 * Usage: npx tsx scripts/ingest.ts [--since=2024-01-01] [--until=2024-12-31]
 *          [--codes=2330,2317] [--max-codes=50] [--cadence=published|weekly|daily]
 *          [--universe=default] [--stock-table] [--force] [--simulate]
 */

import dotenv from 'dotenv';
import { resolve } from 'path';

// Load .env.local first, then fall back to .env
dotenv.config({ path: resolve(process.cwd(), '.env.local') });
dotenv.config();
import { getIngestionConfig } from '../src/core/config';
import { daysAgo, normalizeSnapshotDate, today } from '../src/core/time';
import { StaticUniverseProvider, type UniverseProvider } from '../src/core/universe';
import { RateLimiter } from '../src/fetch/rate_limiter';
import { RateLimitedFetcher } from '../src/fetch/fetcher';
import type { Cadence } from '../src/ingest/candidates';
import { IngestionScheduler } from '../src/ingest/scheduler';
import { createSource } from '../src/providers/registry';
import { StockTableUniverseProvider } from '../src/providers/stock_table_universe';
import { createSnapshotStore } from '../src/store';
import { createChildLogger } from '../src/utils/logger';

const logger = createChildLogger('ingest');

interface IngestCliArgs {
  since: string;
  until: string;
  codes: string[] | null;
  maxCodes: number | null;
  cadence: Cadence | null;
  universe: string | undefined;
  stockTable: boolean;
  force: boolean;
  simulate: boolean;
}

function readOption(name: string): string | undefined {
  const equalsArg = process.argv.find((arg) => arg.startsWith(`${name}=`));
  if (equalsArg) return equalsArg.slice(name.length + 1);
  const index = process.argv.indexOf(name);
  const next = index >= 0 ? process.argv[index + 1] : undefined;
  return next && !next.startsWith('--') ? next : undefined;
}

function parseCliArgs(): IngestCliArgs {
  const until = normalizeSnapshotDate(readOption('--until') ?? today());
  const since = normalizeSnapshotDate(readOption('--since') ?? daysAgo(365, new Date(`${until}T00:00:00`)));

  const codesRaw = readOption('--codes');
  const codes = codesRaw
    ? codesRaw
        .split(',')
        .map((code) => code.trim())
        .filter(Boolean)
    : null;

  const maxCodesRaw = readOption('--max-codes');
  const maxCodes = maxCodesRaw ? Number.parseInt(maxCodesRaw, 10) : null;
  if (maxCodes !== null && (!Number.isInteger(maxCodes) || maxCodes < 1)) {
    throw new Error(`--max-codes must be a positive integer, got ${maxCodesRaw}`);
  }

  const cadenceRaw = readOption('--cadence') ?? null;
  if (cadenceRaw !== null && cadenceRaw !== 'published' && cadenceRaw !== 'weekly' && cadenceRaw !== 'daily') {
    throw new Error(`--cadence must be published, weekly or daily, got ${cadenceRaw}`);
  }

  return {
    since,
    until,
    codes,
    maxCodes,
    cadence: cadenceRaw,
    universe: readOption('--universe'),
    stockTable: process.argv.includes('--stock-table'),
    force: process.argv.includes('--force'),
    simulate: process.argv.includes('--simulate'),
  };
}

async function main() {
  const args = parseCliArgs();
  const config = getIngestionConfig();
  const store = createSnapshotStore(config);
  const source = createSource(config, args.simulate ? 'simulated' : undefined);

  const controller = new AbortController();
  process.once('SIGINT', () => {
    logger.warn('Interrupted, cancelling run after in-flight jobs');
    controller.abort();
  });

  try {
    let universe: UniverseProvider;
    if (args.codes) {
      universe = StaticUniverseProvider.fromIds(args.codes, 'CLI codes');
    } else if (args.stockTable) {
      universe = new StockTableUniverseProvider({
        tls: config.tls,
        requestTimeoutMs: config.fetch.requestTimeoutMs,
        projectRoot: config.projectRoot,
      });
    } else {
      universe = StaticUniverseProvider.fromPack(config.projectRoot, args.universe);
    }

    let securities = await universe.listEligibleSecurities();
    if (args.maxCodes !== null) {
      securities = securities.slice(0, args.maxCodes);
    }
    logger.info({ universe: universe.name, securities: securities.length }, 'Universe loaded');

    const limiter = new RateLimiter({
      maxConcurrency: config.fetch.maxConcurrency,
      minIntervalMs: args.simulate ? 0 : config.fetch.minIntervalMs,
    });
    const fetcher = new RateLimitedFetcher(source, limiter, config.fetch);
    const scheduler = new IngestionScheduler(store, fetcher, config.scheduler);

    const report = await scheduler.run({
      securities,
      window: { start: args.since, end: args.until },
      // Sources that list their published dates default to them.
      cadence: args.cadence ?? (fetcher.listsPublishedDates ? 'published' : 'weekly'),
      force: args.force,
      signal: controller.signal,
    });

    console.log(JSON.stringify({ runId: report.runId, totals: report.totals }, null, 2));
    for (const [security, entry] of Object.entries(report.securities)) {
      for (const failure of entry.failed) {
        console.log(`  FAILED ${security} ${failure.date}: ${failure.reason} (${failure.message})`);
      }
    }

    if (report.totals.failed > 0) {
      process.exitCode = 2;
    }
  } catch (error) {
    logger.error({ error }, 'Ingestion run failed');
    console.error('Ingestion run failed:', error);
    process.exitCode = 1;
  } finally {
    store.close();
    source.close?.();
  }
}

main().catch(console.error);
