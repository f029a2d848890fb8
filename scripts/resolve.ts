/**
 * Resolve a target date against the local snapshot store.
 *
 * Usage: npx tsx scripts/resolve.ts --code=2330 --date=2024-03-01
 *          [--direction=nearest|on-or-before|on-or-after] [--tolerance=7]
 *          [--end=2024-06-30]   (print the window and distribution tables instead)
 */

import dotenv from 'dotenv';
import { resolve } from 'path';

dotenv.config({ path: resolve(process.cwd(), '.env.local') });
dotenv.config();
import { getIngestionConfig } from '../src/core/config';
import { IngestionError } from '../src/core/errors';
import { normalizeSnapshotDate } from '../src/core/time';
import { buildDistributionTables, loadSnapshotSeries } from '../src/query/series';
import { DateResolver, type ResolveDirection } from '../src/resolve/date_resolver';
import { createSnapshotStore } from '../src/store';

const DIRECTIONS: readonly ResolveDirection[] = ['nearest', 'on-or-before', 'on-or-after'];

function readOption(name: string): string | undefined {
  const equalsArg = process.argv.find((arg) => arg.startsWith(`${name}=`));
  if (equalsArg) return equalsArg.slice(name.length + 1);
  const index = process.argv.indexOf(name);
  const next = index >= 0 ? process.argv[index + 1] : undefined;
  return next && !next.startsWith('--') ? next : undefined;
}

async function main() {
  const code = readOption('--code');
  const dateRaw = readOption('--date');
  if (!code || !dateRaw) {
    console.error('Usage: resolve.ts --code=<security> --date=<YYYY-MM-DD> [--direction=...] [--tolerance=<days>]');
    process.exitCode = 1;
    return;
  }

  const directionRaw = readOption('--direction') ?? 'nearest';
  const direction = DIRECTIONS.find((d) => d === directionRaw);
  if (!direction) {
    console.error(`--direction must be one of ${DIRECTIONS.join(', ')}`);
    process.exitCode = 1;
    return;
  }

  const toleranceRaw = readOption('--tolerance');
  const maxToleranceDays = toleranceRaw !== undefined ? Number.parseInt(toleranceRaw, 10) : undefined;
  if (maxToleranceDays !== undefined && (!Number.isInteger(maxToleranceDays) || maxToleranceDays < 0)) {
    console.error(`--tolerance must be a non-negative integer, got ${toleranceRaw}`);
    process.exitCode = 1;
    return;
  }
  const endRaw = readOption('--end');

  const config = getIngestionConfig();
  const store = createSnapshotStore(config);
  const resolver = new DateResolver(store);

  try {
    const target = normalizeSnapshotDate(dateRaw);

    if (endRaw) {
      const series = await loadSnapshotSeries(store, code, target, normalizeSnapshotDate(endRaw), resolver);
      for (const warning of series.warnings) {
        console.warn(`Warning: ${warning}`);
      }
      const tables = buildDistributionTables(series.snapshots);
      console.log(JSON.stringify({ window: { start: series.window.start, end: series.window.end }, ...tables }, null, 2));
      return;
    }

    const resolved = await resolver.resolve(code, target, direction, { maxToleranceDays });
    console.log(resolved);
  } catch (error) {
    if (error instanceof IngestionError) {
      console.error(`${error.code}: ${error.message}`);
    } else {
      console.error('Resolve failed:', error);
    }
    process.exitCode = 1;
  } finally {
    store.close();
  }
}

main().catch(console.error);
