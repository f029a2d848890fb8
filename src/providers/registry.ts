import type { IngestionConfig, SourceKind } from '@/core/config';
import { createChildLogger } from '@/utils/logger';
import { SimulatedSource } from './simulated';
import { TdccSource } from './tdcc/client';
import type { SnapshotSource } from './types';

const logger = createChildLogger('source_registry');

/**
 * Create the disclosure source named by `source` in config/ingestion.json
 * (or INGEST_SOURCE).
 *
 * - tdcc:      live depository query page
 * - simulated: deterministic offline data
 */
export function createSource(
  config: Pick<IngestionConfig, 'source' | 'tls' | 'fetch'>,
  sourceKind?: SourceKind
): SnapshotSource {
  const kind = sourceKind ?? config.source;
  logger.info({ source: kind }, 'Creating snapshot source');

  switch (kind) {
    case 'simulated':
      return new SimulatedSource();
    case 'tdcc':
      return new TdccSource({ tls: config.tls, requestTimeoutMs: config.fetch.requestTimeoutMs });
  }
}
