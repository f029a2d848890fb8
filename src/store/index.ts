import { join } from 'path';
import type { IngestionConfig } from '@/core/config';
import { FileSnapshotStore } from './file_store';
import { SqliteSnapshotStore } from './sqlite_store';
import type { SnapshotStore } from './types';

export type { PutResult, SnapshotStore, StoreReadResult } from './types';
export { FileSnapshotStore } from './file_store';
export { SqliteSnapshotStore } from './sqlite_store';

/**
 * Create the snapshot store selected by `store_backend`.
 *
 * - file:   <dataDir>/snapshots/<SECURITY>/<date>.json
 * - sqlite: <dataDir>/snapshots.db
 */
export function createSnapshotStore(config: Pick<IngestionConfig, 'storeBackend' | 'dataDir'>): SnapshotStore {
  switch (config.storeBackend) {
    case 'sqlite':
      return new SqliteSnapshotStore(join(config.dataDir, 'snapshots.db'));
    case 'file':
      return new FileSnapshotStore(join(config.dataDir, 'snapshots'));
  }
}
