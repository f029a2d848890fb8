import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { existsSync, mkdtempSync, rmSync } from 'fs';
import { join } from 'path';
import { tmpdir } from 'os';
import { SqliteSnapshotStore } from '@/store/sqlite_store';
import { createSnapshotStore } from '@/store';
import { CorruptRecordError, NotFoundError } from '@/core/errors';
import { makeSnapshot } from '../helpers/snapshots';

let store: SqliteSnapshotStore;

describe('SqliteSnapshotStore', () => {
  beforeEach(() => {
    store = new SqliteSnapshotStore(':memory:');
  });

  afterEach(() => {
    store.close();
  });

  it('reports unchanged on an identical second put', async () => {
    const snapshot = makeSnapshot('2330', '2024-01-05');

    expect((await store.put(snapshot)).status).toBe('written');
    expect((await store.put(snapshot)).status).toBe('unchanged');
    expect(await store.get('2330', '2024-01-05')).toEqual(snapshot);
  });

  it('lists dates and securities in ascending order', async () => {
    await store.put(makeSnapshot('2330', '2024-01-12'));
    await store.put(makeSnapshot('2330', '2024-01-05'));
    await store.put(makeSnapshot('1101', '2024-01-05'));

    expect(await store.listDates('2330')).toEqual(['2024-01-05', '2024-01-12']);
    expect(await store.listSecurities()).toEqual(['1101', '2330']);
    expect(await store.exists('1101', '2024-01-12')).toBe(false);
  });

  it('maps missing and damaged rows to errors', async () => {
    await expect(store.get('2330', '2024-01-05')).rejects.toBeInstanceOf(NotFoundError);

    store.writeRawBody('2330', '2024-01-05', 'not json');
    expect((await store.read('2330', '2024-01-05')).status).toBe('corrupt');
    await expect(store.get('2330', '2024-01-05')).rejects.toBeInstanceOf(CorruptRecordError);
  });

  it('keeps no-data markers until a snapshot is stored', async () => {
    await store.markNoData('2330', '2024-01-05');
    expect(await store.listNoDataDates('2330')).toEqual(['2024-01-05']);

    await store.put(makeSnapshot('2330', '2024-01-05'));
    expect(await store.listNoDataDates('2330')).toEqual([]);
  });
});

describe('createSnapshotStore', () => {
  let tempDir: string;

  beforeEach(() => {
    tempDir = mkdtempSync(join(tmpdir(), 'store-factory-'));
  });

  afterEach(() => {
    rmSync(tempDir, { recursive: true, force: true });
  });

  it('opens the sqlite database under the data directory', async () => {
    const sqlite = createSnapshotStore({ storeBackend: 'sqlite', dataDir: tempDir });
    await sqlite.put(makeSnapshot('2330', '2024-01-05'));
    sqlite.close();

    expect(sqlite.kind).toBe('sqlite');
    expect(existsSync(join(tempDir, 'snapshots.db'))).toBe(true);
  });

  it('writes file records under data/snapshots', async () => {
    const files = createSnapshotStore({ storeBackend: 'file', dataDir: tempDir });
    await files.put(makeSnapshot('2330', '2024-01-05'));

    expect(files.kind).toBe('file');
    expect(existsSync(join(tempDir, 'snapshots', '2330', '2024-01-05.json'))).toBe(true);
  });
});
