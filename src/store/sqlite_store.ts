/**
 * SQLite-backed snapshot store.
 * Uses better-sqlite3 for synchronous operations; one row per (security, date).
 */

import Database from 'better-sqlite3';
import { existsSync, mkdirSync } from 'fs';
import { dirname } from 'path';
import { normalizeSecurityId } from '@/core/universe';
import { isSnapshotDate } from '@/core/time';
import {
  CorruptRecordError,
  IOFailureError,
  NotFoundError,
  errorMessage,
} from '@/core/errors';
import { createChildLogger } from '@/utils/logger';
import { validateSnapshot } from '@/validation/ajv_instance';
import { serializeSnapshot, snapshotContentHash } from './serialize';
import type { PutResult, SnapshotStore, StoreReadResult } from './types';
import type { OwnershipSnapshot, SecurityId, SnapshotDate } from '@/types/snapshot';

const logger = createChildLogger('sqlite_store');

interface SnapshotRow {
  body: string;
}

interface HashRow {
  content_hash: string;
}

interface DateRow {
  date: string;
}

interface SecurityRow {
  security: string;
}

function ensureTables(database: Database.Database): void {
  database.exec(`
    CREATE TABLE IF NOT EXISTS snapshots (
      security TEXT NOT NULL,
      date TEXT NOT NULL,
      body TEXT NOT NULL,
      content_hash TEXT NOT NULL,
      updated_at TEXT NOT NULL,
      PRIMARY KEY (security, date)
    );

    CREATE TABLE IF NOT EXISTS snapshot_no_data (
      security TEXT NOT NULL,
      date TEXT NOT NULL,
      recorded_at TEXT NOT NULL,
      PRIMARY KEY (security, date)
    );
  `);
}

function assertDate(date: SnapshotDate): SnapshotDate {
  if (!isSnapshotDate(date)) {
    throw new Error(`Invalid snapshot date: ${date}`);
  }
  return date;
}

export class SqliteSnapshotStore implements SnapshotStore {
  readonly kind = 'sqlite';
  private readonly db: Database.Database;

  /** `dbPath` may be `:memory:` for tests. */
  constructor(dbPath: string) {
    if (dbPath !== ':memory:') {
      const dir = dirname(dbPath);
      if (!existsSync(dir)) {
        mkdirSync(dir, { recursive: true });
      }
    }

    logger.info({ dbPath }, 'Opening snapshot database');
    this.db = new Database(dbPath);
    if (dbPath !== ':memory:') {
      // WAL lets report builders read while an ingestion run is writing.
      this.db.pragma('journal_mode = WAL');
    }
    ensureTables(this.db);
  }

  private run<T>(operation: string, fn: () => T): T {
    try {
      return fn();
    } catch (error) {
      throw new IOFailureError(`SQLite ${operation} failed: ${errorMessage(error)}`, operation, error);
    }
  }

  async put(snapshot: OwnershipSnapshot): Promise<PutResult> {
    const security = normalizeSecurityId(snapshot.security);
    const date = assertDate(snapshot.date);
    const record: OwnershipSnapshot = { ...snapshot, security };

    const validation = validateSnapshot(record);
    if (!validation.valid) {
      throw new CorruptRecordError(security, date, validation.errors ?? []);
    }

    const body = serializeSnapshot(record);
    const contentHash = snapshotContentHash(body);
    const key = { security, date };

    const status = this.run('put', () => {
      const tx = this.db.transaction((): PutResult['status'] => {
        const current = this.db
          .prepare<[string, string], HashRow>('SELECT content_hash FROM snapshots WHERE security = ? AND date = ?')
          .get(security, date);
        if (current?.content_hash === contentHash) {
          return 'unchanged';
        }

        this.db
          .prepare<[string, string, string, string, string]>(`
            INSERT INTO snapshots (security, date, body, content_hash, updated_at)
            VALUES (?, ?, ?, ?, ?)
            ON CONFLICT(security, date) DO UPDATE SET
              body = excluded.body,
              content_hash = excluded.content_hash,
              updated_at = excluded.updated_at
          `)
          .run(security, date, body, contentHash, new Date().toISOString());
        this.db
          .prepare<[string, string]>('DELETE FROM snapshot_no_data WHERE security = ? AND date = ?')
          .run(security, date);
        return 'written';
      });
      return tx();
    });

    return { status, key, contentHash };
  }

  async exists(security: SecurityId, date: SnapshotDate): Promise<boolean> {
    const id = normalizeSecurityId(security);
    const row = this.run('exists', () =>
      this.db
        .prepare<[string, string], { found: number }>(
          'SELECT 1 AS found FROM snapshots WHERE security = ? AND date = ?'
        )
        .get(id, assertDate(date))
    );
    return row !== undefined;
  }

  async listDates(security: SecurityId): Promise<SnapshotDate[]> {
    const id = normalizeSecurityId(security);
    const rows = this.run('listDates', () =>
      this.db
        .prepare<[string], DateRow>('SELECT date FROM snapshots WHERE security = ? ORDER BY date ASC')
        .all(id)
    );
    return rows.map((row) => row.date);
  }

  async read(security: SecurityId, date: SnapshotDate): Promise<StoreReadResult> {
    const id = normalizeSecurityId(security);
    const row = this.run('read', () =>
      this.db
        .prepare<[string, string], SnapshotRow>('SELECT body FROM snapshots WHERE security = ? AND date = ?')
        .get(id, assertDate(date))
    );
    if (!row) {
      return { status: 'not_found' };
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(row.body);
    } catch (error) {
      return { status: 'corrupt', errors: [`invalid JSON: ${errorMessage(error)}`] };
    }

    const validation = validateSnapshot(parsed);
    if (!validation.valid || !validation.data) {
      logger.warn({ security: id, date, errors: validation.errors }, 'Snapshot row failed validation');
      return { status: 'corrupt', errors: validation.errors ?? [] };
    }
    if (validation.data.security !== id || validation.data.date !== date) {
      return {
        status: 'corrupt',
        errors: [`record key ${validation.data.security}@${validation.data.date} does not match ${id}@${date}`],
      };
    }

    return { status: 'ok', snapshot: validation.data };
  }

  async get(security: SecurityId, date: SnapshotDate): Promise<OwnershipSnapshot> {
    const result = await this.read(security, date);
    switch (result.status) {
      case 'ok':
        return result.snapshot;
      case 'not_found':
        throw new NotFoundError(normalizeSecurityId(security), date);
      case 'corrupt':
        throw new CorruptRecordError(normalizeSecurityId(security), date, result.errors);
    }
  }

  async listSecurities(): Promise<SecurityId[]> {
    const rows = this.run('listSecurities', () =>
      this.db.prepare<[], SecurityRow>('SELECT DISTINCT security FROM snapshots ORDER BY security ASC').all()
    );
    return rows.map((row) => row.security);
  }

  async markNoData(security: SecurityId, date: SnapshotDate): Promise<void> {
    const id = normalizeSecurityId(security);
    this.run('markNoData', () =>
      this.db
        .prepare<[string, string, string]>(
          'INSERT OR REPLACE INTO snapshot_no_data (security, date, recorded_at) VALUES (?, ?, ?)'
        )
        .run(id, assertDate(date), new Date().toISOString())
    );
  }

  async listNoDataDates(security: SecurityId): Promise<SnapshotDate[]> {
    const id = normalizeSecurityId(security);
    const rows = this.run('listNoDataDates', () =>
      this.db
        .prepare<[string], DateRow>('SELECT date FROM snapshot_no_data WHERE security = ? ORDER BY date ASC')
        .all(id)
    );
    return rows.map((row) => row.date);
  }

  /** Test hook for simulating a damaged row. */
  writeRawBody(security: SecurityId, date: SnapshotDate, body: string): void {
    this.run('writeRawBody', () =>
      this.db
        .prepare<[string, string, string, string, string]>(
          'INSERT OR REPLACE INTO snapshots (security, date, body, content_hash, updated_at) VALUES (?, ?, ?, ?, ?)'
        )
        .run(normalizeSecurityId(security), assertDate(date), body, snapshotContentHash(body), new Date().toISOString())
    );
  }

  close(): void {
    if (this.db.open) {
      this.db.close();
      logger.info('Snapshot database closed');
    }
  }
}
