/**
 * Directory-per-security, file-per-date snapshot store.
 *
 * Layout:
 *   <rootDir>/<SECURITY>/<YYYY-MM-DD>.json    snapshot record
 *   <rootDir>/<SECURITY>/<YYYY-MM-DD>.nodata  "source has no disclosure" marker
 *
 * Writes go to a uniquely named temp file in the same directory and are renamed
 * into place, so readers see either the previous record or the new one.
 */

import { randomUUID } from 'crypto';
import type { Dirent } from 'fs';
import { mkdir, readFile, readdir, rename, rm, stat, writeFile } from 'fs/promises';
import { join } from 'path';
import { normalizeSecurityId } from '@/core/universe';
import { isSnapshotDate } from '@/core/time';
import {
  CorruptRecordError,
  IngestionError,
  IOFailureError,
  NotFoundError,
  errorMessage,
} from '@/core/errors';
import { createChildLogger } from '@/utils/logger';
import { isEnoent } from '@/utils/fs_errors';
import { validateSnapshot } from '@/validation/ajv_instance';
import { serializeSnapshot, snapshotContentHash } from './serialize';
import type { PutResult, SnapshotStore, StoreReadResult } from './types';
import type { OwnershipSnapshot, SecurityId, SnapshotDate } from '@/types/snapshot';

const logger = createChildLogger('file_store');

const RECORD_EXT = '.json';
const NO_DATA_EXT = '.nodata';

function assertDate(date: SnapshotDate): SnapshotDate {
  if (!isSnapshotDate(date)) {
    throw new Error(`Invalid snapshot date: ${date}`);
  }
  return date;
}

function datesWithExtension(entries: string[], ext: string): SnapshotDate[] {
  const dates = new Set<SnapshotDate>();
  for (const entry of entries) {
    if (!entry.endsWith(ext)) continue;
    const stem = entry.slice(0, -ext.length);
    if (isSnapshotDate(stem)) {
      dates.add(stem);
    }
  }
  return Array.from(dates).sort();
}

export class FileSnapshotStore implements SnapshotStore {
  readonly kind = 'file';

  constructor(private readonly rootDir: string) {}

  private securityDir(security: SecurityId): string {
    return join(this.rootDir, normalizeSecurityId(security));
  }

  private recordPath(security: SecurityId, date: SnapshotDate): string {
    return join(this.securityDir(security), `${assertDate(date)}${RECORD_EXT}`);
  }

  private noDataPath(security: SecurityId, date: SnapshotDate): string {
    return join(this.securityDir(security), `${assertDate(date)}${NO_DATA_EXT}`);
  }

  private async readIfExists(filePath: string): Promise<string | null> {
    try {
      return await readFile(filePath, 'utf-8');
    } catch (error) {
      if (isEnoent(error)) return null;
      throw error;
    }
  }

  private async listDir(dir: string): Promise<string[]> {
    try {
      return await readdir(dir);
    } catch (error) {
      if (isEnoent(error)) return [];
      throw new IOFailureError(`Failed to list ${dir}: ${errorMessage(error)}`, 'list', error);
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
    const filePath = this.recordPath(security, date);
    const key = { security, date };

    try {
      await mkdir(this.securityDir(security), { recursive: true });

      const existing = await this.readIfExists(filePath);
      if (existing === body) {
        return { status: 'unchanged', key, contentHash };
      }

      const tmpPath = `${filePath}.${process.pid}.${randomUUID()}.tmp`;
      try {
        await writeFile(tmpPath, body, 'utf-8');
        await rename(tmpPath, filePath);
      } catch (error) {
        await rm(tmpPath, { force: true });
        throw error;
      }

      await rm(this.noDataPath(security, date), { force: true });
    } catch (error) {
      if (error instanceof IngestionError) throw error;
      throw new IOFailureError(`Failed to write ${filePath}: ${errorMessage(error)}`, 'put', error);
    }

    logger.debug({ security, date, contentHash }, 'Snapshot written');
    return { status: 'written', key, contentHash };
  }

  async exists(security: SecurityId, date: SnapshotDate): Promise<boolean> {
    const filePath = this.recordPath(security, date);
    try {
      const info = await stat(filePath);
      return info.isFile();
    } catch (error) {
      if (isEnoent(error)) return false;
      throw new IOFailureError(`Failed to stat ${filePath}: ${errorMessage(error)}`, 'exists', error);
    }
  }

  async listDates(security: SecurityId): Promise<SnapshotDate[]> {
    return datesWithExtension(await this.listDir(this.securityDir(security)), RECORD_EXT);
  }

  async read(security: SecurityId, date: SnapshotDate): Promise<StoreReadResult> {
    const id = normalizeSecurityId(security);
    const filePath = this.recordPath(id, date);

    let raw: string | null;
    try {
      raw = await this.readIfExists(filePath);
    } catch (error) {
      throw new IOFailureError(`Failed to read ${filePath}: ${errorMessage(error)}`, 'read', error);
    }
    if (raw === null) {
      return { status: 'not_found' };
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(raw);
    } catch (error) {
      logger.warn({ security: id, date, filePath }, 'Snapshot record is not valid JSON');
      return { status: 'corrupt', errors: [`invalid JSON: ${errorMessage(error)}`] };
    }

    const validation = validateSnapshot(parsed);
    if (!validation.valid || !validation.data) {
      logger.warn({ security: id, date, errors: validation.errors }, 'Snapshot record failed validation');
      return { status: 'corrupt', errors: validation.errors ?? [] };
    }

    const snapshot = validation.data;
    if (snapshot.security !== id || snapshot.date !== date) {
      return {
        status: 'corrupt',
        errors: [`record key ${snapshot.security}@${snapshot.date} does not match ${id}@${date}`],
      };
    }

    return { status: 'ok', snapshot };
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
    let entries: Dirent[];
    try {
      entries = await readdir(this.rootDir, { withFileTypes: true });
    } catch (error) {
      if (isEnoent(error)) return [];
      throw new IOFailureError(`Failed to list ${this.rootDir}: ${errorMessage(error)}`, 'list', error);
    }
    return entries
      .filter((entry) => entry.isDirectory())
      .map((entry) => entry.name)
      .sort();
  }

  async markNoData(security: SecurityId, date: SnapshotDate): Promise<void> {
    const markerPath = this.noDataPath(security, date);
    try {
      await mkdir(this.securityDir(security), { recursive: true });
      await writeFile(markerPath, `${JSON.stringify({ date, recordedAt: new Date().toISOString() })}\n`, 'utf-8');
    } catch (error) {
      throw new IOFailureError(`Failed to write ${markerPath}: ${errorMessage(error)}`, 'markNoData', error);
    }
  }

  async listNoDataDates(security: SecurityId): Promise<SnapshotDate[]> {
    return datesWithExtension(await this.listDir(this.securityDir(security)), NO_DATA_EXT);
  }

  close(): void {
    // Nothing held open between calls.
  }
}
