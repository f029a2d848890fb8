/**
 * Ingestion configuration loaded from config/ingestion.json with
 * environment-variable overrides.
 */

import { existsSync, readFileSync } from 'fs';
import { isAbsolute, join } from 'path';
import { ConfigError } from './errors';

export type TlsVerifyMode = 'always' | 'custom-ca' | 'disabled';

export type TlsPolicy =
  | { mode: 'always' }
  | { mode: 'custom-ca'; caPath: string }
  | { mode: 'disabled' };

export type StoreBackend = 'file' | 'sqlite';

export type SourceKind = 'tdcc' | 'simulated';

export interface FetchConfig {
  maxConcurrency: number;
  minIntervalMs: number;
  maxAttempts: number;
  backoffBaseMs: number;
  backoffJitterMs: number;
  requestTimeoutMs: number;
}

export interface SchedulerConfig {
  workerCount: number;
  runDeadlineMs: number | null;
  candidateWeekday: number;
  noDataGraceDays: number;
}

export interface IngestionConfig {
  fetch: FetchConfig;
  scheduler: SchedulerConfig;
  tls: TlsPolicy;
  storeBackend: StoreBackend;
  source: SourceKind;
  dataDir: string;
  projectRoot: string;
}

type Env = Record<string, string | undefined>;

export const DEFAULT_FETCH_CONFIG: FetchConfig = {
  maxConcurrency: 2,
  minIntervalMs: 1000,
  maxAttempts: 3,
  backoffBaseMs: 500,
  backoffJitterMs: 500,
  requestTimeoutMs: 25_000,
};

export const DEFAULT_SCHEDULER_CONFIG: SchedulerConfig = {
  workerCount: 4,
  runDeadlineMs: null,
  // Distribution tables are published for Friday record dates.
  candidateWeekday: 5,
  noDataGraceDays: 14,
};

let cachedConfig: IngestionConfig | null = null;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function readNumber(
  name: string,
  envValue: string | undefined,
  fileValue: unknown,
  fallback: number,
  opts: { min: number; integer?: boolean }
): number {
  let value: number;
  if (envValue !== undefined && envValue.trim() !== '') {
    value = Number(envValue);
  } else if (fileValue !== undefined && fileValue !== null) {
    value = typeof fileValue === 'number' ? fileValue : Number.NaN;
  } else {
    value = fallback;
  }

  if (!Number.isFinite(value) || value < opts.min) {
    throw new ConfigError(`${name} must be a number >= ${opts.min}`);
  }
  if (opts.integer && !Number.isInteger(value)) {
    throw new ConfigError(`${name} must be an integer, got ${value}`);
  }
  return value;
}

function readString(envValue: string | undefined, fileValue: unknown): string | undefined {
  if (envValue !== undefined && envValue.trim() !== '') return envValue.trim();
  if (typeof fileValue === 'string' && fileValue.trim() !== '') return fileValue.trim();
  return undefined;
}

function parseBooleanLike(value: string | undefined): boolean {
  if (!value) return false;
  return ['1', 'true', 'yes', 'y', 'on'].includes(value.trim().toLowerCase());
}

function resolvePath(projectRoot: string, value: string): string {
  return isAbsolute(value) ? value : join(projectRoot, value);
}

/**
 * Builds the TLS verification policy. Disabling verification is only accepted
 * together with ALLOW_INSECURE_TLS=true; a custom CA file must exist.
 */
export function resolveTlsPolicy(
  mode: string | undefined,
  caPath: string | undefined,
  env: Env,
  projectRoot: string
): TlsPolicy {
  const normalized = (mode ?? 'always').toLowerCase();

  if (normalized === 'always') {
    return { mode: 'always' };
  }

  if (normalized === 'custom-ca') {
    if (!caPath) {
      throw new ConfigError('tls_verify=custom-ca requires tls_ca_path');
    }
    const resolved = resolvePath(projectRoot, caPath);
    if (!existsSync(resolved)) {
      throw new ConfigError(`tls_ca_path does not exist: ${resolved}`);
    }
    return { mode: 'custom-ca', caPath: resolved };
  }

  if (normalized === 'disabled') {
    if (!parseBooleanLike(env.ALLOW_INSECURE_TLS)) {
      throw new ConfigError('tls_verify=disabled requires ALLOW_INSECURE_TLS=true');
    }
    return { mode: 'disabled' };
  }

  throw new ConfigError(`Unknown tls_verify mode: ${mode}`);
}

function readChoice<T extends string>(name: string, value: string | undefined, choices: readonly T[], fallback: T): T {
  if (value === undefined) return fallback;
  const match = choices.find((choice) => choice === value.toLowerCase());
  if (!match) {
    throw new ConfigError(`${name} must be one of ${choices.join(', ')}, got ${value}`);
  }
  return match;
}

export function loadIngestionConfig(projectRoot: string = process.cwd(), env: Env = process.env): IngestionConfig {
  const configPath = join(projectRoot, 'config', 'ingestion.json');
  let raw: Record<string, unknown> = {};
  if (existsSync(configPath)) {
    let parsed: unknown;
    try {
      parsed = JSON.parse(readFileSync(configPath, 'utf-8'));
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      throw new ConfigError(`Failed to parse ${configPath}: ${message}`);
    }
    if (!isRecord(parsed)) {
      throw new ConfigError(`${configPath} must contain a JSON object`);
    }
    raw = parsed;
  }

  const fetch: FetchConfig = {
    maxConcurrency: readNumber(
      'max_fetch_concurrency',
      env.INGEST_MAX_FETCH_CONCURRENCY,
      raw.max_fetch_concurrency,
      DEFAULT_FETCH_CONFIG.maxConcurrency,
      { min: 1, integer: true }
    ),
    minIntervalMs: readNumber(
      'min_request_interval_ms',
      env.INGEST_MIN_REQUEST_INTERVAL_MS,
      raw.min_request_interval_ms,
      DEFAULT_FETCH_CONFIG.minIntervalMs,
      { min: 0 }
    ),
    maxAttempts: readNumber(
      'max_retry_attempts',
      env.INGEST_MAX_RETRY_ATTEMPTS,
      raw.max_retry_attempts,
      DEFAULT_FETCH_CONFIG.maxAttempts,
      { min: 1, integer: true }
    ),
    backoffBaseMs: readNumber(
      'backoff_base_ms',
      env.INGEST_BACKOFF_BASE_MS,
      raw.backoff_base_ms,
      DEFAULT_FETCH_CONFIG.backoffBaseMs,
      { min: 0 }
    ),
    backoffJitterMs: readNumber(
      'backoff_jitter_ms',
      env.INGEST_BACKOFF_JITTER_MS,
      raw.backoff_jitter_ms,
      DEFAULT_FETCH_CONFIG.backoffJitterMs,
      { min: 0 }
    ),
    requestTimeoutMs: readNumber(
      'request_timeout_ms',
      env.INGEST_REQUEST_TIMEOUT_MS,
      raw.request_timeout_ms,
      DEFAULT_FETCH_CONFIG.requestTimeoutMs,
      { min: 1 }
    ),
  };

  // null in the file (or no value at all) means the run has no deadline.
  const hasDeadline =
    readString(env.INGEST_RUN_DEADLINE_MS, undefined) !== undefined ||
    (raw.run_deadline_ms !== undefined && raw.run_deadline_ms !== null);
  const runDeadlineMs = hasDeadline
    ? readNumber('run_deadline_ms', env.INGEST_RUN_DEADLINE_MS, raw.run_deadline_ms, 0, { min: 1 })
    : DEFAULT_SCHEDULER_CONFIG.runDeadlineMs;

  const scheduler: SchedulerConfig = {
    workerCount: readNumber(
      'scheduler_worker_count',
      env.INGEST_WORKER_COUNT,
      raw.scheduler_worker_count,
      DEFAULT_SCHEDULER_CONFIG.workerCount,
      { min: 1, integer: true }
    ),
    runDeadlineMs,
    candidateWeekday: readNumber(
      'candidate_weekday',
      env.INGEST_CANDIDATE_WEEKDAY,
      raw.candidate_weekday,
      DEFAULT_SCHEDULER_CONFIG.candidateWeekday,
      { min: 0, integer: true }
    ),
    noDataGraceDays: readNumber(
      'no_data_grace_days',
      env.INGEST_NO_DATA_GRACE_DAYS,
      raw.no_data_grace_days,
      DEFAULT_SCHEDULER_CONFIG.noDataGraceDays,
      { min: 0, integer: true }
    ),
  };
  if (scheduler.candidateWeekday > 6) {
    throw new ConfigError(`candidate_weekday must be 0-6, got ${scheduler.candidateWeekday}`);
  }

  const tls = resolveTlsPolicy(
    readString(env.INGEST_TLS_VERIFY, raw.tls_verify),
    readString(env.INGEST_TLS_CA_PATH, raw.tls_ca_path),
    env,
    projectRoot
  );

  return {
    fetch,
    scheduler,
    tls,
    storeBackend: readChoice<StoreBackend>(
      'store_backend',
      readString(env.INGEST_STORE_BACKEND, raw.store_backend),
      ['file', 'sqlite'],
      'file'
    ),
    source: readChoice<SourceKind>('source', readString(env.INGEST_SOURCE, raw.source), ['tdcc', 'simulated'], 'tdcc'),
    dataDir: resolvePath(projectRoot, readString(env.INGEST_DATA_DIR, raw.data_dir) ?? 'data'),
    projectRoot,
  };
}

export function getIngestionConfig(): IngestionConfig {
  if (!cachedConfig) {
    cachedConfig = loadIngestionConfig();
  }
  return cachedConfig;
}

export function resetIngestionConfig(): void {
  cachedConfig = null;
}
