/**
 * Error taxonomy shared by the store, fetch, scheduling and resolver layers.
 *
 * Every error carries a stable `code` so callers (and the ingestion report)
 * can branch on the kind of failure without `instanceof` chains.
 */

export type IngestionErrorCode =
  | 'NOT_FOUND'
  | 'CORRUPT_RECORD'
  | 'IO_FAILURE'
  | 'NO_DATA'
  | 'TRANSIENT'
  | 'PERMANENT'
  | 'DEADLINE_EXCEEDED'
  | 'CANCELLED'
  | 'NO_DATA_AVAILABLE'
  | 'OUT_OF_TOLERANCE'
  | 'CONFIG';

export class IngestionError extends Error {
  constructor(
    message: string,
    public readonly code: IngestionErrorCode,
    cause?: unknown
  ) {
    super(message, cause === undefined ? undefined : { cause });
    this.name = 'IngestionError';
  }
}

// Store layer

export class NotFoundError extends IngestionError {
  constructor(
    public readonly security: string,
    public readonly date: string
  ) {
    super(`No snapshot stored for ${security} on ${date}`, 'NOT_FOUND');
    this.name = 'NotFoundError';
  }
}

export class CorruptRecordError extends IngestionError {
  constructor(
    public readonly security: string,
    public readonly date: string,
    public readonly errors: string[]
  ) {
    super(`Corrupt snapshot record for ${security} on ${date}: ${errors.join('; ')}`, 'CORRUPT_RECORD');
    this.name = 'CorruptRecordError';
  }
}

export class IOFailureError extends IngestionError {
  constructor(
    message: string,
    public readonly operation: string,
    cause?: unknown
  ) {
    super(message, 'IO_FAILURE', cause);
    this.name = 'IOFailureError';
  }
}

// Fetch / scheduling layer

export class NoDataError extends IngestionError {
  constructor(message: string) {
    super(message, 'NO_DATA');
    this.name = 'NoDataError';
  }
}

export class TransientFetchError extends IngestionError {
  constructor(
    message: string,
    public readonly status?: number,
    cause?: unknown
  ) {
    super(message, 'TRANSIENT', cause);
    this.name = 'TransientFetchError';
  }
}

export class PermanentFetchError extends IngestionError {
  constructor(
    message: string,
    public readonly status?: number,
    cause?: unknown
  ) {
    super(message, 'PERMANENT', cause);
    this.name = 'PermanentFetchError';
  }
}

export class DeadlineExceededError extends IngestionError {
  constructor(message = 'Run deadline exceeded') {
    super(message, 'DEADLINE_EXCEEDED');
    this.name = 'DeadlineExceededError';
  }
}

export class CancelledError extends IngestionError {
  constructor(message = 'Run cancelled') {
    super(message, 'CANCELLED');
    this.name = 'CancelledError';
  }
}

// Resolver layer

export class NoDataAvailableError extends IngestionError {
  constructor(
    public readonly security: string,
    detail?: string
  ) {
    super(
      detail ? `No snapshot dates available for ${security}: ${detail}` : `No snapshot dates available for ${security}`,
      'NO_DATA_AVAILABLE'
    );
    this.name = 'NoDataAvailableError';
  }
}

export class OutOfToleranceError extends IngestionError {
  constructor(
    public readonly security: string,
    public readonly target: string,
    public readonly candidate: string,
    public readonly distanceDays: number,
    public readonly maxToleranceDays: number
  ) {
    super(
      `Closest snapshot for ${security} is ${candidate}, ${distanceDays} days from ${target} (tolerance ${maxToleranceDays})`,
      'OUT_OF_TOLERANCE'
    );
    this.name = 'OutOfToleranceError';
  }
}

export class ConfigError extends IngestionError {
  constructor(message: string) {
    super(message, 'CONFIG');
    this.name = 'ConfigError';
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Maps an abort reason to the matching terminal error. Deadline aborts carry a
 * DeadlineExceededError as their reason; anything else counts as cancellation.
 */
export function abortError(signal: AbortSignal): DeadlineExceededError | CancelledError {
  const reason: unknown = signal.reason;
  if (reason instanceof DeadlineExceededError || reason instanceof CancelledError) {
    return reason;
  }
  return new CancelledError(reason instanceof Error ? reason.message : undefined);
}
