import axios from 'axios';
import {
  CancelledError,
  IngestionError,
  PermanentFetchError,
  TransientFetchError,
  abortError,
  errorMessage,
} from '@/core/errors';

const TRANSIENT_NETWORK_CODES = new Set([
  'ECONNABORTED',
  'ECONNRESET',
  'ECONNREFUSED',
  'ETIMEDOUT',
  'EAI_AGAIN',
  'ENOTFOUND',
  'EPIPE',
  'ERR_NETWORK',
]);

export function isRetryableStatus(status: number): boolean {
  return status === 408 || status === 429 || status >= 500;
}

/**
 * Maps anything a source throws onto the fetch error taxonomy. Errors that
 * are already classified pass through unchanged; unknown errors count as
 * transient.
 */
export function classifyFetchError(error: unknown, signal?: AbortSignal): IngestionError {
  if (signal?.aborted) {
    return abortError(signal);
  }
  if (error instanceof IngestionError) {
    return error;
  }
  if (axios.isCancel(error)) {
    return new CancelledError(errorMessage(error));
  }
  if (axios.isAxiosError(error)) {
    const status = error.response?.status;
    if (status !== undefined) {
      const message = `HTTP ${status} ${error.response?.statusText ?? ''}`.trim();
      return isRetryableStatus(status)
        ? new TransientFetchError(message, status, error)
        : new PermanentFetchError(message, status, error);
    }
    if (error.code && TRANSIENT_NETWORK_CODES.has(error.code)) {
      return new TransientFetchError(`Network error ${error.code}: ${error.message}`, undefined, error);
    }
    return new TransientFetchError(error.message, undefined, error);
  }
  return new TransientFetchError(errorMessage(error), undefined, error);
}
