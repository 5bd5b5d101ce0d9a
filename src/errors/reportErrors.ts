/**
 * Report Errors
 *
 * Domain errors for the report pipeline. They extend AppError so the
 * global error handler maps them to HTTP responses without special cases.
 */

import { AppError } from './AppError';

export const REPORT_CONTENT_REQUIRED = 'Report content is required';

/** Submitted content was empty or absent. Declined, not fatal. */
export class EmptyContentError extends AppError {
  constructor(message: string = REPORT_CONTENT_REQUIRED) {
    super(message, 400, 'EMPTY_CONTENT');
    this.name = 'EmptyContentError';
  }
}

/** Persisting a report failed (disk full, permission denied, …). Not retried. */
export class StorageError extends AppError {
  constructor(cause: unknown) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super(`Failed to save weekly report: ${reason}`, 500, 'STORAGE_ERROR', { cause: reason });
    this.name = 'StorageError';
  }
}

/**
 * Writing to one subscriber's transport failed. Isolated to that
 * subscriber's session; never surfaced to publishers.
 */
export class TransportError extends AppError {
  constructor(
    public readonly subscriberId: string,
    cause: unknown,
  ) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super(`Transport write failed for subscriber ${subscriberId}: ${reason}`, 500, 'TRANSPORT_ERROR');
    this.name = 'TransportError';
  }
}
