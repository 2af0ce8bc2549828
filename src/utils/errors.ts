/**
 * Verbatim Sync - Error Utilities
 *
 * Error types raised by the sync client and the polling integration.
 *
 * @version 1.0.0
 */

// =============================================================================
// BASE ERROR CLASS
// =============================================================================

export class SyncError extends Error {
  public readonly code: string;
  public readonly details?: Record<string, unknown>;
  public readonly timestamp: number;

  constructor(code: string, message: string, details?: Record<string, unknown>) {
    super(message);
    this.name = 'SyncError';
    this.code = code;
    this.details = details;
    this.timestamp = Date.now();

    // Ensure proper prototype chain
    Object.setPrototypeOf(this, new.target.prototype);
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      details: this.details,
      timestamp: this.timestamp,
    };
  }
}

// =============================================================================
// REQUEST FAILURES
// =============================================================================

/**
 * A sync request did not succeed: either the transport failed or the
 * remote service answered with a non-2xx status.
 */
export class RequestFailedError extends SyncError {
  public readonly status?: number;
  public readonly body?: string;

  constructor(
    message: string,
    status?: number,
    body?: string,
    code: string = 'REQUEST_FAILED'
  ) {
    super(code, message, { status });
    this.name = 'RequestFailedError';
    this.status = status;
    this.body = body;
  }

  toJSON(): Record<string, unknown> {
    return { ...super.toJSON(), status: this.status, body: this.body };
  }
}

/**
 * Transport-level failure (DNS, refused connection, reset socket), either
 * before any answer arrived or while the answer body was being read.
 */
export class ConnectionError extends RequestFailedError {
  public readonly originalError?: Error;

  constructor(message: string, originalError?: Error, status?: number) {
    super(message, status, undefined, 'CONNECTION_ERROR');
    this.name = 'ConnectionError';
    this.originalError = originalError;
  }
}

/**
 * The remote service rejected the batch with a 400.
 */
export class InvalidBatchError extends RequestFailedError {
  constructor(message: string, body?: string) {
    super(message, 400, body, 'INVALID_BATCH');
    this.name = 'InvalidBatchError';
  }
}

export class NoSuchDatasetError extends RequestFailedError {
  constructor(message: string, body?: string) {
    super(message, 404, body, 'NO_SUCH_DATASET');
    this.name = 'NoSuchDatasetError';
  }
}

export class RateLimitedError extends RequestFailedError {
  constructor(message: string, body?: string) {
    super(message, 429, body, 'RATE_LIMITED');
    this.name = 'RateLimitedError';
  }
}

/**
 * Any other non-2xx answer, or a 2xx answer whose body cannot be read.
 */
export class BackendError extends RequestFailedError {
  constructor(message: string, status?: number, body?: string) {
    super(message, status, body, 'BACKEND_ERROR');
    this.name = 'BackendError';
  }
}

// =============================================================================
// LOCAL ERRORS
// =============================================================================

/**
 * Input rejected before anything was sent: an empty or malformed batch,
 * a bad dataset name, bad configuration or an unknown flag.
 */
export class ValidationError extends SyncError {
  public readonly field?: string;

  constructor(message: string, options: { field?: string } = {}) {
    super('VALIDATION_ERROR', message, { field: options.field });
    this.name = 'ValidationError';
    this.field = options.field;
  }
}

// =============================================================================
// INTEGRATION ERRORS
// =============================================================================

export class EmptyDatasetError extends SyncError {
  public readonly dataset: string;

  constructor(dataset: string) {
    super('EMPTY_DATASET', `Dataset \`${dataset}\` is empty.`, { dataset });
    this.name = 'EmptyDatasetError';
    this.dataset = dataset;
  }
}

/**
 * Raised by the poll loop once too many polls in a row have failed.
 */
export class PollerAbortedError extends SyncError {
  public readonly consecutiveFailures: number;
  public readonly lastError?: unknown;

  constructor(consecutiveFailures: number, lastError?: unknown) {
    super(
      'POLLER_ABORTED',
      `Too many consecutive failures (${consecutiveFailures}), quitting.`,
      { consecutiveFailures }
    );
    this.name = 'PollerAbortedError';
    this.consecutiveFailures = consecutiveFailures;
    this.lastError = lastError;
  }
}

// =============================================================================
// ERROR UTILITIES
// =============================================================================

export function isSyncError(error: unknown): error is SyncError {
  return error instanceof SyncError;
}

export function isRequestFailed(error: unknown): error is RequestFailedError {
  return error instanceof RequestFailedError;
}

/**
 * Extract a printable message from anything thrown.
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
