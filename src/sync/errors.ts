// Error taxonomy for the sync engine

export type SyncErrorCode =
  | "AUTH_FAILED"
  | "RATE_LIMITED"
  | "REMOTE_ERROR"
  | "MALFORMED_RECORD"
  | "LOCAL_STORE_ERROR"
  | "SYNC_IN_PROGRESS";

export class SyncError extends Error {
  constructor(
    message: string,
    public readonly code: SyncErrorCode,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = "SyncError";
  }
}

/** Credentials missing, invalid or expired. Fatal to the run. */
export class AuthFailedError extends SyncError {
  constructor(message: string) {
    super(message, "AUTH_FAILED");
    this.name = "AuthFailedError";
  }
}

/** HTTP 429. The run pauses and can be resumed after `retryAfterSeconds`. */
export class RateLimitedError extends SyncError {
  constructor(public readonly retryAfterSeconds: number = 60) {
    super(`Rate limit exceeded. Retry after ${retryAfterSeconds}s`, "RATE_LIMITED");
    this.name = "RateLimitedError";
  }
}

/**
 * Any other failed remote call. Status 0 means the request never got a
 * response (timeout, connection reset).
 */
export class RemoteError extends SyncError {
  constructor(
    public readonly status: number,
    public readonly body: string,
    options?: { cause?: unknown }
  ) {
    super(
      status === 0 ? `Discogs request failed: ${body}` : `Discogs API error ${status}: ${body}`,
      "REMOTE_ERROR",
      options
    );
    this.name = "RemoteError";
  }
}

export class MalformedRecordError extends SyncError {
  constructor(what: string, details: string) {
    super(`Malformed ${what}: ${details}`, "MALFORMED_RECORD");
    this.name = "MalformedRecordError";
  }
}

export class LocalStoreError extends SyncError {
  constructor(operation: string, cause: unknown) {
    super(`Local store failed during ${operation}: ${errorMessage(cause)}`, "LOCAL_STORE_ERROR", { cause });
    this.name = "LocalStoreError";
  }
}

/** A run for the same user and resource kind is already live. */
export class SyncInProgressError extends SyncError {
  constructor(kind: string) {
    super(`A ${kind} sync is already running`, "SYNC_IN_PROGRESS");
    this.name = "SyncInProgressError";
  }
}

export function isSyncError(error: unknown): error is SyncError {
  return error instanceof SyncError;
}

/** Errors that end the whole run instead of just the current record. */
export function isFatalRecordError(error: unknown): boolean {
  return error instanceof AuthFailedError || error instanceof LocalStoreError;
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
