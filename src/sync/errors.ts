// pattern: Functional Core

/**
 * Upstream transport or payload failure for one page request. Retryable by a
 * later run; the orchestrator records it and stops paging the account.
 */
export class FetchError extends Error {
  override readonly name = "FetchError";
  readonly feedId: string;
  readonly cursor: string | null;
  readonly status: number | null;
  readonly retryable: boolean;

  constructor(
    message: string,
    details: {
      readonly feedId: string;
      readonly cursor: string | null;
      readonly status?: number | null;
      readonly retryable?: boolean;
      readonly cause?: unknown;
    },
  ) {
    super(message, { cause: details.cause });
    this.feedId = details.feedId;
    this.cursor = details.cursor;
    this.status = details.status ?? null;
    this.retryable = details.retryable ?? false;
  }
}

/**
 * A store constraint violation the update path cannot resolve. Treated as a
 * data-integrity bug: the run is marked failed.
 */
export class MergeConflictError extends Error {
  override readonly name = "MergeConflictError";
  readonly feedId: string;
  readonly guid: string;

  constructor(feedId: string, guid: string, cause: unknown) {
    const detail = cause instanceof Error ? cause.message : String(cause);
    super(`merge conflict for ${feedId}/${guid}: ${detail}`, { cause });
    this.feedId = feedId;
    this.guid = guid;
  }
}

export class SyncInProgressError extends Error {
  override readonly name = "SyncInProgressError";
  readonly feedId: string;

  constructor(feedId: string) {
    super(`a sync run is already in progress for ${feedId}`);
    this.feedId = feedId;
  }
}

export class AccountNotFoundError extends Error {
  override readonly name = "AccountNotFoundError";
  readonly feedId: string;

  constructor(feedId: string) {
    super(`account not found: ${feedId}`);
    this.feedId = feedId;
  }
}

export class AccountExistsError extends Error {
  override readonly name = "AccountExistsError";
  readonly feedId: string;

  constructor(feedId: string) {
    super(`account already exists: ${feedId}`);
    this.feedId = feedId;
  }
}

/**
 * Cooperative cancellation. Not a failure: a cancelled run ends `partial`.
 */
export class SyncCancelledError extends Error {
  override readonly name = "SyncCancelledError";

  constructor(message = "sync cancelled") {
    super(message);
  }
}

/** Errors a caller made, as opposed to failures of the run itself. */
export function isUsageError(
  err: unknown,
): err is SyncInProgressError | AccountNotFoundError | AccountExistsError {
  return (
    err instanceof SyncInProgressError ||
    err instanceof AccountNotFoundError ||
    err instanceof AccountExistsError
  );
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
