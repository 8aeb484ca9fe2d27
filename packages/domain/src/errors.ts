export type StoreErrorCode = 'store_unavailable' | 'store_operation_failed';

/** Raised when an operation needs the store and none is configured. */
export class StoreUnavailableError extends Error {
  readonly code: StoreErrorCode = 'store_unavailable';

  constructor(message = 'Database not configured') {
    super(message);
    this.name = 'StoreUnavailableError';
  }
}

/** Raised when a configured store rejects or times out a query. */
export class StoreOperationFailedError extends Error {
  readonly code: StoreErrorCode = 'store_operation_failed';

  constructor(operation: string, cause: unknown) {
    super(`${operation} failed: ${cause instanceof Error ? cause.message : String(cause)}`, { cause });
    this.name = 'StoreOperationFailedError';
  }
}

export type StoreError = StoreUnavailableError | StoreOperationFailedError;

export function isStoreError(err: unknown): err is StoreError {
  return err instanceof StoreUnavailableError || err instanceof StoreOperationFailedError;
}
