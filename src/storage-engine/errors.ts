/**
 * Errors raised by the key-value store. The vector layer passes them
 * through unchanged.
 */

export class StorageError extends Error {
  constructor(message: string) {
    super(message)
    this.name = 'StorageError'
  }
}

/**
 * Thrown by commit when another transaction committed a write into a
 * range this transaction read. Safe to retry.
 */
export class NotCommittedError extends StorageError {
  constructor(
    public readonly readVersion: bigint,
    public readonly conflictingVersion: bigint
  ) {
    super(
      `Transaction read at version ${readVersion} conflicts with commit ${conflictingVersion}`
    )
    this.name = 'NotCommittedError'
  }
}

/**
 * Thrown by commit when the commits needed to check the transaction for
 * conflicts are no longer retained. Safe to retry.
 */
export class TransactionTooOldError extends StorageError {
  constructor(public readonly readVersion: bigint) {
    super(`Transaction read version ${readVersion} is too old to commit`)
    this.name = 'TransactionTooOldError'
  }
}

/**
 * Thrown when a transaction, or a cursor it created, is used after
 * commit or cancel.
 */
export class TransactionClosedError extends StorageError {
  constructor(
    public readonly state: 'committing' | 'committed' | 'cancelled'
  ) {
    super(
      state === 'committing'
        ? 'Transaction is being committed'
        : `Transaction has already been ${state}`
    )
    this.name = 'TransactionClosedError'
  }
}

/**
 * Error thrown when attempting to write to a store opened in read-only mode.
 */
export class ReadOnlyError extends StorageError {
  constructor(message: string = 'Cannot write to a read-only store') {
    super(message)
    this.name = 'ReadOnlyError'
  }
}

export function isRetryableError(
  error: unknown
): error is NotCommittedError | TransactionTooOldError {
  return (
    error instanceof NotCommittedError ||
    error instanceof TransactionTooOldError
  )
}
