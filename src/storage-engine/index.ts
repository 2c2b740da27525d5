/**
 * Storage Engine module - ordered transactional key-value store with
 * WAL-based durability.
 */

// Main classes
export { StorageEngine, storePaths } from './storage-engine'
export type { StorePaths } from './storage-engine'
export { Transaction, writeRangeOf } from './transaction'
export { Subspace } from './subspace'
export { Wal } from './wal'
export { KeyIndex } from './key-index'
export { FileLock, DatabaseLockedError, LockPermissionError } from './file-lock'
export { Mutex } from './mutex'

// Errors
export {
  StorageError,
  NotCommittedError,
  TransactionTooOldError,
  TransactionClosedError,
  ReadOnlyError,
  isRetryableError
} from './errors'

// Types
export type { TransactionHost, TransactionState } from './transaction'
export type {
  OpType,
  KeyValue,
  KeyRange,
  RangeReadOptions,
  Mutation,
  KeyValueTransaction,
  CommitRecord,
  WalEntry,
  StorageEngineOptions,
  TransactOptions,
  DeserializeCommitResult,
  DeserializeWalResult,
  DataFileHeader
} from './types'

// Constants
export {
  recordMagic,
  recordTrailer,
  headerMagic,
  headerVersion,
  headerSize,
  walEntrySize,
  opType,
  fileExtensions
} from './constants'

// Key helpers
export {
  compareKeys,
  keysEqual,
  keyAfter,
  concatBytes,
  inRange,
  rangesIntersect,
  formatKey
} from './keys'

// Serialization utilities
export {
  serializeCommitRecord,
  deserializeCommitRecord,
  serializeHeader,
  deserializeHeader,
  calculateRecordSize,
  crc32
} from './data-format'

export { serializeWalEntry, deserializeWalEntry } from './wal-format'
