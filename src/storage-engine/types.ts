/**
 * Types for the ordered transactional key-value store.
 */

import type { opType } from './constants'

/**
 * Mutation type stored in commit records.
 */
export type OpType = (typeof opType)[keyof typeof opType]

export interface KeyValue {
  key: Uint8Array
  value: Uint8Array
}

/**
 * Half-open key range [begin, end).
 */
export interface KeyRange {
  begin: Uint8Array
  end: Uint8Array
}

export interface RangeReadOptions {
  /** Maximum number of pairs to return (default: 0 = unlimited) */
  limit?: number
  /** Iterate from the end of the range towards its beginning (default: false) */
  reverse?: boolean
}

/**
 * A single staged write.
 */
export type Mutation =
  | { op: typeof opType.set; key: Uint8Array; value: Uint8Array }
  | { op: typeof opType.clear; key: Uint8Array }
  | { op: typeof opType.clearRange; begin: Uint8Array; end: Uint8Array }

/**
 * The contract a store must satisfy for vectors to run on it.
 *
 * Reads suspend on store round-trips. Writes are staged in the
 * transaction and become visible to its own later reads immediately,
 * and to everyone else when it commits.
 */
export interface KeyValueTransaction {
  /** Largest key less than or equal to `key`, or null when there is none. */
  getKeyAtOrBefore(key: Uint8Array): Promise<Uint8Array | null>
  get(key: Uint8Array): Promise<Uint8Array | null>
  /** Lazily yields pairs with begin <= key < end in key order. */
  getRange(
    begin: Uint8Array,
    end: Uint8Array,
    options?: RangeReadOptions
  ): AsyncIterable<KeyValue>
  set(key: Uint8Array, value: Uint8Array): void
  clear(key: Uint8Array): void
  clearRange(begin: Uint8Array, end: Uint8Array): void
}

/**
 * A committed batch of mutations as written to the data file.
 */
export interface CommitRecord {
  commitVersion: bigint
  /** Unix timestamp in milliseconds when the commit was written */
  timestamp: bigint
  mutations: Mutation[]
}

/**
 * WAL entry structure.
 * Fixed 48 bytes on disk, points to a commit record in the data file.
 */
export interface WalEntry {
  /** Version assigned to the commit */
  commitVersion: bigint
  /** Offset in data file where the commit record starts */
  offset: number
  /** Length of the commit record in bytes */
  length: number
  /** CRC32 of the commit record, checked during replay */
  recordChecksum: number
}

/**
 * Options for creating a storage engine.
 */
export interface StorageEngineOptions {
  /** Path to the data file. When omitted the store lives in memory only. */
  dataPath?: string
  /** Lock acquisition timeout in milliseconds (default: 10000). Use 0 to fail immediately. */
  lockTimeout?: number
  /** Open the store in read-only mode (default: false). Commits with writes are rejected. */
  readOnly?: boolean
  /** Number of recent commits kept for conflict detection (default: 1000) */
  maxCommitHistory?: number
}

/**
 * Options for the retrying `transact` helper.
 */
export interface TransactOptions {
  /** Retries after a conflict before the error is rethrown (default: 10) */
  maxRetries?: number
}

export interface DeserializeCommitResult {
  record: CommitRecord
  bytesRead: number
}

export interface DeserializeWalResult {
  entry: WalEntry
  bytesRead: number
}

export interface DataFileHeader {
  version: number
}
