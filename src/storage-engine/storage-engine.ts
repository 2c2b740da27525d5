/**
 * Storage Engine - ordered transactional key-value store.
 *
 * Committed state lives in an in-memory sorted index. Durable stores
 * implement the commit path: lock → replay foreign commits → conflict
 * check → data → fsync → WAL → fsync → index → unlock. On open the index
 * is rebuilt by replaying the WAL.
 *
 * Uses operation-level locking: the lock file is held only while a
 * commit is written, never for the engine lifetime.
 */

import { open, stat, mkdir, truncate } from 'node:fs/promises'
import type { FileHandle } from 'node:fs/promises'
import { dirname } from 'node:path'
import { logger } from '../logger'
import {
  defaultLockTimeout,
  defaultMaxCommitHistory,
  defaultMaxRetries,
  fileExtensions,
  headerSize,
  headerVersion,
  walEntrySize
} from './constants'
import {
  crc32,
  deserializeCommitRecord,
  deserializeHeader,
  serializeCommitRecord,
  serializeHeader
} from './data-format'
import {
  NotCommittedError,
  ReadOnlyError,
  StorageError,
  TransactionTooOldError,
  isRetryableError
} from './errors'
import { FileLock } from './file-lock'
import { KeyIndex } from './key-index'
import { rangesIntersect } from './keys'
import { Mutex } from './mutex'
import { Transaction, writeRangeOf } from './transaction'
import type { TransactionHost } from './transaction'
import { Wal } from './wal'
import type {
  KeyRange,
  Mutation,
  StorageEngineOptions,
  TransactOptions
} from './types'

interface CommittedWrites {
  version: bigint
  writeRanges: KeyRange[]
}

export interface StorePaths {
  dataPath: string
  walPath: string
  lockPath: string
}

interface DurableFiles extends StorePaths {
  wal: Wal
}

/**
 * Data, WAL and lock file paths for a store. Any extension on `dataPath`
 * is replaced.
 */
export function storePaths(dataPath: string): StorePaths {
  const basePath = dataPath.replace(/\.[^./\\]+$/, '')
  return {
    dataPath: basePath + fileExtensions.data,
    walPath: basePath + fileExtensions.wal,
    lockPath: basePath + fileExtensions.lock
  }
}

export class StorageEngine implements TransactionHost {
  private readonly files: DurableFiles | null
  private readonly lockTimeout: number
  private readonly readOnly: boolean
  private readonly maxCommitHistory: number
  private readonly commitMutex: Mutex

  private index: KeyIndex
  private version = 0n
  private history: CommittedWrites[] = []
  // Commits at or below this version are no longer in `history`
  private historyFloor = 0n
  private walOffset = 0
  // WAL size when replay last stopped at an invalid entry or record
  private stalledWalSize: number | null = null
  private dataHandle: FileHandle | null = null
  private closed = false

  private constructor(
    files: DurableFiles | null,
    lockTimeout: number,
    readOnly: boolean,
    maxCommitHistory: number
  ) {
    this.files = files
    this.lockTimeout = lockTimeout
    this.readOnly = readOnly
    this.maxCommitHistory = maxCommitHistory
    this.commitMutex = new Mutex()
    this.index = KeyIndex.create()
  }

  /**
   * Create an in-memory store, or open a durable one when `dataPath` is
   * given. Durable stores are recovered from their WAL.
   *
   * Opening does NOT acquire the lock file.
   */
  static async create(
    options: StorageEngineOptions = {}
  ): Promise<StorageEngine> {
    const lockTimeout = options.lockTimeout ?? defaultLockTimeout
    const readOnly = options.readOnly ?? false
    const maxCommitHistory = options.maxCommitHistory ?? defaultMaxCommitHistory

    if (!Number.isInteger(maxCommitHistory) || maxCommitHistory < 1) {
      throw new StorageError('maxCommitHistory must be a positive integer')
    }

    if (options.dataPath === undefined) {
      return new StorageEngine(null, lockTimeout, readOnly, maxCommitHistory)
    }

    const { dataPath, walPath, lockPath } = storePaths(options.dataPath)

    if (!readOnly) {
      await mkdir(dirname(dataPath), { recursive: true })
    } else {
      const dataExists = await stat(dataPath).catch(() => null)
      const walExists = await stat(walPath).catch(() => null)
      if (!dataExists && !walExists) {
        throw new StorageError(
          `Cannot open store in read-only mode: no store exists at ${dataPath}`
        )
      }
    }

    await StorageEngine.checkHeader(dataPath)

    const engine = new StorageEngine(
      { dataPath, walPath, lockPath, wal: new Wal(walPath) },
      lockTimeout,
      readOnly,
      maxCommitHistory
    )

    const recovered = await engine.replay(false)
    // No transaction can predate recovery
    engine.historyFloor = engine.version
    logger.debug('store.open', {
      message: dataPath,
      details: { commits: recovered, version: engine.version, readOnly }
    })

    return engine
  }

  /**
   * Reject files that exist but were not written by this store.
   */
  private static async checkHeader(dataPath: string): Promise<void> {
    let fileHandle: FileHandle
    try {
      fileHandle = await open(dataPath, 'r')
    } catch {
      // File doesn't exist = fresh store
      return
    }

    try {
      const buffer = new Uint8Array(headerSize)
      const { bytesRead } = await fileHandle.read(buffer, 0, headerSize, 0)
      if (bytesRead === 0) {
        return
      }

      const header = deserializeHeader(buffer.subarray(0, bytesRead))
      if (!header) {
        throw new StorageError(`Not a kv-vector data file: ${dataPath}`)
      }
      if (header.version !== headerVersion) {
        throw new StorageError(
          `Unsupported data file version ${header.version}: ${dataPath}`
        )
      }
    } finally {
      await fileHandle.close()
    }
  }

  /**
   * Begin a transaction reading the latest committed state.
   */
  createTransaction(): Transaction {
    this.assertOpen()
    return new Transaction(this, this.index, this.version)
  }

  /**
   * Run `fn` in a fresh transaction and commit it, retrying when the
   * commit conflicts. Any other error cancels the transaction and is
   * rethrown.
   */
  async transact<T>(
    fn: (tx: Transaction) => Promise<T> | T,
    options: TransactOptions = {}
  ): Promise<T> {
    const maxRetries = options.maxRetries ?? defaultMaxRetries

    for (let attempt = 0; ; attempt++) {
      if (this.files) {
        await this.refresh()
      }

      const tx = this.createTransaction()
      try {
        const result = await fn(tx)
        await tx.commit()
        return result
      } catch (error) {
        tx.cancel()
        if (!isRetryableError(error) || attempt >= maxRetries) {
          throw error
        }
        logger.debug('transact.retry', {
          message: error.message,
          details: { attempt: attempt + 1, maxRetries }
        })
      }
    }
  }

  /**
   * Apply commits other processes appended to the WAL since the last
   * replay. No-op for in-memory stores.
   */
  async refresh(): Promise<void> {
    this.assertOpen()
    await this.commitMutex.runExclusive(async () => {
      await this.replay(true)
    })
  }

  /**
   * Commit a transaction's writes. Called through Transaction.commit().
   */
  async commit(transaction: Transaction): Promise<void> {
    this.assertOpen()

    const mutations = transaction.getMutations()
    if (mutations.length === 0) {
      return
    }

    if (this.readOnly) {
      throw new ReadOnlyError()
    }

    await this.commitMutex.runExclusive(async () => {
      const files = this.files
      if (!files) {
        this.checkConflicts(transaction)
        this.applyCommit(this.version + 1n, mutations)
        return
      }

      const fileLock = new FileLock(files.lockPath, this.lockTimeout)
      await fileLock.runExclusive(async () => {
        await this.replay(true)
        this.checkConflicts(transaction)

        const commitVersion = this.version + 1n
        await this.appendCommit(files, commitVersion, mutations)
        this.applyCommit(commitVersion, mutations)
      })
    })
  }

  /**
   * Get the version of the latest commit.
   */
  getVersion(): bigint {
    return this.version
  }

  isReadOnly(): boolean {
    return this.readOnly
  }

  isDurable(): boolean {
    return this.files !== null
  }

  /**
   * Close the storage engine. Open transactions can no longer commit.
   */
  async close(): Promise<void> {
    this.closed = true
    if (this.dataHandle) {
      await this.dataHandle.close()
      this.dataHandle = null
    }
    if (this.files) {
      await this.files.wal.close()
    }
  }

  private checkConflicts(transaction: Transaction): void {
    const readVersion = transaction.readVersion
    if (readVersion < this.historyFloor) {
      logger.debug('commit.too-old', {
        details: { readVersion, historyFloor: this.historyFloor }
      })
      throw new TransactionTooOldError(readVersion)
    }

    const readRanges = transaction.getReadRanges()
    for (const commit of this.history) {
      if (commit.version <= readVersion) {
        continue
      }
      for (const written of commit.writeRanges) {
        if (readRanges.some((read) => rangesIntersect(read, written))) {
          logger.debug('commit.conflict', {
            details: { readVersion, conflictingVersion: commit.version }
          })
          throw new NotCommittedError(readVersion, commit.version)
        }
      }
    }
  }

  private applyCommit(
    commitVersion: bigint,
    mutations: readonly Mutation[]
  ): void {
    const next = this.index.clone()
    for (const mutation of mutations) {
      next.apply(mutation)
    }
    this.index = next
    this.version = commitVersion
    this.recordHistory(commitVersion, mutations)
  }

  private recordHistory(
    commitVersion: bigint,
    mutations: readonly Mutation[]
  ): void {
    this.history.push({
      version: commitVersion,
      writeRanges: mutations.map(writeRangeOf)
    })

    while (this.history.length > this.maxCommitHistory) {
      const dropped = this.history.shift()
      if (dropped) {
        this.historyFloor = dropped.version
      }
    }
  }

  /**
   * Apply WAL entries past `walOffset` to the index.
   * Returns the number of commits applied.
   */
  private async replay(recordHistory: boolean): Promise<number> {
    const files = this.files
    if (!files) {
      return 0
    }

    const walSize = (await stat(files.walPath).catch(() => null))?.size ?? 0
    if (walSize === this.stalledWalSize) {
      return 0
    }
    this.stalledWalSize = null

    let dataHandle: FileHandle
    try {
      dataHandle = await open(files.dataPath, 'r')
    } catch {
      // No data file = nothing committed yet
      return 0
    }

    let next: KeyIndex | null = null
    let applied = 0

    try {
      for await (const entry of files.wal.recover(this.walOffset)) {
        const buffer = new Uint8Array(entry.length)
        const { bytesRead } = await dataHandle.read(
          buffer,
          0,
          entry.length,
          entry.offset
        )

        const result =
          bytesRead === entry.length && crc32(buffer) === entry.recordChecksum
            ? deserializeCommitRecord(buffer)
            : null

        if (!result) {
          logger.warn('wal.replay.corrupt', {
            message: 'Commit record failed validation, stopping replay',
            details: { commitVersion: entry.commitVersion, offset: entry.offset }
          })
          break
        }

        next ??= this.index.clone()
        for (const mutation of result.record.mutations) {
          next.apply(mutation)
        }

        const commitVersion = result.record.commitVersion
        if (recordHistory) {
          this.recordHistory(commitVersion, result.record.mutations)
        }
        if (commitVersion > this.version) {
          this.version = commitVersion
        }

        this.walOffset += walEntrySize
        applied++
      }
    } finally {
      await dataHandle.close()
    }

    // Bytes left over are unreadable; skip them until the WAL changes
    if (this.walOffset < walSize) {
      this.stalledWalSize = walSize
    }

    if (next) {
      this.index = next
      if (recordHistory) {
        logger.debug('wal.replay', {
          message: 'Applied commits from another process',
          details: { commits: applied, version: this.version }
        })
      }
    }

    return applied
  }

  /**
   * Write a commit record and its WAL entry.
   * Must be called under the commit mutex and the file lock.
   */
  private async appendCommit(
    files: DurableFiles,
    commitVersion: bigint,
    mutations: readonly Mutation[]
  ): Promise<void> {
    const record = serializeCommitRecord({
      commitVersion,
      timestamp: BigInt(Date.now()),
      mutations: [...mutations]
    })

    // 1. Write to data file and fsync
    const offset = await this.appendToDataFile(files.dataPath, record)

    // 2. Drop any WAL tail that failed to replay so the new entry follows
    //    the last valid one
    await this.truncateWalTail(files.walPath)

    // 3. Write WAL entry and fsync (COMMIT POINT)
    await files.wal.append({
      commitVersion,
      offset,
      length: record.length,
      recordChecksum: crc32(record)
    })
    this.walOffset += walEntrySize
  }

  private async truncateWalTail(walPath: string): Promise<void> {
    const stats = await stat(walPath).catch(() => null)
    if (stats && stats.size > this.walOffset) {
      logger.warn('wal.truncate', {
        message: 'Discarding unreadable WAL tail',
        details: { from: stats.size, to: this.walOffset }
      })
      await truncate(walPath, this.walOffset)
      this.stalledWalSize = null
    }
  }

  /**
   * Append data to the data file.
   */
  private async appendToDataFile(
    dataPath: string,
    data: Uint8Array
  ): Promise<number> {
    const dataHandle = await this.getDataHandle(dataPath)

    // Another process may have appended since we last wrote
    const stats = await stat(dataPath).catch(() => ({ size: 0 }))
    let offset = stats.size

    if (offset === 0) {
      const header = serializeHeader()
      await dataHandle.write(header, 0, header.length, 0)
      await dataHandle.sync()
      offset = headerSize
    }

    await dataHandle.write(data, 0, data.length, offset)
    await dataHandle.sync()

    return offset
  }

  private async getDataHandle(dataPath: string): Promise<FileHandle> {
    if (!this.dataHandle) {
      await mkdir(dirname(dataPath), { recursive: true })
      this.dataHandle = await open(dataPath, 'r+').catch(async () => {
        return open(dataPath, 'w+')
      })
    }
    return this.dataHandle
  }

  private assertOpen(): void {
    if (this.closed) {
      throw new StorageError('Storage engine is closed')
    }
  }
}
