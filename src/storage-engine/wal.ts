/**
 * Write-Ahead Log (WAL) implementation.
 *
 * Each entry points at a commit record in the data file. An entry is
 * appended only after its record is synced, so a commit is durable once
 * its entry is on disk. Replay scans entries in order and stops at the
 * first one that fails validation.
 */

import { open, stat, mkdir } from 'node:fs/promises'
import type { FileHandle } from 'node:fs/promises'
import { dirname } from 'node:path'
import { walEntrySize } from './constants'
import { serializeWalEntry, deserializeWalEntry } from './wal-format'
import type { WalEntry } from './types'

export class Wal {
  private readonly filePath: string
  private fileHandle: FileHandle | null = null

  constructor(filePath: string) {
    this.filePath = filePath
  }

  /**
   * Append a WAL entry and sync to disk.
   * This is the commit point - once this returns, the commit is durable.
   */
  async append(entry: WalEntry): Promise<void> {
    const buffer = serializeWalEntry(entry)

    await mkdir(dirname(this.filePath), { recursive: true })

    this.fileHandle ??= await open(this.filePath, 'a')

    await this.fileHandle.write(buffer)
    await this.fileHandle.sync()
  }

  /**
   * Recover WAL entries from disk, starting at a byte offset.
   * Yields valid entries in order, stopping at the first corrupted entry.
   */
  async *recover(fromOffset = 0): AsyncGenerator<WalEntry> {
    let fileStats
    try {
      fileStats = await stat(this.filePath)
    } catch {
      // No WAL file = fresh store
      return
    }

    const length = fileStats.size - fromOffset
    if (length < walEntrySize) {
      return
    }

    const fileHandle = await open(this.filePath, 'r')
    try {
      const buffer = new Uint8Array(length)
      await fileHandle.read(buffer, 0, length, fromOffset)

      let offset = 0
      while (offset + walEntrySize <= buffer.length) {
        const result = deserializeWalEntry(buffer, offset)

        if (!result) {
          break
        }

        yield result.entry
        offset += walEntrySize
      }
    } finally {
      await fileHandle.close()
    }
  }

  /**
   * Close the WAL file handle.
   */
  async close(): Promise<void> {
    if (this.fileHandle) {
      await this.fileHandle.close()
      this.fileHandle = null
    }
  }
}
