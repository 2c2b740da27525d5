/**
 * In-memory ordered key index.
 *
 * Holds every live key-value pair sorted by key, with binary search for
 * point lookups and cursor seeks. The engine treats a committed index as
 * immutable: commits and writing transactions work on a clone.
 */

import { opType } from './constants'
import { compareKeys } from './keys'
import type { KeyValue, Mutation } from './types'

export class KeyIndex {
  private readonly entries: KeyValue[]

  private constructor(entries: KeyValue[]) {
    this.entries = entries
  }

  /**
   * Create an empty index.
   */
  static create(): KeyIndex {
    return new KeyIndex([])
  }

  /**
   * Copy the index. Entries are shared, the ordering array is not.
   */
  clone(): KeyIndex {
    return new KeyIndex(this.entries.slice())
  }

  /**
   * Apply a staged or replayed mutation.
   */
  apply(mutation: Mutation): void {
    switch (mutation.op) {
      case opType.set:
        this.set(mutation.key, mutation.value)
        break
      case opType.clear:
        this.delete(mutation.key)
        break
      case opType.clearRange:
        this.deleteRange(mutation.begin, mutation.end)
        break
    }
  }

  get(key: Uint8Array): Uint8Array | null {
    const position = this.lowerBound(key)
    const entry = this.entries[position]
    if (entry && compareKeys(entry.key, key) === 0) {
      return entry.value
    }
    return null
  }

  set(key: Uint8Array, value: Uint8Array): void {
    const position = this.lowerBound(key)
    const entry = this.entries[position]
    if (entry && compareKeys(entry.key, key) === 0) {
      this.entries[position] = { key: entry.key, value }
      return
    }
    this.entries.splice(position, 0, { key, value })
  }

  delete(key: Uint8Array): boolean {
    const position = this.lowerBound(key)
    const entry = this.entries[position]
    if (entry && compareKeys(entry.key, key) === 0) {
      this.entries.splice(position, 1)
      return true
    }
    return false
  }

  /**
   * Remove every key in [begin, end). Returns the number removed.
   */
  deleteRange(begin: Uint8Array, end: Uint8Array): number {
    if (compareKeys(begin, end) >= 0) {
      return 0
    }
    const first = this.lowerBound(begin)
    const last = this.lowerBound(end)
    this.entries.splice(first, last - first)
    return last - first
  }

  /**
   * First entry whose key is >= `key`.
   */
  firstAtOrAfter(key: Uint8Array): KeyValue | null {
    return this.entries[this.lowerBound(key)] ?? null
  }

  /**
   * Last entry whose key is < `key`.
   */
  lastBefore(key: Uint8Array): KeyValue | null {
    return this.entries[this.lowerBound(key) - 1] ?? null
  }

  /**
   * Last entry whose key is <= `key`.
   */
  lastAtOrBefore(key: Uint8Array): KeyValue | null {
    const position = this.lowerBound(key)
    const entry = this.entries[position]
    if (entry && compareKeys(entry.key, key) === 0) {
      return entry
    }
    return this.entries[position - 1] ?? null
  }

  /**
   * Position of the first entry whose key is >= `key`.
   */
  private lowerBound(key: Uint8Array): number {
    let low = 0
    let high = this.entries.length
    while (low < high) {
      const mid = (low + high) >>> 1
      if (compareKeys(this.entries[mid].key, key) < 0) {
        low = mid + 1
      } else {
        high = mid
      }
    }
    return low
  }
}
