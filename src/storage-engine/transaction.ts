/**
 * A transaction over the key-value store.
 *
 * Reads see the committed state captured when the transaction began,
 * overlaid with the transaction's own writes. Every read records the key
 * range it depended on; commit fails if a newer commit wrote into one of
 * those ranges.
 */

import invariant from 'tiny-invariant'
import { opType } from './constants'
import { TransactionClosedError } from './errors'
import { compareKeys, inRange, keyAfter } from './keys'
import type { KeyIndex } from './key-index'
import type {
  KeyRange,
  KeyValue,
  KeyValueTransaction,
  Mutation,
  RangeReadOptions
} from './types'

export type TransactionState = 'open' | 'committing' | 'committed' | 'cancelled'

/**
 * The engine side of a transaction.
 */
export interface TransactionHost {
  commit(transaction: Transaction): Promise<void>
}

export class Transaction implements KeyValueTransaction {
  readonly readVersion: bigint

  private readonly host: TransactionHost
  private view: KeyIndex
  private ownsView = false
  private readonly mutations: Mutation[] = []
  private readonly readRanges: KeyRange[] = []
  private state: TransactionState = 'open'

  constructor(host: TransactionHost, snapshot: KeyIndex, readVersion: bigint) {
    this.host = host
    this.view = snapshot
    this.readVersion = readVersion
  }

  async getKeyAtOrBefore(key: Uint8Array): Promise<Uint8Array | null> {
    this.assertOpen()

    const entry = this.view.lastAtOrBefore(key)
    this.readRanges.push({
      begin: entry ? entry.key : new Uint8Array(0),
      end: keyAfter(key)
    })
    return entry ? entry.key.slice() : null
  }

  async get(key: Uint8Array): Promise<Uint8Array | null> {
    this.assertOpen()

    this.readRanges.push({ begin: key.slice(), end: keyAfter(key) })
    return this.view.get(key)?.slice() ?? null
  }

  /**
   * Cursor over [begin, end). Each advance seeks from the last key it
   * returned, so writes made by this transaction between advances are
   * observed. The read-conflict range grows with every entry returned.
   * Advancing after commit or cancel throws.
   */
  async *getRange(
    begin: Uint8Array,
    end: Uint8Array,
    options: RangeReadOptions = {}
  ): AsyncGenerator<KeyValue> {
    const limit = options.limit ?? 0
    const reverse = options.reverse ?? false
    invariant(
      Number.isInteger(limit) && limit >= 0,
      'Limit must be a non-negative integer.'
    )

    this.assertOpen()
    if (compareKeys(begin, end) >= 0) {
      return
    }

    const range = { begin: begin.slice(), end: end.slice() }
    let covered: KeyRange | null = null
    const cover = (from: Uint8Array, to: Uint8Array): void => {
      if (covered) {
        covered.begin = from
        covered.end = to
      } else {
        covered = { begin: from, end: to }
        this.readRanges.push(covered)
      }
    }

    let last: Uint8Array | null = null
    let count = 0

    while (limit === 0 || count < limit) {
      this.assertOpen()

      let entry: KeyValue | null
      if (reverse) {
        entry = this.view.lastBefore(last ?? range.end)
      } else {
        entry = this.view.firstAtOrAfter(last ? keyAfter(last) : range.begin)
      }

      if (!entry || !inRange(entry.key, range)) {
        cover(range.begin, range.end)
        return
      }

      last = entry.key
      if (reverse) {
        cover(entry.key, range.end)
      } else {
        cover(range.begin, keyAfter(entry.key))
      }
      count++
      yield { key: entry.key.slice(), value: entry.value.slice() }
    }
  }

  set(key: Uint8Array, value: Uint8Array): void {
    this.stage({ op: opType.set, key: key.slice(), value: value.slice() })
  }

  clear(key: Uint8Array): void {
    this.stage({ op: opType.clear, key: key.slice() })
  }

  clearRange(begin: Uint8Array, end: Uint8Array): void {
    this.stage({ op: opType.clearRange, begin: begin.slice(), end: end.slice() })
  }

  /**
   * Commit staged writes. The transaction is closed afterwards, whether or
   * not the commit succeeded.
   */
  async commit(): Promise<void> {
    this.assertOpen()

    this.state = 'committing'
    try {
      await this.host.commit(this)
      this.state = 'committed'
    } catch (error) {
      this.state = 'cancelled'
      throw error
    }
  }

  /**
   * Discard staged writes. Has no effect once the transaction is closed.
   */
  cancel(): void {
    if (this.state === 'open') {
      this.state = 'cancelled'
    }
  }

  getState(): TransactionState {
    return this.state
  }

  getMutations(): readonly Mutation[] {
    return this.mutations
  }

  getReadRanges(): readonly KeyRange[] {
    return this.readRanges
  }

  private stage(mutation: Mutation): void {
    this.assertOpen()

    if (!this.ownsView) {
      this.view = this.view.clone()
      this.ownsView = true
    }
    this.view.apply(mutation)
    this.mutations.push(mutation)
  }

  private assertOpen(): void {
    if (this.state !== 'open') {
      throw new TransactionClosedError(this.state)
    }
  }
}

/**
 * Key range a mutation writes to.
 */
export function writeRangeOf(mutation: Mutation): KeyRange {
  switch (mutation.op) {
    case opType.set:
    case opType.clear:
      return { begin: mutation.key, end: keyAfter(mutation.key) }
    case opType.clearRange:
      return { begin: mutation.begin, end: mutation.end }
  }
}
