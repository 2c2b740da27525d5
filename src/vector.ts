/**
 * Sparse vector over an ordered transactional key-value store.
 *
 * Each value is stored under its index's key inside the vector's
 * subspace. The size is the last stored index + 1, so the entry at
 * size - 1 is always written explicitly, even when it holds the default
 * value. Indices below the size with no entry read as the default.
 *
 * The vector holds no state of its own; every operation runs inside the
 * caller's transaction.
 */

import { InvalidIndexError, OutOfRangeError } from './errors'
import { KeyCodec, maxInt64, toIndex } from './key-codec'
import { VectorIterator } from './range-iterator'
import { keysEqual } from './storage-engine/keys'
import type { Subspace } from './storage-engine/subspace'
import type { KeyValue, KeyValueTransaction } from './storage-engine/types'
import {
  decodeValue,
  emptyValue,
  encodeValue,
  isEmptyValue,
  toScalar
} from './value-codec'
import type {
  Index,
  RangeOptions,
  Scalar,
  ScalarInput,
  Value,
  VectorOptions
} from './types'

export class Vector {
  readonly subspace: Subspace
  readonly defaultValue: Scalar

  private readonly keys: KeyCodec
  private readonly encodedDefault: Uint8Array

  constructor(subspace: Subspace, options: VectorOptions = {}) {
    this.subspace = subspace
    this.keys = new KeyCodec(subspace)
    this.defaultValue = toScalar(options.defaultValue ?? '')
    this.encodedDefault = encodeValue(this.defaultValue)
  }

  /**
   * Number of items, including the sparsely represented ones.
   */
  async size(tx: KeyValueTransaction): Promise<bigint> {
    const lastKey = await tx.getKeyAtOrBefore(this.keys.range().end)
    if (lastKey === null || !this.subspace.contains(lastKey)) {
      return 0n
    }
    return this.keys.decode(lastKey) + 1n
  }

  /**
   * Value at `index`. Returns the empty value for an index inside the
   * vector that has no stored entry.
   */
  async get(index: Index, tx: KeyValueTransaction): Promise<Value> {
    const position = this.checkIndex(index)
    const start = this.keys.encode(position)

    const [entry] = await collect(
      tx.getRange(start, this.keys.range().end, { limit: 1 })
    )
    if (!entry) {
      throw new OutOfRangeError(position)
    }
    if (keysEqual(entry.key, start)) {
      return decodeValue(entry.value)
    }
    return emptyValue
  }

  /**
   * Write `value` at `index`. Writing past the end grows the vector.
   * The size must stay representable, so the largest writable index is
   * one below the signed 64-bit maximum.
   */
  set(index: Index, value: ScalarInput, tx: KeyValueTransaction): void {
    const encoded = encodeValue(value)
    const position = this.checkIndex(index)
    checkWritable(position, index)
    tx.set(this.keys.encode(position), encoded)
  }

  /**
   * Append `value`. Concurrent pushes from separate transactions read the
   * same size; the store rejects all but one at commit.
   */
  async push(value: ScalarInput, tx: KeyValueTransaction): Promise<void> {
    const encoded = encodeValue(value)
    const size = await this.size(tx)
    checkWritable(size, size)
    tx.set(this.keys.encode(size), encoded)
  }

  /**
   * Remove and return the last item. Returns the empty value when the
   * vector is already empty.
   */
  async pop(tx: KeyValueTransaction): Promise<Value> {
    const { begin, end } = this.keys.range()
    const lastTwo = await collect(
      tx.getRange(begin, end, { limit: 2, reverse: true })
    )

    if (lastTwo.length === 0) {
      return emptyValue
    }

    const top = lastTwo[0]
    const topIndex = this.keys.decode(top.key)
    const previousIndex =
      lastTwo.length > 1 ? this.keys.decode(lastTwo[1].key) : null
    const value = decodeValue(top.value)

    // The new last item is sparse: store it so the size stays derivable
    if (
      topIndex > 0n &&
      (previousIndex === null || topIndex - previousIndex > 1n)
    ) {
      tx.set(this.keys.encode(topIndex - 1n), this.encodedDefault)
    }

    tx.clear(top.key)
    return value
  }

  /**
   * Value of the last item, or the empty value when the vector is empty.
   */
  async back(tx: KeyValueTransaction): Promise<Value> {
    const { begin, end } = this.keys.range()
    const [last] = await collect(
      tx.getRange(begin, end, { limit: 1, reverse: true })
    )
    if (!last) {
      return emptyValue
    }
    return decodeValue(last.value)
  }

  /**
   * Value of the first item.
   */
  async front(tx: KeyValueTransaction): Promise<Value> {
    return this.get(0, tx)
  }

  /**
   * Stored (index, value) pairs in a slice of the vector. Sparse gaps
   * are skipped rather than filled with the default.
   */
  getRange(options: RangeOptions, tx: KeyValueTransaction): VectorIterator {
    return new VectorIterator(this.keys, tx, options, () => this.size(tx))
  }

  /**
   * Remove all items.
   */
  clear(tx: KeyValueTransaction): void {
    const { begin, end } = this.keys.range()
    tx.clearRange(begin, end)
  }

  /**
   * Key under which `index` is stored.
   */
  encode(index: Index): Uint8Array {
    return this.keys.encode(index)
  }

  /**
   * Index stored under `key`.
   */
  decode(key: Uint8Array): bigint {
    return this.keys.decode(key)
  }

  /**
   * Substitute the configured default for the empty value.
   */
  resolve(value: Value): Scalar {
    return isEmptyValue(value) ? this.defaultValue : value
  }

  private checkIndex(index: Index): bigint {
    const position = toIndex(index)
    if (position < 0n) {
      throw new InvalidIndexError(index)
    }
    return position
  }
}

function checkWritable(position: bigint, index: Index): void {
  if (position >= maxInt64) {
    throw new InvalidIndexError(
      index,
      'size would overflow the signed 64-bit range'
    )
  }
}

async function collect(
  iterable: AsyncIterable<KeyValue>
): Promise<KeyValue[]> {
  const entries: KeyValue[] = []
  for await (const entry of iterable) {
    entries.push(entry)
  }
  return entries
}
