import invariant from 'tiny-invariant'
import { toIndex, type KeyCodec } from './key-codec'
import { keyAfter } from './storage-engine/keys'
import type { KeyValue, KeyValueTransaction } from './storage-engine/types'
import { decodeValue } from './value-codec'
import type { IndexValue, RangeOptions } from './types'

/**
 * Inclusive index interval and traversal direction of a range read.
 * Empty when first > last.
 */
export interface ResolvedRange {
  first: bigint
  last: bigint
  reverse: boolean
}

interface RangeRequest {
  start: bigint
  stop: bigint
  step: number
}

/**
 * Whether resolving the range requires the vector's current size.
 */
export function needsSize(options: RangeOptions): boolean {
  const stop = options.stop ?? 0
  const start = options.start ?? 0
  return stop <= 0 || start < 0
}

/**
 * Turn slice-style options into the interval to read.
 *
 * `stop` 0 means the size; negative `start`/`stop` count back from the
 * size and clamp at 0. start <= stop covers [start, stop); start > stop
 * covers (stop, start]. A non-zero `step` fixes the direction, otherwise
 * it is descending exactly when start > stop.
 */
export function resolveRange(
  options: RangeOptions,
  size: bigint | null
): ResolvedRange {
  const request = normalize(options)
  let { start, stop } = request

  if (needsSize(options)) {
    invariant(size !== null, 'Size is required to resolve this range.')
    if (stop === 0n) {
      stop = size
    }
    if (start < 0n) {
      start = max(size + start, 0n)
    }
    if (stop < 0n) {
      stop = max(size + stop, 0n)
    }
  }

  const reverse =
    request.step < 0 ? true : request.step > 0 ? false : start > stop

  if (start <= stop) {
    return { first: start, last: stop - 1n, reverse }
  }
  return { first: stop + 1n, last: start, reverse }
}

/**
 * Lazy cursor over the stored (index, value) pairs of a vector range.
 *
 * Nothing is read until the first advance. Gaps are skipped, not filled
 * with the default. The iterator belongs to the transaction that created
 * it, cannot be restarted, and stays done once finished or returned.
 */
export class VectorIterator implements AsyncIterableIterator<IndexValue> {
  private readonly keys: KeyCodec
  private readonly tx: KeyValueTransaction
  private readonly options: RangeOptions
  private readonly sizeOf: () => Promise<bigint>
  private cursor: AsyncIterator<KeyValue> | null = null
  private done = false

  constructor(
    keys: KeyCodec,
    tx: KeyValueTransaction,
    options: RangeOptions,
    sizeOf: () => Promise<bigint>
  ) {
    // Bounds are checked before the first read
    normalize(options)

    this.keys = keys
    this.tx = tx
    this.options = options
    this.sizeOf = sizeOf
  }

  async next(): Promise<IteratorResult<IndexValue, undefined>> {
    if (this.done) {
      return { done: true, value: undefined }
    }

    try {
      this.cursor ??= await this.open()

      const result = await this.cursor.next()
      if (result.done) {
        this.done = true
        return { done: true, value: undefined }
      }

      const { key, value } = result.value
      return {
        done: false,
        value: { index: this.keys.decode(key), value: decodeValue(value) }
      }
    } catch (error) {
      this.done = true
      throw error
    }
  }

  async return(): Promise<IteratorResult<IndexValue, undefined>> {
    this.done = true
    await this.cursor?.return?.()
    return { done: true, value: undefined }
  }

  [Symbol.asyncIterator](): this {
    return this
  }

  /**
   * Drain the remaining pairs.
   */
  async toArray(): Promise<IndexValue[]> {
    const items: IndexValue[] = []
    for await (const item of this) {
      items.push(item)
    }
    return items
  }

  private async open(): Promise<AsyncIterator<KeyValue>> {
    const size = needsSize(this.options) ? await this.sizeOf() : null
    const { first, last, reverse } = resolveRange(this.options, size)

    if (first > last) {
      return nothing()
    }

    const begin = this.keys.encode(first)
    const end = keyAfter(this.keys.encode(last))
    return this.tx.getRange(begin, end, { reverse })[Symbol.asyncIterator]()
  }
}

function normalize(options: RangeOptions): RangeRequest {
  const step = options.step ?? 0
  invariant(!Number.isNaN(step), 'Step must be a number.')

  return {
    start: toIndex(options.start ?? 0),
    stop: toIndex(options.stop ?? 0),
    step
  }
}

function max(a: bigint, b: bigint): bigint {
  return a > b ? a : b
}

// eslint-disable-next-line @typescript-eslint/no-empty-function
async function* nothing(): AsyncGenerator<KeyValue> {}
