/**
 * Index ↔ key encoding.
 *
 * An index is stored as its namespace prefix followed by the tuple-layer
 * integer encoding, which sorts bytewise in numeric order:
 *
 *   zero      [0x14]
 *   positive  [0x14 + n][n big-endian magnitude bytes]
 *   negative  [0x14 - n][n bytes of the one's complement of the magnitude]
 *
 * where n is the minimal byte length, 1..8 for signed 64-bit values.
 */

import { DecodeError, InvalidIndexError } from './errors'
import type { Subspace } from './storage-engine/subspace'
import type { KeyRange } from './storage-engine/types'
import type { Index } from './types'

const intZeroCode = 0x14
const maxIntLength = 8

export const minInt64 = -(2n ** 63n)
export const maxInt64 = 2n ** 63n - 1n

/**
 * Normalize an index to a bigint, rejecting non-integers and values
 * outside the signed 64-bit range. Sign is not checked.
 */
export function toIndex(index: Index): bigint {
  if (typeof index === 'number') {
    if (!Number.isSafeInteger(index)) {
      throw new InvalidIndexError(index, 'must be a safe integer')
    }
    return BigInt(index)
  }
  if (index < minInt64 || index > maxInt64) {
    throw new InvalidIndexError(index, 'outside the signed 64-bit range')
  }
  return index
}

/**
 * Encode a signed 64-bit integer as a tuple integer element.
 */
export function encodeTupleInt(value: bigint): Uint8Array {
  if (value === 0n) {
    return Uint8Array.of(intZeroCode)
  }

  const negative = value < 0n
  const magnitude = negative ? -value : value
  const length = byteLength(magnitude)

  const bytes = new Uint8Array(1 + length)
  bytes[0] = negative ? intZeroCode - length : intZeroCode + length

  let payload = negative ? onesMask(length) - magnitude : magnitude
  for (let i = length; i >= 1; i--) {
    bytes[i] = Number(payload & 0xffn)
    payload >>= 8n
  }
  return bytes
}

export function encodeIndex(subspace: Subspace, index: Index): Uint8Array {
  return subspace.pack(encodeTupleInt(toIndex(index)))
}

/**
 * Inverse of encodeIndex.
 */
export function decodeIndex(subspace: Subspace, key: Uint8Array): bigint {
  const suffix = subspace.unpack(key)
  if (!suffix) {
    throw new DecodeError(key, 'outside the namespace')
  }
  if (suffix.length === 0) {
    throw new DecodeError(key, 'missing index')
  }

  const code = suffix[0]
  const length = Math.abs(code - intZeroCode)
  if (length > maxIntLength) {
    throw new DecodeError(
      key,
      `type code 0x${code.toString(16).padStart(2, '0')} is not an integer`
    )
  }
  if (suffix.length !== 1 + length) {
    throw new DecodeError(
      key,
      `expected ${length} integer bytes, found ${suffix.length - 1}`
    )
  }
  if (length === 0) {
    return 0n
  }

  const negative = code < intZeroCode
  if (suffix[1] === (negative ? 0xff : 0x00)) {
    throw new DecodeError(key, 'integer is not minimally encoded')
  }

  let payload = 0n
  for (let i = 1; i <= length; i++) {
    payload = (payload << 8n) | BigInt(suffix[i])
  }

  const value = negative ? payload - onesMask(length) : payload
  if (value < minInt64 || value > maxInt64) {
    throw new DecodeError(key, 'integer outside the signed 64-bit range')
  }
  return value
}

/**
 * Key codec bound to one namespace.
 */
export class KeyCodec {
  readonly subspace: Subspace

  constructor(subspace: Subspace) {
    this.subspace = subspace
  }

  encode(index: Index): Uint8Array {
    return encodeIndex(this.subspace, index)
  }

  decode(key: Uint8Array): bigint {
    return decodeIndex(this.subspace, key)
  }

  range(): KeyRange {
    return this.subspace.range()
  }
}

function byteLength(magnitude: bigint): number {
  let length = 0
  for (let rest = magnitude; rest > 0n; rest >>= 8n) {
    length++
  }
  return length
}

function onesMask(length: number): bigint {
  return (1n << BigInt(8 * length)) - 1n
}
