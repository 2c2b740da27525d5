/**
 * Errors raised by the vector layer and its codecs.
 *
 * Validation errors are thrown before any write is staged, so a failed
 * call leaves the transaction unchanged.
 */

import { formatKey } from './storage-engine/keys'

export class VectorError extends Error {
  constructor(message: string) {
    super(message)
    this.name = 'VectorError'
  }
}

/**
 * Index is negative, not an integer, or outside the signed 64-bit range.
 */
export class InvalidIndexError extends VectorError {
  constructor(
    public readonly index: number | bigint,
    reason: string = 'must be a non-negative integer'
  ) {
    super(`Invalid index ${index}: ${reason}`)
    this.name = 'InvalidIndexError'
  }
}

/**
 * Index is at or past the end of the vector.
 */
export class OutOfRangeError extends VectorError {
  constructor(public readonly index: bigint) {
    super(`Index ${index} out of range`)
    this.name = 'OutOfRangeError'
  }
}

/**
 * Value is not one of the storable scalar kinds.
 */
export class UnsupportedTypeError extends VectorError {
  constructor(
    public readonly value: unknown,
    reason?: string
  ) {
    super(
      `Unencodable element (${describe(value)})` + (reason ? `: ${reason}` : '')
    )
    this.name = 'UnsupportedTypeError'
  }
}

export class EmptyInputError extends VectorError {
  constructor() {
    super('No bytes to decode')
    this.name = 'EmptyInputError'
  }
}

export class UnknownTagError extends VectorError {
  constructor(public readonly tag: number) {
    super(`Unable to decode element with unknown tag 0x${hex(tag)}`)
    this.name = 'UnknownTagError'
  }
}

/**
 * Fixed-width payload has the wrong length.
 */
export class MalformedPayloadError extends VectorError {
  constructor(
    public readonly tag: number,
    public readonly payloadLength: number
  ) {
    super(
      `Element with tag 0x${hex(tag)} needs an 8-byte payload, got ${payloadLength}`
    )
    this.name = 'MalformedPayloadError'
  }
}

/**
 * Key is outside the vector's namespace or does not hold an encoded index.
 */
export class DecodeError extends VectorError {
  constructor(
    public readonly key: Uint8Array,
    reason: string
  ) {
    super(`Cannot decode key ${formatKey(key)}: ${reason}`)
    this.name = 'DecodeError'
  }
}

function hex(byte: number): string {
  return byte.toString(16).padStart(2, '0')
}

function describe(value: unknown): string {
  if (value === null) {
    return 'null'
  }
  if (typeof value === 'object') {
    return value.constructor?.name ?? 'object'
  }
  if (typeof value === 'symbol' || typeof value === 'function') {
    return typeof value
  }
  return `${String(value)}, type ${typeof value}`
}
