/**
 * Scalar ↔ bytes encoding.
 *
 * Binary format: [tag:1][payload]
 *   0x01 int    8-byte big-endian two's complement
 *   0x02 float  8-byte big-endian IEEE-754 double
 *   0x03 text   UTF-8, unterminated (the rest of the buffer)
 */

import {
  EmptyInputError,
  MalformedPayloadError,
  UnknownTagError,
  UnsupportedTypeError
} from './errors'
import { maxInt64, minInt64 } from './key-codec'
import type { EmptyValue, Scalar, ScalarInput, Value } from './types'

export const valueTag = {
  int: 0x01,
  float: 0x02,
  text: 0x03
} as const

const fixedPayloadSize = 8

export const emptyValue: EmptyValue = Object.freeze({ kind: 'empty' })

export function isEmptyValue(value: Value): value is EmptyValue {
  return value.kind === 'empty'
}

export function intScalar(value: number | bigint): Scalar {
  return toScalar({ kind: 'int', value })
}

export function floatScalar(value: number): Scalar {
  return { kind: 'float', value }
}

export function textScalar(value: string): Scalar {
  return { kind: 'text', value }
}

/**
 * Normalize dynamic input to a scalar.
 *
 * bigint → int, number → float, string → text. Scalar objects pass
 * through; an int scalar holding a safe-integer number is widened to
 * bigint.
 */
export function toScalar(input: unknown): Scalar {
  if (typeof input === 'bigint') {
    return { kind: 'int', value: checkInt64(input, input) }
  }
  if (typeof input === 'number') {
    return { kind: 'float', value: input }
  }
  if (typeof input === 'string') {
    return { kind: 'text', value: input }
  }

  if (isRecord(input)) {
    const { kind, value } = input
    if (kind === 'int' && typeof value === 'bigint') {
      return { kind: 'int', value: checkInt64(value, input) }
    }
    if (kind === 'int' && typeof value === 'number') {
      if (!Number.isSafeInteger(value)) {
        throw new UnsupportedTypeError(input, 'int value must be an integer')
      }
      return { kind: 'int', value: BigInt(value) }
    }
    if (kind === 'float' && typeof value === 'number') {
      return { kind: 'float', value }
    }
    if (kind === 'text' && typeof value === 'string') {
      return { kind: 'text', value }
    }
    if (kind === 'empty') {
      throw new UnsupportedTypeError(input, 'the empty value cannot be stored')
    }
  }

  throw new UnsupportedTypeError(input)
}

export function encodeValue(input: ScalarInput): Uint8Array {
  const scalar = toScalar(input)

  if (scalar.kind === 'text') {
    const text = new TextEncoder().encode(scalar.value)
    const buffer = new Uint8Array(1 + text.length)
    buffer[0] = valueTag.text
    buffer.set(text, 1)
    return buffer
  }

  const buffer = new Uint8Array(1 + fixedPayloadSize)
  const view = new DataView(buffer.buffer)
  if (scalar.kind === 'int') {
    buffer[0] = valueTag.int
    view.setBigInt64(1, scalar.value, false)
  } else {
    buffer[0] = valueTag.float
    view.setFloat64(1, scalar.value, false)
  }
  return buffer
}

export function decodeValue(bytes: Uint8Array): Scalar {
  if (bytes.length === 0) {
    throw new EmptyInputError()
  }

  const tag = bytes[0]
  const payload = bytes.subarray(1)

  switch (tag) {
    case valueTag.int:
      return { kind: 'int', value: fixedView(tag, payload).getBigInt64(0, false) }
    case valueTag.float:
      return { kind: 'float', value: fixedView(tag, payload).getFloat64(0, false) }
    case valueTag.text:
      return {
        kind: 'text',
        value: new TextDecoder('utf-8', { ignoreBOM: true }).decode(payload)
      }
    default:
      throw new UnknownTagError(tag)
  }
}

/**
 * Equality by kind and value. Floats compare with Object.is, so NaN
 * equals NaN and 0 differs from -0.
 */
export function scalarsEqual(a: Value, b: Value): boolean {
  switch (a.kind) {
    case 'empty':
      return b.kind === 'empty'
    case 'int':
      return b.kind === 'int' && a.value === b.value
    case 'float':
      return b.kind === 'float' && Object.is(a.value, b.value)
    case 'text':
      return b.kind === 'text' && a.value === b.value
  }
}

/**
 * Plain form of a value for printing.
 */
export function formatValue(value: Value): string {
  switch (value.kind) {
    case 'empty':
      return '(empty)'
    case 'int':
      return value.value.toString()
    case 'float':
      return String(value.value)
    case 'text':
      return JSON.stringify(value.value)
  }
}

function fixedView(tag: number, payload: Uint8Array): DataView {
  if (payload.length !== fixedPayloadSize) {
    throw new MalformedPayloadError(tag, payload.length)
  }
  return new DataView(payload.buffer, payload.byteOffset, fixedPayloadSize)
}

function checkInt64(value: bigint, input: unknown): bigint {
  if (value < minInt64 || value > maxInt64) {
    throw new UnsupportedTypeError(
      input,
      'integer outside the signed 64-bit range'
    )
  }
  return value
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null
}
