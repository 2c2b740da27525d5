import { describe, it, expect } from 'vitest'
import {
  KeyCodec,
  decodeIndex,
  encodeIndex,
  encodeTupleInt,
  maxInt64,
  minInt64,
  toIndex
} from './key-codec'
import { DecodeError, InvalidIndexError } from './errors'
import { Subspace } from './storage-engine/subspace'
import { compareKeys, concatBytes } from './storage-engine/keys'

const subspace = Subspace.of('vec')
const prefix = [0x02, 0x76, 0x65, 0x63, 0x00]

function bytes(...values: number[]): Uint8Array {
  return Uint8Array.from(values)
}

describe('encodeTupleInt', () => {
  it('encodes zero as a single type code', () => {
    expect(encodeTupleInt(0n)).toEqual(bytes(0x14))
  })

  it('encodes positive integers with their minimal big-endian bytes', () => {
    expect(encodeTupleInt(1n)).toEqual(bytes(0x15, 0x01))
    expect(encodeTupleInt(255n)).toEqual(bytes(0x15, 0xff))
    expect(encodeTupleInt(256n)).toEqual(bytes(0x16, 0x01, 0x00))
  })

  it('encodes negative integers as the complement of the magnitude', () => {
    expect(encodeTupleInt(-1n)).toEqual(bytes(0x13, 0xfe))
    expect(encodeTupleInt(-255n)).toEqual(bytes(0x13, 0x00))
    expect(encodeTupleInt(-256n)).toEqual(bytes(0x12, 0xfe, 0xff))
  })

  it('covers the signed 64-bit extremes', () => {
    expect(encodeTupleInt(maxInt64)).toEqual(
      bytes(0x1c, 0x7f, 0xff, 0xff, 0xff, 0xff, 0xff, 0xff, 0xff)
    )
    expect(encodeTupleInt(minInt64)).toEqual(
      bytes(0x0c, 0x7f, 0xff, 0xff, 0xff, 0xff, 0xff, 0xff, 0xff)
    )
  })
})

describe('encodeIndex', () => {
  it('prefixes the integer with the namespace', () => {
    expect(encodeIndex(subspace, 0)).toEqual(bytes(...prefix, 0x14))
    expect(encodeIndex(subspace, 300n)).toEqual(
      bytes(...prefix, 0x16, 0x01, 0x2c)
    )
  })

  it('preserves numeric order', () => {
    const indices = [
      minInt64,
      -65536n,
      -256n,
      -255n,
      -1n,
      0n,
      1n,
      255n,
      256n,
      65535n,
      maxInt64
    ]
    const keys = indices.map((index) => encodeIndex(subspace, index))

    for (let i = 1; i < keys.length; i++) {
      expect(compareKeys(keys[i - 1], keys[i])).toBe(-1)
    }
  })

  it('keeps every key inside the namespace range', () => {
    expect(subspace.contains(encodeIndex(subspace, maxInt64))).toBe(true)
    expect(subspace.contains(encodeIndex(subspace, minInt64))).toBe(true)
  })
})

describe('decodeIndex', () => {
  it('inverts encodeIndex', () => {
    for (const index of [minInt64, -256n, -1n, 0n, 1n, 256n, maxInt64]) {
      expect(decodeIndex(subspace, encodeIndex(subspace, index))).toBe(index)
    }
  })

  it('rejects keys from another namespace', () => {
    const key = encodeIndex(Subspace.of('other'), 1)

    expect(() => decodeIndex(subspace, key)).toThrow(DecodeError)
    expect(() => decodeIndex(subspace, key)).toThrow('outside the namespace')
  })

  it('rejects suffixes that are not integers', () => {
    const key = concatBytes(bytes(...prefix), bytes(0x02, 0x61, 0x00))

    expect(() => decodeIndex(subspace, key)).toThrow(
      'type code 0x02 is not an integer'
    )
  })

  it('rejects a length that does not match the type code', () => {
    const key = bytes(...prefix, 0x16, 0x01)

    expect(() => decodeIndex(subspace, key)).toThrow(
      'expected 2 integer bytes, found 1'
    )
  })

  it('rejects non-minimal encodings', () => {
    expect(() => decodeIndex(subspace, bytes(...prefix, 0x15, 0x00))).toThrow(
      'integer is not minimally encoded'
    )
    expect(() => decodeIndex(subspace, bytes(...prefix, 0x13, 0xff))).toThrow(
      'integer is not minimally encoded'
    )
  })

  it('prints the key in the error message', () => {
    expect(() => decodeIndex(subspace, bytes(...prefix, 0x16, 0x01))).toThrow(
      'Cannot decode key \\x02vec\\x00\\x16\\x01: expected 2 integer bytes, found 1'
    )
  })
})

describe('toIndex', () => {
  it('widens safe integers to bigint', () => {
    expect(toIndex(42)).toBe(42n)
    expect(toIndex(-3)).toBe(-3n)
  })

  it('rejects fractional and unsafe numbers', () => {
    expect(() => toIndex(1.5)).toThrow(InvalidIndexError)
    expect(() => toIndex(1.5)).toThrow('Invalid index 1.5: must be a safe integer')
    expect(() => toIndex(2 ** 60)).toThrow(InvalidIndexError)
  })

  it('rejects bigints outside the signed 64-bit range', () => {
    expect(() => toIndex(maxInt64 + 1n)).toThrow(
      'outside the signed 64-bit range'
    )
  })
})

describe('KeyCodec', () => {
  it('binds the codec to one namespace', () => {
    const codec = new KeyCodec(subspace)

    expect(codec.decode(codec.encode(7))).toBe(7n)
    expect(codec.range()).toEqual(subspace.range())
  })
})
