/**
 * Byte-string key helpers. Keys order lexicographically by unsigned byte.
 */

import type { KeyRange } from './types'

export function compareKeys(a: Uint8Array, b: Uint8Array): number {
  const length = Math.min(a.length, b.length)
  for (let i = 0; i < length; i++) {
    if (a[i] !== b[i]) {
      return a[i] < b[i] ? -1 : 1
    }
  }
  if (a.length === b.length) {
    return 0
  }
  return a.length < b.length ? -1 : 1
}

export function keysEqual(a: Uint8Array, b: Uint8Array): boolean {
  return compareKeys(a, b) === 0
}

/**
 * The smallest key strictly greater than `key`.
 */
export function keyAfter(key: Uint8Array): Uint8Array {
  const result = new Uint8Array(key.length + 1)
  result.set(key, 0)
  return result
}

export function concatBytes(...parts: Uint8Array[]): Uint8Array {
  const total = parts.reduce((sum, part) => sum + part.length, 0)
  const result = new Uint8Array(total)
  let offset = 0
  for (const part of parts) {
    result.set(part, offset)
    offset += part.length
  }
  return result
}

export function inRange(key: Uint8Array, range: KeyRange): boolean {
  return (
    compareKeys(key, range.begin) >= 0 && compareKeys(key, range.end) < 0
  )
}

export function rangesIntersect(a: KeyRange, b: KeyRange): boolean {
  return compareKeys(a.begin, b.end) < 0 && compareKeys(b.begin, a.end) < 0
}

/**
 * Printable form of a key: printable ASCII as-is, everything else as \xNN.
 */
export function formatKey(key: Uint8Array): string {
  let out = ''
  for (const byte of key) {
    if (byte >= 0x20 && byte < 0x7f && byte !== 0x5c) {
      out += String.fromCharCode(byte)
    } else {
      out += `\\x${byte.toString(16).padStart(2, '0')}`
    }
  }
  return out
}
