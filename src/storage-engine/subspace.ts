import invariant from 'tiny-invariant'
import { concatBytes, inRange } from './keys'
import type { KeyRange } from './types'

const stringTypeCode = 0x02

/**
 * A contiguous region of the key space identified by a byte prefix.
 *
 * Every key the owner writes starts with the prefix, so the region is
 * [prefix + 0x00, prefix + 0xff). Subspaces built from names use the
 * tuple string encoding, which never produces a 0xff byte after a
 * prefix, so sibling subspaces cannot overlap. Nested subspaces do
 * overlap their parent and must not both be owned by vectors.
 */
export class Subspace {
  private readonly prefix: Uint8Array

  constructor(prefix: Uint8Array) {
    this.prefix = prefix.slice()
  }

  /**
   * Build a subspace from a path of names, e.g. `Subspace.of('app', 'scores')`.
   */
  static of(...names: string[]): Subspace {
    invariant(names.length > 0, 'At least one name must be provided.')

    return new Subspace(concatBytes(...names.map(encodeName)))
  }

  range(): KeyRange {
    return {
      begin: concatBytes(this.prefix, Uint8Array.of(0x00)),
      end: concatBytes(this.prefix, Uint8Array.of(0xff))
    }
  }

  contains(key: Uint8Array): boolean {
    return inRange(key, this.range())
  }

  pack(suffix: Uint8Array): Uint8Array {
    return concatBytes(this.prefix, suffix)
  }

  /**
   * Strip the prefix from a key inside this subspace.
   * Returns null for keys outside it.
   */
  unpack(key: Uint8Array): Uint8Array | null {
    if (!this.contains(key)) {
      return null
    }
    return key.subarray(this.prefix.length)
  }
}

/**
 * Tuple string element: type code, UTF-8 bytes with 0x00 escaped as
 * 0x00 0xff, terminating 0x00.
 */
function encodeName(name: string): Uint8Array {
  const bytes = new TextEncoder().encode(name)
  const out: number[] = [stringTypeCode]
  for (const byte of bytes) {
    out.push(byte)
    if (byte === 0x00) {
      out.push(0xff)
    }
  }
  out.push(0x00)
  return Uint8Array.from(out)
}
