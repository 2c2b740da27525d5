/**
 * Commit record serialization and deserialization.
 *
 * Binary format:
 * [magic:4][version:2][flags:2][commitVersion:8][timestamp:8][mutationCount:4][mutations...][checksum:4][trailer:4]
 *
 * Each mutation is [op:1] followed by length-prefixed byte strings:
 *   set        [keyLen:4][key][valueLen:4][value]
 *   clear      [keyLen:4][key]
 *   clearRange [beginLen:4][begin][endLen:4][end]
 */

import {
  recordMagic,
  recordTrailer,
  recordVersion,
  headerMagic,
  headerVersion,
  headerSize,
  headerOffsets,
  commitRecordPrefixSize,
  commitRecordSuffixSize,
  opType
} from './constants'
import type {
  CommitRecord,
  DataFileHeader,
  DeserializeCommitResult,
  Mutation
} from './types'

/**
 * Calculate the encoded size of a single mutation.
 */
function mutationSize(mutation: Mutation): number {
  switch (mutation.op) {
    case opType.set:
      return 1 + 4 + mutation.key.length + 4 + mutation.value.length
    case opType.clear:
      return 1 + 4 + mutation.key.length
    case opType.clearRange:
      return 1 + 4 + mutation.begin.length + 4 + mutation.end.length
  }
}

/**
 * Calculate the size of a serialized commit record.
 */
export function calculateRecordSize(mutations: Mutation[]): number {
  const body = mutations.reduce((sum, m) => sum + mutationSize(m), 0)
  return commitRecordPrefixSize + body + commitRecordSuffixSize
}

/**
 * Serialize a commit record to bytes.
 */
export function serializeCommitRecord(record: CommitRecord): Uint8Array {
  const size = calculateRecordSize(record.mutations)
  const buffer = new Uint8Array(size)
  const view = new DataView(buffer.buffer)

  let offset = 0

  view.setUint32(offset, recordMagic, true)
  offset += 4

  view.setUint16(offset, recordVersion, true)
  offset += 2

  // Flags (2 bytes) - reserved
  view.setUint16(offset, 0, true)
  offset += 2

  view.setBigInt64(offset, record.commitVersion, true)
  offset += 8

  view.setBigInt64(offset, record.timestamp, true)
  offset += 8

  view.setUint32(offset, record.mutations.length, true)
  offset += 4

  const writeBytes = (bytes: Uint8Array): void => {
    view.setUint32(offset, bytes.length, true)
    offset += 4
    buffer.set(bytes, offset)
    offset += bytes.length
  }

  for (const mutation of record.mutations) {
    view.setUint8(offset, mutation.op)
    offset += 1

    switch (mutation.op) {
      case opType.set:
        writeBytes(mutation.key)
        writeBytes(mutation.value)
        break
      case opType.clear:
        writeBytes(mutation.key)
        break
      case opType.clearRange:
        writeBytes(mutation.begin)
        writeBytes(mutation.end)
        break
    }
  }

  // Checksum of everything before the checksum field
  const checksum = crc32(buffer.subarray(0, offset))
  view.setUint32(offset, checksum, true)
  offset += 4

  view.setUint32(offset, recordTrailer, true)

  return buffer
}

/**
 * Deserialize a commit record from bytes.
 * Returns null if the record is truncated or corrupted.
 */
export function deserializeCommitRecord(
  data: Uint8Array,
  startOffset = 0
): DeserializeCommitResult | null {
  const available = data.length - startOffset
  if (available < commitRecordPrefixSize + commitRecordSuffixSize) {
    return null
  }

  const view = new DataView(
    data.buffer,
    data.byteOffset + startOffset,
    available
  )

  let offset = 0

  if (view.getUint32(offset, true) !== recordMagic) {
    return null
  }
  offset += 4

  if (view.getUint16(offset, true) !== recordVersion) {
    return null
  }
  offset += 2

  // Flags (skip)
  offset += 2

  const commitVersion = view.getBigInt64(offset, true)
  offset += 8

  const timestamp = view.getBigInt64(offset, true)
  offset += 8

  const mutationCount = view.getUint32(offset, true)
  offset += 4

  const readBytes = (): Uint8Array | null => {
    if (offset + 4 > available) {
      return null
    }
    const length = view.getUint32(offset, true)
    offset += 4
    if (offset + length > available) {
      return null
    }
    const bytes = data.slice(
      startOffset + offset,
      startOffset + offset + length
    )
    offset += length
    return bytes
  }

  const mutations: Mutation[] = []
  for (let i = 0; i < mutationCount; i++) {
    if (offset + 1 > available) {
      return null
    }
    const op = view.getUint8(offset)
    offset += 1

    if (op === opType.set) {
      const key = readBytes()
      const value = readBytes()
      if (!key || !value) {
        return null
      }
      mutations.push({ op: opType.set, key, value })
    } else if (op === opType.clear) {
      const key = readBytes()
      if (!key) {
        return null
      }
      mutations.push({ op: opType.clear, key })
    } else if (op === opType.clearRange) {
      const begin = readBytes()
      const end = readBytes()
      if (!begin || !end) {
        return null
      }
      mutations.push({ op: opType.clearRange, begin, end })
    } else {
      return null
    }
  }

  if (offset + commitRecordSuffixSize > available) {
    return null
  }

  const storedChecksum = view.getUint32(offset, true)
  const computedChecksum = crc32(
    data.subarray(startOffset, startOffset + offset)
  )
  if (storedChecksum !== computedChecksum) {
    return null
  }
  offset += 4

  if (view.getUint32(offset, true) !== recordTrailer) {
    return null
  }
  offset += 4

  return {
    record: { commitVersion, timestamp, mutations },
    bytesRead: offset
  }
}

/**
 * Serialize the file header.
 */
export function serializeHeader(): Uint8Array {
  const buffer = new Uint8Array(headerSize)
  const view = new DataView(buffer.buffer)

  view.setUint32(headerOffsets.magic, headerMagic, true)
  view.setUint16(headerOffsets.version, headerVersion, true)

  // Reserved bytes are already zero

  return buffer
}

/**
 * Deserialize the file header.
 */
export function deserializeHeader(data: Uint8Array): DataFileHeader | null {
  if (data.length < headerSize) {
    return null
  }

  const view = new DataView(data.buffer, data.byteOffset)

  if (view.getUint32(headerOffsets.magic, true) !== headerMagic) {
    return null
  }

  return { version: view.getUint16(headerOffsets.version, true) }
}

/**
 * CRC32 implementation using the standard polynomial.
 */
const crc32Table = makeCrc32Table()

function makeCrc32Table(): Uint32Array {
  const table = new Uint32Array(256)
  for (let i = 0; i < 256; i++) {
    let c = i
    for (let j = 0; j < 8; j++) {
      if (c & 1) {
        c = 0xedb88320 ^ (c >>> 1)
      } else {
        c = c >>> 1
      }
    }
    table[i] = c
  }
  return table
}

export function crc32(data: Uint8Array): number {
  let crc = 0xffffffff
  for (let i = 0; i < data.length; i++) {
    crc = crc32Table[(crc ^ data[i]) & 0xff] ^ (crc >>> 8)
  }
  return (crc ^ 0xffffffff) >>> 0
}
