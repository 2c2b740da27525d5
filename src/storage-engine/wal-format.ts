/**
 * WAL entry serialization and deserialization.
 *
 * Fixed 48-byte format:
 * [magic:4][version:2][flags:2][commitVersion:8][offset:8][length:4][recordChecksum:4][reserved:8][checksum:4][trailer:4]
 */

import {
  recordMagic,
  recordTrailer,
  walVersion,
  walEntrySize,
  walEntryLayout
} from './constants'
import { crc32 } from './data-format'
import type { WalEntry, DeserializeWalResult } from './types'

/**
 * Serialize a WAL entry to a fixed 48-byte buffer.
 */
export function serializeWalEntry(entry: WalEntry): Uint8Array {
  const buffer = new Uint8Array(walEntrySize)
  const view = new DataView(buffer.buffer)

  view.setUint32(walEntryLayout.magic, recordMagic, true)
  view.setUint16(walEntryLayout.version, walVersion, true)
  view.setUint16(walEntryLayout.flags, 0, true)
  view.setBigInt64(walEntryLayout.commitVersion, entry.commitVersion, true)
  view.setBigUint64(walEntryLayout.offset, BigInt(entry.offset), true)
  view.setUint32(walEntryLayout.length, entry.length, true)
  view.setUint32(walEntryLayout.recordChecksum, entry.recordChecksum, true)

  // Reserved (8 bytes) - already zero

  const checksum = crc32(buffer.subarray(0, walEntryLayout.checksum))
  view.setUint32(walEntryLayout.checksum, checksum, true)

  view.setUint32(walEntryLayout.trailer, recordTrailer, true)

  return buffer
}

/**
 * Deserialize a WAL entry from bytes.
 * Returns null if the entry is invalid or corrupted.
 */
export function deserializeWalEntry(
  data: Uint8Array,
  startOffset = 0
): DeserializeWalResult | null {
  if (data.length - startOffset < walEntrySize) {
    return null
  }

  const view = new DataView(
    data.buffer,
    data.byteOffset + startOffset,
    walEntrySize
  )

  if (view.getUint32(walEntryLayout.magic, true) !== recordMagic) {
    return null
  }

  if (view.getUint16(walEntryLayout.version, true) !== walVersion) {
    return null
  }

  const storedChecksum = view.getUint32(walEntryLayout.checksum, true)
  const computedChecksum = crc32(
    data.subarray(startOffset, startOffset + walEntryLayout.checksum)
  )
  if (storedChecksum !== computedChecksum) {
    return null
  }

  if (view.getUint32(walEntryLayout.trailer, true) !== recordTrailer) {
    return null
  }

  return {
    entry: {
      commitVersion: view.getBigInt64(walEntryLayout.commitVersion, true),
      offset: Number(view.getBigUint64(walEntryLayout.offset, true)),
      length: view.getUint32(walEntryLayout.length, true),
      recordChecksum: view.getUint32(walEntryLayout.recordChecksum, true)
    },
    bytesRead: walEntrySize
  }
}
