/**
 * Constants for the WAL-backed key-value store.
 *
 * These define the binary format for commit records and WAL entries.
 */

// Magic numbers for format validation
export const recordMagic = 0x4b56434d // ASCII "KVCM"
export const recordTrailer = 0xc0ffee00

// File header magic (ASCII "KVVC")
export const headerMagic = 0x4b565643

// Format versions
export const headerVersion = 1
export const recordVersion = 1
export const walVersion = 1

// Fixed sizes
export const headerSize = 16
export const walEntrySize = 48

// Commit record prefix: magic(4) + version(2) + flags(2) + commitVersion(8) + timestamp(8) + mutationCount(4)
export const commitRecordPrefixSize = 28
// checksum(4) + trailer(4)
export const commitRecordSuffixSize = 8

// WAL entry layout (48 bytes total)
export const walEntryLayout = {
  magic: 0, // 4 bytes
  version: 4, // 2 bytes
  flags: 6, // 2 bytes
  commitVersion: 8, // 8 bytes
  offset: 16, // 8 bytes
  length: 24, // 4 bytes
  recordChecksum: 28, // 4 bytes (CRC32 of the commit record)
  reserved: 32, // 8 bytes
  checksum: 40, // 4 bytes
  trailer: 44 // 4 bytes
} as const

// Header field offsets
export const headerOffsets = {
  magic: 0, // 4 bytes
  version: 4, // 2 bytes
  reserved: 6 // 10 bytes
} as const

// Mutation types
export const opType = {
  set: 0,
  clear: 1,
  clearRange: 2
} as const

// Default file extensions
export const fileExtensions = {
  data: '.kvv',
  wal: '.kvv-wal',
  lock: '.kvv.lock'
} as const

export const defaultLockTimeout = 10_000
export const defaultMaxCommitHistory = 1000
export const defaultMaxRetries = 10
