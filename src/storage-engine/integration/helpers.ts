import { rm } from 'node:fs/promises'
import { tmpdir } from 'node:os'
import { join } from 'node:path'
import { walEntrySize } from '../constants'
import { storePaths, type StorePaths } from '../storage-engine'
import type { LogLevel } from '../../logger'

export { walEntrySize }

export type TestPaths = StorePaths

/**
 * Generate unique store file paths in the OS temp directory.
 */
export function createTestPaths(prefix: string): TestPaths {
  const id = `${Date.now()}-${Math.random().toString(36).slice(2)}`
  return storePaths(join(tmpdir(), `kvvec-test-${prefix}-${id}.kvv`))
}

/**
 * Clean up test files.
 */
export async function cleanup(paths: TestPaths[]): Promise<void> {
  for (const { dataPath, walPath, lockPath } of paths) {
    await rm(dataPath, { force: true })
    await rm(walPath, { force: true })
    await rm(lockPath, { force: true })
  }
}

/**
 * Flip a single byte in a byte array at the specified index.
 */
export function flipByte(data: Uint8Array, index: number): void {
  if (index >= 0 && index < data.length) {
    data[index] = data[index] ^ 0xff
  }
}

/**
 * Collect all entries from an async generator into an array.
 */
export async function collectEntries<T>(
  generator: AsyncGenerator<T>
): Promise<T[]> {
  const entries: T[] = []
  for await (const entry of generator) {
    entries.push(entry)
  }
  return entries
}

export interface CapturedLine {
  level: LogLevel
  line: string
}

/**
 * Sink that keeps log lines in memory instead of printing them.
 */
export function captureLogs(): {
  lines: CapturedLine[]
  sink: (level: LogLevel, line: string) => void
} {
  const lines: CapturedLine[] = []
  return {
    lines,
    sink: (level, line) => {
      lines.push({ level, line })
    }
  }
}
