/**
 * Corruption integration tests for StorageEngine.
 * Tests that damaged WAL entries and commit records end replay cleanly.
 */

import { describe, it, expect, afterEach, beforeEach } from 'vitest'
import { appendFile, readFile, writeFile } from 'node:fs/promises'
import { StorageEngine } from '../storage-engine'
import { Subspace } from '../subspace'
import { Wal } from '../wal'
import { logger } from '../../logger'
import { Vector } from '../../vector'
import { textScalar } from '../../value-codec'
import {
  createTestPaths,
  cleanup,
  collectEntries,
  flipByte,
  captureLogs,
  walEntrySize,
  type CapturedLine,
  type TestPaths
} from './helpers'

describe('StorageEngine corruption handling', () => {
  const testPathsList: TestPaths[] = []
  const vector = new Vector(Subspace.of('corruption'))
  let logs: CapturedLine[]

  beforeEach(() => {
    const capture = captureLogs()
    logs = capture.lines
    logger.setSink(capture.sink)
  })

  afterEach(async () => {
    logger.setSink()
    await cleanup(testPathsList)
    testPathsList.length = 0
  })

  async function pushAll(paths: TestPaths, values: string[]): Promise<void> {
    const engine = await StorageEngine.create({ dataPath: paths.dataPath })
    try {
      for (const value of values) {
        await engine.transact((tx) => vector.push(value, tx))
      }
    } finally {
      await engine.close()
    }
  }

  async function readAll(paths: TestPaths): Promise<string[]> {
    const engine = await StorageEngine.create({ dataPath: paths.dataPath })
    try {
      const items = await engine.transact((tx) =>
        vector.getRange({}, tx).toArray()
      )
      return items.map(({ value }) => (value.kind === 'text' ? value.value : ''))
    } finally {
      await engine.close()
    }
  }

  function warnings(): string[] {
    return logs
      .filter((entry) => entry.level === 'warn')
      .map((entry) => entry.line.replace(/^\[[^\]]+\] /, ''))
  }

  it('ignores a torn WAL tail and overwrites it on the next commit', async () => {
    const paths = createTestPaths('torn-tail')
    testPathsList.push(paths)

    await pushAll(paths, ['a', 'b'])
    await appendFile(paths.walPath, new Uint8Array(20).fill(0xab))

    expect(await readAll(paths)).toEqual(['a', 'b'])

    await pushAll(paths, ['c'])

    expect(await readAll(paths)).toEqual(['a', 'b', 'c'])
    expect(warnings()).toEqual([
      `[WARN] [wal.truncate] Discarding unreadable WAL tail {"from":${2 * walEntrySize + 20},"to":${2 * walEntrySize}}`
    ])

    const wal = new Wal(paths.walPath)
    const entries = await collectEntries(wal.recover())
    await wal.close()
    expect(entries.map((entry) => entry.commitVersion)).toEqual([1n, 2n, 3n])
  })

  it('stops replay at a corrupted WAL entry', async () => {
    const paths = createTestPaths('bad-entry')
    testPathsList.push(paths)

    await pushAll(paths, ['a', 'b', 'c'])

    const walData = new Uint8Array(await readFile(paths.walPath))
    flipByte(walData, walEntrySize + 10)
    await writeFile(paths.walPath, walData)

    expect(await readAll(paths)).toEqual(['a'])
  })

  it('stops replay at a commit record that fails its checksum', async () => {
    const paths = createTestPaths('bad-record')
    testPathsList.push(paths)

    await pushAll(paths, ['a', 'b'])

    const wal = new Wal(paths.walPath)
    const entries = await collectEntries(wal.recover())
    await wal.close()

    const data = new Uint8Array(await readFile(paths.dataPath))
    flipByte(data, entries[1].offset + 30)
    await writeFile(paths.dataPath, data)

    expect(await readAll(paths)).toEqual(['a'])
    expect(warnings()).toEqual([
      '[WARN] [wal.replay.corrupt] Commit record failed validation, stopping replay {"commitVersion":"2","offset":' +
        entries[1].offset +
        '}'
    ])

    // The next commit replaces the unusable entry
    await pushAll(paths, ['c'])
    expect(await readAll(paths)).toEqual(['a', 'c'])
  })

  it('reports a corrupt commit record once while the WAL is unchanged', async () => {
    const paths = createTestPaths('bad-record-repeat')
    testPathsList.push(paths)

    await pushAll(paths, ['a', 'b', 'c'])

    const wal = new Wal(paths.walPath)
    const entries = await collectEntries(wal.recover())
    await wal.close()

    const data = new Uint8Array(await readFile(paths.dataPath))
    flipByte(data, entries[1].offset + 30)
    await writeFile(paths.dataPath, data)

    const engine = await StorageEngine.create({ dataPath: paths.dataPath })
    const sizes: bigint[] = []
    try {
      for (let i = 0; i < 5; i++) {
        sizes.push(await engine.transact((tx) => vector.size(tx)))
      }
    } finally {
      await engine.close()
    }

    expect(sizes).toEqual([1n, 1n, 1n, 1n, 1n])
    expect(warnings()).toEqual([
      '[WARN] [wal.replay.corrupt] Commit record failed validation, stopping replay {"commitVersion":"2","offset":' +
        entries[1].offset +
        '}'
    ])
  })

  it('ignores commit bytes that never got a WAL entry', async () => {
    const paths = createTestPaths('orphan-record')
    testPathsList.push(paths)

    await pushAll(paths, ['a'])
    await appendFile(paths.dataPath, new Uint8Array(10).fill(0x01))

    expect(await readAll(paths)).toEqual(['a'])

    await pushAll(paths, ['b'])
    expect(await readAll(paths)).toEqual(['a', 'b'])
  })

  it('refuses a data file it did not write', async () => {
    const paths = createTestPaths('foreign')
    testPathsList.push(paths)

    await writeFile(paths.dataPath, 'this is not a store file at all')

    await expect(
      StorageEngine.create({ dataPath: paths.dataPath })
    ).rejects.toThrow(`Not a kv-vector data file: ${paths.dataPath}`)
  })

  it('reads values back after recovery', async () => {
    const paths = createTestPaths('values')
    testPathsList.push(paths)

    await pushAll(paths, ['x'])

    const engine = await StorageEngine.create({ dataPath: paths.dataPath })
    const value = await engine.transact((tx) => vector.get(0, tx))
    await engine.close()

    expect(value).toEqual(textScalar('x'))
  })
})
