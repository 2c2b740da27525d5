/**
 * Recovery integration tests for StorageEngine.
 * Tests WAL replay on open and catching up with commits from other engines.
 */

import { describe, it, expect, afterEach } from 'vitest'
import { StorageEngine } from '../storage-engine'
import { Subspace } from '../subspace'
import { Wal } from '../wal'
import { NotCommittedError } from '../errors'
import { Vector } from '../../vector'
import { intScalar, textScalar } from '../../value-codec'
import { createTestPaths, cleanup, collectEntries, type TestPaths } from './helpers'

describe('StorageEngine recovery', () => {
  const testPathsList: TestPaths[] = []
  const engines: StorageEngine[] = []
  const vector = new Vector(Subspace.of('recovery'))

  afterEach(async () => {
    for (const engine of engines) {
      await engine.close()
    }
    engines.length = 0

    await cleanup(testPathsList)
    testPathsList.length = 0
  })

  async function open(paths: TestPaths): Promise<StorageEngine> {
    const engine = await StorageEngine.create({ dataPath: paths.dataPath })
    engines.push(engine)
    return engine
  }

  it('rebuilds the vector from the WAL on open', async () => {
    const paths = createTestPaths('rebuild')
    testPathsList.push(paths)

    const writer = await open(paths)
    await writer.transact(async (tx) => {
      await vector.push('a', tx)
      await vector.push('b', tx)
    })
    await writer.transact((tx) => vector.set(10, 7n, tx))
    await writer.transact((tx) => vector.pop(tx))

    const reader = await open(paths)
    const state = await reader.transact(async (tx) => ({
      size: await vector.size(tx),
      first: await vector.get(0, tx),
      last: await vector.back(tx)
    }))

    expect(state.size).toBe(10n)
    expect(state.first).toEqual(textScalar('a'))
    expect(state.last).toEqual(textScalar(''))
    expect(reader.getVersion()).toBe(3n)
  })

  it('writes one WAL entry per commit', async () => {
    const paths = createTestPaths('entries')
    testPathsList.push(paths)

    const engine = await open(paths)
    await engine.transact((tx) => vector.push(1n, tx))
    await engine.transact((tx) => vector.push(2n, tx))
    // No writes, no commit record
    await engine.transact((tx) => vector.size(tx))

    const wal = new Wal(paths.walPath)
    const entries = await collectEntries(wal.recover())
    await wal.close()

    expect(entries.map((entry) => entry.commitVersion)).toEqual([1n, 2n])
    expect(entries[0].offset).toBe(16)
    expect(entries[1].offset).toBe(16 + entries[0].length)
  })

  it('continues the version sequence after reopening', async () => {
    const paths = createTestPaths('versions')
    testPathsList.push(paths)

    const first = await open(paths)
    await first.transact((tx) => vector.push('a', tx))
    await first.close()
    engines.length = 0

    const second = await open(paths)
    await second.transact((tx) => vector.push('b', tx))

    expect(second.getVersion()).toBe(2n)
    expect(await second.transact((tx) => vector.size(tx))).toBe(2n)
  })

  it('sees commits made by another engine on the same files', async () => {
    const paths = createTestPaths('shared')
    testPathsList.push(paths)

    const left = await open(paths)
    const right = await open(paths)

    await left.transact((tx) => vector.push(1n, tx))
    await right.transact((tx) => vector.push(2n, tx))
    await left.transact((tx) => vector.push(3n, tx))

    const items = await right.transact((tx) => vector.getRange({}, tx).toArray())
    expect(items).toEqual([
      { index: 0n, value: intScalar(1) },
      { index: 1n, value: intScalar(2) },
      { index: 2n, value: intScalar(3) }
    ])
  })

  it('detects conflicts with commits from another engine', async () => {
    const paths = createTestPaths('cross-conflict')
    testPathsList.push(paths)

    const left = await open(paths)
    const right = await open(paths)

    const stale = right.createTransaction()
    await left.transact((tx) => vector.push('left', tx))
    await vector.push('right', stale)

    await expect(stale.commit()).rejects.toThrow(NotCommittedError)
    expect(await right.transact((tx) => vector.size(tx))).toBe(1n)
  })

  it('opens an empty store when no files exist', async () => {
    const paths = createTestPaths('fresh')
    testPathsList.push(paths)

    const engine = await open(paths)

    expect(engine.isDurable()).toBe(true)
    expect(engine.getVersion()).toBe(0n)
    expect(await engine.transact((tx) => vector.size(tx))).toBe(0n)
  })
})
