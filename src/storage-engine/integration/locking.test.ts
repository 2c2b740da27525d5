/**
 * Locking integration tests for StorageEngine.
 * The lock file is held only while a commit is written.
 */

import { describe, it, expect, afterEach } from 'vitest'
import { rm, stat, writeFile } from 'node:fs/promises'
import { StorageEngine } from '../storage-engine'
import { DatabaseLockedError } from '../file-lock'
import { Subspace } from '../subspace'
import { Vector } from '../../vector'
import { createTestPaths, cleanup, type TestPaths } from './helpers'

describe('StorageEngine locking', () => {
  const testPathsList: TestPaths[] = []
  const engines: StorageEngine[] = []
  const vector = new Vector(Subspace.of('locking'))

  afterEach(async () => {
    for (const engine of engines) {
      await engine.close()
    }
    engines.length = 0

    await cleanup(testPathsList)
    testPathsList.length = 0
  })

  async function open(paths: TestPaths, lockTimeout?: number) {
    const engine = await StorageEngine.create({
      dataPath: paths.dataPath,
      lockTimeout
    })
    engines.push(engine)
    return engine
  }

  it('opening does not create the lock file', async () => {
    const paths = createTestPaths('locking-open')
    testPathsList.push(paths)

    await open(paths)

    await expect(stat(paths.lockPath)).rejects.toThrow()
  })

  it('releases the lock file after each commit', async () => {
    const paths = createTestPaths('locking-release')
    testPathsList.push(paths)

    const engine = await open(paths)
    await engine.transact((tx) => vector.push('a', tx))

    await expect(stat(paths.lockPath)).rejects.toThrow()
  })

  it('fails a commit while another process holds the lock', async () => {
    const paths = createTestPaths('locking-held')
    testPathsList.push(paths)

    const engine = await open(paths, 0)
    await writeFile(paths.lockPath, '12345\n')

    const attempt = engine.transact((tx) => vector.push('a', tx))

    await expect(attempt).rejects.toThrow(DatabaseLockedError)
    await expect(
      engine.transact((tx) => vector.push('a', tx))
    ).rejects.toThrow(
      `Store is locked by another process (timeout after 0ms): ${paths.lockPath}`
    )
  })

  it('reads without the lock', async () => {
    const paths = createTestPaths('locking-reads')
    testPathsList.push(paths)

    const engine = await open(paths, 0)
    await engine.transact((tx) => vector.push('a', tx))
    await writeFile(paths.lockPath, '12345\n')

    expect(await engine.transact((tx) => vector.size(tx))).toBe(1n)
  })

  it('waits for the lock to be released', async () => {
    const paths = createTestPaths('locking-wait')
    testPathsList.push(paths)

    const engine = await open(paths, 2_000)
    await writeFile(paths.lockPath, '12345\n')
    setTimeout(() => {
      void rm(paths.lockPath, { force: true })
    }, 50)

    await engine.transact((tx) => vector.push('a', tx))

    expect(await engine.transact((tx) => vector.size(tx))).toBe(1n)
  })
})
