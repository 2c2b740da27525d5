/**
 * Concurrency integration tests.
 * Concurrent pushes race on the size read; conflicts are retried by transact.
 */

import { describe, it, expect, afterEach } from 'vitest'
import { StorageEngine } from '../storage-engine'
import { Subspace } from '../subspace'
import { Vector } from '../../vector'
import { createTestPaths, cleanup, type TestPaths } from './helpers'

describe('Concurrent pushes', () => {
  const testPathsList: TestPaths[] = []
  const engines: StorageEngine[] = []
  const vector = new Vector(Subspace.of('queue'))

  afterEach(async () => {
    for (const engine of engines) {
      await engine.close()
    }
    engines.length = 0

    await cleanup(testPathsList)
    testPathsList.length = 0
  })

  async function values(engine: StorageEngine): Promise<string[]> {
    const items = await engine.transact((tx) => vector.getRange({}, tx).toArray())
    return items.map(({ value }) => (value.kind === 'text' ? value.value : ''))
  }

  it('land on distinct indices in one engine', async () => {
    const engine = await StorageEngine.create()
    engines.push(engine)

    const pushed = Array.from({ length: 10 }, (_, i) => `item-${i}`)
    await Promise.all(
      pushed.map((value) => engine.transact((tx) => vector.push(value, tx)))
    )

    expect(await engine.transact((tx) => vector.size(tx))).toBe(10n)
    expect((await values(engine)).sort()).toEqual([...pushed].sort())
  })

  it('fail without retries when they overlap', async () => {
    const engine = await StorageEngine.create()
    engines.push(engine)

    const results = await Promise.allSettled(
      ['a', 'b'].map((value) =>
        engine.transact((tx) => vector.push(value, tx), { maxRetries: 0 })
      )
    )

    expect(results.map((result) => result.status).sort()).toEqual([
      'fulfilled',
      'rejected'
    ])
    expect(await engine.transact((tx) => vector.size(tx))).toBe(1n)
  })

  it(
    'land on distinct indices across engines sharing files',
    async () => {
      const paths = createTestPaths('concurrent-push')
      testPathsList.push(paths)

      const left = await StorageEngine.create({ dataPath: paths.dataPath })
      const right = await StorageEngine.create({ dataPath: paths.dataPath })
      engines.push(left, right)

      const pushed = Array.from({ length: 6 }, (_, i) => `item-${i}`)
      await Promise.all(
        pushed.map((value, i) =>
          (i % 2 === 0 ? left : right).transact((tx) => vector.push(value, tx))
        )
      )

      expect((await values(left)).sort()).toEqual([...pushed].sort())
      expect((await values(right)).sort()).toEqual([...pushed].sort())
      expect(left.getVersion()).toBe(6n)
    },
    20_000
  )
})
