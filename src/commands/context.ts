import { StorageEngine } from '../storage-engine/storage-engine'
import { Subspace } from '../storage-engine/subspace'
import type { Transaction } from '../storage-engine/transaction'
import { Vector } from '../vector'
import type { SharedFlags } from './flags'
import { parseKind, parseScalar } from './parse'

/**
 * Open the store, run `fn` against the flagged vector in one
 * transaction, and close the store again.
 */
export async function withVector<T>(
  flags: SharedFlags,
  fn: (vector: Vector, tx: Transaction) => Promise<T> | T
): Promise<T> {
  const kind = parseKind(flags.type)
  const vector = new Vector(Subspace.of(flags.namespace), {
    defaultValue:
      flags.default === undefined
        ? undefined
        : parseScalar(flags.default, kind)
  })

  const engine = await StorageEngine.create({ dataPath: flags.storePath })
  try {
    return await engine.transact((tx) => fn(vector, tx))
  } finally {
    await engine.close()
  }
}

/**
 * Run a command body, reporting failures on stderr with a non-zero exit
 * code instead of a stack trace.
 */
export async function runCommand(body: () => Promise<void>): Promise<void> {
  try {
    await body()
  } catch (error) {
    console.error(`Error: ${error instanceof Error ? error.message : String(error)}`)
    process.exitCode = 1
  }
}
