import { readFile } from 'node:fs/promises'
import { command } from 'cleye'
import { opType } from '../storage-engine/constants'
import { deserializeCommitRecord } from '../storage-engine/data-format'
import { formatKey } from '../storage-engine/keys'
import { storePaths } from '../storage-engine/storage-engine'
import type { Mutation } from '../storage-engine/types'
import { Wal } from '../storage-engine/wal'
import { runCommand } from './context'
import { sharedFlags } from './flags'

export function formatMutation(mutation: Mutation): string {
  switch (mutation.op) {
    case opType.set:
      return `SET ${formatKey(mutation.key)} (${mutation.value.length} bytes)`
    case opType.clear:
      return `CLEAR ${formatKey(mutation.key)}`
    case opType.clearRange:
      return `CLEAR_RANGE ${formatKey(mutation.begin)} .. ${formatKey(mutation.end)}`
  }
}

export const walCmd = command(
  {
    name: 'wal',
    flags: {
      storePath: sharedFlags.storePath
    },
    help: {
      description: 'Display WAL entries and their commits in human-readable format',
      examples: ['kvvec wal', 'kvvec wal -s ./my-store.kvv']
    }
  },
  (argv) =>
    runCommand(async () => {
      const paths = storePaths(argv.flags.storePath)
      const data = await readFile(paths.dataPath).catch(() => null)
      const wal = new Wal(paths.walPath)

      try {
        let count = 0
        for await (const entry of wal.recover()) {
          console.log(`[${entry.commitVersion}] COMMIT`)
          console.log(`  offset: ${entry.offset}, length: ${entry.length}`)

          const result = data
            ? deserializeCommitRecord(
                data.subarray(entry.offset, entry.offset + entry.length)
              )
            : null
          if (result) {
            for (const mutation of result.record.mutations) {
              console.log(`  ${formatMutation(mutation)}`)
            }
          } else {
            console.log('  (commit record unreadable)')
          }
          console.log()

          count++
        }

        if (count === 0) {
          console.log('WAL is empty')
        } else {
          console.log(`Total: ${count} entries`)
        }
      } finally {
        await wal.close()
      }
    })
)
