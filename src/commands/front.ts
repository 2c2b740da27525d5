import { command } from 'cleye'
import { formatValue } from '../value-codec'
import { runCommand, withVector } from './context'
import { sharedFlags } from './flags'

export const front = command(
  {
    name: 'front',
    flags: {
      ...sharedFlags
    },
    help: {
      description: 'Print the first item',
      examples: ['kvvec front']
    }
  },
  (argv) =>
    runCommand(async () => {
      const value = await withVector(argv.flags, async (vector, tx) =>
        vector.resolve(await vector.front(tx))
      )
      console.log(formatValue(value))
    })
)
