import { command } from 'cleye'
import { formatValue } from '../value-codec'
import { runCommand, withVector } from './context'
import { sharedFlags } from './flags'

export const back = command(
  {
    name: 'back',
    flags: {
      ...sharedFlags
    },
    help: {
      description: 'Print the last item, or (empty) for an empty vector',
      examples: ['kvvec back']
    }
  },
  (argv) =>
    runCommand(async () => {
      const value = await withVector(argv.flags, (vector, tx) => vector.back(tx))
      console.log(formatValue(value))
    })
)
