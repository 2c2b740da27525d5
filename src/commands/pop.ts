import { command } from 'cleye'
import { formatValue } from '../value-codec'
import { runCommand, withVector } from './context'
import { sharedFlags } from './flags'

export const pop = command(
  {
    name: 'pop',
    flags: {
      ...sharedFlags
    },
    help: {
      description: 'Remove and print the last item',
      examples: ['kvvec pop', 'kvvec pop -n scores']
    }
  },
  (argv) =>
    runCommand(async () => {
      const value = await withVector(argv.flags, (vector, tx) => vector.pop(tx))
      console.log(formatValue(value))
    })
)
