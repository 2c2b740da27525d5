import { command } from 'cleye'
import { runCommand, withVector } from './context'
import { sharedFlags } from './flags'

export const clear = command(
  {
    name: 'clear',
    flags: {
      ...sharedFlags
    },
    help: {
      description: 'Remove every item from the vector',
      examples: ['kvvec clear -n scores']
    }
  },
  (argv) =>
    runCommand(async () => {
      await withVector(argv.flags, (vector, tx) => vector.clear(tx))
      console.log(`Cleared ${argv.flags.namespace}`)
    })
)
