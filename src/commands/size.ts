import { command } from 'cleye'
import { runCommand, withVector } from './context'
import { sharedFlags } from './flags'

export const size = command(
  {
    name: 'size',
    flags: {
      ...sharedFlags
    },
    help: {
      description: 'Print the number of items in the vector',
      examples: ['kvvec size', 'kvvec size -s ./my-store.kvv -n scores']
    }
  },
  (argv) =>
    runCommand(async () => {
      const count = await withVector(argv.flags, (vector, tx) => vector.size(tx))
      console.log(count.toString())
    })
)
