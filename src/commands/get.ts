import { command } from 'cleye'
import { formatValue } from '../value-codec'
import { runCommand, withVector } from './context'
import { sharedFlags } from './flags'
import { parseIndex } from './parse'

export const get = command(
  {
    name: 'get',
    parameters: ['<index>'],
    flags: {
      ...sharedFlags
    },
    help: {
      description: 'Print the item at an index; sparse indices print the default',
      examples: ['kvvec get 3', 'kvvec get -n scores -t int -d 0 10']
    }
  },
  (argv) =>
    runCommand(async () => {
      const index = parseIndex(argv._.index)
      const value = await withVector(argv.flags, async (vector, tx) =>
        vector.resolve(await vector.get(index, tx))
      )
      console.log(formatValue(value))
    })
)
