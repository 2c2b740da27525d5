import { command } from 'cleye'
import { formatValue } from '../value-codec'
import { runCommand, withVector } from './context'
import { sharedFlags } from './flags'
import { parseKind, parseScalar } from './parse'

export const push = command(
  {
    name: 'push',
    parameters: ['<value>'],
    flags: {
      ...sharedFlags
    },
    help: {
      description: 'Append an item',
      examples: ['kvvec push hello', 'kvvec push -t float 2.5']
    }
  },
  (argv) =>
    runCommand(async () => {
      const value = parseScalar(argv._.value, parseKind(argv.flags.type))
      const index = await withVector(argv.flags, async (vector, tx) => {
        const next = await vector.size(tx)
        await vector.push(value, tx)
        return next
      })
      console.log(`Pushed ${formatValue(value)} at ${index}`)
    })
)
