import { command } from 'cleye'
import { formatValue } from '../value-codec'
import { runCommand, withVector } from './context'
import { sharedFlags } from './flags'
import { parseIndex, parseKind, parseScalar } from './parse'

export const set = command(
  {
    name: 'set',
    parameters: ['<index>', '<value>'],
    flags: {
      ...sharedFlags
    },
    help: {
      description: 'Write an item at an index, growing the vector if needed',
      examples: ['kvvec set 0 hello', 'kvvec set -t int 5 42']
    }
  },
  (argv) =>
    runCommand(async () => {
      const index = parseIndex(argv._.index)
      const value = parseScalar(argv._.value, parseKind(argv.flags.type))
      await withVector(argv.flags, (vector, tx) => vector.set(index, value, tx))
      console.log(`Set ${index} = ${formatValue(value)}`)
    })
)
