import { command } from 'cleye'
import type { RangeOptions } from '../types'
import { formatValue } from '../value-codec'
import { runCommand, withVector } from './context'
import { rangeFlags, sharedFlags } from './flags'
import { parseIndex, parseStep } from './parse'

export const range = command(
  {
    name: 'range',
    flags: {
      ...sharedFlags,
      ...rangeFlags
    },
    help: {
      description: 'Print the stored items in a slice of the vector',
      examples: [
        'kvvec range',
        'kvvec range --start 1 --stop 4',
        'kvvec range --start=-2 --step=-1'
      ]
    }
  },
  (argv) =>
    runCommand(async () => {
      const { start, stop, step } = argv.flags
      const options: RangeOptions = {
        start: start === undefined ? undefined : parseIndex(start),
        stop: stop === undefined ? undefined : parseIndex(stop),
        step: step === undefined ? undefined : parseStep(step)
      }

      const items = await withVector(argv.flags, (vector, tx) =>
        vector.getRange(options, tx).toArray()
      )

      if (items.length === 0) {
        console.log('No items')
        return
      }
      for (const { index, value } of items) {
        console.log(`${index}: ${formatValue(value)}`)
      }
    })
)
