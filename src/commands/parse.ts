import type { ScalarKind, Scalar } from '../types'
import { toScalar } from '../value-codec'

/**
 * Malformed command-line input.
 */
export class UsageError extends Error {
  constructor(message: string) {
    super(message)
    this.name = 'UsageError'
  }
}

const integerPattern = /^-?\d+$/

export function parseKind(text: string): ScalarKind {
  if (text === 'int' || text === 'float' || text === 'text') {
    return text
  }
  throw new UsageError(`Unknown type "${text}", expected int, float or text`)
}

/**
 * Parse an index argument. Sign is checked by the vector.
 */
export function parseIndex(text: string): bigint {
  if (!integerPattern.test(text)) {
    throw new UsageError(`Index must be an integer, got "${text}"`)
  }
  return BigInt(text)
}

export function parseStep(text: string): number {
  const step = Number(text)
  if (!integerPattern.test(text) || !Number.isSafeInteger(step)) {
    throw new UsageError(`Step must be an integer, got "${text}"`)
  }
  return step
}

export function parseScalar(text: string, kind: ScalarKind): Scalar {
  switch (kind) {
    case 'int':
      if (!integerPattern.test(text)) {
        throw new UsageError(`Expected an integer, got "${text}"`)
      }
      return toScalar(BigInt(text))
    case 'float': {
      const value = Number(text)
      if (text.trim() === '' || (Number.isNaN(value) && text !== 'NaN')) {
        throw new UsageError(`Expected a number, got "${text}"`)
      }
      return toScalar(value)
    }
    case 'text':
      return toScalar(text)
  }
}
