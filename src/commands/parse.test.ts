import { describe, it, expect } from 'vitest'
import { UsageError, parseIndex, parseKind, parseScalar, parseStep } from './parse'
import { UnsupportedTypeError } from '../errors'

describe('parseIndex', () => {
  it('parses signed integers as bigint', () => {
    expect(parseIndex('12')).toBe(12n)
    expect(parseIndex('-3')).toBe(-3n)
    expect(parseIndex('9223372036854775807')).toBe(9223372036854775807n)
  })

  it('rejects anything else', () => {
    expect(() => parseIndex('1.5')).toThrow(UsageError)
    expect(() => parseIndex('abc')).toThrow('Index must be an integer, got "abc"')
  })
})

describe('parseStep', () => {
  it('parses integer steps', () => {
    expect(parseStep('-1')).toBe(-1)
    expect(() => parseStep('up')).toThrow('Step must be an integer, got "up"')
  })
})

describe('parseKind', () => {
  it('accepts the three kinds', () => {
    expect(parseKind('int')).toBe('int')
    expect(parseKind('float')).toBe('float')
    expect(parseKind('text')).toBe('text')
    expect(() => parseKind('bool')).toThrow(
      'Unknown type "bool", expected int, float or text'
    )
  })
})

describe('parseScalar', () => {
  it('parses each kind', () => {
    expect(parseScalar('-42', 'int')).toEqual({ kind: 'int', value: -42n })
    expect(parseScalar('2.5', 'float')).toEqual({ kind: 'float', value: 2.5 })
    expect(parseScalar('NaN', 'float')).toEqual({ kind: 'float', value: NaN })
    expect(parseScalar('42', 'text')).toEqual({ kind: 'text', value: '42' })
  })

  it('rejects malformed numbers', () => {
    expect(() => parseScalar('4.2', 'int')).toThrow('Expected an integer, got "4.2"')
    expect(() => parseScalar('x', 'float')).toThrow('Expected a number, got "x"')
    expect(() => parseScalar(' ', 'float')).toThrow(UsageError)
  })

  it('rejects integers outside 64 bits', () => {
    expect(() => parseScalar('9223372036854775808', 'int')).toThrow(
      UnsupportedTypeError
    )
  })
})
