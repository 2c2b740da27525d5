/**
 * A storable value: exactly one of the supported kinds.
 */
export type Scalar =
  | { kind: 'int'; value: bigint }
  | { kind: 'float'; value: number }
  | { kind: 'text'; value: string }

export type ScalarKind = Scalar['kind']

/**
 * Returned for reads that find no stored value: sparse gaps, and Pop or
 * Back on an empty vector. Never produced by decoding stored bytes.
 */
export interface EmptyValue {
  kind: 'empty'
}

export type Value = Scalar | EmptyValue

/**
 * Anything accepted where a scalar is written. bigint → int,
 * number → float, string → text.
 */
export type ScalarInput = Scalar | bigint | number | string

/**
 * Signed 64-bit index. A number must be a safe integer.
 */
export type Index = number | bigint

export interface IndexValue {
  index: bigint
  value: Scalar
}

export interface VectorOptions {
  /** Value of indices below the size that hold no entry (default: empty text) */
  defaultValue?: ScalarInput
}

export interface RangeOptions {
  /** First index; negative counts back from the size (default: 0) */
  start?: Index
  /** Bound opposite `start`, exclusive; 0 means the size, negative counts back from it (default: 0) */
  stop?: Index
  /** Only the sign matters: > 0 ascending, < 0 descending, 0 follows start/stop (default: 0) */
  step?: number
}

export interface PackageJson {
  name: string
  version: string
  description: string
}
