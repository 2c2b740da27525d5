export { Vector } from './vector'
export { VectorIterator, resolveRange } from './range-iterator'
export type { ResolvedRange } from './range-iterator'
export {
  KeyCodec,
  encodeIndex,
  decodeIndex,
  encodeTupleInt,
  toIndex,
  minInt64,
  maxInt64
} from './key-codec'
export {
  encodeValue,
  decodeValue,
  toScalar,
  intScalar,
  floatScalar,
  textScalar,
  emptyValue,
  isEmptyValue,
  scalarsEqual,
  formatValue,
  valueTag
} from './value-codec'
export {
  VectorError,
  InvalidIndexError,
  OutOfRangeError,
  UnsupportedTypeError,
  EmptyInputError,
  UnknownTagError,
  MalformedPayloadError,
  DecodeError
} from './errors'
export {
  StorageEngine,
  Transaction,
  Subspace,
  StorageError,
  NotCommittedError,
  TransactionTooOldError,
  TransactionClosedError,
  ReadOnlyError,
  DatabaseLockedError,
  LockPermissionError
} from './storage-engine'
export { Logger, logger } from './logger'
export type {
  KeyValueTransaction,
  KeyValue,
  KeyRange,
  RangeReadOptions,
  StorageEngineOptions,
  TransactOptions
} from './storage-engine'
export type { LogLevel, LogEntry, LogSink } from './logger'
export type {
  Scalar,
  ScalarKind,
  EmptyValue,
  Value,
  ScalarInput,
  Index,
  IndexValue,
  VectorOptions,
  RangeOptions
} from './types'
