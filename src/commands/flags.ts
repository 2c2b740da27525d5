export const sharedFlags = {
  storePath: {
    type: String,
    alias: 's',
    description: 'Path to the store file',
    default: process.env.KVVEC_STORE_PATH ?? './vector.kvv'
  },
  namespace: {
    type: String,
    alias: 'n',
    description: 'Name of the vector inside the store',
    default: 'vector'
  },
  default: {
    type: String,
    alias: 'd',
    description: 'Value of sparse indices (parsed with --type)'
  },
  type: {
    type: String,
    alias: 't',
    description: 'Kind of values given on the command line: int, float or text',
    default: 'text'
  }
}

export const rangeFlags = {
  start: {
    type: String,
    description: 'First index; negative counts back from the size'
  },
  stop: {
    type: String,
    description: 'Opposite bound, exclusive; 0 or omitted means the size'
  },
  step: {
    type: String,
    description: 'Direction: positive ascending, negative descending'
  }
}

export interface SharedFlags {
  storePath: string
  namespace: string
  default: string | undefined
  type: string
}
