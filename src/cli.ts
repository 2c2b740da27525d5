#!/usr/bin/env node
import { readFileSync } from 'node:fs'
import { join } from 'node:path'
import { cli } from 'cleye'
import { back } from './commands/back'
import { clear } from './commands/clear'
import { front } from './commands/front'
import { get } from './commands/get'
import { pop } from './commands/pop'
import { push } from './commands/push'
import { range } from './commands/range'
import { set } from './commands/set'
import { size } from './commands/size'
import { walCmd } from './commands/wal'
import type { PackageJson } from './types'

function readPackageJson(): PackageJson {
  const parsed: unknown = JSON.parse(
    readFileSync(join(__dirname, '..', 'package.json'), 'utf-8')
  )
  if (
    typeof parsed === 'object' &&
    parsed !== null &&
    'name' in parsed &&
    'version' in parsed &&
    typeof parsed.name === 'string' &&
    typeof parsed.version === 'string'
  ) {
    const description =
      'description' in parsed && typeof parsed.description === 'string'
        ? parsed.description
        : ''
    return { name: parsed.name, version: parsed.version, description }
  }
  throw new Error('package.json is missing a name or version')
}

const packageJson = readPackageJson()

cli({
  name: 'kvvec',
  version: packageJson.version,
  help: {
    description: packageJson.description
  },
  commands: [size, get, set, push, pop, back, front, range, clear, walCmd]
})
