#!/usr/bin/env node
import { readFileSync } from 'node:fs'
import { join } from 'node:path'
import { cli } from 'cleye'
import { z } from 'zod'

import { add } from './commands/add'
import { entries } from './commands/entries'
import { info } from './commands/info'
import { lookup } from './commands/lookup'
import { remove } from './commands/remove'
import { update } from './commands/update'

const packageJsonSchema = z.object({
  name: z.string(),
  version: z.string(),
  description: z.string()
})

const packageJson = packageJsonSchema.parse(
  JSON.parse(readFileSync(join(__dirname, '..', 'package.json'), 'utf8'))
)

cli({
  name: packageJson.name,
  version: packageJson.version,
  help: {
    description: packageJson.description
  },
  commands: [lookup, entries, add, update, remove, info]
})
