import { command } from 'cleye'

import { sharedFlags } from './flags'
import { runCommand, withDictionary } from './with-dictionary'

export const info = command(
  {
    name: 'info',
    flags: {
      ...sharedFlags
    },
    help: {
      description: 'Print dictionary metadata',
      examples: ['phrase-kv info', 'phrase-kv info -s ./vendor.pkvd']
    }
  },
  (argv) =>
    runCommand(async () => {
      await withDictionary(
        { path: argv.flags.storePath, readOnly: true },
        (dictionary) => {
          console.log(JSON.stringify(dictionary.about(), null, 2))
        }
      )
    })
)
