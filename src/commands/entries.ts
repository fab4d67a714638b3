import { command } from 'cleye'

import { formatSyllables } from '../syllables'
import { sharedFlags } from './flags'
import { runCommand, withDictionary } from './with-dictionary'

export const entries = command(
  {
    name: 'entries',
    flags: {
      ...sharedFlags
    },
    help: {
      description: 'Print every phrase in the dictionary',
      examples: ['phrase-kv entries', 'phrase-kv entries -s ./user.pkvd']
    }
  },
  (argv) =>
    runCommand(async () => {
      await withDictionary(
        { path: argv.flags.storePath, readOnly: true },
        (dictionary) => {
          const all = dictionary.entries()

          for (const { syllables, phrase } of all) {
            console.log(
              `${formatSyllables(syllables)}\t${phrase.text}\t${phrase.frequency}\t${phrase.lastUsed ?? '-'}`
            )
          }

          console.log(`Total: ${all.length} phrases`)
        }
      )
    })
)
