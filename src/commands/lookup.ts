import { command } from 'cleye'

import { parseSyllables } from '../syllables'
import { lookupFlags, sharedFlags } from './flags'
import { runCommand, withDictionary } from './with-dictionary'

export const lookup = command(
  {
    name: 'lookup',
    parameters: ['<syllables>'],
    flags: {
      ...sharedFlags,
      ...lookupFlags
    },
    help: {
      description: 'List candidate phrases for a syllable sequence',
      examples: [
        'phrase-kv lookup 0x2c00,0x0a1b',
        'phrase-kv lookup -l 3 -s ./user.pkvd "0x2c00 0x0a1b"'
      ]
    }
  },
  (argv) =>
    runCommand(async () => {
      const [input] = argv._
      const syllables = parseSyllables(input)

      await withDictionary(
        { path: argv.flags.storePath, readOnly: true },
        (dictionary) => {
          const phrases = dictionary.lookupFirstNPhrases(
            syllables,
            argv.flags.limit
          )

          if (phrases.length === 0) {
            console.log('No phrases found')
            process.exitCode = 1
            return
          }

          for (const phrase of phrases) {
            console.log(
              `${phrase.text}\t${phrase.frequency}\t${phrase.lastUsed ?? '-'}`
            )
          }
        }
      )
    })
)
