import { command } from 'cleye'

import { createPhrase } from '../dictionary/phrase'
import { parseSyllables } from '../syllables'
import { lastUsedFlags, parseFrequency, sharedFlags } from './flags'
import { runCommand, withDictionary } from './with-dictionary'

export const add = command(
  {
    name: 'add',
    parameters: ['<syllables>', '<text>'],
    flags: {
      ...sharedFlags,
      ...lastUsedFlags,
      frequency: {
        type: parseFrequency,
        alias: 'f',
        default: 1,
        description: 'Initial frequency'
      }
    },
    help: {
      description: 'Add a user phrase',
      examples: [
        'phrase-kv add 0x2c00,0x0a1b 字典',
        'phrase-kv add -f 5 -s ./user.pkvd 0x2c00 字'
      ]
    }
  },
  (argv) =>
    runCommand(async () => {
      const [input, text] = argv._
      const syllables = parseSyllables(input)
      const lastUsed = argv.flags.lastUsed ?? BigInt(Date.now())

      await withDictionary({ path: argv.flags.storePath }, async (dictionary) => {
        dictionary.addPhrase(
          syllables,
          createPhrase(text, argv.flags.frequency, lastUsed)
        )
        await dictionary.flush()
        console.log(`Added "${text}"`)
      })
    })
)
