import { command } from 'cleye'

import { parseSyllables } from '../syllables'
import { sharedFlags } from './flags'
import { runCommand, withDictionary } from './with-dictionary'

export const remove = command(
  {
    name: 'remove',
    parameters: ['<syllables>', '<text>'],
    flags: {
      ...sharedFlags
    },
    help: {
      description: 'Remove a phrase',
      examples: [
        'phrase-kv remove 0x2c00,0x0a1b 字典',
        'phrase-kv remove -s ./user.pkvd 0x2c00 字'
      ]
    }
  },
  (argv) =>
    runCommand(async () => {
      const [input, text] = argv._
      const syllables = parseSyllables(input)

      await withDictionary({ path: argv.flags.storePath }, async (dictionary) => {
        dictionary.removePhrase(syllables, text)
        await dictionary.flush()
        console.log(`Removed "${text}"`)
      })
    })
)
