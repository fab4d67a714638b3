import { command } from 'cleye'

import { createPhrase } from '../dictionary/phrase'
import { parseSyllables } from '../syllables'
import { lastUsedFlags, parseFrequency, sharedFlags } from './flags'
import { runCommand, withDictionary } from './with-dictionary'

export const update = command(
  {
    name: 'update',
    parameters: ['<syllables>', '<text>', '<frequency>'],
    flags: {
      ...sharedFlags,
      ...lastUsedFlags
    },
    help: {
      description: 'Set the frequency of a phrase, adding it if needed',
      examples: [
        'phrase-kv update 0x2c00,0x0a1b 字典 42',
        'phrase-kv update -t 1700000000000 0x2c00 字 3'
      ]
    }
  },
  (argv) =>
    runCommand(async () => {
      const [input, text, frequencyInput] = argv._
      const syllables = parseSyllables(input)
      const frequency = parseFrequency(frequencyInput)
      const lastUsed = argv.flags.lastUsed ?? BigInt(Date.now())

      await withDictionary({ path: argv.flags.storePath }, async (dictionary) => {
        dictionary.updatePhrase(
          syllables,
          createPhrase(text, frequency, lastUsed),
          frequency,
          lastUsed
        )
        await dictionary.flush()
        console.log(`Updated "${text}" to frequency ${frequency}`)
      })
    })
)
