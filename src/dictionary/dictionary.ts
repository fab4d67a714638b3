import type { Syllable } from '../syllables'
import type { DictionaryEntry, DictionaryInfo, Phrase } from './types'

/**
 * Query and update surface shared by every phrase dictionary.
 *
 * Mutations are synchronous and throw DictionaryUpdateError on failure.
 * Persistence (`reopen`, `flush`) is asynchronous and may be a no-op.
 */
export interface Dictionary {
  /**
   * Up to `first` distinct phrases for the syllables, in source order.
   */
  lookupFirstNPhrases(syllables: readonly Syllable[], first: number): Phrase[]
  /**
   * Every distinct phrase for the syllables, in source order.
   */
  lookupPhrases(syllables: readonly Syllable[]): Phrase[]
  /**
   * The whole merged dictionary, ascending by phrase key.
   */
  entries(): DictionaryEntry[]
  about(): DictionaryInfo
  reopen(): Promise<void>
  flush(): Promise<void>
  addPhrase(syllables: readonly Syllable[], phrase: Phrase): void
  updatePhrase(
    syllables: readonly Syllable[],
    phrase: Phrase,
    frequency: number,
    lastUsed: bigint
  ): void
  removePhrase(syllables: readonly Syllable[], text: string): void
}
