import { describe, it, expect } from 'vitest'

import { encodePhraseRecord } from '../storage/store-format'
import { SortedFileStore } from '../storage/sorted-file-store'
import { encodeSyllables } from '../syllables'
import { DictionaryUpdateError } from './errors'
import { KVDictionary } from './kv-dictionary'
import {
  infoKey,
  NullStore,
  type KeyValuePair,
  type KVStore
} from './kv-store'
import { createPhrase } from './phrase'
import { bytesEqual, comparePhraseKeys } from './phrase-key'
import type { Phrase } from './types'

const syllables = [0x2c00, 0x0a1b]
const otherSyllables = [0x2c00]

function record(text: string, frequency: number, lastUsed: bigint): KeyValuePair {
  return [
    encodeSyllables(syllables),
    encodePhraseRecord({ text, frequency, lastUsed })
  ]
}

function phrase(text: string, frequency: number, lastUsed: bigint): Phrase {
  return { text, frequency, lastUsed }
}

/**
 * Store that serves pairs exactly as given, in the given order.
 */
class ArrayStore implements KVStore {
  constructor(private readonly pairs: KeyValuePair[]) {}

  find(key: Uint8Array): Iterable<Uint8Array> {
    return this.pairs
      .filter(([candidate]) => bytesEqual(candidate, key))
      .map(([, value]) => value)
  }

  iter(): Iterable<KeyValuePair> {
    return this.pairs
  }
}

function dictionaryWithStore(...pairs: KeyValuePair[]): KVDictionary<SortedFileStore> {
  return new KVDictionary(SortedFileStore.fromPairs(pairs))
}

describe('KVDictionary', () => {
  describe('in memory', () => {
    it('should return an added phrase from lookup', () => {
      const dictionary = KVDictionary.inMemory()
      dictionary.addPhrase(syllables, createPhrase('dict', 1, 2n))

      expect(dictionary.lookupFirstNPhrases(syllables, 1)).toEqual([
        phrase('dict', 1, 2n)
      ])
    })

    it('should list all entries in key order', () => {
      const dictionary = KVDictionary.inMemory()
      dictionary.addPhrase(syllables, createPhrase('dict', 1, 2n))
      dictionary.addPhrase(syllables, createPhrase('dict2', 1, 2n))
      dictionary.addPhrase(syllables, createPhrase('dict3', 1, 2n))

      expect(dictionary.entries()).toEqual([
        { syllables, phrase: phrase('dict', 1, 2n) },
        { syllables, phrase: phrase('dict2', 1, 2n) },
        { syllables, phrase: phrase('dict3', 1, 2n) }
      ])
    })

    it('should drop removed phrases from entries and lookups', () => {
      const dictionary = KVDictionary.inMemory()
      dictionary.addPhrase(syllables, createPhrase('dict', 1, 2n))
      dictionary.addPhrase(syllables, createPhrase('dict2', 1, 2n))
      dictionary.addPhrase(syllables, createPhrase('dict3', 1, 2n))
      dictionary.removePhrase(syllables, 'dict3')

      expect(dictionary.entries().map((entry) => entry.phrase)).toEqual([
        phrase('dict', 1, 2n),
        phrase('dict2', 1, 2n)
      ])
      expect(dictionary.lookupFirstNPhrases(syllables, 1)).toEqual([
        phrase('dict', 1, 2n)
      ])
    })

    it('should behave the same around an empty store', () => {
      const dictionary = new KVDictionary(SortedFileStore.empty())
      dictionary.addPhrase(syllables, createPhrase('dict', 1, 2n))

      expect(dictionary.lookupFirstNPhrases(syllables, 1)).toEqual([
        phrase('dict', 1, 2n)
      ])
    })

    it('should sit on a null store that never yields data', () => {
      const dictionary = KVDictionary.inMemory()
      const store = dictionary.take()

      expect(store).toBeInstanceOf(NullStore)
      expect(Array.from(store?.find(encodeSyllables(syllables)) ?? [])).toEqual([])
      expect(Array.from(store?.iter() ?? [])).toEqual([])
    })

    it('should default lastUsed to zero on add', () => {
      const dictionary = KVDictionary.inMemory()
      dictionary.addPhrase(syllables, createPhrase('fresh', 3))

      expect(dictionary.lookupPhrases(syllables)).toEqual([
        phrase('fresh', 3, 0n)
      ])
    })

    it('should keep syllable keys apart even when one is a prefix', () => {
      const dictionary = KVDictionary.inMemory()
      dictionary.addPhrase(syllables, createPhrase('long', 1, 1n))
      dictionary.addPhrase(otherSyllables, createPhrase('short', 1, 1n))

      expect(dictionary.lookupPhrases(otherSyllables)).toEqual([
        phrase('short', 1, 1n)
      ])
      expect(dictionary.lookupPhrases(syllables)).toEqual([
        phrase('long', 1, 1n)
      ])
    })

    it('should return nothing for unknown syllables', () => {
      expect(KVDictionary.inMemory().lookupPhrases([0x0101])).toEqual([])
    })
  })

  describe('addPhrase', () => {
    it('should reject a phrase already in the overlay', () => {
      const dictionary = KVDictionary.inMemory()
      dictionary.addPhrase(syllables, createPhrase('dict', 1, 2n))

      expect(() =>
        dictionary.addPhrase(syllables, createPhrase('dict', 7, 8n))
      ).toThrow(DictionaryUpdateError)
      expect(dictionary.lookupPhrases(syllables)).toEqual([
        phrase('dict', 1, 2n)
      ])
    })

    it('should report the duplicate reason', () => {
      const dictionary = KVDictionary.inMemory()
      dictionary.addPhrase(syllables, createPhrase('dict', 1))

      try {
        dictionary.addPhrase(syllables, createPhrase('dict', 1))
        expect.unreachable()
      } catch (error) {
        expect(error).toBeInstanceOf(DictionaryUpdateError)
        if (error instanceof DictionaryUpdateError) {
          expect(error.reason).toBe('duplicate-phrase')
          expect(error.cause).toBeUndefined()
          expect(error.message).toBe(
            'Phrase "dict" already exists for 0x2c00,0x0a1b'
          )
        }
      }
    })

    it('should reject a phrase already in the backing store', () => {
      const dictionary = dictionaryWithStore(record('vendor', 50, 1n))

      expect(() =>
        dictionary.addPhrase(syllables, createPhrase('vendor', 1))
      ).toThrow(DictionaryUpdateError)
      expect(dictionary.overlaySize).toBe(0)
    })

    it('should make a removed overlay phrase visible again when re-added', () => {
      const dictionary = KVDictionary.inMemory()
      dictionary.addPhrase(syllables, createPhrase('mine', 1, 1n))
      dictionary.removePhrase(syllables, 'mine')
      dictionary.addPhrase(syllables, createPhrase('mine', 4, 5n))

      expect(dictionary.lookupPhrases(syllables)).toEqual([
        phrase('mine', 4, 5n)
      ])
      expect(dictionary.tombstoneCount).toBe(0)
    })

    it('should let a re-added store phrase merge with its backing record', () => {
      const dictionary = dictionaryWithStore(record('vendor', 50, 1n))
      dictionary.removePhrase(syllables, 'vendor')
      dictionary.addPhrase(syllables, createPhrase('vendor', 3, 4n))

      expect(dictionary.lookupPhrases(syllables)).toEqual([
        phrase('vendor', 50, 1n)
      ])
      expect(dictionary.entries().map((entry) => entry.phrase)).toEqual([
        phrase('vendor', 50, 1n)
      ])
    })
  })

  describe('updatePhrase', () => {
    it('should insert a phrase that does not exist yet', () => {
      const dictionary = KVDictionary.inMemory()
      dictionary.updatePhrase(syllables, createPhrase('new', 0), 10, 99n)

      expect(dictionary.lookupPhrases(syllables)).toEqual([
        phrase('new', 10, 99n)
      ])
    })

    it('should replace the frequency and timestamp of an existing phrase', () => {
      const dictionary = KVDictionary.inMemory()
      dictionary.addPhrase(syllables, createPhrase('dict', 1, 2n))
      dictionary.updatePhrase(syllables, createPhrase('dict', 1, 2n), 10, 99n)

      expect(dictionary.lookupPhrases(syllables)).toEqual([
        phrase('dict', 10, 99n)
      ])
      expect(dictionary.overlaySize).toBe(1)
    })

    it('should leave a removed phrase hidden', () => {
      const dictionary = KVDictionary.inMemory()
      dictionary.removePhrase(syllables, 'gone')
      dictionary.updatePhrase(syllables, createPhrase('gone', 1), 2, 3n)

      expect(dictionary.lookupPhrases(syllables)).toEqual([])
    })
  })

  describe('removePhrase', () => {
    it('should hide a store phrase without touching the store', () => {
      const store = SortedFileStore.fromPairs([
        record('vendor', 50, 1n),
        record('kept', 20, 1n)
      ])
      const dictionary = new KVDictionary(store)
      dictionary.removePhrase(syllables, 'vendor')

      expect(dictionary.lookupPhrases(syllables)).toEqual([
        phrase('kept', 20, 1n)
      ])
      expect(dictionary.entries().map((entry) => entry.phrase.text)).toEqual([
        'kept'
      ])
      expect(Array.from(store.find(encodeSyllables(syllables)))).toHaveLength(2)
    })

    it('should hide both store and overlay variants of a phrase', () => {
      const dictionary = dictionaryWithStore(record('both', 5, 1n))
      dictionary.updatePhrase(syllables, createPhrase('both', 5), 9, 2n)
      dictionary.removePhrase(syllables, 'both')

      expect(dictionary.lookupPhrases(syllables)).toEqual([])
      expect(dictionary.entries()).toEqual([])
      expect(dictionary.overlaySize).toBe(0)
    })

    it('should hide a store phrase whose text starts with a byte order mark', () => {
      const dictionary = dictionaryWithStore(
        record('\ufeffab', 1, 2n),
        record('kept', 3, 1n)
      )
      dictionary.removePhrase(syllables, '\ufeffab')

      expect(dictionary.lookupPhrases(syllables)).toEqual([
        phrase('kept', 3, 1n)
      ])
      expect(dictionary.entries().map((entry) => entry.phrase.text)).toEqual([
        'kept'
      ])
    })

    it('should accept removing a phrase that never existed', () => {
      const dictionary = KVDictionary.inMemory()

      expect(() => dictionary.removePhrase(syllables, 'missing')).not.toThrow()
      expect(dictionary.tombstoneCount).toBe(1)
    })
  })

  describe('lookupFirstNPhrases', () => {
    it('should keep first-seen order and the higher-ranked duplicate', () => {
      const dictionary = dictionaryWithStore(
        record('b', 1, 1n),
        record('a', 1, 1n)
      )
      dictionary.updatePhrase(syllables, createPhrase('z', 0), 1, 1n)
      dictionary.updatePhrase(syllables, createPhrase('b', 0), 9, 0n)

      expect(dictionary.lookupPhrases(syllables)).toEqual([
        phrase('a', 1, 1n),
        phrase('b', 9, 0n),
        phrase('z', 1, 1n)
      ])
    })

    it('should break frequency ties by the later timestamp', () => {
      const dictionary = dictionaryWithStore(record('a', 4, 5n))
      dictionary.updatePhrase(syllables, createPhrase('a', 0), 4, 3n)

      expect(dictionary.lookupPhrases(syllables)).toEqual([phrase('a', 4, 5n)])

      dictionary.updatePhrase(syllables, createPhrase('a', 0), 4, 6n)

      expect(dictionary.lookupPhrases(syllables)).toEqual([phrase('a', 4, 6n)])
    })

    it('should return at most n phrases', () => {
      const dictionary = KVDictionary.fromEntries([
        [
          syllables,
          ['p1', 'p2', 'p3', 'p4', 'p5'].map((text) => createPhrase(text, 1, 1n))
        ]
      ])

      expect(dictionary.lookupFirstNPhrases(syllables, 3)).toEqual([
        phrase('p1', 1, 1n),
        phrase('p2', 1, 1n),
        phrase('p3', 1, 1n)
      ])
      expect(dictionary.lookupFirstNPhrases(syllables, 10)).toHaveLength(5)
      expect(dictionary.lookupFirstNPhrases(syllables, 0)).toEqual([])
    })

    it('should count distinct phrases when truncating', () => {
      const dictionary = dictionaryWithStore(
        record('a', 1, 1n),
        record('b', 1, 1n)
      )
      dictionary.updatePhrase(syllables, createPhrase('a', 0), 2, 2n)

      expect(dictionary.lookupFirstNPhrases(syllables, 5)).toEqual([
        phrase('a', 2, 2n),
        phrase('b', 1, 1n)
      ])
    })

    it('should reject a negative limit', () => {
      expect(() =>
        KVDictionary.inMemory().lookupFirstNPhrases(syllables, -1)
      ).toThrow('first must be a non-negative integer')
    })
  })

  describe('entries', () => {
    it('should prefer the overlay when frequencies tie', () => {
      const dictionary = dictionaryWithStore(record('shared', 5, 1n))
      dictionary.updatePhrase(syllables, createPhrase('shared', 0), 5, 9n)

      expect(dictionary.entries().map((entry) => entry.phrase)).toEqual([
        phrase('shared', 5, 9n)
      ])
    })

    it('should prefer the store when its frequency is higher', () => {
      const dictionary = dictionaryWithStore(record('shared', 8, 1n))
      dictionary.updatePhrase(syllables, createPhrase('shared', 0), 5, 9n)

      expect(dictionary.entries().map((entry) => entry.phrase)).toEqual([
        phrase('shared', 8, 1n)
      ])
    })

    it('should prefer the overlay when its frequency is higher', () => {
      const dictionary = dictionaryWithStore(record('shared', 8, 1n))
      dictionary.updatePhrase(syllables, createPhrase('shared', 0), 10, 0n)

      expect(dictionary.entries().map((entry) => entry.phrase)).toEqual([
        phrase('shared', 10, 0n)
      ])
    })

    it('should yield strictly ascending phrase keys across both sources', () => {
      const dictionary = new KVDictionary(
        SortedFileStore.fromPairs([
          [encodeSyllables([2]), encodePhraseRecord(phrase('x', 1, 1n))],
          [encodeSyllables([1]), encodePhraseRecord(phrase('m', 1, 1n))],
          [encodeSyllables([1, 3]), encodePhraseRecord(phrase('a', 1, 1n))],
          [encodeSyllables([1]), encodePhraseRecord(phrase('c', 1, 1n))]
        ])
      )
      dictionary.addPhrase([1], createPhrase('b', 1, 1n))
      dictionary.addPhrase([2], createPhrase('a', 1, 1n))
      dictionary.addPhrase([0x0100], createPhrase('q', 1, 1n))
      dictionary.updatePhrase([1], createPhrase('m', 0), 3, 3n)

      const raw = Array.from(dictionary.entriesIter())
      for (let i = 1; i < raw.length; i++) {
        const previous = {
          syllableKey: raw[i - 1].syllableKey,
          text: raw[i - 1].phrase.text
        }
        const current = { syllableKey: raw[i].syllableKey, text: raw[i].phrase.text }
        expect(comparePhraseKeys(previous, current)).toBe(-1)
      }
      expect(
        dictionary.entries().map(
          (entry) => `${entry.syllables.join('.')}:${entry.phrase.text}`
        )
      ).toEqual(['256:q', '1:b', '1:c', '1:m', '1.3:a', '2:a', '2:x'])
    })

    it('should skip the INFO key and undecodable records', () => {
      const valid = encodePhraseRecord(phrase('ok', 1, 1n))
      const truncated = valid.slice(0, valid.length - 1)
      const badUtf8 = encodePhraseRecord(phrase('xx', 1, 1n))
      badUtf8[13] = 0xff
      const dictionary = dictionaryWithStore(
        [infoKey, new TextEncoder().encode('{"name":"test"}')],
        [encodeSyllables(syllables), valid],
        [encodeSyllables(syllables), truncated],
        [encodeSyllables(syllables), badUtf8],
        [encodeSyllables(syllables), new Uint8Array(12)]
      )

      expect(dictionary.entries()).toEqual([
        { syllables, phrase: phrase('ok', 1, 1n) }
      ])
      expect(dictionary.lookupPhrases(syllables)).toEqual([phrase('ok', 1, 1n)])
    })

    it('should sort a store that breaks its ordering contract', () => {
      const dictionary = new KVDictionary(
        new ArrayStore([
          [encodeSyllables([2]), encodePhraseRecord(phrase('b', 1, 1n))],
          [encodeSyllables([1]), encodePhraseRecord(phrase('a', 1, 1n))],
          [encodeSyllables([2]), encodePhraseRecord(phrase('b', 6, 1n))],
          [encodeSyllables([2]), encodePhraseRecord(phrase('a', 1, 1n))]
        ])
      )

      expect(
        dictionary.entries().map((entry) => [entry.syllables, entry.phrase])
      ).toEqual([
        [[1], phrase('a', 1, 1n)],
        [[2], phrase('a', 1, 1n)],
        [[2], phrase('b', 6, 1n)]
      ])
    })
  })

  describe('store handle', () => {
    it('should see only the overlay while the store is detached', () => {
      const dictionary = dictionaryWithStore(record('vendor', 50, 1n))
      dictionary.addPhrase(syllables, createPhrase('mine', 1, 1n))

      const store = dictionary.take()
      expect(store?.count()).toBe(1)
      expect(dictionary.take()).toBeUndefined()
      expect(dictionary.lookupPhrases(syllables)).toEqual([
        phrase('mine', 1, 1n)
      ])

      if (store) {
        dictionary.set(store)
      }
      expect(dictionary.lookupPhrases(syllables)).toEqual([
        phrase('vendor', 50, 1n),
        phrase('mine', 1, 1n)
      ])
    })

    it('should move overlay and tombstones with fromRawParts', () => {
      const edits = KVDictionary.inMemory()
      edits.addPhrase(syllables, createPhrase('mine', 1, 1n))
      edits.removePhrase(syllables, 'vendor')

      const dictionary = KVDictionary.fromRawParts(
        SortedFileStore.fromPairs([
          record('vendor', 50, 1n),
          record('kept', 2, 1n)
        ]),
        edits
      )

      expect(dictionary.lookupPhrases(syllables)).toEqual([
        phrase('kept', 2, 1n),
        phrase('mine', 1, 1n)
      ])
      expect(edits.overlaySize).toBe(0)
      expect(edits.tombstoneCount).toBe(0)
      expect(edits.entries()).toEqual([])
    })
  })

  describe('fromEntries', () => {
    it('should reject a list that repeats a phrase', () => {
      expect(() =>
        KVDictionary.fromEntries([
          [syllables, [createPhrase('dup', 1)]],
          [syllables, [createPhrase('dup', 2)]]
        ])
      ).toThrow(DictionaryUpdateError)
    })
  })

  describe('persistence hooks', () => {
    it('should treat reopen and flush as no-ops', async () => {
      const dictionary = KVDictionary.inMemory()
      dictionary.addPhrase(syllables, createPhrase('dict', 1, 2n))

      await expect(dictionary.reopen()).resolves.toBeUndefined()
      await expect(dictionary.flush()).resolves.toBeUndefined()
      expect(dictionary.about()).toEqual({})
      expect(dictionary.lookupPhrases(syllables)).toEqual([
        phrase('dict', 1, 2n)
      ])
    })
  })
})
