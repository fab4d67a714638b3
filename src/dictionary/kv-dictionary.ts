/**
 * Overlay dictionary over a read-only key-value store.
 *
 * Reads merge three sources: the backing store, an in-memory overlay of
 * user edits, and a tombstone set of removed phrase keys. Writes only
 * touch the overlay and the tombstones; the store is never modified.
 */

import invariant from 'tiny-invariant'

import { createLogger } from '../logger'
import {
  decodeSyllables,
  encodeSyllables,
  formatSyllables,
  type Syllable
} from '../syllables'
import type { Dictionary } from './dictionary'
import { DictionaryUpdateError } from './errors'
import { infoKey, NullStore, type KVStore } from './kv-store'
import { comparePhraseRank } from './phrase'
import { bytesEqual, comparePhraseKeys } from './phrase-key'
import { decodePhraseRecord } from './phrase-record'
import { SortedPhraseMap } from './sorted-phrase-map'
import type {
  DictionaryEntry,
  DictionaryInfo,
  OverlayValue,
  Phrase,
  RawDictionaryEntry
} from './types'

const log = createLogger('kv-dictionary')

function compareEntryKeys(a: RawDictionaryEntry, b: RawDictionaryEntry): number {
  return comparePhraseKeys(
    { syllableKey: a.syllableKey, text: a.phrase.text },
    { syllableKey: b.syllableKey, text: b.phrase.text }
  )
}

function toPhrase(text: string, value: OverlayValue): Phrase {
  return { text, frequency: value.frequency, lastUsed: value.lastUsed }
}

export class KVDictionary<T extends KVStore = KVStore> implements Dictionary {
  private store: T | undefined
  private overlay = new SortedPhraseMap<OverlayValue>()
  private tombstones = new SortedPhraseMap<true>()

  constructor(store?: T) {
    this.store = store
  }

  /**
   * Create a dictionary over an empty store.
   */
  static inMemory(): KVDictionary<NullStore> {
    return new KVDictionary(new NullStore())
  }

  /**
   * Create a dictionary around `store` that takes over the overlay and
   * tombstones of `other`. `other` is left empty.
   */
  static fromRawParts<S extends KVStore>(
    store: S,
    other: KVDictionary<KVStore>
  ): KVDictionary<S> {
    const dictionary = new KVDictionary(store)
    dictionary.overlay = other.overlay
    dictionary.tombstones = other.tombstones
    other.overlay = new SortedPhraseMap()
    other.tombstones = new SortedPhraseMap()
    return dictionary
  }

  /**
   * Build an in-memory dictionary by adding every phrase in order.
   * Throws DictionaryUpdateError if the list repeats a phrase.
   */
  static fromEntries(
    entries: Iterable<[readonly Syllable[], readonly Phrase[]]>
  ): KVDictionary<NullStore> {
    const dictionary = KVDictionary.inMemory()
    for (const [syllables, phrases] of entries) {
      for (const phrase of phrases) {
        dictionary.addPhrase(syllables, phrase)
      }
    }
    return dictionary
  }

  /**
   * Detach the backing store. Until `set` is called, queries see only the
   * overlay.
   */
  take(): T | undefined {
    const store = this.store
    this.store = undefined
    return store
  }

  set(store: T): void {
    this.store = store
  }

  get overlaySize(): number {
    return this.overlay.size
  }

  get tombstoneCount(): number {
    return this.tombstones.size
  }

  private isTombstoned(syllableKey: Uint8Array, text: string): boolean {
    return this.tombstones.has({ syllableKey, text })
  }

  /**
   * Every phrase stored under exactly `syllableKey`: backing store hits
   * first, then overlay entries. Tombstoned phrases are skipped. The same
   * text may appear once from each source.
   */
  *entriesFor(syllableKey: Uint8Array): IterableIterator<Phrase> {
    if (this.store) {
      for (const value of this.store.find(syllableKey)) {
        const phrase = decodePhraseRecord(value)
        if (phrase && !this.isTombstoned(syllableKey, phrase.text)) {
          yield phrase
        }
      }
    }

    for (const { key, value } of this.overlay.range(syllableKey)) {
      if (!this.isTombstoned(syllableKey, key.text)) {
        yield toPhrase(key.text, value)
      }
    }
  }

  lookupFirstNPhrases(syllables: readonly Syllable[], first: number): Phrase[] {
    invariant(
      Number.isInteger(first) && first >= 0,
      'first must be a non-negative integer'
    )

    return this.lookupPhrases(syllables).slice(0, first)
  }

  /**
   * Distinct phrases in first-seen order. When a text repeats, the
   * higher-ranked variant takes the earlier slot.
   */
  lookupPhrases(syllables: readonly Syllable[]): Phrase[] {
    const positions = new Map<string, number>()
    const phrases: Phrase[] = []

    for (const phrase of this.entriesFor(encodeSyllables(syllables))) {
      const index = positions.get(phrase.text)
      if (index === undefined) {
        positions.set(phrase.text, phrases.length)
        phrases.push(phrase)
      } else if (comparePhraseRank(phrase, phrases[index]) > 0) {
        phrases[index] = phrase
      }
    }

    return phrases
  }

  /**
   * Backing store entries ascending by phrase key, without INFO and
   * undecodable records. A store that breaks its ordering contract is
   * sorted here, keeping the higher-ranked record of any repeated key.
   */
  private sortedStoreEntries(): RawDictionaryEntry[] {
    if (!this.store) {
      return []
    }

    const entries: RawDictionaryEntry[] = []
    let ascending = true

    for (const [syllableKey, value] of this.store.iter()) {
      if (bytesEqual(syllableKey, infoKey)) continue

      const phrase = decodePhraseRecord(value)
      if (!phrase) continue

      const entry = { syllableKey, phrase }
      if (
        ascending &&
        entries.length > 0 &&
        compareEntryKeys(entries[entries.length - 1], entry) >= 0
      ) {
        ascending = false
      }
      entries.push(entry)
    }

    if (ascending) {
      return entries
    }

    log.warn(
      { entries: entries.length },
      'backing store iteration is not strictly ascending, sorting it'
    )

    entries.sort(compareEntryKeys)
    const unique: RawDictionaryEntry[] = []
    for (const entry of entries) {
      const last = unique[unique.length - 1]
      if (last && compareEntryKeys(last, entry) === 0) {
        if (comparePhraseRank(entry.phrase, last.phrase) > 0) {
          unique[unique.length - 1] = entry
        }
      } else {
        unique.push(entry)
      }
    }
    return unique
  }

  /**
   * The merged dictionary, one entry per phrase key, ascending.
   *
   * When a key exists in both sources the overlay entry wins unless the
   * store entry has a strictly higher frequency.
   */
  *entriesIter(): IterableIterator<RawDictionaryEntry> {
    const stored = this.sortedStoreEntries()
    const edited = Array.from(
      this.overlay,
      ({ key, value }): RawDictionaryEntry => ({
        syllableKey: key.syllableKey.slice(),
        phrase: toPhrase(key.text, value)
      })
    )

    let i = 0
    let j = 0
    while (i < stored.length || j < edited.length) {
      let next: RawDictionaryEntry

      if (j >= edited.length) {
        next = stored[i++]
      } else if (i >= stored.length) {
        next = edited[j++]
      } else {
        const order = compareEntryKeys(stored[i], edited[j])
        if (order < 0) {
          next = stored[i++]
        } else if (order > 0) {
          next = edited[j++]
        } else {
          next =
            stored[i].phrase.frequency <= edited[j].phrase.frequency
              ? edited[j]
              : stored[i]
          i++
          j++
        }
      }

      if (!this.isTombstoned(next.syllableKey, next.phrase.text)) {
        yield next
      }
    }
  }

  entries(): DictionaryEntry[] {
    return Array.from(this.entriesIter(), ({ syllableKey, phrase }) => ({
      syllables: decodeSyllables(syllableKey),
      phrase
    }))
  }

  about(): DictionaryInfo {
    return {}
  }

  /**
   * Nothing to reload: the overlay lives in memory and the store handle is
   * owned by the caller.
   */
  async reopen(): Promise<void> {
    return
  }

  async flush(): Promise<void> {
    return
  }

  /**
   * Add a user phrase. Re-adding a removed phrase clears its tombstone.
   * @throws DictionaryUpdateError if the phrase is already visible
   */
  addPhrase(syllables: readonly Syllable[], phrase: Phrase): void {
    const syllableKey = encodeSyllables(syllables)

    for (const existing of this.entriesFor(syllableKey)) {
      if (existing.text === phrase.text) {
        throw new DictionaryUpdateError(
          'duplicate-phrase',
          `Phrase "${phrase.text}" already exists for ${formatSyllables(syllables)}`
        )
      }
    }

    const key = { syllableKey, text: phrase.text }
    this.tombstones.delete(key)
    this.overlay.set(key, {
      frequency: phrase.frequency,
      lastUsed: phrase.lastUsed ?? 0n
    })
  }

  updatePhrase(
    syllables: readonly Syllable[],
    phrase: Phrase,
    frequency: number,
    lastUsed: bigint
  ): void {
    this.overlay.set(
      { syllableKey: encodeSyllables(syllables), text: phrase.text },
      { frequency, lastUsed }
    )
  }

  removePhrase(syllables: readonly Syllable[], text: string): void {
    const key = { syllableKey: encodeSyllables(syllables), text }
    this.overlay.delete(key)
    this.tombstones.set(key, true)
  }
}
