/**
 * Ordered map keyed by phrase key.
 *
 * Entries live in an array kept sorted by (syllable key, text), so point
 * lookups and range starts are binary searches and iteration is ordered.
 */

import { bytesEqual, comparePhraseKeys } from './phrase-key'
import type { PhraseKey } from './types'

export interface SortedPhraseMapEntry<V> {
  key: PhraseKey
  value: V
}

export class SortedPhraseMap<V> {
  private entries: Array<SortedPhraseMapEntry<V>> = []

  /**
   * Index of the first entry whose key is not less than `key`.
   */
  private lowerBound(key: PhraseKey): number {
    let low = 0
    let high = this.entries.length

    while (low < high) {
      const mid = (low + high) >>> 1
      if (comparePhraseKeys(this.entries[mid].key, key) < 0) {
        low = mid + 1
      } else {
        high = mid
      }
    }

    return low
  }

  private indexOf(key: PhraseKey): number {
    const index = this.lowerBound(key)
    if (
      index < this.entries.length &&
      comparePhraseKeys(this.entries[index].key, key) === 0
    ) {
      return index
    }
    return -1
  }

  get(key: PhraseKey): V | undefined {
    const index = this.indexOf(key)
    return index === -1 ? undefined : this.entries[index].value
  }

  has(key: PhraseKey): boolean {
    return this.indexOf(key) !== -1
  }

  /**
   * Insert or replace. The key's bytes are copied so callers may reuse
   * their buffers.
   */
  set(key: PhraseKey, value: V): void {
    const index = this.lowerBound(key)
    if (
      index < this.entries.length &&
      comparePhraseKeys(this.entries[index].key, key) === 0
    ) {
      this.entries[index].value = value
      return
    }

    this.entries.splice(index, 0, {
      key: { syllableKey: key.syllableKey.slice(), text: key.text },
      value
    })
  }

  /**
   * @returns true if the key was present
   */
  delete(key: PhraseKey): boolean {
    const index = this.indexOf(key)
    if (index === -1) {
      return false
    }
    this.entries.splice(index, 1)
    return true
  }

  /**
   * Entries whose syllable key equals `syllableKey`, ascending by text.
   */
  *range(syllableKey: Uint8Array): IterableIterator<SortedPhraseMapEntry<V>> {
    for (
      let i = this.lowerBound({ syllableKey, text: '' });
      i < this.entries.length && bytesEqual(this.entries[i].key.syllableKey, syllableKey);
      i++
    ) {
      yield this.entries[i]
    }
  }

  [Symbol.iterator](): IterableIterator<SortedPhraseMapEntry<V>> {
    return this.entries[Symbol.iterator]()
  }

  clear(): void {
    this.entries = []
  }

  get size(): number {
    return this.entries.length
  }
}
