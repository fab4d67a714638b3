/**
 * Read-only phrase store backed by a sorted store file.
 *
 * The whole file is loaded on open. Values are indexed by key for exact
 * lookups, and pairs are kept sorted by (key, record text bytes), which
 * matches phrase key order since UTF-8 byte order is code point order.
 */

import { readFile } from 'node:fs/promises'

import {
  infoKey,
  type KeyValuePair,
  type KVStore
} from '../dictionary/kv-store'
import { compareBytes, toHex } from '../dictionary/phrase-key'
import { recordTextBytes } from '../dictionary/phrase-record'
import type { DictionaryInfo } from '../dictionary/types'
import { decodeInfo, deserializeStore } from './store-format'

function comparePairs(a: KeyValuePair, b: KeyValuePair): number {
  const byKey = compareBytes(a[0], b[0])
  if (byKey !== 0) return byKey
  return compareBytes(recordTextBytes(a[1]), recordTextBytes(b[1]))
}

export class SortedFileStore implements KVStore {
  private readonly pairs: KeyValuePair[]
  private readonly values: Map<string, Uint8Array[]>

  private constructor(pairs: KeyValuePair[]) {
    this.pairs = [...pairs].sort(comparePairs)
    this.values = new Map()

    for (const [key, value] of this.pairs) {
      const hex = toHex(key)
      const existing = this.values.get(hex)
      if (existing) {
        existing.push(value)
      } else {
        this.values.set(hex, [value])
      }
    }
  }

  /**
   * Load a store file.
   * @throws StoreFormatError if the file is malformed
   */
  static async open(path: string): Promise<SortedFileStore> {
    const data = await readFile(path)
    return new SortedFileStore(deserializeStore(new Uint8Array(data)))
  }

  static fromPairs(pairs: readonly KeyValuePair[]): SortedFileStore {
    return new SortedFileStore([...pairs])
  }

  static empty(): SortedFileStore {
    return new SortedFileStore([])
  }

  find(key: Uint8Array): Iterable<Uint8Array> {
    return this.values.get(toHex(key)) ?? []
  }

  iter(): Iterable<KeyValuePair> {
    return this.pairs
  }

  /**
   * Metadata stored under the INFO key, or empty info if there is none.
   */
  info(): DictionaryInfo {
    const value = this.values.get(toHex(infoKey))?.[0]
    return value ? decodeInfo(value) : {}
  }

  /**
   * Number of stored pairs, including INFO.
   */
  count(): number {
    return this.pairs.length
  }
}
