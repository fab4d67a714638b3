/**
 * Phrase dictionary persisted in a sorted store file.
 *
 * Queries and edits go through an overlay dictionary over the loaded
 * file. flush() rewrites the file with the merged contents and reloads
 * it; reopen() reloads it without touching pending edits.
 */

import { config } from '../config'
import type { Dictionary } from '../dictionary/dictionary'
import { DictionaryUpdateError } from '../dictionary/errors'
import { KVDictionary } from '../dictionary/kv-dictionary'
import { infoKey, type KeyValuePair, type KVStore } from '../dictionary/kv-store'
import type {
  DictionaryEntry,
  DictionaryInfo,
  Phrase
} from '../dictionary/types'
import { createLogger } from '../logger'
import type { Syllable } from '../syllables'
import { FileLock } from './file-lock'
import { Mutex } from './mutex'
import { SortedFileStore } from './sorted-file-store'
import {
  encodeInfo,
  encodePhraseRecord,
  PhraseTooLongError,
  serializeStore
} from './store-format'

const log = createLogger('file-dictionary')

export interface FileDictionaryOptions {
  /** Path to the store file */
  path: string
  /** Open without write access (default: false). flush() then fails. */
  readOnly?: boolean
  /** Lock acquisition timeout in milliseconds (default: from config). Use 0 to fail immediately. */
  lockTimeout?: number
  /** Metadata to write when the file carries none */
  info?: DictionaryInfo
}

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT'
}

async function loadStore(
  path: string,
  readOnly: boolean
): Promise<SortedFileStore> {
  try {
    return await SortedFileStore.open(path)
  } catch (error) {
    if (!isMissingFile(error)) {
      throw error
    }
    if (readOnly) {
      throw new Error(
        `Cannot open dictionary in read-only mode: no dictionary exists at ${path}`,
        { cause: error }
      )
    }
    return SortedFileStore.empty()
  }
}

export class FileDictionary implements Dictionary {
  private readonly path: string
  private readonly lock: FileLock
  private readonly readOnly: boolean
  private readonly mutex = new Mutex()
  private readonly dictionary: KVDictionary<SortedFileStore>
  private info: DictionaryInfo
  private closed = false

  private constructor(
    options: FileDictionaryOptions,
    dictionary: KVDictionary<SortedFileStore>,
    info: DictionaryInfo
  ) {
    this.path = options.path
    this.lock = new FileLock(
      options.path,
      options.lockTimeout ?? config.lockTimeout
    )
    this.readOnly = options.readOnly ?? false
    this.dictionary = dictionary
    this.info = info
  }

  /**
   * Open a dictionary file. A missing file opens as an empty dictionary
   * unless readOnly is set.
   *
   * Passing `edits` carries over the overlay and tombstones of another
   * dictionary, leaving it empty; they are written on the next flush.
   */
  static async open(
    options: FileDictionaryOptions,
    edits?: KVDictionary<KVStore>
  ): Promise<FileDictionary> {
    const store = await loadStore(options.path, options.readOnly ?? false)
    const dictionary = edits
      ? KVDictionary.fromRawParts(store, edits)
      : new KVDictionary(store)

    const stored = store.info()
    const info = Object.keys(stored).length > 0 ? stored : options.info ?? {}

    log.debug(
      { path: options.path, pairs: store.count(), edits: dictionary.overlaySize },
      'opened dictionary'
    )

    return new FileDictionary(options, dictionary, info)
  }

  lookupFirstNPhrases(syllables: readonly Syllable[], first: number): Phrase[] {
    return this.dictionary.lookupFirstNPhrases(syllables, first)
  }

  lookupPhrases(syllables: readonly Syllable[]): Phrase[] {
    return this.dictionary.lookupPhrases(syllables)
  }

  entries(): DictionaryEntry[] {
    return this.dictionary.entries()
  }

  about(): DictionaryInfo {
    return { ...this.info }
  }

  addPhrase(syllables: readonly Syllable[], phrase: Phrase): void {
    this.dictionary.addPhrase(syllables, phrase)
  }

  updatePhrase(
    syllables: readonly Syllable[],
    phrase: Phrase,
    frequency: number,
    lastUsed: bigint
  ): void {
    this.dictionary.updatePhrase(syllables, phrase, frequency, lastUsed)
  }

  removePhrase(syllables: readonly Syllable[], text: string): void {
    this.dictionary.removePhrase(syllables, text)
  }

  /**
   * Number of pending user edits (added or updated phrases).
   */
  pendingEdits(): number {
    return this.dictionary.overlaySize
  }

  isReadOnly(): boolean {
    return this.readOnly
  }

  isClosed(): boolean {
    return this.closed
  }

  private assertOpen(operation: string): void {
    if (this.closed) {
      throw new DictionaryUpdateError(
        'closed',
        `Cannot ${operation} closed dictionary at ${this.path}`
      )
    }
  }

  /**
   * Reload the file, keeping pending edits.
   * @throws DictionaryUpdateError if the file cannot be read
   */
  async reopen(): Promise<void> {
    await this.mutex.runExclusive(async () => {
      this.assertOpen('reopen')

      let store: SortedFileStore
      try {
        store = await loadStore(this.path, this.readOnly)
      } catch (error) {
        throw new DictionaryUpdateError(
          'io',
          `Failed to reopen dictionary at ${this.path}`,
          { cause: error }
        )
      }

      const previous = this.dictionary.take()
      this.dictionary.set(store)
      this.refreshInfo(store)

      log.debug(
        { path: this.path, pairs: store.count(), previousPairs: previous?.count() },
        'reopened dictionary'
      )
    })
  }

  /**
   * Write the merged dictionary to the file and reload it.
   *
   * Pending edits stay in the overlay; they now agree with the file and
   * the merge resolves them to the same entries.
   * @throws DictionaryUpdateError if read-only, closed, a phrase cannot be encoded, or I/O fails
   */
  async flush(): Promise<void> {
    if (this.readOnly) {
      throw new DictionaryUpdateError(
        'read-only',
        `Cannot flush read-only dictionary at ${this.path}`
      )
    }

    await this.mutex.runExclusive(async () => {
      this.assertOpen('flush')

      let pairs: KeyValuePair[]
      try {
        pairs = this.toPairs()
      } catch (error) {
        if (error instanceof PhraseTooLongError) {
          throw new DictionaryUpdateError('invalid-phrase', error.message, {
            cause: error
          })
        }
        throw error
      }

      try {
        await this.lock.replaceStore(serializeStore(pairs))
        const store = await SortedFileStore.open(this.path)
        this.dictionary.take()
        this.dictionary.set(store)
        this.refreshInfo(store)
      } catch (error) {
        throw new DictionaryUpdateError(
          'io',
          `Failed to flush dictionary to ${this.path}`,
          { cause: error }
        )
      }

      log.debug({ path: this.path, pairs: pairs.length }, 'flushed dictionary')
    })
  }

  /**
   * Release the loaded file. Afterwards queries only see pending edits,
   * and reopen() and flush() fail with reason 'closed'.
   */
  async close(): Promise<void> {
    await this.mutex.runExclusive(async () => {
      this.closed = true
      this.dictionary.take()
    })
  }

  private refreshInfo(store: SortedFileStore): void {
    const stored = store.info()
    if (Object.keys(stored).length > 0) {
      this.info = stored
    }
  }

  private toPairs(): KeyValuePair[] {
    const pairs: KeyValuePair[] = [[infoKey, encodeInfo(this.info)]]
    for (const { syllableKey, phrase } of this.dictionary.entriesIter()) {
      pairs.push([syllableKey, encodePhraseRecord(phrase)])
    }
    return pairs
  }
}
