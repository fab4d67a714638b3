/**
 * Overlay phrase dictionary: backing store, user overlay and tombstones
 * merged behind one query surface.
 */

export { KVDictionary } from './kv-dictionary'
export { NullStore, infoKey } from './kv-store'
export { DictionaryUpdateError } from './errors'
export {
  createPhrase,
  compareText,
  comparePhraseRank,
  phrasesEqual
} from './phrase'
export { comparePhraseKeys, compareBytes, bytesEqual, toHex } from './phrase-key'
export { SortedPhraseMap } from './sorted-phrase-map'
export {
  decodePhraseRecord,
  isValidPhraseRecord,
  recordTextBytes,
  phraseRecordOffsets,
  maxPhraseTextBytes
} from './phrase-record'

export type { Dictionary } from './dictionary'
export type { DictionaryUpdateFailure } from './errors'
export type { KVStore, KeyValuePair } from './kv-store'
export type {
  Phrase,
  PhraseKey,
  OverlayValue,
  DictionaryEntry,
  RawDictionaryEntry,
  DictionaryInfo
} from './types'
