export {
  KVDictionary,
  NullStore,
  infoKey,
  DictionaryUpdateError,
  createPhrase,
  compareText,
  comparePhraseRank,
  phrasesEqual,
  comparePhraseKeys,
  compareBytes,
  decodePhraseRecord,
  isValidPhraseRecord
} from './dictionary'
export {
  FileDictionary,
  SortedFileStore,
  DictionaryLockedError,
  LockPermissionError,
  encodePhraseRecord,
  serializeStore,
  deserializeStore,
  PhraseTooLongError,
  StoreFormatError
} from './storage'
export {
  encodeSyllables,
  decodeSyllables,
  parseSyllables,
  formatSyllables
} from './syllables'
export type {
  Dictionary,
  DictionaryUpdateFailure,
  KVStore,
  KeyValuePair,
  Phrase,
  PhraseKey,
  DictionaryEntry,
  RawDictionaryEntry,
  DictionaryInfo
} from './dictionary'
export type { FileDictionaryOptions } from './storage'
export type { Syllable } from './syllables'
