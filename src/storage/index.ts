/**
 * Storage module - sorted phrase store files and the dictionary persisted in them.
 */

// Main classes
export { FileDictionary } from './file-dictionary'
export { SortedFileStore } from './sorted-file-store'
export {
  FileLock,
  DictionaryLockedError,
  LockPermissionError
} from './file-lock'
export { Mutex } from './mutex'

// Types
export type { FileDictionaryOptions } from './file-dictionary'

// Constants
export { storeMagic, storeVersion, headerSize, fileExtensions } from './constants'

// Serialization utilities
export {
  encodePhraseRecord,
  encodeInfo,
  decodeInfo,
  serializeStore,
  deserializeStore,
  calculateStoreSize,
  crc32,
  PhraseTooLongError,
  StoreFormatError
} from './store-format'
