/**
 * Constants for the sorted phrase store file.
 */

// File header magic (ASCII "PKVD")
export const storeMagic = 0x504b5644

export const storeVersion = 1

// Fixed sizes
export const headerSize = 16
export const checksumSize = 4
export const entryLengthSize = 2
export const maxEntryFieldLength = 0xffff

// Header field offsets
export const headerOffsets = {
  magic: 0, // 4 bytes
  version: 4, // 2 bytes
  count: 6, // 4 bytes
  reserved: 10 // 6 bytes
} as const

// Suffixes appended to the store path
export const fileExtensions = {
  lock: '.lock',
  temp: '.tmp'
} as const
