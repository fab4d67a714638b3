/**
 * Store file serialization and deserialization.
 *
 * Binary format:
 * [magic:4][version:2][count:4][reserved:6]
 * count × [keyLen:2][key:N][valueLen:2][value:M]
 * [checksum:4]
 *
 * The checksum is a CRC32 of every byte before it. Values under phrase
 * keys are phrase records; the INFO key holds JSON metadata.
 */

import { z } from 'zod'

import type { KeyValuePair } from '../dictionary/kv-store'
import {
  maxPhraseTextBytes,
  phraseRecordOffsets
} from '../dictionary/phrase-record'
import type { DictionaryInfo, Phrase } from '../dictionary/types'
import {
  checksumSize,
  entryLengthSize,
  headerOffsets,
  headerSize,
  maxEntryFieldLength,
  storeMagic,
  storeVersion
} from './constants'

/**
 * Error thrown when a store file is not in the expected format.
 */
export class StoreFormatError extends Error {
  constructor(message: string) {
    super(message)
    this.name = 'StoreFormatError'
  }
}

/**
 * Error thrown when a phrase is too long for a phrase record.
 */
export class PhraseTooLongError extends Error {
  constructor(
    public readonly text: string,
    public readonly byteLength: number
  ) {
    super(
      `Phrase "${text}" is ${byteLength} bytes in UTF-8, the limit is ${maxPhraseTextBytes}`
    )
    this.name = 'PhraseTooLongError'
  }
}

/**
 * Encode a phrase as a phrase record. A missing lastUsed is written as 0.
 */
export function encodePhraseRecord(phrase: Phrase): Uint8Array {
  const textBytes = new TextEncoder().encode(phrase.text)
  if (textBytes.length > maxPhraseTextBytes) {
    throw new PhraseTooLongError(phrase.text, textBytes.length)
  }

  const buffer = new Uint8Array(phraseRecordOffsets.text + textBytes.length)
  const view = new DataView(buffer.buffer)

  view.setUint32(phraseRecordOffsets.frequency, phrase.frequency, true)
  view.setBigUint64(phraseRecordOffsets.lastUsed, phrase.lastUsed ?? 0n, true)
  view.setUint8(phraseRecordOffsets.textLength, textBytes.length)
  buffer.set(textBytes, phraseRecordOffsets.text)

  return buffer
}

const infoSchema = z.object({
  name: z.string().optional(),
  copyright: z.string().optional(),
  license: z.string().optional(),
  version: z.string().optional(),
  software: z.string().optional()
})

export function encodeInfo(info: DictionaryInfo): Uint8Array {
  return new TextEncoder().encode(JSON.stringify(infoSchema.parse(info)))
}

/**
 * Decode INFO metadata. Unreadable metadata reads as empty.
 */
export function decodeInfo(bytes: Uint8Array): DictionaryInfo {
  let json: unknown
  try {
    json = JSON.parse(new TextDecoder().decode(bytes))
  } catch {
    return {}
  }

  const result = infoSchema.safeParse(json)
  return result.success ? result.data : {}
}

/**
 * Calculate the size of a serialized store.
 */
export function calculateStoreSize(pairs: readonly KeyValuePair[]): number {
  let size = headerSize + checksumSize
  for (const [key, value] of pairs) {
    size += entryLengthSize + key.length + entryLengthSize + value.length
  }
  return size
}

/**
 * Serialize key-value pairs in the order given.
 */
export function serializeStore(pairs: readonly KeyValuePair[]): Uint8Array {
  const buffer = new Uint8Array(calculateStoreSize(pairs))
  const view = new DataView(buffer.buffer)

  view.setUint32(headerOffsets.magic, storeMagic, true)
  view.setUint16(headerOffsets.version, storeVersion, true)
  view.setUint32(headerOffsets.count, pairs.length, true)

  let offset = headerSize
  for (const [key, value] of pairs) {
    for (const field of [key, value]) {
      if (field.length > maxEntryFieldLength) {
        throw new RangeError(
          `Store field of ${field.length} bytes exceeds ${maxEntryFieldLength}`
        )
      }
      view.setUint16(offset, field.length, true)
      offset += entryLengthSize
      buffer.set(field, offset)
      offset += field.length
    }
  }

  view.setUint32(offset, crc32(buffer.subarray(0, offset)), true)

  return buffer
}

/**
 * Deserialize a store file.
 * @throws StoreFormatError on a bad header, truncated entries or checksum mismatch
 */
export function deserializeStore(data: Uint8Array): KeyValuePair[] {
  if (data.length < headerSize + checksumSize) {
    throw new StoreFormatError(
      `Store file is ${data.length} bytes, too short for a header`
    )
  }

  const view = new DataView(data.buffer, data.byteOffset, data.byteLength)

  const magic = view.getUint32(headerOffsets.magic, true)
  if (magic !== storeMagic) {
    throw new StoreFormatError('Store file has an invalid magic number')
  }

  const version = view.getUint16(headerOffsets.version, true)
  if (version !== storeVersion) {
    throw new StoreFormatError(`Unsupported store file version ${version}`)
  }

  const checksumOffset = data.length - checksumSize
  const storedChecksum = view.getUint32(checksumOffset, true)
  if (storedChecksum !== crc32(data.subarray(0, checksumOffset))) {
    throw new StoreFormatError('Store file checksum mismatch')
  }

  const count = view.getUint32(headerOffsets.count, true)
  const pairs: KeyValuePair[] = []
  let offset = headerSize

  const readField = (): Uint8Array => {
    if (offset + entryLengthSize > checksumOffset) {
      throw new StoreFormatError(`Store entry truncated at byte ${offset}`)
    }
    const length = view.getUint16(offset, true)
    offset += entryLengthSize
    if (offset + length > checksumOffset) {
      throw new StoreFormatError(`Store entry truncated at byte ${offset}`)
    }
    const field = data.slice(offset, offset + length)
    offset += length
    return field
  }

  for (let i = 0; i < count; i++) {
    const key = readField()
    const value = readField()
    pairs.push([key, value])
  }

  if (offset !== checksumOffset) {
    throw new StoreFormatError(
      `Store file has ${checksumOffset - offset} trailing bytes`
    )
  }

  return pairs
}

/**
 * CRC32 implementation using the standard polynomial.
 */
const crc32Table = makeCrc32Table()

function makeCrc32Table(): Uint32Array {
  const table = new Uint32Array(256)
  for (let i = 0; i < 256; i++) {
    let c = i
    for (let j = 0; j < 8; j++) {
      if (c & 1) {
        c = 0xedb88320 ^ (c >>> 1)
      } else {
        c = c >>> 1
      }
    }
    table[i] = c
  }
  return table
}

export function crc32(data: Uint8Array): number {
  let crc = 0xffffffff
  for (let i = 0; i < data.length; i++) {
    crc = crc32Table[(crc ^ data[i]) & 0xff] ^ (crc >>> 8)
  }
  return (crc ^ 0xffffffff) >>> 0
}
