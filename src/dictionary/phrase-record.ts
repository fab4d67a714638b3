/**
 * Phrase record decoding.
 *
 * Binary format (backing store values):
 * [frequency:4][lastUsed:8][textLen:1][text:textLen]
 * All integers little-endian; text is UTF-8.
 */

import type { Phrase } from './types'

export const phraseRecordOffsets = {
  frequency: 0, // 4 bytes
  lastUsed: 4, // 8 bytes
  textLength: 12, // 1 byte
  text: 13 // variable
} as const

export const maxPhraseTextBytes = 0xff

const utf8 = new TextDecoder('utf-8', { fatal: true, ignoreBOM: true })

/**
 * Extract the text bytes of a record, clamped to the available data.
 * Used for ordering raw records whose text may not decode.
 */
export function recordTextBytes(bytes: Uint8Array): Uint8Array {
  if (bytes.length <= phraseRecordOffsets.textLength) {
    return new Uint8Array(0)
  }
  const end = phraseRecordOffsets.text + bytes[phraseRecordOffsets.textLength]
  return bytes.subarray(phraseRecordOffsets.text, Math.min(end, bytes.length))
}

function decodeText(bytes: Uint8Array): string | null {
  try {
    return utf8.decode(bytes)
  } catch {
    return null
  }
}

/**
 * Decode a phrase record.
 * Returns null for records that are too short, truncated or not UTF-8.
 */
export function decodePhraseRecord(bytes: Uint8Array): Phrase | null {
  if (bytes.length <= phraseRecordOffsets.textLength) {
    return null
  }

  const textLength = bytes[phraseRecordOffsets.textLength]
  if (phraseRecordOffsets.text + textLength > bytes.length) {
    return null
  }

  const text = decodeText(
    bytes.subarray(
      phraseRecordOffsets.text,
      phraseRecordOffsets.text + textLength
    )
  )
  if (text === null) {
    return null
  }

  const view = new DataView(bytes.buffer, bytes.byteOffset, bytes.byteLength)

  return {
    text,
    frequency: view.getUint32(phraseRecordOffsets.frequency, true),
    lastUsed: view.getBigUint64(phraseRecordOffsets.lastUsed, true)
  }
}

export function isValidPhraseRecord(bytes: Uint8Array): boolean {
  return decodePhraseRecord(bytes) !== null
}
