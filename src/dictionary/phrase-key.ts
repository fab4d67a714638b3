import { compareText } from './phrase'
import type { PhraseKey } from './types'

/**
 * Lexicographic comparison of two byte strings.
 */
export function compareBytes(a: Uint8Array, b: Uint8Array): number {
  const length = Math.min(a.length, b.length)
  for (let i = 0; i < length; i++) {
    if (a[i] !== b[i]) return a[i] < b[i] ? -1 : 1
  }
  if (a.length === b.length) return 0
  return a.length < b.length ? -1 : 1
}

export function bytesEqual(a: Uint8Array, b: Uint8Array): boolean {
  return compareBytes(a, b) === 0
}

/**
 * Order phrase keys by syllable key bytes, then text by code point.
 */
export function comparePhraseKeys(a: PhraseKey, b: PhraseKey): number {
  const bySyllables = compareBytes(a.syllableKey, b.syllableKey)
  if (bySyllables !== 0) return bySyllables
  return compareText(a.text, b.text)
}

export function toHex(bytes: Uint8Array): string {
  return Array.from(bytes)
    .map((b) => b.toString(16).padStart(2, '0'))
    .join('')
}
