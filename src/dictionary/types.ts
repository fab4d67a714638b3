/**
 * Types for the overlay phrase dictionary.
 */

import type { Syllable } from '../syllables'

/**
 * A candidate phrase with its usage statistics.
 */
export interface Phrase {
  /** Phrase text */
  text: string
  /** Usage frequency (unsigned 32-bit) */
  frequency: number
  /**
   * Last-used timestamp (unsigned 64-bit). Absent only on phrases built by
   * hand; phrases read from a store or the overlay always carry one.
   */
  lastUsed?: bigint
}

/**
 * Phrase key: syllable key bytes plus phrase text.
 */
export interface PhraseKey {
  syllableKey: Uint8Array
  text: string
}

/**
 * Value held by the overlay for one phrase key.
 */
export interface OverlayValue {
  frequency: number
  lastUsed: bigint
}

/**
 * One entry of the merged dictionary, keyed by raw syllable bytes.
 */
export interface RawDictionaryEntry {
  syllableKey: Uint8Array
  phrase: Phrase
}

/**
 * One entry of the merged dictionary, keyed by syllables.
 */
export interface DictionaryEntry {
  syllables: Syllable[]
  phrase: Phrase
}

/**
 * Static metadata about a dictionary.
 */
export interface DictionaryInfo {
  name?: string
  copyright?: string
  license?: string
  version?: string
  software?: string
}
