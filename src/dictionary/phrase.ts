import invariant from 'tiny-invariant'

import type { Phrase } from './types'

const maxFrequency = 0xffffffff

export function createPhrase(
  text: string,
  frequency: number,
  lastUsed?: bigint
): Phrase {
  invariant(
    Number.isInteger(frequency) && frequency >= 0 && frequency <= maxFrequency,
    'frequency must be an unsigned 32-bit integer'
  )
  invariant(
    lastUsed === undefined || lastUsed >= 0n,
    'lastUsed must not be negative'
  )

  return lastUsed === undefined
    ? { text, frequency }
    : { text, frequency, lastUsed }
}

/**
 * Compare two strings by Unicode code point.
 * Plain `<` compares UTF-16 code units, which misorders astral characters
 * against U+E000..U+FFFF.
 */
export function compareText(a: string, b: string): number {
  if (a === b) return 0

  const left = a[Symbol.iterator]()
  const right = b[Symbol.iterator]()

  for (;;) {
    const l = left.next()
    const r = right.next()
    if (l.done || r.done) {
      if (l.done && r.done) return 0
      return l.done ? -1 : 1
    }
    const lc = l.value.codePointAt(0) ?? 0
    const rc = r.value.codePointAt(0) ?? 0
    if (lc !== rc) return lc < rc ? -1 : 1
  }
}

/**
 * Rank two phrases: higher frequency wins, ties go to the later lastUsed.
 * A missing lastUsed ranks below any present one.
 */
export function comparePhraseRank(a: Phrase, b: Phrase): number {
  if (a.frequency !== b.frequency) return a.frequency < b.frequency ? -1 : 1
  if (a.lastUsed === b.lastUsed) return 0
  if (a.lastUsed === undefined) return -1
  if (b.lastUsed === undefined) return 1
  return a.lastUsed < b.lastUsed ? -1 : 1
}

export function phrasesEqual(a: Phrase, b: Phrase): boolean {
  return (
    a.text === b.text &&
    a.frequency === b.frequency &&
    a.lastUsed === b.lastUsed
  )
}
