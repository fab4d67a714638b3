/**
 * Syllable sequences and their byte form.
 *
 * A syllable is a 16-bit code. The syllable key of a sequence is every
 * code written as 2 bytes little-endian, concatenated.
 */

export type Syllable = number

const maxSyllable = 0xffff

/**
 * Encode a syllable sequence into its syllable key.
 */
export function encodeSyllables(syllables: readonly Syllable[]): Uint8Array {
  const buffer = new Uint8Array(syllables.length * 2)
  const view = new DataView(buffer.buffer)

  syllables.forEach((syllable, i) => {
    if (!Number.isInteger(syllable) || syllable < 0 || syllable > maxSyllable) {
      throw new RangeError(`Invalid syllable code: ${syllable}`)
    }
    view.setUint16(i * 2, syllable, true)
  })

  return buffer
}

/**
 * Decode a syllable key back into syllables. A trailing odd byte is dropped.
 */
export function decodeSyllables(bytes: Uint8Array): Syllable[] {
  const view = new DataView(bytes.buffer, bytes.byteOffset, bytes.byteLength)
  const syllables: Syllable[] = []

  for (let offset = 0; offset + 2 <= bytes.length; offset += 2) {
    syllables.push(view.getUint16(offset, true))
  }

  return syllables
}

/**
 * Parse a comma or whitespace separated list of decimal or 0x-prefixed codes.
 */
export function parseSyllables(input: string): Syllable[] {
  const tokens = input.split(/[\s,]+/).filter((token) => token.length > 0)
  if (tokens.length === 0) {
    throw new Error('Expected at least one syllable code')
  }

  return tokens.map((token) => {
    if (!/^(0x[0-9a-f]+|\d+)$/i.test(token)) {
      throw new Error(`Invalid syllable code: "${token}"`)
    }
    const code = Number(token)
    if (code > maxSyllable) {
      throw new RangeError(`Syllable code out of range: "${token}"`)
    }
    return code
  })
}

export function formatSyllables(syllables: readonly Syllable[]): string {
  return syllables
    .map((syllable) => `0x${syllable.toString(16).padStart(4, '0')}`)
    .join(',')
}
