import { z } from 'zod'

import { config } from '../config'

const frequencySchema = z.coerce.number().int().min(0).max(0xffffffff)

export function parseFrequency(value: string): number {
  return frequencySchema.parse(value)
}

export function parseTimestamp(value: string): bigint {
  if (!/^\d+$/.test(value)) {
    throw new Error(`Invalid timestamp: "${value}"`)
  }
  return BigInt(value)
}

export const sharedFlags = {
  storePath: {
    type: String,
    alias: 's',
    default: config.storePath,
    description: 'Path to the dictionary file'
  }
} as const

export const lookupFlags = {
  limit: {
    type: Number,
    alias: 'l',
    default: 10,
    description: 'Maximum number of phrases to print'
  }
} as const

export const lastUsedFlags = {
  lastUsed: {
    type: parseTimestamp,
    alias: 't',
    description: 'Last-used timestamp in milliseconds (default: now)'
  }
} as const
