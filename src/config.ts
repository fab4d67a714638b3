import { z } from 'zod'

const logLevels = [
  'fatal',
  'error',
  'warn',
  'info',
  'debug',
  'trace',
  'silent'
] as const

const configSchema = z.object({
  PHRASE_KV_LOG_LEVEL: z.enum(logLevels).default('info'),
  PHRASE_KV_STORE_PATH: z.string().min(1).default('./data/user.pkvd'),
  PHRASE_KV_LOCK_TIMEOUT: z.coerce.number().int().nonnegative().default(10_000)
})

export type LogLevel = (typeof logLevels)[number]

export interface Config {
  logLevel: LogLevel
  storePath: string
  lockTimeout: number
}

/**
 * Reads configuration from environment variables.
 * Throws a ZodError naming the offending variable when a value is malformed.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): Config {
  const parsed = configSchema.parse(env)

  return {
    logLevel: parsed.PHRASE_KV_LOG_LEVEL,
    storePath: parsed.PHRASE_KV_STORE_PATH,
    lockTimeout: parsed.PHRASE_KV_LOCK_TIMEOUT
  }
}

export const config = loadConfig()
