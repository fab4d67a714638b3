import pino, { type Logger } from 'pino'
import { config } from './config'

export const logger = pino({
  name: 'phrase-kv',
  level: config.logLevel,
  formatters: {
    level: (label) => ({ level: label.toUpperCase() })
  }
})

export function createLogger(module: string): Logger {
  return logger.child({ module })
}
