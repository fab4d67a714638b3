import { ZodError } from 'zod'

import { createLogger } from '../logger'
import {
  FileDictionary,
  type FileDictionaryOptions
} from '../storage/file-dictionary'

const log = createLogger('cli')

/**
 * One-line message for a failed command.
 */
export function describeError(error: Error): string {
  if (error instanceof ZodError) {
    return error.issues.map((issue) => issue.message).join('; ')
  }
  return error.message
}

/**
 * Run a command body, reporting any failure as a single line on stderr
 * with exit code 1.
 */
export async function runCommand(task: () => Promise<void>): Promise<void> {
  try {
    await task()
  } catch (error) {
    if (!(error instanceof Error)) {
      throw error
    }
    log.debug({ err: error }, 'command failed')
    console.error(describeError(error))
    process.exitCode = 1
  }
}

/**
 * Open the dictionary, run `action`, and close it again.
 */
export async function withDictionary<R>(
  options: FileDictionaryOptions,
  action: (dictionary: FileDictionary) => R | Promise<R>
): Promise<R> {
  const dictionary = await FileDictionary.open(options)

  try {
    return await action(dictionary)
  } finally {
    await dictionary.close()
  }
}
