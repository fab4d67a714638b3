export type DictionaryUpdateFailure =
  | 'duplicate-phrase'
  | 'invalid-phrase'
  | 'io'
  | 'read-only'
  | 'closed'

/**
 * Error thrown when a dictionary mutation or persistence step fails.
 * `cause` carries the underlying error for store I/O failures.
 */
export class DictionaryUpdateError extends Error {
  constructor(
    public readonly reason: DictionaryUpdateFailure,
    message: string,
    options?: { cause?: unknown }
  ) {
    super(message, options)
    this.name = 'DictionaryUpdateError'
  }
}
