import { mkdir, open, rename, rm, writeFile } from 'node:fs/promises'
import { dirname } from 'node:path'

import { fileExtensions } from './constants'

const retryInterval = 50

/**
 * Cross-process write lock for one store file.
 *
 * The lock is a `<store>.lock` sibling created with O_EXCL and holding the
 * writer's PID. Readers never take it; only replacing the store does.
 */
export class FileLock {
  readonly lockPath: string
  readonly tempPath: string

  constructor(
    readonly storePath: string,
    private readonly timeoutMs: number
  ) {
    this.lockPath = storePath + fileExtensions.lock
    this.tempPath = storePath + fileExtensions.temp
  }

  /**
   * Atomically replace the store file with `data` while holding the lock.
   * The bytes go to `<store>.tmp` first and are renamed over the store, so
   * readers see either the old file or the new one.
   * @throws DictionaryLockedError if the lock is not free within the timeout
   */
  async replaceStore(data: Uint8Array): Promise<void> {
    await mkdir(dirname(this.storePath), { recursive: true })
    await this.waitForLock()

    try {
      await writeFile(this.tempPath, data)
      await rename(this.tempPath, this.storePath)
    } catch (error) {
      await rm(this.tempPath, { force: true })
      throw error
    } finally {
      await rm(this.lockPath, { force: true })
    }
  }

  private async waitForLock(): Promise<void> {
    const deadline = Date.now() + this.timeoutMs

    while (!(await this.tryCreateLockFile())) {
      if (Date.now() >= deadline) {
        throw new DictionaryLockedError(this.storePath, this.timeoutMs)
      }
      await sleep(retryInterval)
    }
  }

  /**
   * Returns false while another writer holds the lock.
   */
  private async tryCreateLockFile(): Promise<boolean> {
    try {
      const handle = await open(this.lockPath, 'wx')
      try {
        await handle.write(`${process.pid}\n`)
      } finally {
        await handle.close()
      }
      return true
    } catch (error) {
      if (!(error instanceof Error) || !('code' in error)) throw error
      if (error.code === 'EEXIST') return false
      if (error.code === 'EACCES' || error.code === 'EROFS') {
        throw new LockPermissionError(this.lockPath, { cause: error })
      }
      throw error
    }
  }
}

/**
 * Another writer kept the store locked past the timeout.
 */
export class DictionaryLockedError extends Error {
  constructor(
    readonly storePath: string,
    readonly timeoutMs: number
  ) {
    super(
      `Dictionary ${storePath} is locked by another writer (gave up after ${timeoutMs}ms)`
    )
    this.name = 'DictionaryLockedError'
  }
}

export class LockPermissionError extends Error {
  constructor(
    readonly lockPath: string,
    options?: { cause?: unknown }
  ) {
    super(
      `Permission denied when creating lock file ${lockPath}. ` +
        'Open the dictionary read-only or make its directory writable.',
      options
    )
    this.name = 'LockPermissionError'
  }
}

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms))
}
