import { rm } from 'node:fs/promises'
import { tmpdir } from 'node:os'
import { join } from 'node:path'

import { fileExtensions } from './constants'

/**
 * Generate a unique store path under the OS temp directory.
 */
export function createTestPath(prefix: string): string {
  const id = `${Date.now()}-${Math.random().toString(36).slice(2)}`
  return join(tmpdir(), `test-${prefix}-${id}.pkvd`)
}

/**
 * Remove store files and their lock and temp siblings.
 */
export async function cleanup(paths: string[]): Promise<void> {
  for (const path of paths) {
    await rm(path, { force: true })
    await rm(path + fileExtensions.lock, { force: true })
    await rm(path + fileExtensions.temp, { force: true })
  }
}

export function flipByte(data: Uint8Array, offset: number): void {
  data[offset] ^= 0xff
}
