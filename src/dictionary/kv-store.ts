/**
 * Backing store capability required by the overlay dictionary.
 */

/** Reserved key holding store metadata. */
export const infoKey = new TextEncoder().encode('INFO')

export type KeyValuePair = [key: Uint8Array, value: Uint8Array]

export interface KVStore {
  /**
   * All values stored under exactly `key`, in any order.
   */
  find(key: Uint8Array): Iterable<Uint8Array>

  /**
   * Every pair, ascending by key bytes then decoded phrase text.
   * May include the reserved INFO key.
   */
  iter(): Iterable<KeyValuePair>
}

/**
 * Store with no data, used by purely in-memory dictionaries.
 */
export class NullStore implements KVStore {
  find(_key: Uint8Array): Iterable<Uint8Array> {
    return []
  }

  iter(): Iterable<KeyValuePair> {
    return []
  }
}
