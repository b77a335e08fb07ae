/**
 * Scoped store lifecycle and external-path persistence helpers
 */

import { componentLogger } from '../../observability/index.js'
import { MemoryGraphStore, type MemoryGraphStoreOptions } from './graph-store.js'
import { writeGraphDocument } from './persistence.js'
import type { FlushResult } from './types.js'

export interface ScopedGraphResult<T> {
  value: T
  flush: FlushResult
}

/**
 * Open a store, run `fn`, and flush the store on every exit path.
 *
 * Resolves with the callback's value and the flush outcome. If `fn` throws,
 * the store is still flushed and the callback's error is rethrown.
 */
export async function withMemoryGraph<T>(
  options: MemoryGraphStoreOptions,
  fn: (store: MemoryGraphStore) => T | Promise<T>
): Promise<ScopedGraphResult<T>> {
  const store = new MemoryGraphStore(options)
  const log = componentLogger('memory-graph-scope', options.logger)

  let value: T
  try {
    value = await fn(store)
  } catch (error) {
    const flush = store.close()
    log.error({ err: error, flushed: flush.ok, path: flush.path }, 'scoped graph callback failed')
    throw error
  }

  return { value, flush: store.close() }
}

/**
 * Save to / load from a path other than the store's own
 */
export class GraphPersistence {
  static save(store: MemoryGraphStore, path: string): void {
    writeGraphDocument(path, store.toDocument(), { createDirs: true })
  }

  /** Returns a store bound to `path`; the constructor loads the snapshot */
  static load(path: string, options: Omit<MemoryGraphStoreOptions, 'persistPath'> = {}): MemoryGraphStore {
    return new MemoryGraphStore({ ...options, persistPath: path })
  }
}
