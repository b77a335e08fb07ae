import type { MemoryMeta } from '../graph/types.js'

/**
 * A memory record as the ranker sees it. Only `meta` and `timestamp` are
 * read; everything else is passed through untouched.
 */
export interface RankableMemory {
  meta?: MemoryMeta
  timestamp?: unknown
  [key: string]: unknown
}

/**
 * Records grouped by type tag (`M`, `T`, `E`, ...)
 */
export type MemorySnapshot = Partial<Record<string, RankableMemory[]>>

/**
 * Read access to the agent's aggregated memory
 */
export interface MemoryAggregate {
  getAllMemory(): MemorySnapshot
}

/**
 * Aggregate backed by in-process arrays
 */
export class InMemoryMemoryAggregate implements MemoryAggregate {
  private records: Map<string, RankableMemory[]> = new Map()

  add(type: string, record: RankableMemory): void {
    const bucket = this.records.get(type)
    if (bucket) {
      bucket.push(record)
    } else {
      this.records.set(type, [record])
    }
  }

  getAllMemory(): MemorySnapshot {
    return Object.fromEntries(
      Array.from(this.records, ([type, records]) => [type, [...records]])
    )
  }
}
