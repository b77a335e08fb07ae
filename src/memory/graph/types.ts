/**
 * Graph Memory Types
 *
 * Memory units (nodes) linked by predicate-labelled, weighted, directed
 * relationships. Field names follow the persisted snapshot format, so they
 * stay snake_case where the document uses it.
 */

/**
 * Sparse mapping from dimension name to weight.
 * The reserved key `M` carries an importance signal.
 */
export type SparseVector = Record<string, number>

export type MemoryMeta = Record<string, unknown>

export interface MemoryNode {
  id: string
  content: string
  node_type: string  // "thought" | "plan" | "emotion" | "reflection" | ...
  vectors: SparseVector
  meta: MemoryMeta
  created: number    // unix seconds (float)
}

export interface MemoryRelationship {
  id: string
  source: string
  target: string
  predicate: string  // "supports", "causes", "is_plan_for", ...
  weight: number
  created: number    // unix seconds (float)
}

/**
 * Document written by `save()` and read by `load()`
 */
export interface GraphDocument {
  nodes: MemoryNode[]
  edges: MemoryRelationship[]
}

/**
 * Probe accepted by `findSimilar`: a sparse vector (cosine mode) or a
 * keyword (substring mode)
 */
export type SimilarityProbe = SparseVector | string

export type FlushResult =
  | { ok: true; path: string }
  | { ok: false; path: string; error: Error }
