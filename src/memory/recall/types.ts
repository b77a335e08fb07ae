/**
 * Decay recall types
 */

import type { MemoryMeta } from '../graph/types.js'

export interface MemoryItem {
  id: string          // M000001, M000002, ... (index-local)
  text: string
  vector: number[]
  meta: MemoryMeta
  ts: number          // epoch ms
  trust: number       // 0..1
}

/** [id, similarity] pair, highest similarity first */
export type VectorHit = [id: string, similarity: number]

/**
 * Turns text into a dense embedding. May be network-bound.
 */
export interface Embedder {
  embed(text: string): number[] | Promise<number[]>
}

/**
 * Vector store the recall index registers embeddings with
 */
export interface VectorIndex {
  add(id: string, vector: number[]): void | Promise<void>
  search(vector: number[], k: number): VectorHit[] | Promise<VectorHit[]>
}

/**
 * Decay rates. Keys match the option names persisted in agent configs.
 */
export interface DecayConfig {
  /** per-day rate of time decay (γ) */
  time_gamma?: number
  /** trust decay rate (β) */
  trust_beta?: number
}
