/**
 * Decay Recall Index
 *
 * Embedding-addressable memory ranked by similarity × time decay × trust
 * decay, with a greedy diversity pick over the oversampled candidates.
 * The embedder and vector index are injected; their failures reach the
 * caller unchanged.
 */

import { componentLogger, metrics, obs, type Logger } from '../../observability/index.js'
import { MemoryReferenceError } from '../errors.js'
import {
  DEFAULT_TIME_GAMMA,
  DEFAULT_TRUST_BETA,
  isRedundant,
  timeDecay,
  trustDecay,
} from './decay.js'
import type { MemoryMeta } from '../graph/types.js'
import type { DecayConfig, Embedder, MemoryItem, VectorIndex } from './types.js'

export const DEFAULT_TRUST = 0.7
export const DEFAULT_OVERSAMPLE = 16
export const DEFAULT_RECALL_K = 6
export const DEFAULT_DIVERSITY = 4

export interface DecayRecallIndexOptions {
  decayConfig?: DecayConfig
  /** Candidates fetched from the vector index per recall (default 16) */
  oversample?: number
  /** `recall` defaults (6 and 4) */
  k?: number
  diversity?: number
  /** Trust given to items added without one (default 0.7) */
  defaultTrust?: number
  /** Clock in epoch ms; recall ages items against it */
  now?: () => number
  logger?: Logger
}

export class DecayRecallIndex {
  readonly timeGamma: number
  readonly trustBeta: number

  private items: Map<string, MemoryItem> = new Map()
  private oversample: number
  private defaultK: number
  private defaultDiversity: number
  private defaultTrust: number
  private now: () => number
  private log: Logger

  constructor(
    private embedder: Embedder,
    private vectorIndex: VectorIndex,
    options: DecayRecallIndexOptions = {}
  ) {
    this.timeGamma = options.decayConfig?.time_gamma ?? DEFAULT_TIME_GAMMA
    this.trustBeta = options.decayConfig?.trust_beta ?? DEFAULT_TRUST_BETA
    this.oversample = options.oversample ?? DEFAULT_OVERSAMPLE
    this.defaultK = options.k ?? DEFAULT_RECALL_K
    this.defaultDiversity = options.diversity ?? DEFAULT_DIVERSITY
    this.defaultTrust = options.defaultTrust ?? DEFAULT_TRUST
    this.now = options.now ?? Date.now
    this.log = componentLogger('decay-recall', options.logger)
  }

  /**
   * Embed and store `text`, returning its sequential id
   */
  async add(text: string, meta: MemoryMeta = {}, trust: number = this.defaultTrust): Promise<string> {
    return obs.measureAsync('memory.recall.add', async () => {
      const vector = await this.embedder.embed(text)
      const id = `M${String(this.items.size + 1).padStart(6, '0')}`

      const item: MemoryItem = { id, text, vector, meta, ts: this.now(), trust }
      this.items.set(id, item)
      await this.vectorIndex.add(id, vector)

      metrics.increment('memory.recall.items')
      this.log.debug({ id, trust, dimensions: vector.length }, 'memory item added')
      return id
    })
  }

  /**
   * Up to `k` items, highest decayed weight first. Picking stops once either
   * `k` or `diversity` items are accepted, so `diversity < k` caps the result
   * at `diversity`.
   */
  async recall(
    query: string,
    k: number = this.defaultK,
    diversity: number = this.defaultDiversity
  ): Promise<MemoryItem[]> {
    return obs.measureAsync('memory.recall.recall', async () => {
      const queryVector = await this.embedder.embed(query)
      const hits = await this.vectorIndex.search(queryVector, this.oversample)
      const now = this.now()

      const scored = hits.map(([id, similarity]) => {
        const item = this.items.get(id)
        if (!item) {
          throw new MemoryReferenceError(`Vector index returned unknown memory item ${id}`, [id])
        }
        const weight =
          similarity * timeDecay(item.ts, now, this.timeGamma) * trustDecay(item.trust, this.trustBeta)
        return { weight, item }
      })
      scored.sort((a, b) => b.weight - a.weight)

      const picked: MemoryItem[] = []
      for (const { item } of scored) {
        if (!isRedundant(item.text, picked.map((p) => p.text))) {
          picked.push(item)
        }
        if (picked.length >= k || picked.length >= diversity) {
          break
        }
      }

      this.log.debug({ candidates: hits.length, picked: picked.length, k, diversity }, 'recall')
      return picked
    })
  }

  timeDecay(ts: number): number {
    return timeDecay(ts, this.now(), this.timeGamma)
  }

  trustDecay(trust: number): number {
    return trustDecay(trust, this.trustBeta)
  }

  get(id: string): MemoryItem | undefined {
    return this.items.get(id)
  }

  get size(): number {
    return this.items.size
  }
}
