/**
 * Memory Factory
 * Builds the memory components from a validated `MemoryConfig`.
 *
 * Components can still be constructed directly; the factory only maps config
 * sections onto their options.
 */

import { ConfigurationError } from '../config/environment.js'
import { resolveConfig } from '../config/index.js'
import type { MemoryConfig } from '../config/schema.js'
import type { Logger } from '../observability/index.js'
import { MemoryGraphStore } from './graph/graph-store.js'
import { DecayRecallIndex } from './recall/decay-recall-index.js'
import { EmbeddingService } from './recall/embedding-service.js'
import { InMemoryVectorIndex } from './recall/in-memory-vector-index.js'
import type { Embedder, VectorIndex } from './recall/types.js'
import type { MemoryAggregate } from './ranker/aggregate.js'
import { MemoryRanker } from './ranker/memory-ranker.js'
import { TraceRegister } from './trace/trace-register.js'

export interface RecallDependencies {
  /** Defaults to an `EmbeddingService` built from `config.embedding` */
  embedder?: Embedder
  /** Defaults to an `InMemoryVectorIndex` */
  vectorIndex?: VectorIndex
  now?: () => number
  logger?: Logger
}

export interface ComponentOptions {
  now?: () => number
  logger?: Logger
}

export class MemoryFactory {
  static createGraphStore(config: MemoryConfig, options: { logger?: Logger } = {}): MemoryGraphStore {
    return new MemoryGraphStore({
      persistPath: config.graph.persistPath,
      autoLoad: config.graph.autoLoad,
      queryDefaults: {
        topK: config.search.topK,
        minScore: config.search.minScore,
        depth: config.traverse.depth,
        bestPathLimit: config.bestPath.limit,
      },
      logger: options.logger,
    })
  }

  /**
   * @throws ConfigurationError when no embedder is given and `embedding` is not configured
   */
  static createRecallIndex(config: MemoryConfig, deps: RecallDependencies = {}): DecayRecallIndex {
    const embedder = deps.embedder ?? MemoryFactory.createEmbedder(config)
    const { recall } = config

    return new DecayRecallIndex(embedder, deps.vectorIndex ?? new InMemoryVectorIndex(), {
      decayConfig: { time_gamma: recall.timeGamma, trust_beta: recall.trustBeta },
      oversample: recall.oversample,
      k: recall.k,
      diversity: recall.diversity,
      defaultTrust: recall.defaultTrust,
      now: deps.now,
      logger: deps.logger,
    })
  }

  static createEmbedder(config: MemoryConfig): EmbeddingService {
    if (!config.embedding) {
      throw new ConfigurationError(
        'No embedding provider configured: set the embedding section or OPENAI_API_KEY',
        { key: 'embedding' }
      )
    }
    return new EmbeddingService(config.embedding)
  }

  static createRanker(
    config: MemoryConfig,
    aggregate: MemoryAggregate,
    options: ComponentOptions = {}
  ): MemoryRanker {
    return new MemoryRanker(aggregate, { ...options, limit: config.ranker.limit })
  }

  static createTraceRegister(config: MemoryConfig, options: ComponentOptions = {}): TraceRegister {
    return new TraceRegister({ ...options, recent: config.trace.recent })
  }

  /**
   * Convenience: resolve config from file and environment, then build the
   * graph store and trace register, which need no collaborators
   */
  static fromEnv(env: NodeJS.ProcessEnv = process.env): {
    config: MemoryConfig
    graph: MemoryGraphStore
    trace: TraceRegister
  } {
    const config = resolveConfig(env)
    return {
      config,
      graph: MemoryFactory.createGraphStore(config),
      trace: MemoryFactory.createTraceRegister(config),
    }
  }
}
