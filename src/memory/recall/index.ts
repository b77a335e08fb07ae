/**
 * Decay-weighted recall
 */

export * from './types.js'
export * from './decay.js'
export {
  DecayRecallIndex,
  DEFAULT_TRUST,
  DEFAULT_OVERSAMPLE,
  DEFAULT_RECALL_K,
  DEFAULT_DIVERSITY,
} from './decay-recall-index.js'
export type { DecayRecallIndexOptions } from './decay-recall-index.js'
export { InMemoryVectorIndex } from './in-memory-vector-index.js'
export { EmbeddingService } from './embedding-service.js'
