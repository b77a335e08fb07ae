/**
 * Associative memory for agents
 *
 * - MemoryGraphStore: typed node/edge graph with similarity search,
 *   traversal and JSON snapshots
 * - DecayRecallIndex: embedding recall weighted by time and trust decay
 * - MemoryRanker: multi-factor ranking over an aggregate memory view
 * - TraceRegister: reasoning-loop event log
 */

export * from './memory/index.js'
export * from './config/index.js'
export { Observability, InMemoryMetrics, obs, metrics, componentLogger, loggerOptions } from './observability/index.js'
export type { Logger, Metrics, Labels, ObservabilityOptions } from './observability/index.js'
