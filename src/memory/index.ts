/**
 * Memory Layer Exports
 */

export * from './errors.js'
export { sparseCosine, cosineSimilarity, COSINE_EPSILON } from './similarity.js'
export * from './records.js'

export * from './graph/index.js'
export * from './recall/index.js'
export * from './ranker/index.js'
export * from './trace/index.js'
export * from './factory.js'
