export * from './aggregate.js'
export * from './memory-ranker.js'
