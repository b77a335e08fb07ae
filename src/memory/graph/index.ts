/**
 * Memory Graph Storage
 */

export * from './types.js'
export * from './factories.js'
export * from './persistence.js'
export * from './graph-store.js'
export * from './lifecycle.js'
