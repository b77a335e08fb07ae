import { v4 as uuidv4 } from 'uuid'
import type { MemoryMeta, MemoryNode, MemoryRelationship, SparseVector } from './types.js'

export const DEFAULT_NODE_TYPE = 'thought'

/**
 * Current time as unix seconds, the unit snapshots store in `created`
 */
export function nowSeconds(): number {
  return Date.now() / 1000
}

/**
 * `<prefix>_` followed by the first 8 hex chars of a v4 uuid
 */
export function generateId(prefix: string): string {
  return `${prefix}_${uuidv4().replace(/-/g, '').slice(0, 8)}`
}

export function createMemoryNode(
  content: string,
  node_type: string = DEFAULT_NODE_TYPE,
  vectors: SparseVector = {},
  meta: MemoryMeta = {}
): MemoryNode {
  return {
    id: generateId('N'),
    content,
    node_type,
    vectors,
    meta,
    created: nowSeconds(),
  }
}

export function createRelationship(
  source: string,
  target: string,
  predicate: string,
  weight: number = 1.0
): MemoryRelationship {
  return {
    id: generateId('E'),
    source,
    target,
    predicate,
    weight,
    created: nowSeconds(),
  }
}
