/**
 * Read-only projection shared by graph nodes and recall items.
 *
 * The two stores keep separate id spaces; a record says which one it came
 * from and is never written back.
 */

import type { MemoryMeta, MemoryNode } from './graph/types.js'
import type { MemoryItem } from './recall/types.js'

export interface MemoryRecord {
  id: string
  kind: 'node' | 'item'
  text: string
  meta: MemoryMeta
  createdAt: number  // epoch ms
}

export function nodeToRecord(node: MemoryNode): MemoryRecord {
  return {
    id: node.id,
    kind: 'node',
    text: node.content,
    meta: { ...node.meta, node_type: node.node_type },
    createdAt: Math.round(node.created * 1000),
  }
}

export function itemToRecord(item: MemoryItem): MemoryRecord {
  return {
    id: item.id,
    kind: 'item',
    text: item.text,
    meta: { ...item.meta, trust: item.trust },
    createdAt: item.ts,
  }
}
