/**
 * Graph document persistence
 *
 * Reads and writes the `{ nodes, edges }` snapshot. Documents are validated
 * with Zod before any in-memory state is replaced.
 */

import { existsSync, mkdirSync, readFileSync, writeFileSync } from 'fs'
import { dirname } from 'path'
import { z } from 'zod'
import { MemoryParseError, MemoryPersistenceError, errorMessage } from '../errors.js'
import { nowSeconds } from './factories.js'
import type { GraphDocument } from './types.js'

export const DEFAULT_PERSIST_PATH = 'memory_graph.json'

export const MemoryNodeSchema = z
  .object({
    id: z.string(),
    content: z.string(),
    node_type: z.string(),
    vectors: z.record(z.string(), z.number()).default({}),
    meta: z.record(z.string(), z.unknown()).default({}),
    created: z.number().default(() => nowSeconds()),
  })
  .strict()

export const MemoryRelationshipSchema = z
  .object({
    id: z.string(),
    source: z.string(),
    target: z.string(),
    predicate: z.string(),
    weight: z.number().default(1.0),
    created: z.number().default(() => nowSeconds()),
  })
  .strict()

export const GraphDocumentSchema = z.object({
  nodes: z.array(MemoryNodeSchema).default([]),
  edges: z.array(MemoryRelationshipSchema).default([]),
})

/**
 * Parse and validate a serialized graph document
 * @throws MemoryParseError on invalid JSON or schema violations
 */
export function parseGraphDocument(text: string, path?: string): GraphDocument {
  let raw: unknown
  try {
    raw = JSON.parse(text)
  } catch (error) {
    throw new MemoryParseError(`Graph document is not valid JSON: ${errorMessage(error)}`, { path })
  }

  const result = GraphDocumentSchema.safeParse(raw)
  if (!result.success) {
    const issues = result.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`)
    throw new MemoryParseError(`Graph document failed validation (${issues.length} issue(s))`, {
      path,
      issues,
    })
  }

  return result.data
}

export function serializeGraphDocument(document: GraphDocument): string {
  return JSON.stringify({ nodes: document.nodes, edges: document.edges }, null, 2)
}

export function readGraphDocument(path: string): GraphDocument {
  let text: string
  try {
    text = readFileSync(path, 'utf-8')
  } catch (error) {
    throw new MemoryPersistenceError(`Failed to read graph document ${path}: ${errorMessage(error)}`, {
      path,
      operation: 'read',
      cause: error,
    })
  }
  return parseGraphDocument(text, path)
}

export function writeGraphDocument(
  path: string,
  document: GraphDocument,
  options: { createDirs?: boolean } = {}
): void {
  try {
    if (options.createDirs) {
      mkdirSync(dirname(path), { recursive: true })
    }
    writeFileSync(path, serializeGraphDocument(document), 'utf-8')
  } catch (error) {
    throw new MemoryPersistenceError(`Failed to write graph document ${path}: ${errorMessage(error)}`, {
      path,
      operation: 'write',
      cause: error,
    })
  }
}

export function documentExists(path: string): boolean {
  return existsSync(path)
}
