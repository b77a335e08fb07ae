import type { SparseVector } from './graph/types.js'

/**
 * Added to the denominator of the sparse cosine; snapshots ranked with
 * earlier releases rely on the same constant.
 */
export const COSINE_EPSILON = 1e-9

/**
 * Cosine similarity between two sparse vectors, restricted to the
 * dimensions both of them carry. Disjoint key sets give exactly 0.
 */
export function sparseCosine(a: SparseVector, b: SparseVector): number {
  const keys = Object.keys(a).filter((key) => Object.hasOwn(b, key))
  if (keys.length === 0) {
    return 0
  }

  let dot = 0
  let normA = 0
  let normB = 0
  for (const key of keys) {
    dot += a[key] * b[key]
    normA += a[key] * a[key]
    normB += b[key] * b[key]
  }

  return dot / (Math.sqrt(normA) * Math.sqrt(normB) + COSINE_EPSILON)
}

/**
 * Calculate cosine similarity between two dense vectors
 * Returns value between -1 and 1, where 1 = identical direction
 */
export function cosineSimilarity(a: number[], b: number[]): number {
  if (a.length !== b.length) {
    throw new Error(`Vector dimensions must match: ${a.length} !== ${b.length}`)
  }

  let dotProduct = 0
  let normA = 0
  let normB = 0

  for (let i = 0; i < a.length; i++) {
    dotProduct += a[i] * b[i]
    normA += a[i] * a[i]
    normB += b[i] * b[i]
  }

  const denominator = Math.sqrt(normA) * Math.sqrt(normB)

  // Avoid division by zero
  if (denominator === 0) {
    return 0
  }

  return dotProduct / denominator
}
