import { cosineSimilarity } from '../similarity.js'
import type { VectorHit, VectorIndex } from './types.js'

/**
 * Brute-force cosine index for tests and small single-process agents.
 * All data lost when process exits.
 */
export class InMemoryVectorIndex implements VectorIndex {
  private vectors: Map<string, number[]> = new Map()

  add(id: string, vector: number[]): void {
    this.vectors.set(id, vector)
  }

  search(vector: number[], k: number): VectorHit[] {
    const hits: VectorHit[] = []
    for (const [id, stored] of this.vectors) {
      hits.push([id, cosineSimilarity(vector, stored)])
    }
    hits.sort((a, b) => b[1] - a[1])
    return hits.slice(0, Math.max(0, k))
  }

  get size(): number {
    return this.vectors.size
  }
}
