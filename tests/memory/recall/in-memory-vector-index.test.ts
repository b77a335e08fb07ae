import { describe, it, expect } from 'vitest'
import { InMemoryVectorIndex } from '../../../src/memory/recall/in-memory-vector-index.js'

describe('InMemoryVectorIndex', () => {
  it('returns ids ranked by cosine similarity', () => {
    const index = new InMemoryVectorIndex()
    index.add('far', [0, 1])
    index.add('near', [1, 0])
    index.add('between', [1, 1])

    const hits = index.search([1, 0], 3)

    expect(hits.map(([id]) => id)).toEqual(['near', 'between', 'far'])
    expect(hits[0][1]).toBeCloseTo(1, 12)
    expect(hits[1][1]).toBeCloseTo(Math.SQRT1_2, 12)
    expect(hits[2][1]).toBe(0)
  })

  it('truncates to k', () => {
    const index = new InMemoryVectorIndex()
    index.add('a', [1, 0])
    index.add('b', [0.5, 0.5])

    expect(index.search([1, 0], 1).map(([id]) => id)).toEqual(['a'])
  })

  it('overwrites a vector registered twice under one id', () => {
    const index = new InMemoryVectorIndex()
    index.add('a', [1, 0])
    index.add('a', [0, 1])

    expect(index.size).toBe(1)
    expect(index.search([0, 1], 5)[0][1]).toBeCloseTo(1, 12)
  })

  it('rejects query vectors of another dimension', () => {
    const index = new InMemoryVectorIndex()
    index.add('a', [1, 0, 0])

    expect(() => index.search([1, 0], 1)).toThrow('Vector dimensions must match')
  })
})
