import { describe, it, expect, beforeEach } from 'vitest'
import { InMemoryMemoryAggregate } from '../../../src/memory/ranker/aggregate.js'
import { MemoryRanker, parseTimestamp, recency } from '../../../src/memory/ranker/memory-ranker.js'

const NOW = Date.parse('2026-03-10T12:00:00Z')

describe('parseTimestamp', () => {
  it('reads zoned, zoneless and date-only ISO strings', () => {
    expect(parseTimestamp('2026-03-10T12:00:00Z')).toBe(NOW)
    expect(parseTimestamp('2026-03-10T13:00:00+01:00')).toBe(NOW)
    expect(parseTimestamp('2026-03-10T12:00:00')).toBe(NOW)
    expect(parseTimestamp('2026-03-10 12:00:00.250')).toBe(NOW + 250)
    expect(parseTimestamp('2026-03-10')).toBe(Date.parse('2026-03-10T00:00:00Z'))
  })

  it('returns null for anything else', () => {
    expect(parseTimestamp('yesterday')).toBeNull()
    expect(parseTimestamp(1718409600)).toBeNull()
    expect(parseTimestamp(null)).toBeNull()
    expect(parseTimestamp('2026-13-45T00:00:00Z')).toBeNull()
  })
})

describe('recency', () => {
  it('is 1 for a timestamp equal to now', () => {
    expect(recency('2026-03-10T12:00:00Z', NOW)).toBe(1)
  })

  it('falls off logarithmically with elapsed seconds', () => {
    expect(recency('2026-03-09T12:00:00Z', NOW)).toBeCloseTo(1 - Math.log1p(86_400) / 100, 12)
  })

  it('falls back to 0.5 for unreadable or future timestamps', () => {
    expect(recency('not a date', NOW)).toBe(0.5)
    expect(recency('2026-03-10T13:00:00Z', NOW)).toBe(0.5)
  })
})

describe('MemoryRanker', () => {
  let aggregate: InMemoryMemoryAggregate
  let ranker: MemoryRanker

  beforeEach(() => {
    aggregate = new InMemoryMemoryAggregate()
    ranker = new MemoryRanker(aggregate, { now: () => NOW })
  })

  describe('score', () => {
    it('is 0 for a bare record', () => {
      expect(ranker.score({}, {})).toBe(0)
    })

    it('adds every matching term', () => {
      const record = {
        meta: { importance: 0.8, rhythm: 'morning', trust: 0.9 },
        timestamp: '2026-03-10T12:00:00Z',
      }

      expect(ranker.score(record, { rhythm: 'morning' })).toBe(0.84)
    })

    it('weights importance by 0.3', () => {
      expect(ranker.score({ meta: { importance: 0.5 } }, {})).toBe(0.15)
    })

    it('ignores non-numeric importance', () => {
      expect(ranker.score({ meta: { importance: 'high' } }, {})).toBe(0)
    })

    it('matches rhythm only on equality, including both absent', () => {
      expect(ranker.score({ meta: { rhythm: 'evening' } }, { rhythm: 'morning' })).toBe(0)
      expect(ranker.score({ meta: { rhythm: null } }, {})).toBe(0.2)
      expect(ranker.score({ meta: {} }, {})).toBe(0)
    })

    it('rounds recency to three decimals', () => {
      expect(ranker.score({ timestamp: '2026-03-09T12:00:00Z' }, {})).toBe(0.177)
      expect(ranker.score({ timestamp: '2026-03-10' }, {})).toBe(0.179)
    })

    it('compares structured rhythms by value', () => {
      const record = { meta: { rhythm: { beat: 3, phase: 'up' } } }

      expect(ranker.score(record, { rhythm: { beat: 3, phase: 'up' } })).toBe(0.2)
      expect(ranker.score(record, { rhythm: { beat: 3, phase: 'down' } })).toBe(0)
    })

    it('gives unreadable and future timestamps half recency', () => {
      expect(ranker.score({ timestamp: 'last tuesday' }, {})).toBe(0.1)
      expect(ranker.score({ timestamp: '2026-03-11T12:00:00Z' }, {})).toBe(0.1)
    })

    it('rewards trust at or above 0.7 only', () => {
      expect(ranker.score({ meta: { trust: 0.7 } }, {})).toBe(0.2)
      expect(ranker.score({ meta: { trust: 0.69 } }, {})).toBe(0)
    })

    it('penalises failed records', () => {
      expect(ranker.score({ meta: { failed: true } }, {})).toBe(-0.5)
      expect(ranker.score({ meta: { importance: 1, failed: true } }, {})).toBe(-0.2)
      expect(ranker.score({ meta: { failed: ['timeout'] } }, {})).toBe(-0.5)
      expect(ranker.score({ meta: { failed: 'tool error' } }, {})).toBe(-0.5)
    })

    it('does not penalise empty or false failure markers', () => {
      expect(ranker.score({ meta: { failed: [] } }, {})).toBe(0)
      expect(ranker.score({ meta: { failed: {} } }, {})).toBe(0)
      expect(ranker.score({ meta: { failed: '' } }, {})).toBe(0)
      expect(ranker.score({ meta: { failed: 0 } }, {})).toBe(0)
      expect(ranker.score({ meta: { failed: false } }, {})).toBe(0)
    })
  })

  describe('rank', () => {
    it('orders M records by score and truncates to the limit', () => {
      const low = { meta: { importance: 0.1 } }
      const high = { meta: { importance: 0.9 } }
      const mid = { meta: { importance: 0.5 } }
      aggregate.add('M', low)
      aggregate.add('M', high)
      aggregate.add('M', mid)

      const ranked = ranker.rank({}, 2)

      expect(ranked).toEqual([high, mid])
      expect(ranked[0]).toBe(high)
    })

    it('keeps aggregate order for equal scores', () => {
      const first = { id: 'first', meta: {} }
      const second = { id: 'second', meta: {} }
      aggregate.add('M', first)
      aggregate.add('M', second)

      expect(ranker.rank({})).toEqual([first, second])
    })

    it('only ranks records stored under M', () => {
      aggregate.add('T', { meta: { importance: 1 } })
      aggregate.add('E', { meta: { importance: 1 } })

      expect(ranker.rank({})).toEqual([])
    })

    it('defaults to five results', () => {
      for (let i = 0; i < 8; i++) {
        aggregate.add('M', { meta: { importance: i / 10 } })
      }

      expect(ranker.rank({})).toHaveLength(5)
    })

    it('takes its default limit from the options', () => {
      for (let i = 0; i < 8; i++) {
        aggregate.add('M', { meta: { importance: i / 10 } })
      }
      const narrow = new MemoryRanker(aggregate, { now: () => NOW, limit: 2 })

      expect(narrow.rank({})).toHaveLength(2)
      expect(narrow.recommend({})).toHaveLength(2)
      expect(narrow.rank({}, 4)).toHaveLength(4)
    })

    it('puts a failed record behind an unremarkable one', () => {
      const failed = { meta: { importance: 1, failed: true } }
      const plain = { meta: {} }
      aggregate.add('M', failed)
      aggregate.add('M', plain)

      expect(ranker.rank({})).toEqual([plain, failed])
    })
  })

  it('recommend is an alias of rank', () => {
    const record = { meta: { rhythm: 'night' } }
    aggregate.add('M', { meta: {} })
    aggregate.add('M', record)

    expect(ranker.recommend({ rhythm: 'night' }, 1)).toEqual([record])
  })
})
