/**
 * Memory Ranker
 *
 * Stateless additive scoring of `M` records from a memory aggregate:
 *
 *   +0.3 × importance          when meta carries an importance
 *   +0.2                       when meta.rhythm equals the query rhythm
 *   +0.2 × recency(timestamp)  when the record carries a timestamp
 *   +0.2                       when meta.trust >= 0.7
 *   -0.5                       when meta.failed is set
 */

import { isDeepStrictEqual } from 'util'
import { componentLogger, type Logger } from '../../observability/index.js'
import type { MemoryMeta } from '../graph/types.js'
import type { MemoryAggregate, RankableMemory } from './aggregate.js'

export const RANKED_MEMORY_TYPE = 'M'

export const IMPORTANCE_WEIGHT = 0.3
export const RHYTHM_BONUS = 0.2
export const RECENCY_WEIGHT = 0.2
export const TRUST_BONUS = 0.2
export const TRUST_THRESHOLD = 0.7
export const FAILURE_PENALTY = 0.5
/** Recency used when a timestamp cannot be read */
export const FALLBACK_RECENCY = 0.5

/**
 * Context the records are ranked against; only `rhythm` is read
 */
export type QueryVector = Record<string, unknown>

export interface MemoryRankerOptions {
  /** Clock in epoch ms */
  now?: () => number
  /** Results returned by `rank` when no limit is given (default 5) */
  limit?: number
  logger?: Logger
}

const ISO_TIMESTAMP =
  /^(\d{4}-\d{2}-\d{2})(?:[T ](\d{2}:\d{2}(?::\d{2}(?:\.\d{1,6})?)?)(Z|[+-]\d{2}:\d{2})?)?$/

/**
 * Parse an ISO-8601 timestamp to epoch ms. Date-times without a zone are UTC.
 */
export function parseTimestamp(value: unknown): number | null {
  if (typeof value !== 'string') return null

  const match = ISO_TIMESTAMP.exec(value.trim())
  if (!match) return null

  const [, date, time, zone] = match
  const iso = time ? `${date}T${time}${zone ?? 'Z'}` : date
  const ms = Date.parse(iso)
  return Number.isNaN(ms) ? null : ms
}

/**
 * max(0, 1 - ln(1 + elapsed_seconds) / 100); 0.5 when the timestamp is
 * unreadable or more than a second in the future.
 */
export function recency(timestamp: unknown, now: number): number {
  const ms = parseTimestamp(timestamp)
  if (ms === null) return FALLBACK_RECENCY

  const elapsedSeconds = (now - ms) / 1000
  if (elapsedSeconds <= -1) return FALLBACK_RECENCY

  return Math.max(0, 1 - Math.log1p(elapsedSeconds) / 100)
}

export class MemoryRanker {
  private now: () => number
  private defaultLimit: number
  private log: Logger

  constructor(private aggregate: MemoryAggregate, options: MemoryRankerOptions = {}) {
    this.now = options.now ?? Date.now
    this.defaultLimit = options.limit ?? 5
    this.log = componentLogger('memory-ranker', options.logger)
  }

  /**
   * Score a single record, rounded to three decimals
   */
  score(record: RankableMemory, queryVector: QueryVector, now: number = this.now()): number {
    const meta: MemoryMeta = isRecord(record.meta) ? record.meta : {}
    let score = 0

    const { importance, trust } = meta
    if (typeof importance === 'number') {
      score += IMPORTANCE_WEIGHT * importance
    }
    if ('rhythm' in meta && isDeepStrictEqual(meta.rhythm ?? null, queryVector.rhythm ?? null)) {
      score += RHYTHM_BONUS
    }
    if ('timestamp' in record) {
      score += RECENCY_WEIGHT * recency(record.timestamp, now)
    }
    if (typeof trust === 'number' && trust >= TRUST_THRESHOLD) {
      score += TRUST_BONUS
    }
    if (isSet(meta.failed)) {
      score -= FAILURE_PENALTY
    }

    return Math.round(score * 1000) / 1000
  }

  /**
   * Top `limit` `M` records, best score first (ties keep aggregate order)
   */
  rank(queryVector: QueryVector, limit: number = this.defaultLimit): RankableMemory[] {
    const candidates = this.aggregate.getAllMemory()[RANKED_MEMORY_TYPE] ?? []
    const now = this.now()

    const scored = candidates.map((memory) => ({
      memory,
      score: this.score(memory, queryVector, now),
    }))
    scored.sort((a, b) => b.score - a.score)

    this.log.debug({ candidates: candidates.length, limit }, 'ranked memories')
    return scored.slice(0, Math.max(0, limit)).map((s) => s.memory)
  }

  recommend(contextVector: QueryVector, k: number = this.defaultLimit): RankableMemory[] {
    return this.rank(contextVector, k)
  }
}

function isRecord(value: unknown): value is MemoryMeta {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

/**
 * Flag check for loosely typed meta: empty arrays and objects count as unset
 */
function isSet(value: unknown): boolean {
  if (Array.isArray(value)) return value.length > 0
  if (isRecord(value)) return Object.keys(value).length > 0
  return Boolean(value)
}
