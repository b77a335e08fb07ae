import { v4 as uuidv4 } from 'uuid'
import { componentLogger, type Logger } from '../../observability/index.js'

/**
 * One reasoning-loop event (phase change, intent shift, re-evaluation)
 */
export interface TraceEvent {
  id: string
  timestamp: string  // ISO
  loop: string
  phase: string
  status: string
  intent: string
  note: string
}

export interface TraceRegisterOptions {
  /** Clock in epoch ms */
  now?: () => number
  /** Events returned by `getRecent` when no count is given (default 5) */
  recent?: number
  logger?: Logger
}

/**
 * Append-only in-memory log of reasoning-loop events
 */
export class TraceRegister {
  private events: TraceEvent[] = []
  private now: () => number
  private defaultRecent: number
  private log: Logger

  constructor(options: TraceRegisterOptions = {}) {
    this.now = options.now ?? Date.now
    this.defaultRecent = options.recent ?? 5
    this.log = componentLogger('trace-register', options.logger)
  }

  logEvent(loopId: string, phase: string, status: string, intent: string = '', note: string = ''): TraceEvent {
    const event: TraceEvent = {
      id: uuidv4().slice(0, 8),
      timestamp: new Date(this.now()).toISOString(),
      loop: loopId,
      phase,
      status,
      intent,
      note,
    }
    this.events.push(event)
    this.log.debug({ loop: loopId, phase, status }, 'trace event')
    return event
  }

  /** Last `n` events, oldest first */
  getRecent(n: number = this.defaultRecent): TraceEvent[] {
    return n > 0 ? this.events.slice(-n) : []
  }

  export(): TraceEvent[] {
    return [...this.events]
  }
}
