import pino from 'pino'
import type { Logger, LoggerOptions } from 'pino'

/**
 * Observability - structured logging and metrics for the memory components
 *
 * - Structured JSON logging via Pino
 * - Child loggers bound to a component name
 * - Basic metrics (counters, gauges, timings)
 */

export type { Logger }

export type Labels = Record<string, string>

/**
 * Metrics interface - simple counters and gauges
 */
export interface Metrics {
  increment(name: string, value?: number, labels?: Labels): void
  gauge(name: string, value: number, labels?: Labels): void
  timing(name: string, durationMs: number, labels?: Labels): void
}

/**
 * In-memory metrics sink (can swap for Prometheus/Datadog later)
 */
export class InMemoryMetrics implements Metrics {
  private counters = new Map<string, number>()
  private gauges = new Map<string, number>()

  increment(name: string, value: number = 1, labels?: Labels): void {
    const key = this.makeKey(name, labels)
    this.counters.set(key, (this.counters.get(key) || 0) + value)
  }

  gauge(name: string, value: number, labels?: Labels): void {
    const key = this.makeKey(name, labels)
    this.gauges.set(key, value)
  }

  timing(name: string, durationMs: number, labels?: Labels): void {
    const key = this.makeKey(name, labels)
    this.counters.set(key, (this.counters.get(key) || 0) + durationMs)
  }

  private makeKey(name: string, labels?: Labels): string {
    if (!labels) return name
    const labelStr = Object.entries(labels)
      .sort(([a], [b]) => a.localeCompare(b))
      .map(([k, v]) => `${k}=${v}`)
      .join(',')
    return `${name}{${labelStr}}`
  }

  getCounter(name: string, labels?: Labels): number {
    return this.counters.get(this.makeKey(name, labels)) || 0
  }

  getGauge(name: string, labels?: Labels): number {
    return this.gauges.get(this.makeKey(name, labels)) || 0
  }

  reset(): void {
    this.counters.clear()
    this.gauges.clear()
  }
}

export interface ObservabilityOptions {
  pretty?: boolean
  level?: string
}

/**
 * Pino options for the root logger; env vars fill what `options` leaves out
 */
export function loggerOptions(options: ObservabilityOptions = {}): LoggerOptions {
  const pretty = options.pretty ?? process.env.MEMORY_LOG_PRETTY === 'true'

  return {
    name: 'associative-memory',
    level: options.level || process.env.MEMORY_LOG_LEVEL || 'info',
    ...(pretty ? {
      transport: {
        target: 'pino-pretty',
        options: {
          colorize: true,
          translateTime: 'HH:MM:ss',
          ignore: 'pid,hostname',
        },
      },
    } : {}),
  }
}

/**
 * Observability singleton - global logger and metrics
 */
export class Observability {
  private static instance: Observability | undefined

  public logger: Logger
  public metrics: InMemoryMetrics
  private pretty: boolean

  private constructor(options?: ObservabilityOptions) {
    this.logger = pino(loggerOptions(options))
    this.pretty = options?.pretty ?? process.env.MEMORY_LOG_PRETTY === 'true'
    this.metrics = new InMemoryMetrics()
  }

  static getInstance(options?: ObservabilityOptions): Observability {
    if (!Observability.instance) {
      Observability.instance = new Observability(options)
    }
    return Observability.instance
  }

  /**
   * Create a child logger bound to a component or correlation context
   */
  createChildLogger(context: Record<string, unknown>): Logger {
    return this.logger.child(context)
  }

  /**
   * Measure duration of an async operation
   */
  async measureAsync<T>(
    name: string,
    operation: () => Promise<T>,
    labels?: Labels
  ): Promise<T> {
    const start = Date.now()
    try {
      const result = await operation()
      this.metrics.timing(name, Date.now() - start, labels)
      return result
    } catch (error) {
      this.metrics.timing(name, Date.now() - start, { ...labels, status: 'error' })
      throw error
    }
  }

  /**
   * Apply the `logging` config section. A level change is applied in place;
   * switching pretty printing rebuilds the root logger, so only child loggers
   * created afterwards pick it up.
   */
  configure(options: Required<ObservabilityOptions>): void {
    if (options.pretty !== this.pretty) {
      this.logger = pino(loggerOptions(options))
      this.pretty = options.pretty
    } else {
      this.logger.level = options.level
    }
  }
}

/**
 * Global instance; its logger is replaced when `configure` toggles pretty printing
 */
export const obs = Observability.getInstance()
export const metrics = obs.metrics

/**
 * Logger for a named component, unless the caller supplied its own
 */
export function componentLogger(component: string, override?: Logger): Logger {
  return override ?? obs.createChildLogger({ component })
}
