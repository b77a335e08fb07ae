/**
 * Environment overrides for memory configuration
 */

import { validateConfig, type MemoryConfig } from './schema.js'

/**
 * Configuration error with contextual details
 */
export class ConfigurationError extends Error {
  public readonly details?: {
    key?: string
    value?: string
    path?: string
    errors?: string[]
  }

  constructor(message: string, details?: ConfigurationError['details']) {
    super(message)
    this.name = 'ConfigurationError'
    this.details = details
  }
}

function readNumber(env: NodeJS.ProcessEnv, key: string): number | undefined {
  const raw = env[key]
  if (raw === undefined || raw.trim() === '') return undefined

  const value = Number(raw)
  if (!Number.isFinite(value)) {
    throw new ConfigurationError(`Environment variable ${key} must be a number, got "${raw}"`, {
      key,
      value: raw,
    })
  }
  return value
}

/**
 * Overlay environment variables on a parsed config and re-validate
 *
 * MEMORY_GRAPH_PATH, MEMORY_LOG_LEVEL, MEMORY_LOG_PRETTY,
 * MEMORY_TIME_GAMMA, MEMORY_TRUST_BETA, OPENAI_API_KEY, EMBEDDING_MODEL
 */
export function applyEnvironmentOverrides(
  config: MemoryConfig,
  env: NodeJS.ProcessEnv = process.env
): MemoryConfig {
  const timeGamma = readNumber(env, 'MEMORY_TIME_GAMMA')
  const trustBeta = readNumber(env, 'MEMORY_TRUST_BETA')

  const next = {
    ...config,
    graph: {
      ...config.graph,
      ...(env.MEMORY_GRAPH_PATH ? { persistPath: env.MEMORY_GRAPH_PATH } : {}),
    },
    recall: {
      ...config.recall,
      ...(timeGamma !== undefined ? { timeGamma } : {}),
      ...(trustBeta !== undefined ? { trustBeta } : {}),
    },
    logging: {
      ...config.logging,
      ...(env.MEMORY_LOG_LEVEL ? { level: env.MEMORY_LOG_LEVEL } : {}),
      ...(env.MEMORY_LOG_PRETTY ? { pretty: env.MEMORY_LOG_PRETTY === 'true' } : {}),
    },
    embedding:
      !config.embedding && env.OPENAI_API_KEY
        ? {
            provider: 'openai',
            apiKey: env.OPENAI_API_KEY,
            ...(env.EMBEDDING_MODEL ? { model: env.EMBEDDING_MODEL } : {}),
          }
        : config.embedding,
  }

  try {
    return validateConfig(next)
  } catch (error) {
    throw new ConfigurationError(
      `Environment overrides produced an invalid config: ${error instanceof Error ? error.message : String(error)}`
    )
  }
}
