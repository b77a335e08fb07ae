/**
 * Configuration module
 * Provides YAML-based config with Zod validation and environment overrides
 */

import { obs } from '../observability/index.js'
import { applyEnvironmentOverrides } from './environment.js'
import { loadConfigAuto } from './loader.js'
import { DEFAULT_CONFIG, type MemoryConfig } from './schema.js'

export * from './schema.js'
export * from './loader.js'
export * from './environment.js'

/**
 * Load config (MEMORY_CONFIG_PATH, then default paths, then built-in
 * defaults), apply environment overrides, and apply the logging section
 */
export function resolveConfig(env: NodeJS.ProcessEnv = process.env): MemoryConfig {
  const config = applyEnvironmentOverrides(loadConfigAuto(env) ?? DEFAULT_CONFIG, env)
  obs.configure(config.logging)
  return config
}
