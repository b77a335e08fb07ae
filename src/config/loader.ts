/**
 * YAML configuration loader with type-safe parsing
 */

import { readFileSync, existsSync } from 'fs'
import { resolve } from 'path'
import * as yaml from 'js-yaml'
import { obs } from '../observability/index.js'
import { ConfigurationError } from './environment.js'
import { validateConfigSafe, type MemoryConfig } from './schema.js'

export const CONFIG_PATH_ENV = 'MEMORY_CONFIG_PATH'

export const DEFAULT_CONFIG_PATHS = [
  'memory.config.yaml',
  'memory.config.yml',
  '.memory.yaml',
  'config/memory.yaml',
]

/**
 * Load and validate config from YAML file
 * @throws ConfigurationError if the file doesn't exist, isn't YAML, or fails validation
 */
export function loadConfig(filePath: string): MemoryConfig {
  const result = loadConfigSafe(filePath)
  if (!result.success) {
    throw new ConfigurationError(`Failed to load config from ${filePath}: ${result.errors.join('; ')}`, {
      path: resolve(filePath),
      errors: result.errors,
    })
  }
  return result.data
}

/**
 * Load config with detailed error reporting
 * Returns success/failure with error messages
 */
export function loadConfigSafe(filePath: string): { success: true; data: MemoryConfig } | { success: false; errors: string[] } {
  const absolutePath = resolve(filePath)

  if (!existsSync(absolutePath)) {
    return {
      success: false,
      errors: [`Config file not found: ${absolutePath}`]
    }
  }

  try {
    const fileContent = readFileSync(absolutePath, 'utf-8')
    const rawConfig = yaml.load(fileContent)

    return validateConfigSafe(rawConfig)
  } catch (error) {
    if (error instanceof Error) {
      return {
        success: false,
        errors: [`Failed to parse YAML: ${error.message}`]
      }
    }
    return {
      success: false,
      errors: ['Unknown error loading config']
    }
  }
}

/**
 * Try to load config from default locations
 * Returns first valid config or undefined
 */
export function loadConfigFromDefaults(cwd: string = process.cwd()): MemoryConfig | undefined {
  for (const candidate of DEFAULT_CONFIG_PATHS) {
    const path = resolve(cwd, candidate)
    if (!existsSync(path)) continue

    const result = loadConfigSafe(path)
    if (result.success) {
      return result.data
    }
    // Continue to next path
    obs.logger.warn({ path, errors: result.errors }, 'skipping invalid memory config')
  }

  return undefined
}

/**
 * Load config from environment variable or default paths
 */
export function loadConfigAuto(env: NodeJS.ProcessEnv = process.env): MemoryConfig | undefined {
  // Check environment variable first
  const configPath = env[CONFIG_PATH_ENV]

  if (configPath) {
    return loadConfig(configPath)
  }

  // Try default locations
  return loadConfigFromDefaults()
}
