/**
 * Zod schemas for memory configuration
 * Validates YAML config files
 */

import { z } from 'zod'

/**
 * Graph store configuration
 */
export const GraphConfigSchema = z.object({
  persistPath: z.string().min(1).default('memory_graph.json'),
  autoLoad: z.boolean().default(true),
})

export type GraphConfig = z.infer<typeof GraphConfigSchema>

/**
 * Similarity search defaults
 */
export const SearchConfigSchema = z.object({
  topK: z.number().int().positive().default(5),
  minScore: z.number().min(0).max(1).default(0.2),
})

export type SearchConfig = z.infer<typeof SearchConfigSchema>

export const TraverseConfigSchema = z.object({
  depth: z.number().int().min(0).default(2),
})

export const BestPathConfigSchema = z.object({
  limit: z.number().int().positive().default(10),
})

/**
 * Decay recall configuration
 */
export const RecallConfigSchema = z.object({
  timeGamma: z.number().min(0).default(0.03),   // per day
  trustBeta: z.number().min(0).default(0.4),
  oversample: z.number().int().positive().default(16),
  k: z.number().int().positive().default(6),
  diversity: z.number().int().positive().default(4),
  defaultTrust: z.number().min(0).max(1).default(0.7),
})

export type RecallConfig = z.infer<typeof RecallConfigSchema>

export const RankerConfigSchema = z.object({
  limit: z.number().int().positive().default(5),
})

export const TraceConfigSchema = z.object({
  recent: z.number().int().positive().default(5),
})

/**
 * Logging configuration
 */
export const LoggingConfigSchema = z.object({
  level: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),
  pretty: z.boolean().default(false),
})

export type LoggingConfig = z.infer<typeof LoggingConfigSchema>

/**
 * Embedding provider configuration
 */
export const EmbeddingConfigSchema = z.discriminatedUnion('provider', [
  z.object({
    provider: z.literal('openai'),
    apiKey: z.string().min(1),
    model: z.string().default('text-embedding-3-small'),
    baseUrl: z.string().url().default('https://api.openai.com/v1'),
  }),
  z.object({
    provider: z.literal('azure-openai'),
    apiKey: z.string().min(1),
    endpoint: z.string().url(),
    deploymentName: z.string().min(1),
    apiVersion: z.string().default('2023-05-15'),
  }),
])

export type EmbeddingConfig = z.infer<typeof EmbeddingConfigSchema>

/**
 * Complete memory configuration schema
 */
export const MemoryConfigSchema = z.object({
  graph: GraphConfigSchema.default({}),
  search: SearchConfigSchema.default({}),
  traverse: TraverseConfigSchema.default({}),
  bestPath: BestPathConfigSchema.default({}),
  recall: RecallConfigSchema.default({}),
  ranker: RankerConfigSchema.default({}),
  trace: TraceConfigSchema.default({}),
  logging: LoggingConfigSchema.default({}),
  embedding: EmbeddingConfigSchema.optional(),
})

export type MemoryConfig = z.infer<typeof MemoryConfigSchema>

/**
 * Validate config and return typed result
 * @throws ZodError if validation fails
 */
export function validateConfig(config: unknown): MemoryConfig {
  return MemoryConfigSchema.parse(config ?? {})
}

/**
 * Validate config with detailed error messages
 */
export function validateConfigSafe(config: unknown): { success: true; data: MemoryConfig } | { success: false; errors: string[] } {
  const result = MemoryConfigSchema.safeParse(config ?? {})

  if (result.success) {
    return { success: true, data: result.data }
  }

  const errors = result.error.issues.map(err => {
    const path = err.path.join('.')
    return `${path}: ${err.message}`
  })

  return { success: false, errors }
}

/**
 * Default configuration
 */
export const DEFAULT_CONFIG: MemoryConfig = MemoryConfigSchema.parse({})
