import { describe, it, expect, beforeEach, afterEach } from 'vitest'
import { mkdtempSync, rmSync, writeFileSync } from 'fs'
import { tmpdir } from 'os'
import { join } from 'path'
import {
  ConfigurationError,
  DEFAULT_CONFIG,
  applyEnvironmentOverrides,
  loadConfig,
  loadConfigAuto,
  loadConfigFromDefaults,
  loadConfigSafe,
  resolveConfig,
  validateConfig,
  validateConfigSafe,
} from '../../src/config/index.js'

describe('Memory configuration', () => {
  let dir: string

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'memory-config-'))
  })

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true })
  })

  function writeYaml(name: string, content: string): string {
    const path = join(dir, name)
    writeFileSync(path, content)
    return path
  }

  describe('schema', () => {
    it('fills every section with defaults', () => {
      expect(DEFAULT_CONFIG).toEqual({
        graph: { persistPath: 'memory_graph.json', autoLoad: true },
        search: { topK: 5, minScore: 0.2 },
        traverse: { depth: 2 },
        bestPath: { limit: 10 },
        recall: { timeGamma: 0.03, trustBeta: 0.4, oversample: 16, k: 6, diversity: 4, defaultTrust: 0.7 },
        ranker: { limit: 5 },
        trace: { recent: 5 },
        logging: { level: 'info', pretty: false },
      })
    })

    it('applies provider defaults to embedding config', () => {
      const config = validateConfig({ embedding: { provider: 'openai', apiKey: 'test-secret' } })

      expect(config.embedding).toEqual({
        provider: 'openai',
        apiKey: 'test-secret',
        model: 'text-embedding-3-small',
        baseUrl: 'https://api.openai.com/v1',
      })
    })

    it('reports invalid fields with their path', () => {
      const result = validateConfigSafe({ search: { minScore: 2 } })

      expect(result.success).toBe(false)
      if (!result.success) {
        expect(result.errors).toHaveLength(1)
        expect(result.errors[0]).toMatch(/^search\.minScore: /)
      }
    })
  })

  describe('loader', () => {
    it('loads and validates a YAML file', () => {
      const path = writeYaml(
        'memory.yaml',
        ['graph:', '  persistPath: data/graph.json', 'recall:', '  timeGamma: 0.1', '  k: 3'].join('\n')
      )

      const config = loadConfig(path)

      expect(config.graph.persistPath).toBe('data/graph.json')
      expect(config.recall.timeGamma).toBe(0.1)
      expect(config.recall.k).toBe(3)
      expect(config.recall.diversity).toBe(4)
    })

    it('treats an empty file as all defaults', () => {
      expect(loadConfig(writeYaml('empty.yaml', ''))).toEqual(DEFAULT_CONFIG)
    })

    it('reports a missing file', () => {
      const path = join(dir, 'absent.yaml')

      expect(loadConfigSafe(path)).toEqual({ success: false, errors: [`Config file not found: ${path}`] })
    })

    it('reports malformed YAML', () => {
      const result = loadConfigSafe(writeYaml('broken.yaml', 'graph: [unclosed'))

      expect(result.success).toBe(false)
      if (!result.success) {
        expect(result.errors[0]).toMatch(/^Failed to parse YAML: /)
      }
    })

    it('throws a ConfigurationError for an invalid file', () => {
      const path = writeYaml('invalid.yaml', 'traverse:\n  depth: -1\n')

      expect(() => loadConfig(path)).toThrow(ConfigurationError)
    })

    it('finds the first valid default location', () => {
      writeYaml('memory.config.yaml', 'search: {minScore: 5}\n')
      writeYaml('memory.config.yml', 'search: {topK: 9}\n')

      expect(loadConfigFromDefaults(dir)?.search.topK).toBe(9)
    })

    it('returns undefined when no default location exists', () => {
      expect(loadConfigFromDefaults(dir)).toBeUndefined()
    })

    it('prefers MEMORY_CONFIG_PATH', () => {
      const path = writeYaml('custom.yaml', 'ranker:\n  limit: 2\n')

      expect(loadConfigAuto({ MEMORY_CONFIG_PATH: path })?.ranker.limit).toBe(2)
    })
  })

  describe('environment overrides', () => {
    it('overlays graph, recall and logging settings', () => {
      const config = applyEnvironmentOverrides(DEFAULT_CONFIG, {
        MEMORY_GRAPH_PATH: '/var/lib/memory/graph.json',
        MEMORY_TIME_GAMMA: '0.05',
        MEMORY_TRUST_BETA: '0',
        MEMORY_LOG_LEVEL: 'debug',
        MEMORY_LOG_PRETTY: 'true',
      })

      expect(config.graph.persistPath).toBe('/var/lib/memory/graph.json')
      expect(config.recall.timeGamma).toBe(0.05)
      expect(config.recall.trustBeta).toBe(0)
      expect(config.logging).toEqual({ level: 'debug', pretty: true })
    })

    it('leaves the config untouched without variables', () => {
      expect(applyEnvironmentOverrides(DEFAULT_CONFIG, {})).toEqual(DEFAULT_CONFIG)
    })

    it('adds an OpenAI embedder from OPENAI_API_KEY', () => {
      const config = applyEnvironmentOverrides(DEFAULT_CONFIG, {
        OPENAI_API_KEY: 'test-secret',
        EMBEDDING_MODEL: 'text-embedding-3-large',
      })

      expect(config.embedding).toEqual({
        provider: 'openai',
        apiKey: 'test-secret',
        model: 'text-embedding-3-large',
        baseUrl: 'https://api.openai.com/v1',
      })
    })

    it('keeps an embedder configured in the file', () => {
      const base = validateConfig({
        embedding: {
          provider: 'azure-openai',
          apiKey: 'test-secret',
          endpoint: 'https://example.openai.azure.com',
          deploymentName: 'embeddings',
        },
      })

      const config = applyEnvironmentOverrides(base, { OPENAI_API_KEY: 'other-secret' })

      expect(config.embedding?.provider).toBe('azure-openai')
    })

    it('rejects non-numeric decay rates', () => {
      try {
        applyEnvironmentOverrides(DEFAULT_CONFIG, { MEMORY_TIME_GAMMA: 'fast' })
        expect.fail('Should have thrown')
      } catch (error) {
        expect(error).toBeInstanceOf(ConfigurationError)
        expect((error as ConfigurationError).message).toBe(
          'Environment variable MEMORY_TIME_GAMMA must be a number, got "fast"'
        )
        expect((error as ConfigurationError).details?.key).toBe('MEMORY_TIME_GAMMA')
      }
    })

    it('rejects values the schema refuses', () => {
      expect(() => applyEnvironmentOverrides(DEFAULT_CONFIG, { MEMORY_LOG_LEVEL: 'loud' })).toThrow(
        /^Environment overrides produced an invalid config/
      )
    })
  })

  describe('resolveConfig', () => {
    it('combines the file named by MEMORY_CONFIG_PATH with overrides', () => {
      const path = writeYaml('resolved.yaml', 'search:\n  topK: 3\n')

      const config = resolveConfig({
        MEMORY_CONFIG_PATH: path,
        MEMORY_TRUST_BETA: '0.8',
        MEMORY_LOG_LEVEL: 'silent',
      })

      expect(config.search.topK).toBe(3)
      expect(config.recall.trustBeta).toBe(0.8)
      expect(config.logging.level).toBe('silent')
    })
  })
})
