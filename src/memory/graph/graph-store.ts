import { isDeepStrictEqual } from 'util'
import { componentLogger, metrics, type Logger } from '../../observability/index.js'
import { MemoryReferenceError, errorMessage } from '../errors.js'
import { sparseCosine } from '../similarity.js'
import { DEFAULT_NODE_TYPE, createMemoryNode } from './factories.js'
import {
  DEFAULT_PERSIST_PATH,
  documentExists,
  readGraphDocument,
  writeGraphDocument,
} from './persistence.js'
import type {
  FlushResult,
  GraphDocument,
  MemoryMeta,
  MemoryNode,
  MemoryRelationship,
  SimilarityProbe,
  SparseVector,
} from './types.js'

/** Reserved vector dimension read as the importance proxy by `bestPathMeta` */
export const IMPORTANCE_DIMENSION = 'M'
export const DEFAULT_IMPORTANCE = 0.5

/**
 * Defaults for the query arguments a caller leaves out
 */
export interface GraphQueryDefaults {
  topK: number
  minScore: number
  depth: number
  bestPathLimit: number
}

export const DEFAULT_GRAPH_QUERY: GraphQueryDefaults = {
  topK: 5,
  minScore: 0.2,
  depth: 2,
  bestPathLimit: 10,
}

export interface MemoryGraphStoreOptions {
  /** Snapshot file; defaults to `memory_graph.json` in the working directory */
  persistPath?: string
  /** Load the snapshot in the constructor when the file exists (default true) */
  autoLoad?: boolean
  queryDefaults?: Partial<GraphQueryDefaults>
  logger?: Logger
}

/**
 * In-memory graph of memory nodes and relationships with JSON persistence.
 *
 * All operations are synchronous. Lookups that scan (`upsert`, `findSimilar`,
 * `outEdges`) are O(n) in the number of nodes or edges, which is fine at
 * agent-session scale but is the first limit a larger store will hit.
 */
export class MemoryGraphStore {
  readonly persistPath: string

  private nodeMap: Map<string, MemoryNode> = new Map()
  private edgeMap: Map<string, MemoryRelationship> = new Map()
  private defaults: GraphQueryDefaults
  private log: Logger

  constructor(options: MemoryGraphStoreOptions = {}) {
    this.persistPath = options.persistPath || DEFAULT_PERSIST_PATH
    this.defaults = { ...DEFAULT_GRAPH_QUERY, ...options.queryDefaults }
    this.log = componentLogger('memory-graph', options.logger)

    if (options.autoLoad !== false && documentExists(this.persistPath)) {
      this.load()
    }
  }

  // ─── CRUD ───

  addNode(node: MemoryNode): void {
    this.nodeMap.set(node.id, node)
    this.log.debug({ nodeId: node.id, nodeType: node.node_type }, 'node added')
  }

  /**
   * @throws MemoryReferenceError if either endpoint is not a known node
   */
  addEdge(edge: MemoryRelationship): void {
    const missing = [edge.source, edge.target].filter((id) => !this.nodeMap.has(id))
    if (missing.length > 0) {
      throw new MemoryReferenceError(
        `Edge ${edge.id} references unknown node(s): ${missing.join(', ')}`,
        missing
      )
    }
    this.edgeMap.set(edge.id, edge)
    this.log.debug({ edgeId: edge.id, predicate: edge.predicate }, 'edge added')
  }

  /**
   * Return the node whose content is exactly `content`, or create it.
   * Matching is exact text only; an existing node is returned unchanged.
   */
  upsert(
    content: string,
    node_type: string = DEFAULT_NODE_TYPE,
    vectors: SparseVector = {},
    meta: MemoryMeta = {}
  ): MemoryNode {
    for (const node of this.nodeMap.values()) {
      if (node.content === content) {
        metrics.increment('memory.graph.upsert', 1, { result: 'hit' })
        return node
      }
    }

    const node = createMemoryNode(content, node_type, vectors, meta)
    this.addNode(node)
    metrics.increment('memory.graph.upsert', 1, { result: 'miss' })
    return node
  }

  getNode(id: string): MemoryNode | undefined {
    return this.nodeMap.get(id)
  }

  getEdge(id: string): MemoryRelationship | undefined {
    return this.edgeMap.get(id)
  }

  nodes(): MemoryNode[] {
    return Array.from(this.nodeMap.values())
  }

  edges(): MemoryRelationship[] {
    return Array.from(this.edgeMap.values())
  }

  get nodeCount(): number {
    return this.nodeMap.size
  }

  get edgeCount(): number {
    return this.edgeMap.size
  }

  // ─── Similarity & traversal ───

  /**
   * Vector probe: sparse cosine over shared dimensions, kept when >= minScore.
   * Keyword probe: case-insensitive substring match, every hit scores 1.0.
   * Ties keep insertion order.
   */
  findSimilar(
    probe: SimilarityProbe,
    topK: number = this.defaults.topK,
    minScore: number = this.defaults.minScore
  ): MemoryNode[] {
    const scored: Array<{ score: number; node: MemoryNode }> = []

    if (typeof probe === 'string') {
      const keyword = probe.toLowerCase()
      for (const node of this.nodeMap.values()) {
        if (node.content.toLowerCase().includes(keyword)) {
          scored.push({ score: 1.0, node })
        }
      }
    } else {
      for (const node of this.nodeMap.values()) {
        const score = sparseCosine(node.vectors, probe)
        if (score >= minScore) {
          scored.push({ score, node })
        }
      }
    }

    scored.sort((a, b) => b.score - a.score)
    const results = scored.slice(0, Math.max(0, topK)).map((s) => s.node)

    this.log.debug(
      { mode: typeof probe === 'string' ? 'keyword' : 'vector', matched: scored.length, returned: results.length },
      'findSimilar'
    )
    return results
  }

  /**
   * Depth-first walk over outgoing edges, each node visited once.
   * An empty predicate filter follows every edge.
   */
  traverse(startId: string, predicateFilter?: string, depth: number = this.defaults.depth): MemoryNode[] {
    const visited = new Set<string>()
    const result: MemoryNode[] = []

    const dfs = (nodeId: string, remaining: number): void => {
      if (remaining < 0 || visited.has(nodeId)) {
        return
      }
      const node = this.nodeMap.get(nodeId)
      if (!node) {
        throw new MemoryReferenceError(`Traversal reached unknown node ${nodeId}`, [nodeId])
      }
      visited.add(nodeId)
      result.push(node)

      for (const edge of this.outEdges(nodeId)) {
        if (predicateFilter && edge.predicate !== predicateFilter) {
          continue
        }
        dfs(edge.target, remaining - 1)
      }
    }

    dfs(startId, depth)
    return result
  }

  outEdges(nodeId: string): MemoryRelationship[] {
    return this.edges().filter((edge) => edge.source === nodeId)
  }

  /**
   * Nodes whose meta matches every filter pair (deep equality, a missing key
   * reads as null), ranked by the `M` vector weight (default 0.5).
   */
  bestPathMeta(metaFilter: MemoryMeta = {}, limit: number = this.defaults.bestPathLimit): MemoryNode[] {
    const filterEntries = Object.entries(metaFilter)
    const matches = (node: MemoryNode): boolean =>
      filterEntries.every(([key, value]) =>
        isDeepStrictEqual(node.meta[key] ?? null, value ?? null)
      )

    return this.nodes()
      .filter(matches)
      .sort((a, b) => importanceOf(b) - importanceOf(a))
      .slice(0, Math.max(0, limit))
  }

  // ─── Persistence ───

  toDocument(): GraphDocument {
    return { nodes: this.nodes(), edges: this.edges() }
  }

  save(): void {
    writeGraphDocument(this.persistPath, this.toDocument())
    metrics.increment('memory.graph.save')
    this.recordSize()
    this.log.info(
      { path: this.persistPath, nodes: this.nodeMap.size, edges: this.edgeMap.size },
      'graph saved'
    )
  }

  /**
   * Replace the in-memory graph with the snapshot at `persistPath`.
   * A snapshot that fails to parse leaves the current state untouched.
   */
  load(): void {
    const document = readGraphDocument(this.persistPath)
    this.nodeMap = new Map(document.nodes.map((node) => [node.id, node]))
    this.edgeMap = new Map(document.edges.map((edge) => [edge.id, edge]))
    metrics.increment('memory.graph.load')
    this.recordSize()
    this.log.info(
      { path: this.persistPath, nodes: this.nodeMap.size, edges: this.edgeMap.size },
      'graph loaded'
    )
  }

  /**
   * Best-effort flush. Never throws; the outcome is returned and a failure
   * is logged at warn.
   */
  close(): FlushResult {
    try {
      this.save()
      return { ok: true, path: this.persistPath }
    } catch (error) {
      const err = error instanceof Error ? error : new Error(errorMessage(error))
      metrics.increment('memory.graph.flush_failed')
      this.log.warn({ path: this.persistPath, err }, 'graph flush failed')
      return { ok: false, path: this.persistPath, error: err }
    }
  }

  private recordSize(): void {
    metrics.gauge('memory.graph.nodes', this.nodeMap.size, { path: this.persistPath })
    metrics.gauge('memory.graph.edges', this.edgeMap.size, { path: this.persistPath })
  }
}

function importanceOf(node: MemoryNode): number {
  return node.vectors[IMPORTANCE_DIMENSION] ?? DEFAULT_IMPORTANCE
}
