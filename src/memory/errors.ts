/**
 * Memory layer errors
 */

/**
 * An operation referenced a node (or item) id the store does not hold
 */
export class MemoryReferenceError extends Error {
  public readonly details: { missing: string[] }

  constructor(message: string, missing: string[]) {
    super(message)
    this.name = 'MemoryReferenceError'
    this.details = { missing }
  }
}

/**
 * A persisted graph document was not JSON or did not match the document schema
 */
export class MemoryParseError extends Error {
  public readonly details: {
    path?: string
    issues?: string[]
  }

  constructor(message: string, details: MemoryParseError['details'] = {}) {
    super(message)
    this.name = 'MemoryParseError'
    this.details = details
  }
}

/**
 * Reading or writing the persistence file failed at the filesystem level
 */
export class MemoryPersistenceError extends Error {
  public readonly details: {
    path: string
    operation: 'read' | 'write'
    cause: unknown
  }

  constructor(message: string, details: MemoryPersistenceError['details']) {
    super(message)
    this.name = 'MemoryPersistenceError'
    this.details = details
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error)
}
