/**
 * kafkagate Catalog Store
 *
 * Durable, versioned store for catalogs, baselines and lock records.
 *
 * Structure:
 * catalogs/
 * └── {env}/
 *     ├── kafka-catalog.yaml       # aggregated catalog (this run)
 *     ├── schemas-catalog.json     # schema provenance (this run)
 *     ├── .lock.json               # present only while a deployment runs
 *     ├── .prepared/               # what deploy prepare validated and emitted
 *     │   ├── kafka-catalog.yaml
 *     │   └── schemas-catalog.json
 *     └── .deployed/
 *         ├── kafka-catalog.yaml   # baseline: last applied catalog
 *         └── schemas-catalog.json
 *
 * Any backend offering atomic create-if-absent can implement CatalogStore.
 */

import fs from 'node:fs/promises'
import path from 'node:path'
import { randomBytes } from 'node:crypto'
import type { Environment } from '../types.js'
import { StoreError, toError } from './errors.js'

// =============================================================================
// Store Interface
// =============================================================================

export interface CatalogStore {
  /** Content at key, or null when absent */
  read(key: string): Promise<string | null>
  /** Replace content at key atomically */
  write(key: string, content: string): Promise<void>
  /**
   * Create key only if it does not exist. Atomic: of two racing callers
   * exactly one gets true.
   */
  createIfAbsent(key: string, content: string): Promise<boolean>
  /** Delete key; false when it was already absent */
  remove(key: string): Promise<boolean>
}

// =============================================================================
// Key Helpers
// =============================================================================

export const storeKeys = {
  catalog: (env: Environment) => `${env}/kafka-catalog.yaml`,
  schemaCatalog: (env: Environment) => `${env}/schemas-catalog.json`,
  baselineCatalog: (env: Environment) => `${env}/.deployed/kafka-catalog.yaml`,
  baselineSchemaCatalog: (env: Environment) => `${env}/.deployed/schemas-catalog.json`,
  preparedCatalog: (env: Environment) => `${env}/.prepared/kafka-catalog.yaml`,
  preparedSchemaCatalog: (env: Environment) => `${env}/.prepared/schemas-catalog.json`,
  lock: (env: Environment) => `${env}/.lock.json`
}

// =============================================================================
// Filesystem Implementation
// =============================================================================

function errorCode(err: unknown): string | undefined {
  if (err instanceof Error && 'code' in err && typeof err.code === 'string') {
    return err.code
  }
  return undefined
}

/**
 * CatalogStore over a directory (normally the git-tracked catalogs/ dir).
 *
 * createIfAbsent writes a temp file and hard-links it into place, so the
 * record appears complete or not at all, and link() fails if it exists.
 */
export class FileCatalogStore implements CatalogStore {
  readonly rootDir: string

  constructor(rootDir: string) {
    this.rootDir = path.resolve(rootDir)
  }

  /**
   * Absolute path for a key; keys never leave the root
   */
  resolve(key: string): string {
    const segments = key.split('/')
    if (key === '' || path.isAbsolute(key) || segments.some(s => s === '..' || s === '')) {
      throw new StoreError(`Invalid store key: ${key}`, key)
    }
    return path.join(this.rootDir, ...segments)
  }

  async read(key: string): Promise<string | null> {
    const filePath = this.resolve(key)
    try {
      return await fs.readFile(filePath, 'utf-8')
    } catch (err) {
      if (errorCode(err) === 'ENOENT') return null
      throw new StoreError(`Failed to read ${filePath}`, filePath, toError(err))
    }
  }

  async write(key: string, content: string): Promise<void> {
    const filePath = this.resolve(key)
    const tempPath = await this.writeTemp(filePath, content)
    try {
      await fs.rename(tempPath, filePath)
    } catch (err) {
      await fs.rm(tempPath, { force: true })
      throw new StoreError(`Failed to write ${filePath}`, filePath, toError(err))
    }
  }

  async createIfAbsent(key: string, content: string): Promise<boolean> {
    const filePath = this.resolve(key)
    const tempPath = await this.writeTemp(filePath, content)
    try {
      await fs.link(tempPath, filePath)
      return true
    } catch (err) {
      if (errorCode(err) === 'EEXIST') return false
      throw new StoreError(`Failed to create ${filePath}`, filePath, toError(err))
    } finally {
      await fs.rm(tempPath, { force: true })
    }
  }

  async remove(key: string): Promise<boolean> {
    const filePath = this.resolve(key)
    try {
      await fs.unlink(filePath)
      return true
    } catch (err) {
      if (errorCode(err) === 'ENOENT') return false
      throw new StoreError(`Failed to remove ${filePath}`, filePath, toError(err))
    }
  }

  private async writeTemp(filePath: string, content: string): Promise<string> {
    const tempPath = `${filePath}.${process.pid}.${randomBytes(6).toString('hex')}.tmp`
    try {
      await fs.mkdir(path.dirname(filePath), { recursive: true })
      await fs.writeFile(tempPath, content, 'utf-8')
    } catch (err) {
      throw new StoreError(`Failed to write ${filePath}`, filePath, toError(err))
    }
    return tempPath
  }
}
