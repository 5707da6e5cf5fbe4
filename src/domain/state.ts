/**
 * kafkagate Domain State Layer
 *
 * Reads and writes catalog artifacts and the deployed baseline through a
 * CatalogStore handle. Nothing here holds state between calls: the store is
 * passed in, what was read is returned.
 */

import { createHash } from 'node:crypto'
import type { Baseline, Catalog, Environment, SchemaCatalog } from '../types.js'
import { storeKeys, type CatalogStore } from '../lib/fs-store.js'
import { parseCatalog, serializeCatalog } from './aggregate.js'
import { parseSchemaCatalog, serializeSchemaCatalog } from './schema-collector.js'

// ============================================================================
// Read Operations
// ============================================================================

/**
 * Read the deployed baseline, or null when the environment was never applied.
 */
export async function readBaseline(store: CatalogStore, environment: Environment): Promise<Baseline | null> {
  const catalogKey = storeKeys.baselineCatalog(environment)
  const content = await store.read(catalogKey)
  if (content === null) return null

  const schemaKey = storeKeys.baselineSchemaCatalog(environment)
  const schemaContent = await store.read(schemaKey)

  return {
    catalog: parseCatalog(content, catalogKey),
    schemaCatalog: schemaContent === null ? null : parseSchemaCatalog(schemaContent, schemaKey)
  }
}

/**
 * Read the last aggregated catalog and schema catalog written for an environment.
 */
export async function readCatalogArtifacts(
  store: CatalogStore,
  environment: Environment
): Promise<{ catalog: Catalog; schemaCatalog: SchemaCatalog | null } | null> {
  const catalogKey = storeKeys.catalog(environment)
  const content = await store.read(catalogKey)
  if (content === null) return null

  const schemaKey = storeKeys.schemaCatalog(environment)
  const schemaContent = await store.read(schemaKey)

  return {
    catalog: parseCatalog(content, catalogKey),
    schemaCatalog: schemaContent === null ? null : parseSchemaCatalog(schemaContent, schemaKey)
  }
}

export interface PreparedCatalog {
  catalog: Catalog
  schemaCatalog: SchemaCatalog
  /** Digest of the stored bytes, compared against the lock record */
  sha256: string
}

/**
 * sha256 over the serialized catalog and schema catalog
 */
export function preparedDigest(catalogContent: string, schemaCatalogContent: string): string {
  return createHash('sha256')
    .update(catalogContent)
    .update('\u0000')
    .update(schemaCatalogContent)
    .digest('hex')
}

/**
 * Read the catalog pair written by the run holding the lock.
 */
export async function readPreparedCatalog(
  store: CatalogStore,
  environment: Environment
): Promise<PreparedCatalog | null> {
  const catalogKey = storeKeys.preparedCatalog(environment)
  const schemaKey = storeKeys.preparedSchemaCatalog(environment)
  const content = await store.read(catalogKey)
  const schemaContent = await store.read(schemaKey)
  if (content === null || schemaContent === null) return null

  return {
    catalog: parseCatalog(content, catalogKey),
    schemaCatalog: parseSchemaCatalog(schemaContent, schemaKey),
    sha256: preparedDigest(content, schemaContent)
  }
}

// ============================================================================
// Write Operations
// ============================================================================

/**
 * Write kafka-catalog.yaml and schemas-catalog.json for this run.
 */
export async function writeCatalogArtifacts(
  store: CatalogStore,
  catalog: Catalog,
  schemaCatalog: SchemaCatalog
): Promise<{ catalogKey: string; schemaCatalogKey: string }> {
  const catalogKey = storeKeys.catalog(catalog.environment)
  const schemaCatalogKey = storeKeys.schemaCatalog(catalog.environment)

  await store.write(catalogKey, serializeCatalog(catalog))
  await store.write(schemaCatalogKey, serializeSchemaCatalog(schemaCatalog))

  return { catalogKey, schemaCatalogKey }
}

/**
 * Keep the catalog this run validated and emitted, out of reach of review runs.
 *
 * @returns the digest to pin on the lock record
 */
export async function writePreparedCatalog(
  store: CatalogStore,
  catalog: Catalog,
  schemaCatalog: SchemaCatalog
): Promise<string> {
  const content = serializeCatalog(catalog)
  const schemaContent = serializeSchemaCatalog(schemaCatalog)

  await store.write(storeKeys.preparedSchemaCatalog(catalog.environment), schemaContent)
  await store.write(storeKeys.preparedCatalog(catalog.environment), content)

  return preparedDigest(content, schemaContent)
}

/**
 * Drop the prepared catalog once its deployment is finished.
 */
export async function clearPreparedCatalog(store: CatalogStore, environment: Environment): Promise<void> {
  await store.remove(storeKeys.preparedCatalog(environment))
  await store.remove(storeKeys.preparedSchemaCatalog(environment))
}

/**
 * Make a successfully applied catalog the new baseline.
 *
 * Only the run holding the environment lock may call this.
 */
export async function promoteBaseline(
  store: CatalogStore,
  catalog: Catalog,
  schemaCatalog: SchemaCatalog
): Promise<void> {
  await store.write(storeKeys.baselineSchemaCatalog(catalog.environment), serializeSchemaCatalog(schemaCatalog))
  // The catalog file marks the baseline as present, so it goes last
  await store.write(storeKeys.baselineCatalog(catalog.environment), serializeCatalog(catalog))
}
