/**
 * Schema Collector
 *
 * Resolves every schema reference of a catalog to a file inside the owning
 * domain's environment directory and records its provenance and content hash.
 */

import fs from 'node:fs'
import path from 'node:path'
import { createHash } from 'node:crypto'
import { glob } from 'tinyglobby'
import type { Catalog, CatalogSchema, SchemaCatalog, SchemaCatalogEntry } from '../types.js'
import {
  InvalidCatalogError,
  PathViolationError,
  SchemaNotFoundError,
  toError
} from '../lib/errors.js'
import { formatIssues } from '../lib/schema-issues.js'
import { SchemaCatalogFileSchema, type SchemaCatalogFile } from './schemas.js'
import { compareBy } from './ordering.js'

export interface CollectSchemasOptions {
  domainsDir: string
  /** Root that recorded file paths are made relative to */
  projectRoot: string
}

export interface UnreferencedSchema {
  domain: string
  filePath: string
}

/**
 * Build the schema catalog for an aggregated catalog.
 *
 * Throws PathViolationError for absolute or escaping paths and
 * SchemaNotFoundError for missing files.
 */
export function collectSchemas(catalog: Catalog, options: CollectSchemasOptions): SchemaCatalog {
  const entries = catalog.schemas.map(schema => collectSchema(schema, catalog.environment, options))

  return {
    environment: catalog.environment,
    schemas: entries.sort(compareBy(e => e.domain, e => e.subject))
  }
}

function collectSchema(
  schema: CatalogSchema,
  environment: string,
  options: CollectSchemasOptions
): SchemaCatalogEntry {
  const resolved = resolveSchemaPath(schema, environment, options.domainsDir)

  const stat = fs.statSync(resolved, { throwIfNoEntry: false })
  if (!stat || !stat.isFile()) {
    throw new SchemaNotFoundError(schema.subject, toPosix(path.relative(options.projectRoot, resolved)))
  }

  // The lexical check passed; a symlink may still point elsewhere
  const domainDir = fs.realpathSync(domainEnvDir(options.domainsDir, schema.domain, environment))
  if (!isInside(domainDir, fs.realpathSync(resolved))) {
    throw new PathViolationError(schema.subject, schema.domain, schema.schemaFile)
  }

  return {
    subject: schema.subject,
    domain: schema.domain,
    filePath: toPosix(path.relative(options.projectRoot, resolved)),
    fileName: path.basename(resolved),
    sha256: hashFile(resolved)
  }
}

/**
 * Resolve a schema_file against domains/<domain>/<env>/, rejecting anything
 * that leaves that directory.
 */
export function resolveSchemaPath(schema: CatalogSchema, environment: string, domainsDir: string): string {
  const baseDir = domainEnvDir(domainsDir, schema.domain, environment)

  if (path.isAbsolute(schema.schemaFile) || path.win32.isAbsolute(schema.schemaFile)) {
    throw new PathViolationError(schema.subject, schema.domain, schema.schemaFile)
  }

  const resolved = path.resolve(baseDir, schema.schemaFile)
  if (!isInside(baseDir, resolved)) {
    throw new PathViolationError(schema.subject, schema.domain, schema.schemaFile)
  }

  return resolved
}

/**
 * List *.avsc files under domains/<domain>/<env>/schemas/ that no
 * declaration references.
 */
export async function findUnreferencedSchemas(
  catalog: Catalog,
  options: CollectSchemasOptions
): Promise<UnreferencedSchema[]> {
  const matches = await glob(`*/${catalog.environment}/schemas/**/*.avsc`, {
    cwd: options.domainsDir,
    onlyFiles: true,
    absolute: false
  })

  const referenced = new Set<string>()
  for (const schema of catalog.schemas) {
    try {
      referenced.add(resolveSchemaPath(schema, catalog.environment, options.domainsDir))
    } catch (err) {
      // Violations surface through collectSchemas; only resolvable paths count here
      if (!(err instanceof PathViolationError)) throw err
    }
  }

  return matches
    .map(match => path.resolve(options.domainsDir, match))
    .filter(file => !referenced.has(file))
    .map(file => ({
      domain: toPosix(path.relative(options.domainsDir, file)).split('/')[0],
      filePath: toPosix(path.relative(options.projectRoot, file))
    }))
    .sort(compareBy(u => u.domain, u => u.filePath))
}

// ============================================================================
// Schema Catalog Artifact I/O
// ============================================================================

export function serializeSchemaCatalog(schemaCatalog: SchemaCatalog): string {
  const file: SchemaCatalogFile = {
    environment: schemaCatalog.environment,
    schemas: schemaCatalog.schemas.map(s => ({
      subject: s.subject,
      domain: s.domain,
      file_path: s.filePath,
      file_name: s.fileName,
      sha256: s.sha256
    }))
  }
  return JSON.stringify(file, null, 2) + '\n'
}

export function parseSchemaCatalog(content: string, filePath: string): SchemaCatalog {
  let raw: unknown
  try {
    raw = JSON.parse(content)
  } catch (err) {
    throw new InvalidCatalogError(filePath, [`invalid JSON: ${toError(err).message}`], toError(err))
  }

  const result = SchemaCatalogFileSchema.safeParse(raw)
  if (!result.success) {
    throw new InvalidCatalogError(filePath, formatIssues(result.error))
  }

  return {
    environment: result.data.environment,
    schemas: result.data.schemas.map(s => ({
      subject: s.subject,
      domain: s.domain,
      filePath: s.file_path,
      fileName: s.file_name,
      sha256: s.sha256
    }))
  }
}

// ============================================================================
// Helpers
// ============================================================================

function domainEnvDir(domainsDir: string, domain: string, environment: string): string {
  return path.resolve(domainsDir, domain, environment)
}

function isInside(dir: string, target: string): boolean {
  const rel = path.relative(dir, target)
  return rel !== '' && rel.split(path.sep)[0] !== '..' && !path.isAbsolute(rel)
}

function hashFile(filePath: string): string {
  return createHash('sha256').update(fs.readFileSync(filePath)).digest('hex')
}

function toPosix(p: string): string {
  return p.split(path.sep).join('/')
}
