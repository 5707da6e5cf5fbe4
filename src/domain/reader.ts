/**
 * Domain Reader
 *
 * Loads every domain's declaration for one environment:
 *   <domainsDir>/<domain>/<env>/kafka-request.yaml
 *
 * A broken file is reported as a failure for its domain; the scan carries on
 * with the siblings so every broken file surfaces in one run.
 */

import fs from 'node:fs'
import path from 'node:path'
import { glob } from 'tinyglobby'
import { parse as parseYaml } from 'yaml'
import type { DomainDeclaration, Environment } from '../types.js'
import {
  DeclarationIOError,
  DeclarationScanError,
  DomainsDirNotFoundError,
  MalformedDeclarationError,
  toError,
  type DeclarationError
} from '../lib/errors.js'
import { formatIssues } from '../lib/schema-issues.js'
import { DeclarationFileSchema } from './schemas.js'
import { compareStrings } from './ordering.js'

export interface ReadDomainsOptions {
  domainsDir: string
  environment: Environment
  /** Declaration file name (default: kafka-request.yaml) */
  declarationFile?: string
}

export interface ReadDomainsResult {
  /** Sorted by domain id */
  declarations: DomainDeclaration[]
  /** Sorted by domain id */
  failures: DeclarationError[]
}

/**
 * Read all declarations for an environment, collecting per-domain failures.
 */
export async function readDomainDeclarations(options: ReadDomainsOptions): Promise<ReadDomainsResult> {
  const { domainsDir, environment, declarationFile = 'kafka-request.yaml' } = options

  if (!fs.existsSync(domainsDir) || !fs.statSync(domainsDir).isDirectory()) {
    throw new DomainsDirNotFoundError(domainsDir)
  }

  const matches = await glob(`*/${environment}/${declarationFile}`, {
    cwd: domainsDir,
    onlyFiles: true,
    absolute: false
  })

  // Discovery order is filesystem order; fix it before anything downstream sees it
  const files = matches
    .map(match => ({ domain: match.split('/')[0], filePath: path.join(domainsDir, match) }))
    .sort((a, b) => compareStrings(a.domain, b.domain))

  const declarations: DomainDeclaration[] = []
  const failures: DeclarationError[] = []

  for (const { domain, filePath } of files) {
    try {
      declarations.push(readDeclarationFile(domain, environment, filePath))
    } catch (err) {
      if (err instanceof MalformedDeclarationError || err instanceof DeclarationIOError) {
        failures.push(err)
        continue
      }
      throw err
    }
  }

  return { declarations, failures }
}

/**
 * Read all declarations, throwing one DeclarationScanError listing every
 * failed domain.
 */
export async function readDomainDeclarationsOrThrow(options: ReadDomainsOptions): Promise<DomainDeclaration[]> {
  const { declarations, failures } = await readDomainDeclarations(options)
  if (failures.length > 0) {
    throw new DeclarationScanError(options.environment, failures)
  }
  return declarations
}

/**
 * Read and validate a single declaration file
 */
export function readDeclarationFile(
  domain: string,
  environment: Environment,
  filePath: string
): DomainDeclaration {
  let content: string
  try {
    content = fs.readFileSync(filePath, 'utf-8')
  } catch (err) {
    throw new DeclarationIOError(domain, filePath, toError(err))
  }

  let raw: unknown
  try {
    raw = parseYaml(content)
  } catch (err) {
    const error = toError(err)
    throw new MalformedDeclarationError(domain, filePath, [`invalid YAML: ${error.message}`], error)
  }

  const result = DeclarationFileSchema.safeParse(raw ?? {})
  if (!result.success) {
    throw new MalformedDeclarationError(domain, filePath, formatIssues(result.error))
  }

  const file = result.data
  return Object.freeze({
    domain,
    environment,
    serviceName: file.service_name ?? domain,
    description: file.description,
    topics: Object.freeze(file.topics.map(topic => ({
      name: topic.name,
      partitions: topic.partitions,
      replicationFactor: topic.replication_factor,
      config: topic.config
    }))),
    schemas: Object.freeze(file.schemas.map(schema => ({
      subject: schema.subject,
      schemaFile: schema.schema_file
    }))),
    accessConfig: Object.freeze(file.access_config.map(access => ({
      name: access.name,
      description: access.description,
      role: access.role,
      topics: access.topics
    }))),
    sourcePath: filePath
  })
}
