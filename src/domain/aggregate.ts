/**
 * Catalog Aggregator
 *
 * Merges every domain declaration of one environment into a Catalog.
 * Pure: the result depends only on the declarations, never on the order they
 * arrive in. Colliding names are kept with their domain tag; reporting them is
 * the Conflict Validator's job.
 */

import { parse as parseYaml, stringify as stringifyYaml } from 'yaml'
import type {
  AccessConfigEntry,
  Catalog,
  CatalogAclGrant,
  CatalogSchema,
  CatalogServiceAccount,
  CatalogTopic,
  DomainDeclaration,
  Environment
} from '../types.js'
import { InvalidCatalogError, UnknownTopicReferenceError, toError } from '../lib/errors.js'
import { formatIssues } from '../lib/schema-issues.js'
import { CatalogFileSchema, type CatalogFile } from './schemas.js'
import { compareBy, compareStrings, sortRecord } from './ordering.js'

// ============================================================================
// Aggregation
// ============================================================================

export function aggregateCatalog(
  environment: Environment,
  declarations: readonly DomainDeclaration[]
): Catalog {
  const ordered = [...declarations].sort((a, b) => compareStrings(a.domain, b.domain))

  const topics: CatalogTopic[] = ordered
    .flatMap(decl => decl.topics.map(topic => ({
      name: topic.name,
      partitions: topic.partitions,
      replicationFactor: topic.replicationFactor,
      config: sortRecord(topic.config),
      domain: decl.domain
    })))
    .sort(compareBy(t => t.domain, t => t.name))

  const schemas: CatalogSchema[] = ordered
    .flatMap(decl => decl.schemas.map(schema => ({
      subject: schema.subject,
      schemaFile: schema.schemaFile,
      domain: decl.domain
    })))
    .sort(compareBy(s => s.domain, s => s.subject))

  // Topic references resolve against the whole environment, not just the owning domain
  const topicNames = new Set(topics.map(t => t.name))

  const serviceAccounts: CatalogServiceAccount[] = []
  const aclGrants: CatalogAclGrant[] = []

  for (const decl of ordered) {
    for (const entry of decl.accessConfig) {
      const expanded = expandAccessEntry(entry, decl.domain, topicNames)
      serviceAccounts.push(expanded.serviceAccount)
      aclGrants.push(...expanded.grants)
    }
  }

  serviceAccounts.sort(compareBy(a => a.domain, a => a.name))
  aclGrants.sort(compareBy(g => g.domain, g => g.account, g => g.topic))

  return {
    environment,
    domains: [...new Set(ordered.map(d => d.domain))],
    topics,
    schemas,
    serviceAccounts,
    aclGrants
  }
}

export interface ExpandedAccessEntry {
  serviceAccount: CatalogServiceAccount
  grants: CatalogAclGrant[]
}

/**
 * Fan one access entry out into its service account and one grant per topic.
 */
export function expandAccessEntry(
  entry: AccessConfigEntry,
  domain: string,
  topicNames: ReadonlySet<string>
): ExpandedAccessEntry {
  const grants = entry.topics.map(topic => {
    if (!topicNames.has(topic)) {
      throw new UnknownTopicReferenceError(entry.name, topic, domain)
    }
    return Object.freeze({ account: entry.name, topic, role: entry.role, domain })
  })

  return {
    serviceAccount: Object.freeze({ name: entry.name, description: entry.description, domain }),
    grants
  }
}

// ============================================================================
// Catalog Artifact I/O
// ============================================================================

/**
 * Render a catalog as the kafka-catalog.yaml artifact.
 */
export function serializeCatalog(catalog: Catalog): string {
  const file: CatalogFile = {
    environment: catalog.environment,
    domains: catalog.domains,
    topics: catalog.topics.map(t => ({
      name: t.name,
      domain: t.domain,
      partitions: t.partitions,
      replication_factor: t.replicationFactor,
      config: t.config
    })),
    schemas: catalog.schemas.map(s => ({
      subject: s.subject,
      domain: s.domain,
      schema_file: s.schemaFile
    })),
    service_accounts: catalog.serviceAccounts.map(a => ({
      name: a.name,
      domain: a.domain,
      description: a.description
    })),
    acls: catalog.aclGrants.map(g => ({
      account: g.account,
      topic: g.topic,
      role: g.role,
      domain: g.domain
    }))
  }

  return stringifyYaml(file, { lineWidth: 0 })
}

/**
 * Parse a kafka-catalog.yaml artifact.
 */
export function parseCatalog(content: string, filePath: string): Catalog {
  let raw: unknown
  try {
    raw = parseYaml(content)
  } catch (err) {
    throw new InvalidCatalogError(filePath, [`invalid YAML: ${toError(err).message}`], toError(err))
  }

  const result = CatalogFileSchema.safeParse(raw)
  if (!result.success) {
    throw new InvalidCatalogError(filePath, formatIssues(result.error))
  }

  const file = result.data
  return {
    environment: file.environment,
    domains: file.domains,
    topics: file.topics.map(t => ({
      name: t.name,
      partitions: t.partitions,
      replicationFactor: t.replication_factor,
      config: sortRecord(t.config),
      domain: t.domain
    })),
    schemas: file.schemas.map(s => ({
      subject: s.subject,
      schemaFile: s.schema_file,
      domain: s.domain
    })),
    serviceAccounts: file.service_accounts.map(a => ({
      name: a.name,
      description: a.description,
      domain: a.domain
    })),
    aclGrants: file.acls.map(g => ({
      account: g.account,
      topic: g.topic,
      role: g.role,
      domain: g.domain
    }))
  }
}

/**
 * An empty catalog, used when an environment has never been deployed.
 */
export function emptyCatalog(environment: Environment): Catalog {
  return {
    environment,
    domains: [],
    topics: [],
    schemas: [],
    serviceAccounts: [],
    aclGrants: []
  }
}
