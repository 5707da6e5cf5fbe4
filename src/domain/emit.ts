/**
 * Variable Emitter
 *
 * Turns a validated catalog into the flat variable structure consumed by the
 * provisioning tool. Pure: the same catalog, schema catalog and parameters
 * always serialize to the same bytes.
 *
 * Credentials are checked for presence but never written into the output.
 */

import type {
  AclVariable,
  Catalog,
  CatalogAclGrant,
  EnvironmentParameters,
  ProvisioningVariables,
  SchemaCatalog,
  SchemaVariable,
  ServiceAccountVariable,
  TopicVariable
} from '../types.js'
import {
  DuplicateResourceError,
  MissingRequiredParameterError,
  UnresolvedSchemaPathError,
  UnresolvedTopicReferenceError
} from '../lib/errors.js'
import { PARAMETER_ENV_VARS, PARAMETER_NAMES } from '../lib/params.js'
import { compareStrings, sortRecord } from './ordering.js'

const SCHEMA_REGISTRY_PARAMETERS = ['schemaRegistryId', 'schemaRegistryApiKey', 'schemaRegistryApiSecret'] as const

function requireParameter(parameters: EnvironmentParameters, key: keyof EnvironmentParameters): string {
  const value = parameters[key]
  if (value === undefined || value.trim() === '') {
    throw new MissingRequiredParameterError(PARAMETER_NAMES[key], PARAMETER_ENV_VARS[key])
  }
  return value
}

/**
 * ACL resource pattern for a topic in the target cluster
 */
export function topicCrnPattern(parameters: {
  organizationId: string
  environmentId: string
  clusterId: string
}, topic: string): string {
  const { organizationId, environmentId, clusterId } = parameters
  return `crn://confluent.cloud/organization=${organizationId}/environment=${environmentId}` +
    `/cloud-cluster=${clusterId}/kafka=${clusterId}/topic=${topic}`
}

/**
 * Key of an ACL entry: "<account>:<topic>"
 *
 * Topic names cannot contain ':', so the last colon always splits the key.
 */
export function aclKey(grant: Pick<CatalogAclGrant, 'account' | 'topic'>): string {
  return `${grant.account}:${grant.topic}`
}

export function emitVariables(
  catalog: Catalog,
  schemaCatalog: SchemaCatalog | null,
  parameters: EnvironmentParameters
): ProvisioningVariables {
  const organizationId = requireParameter(parameters, 'organizationId')
  const environmentId = requireParameter(parameters, 'environmentId')
  const clusterId = requireParameter(parameters, 'clusterId')
  const restEndpoint = requireParameter(parameters, 'restEndpoint')

  let schemaRegistry: ProvisioningVariables['schema_registry'] = null
  if (catalog.schemas.length > 0) {
    // Credentials must be present for provisioning but are not emitted
    for (const key of SCHEMA_REGISTRY_PARAMETERS) {
      requireParameter(parameters, key)
    }
    schemaRegistry = {
      id: requireParameter(parameters, 'schemaRegistryId'),
      rest_endpoint: parameters.schemaRegistryRestEndpoint ?? null
    }
  }

  // Topics
  const topics = new Map<string, TopicVariable>()
  for (const topic of catalog.topics) {
    if (topics.has(topic.name)) {
      throw new DuplicateResourceError('topic', topic.name, topic.domain)
    }
    topics.set(topic.name, {
      partitions: topic.partitions,
      replication_factor: topic.replicationFactor,
      config: sortRecord(topic.config)
    })
  }

  // Schemas, resolved through the schema catalog
  const resolvedPaths = new Map<string, string>()
  for (const entry of schemaCatalog?.schemas ?? []) {
    resolvedPaths.set(`${entry.domain}\u0000${entry.subject}`, entry.filePath)
  }

  const schemas = new Map<string, SchemaVariable>()
  for (const schema of catalog.schemas) {
    if (schemas.has(schema.subject)) {
      throw new DuplicateResourceError('schema', schema.subject, schema.domain)
    }
    const schemaFile = resolvedPaths.get(`${schema.domain}\u0000${schema.subject}`)
    if (schemaFile === undefined) {
      throw new UnresolvedSchemaPathError(schema.subject, schema.domain)
    }
    schemas.set(schema.subject, { subject: schema.subject, schema_file: schemaFile })
  }

  // Service accounts
  const serviceAccounts = new Map<string, ServiceAccountVariable>()
  for (const account of catalog.serviceAccounts) {
    if (serviceAccounts.has(account.name)) {
      throw new DuplicateResourceError('service-account', account.name, account.domain)
    }
    serviceAccounts.set(account.name, {
      display_name: account.name,
      description: account.description,
      domain: account.domain
    })
  }

  // ACLs, one per (account, topic)
  const acls = new Map<string, AclVariable>()
  for (const grant of catalog.aclGrants) {
    if (!topics.has(grant.topic)) {
      throw new UnresolvedTopicReferenceError(grant.account, grant.topic)
    }
    const key = aclKey(grant)
    if (acls.has(key)) {
      throw new DuplicateResourceError('acl', key, grant.domain)
    }
    acls.set(key, {
      principal: `User:${grant.account}`,
      role: grant.role,
      crn_pattern: topicCrnPattern({ organizationId, environmentId, clusterId }, grant.topic)
    })
  }

  return {
    cluster: {
      organization_id: organizationId,
      environment_id: environmentId,
      cluster_id: clusterId,
      rest_endpoint: restEndpoint
    },
    schema_registry: schemaRegistry,
    topics: toSortedRecord(topics),
    schemas: toSortedRecord(schemas),
    service_accounts: toSortedRecord(serviceAccounts),
    acls: toSortedRecord(acls)
  }
}

function toSortedRecord<V>(entries: Map<string, V>): Record<string, V> {
  return Object.fromEntries([...entries].sort(([a], [b]) => compareStrings(a, b)))
}

function sortKeysDeep(value: unknown): unknown {
  if (Array.isArray(value)) {
    return value.map(item => sortKeysDeep(item))
  }
  if (typeof value === 'object' && value !== null) {
    const entries = Object.entries(value).sort(([a], [b]) => compareStrings(a, b))
    return Object.fromEntries(entries.map(([key, item]) => [key, sortKeysDeep(item)]))
  }
  return value
}

/**
 * Render variables as JSON with every object's keys sorted.
 */
export function serializeVariables(variables: ProvisioningVariables): string {
  return JSON.stringify(sortKeysDeep(variables), null, 2) + '\n'
}
