/**
 * kafkagate - Type Definitions
 */

// ============================================================================
// Environment Types
// ============================================================================

/**
 * Environment name - user-defined string
 *
 * Any name is valid as long as it is listed in the project config:
 * - Short: 'dev', 'test', 'qa', 'prod'
 * - Full: 'development', 'staging', 'production'
 */
export type Environment = string

/** Default environments used when no config file exists */
export const DEFAULT_ENVIRONMENTS: string[] = ['dev', 'test', 'qa', 'prod']

/** Default environment when none specified */
export const DEFAULT_ENVIRONMENT = 'dev'

// ============================================================================
// Declaration Types (what a domain writes)
// ============================================================================

/** Roles a service account may be granted on a topic */
export const ACCESS_ROLES = [
  'DeveloperRead',
  'DeveloperWrite',
  'DeveloperManage',
  'ResourceOwner'
] as const

export type AccessRole = typeof ACCESS_ROLES[number]

export interface Topic {
  name: string
  partitions: number
  replicationFactor: number
  config: Record<string, string>
}

export interface SchemaRef {
  subject: string
  /** Relative to the domain's environment directory */
  schemaFile: string
}

export interface AccessConfigEntry {
  name: string
  description: string
  role: AccessRole
  topics: string[]
}

/**
 * One domain's declaration for one environment.
 * Created by the Domain Reader, never mutated afterwards.
 */
export interface DomainDeclaration {
  domain: string
  environment: Environment
  serviceName: string
  description: string
  topics: readonly Topic[]
  schemas: readonly SchemaRef[]
  accessConfig: readonly AccessConfigEntry[]
  /** File the declaration was read from */
  sourcePath: string
}

// ============================================================================
// Catalog Types (aggregated, domain-tagged)
// ============================================================================

export interface CatalogTopic extends Topic {
  domain: string
}

export interface CatalogSchema extends SchemaRef {
  domain: string
}

export interface CatalogServiceAccount {
  name: string
  description: string
  domain: string
}

/** One ACL grant, fanned out from an access entry (one per topic) */
export interface CatalogAclGrant {
  account: string
  topic: string
  role: AccessRole
  domain: string
}

/**
 * Per-environment snapshot of every domain's declarations.
 *
 * Entries are ordered by (domain, name). Colliding names across domains are
 * kept so the Conflict Validator can report every owner.
 */
export interface Catalog {
  environment: Environment
  domains: string[]
  topics: CatalogTopic[]
  schemas: CatalogSchema[]
  serviceAccounts: CatalogServiceAccount[]
  aclGrants: CatalogAclGrant[]
}

export interface SchemaCatalogEntry {
  subject: string
  domain: string
  /** Path relative to the repository root, always with forward slashes */
  filePath: string
  fileName: string
  sha256: string
}

export interface SchemaCatalog {
  environment: Environment
  schemas: SchemaCatalogEntry[]
}

/** The last successfully applied state of an environment */
export interface Baseline {
  catalog: Catalog
  schemaCatalog: SchemaCatalog | null
}

// ============================================================================
// Conflict Types
// ============================================================================

export type ResourceKind = 'topic' | 'schema' | 'service-account'

export interface Conflict {
  kind: ResourceKind
  name: string
  /** Every domain claiming the name, sorted */
  domains: string[]
  /** Owner recorded in the baseline, when the baseline takes part */
  baselineDomain?: string
}

// ============================================================================
// Lock Types
// ============================================================================

export interface LockRecord {
  environment: Environment
  holder: string
  acquired_at: string
  /** sha256 of the catalog prepared under this lock; set by deploy prepare */
  prepared_sha256?: string
}

// ============================================================================
// Provisioning Variable Types
// ============================================================================

/**
 * Connection parameters supplied by the execution context.
 * Never read from declarations.
 */
export interface EnvironmentParameters {
  organizationId?: string
  environmentId?: string
  clusterId?: string
  restEndpoint?: string
  schemaRegistryId?: string
  schemaRegistryApiKey?: string
  schemaRegistryApiSecret?: string
  schemaRegistryRestEndpoint?: string
}

export interface TopicVariable {
  partitions: number
  replication_factor: number
  config: Record<string, string>
}

export interface SchemaVariable {
  subject: string
  schema_file: string
}

export interface ServiceAccountVariable {
  display_name: string
  description: string
  domain: string
}

export interface AclVariable {
  principal: string
  role: AccessRole
  crn_pattern: string
}

export interface ProvisioningVariables {
  cluster: {
    organization_id: string
    environment_id: string
    cluster_id: string
    rest_endpoint: string
  }
  schema_registry: {
    id: string
    rest_endpoint: string | null
  } | null
  topics: Record<string, TopicVariable>
  schemas: Record<string, SchemaVariable>
  service_accounts: Record<string, ServiceAccountVariable>
  acls: Record<string, AclVariable>
}

// ============================================================================
// Configuration Types
// ============================================================================

export type HolderSource = 'ci' | 'git' | 'env'

export interface KafkagateConfig {
  version: '1'
  project: string
  environments: Environment[]
  default_environment: Environment
  /** Directory holding domains/<domain>/<env>/ (relative to the project root) */
  domains_dir: string
  /** Directory holding catalogs/<env>/ (relative to the project root) */
  catalogs_dir: string
  /** Declaration file name inside each domain environment directory */
  declaration_file: string
  /** How lock holder identity is detected when --holder is not given */
  holder_source: HolderSource
}

// ============================================================================
// Plan Types
// ============================================================================

export type PlanStatus = 'planned' | 'blocked'

export type PlanAction = 'add' | 'update' | 'delete'

export type PlanResourceKind = ResourceKind | 'acl'

export interface PlanChange {
  kind: PlanResourceKind
  /** Topic, subject, account name, or "<account>:<topic>" for ACLs */
  name: string
  domain: string
  action: PlanAction
  /** Fields that differ, for updates */
  changedFields?: string[]
}

export interface PlanSummary {
  toAdd: number
  toUpdate: number
  toDelete: number
  unchanged: number
}

/**
 * Read-only review of what applying the current declarations would change.
 */
export interface Plan {
  id: string
  project: string
  environment: Environment
  status: PlanStatus
  generatedAt: string
  /** Whether a baseline existed; without one every resource is an add */
  hasBaseline: boolean
  changes: PlanChange[]
  summary: PlanSummary
  conflicts: Conflict[]
  /** Schema files on disk that no declaration references */
  unreferencedSchemas: string[]
  lock: LockRecord | null
  /** Why the plan cannot be applied; empty when status is planned */
  blockers: string[]
}
