/**
 * kafkagate - Kafka resource catalog for multi-domain repositories
 *
 * Main library exports for programmatic usage
 */

// Types
export type {
  Environment,
  AccessRole,
  Topic,
  SchemaRef,
  AccessConfigEntry,
  DomainDeclaration,
  CatalogTopic,
  CatalogSchema,
  CatalogServiceAccount,
  CatalogAclGrant,
  Catalog,
  SchemaCatalogEntry,
  SchemaCatalog,
  Baseline,
  ResourceKind,
  Conflict,
  LockRecord,
  EnvironmentParameters,
  TopicVariable,
  SchemaVariable,
  ServiceAccountVariable,
  AclVariable,
  ProvisioningVariables,
  HolderSource,
  KafkagateConfig,
  Plan,
  PlanStatus,
  PlanAction,
  PlanChange,
  PlanResourceKind,
  PlanSummary
} from './types.js'

export { ACCESS_ROLES, DEFAULT_ENVIRONMENTS, DEFAULT_ENVIRONMENT } from './types.js'

// Config utilities
export {
  loadConfig,
  findConfigDir,
  getProjectRoot,
  getProjectName,
  resolveEnvironment,
  resolveProjectPaths,
  DEFAULT_CONFIG
} from './lib/config-loader.js'
export type { ProjectPaths } from './lib/config-loader.js'

// Storage
export { FileCatalogStore, storeKeys } from './lib/fs-store.js'
export type { CatalogStore } from './lib/fs-store.js'

// Parameters and holder identity
export { loadEnvironmentParameters, PARAMETER_ENV_VARS } from './lib/params.js'
export { detectHolder } from './lib/holder.js'

// Errors
export * from './lib/errors.js'

// Domain
export * from './domain/index.js'
