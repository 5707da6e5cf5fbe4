/**
 * kafkagate Domain Layer
 *
 * - reader: per-domain declaration loading
 * - aggregate: catalog assembly and catalog artifact I/O
 * - schema-collector: schema file resolution and hashing
 * - conflicts: cross-domain naming conflicts
 * - lock: per-environment deployment lock
 * - emit: provisioning variables
 * - plan / pipeline: review and apply flows
 */

export {
  readDomainDeclarations,
  readDomainDeclarationsOrThrow,
  readDeclarationFile
} from './reader.js'
export type { ReadDomainsOptions, ReadDomainsResult } from './reader.js'

export {
  aggregateCatalog,
  expandAccessEntry,
  serializeCatalog,
  parseCatalog,
  emptyCatalog
} from './aggregate.js'
export type { ExpandedAccessEntry } from './aggregate.js'

export {
  collectSchemas,
  resolveSchemaPath,
  findUnreferencedSchemas,
  serializeSchemaCatalog,
  parseSchemaCatalog
} from './schema-collector.js'
export type { CollectSchemasOptions, UnreferencedSchema } from './schema-collector.js'

export { validateConflicts, assertNoConflicts } from './conflicts.js'

export { LockManager } from './lock.js'
export type { LockManagerOptions } from './lock.js'

export { emitVariables, serializeVariables, topicCrnPattern, aclKey } from './emit.js'

export {
  diffCatalogs,
  buildPlan,
  buildPlanMarkdown,
  writePlanArtifact,
  generatePlanId,
  emptyPlanSummary,
  DEFAULT_PLAN_DIR
} from './plan.js'
export type { BuildPlanOptions, DiffResult, PlanArtifactPaths, SchemaCatalogPair } from './plan.js'

export {
  readBaseline,
  readCatalogArtifacts,
  readPreparedCatalog,
  writeCatalogArtifacts,
  writePreparedCatalog,
  clearPreparedCatalog,
  preparedDigest,
  promoteBaseline
} from './state.js'
export type { PreparedCatalog } from './state.js'

export {
  buildCatalog,
  runPlan,
  prepareApply,
  finishApply,
  runApply
} from './pipeline.js'
export type {
  PipelineContext,
  BuiltCatalog,
  PlanRunOptions,
  PlanRunResult,
  PrepareApplyOptions,
  PreparedApply,
  ApplyResult,
  FinishApplyOptions,
  FinishApplyResult,
  Provisioner,
  RunApplyOptions,
  RunApplyResult
} from './pipeline.js'
