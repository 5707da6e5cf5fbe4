/**
 * kafkagate Pipeline
 *
 * Orders the components into the two flows a repository runs:
 *
 *   plan (read-only):  read → aggregate → collect → validate → diff
 *   apply (locked):    acquire → read → aggregate → collect → validate → emit
 *                      → provision → promote baseline → release
 *
 * In CI the apply flow is split in two: `prepareApply` leaves the lock held
 * for the provisioning step, `finishApply` promotes and releases afterwards.
 * The prepared catalog is stored apart from the review artifacts and its
 * digest is pinned on the lock record, so only what was emitted is promoted.
 * Validation inside the lock is authoritative; plan-time results are advisory.
 */

import type {
  Catalog,
  DomainDeclaration,
  Environment,
  EnvironmentParameters,
  LockRecord,
  Plan,
  ProvisioningVariables,
  SchemaCatalog
} from '../types.js'
import { storeKeys, type CatalogStore } from '../lib/fs-store.js'
import type { ProjectPaths } from '../lib/config-loader.js'
import {
  EnvironmentLockedError,
  LockNotHeldError,
  PreparedCatalogMismatchError,
  StoreError,
  toError
} from '../lib/errors.js'
import { readDomainDeclarationsOrThrow } from './reader.js'
import { aggregateCatalog } from './aggregate.js'
import { collectSchemas, findUnreferencedSchemas } from './schema-collector.js'
import { assertNoConflicts, validateConflicts } from './conflicts.js'
import { emitVariables } from './emit.js'
import { LockManager } from './lock.js'
import { buildPlan } from './plan.js'
import {
  clearPreparedCatalog,
  promoteBaseline,
  readBaseline,
  readPreparedCatalog,
  writeCatalogArtifacts,
  writePreparedCatalog
} from './state.js'

// ============================================================================
// Types
// ============================================================================

export interface PipelineContext {
  project: string
  environment: Environment
  paths: ProjectPaths
  store: CatalogStore
  /** Declaration file name inside each domain environment directory */
  declarationFile?: string
  /** Defaults to a LockManager over `store` */
  lockManager?: LockManager
}

export interface BuiltCatalog {
  declarations: DomainDeclaration[]
  catalog: Catalog
  schemaCatalog: SchemaCatalog
}

export interface PlanRunOptions extends PipelineContext {
  /** Write kafka-catalog.yaml and schemas-catalog.json */
  writeArtifacts?: boolean
  /** Report a held lock as a blocker instead of failing */
  allowLocked?: boolean
  now?: Date
}

export interface PlanRunResult extends BuiltCatalog {
  plan: Plan
}

export interface PrepareApplyOptions extends PipelineContext {
  holder: string
  parameters: EnvironmentParameters
}

export interface PreparedApply extends BuiltCatalog {
  lock: LockRecord
  variables: ProvisioningVariables
}

export type ApplyResult = 'success' | 'failure'

export interface FinishApplyOptions extends PipelineContext {
  result: ApplyResult
  /** When given, the lock must be held by this holder */
  holder?: string
}

export interface FinishApplyResult {
  promoted: boolean
  released: boolean
}

/**
 * Whatever turns emitted variables into cloud resources
 */
export interface Provisioner {
  apply(variables: ProvisioningVariables, lock: LockRecord): Promise<void>
}

export interface RunApplyOptions extends PrepareApplyOptions {
  provisioner: Provisioner
}

export interface RunApplyResult extends PreparedApply {
  promoted: boolean
}

function lockManagerFor(context: PipelineContext): LockManager {
  return context.lockManager ?? new LockManager(context.store)
}

/**
 * Run a cleanup step after `err`, then rethrow `err`.
 *
 * A failing cleanup is attached as the cause of `err` (or both are thrown
 * together when `err` already has one), so neither is lost.
 */
async function cleanupAndRethrow(err: unknown, cleanup: () => Promise<unknown>): Promise<never> {
  try {
    await cleanup()
  } catch (cleanupErr) {
    if (err instanceof Error && err.cause === undefined) {
      err.cause = toError(cleanupErr)
      throw err
    }
    throw new AggregateError([err, cleanupErr], `${toError(err).message} (cleanup also failed: ${toError(cleanupErr).message})`)
  }
  throw err
}

// ============================================================================
// Catalog Build
// ============================================================================

/**
 * Read every declaration, aggregate, and collect schema files.
 */
export async function buildCatalog(context: PipelineContext): Promise<BuiltCatalog> {
  const { environment, paths, declarationFile } = context

  const declarations = await readDomainDeclarationsOrThrow({
    domainsDir: paths.domainsDir,
    environment,
    declarationFile
  })
  const catalog = aggregateCatalog(environment, declarations)
  const schemaCatalog = collectSchemas(catalog, {
    domainsDir: paths.domainsDir,
    projectRoot: paths.root
  })

  return { declarations, catalog, schemaCatalog }
}

// ============================================================================
// Plan
// ============================================================================

/**
 * Read-only run: fails fast while a deployment holds the lock unless
 * `allowLocked` is set. Even then nothing is written while the lock is held.
 */
export async function runPlan(options: PlanRunOptions): Promise<PlanRunResult> {
  const { project, environment, paths, store, writeArtifacts = false, allowLocked = false, now } = options
  const locks = lockManagerFor(options)

  let lock: LockRecord | null = null
  if (allowLocked) {
    lock = await locks.status(environment)
    if (lock && writeArtifacts) {
      throw new EnvironmentLockedError(environment, lock.holder)
    }
  } else {
    await locks.assertUnlocked(environment)
  }

  const built = await buildCatalog(options)
  const baseline = await readBaseline(store, environment)
  const conflicts = validateConflicts(built.catalog, baseline?.catalog ?? null)
  const unreferenced = await findUnreferencedSchemas(built.catalog, {
    domainsDir: paths.domainsDir,
    projectRoot: paths.root
  })

  if (writeArtifacts) {
    await writeCatalogArtifacts(store, built.catalog, built.schemaCatalog)
  }

  const plan = buildPlan({
    project,
    catalog: built.catalog,
    schemaCatalog: built.schemaCatalog,
    baseline,
    conflicts,
    unreferencedSchemas: unreferenced.map(u => u.filePath),
    lock,
    now
  })

  return { ...built, plan }
}

// ============================================================================
// Apply
// ============================================================================

/**
 * Take the lock, rebuild and validate against the current baseline, then emit.
 *
 * On success the lock stays held for the provisioning step, carrying the
 * digest of the prepared catalog. On any failure it is released before the
 * error propagates.
 */
export async function prepareApply(options: PrepareApplyOptions): Promise<PreparedApply> {
  const { environment, store, holder, parameters } = options
  const locks = lockManagerFor(options)

  await locks.acquire(environment, holder)
  try {
    const built = await buildCatalog(options)
    const baseline = await readBaseline(store, environment)

    assertNoConflicts(environment, validateConflicts(built.catalog, baseline?.catalog ?? null))

    const variables = emitVariables(built.catalog, built.schemaCatalog, parameters)
    await writeCatalogArtifacts(store, built.catalog, built.schemaCatalog)
    const sha256 = await writePreparedCatalog(store, built.catalog, built.schemaCatalog)
    const lock = await locks.recordPrepared(environment, holder, sha256)

    return { ...built, lock, variables }
  } catch (err) {
    return cleanupAndRethrow(err, async () => {
      // Never clear a lock some other run took over
      const current = await locks.status(environment)
      if (current?.holder !== holder) return
      await clearPreparedCatalog(store, environment)
      await locks.release(environment)
    })
  }
}

/**
 * Close a deployment: promote the prepared catalog on success, then release.
 *
 * Only the catalog whose digest is pinned on the lock is promoted. The lock is
 * released whatever the result, unless it belongs to another holder, in which
 * case nothing is touched.
 */
export async function finishApply(options: FinishApplyOptions): Promise<FinishApplyResult> {
  const { environment, store, result, holder } = options
  const locks = lockManagerFor(options)

  const current = await locks.status(environment)
  if (!current) {
    throw new LockNotHeldError(environment, holder ?? 'unknown')
  }
  if (holder !== undefined && current.holder !== holder) {
    throw new LockNotHeldError(environment, holder, current.holder)
  }

  const close = async (): Promise<void> => {
    await clearPreparedCatalog(store, environment)
    await locks.release(environment)
  }

  let promoted = false
  try {
    if (result === 'success') {
      const expected = current.prepared_sha256
      if (expected === undefined) {
        throw new StoreError(`No prepared catalog for "${environment}" to promote`, storeKeys.preparedCatalog(environment))
      }
      const prepared = await readPreparedCatalog(store, environment)
      if (!prepared || prepared.sha256 !== expected) {
        throw new PreparedCatalogMismatchError(environment, current.holder, expected, prepared?.sha256 ?? null)
      }
      await promoteBaseline(store, prepared.catalog, prepared.schemaCatalog)
      promoted = true
    }
  } catch (err) {
    return cleanupAndRethrow(err, close)
  }

  await close()
  return { promoted, released: true }
}

/**
 * Prepare, provision and finish in one process.
 */
export async function runApply(options: RunApplyOptions): Promise<RunApplyResult> {
  const prepared = await prepareApply(options)

  try {
    await options.provisioner.apply(prepared.variables, prepared.lock)
  } catch (err) {
    return cleanupAndRethrow(err, () => finishApply({ ...options, result: 'failure' }))
  }

  const finished = await finishApply({ ...options, result: 'success' })
  return { ...prepared, promoted: finished.promoted }
}
