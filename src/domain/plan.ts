/**
 * kafkagate Plan Computation
 *
 * Diffs a freshly aggregated catalog against the deployed baseline and
 * bundles the result with conflicts, unreferenced schema files and lock state.
 * Generates Plan artifacts (JSON + Markdown) for review before a deployment.
 */

import fs from 'node:fs'
import path from 'node:path'
import type {
  Catalog,
  Conflict,
  Environment,
  LockRecord,
  Plan,
  PlanAction,
  PlanChange,
  PlanResourceKind,
  PlanSummary,
  SchemaCatalog
} from '../types.js'
import { formatConflict } from '../lib/errors.js'
import { aclKey } from './emit.js'
import { compareBy, compareStrings } from './ordering.js'

// ============================================================================
// Diff Algorithm
// ============================================================================

export interface SchemaCatalogPair {
  current: SchemaCatalog | null
  baseline: SchemaCatalog | null
}

export interface DiffResult {
  changes: PlanChange[]
  summary: PlanSummary
}

/** Comparable view of one resource: identity plus the fields that matter */
interface DiffEntry {
  kind: PlanResourceKind
  name: string
  domain: string
  fields: Record<string, string>
}

const KIND_ORDER: PlanResourceKind[] = ['topic', 'schema', 'service-account', 'acl']

export function emptyPlanSummary(): PlanSummary {
  return { toAdd: 0, toUpdate: 0, toDelete: 0, unchanged: 0 }
}

function configFingerprint(config: Record<string, string>): string {
  return Object.keys(config)
    .sort(compareStrings)
    .map(key => `${key}=${config[key]}`)
    .join(',')
}

function diffEntries(catalog: Catalog, schemaCatalog: SchemaCatalog | null): DiffEntry[] {
  const hashes = new Map<string, string>()
  for (const entry of schemaCatalog?.schemas ?? []) {
    hashes.set(`${entry.domain}\u0000${entry.subject}`, entry.sha256)
  }

  const entries: DiffEntry[] = []

  for (const topic of catalog.topics) {
    entries.push({
      kind: 'topic',
      name: topic.name,
      domain: topic.domain,
      fields: {
        partitions: String(topic.partitions),
        replication_factor: String(topic.replicationFactor),
        config: configFingerprint(topic.config)
      }
    })
  }

  for (const schema of catalog.schemas) {
    const fields: Record<string, string> = { schema_file: schema.schemaFile }
    const sha256 = hashes.get(`${schema.domain}\u0000${schema.subject}`)
    if (sha256 !== undefined) {
      fields.sha256 = sha256
    }
    entries.push({ kind: 'schema', name: schema.subject, domain: schema.domain, fields })
  }

  for (const account of catalog.serviceAccounts) {
    entries.push({
      kind: 'service-account',
      name: account.name,
      domain: account.domain,
      fields: { description: account.description }
    })
  }

  for (const grant of catalog.aclGrants) {
    entries.push({
      kind: 'acl',
      name: aclKey(grant),
      domain: grant.domain,
      fields: { role: grant.role }
    })
  }

  return entries
}

function entryKey(entry: Pick<DiffEntry, 'kind' | 'name' | 'domain'>): string {
  return `${entry.kind}\u0000${entry.domain}\u0000${entry.name}`
}

/**
 * Fields whose values differ. A field known on only one side (a schema hash
 * missing from an older baseline) is not compared.
 */
function changedFields(current: DiffEntry, previous: DiffEntry): string[] {
  return Object.keys(current.fields)
    .filter(field => field in previous.fields && previous.fields[field] !== current.fields[field])
    .sort(compareStrings)
}

/**
 * Classify every resource as add / update / delete / unchanged.
 *
 * Identity is (kind, domain, name): a resource moving to another domain shows
 * up as a delete and an add. Without a baseline every resource is an add.
 */
export function diffCatalogs(
  current: Catalog,
  baseline: Catalog | null,
  schemaCatalogs: SchemaCatalogPair = { current: null, baseline: null }
): DiffResult {
  const changes: PlanChange[] = []
  const summary = emptyPlanSummary()

  const previous = new Map<string, DiffEntry>()
  if (baseline) {
    for (const entry of diffEntries(baseline, schemaCatalogs.baseline)) {
      previous.set(entryKey(entry), entry)
    }
  }

  const seen = new Set<string>()
  for (const entry of diffEntries(current, schemaCatalogs.current)) {
    const key = entryKey(entry)
    seen.add(key)
    const before = previous.get(key)

    if (!before) {
      changes.push(toChange(entry, 'add'))
      summary.toAdd++
      continue
    }

    const fields = changedFields(entry, before)
    if (fields.length > 0) {
      changes.push({ ...toChange(entry, 'update'), changedFields: fields })
      summary.toUpdate++
    } else {
      summary.unchanged++
    }
  }

  for (const [key, entry] of previous) {
    if (!seen.has(key)) {
      changes.push(toChange(entry, 'delete'))
      summary.toDelete++
    }
  }

  changes.sort((a, b) =>
    KIND_ORDER.indexOf(a.kind) - KIND_ORDER.indexOf(b.kind) ||
    compareBy<PlanChange>(c => c.name, c => c.domain)(a, b)
  )

  return { changes, summary }
}

function toChange(entry: DiffEntry, action: PlanAction): PlanChange {
  return { kind: entry.kind, name: entry.name, domain: entry.domain, action }
}

// ============================================================================
// Plan Assembly
// ============================================================================

export interface BuildPlanOptions {
  project: string
  catalog: Catalog
  schemaCatalog: SchemaCatalog | null
  baseline: { catalog: Catalog; schemaCatalog: SchemaCatalog | null } | null
  conflicts: Conflict[]
  unreferencedSchemas?: string[]
  lock?: LockRecord | null
  now?: Date
}

export function buildPlan(options: BuildPlanOptions): Plan {
  const {
    project,
    catalog,
    schemaCatalog,
    baseline,
    conflicts,
    unreferencedSchemas = [],
    lock = null,
    now = new Date()
  } = options

  const { changes, summary } = diffCatalogs(catalog, baseline?.catalog ?? null, {
    current: schemaCatalog,
    baseline: baseline?.schemaCatalog ?? null
  })

  const blockers = conflicts.map(formatConflict)
  if (lock) {
    blockers.push(`Environment "${catalog.environment}" is locked by ${lock.holder} since ${lock.acquired_at}`)
  }

  return {
    id: generatePlanId(project, catalog.environment, now),
    project,
    environment: catalog.environment,
    status: blockers.length > 0 ? 'blocked' : 'planned',
    generatedAt: now.toISOString(),
    hasBaseline: baseline !== null,
    changes,
    summary,
    conflicts,
    unreferencedSchemas,
    lock,
    blockers
  }
}

// ============================================================================
// Plan Artifact I/O
// ============================================================================

export interface PlanArtifactPaths {
  json: string
  markdown: string
}

export const DEFAULT_PLAN_DIR = path.join('artifacts', 'kafkagate-plans')

/**
 * Write plan artifact to filesystem (JSON + Markdown).
 */
export function writePlanArtifact(plan: Plan, outputDir?: string): PlanArtifactPaths {
  const dir = outputDir || path.resolve(DEFAULT_PLAN_DIR)
  fs.mkdirSync(dir, { recursive: true })

  const safeId = plan.id.replace(/[^a-zA-Z0-9._-]/g, '-')
  const jsonPath = path.join(dir, `${safeId}.json`)
  const mdPath = path.join(dir, `${safeId}.md`)

  fs.writeFileSync(jsonPath, JSON.stringify(plan, null, 2) + '\n')
  fs.writeFileSync(mdPath, buildPlanMarkdown(plan) + '\n')

  return { json: jsonPath, markdown: mdPath }
}

/**
 * Plan ID: project-env-timestamp
 */
export function generatePlanId(project: string, environment: Environment, date: Date): string {
  const ts = date.toISOString().replace(/[:.]/g, '-')
  return `${sanitize(project)}-${sanitize(environment)}-${ts}`
}

function sanitize(value: string): string {
  return value
    .trim()
    .toLowerCase()
    .replace(/[^a-z0-9._-]+/g, '-')
    .replace(/^-+|-+$/g, '')
}

const ACTION_ICONS: Record<PlanAction, string> = {
  add: '+',
  update: '~',
  delete: '-'
}

/**
 * Build markdown representation of a plan.
 */
export function buildPlanMarkdown(plan: Plan): string {
  const lines: string[] = []

  lines.push('# kafkagate Plan')
  lines.push('')
  lines.push(`- **ID:** ${plan.id}`)
  lines.push(`- **Project:** ${plan.project}`)
  lines.push(`- **Environment:** ${plan.environment}`)
  lines.push(`- **Status:** ${plan.status}`)
  lines.push(`- **Generated:** ${plan.generatedAt}`)
  if (!plan.hasBaseline) {
    lines.push('- **Baseline:** none (first deployment)')
  }
  lines.push('')

  lines.push('## Summary')
  lines.push('')
  lines.push('| Metric | Count |')
  lines.push('|--------|-------|')
  lines.push(`| To add | ${plan.summary.toAdd} |`)
  lines.push(`| To update | ${plan.summary.toUpdate} |`)
  lines.push(`| To delete | ${plan.summary.toDelete} |`)
  lines.push(`| Unchanged | ${plan.summary.unchanged} |`)
  lines.push('')

  if (plan.blockers.length > 0) {
    lines.push('## Blockers')
    lines.push('')
    for (const blocker of plan.blockers) {
      lines.push(`- ${blocker}`)
    }
    lines.push('')
  }

  if (plan.changes.length > 0) {
    lines.push('## Changes')
    lines.push('')
    for (const change of plan.changes) {
      const fields = change.changedFields ? ` [${change.changedFields.join(', ')}]` : ''
      lines.push(`- \`${ACTION_ICONS[change.action]}\` ${change.kind} **${change.name}** (${change.domain})${fields}`)
    }
    lines.push('')
  }

  if (plan.unreferencedSchemas.length > 0) {
    lines.push('## Unreferenced schema files')
    lines.push('')
    for (const file of plan.unreferencedSchemas) {
      lines.push(`- ${file}`)
    }
    lines.push('')
  }

  return lines.join('\n')
}
