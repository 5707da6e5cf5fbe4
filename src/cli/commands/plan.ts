/**
 * `plan` Command
 *
 * Read-only review of what a deployment would change, written as a plan
 * artifact for the pull request.
 *
 * Usage:
 *   kafkagate plan -e prod                 Compute plan and write artifact
 *   kafkagate plan -e prod --json          JSON output for CI
 *   kafkagate plan -e dev --preflight      Compute without writing artifact files
 *   kafkagate plan -e prod --allow-locked  Report an in-flight deployment instead of failing
 */

import path from 'node:path'
import type { Plan, PlanChange } from '../../types.js'
import { toPipelineContext, type CommandContext } from '../context.js'
import { runPlan } from '../../domain/pipeline.js'
import { DEFAULT_PLAN_DIR, writePlanArtifact } from '../../domain/plan.js'
import { assertNoConflicts } from '../../domain/conflicts.js'
import { c, colorEnv, symbols } from '../lib/colors.js'
import * as ui from '../ui.js'

// ============================================================================
// Plan Command
// ============================================================================

export async function runPlanCommand(context: CommandContext): Promise<Plan> {
  const { args, environment, paths, jsonOutput } = context
  const preflight = Boolean(args.preflight)

  ui.log(`${symbols.info} Computing plan for ${colorEnv(environment)}...`)

  const { plan } = await runPlan({
    ...toPipelineContext(context),
    writeArtifacts: Boolean(args.writeArtifacts),
    allowLocked: Boolean(args.allowLocked)
  })

  if (jsonOutput) {
    ui.output(JSON.stringify(plan, null, 2))
  } else {
    if (!preflight) {
      const artifacts = writePlanArtifact(plan, path.join(paths.root, DEFAULT_PLAN_DIR))
      ui.log('')
      ui.log(`${c.muted('Plan saved to:')}`)
      ui.log(`  ${c.muted('JSON:')} ${artifacts.json}`)
      ui.log(`  ${c.muted('Markdown:')} ${artifacts.markdown}`)
    }

    displayPlan(plan)

    if (preflight) {
      ui.log('')
      ui.log(c.muted('Preflight mode: plan was computed without writing artifact files.'))
    }
  }

  // Conflicts fail the check; a reported lock alone does not
  assertNoConflicts(environment, plan.conflicts)
  return plan
}

// ============================================================================
// Display
// ============================================================================

function displayPlan(plan: Plan): void {
  const { summary, changes } = plan

  ui.log('')
  ui.log(c.header(`Plan: ${plan.project} / ${plan.environment}`))
  if (!plan.hasBaseline) {
    ui.log(`  ${c.muted('No deployed baseline: everything is new')}`)
  }
  ui.log('')

  if (summary.toAdd > 0) {
    ui.log(`  ${c.added(`+ ${summary.toAdd} to add`)}`)
  }
  if (summary.toUpdate > 0) {
    ui.log(`  ${c.modified(`~ ${summary.toUpdate} to update`)}`)
  }
  if (summary.toDelete > 0) {
    ui.log(`  ${c.removed(`- ${summary.toDelete} to delete`)}`)
  }
  if (summary.unchanged > 0) {
    ui.log(`  ${c.muted(`  ${summary.unchanged} unchanged`)}`)
  }
  ui.log('')

  if (changes.length > 0) {
    ui.log(c.header('Changes:'))
    for (const change of changes) {
      displayChange(change)
    }
    ui.log('')
  }

  if (plan.unreferencedSchemas.length > 0) {
    ui.log(c.header('Unreferenced schema files:'))
    for (const file of plan.unreferencedSchemas) {
      ui.log(`  ${symbols.warning} ${c.path(file)}`)
    }
    ui.log('')
  }

  if (plan.blockers.length > 0) {
    ui.log(c.header('Blockers:'))
    for (const blocker of plan.blockers) {
      ui.log(`  ${c.error('!!')} ${blocker}`)
    }
    ui.log('')
  }

  const statusLabel = plan.status === 'planned' ? c.success('PLANNED') : c.error('BLOCKED')
  ui.log(`  Status: ${statusLabel}`)
}

function displayChange(change: PlanChange): void {
  const domainLabel = `(${c.domain(change.domain)})`
  const fields = change.changedFields ? c.muted(` [${change.changedFields.join(', ')}]`) : ''
  const label = `${change.kind} ${c.bold(change.name)} ${domainLabel}${fields}`

  switch (change.action) {
    case 'add':
      ui.log(`  ${c.added('+')} ${label}`)
      break
    case 'update':
      ui.log(`  ${c.modified('~')} ${label}`)
      break
    case 'delete':
      ui.log(`  ${c.removed('-')} ${label}`)
      break
  }
}
