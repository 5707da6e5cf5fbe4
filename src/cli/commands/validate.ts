/**
 * `validate` Command
 *
 * Checks the current declarations for naming conflicts against each other and
 * the deployed baseline. Exits non-zero listing every conflict.
 *
 * Usage:
 *   kafkagate validate -e prod
 */

import type { Conflict } from '../../types.js'
import { toPipelineContext, type CommandContext } from '../context.js'
import { buildCatalog } from '../../domain/pipeline.js'
import { assertNoConflicts, validateConflicts } from '../../domain/conflicts.js'
import { LockManager } from '../../domain/lock.js'
import { readBaseline } from '../../domain/state.js'
import { colorEnv, symbols } from '../lib/colors.js'
import * as ui from '../ui.js'

export async function runValidate(context: CommandContext): Promise<Conflict[]> {
  const { environment, store, jsonOutput } = context

  await new LockManager(store).assertUnlocked(environment)

  ui.log(`${symbols.info} Validating ${colorEnv(environment)}...`)

  const { catalog } = await buildCatalog(toPipelineContext(context))
  const baseline = await readBaseline(store, environment)
  const conflicts = validateConflicts(catalog, baseline?.catalog ?? null)

  if (jsonOutput) {
    ui.output(JSON.stringify({ environment, valid: conflicts.length === 0, conflicts }, null, 2))
  }

  assertNoConflicts(environment, conflicts)

  if (!baseline) {
    ui.log(`${symbols.warning} No deployed baseline for ${environment}; checked declarations against each other only`)
  }
  ui.log(`${symbols.success} No naming conflicts in ${colorEnv(environment)}`)
  return conflicts
}
