/**
 * `deploy` Command Group
 *
 * The locked half of the pipeline, split around the provisioning step:
 *
 *   kafkagate deploy prepare -e prod -o build/prod.tfvars.json
 *   <provisioning tool runs with the variables file>
 *   kafkagate deploy finish -e prod --result success|failure
 *
 * `prepare` leaves the environment locked when it succeeds; `finish` always
 * releases it and promotes the baseline only on success.
 */

import fs from 'node:fs'
import path from 'node:path'
import { resolveHolder, toPipelineContext, type CommandContext } from '../context.js'
import {
  finishApply,
  prepareApply,
  type ApplyResult,
  type FinishApplyResult,
  type PreparedApply
} from '../../domain/pipeline.js'
import { serializeVariables } from '../../domain/emit.js'
import { loadEnvironmentParameters } from '../../lib/params.js'
import { UsageError } from '../../lib/errors.js'
import { c, colorEnv, symbols } from '../lib/colors.js'
import * as ui from '../ui.js'

export type DeployCommandResult =
  | { action: 'prepare'; prepared: PreparedApply; outputPath: string | null }
  | { action: 'finish'; result: ApplyResult; finished: FinishApplyResult }

function parseResult(value: string | undefined): ApplyResult {
  if (value === 'success' || value === 'failure') return value
  throw new UsageError(
    value ? `Invalid --result: ${value}` : 'Missing --result',
    'Pass --result success or --result failure'
  )
}

async function runPrepare(context: CommandContext): Promise<DeployCommandResult> {
  const { args, environment, paramsFile } = context

  const parameters = loadEnvironmentParameters({ environment, paramsFile })
  const prepared = await prepareApply({
    ...toPipelineContext(context),
    holder: resolveHolder(context),
    parameters
  })

  const content = serializeVariables(prepared.variables)
  let outputPath: string | null = null
  if (args.output) {
    outputPath = path.resolve(args.output)
    fs.mkdirSync(path.dirname(outputPath), { recursive: true })
    fs.writeFileSync(outputPath, content)
    ui.log(`${symbols.success} Variables written to ${c.path(outputPath)}`)
  } else {
    ui.output(content.trimEnd())
  }

  ui.log(`${symbols.lock} ${colorEnv(environment)} locked by ${c.bold(prepared.lock.holder)}`)
  ui.log(`  Run ${c.command(`kafkagate deploy finish -e ${environment} --result success`)} after provisioning`)

  return { action: 'prepare', prepared, outputPath }
}

async function runFinish(context: CommandContext): Promise<DeployCommandResult> {
  const { args, environment, jsonOutput } = context
  const result = parseResult(args.result)

  const finished = await finishApply({
    ...toPipelineContext(context),
    result,
    holder: resolveHolder(context)
  })

  if (jsonOutput) {
    ui.output(JSON.stringify({ environment, result, ...finished }, null, 2))
  }
  if (finished.promoted) {
    ui.log(`${symbols.success} Baseline for ${colorEnv(environment)} updated`)
  } else {
    ui.log(`${symbols.warning} Provisioning reported failure; baseline for ${colorEnv(environment)} unchanged`)
  }
  ui.log(`${symbols.unlock} Released lock on ${colorEnv(environment)}`)

  return { action: 'finish', result, finished }
}

export async function runDeployGroup(context: CommandContext): Promise<DeployCommandResult> {
  const subcommand = context.args._[0]

  switch (subcommand) {
    case 'prepare':
      return runPrepare(context)
    case 'finish':
      return runFinish(context)
    default:
      throw new UsageError(
        subcommand ? `Unknown deploy subcommand: ${subcommand}` : 'Missing deploy subcommand',
        'Use one of: prepare, finish'
      )
  }
}
