/**
 * `emit` Command
 *
 * Turns an aggregated catalog into the provisioning variables file.
 *
 * Usage:
 *   kafkagate emit catalogs/prod/kafka-catalog.yaml build/prod.tfvars.json
 *   kafkagate emit <catalog> <out> --schemas catalogs/prod/schemas-catalog.json
 *   kafkagate emit <catalog> <out> --params-file .env.prod
 *
 * The schema catalog defaults to schemas-catalog.json beside the input.
 * Nothing is written when any check fails.
 */

import fs from 'node:fs'
import path from 'node:path'
import type { ProvisioningVariables, SchemaCatalog } from '../../types.js'
import type { CommandContext } from '../context.js'
import { parseCatalog } from '../../domain/aggregate.js'
import { parseSchemaCatalog } from '../../domain/schema-collector.js'
import { assertNoConflicts, validateConflicts } from '../../domain/conflicts.js'
import { emitVariables, serializeVariables } from '../../domain/emit.js'
import { loadEnvironmentParameters } from '../../lib/params.js'
import { FileNotFoundError, UsageError } from '../../lib/errors.js'
import { c, colorEnv, symbols } from '../lib/colors.js'
import * as ui from '../ui.js'

const DEFAULT_SCHEMA_CATALOG = 'schemas-catalog.json'

export interface EmitCommandResult {
  outputPath: string
  variables: ProvisioningVariables
}

function readSchemaCatalog(inputPath: string, explicitPath: string | undefined): SchemaCatalog | null {
  if (explicitPath) {
    const resolved = path.resolve(explicitPath)
    if (!fs.existsSync(resolved)) {
      throw new FileNotFoundError(resolved)
    }
    return parseSchemaCatalog(fs.readFileSync(resolved, 'utf-8'), resolved)
  }

  const sibling = path.join(path.dirname(inputPath), DEFAULT_SCHEMA_CATALOG)
  if (!fs.existsSync(sibling)) return null
  return parseSchemaCatalog(fs.readFileSync(sibling, 'utf-8'), sibling)
}

export async function runEmit(context: CommandContext): Promise<EmitCommandResult> {
  const { args, paramsFile, verbose } = context

  const [input, output] = args._
  if (!input || !output) {
    throw new UsageError(
      'Usage: kafkagate emit <aggregate_input_path> <variables_output_path>',
      'Pass the catalog YAML to read and the variables file to write'
    )
  }

  const inputPath = path.resolve(input)
  const outputPath = path.resolve(output)
  if (!fs.existsSync(inputPath)) {
    throw new FileNotFoundError(inputPath)
  }

  const catalog = parseCatalog(fs.readFileSync(inputPath, 'utf-8'), inputPath)
  const schemaCatalog = readSchemaCatalog(inputPath, args.schemas)
  ui.verbose(`catalog ${inputPath} (${catalog.environment})`, verbose)

  // A catalog produced outside the pipeline may never have been validated
  assertNoConflicts(catalog.environment, validateConflicts(catalog, null))

  const parameters = loadEnvironmentParameters({
    environment: catalog.environment,
    paramsFile
  })
  const variables = emitVariables(catalog, schemaCatalog, parameters)

  fs.mkdirSync(path.dirname(outputPath), { recursive: true })
  fs.writeFileSync(outputPath, serializeVariables(variables))

  ui.log(
    `${symbols.success} Emitted ${Object.keys(variables.topics).length} topic(s), ` +
    `${Object.keys(variables.acls).length} ACL(s) for ${colorEnv(catalog.environment)} to ${c.path(outputPath)}`
  )

  return { outputPath, variables }
}
