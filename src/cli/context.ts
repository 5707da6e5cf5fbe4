/**
 * Command context
 *
 * Everything a command needs, resolved once from parsed arguments and config.
 */

import path from 'node:path'
import type { Environment, KafkagateConfig } from '../types.js'
import {
  getProjectName,
  resolveEnvironment,
  resolveProjectPaths,
  type ProjectPaths
} from '../lib/config-loader.js'
import { FileCatalogStore, type CatalogStore } from '../lib/fs-store.js'
import { detectHolder } from '../lib/holder.js'
import type { PipelineContext } from '../domain/pipeline.js'

/**
 * Command-level arguments after parsing
 */
export interface CommandArgs {
  /** Subcommand and positional values, in order, after the command name */
  _: string[]
  output?: string
  result?: string
  schemas?: string
  preflight?: boolean
  allowLocked?: boolean
  writeArtifacts?: boolean
}

export interface CommandContext {
  args: CommandArgs
  config: KafkagateConfig
  project: string
  environment: Environment
  paths: ProjectPaths
  store: CatalogStore
  verbose: boolean
  quiet: boolean
  jsonOutput: boolean
  /** Explicit --holder, if any */
  holder?: string
  paramsFile?: string
}

export interface BuildContextOptions {
  args: CommandArgs
  config: KafkagateConfig
  projectRoot: string
  environment?: string
  verbose?: boolean
  quiet?: boolean
  jsonOutput?: boolean
  holder?: string
  paramsFile?: string
}

export function buildCommandContext(options: BuildContextOptions): CommandContext {
  const { config, projectRoot } = options
  const environment = resolveEnvironment(config, options.environment || config.default_environment)
  const paths = resolveProjectPaths(config, projectRoot)

  return {
    args: options.args,
    config,
    project: getProjectName(config, projectRoot),
    environment,
    paths,
    store: new FileCatalogStore(paths.catalogsDir),
    verbose: options.verbose ?? false,
    quiet: options.quiet ?? false,
    jsonOutput: options.jsonOutput ?? false,
    holder: options.holder,
    paramsFile: options.paramsFile ? path.resolve(options.paramsFile) : undefined
  }
}

/**
 * --holder, or the identity detected from the configured source
 */
export function resolveHolder(context: CommandContext): string {
  return context.holder || detectHolder(context.config.holder_source)
}

/**
 * The pipeline's view of a command context
 */
export function toPipelineContext(context: CommandContext): PipelineContext {
  return {
    project: context.project,
    environment: context.environment,
    paths: context.paths,
    store: context.store,
    declarationFile: context.config.declaration_file
  }
}

// ============================================================================
// Parsed option access
// ============================================================================

function readField(source: unknown, name: string): unknown {
  if (typeof source !== 'object' || source === null) return undefined
  return Reflect.get(source, name)
}

export function stringOption(source: unknown, name: string): string | undefined {
  const value = readField(source, name)
  if (typeof value === 'string' && value !== '') return value
  if (typeof value === 'number') return String(value)
  return undefined
}

export function booleanOption(source: unknown, name: string): boolean {
  return readField(source, name) === true
}
