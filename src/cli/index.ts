#!/usr/bin/env node
/**
 * kafkagate CLI
 *
 * Kafka resource catalog for multi-domain repositories
 */

import fs from 'node:fs'
import path from 'node:path'
import { fileURLToPath } from 'node:url'
import { createCLI, type CommandParseResult, type CLISchema } from 'cli-args-parser'
import type { KafkagateConfig } from '../types.js'
import { getProjectRoot, loadConfig } from '../lib/config-loader.js'
import { formatErrorForCli, isKafkagateError, toError } from '../lib/errors.js'
import { c, print, kafkagateFormatter } from './lib/colors.js'
import * as ui from './ui.js'
import {
  booleanOption,
  buildCommandContext,
  stringOption,
  type CommandArgs,
  type CommandContext
} from './context.js'

import { runAggregate } from './commands/aggregate.js'
import { runValidate } from './commands/validate.js'
import { runPlanCommand } from './commands/plan.js'
import { runEmit } from './commands/emit.js'
import { runLockGroup } from './commands/lock.js'
import { runDeployGroup } from './commands/deploy.js'

// Version is injected at build time or read from package.json
const VERSION = process.env.KAFKAGATE_VERSION || getPackageVersion() || '0.0.0'

function getPackageVersion(): string | undefined {
  // Walk up from dist/cli or src/cli to the package root
  let dir = path.dirname(fileURLToPath(import.meta.url))
  for (let i = 0; i < 5; i++) {
    const pkgPath = path.join(dir, 'package.json')
    if (fs.existsSync(pkgPath)) {
      const pkg: unknown = JSON.parse(fs.readFileSync(pkgPath, 'utf-8'))
      return stringOption(pkg, 'version')
    }
    dir = path.dirname(dir)
  }
  return undefined
}

/**
 * CLI Schema definition
 */
const cliSchema: CLISchema = {
  name: 'kafkagate',
  version: VERSION,
  description: 'Kafka resource catalog for multi-domain repositories',
  autoShort: false,
  strict: true,
  formatter: kafkagateFormatter,
  help: {
    includeGlobalOptionsInCommands: true
  },

  // Global options available to all commands
  options: {
    help: {
      short: 'h',
      type: 'boolean',
      default: false,
      description: 'Show help'
    },
    version: {
      type: 'boolean',
      default: false,
      description: 'Show version'
    },
    env: {
      short: 'e',
      type: 'string',
      description: 'Environment name (as defined in config)'
    },
    verbose: {
      short: 'v',
      type: 'boolean',
      default: false,
      description: 'Enable verbose output'
    },
    quiet: {
      short: 'q',
      type: 'boolean',
      default: false,
      description: 'Suppress non-essential output (errors still shown)'
    },
    json: {
      type: 'boolean',
      default: false,
      description: 'Output in JSON format'
    },
    path: {
      type: 'string',
      description: 'Root path for .kafkagate config discovery'
    },
    holder: {
      type: 'string',
      description: 'Lock holder identity (default: CI run, git user, or $USER)'
    },
    'params-file': {
      type: 'string',
      description: 'dotenv file with cluster parameters'
    }
  },

  commands: {
    aggregate: {
      description: 'Aggregate domain declarations into catalogs/<env>/'
    },

    validate: {
      description: 'Check for naming conflicts against the deployed baseline'
    },

    plan: {
      description: 'Review what a deployment would change',
      options: {
        preflight: {
          type: 'boolean',
          default: false,
          description: 'Compute without writing artifact files'
        },
        'allow-locked': {
          type: 'boolean',
          default: false,
          description: 'Report an in-flight deployment instead of failing'
        },
        'write-catalog': {
          type: 'boolean',
          default: false,
          description: 'Also write kafka-catalog.yaml and schemas-catalog.json'
        }
      }
    },

    emit: {
      description: 'Emit provisioning variables from an aggregated catalog',
      positional: [
        { name: 'aggregate_input_path', required: true, description: 'kafka-catalog.yaml to read' },
        { name: 'variables_output_path', required: true, description: 'Variables file to write' }
      ],
      options: {
        schemas: {
          type: 'string',
          description: 'schemas-catalog.json (default: beside the input)'
        }
      }
    },

    lock: {
      description: 'Inspect or manage the environment deployment lock',
      commands: {
        status: { description: 'Show who holds the lock' },
        acquire: { description: 'Take the lock' },
        release: { description: 'Release the lock (also clears a stuck lock)' }
      }
    },

    deploy: {
      description: 'Locked deployment steps around provisioning',
      commands: {
        prepare: {
          description: 'Lock, validate and emit variables',
          options: {
            output: {
              short: 'o',
              type: 'string',
              description: 'Variables file to write (default: stdout)'
            }
          }
        },
        finish: {
          description: 'Promote the baseline on success and release the lock',
          options: {
            result: {
              type: 'string',
              description: 'Provisioning outcome: success or failure'
            }
          }
        }
      }
    }
  }
}

/**
 * Convert cli-args-parser result to CommandArgs
 */
function toCommandArgs(result: CommandParseResult): CommandArgs {
  const opts: unknown = result.options

  // Subcommands and positionals after the top-level command name
  const rest: string[] = [...result.command.slice(1)]
  for (const name of ['aggregate_input_path', 'variables_output_path']) {
    const value = stringOption(result.positional, name)
    if (value !== undefined) rest.push(value)
  }

  return {
    _: rest,
    output: stringOption(opts, 'output'),
    result: stringOption(opts, 'result'),
    schemas: stringOption(opts, 'schemas'),
    preflight: booleanOption(opts, 'preflight'),
    allowLocked: booleanOption(opts, 'allow-locked'),
    writeArtifacts: booleanOption(opts, 'write-catalog')
  }
}

/**
 * Build context from parsed args
 */
function buildContext(result: CommandParseResult, config: KafkagateConfig): CommandContext {
  const opts: unknown = result.options
  const quiet = booleanOption(opts, 'quiet')

  ui.setQuiet(quiet)

  return buildCommandContext({
    args: toCommandArgs(result),
    config,
    projectRoot: getProjectRoot(),
    environment: stringOption(opts, 'env'),
    verbose: booleanOption(opts, 'verbose'),
    quiet,
    jsonOutput: booleanOption(opts, 'json'),
    holder: stringOption(opts, 'holder'),
    paramsFile: stringOption(opts, 'params-file')
  })
}

function reportError(err: unknown, verbose: boolean): void {
  if (isKafkagateError(err)) {
    const [first, ...details] = err.toCliOutput().split('\n')
    print.error(first.replace(/^Error: /, ''))
    for (const line of details) {
      console.error(line)
    }
    if (verbose && err.context) {
      console.error(`  ${c.muted('Context:')} ${JSON.stringify(err.context)}`)
    }
  } else if (verbose) {
    console.error(toError(err).stack ?? String(err))
  } else {
    print.error(toError(err).message)
  }
}

// Create CLI instance
const cli = createCLI(cliSchema)

/**
 * Main entry point
 */
async function main(): Promise<void> {
  const result = cli.parse(process.argv.slice(2))
  const opts: unknown = result.options

  // Apply global working directory override before resolving config
  const pathArg = stringOption(opts, 'path')
  if (pathArg) {
    const targetDir = path.resolve(pathArg)
    if (!fs.existsSync(targetDir) || !fs.statSync(targetDir).isDirectory()) {
      print.error(`Path does not exist or is not a directory: ${targetDir}`)
      process.exit(1)
    }
    process.chdir(targetDir)
  }

  // Handle help first (before error check, so `emit --help` works)
  if (booleanOption(opts, 'help') || result.command.length === 0) {
    ui.output(cli.help(result.command))
    return
  }

  if (booleanOption(opts, 'version')) {
    ui.output(`kafkagate v${VERSION}`)
    return
  }

  // Handle errors from parser (after help/version checks)
  if (result.errors.length > 0) {
    for (const error of result.errors) {
      print.error(error)
    }
    process.exit(1)
  }

  const command = result.command[0]
  const verbose = booleanOption(opts, 'verbose')

  try {
    const context = buildContext(result, loadConfig())

    switch (command) {
      case 'aggregate':
        await runAggregate(context)
        break

      case 'validate':
        await runValidate(context)
        break

      case 'plan':
        await runPlanCommand(context)
        break

      case 'emit':
        await runEmit(context)
        break

      case 'lock':
        await runLockGroup(context)
        break

      case 'deploy':
        await runDeployGroup(context)
        break

      default:
        print.error(`Unknown command: ${c.command(command)}`)
        ui.log(`Run "${c.command('kafkagate --help')}" for usage information`)
        process.exit(1)
    }
  } catch (err) {
    reportError(err, verbose)
    process.exit(1)
  }
}

// Run
main().catch((err: unknown) => {
  // Handle uncaught errors at the top level
  print.error(isKafkagateError(err) ? formatErrorForCli(err) : `Fatal error: ${toError(err).message}`)
  process.exit(1)
})
