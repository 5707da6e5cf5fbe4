/**
 * kafkagate Config Loader
 *
 * Loads .kafkagate/config.yaml (plus an optional, uncommitted
 * config.local.yaml) and merges it over the defaults.
 * A project without a config file runs on the defaults.
 */

import fs from 'node:fs'
import path from 'node:path'
import { parse as parseYaml } from 'yaml'
import { z } from 'zod'
import type { KafkagateConfig, Environment } from '../types.js'
import { DEFAULT_ENVIRONMENTS, DEFAULT_ENVIRONMENT } from '../types.js'
import { ConfigNotFoundError, InvalidConfigError, InvalidEnvironmentError, toError } from './errors.js'
import { formatIssues } from './schema-issues.js'

const CONFIG_DIR = '.kafkagate'
const CONFIG_FILE = 'config.yaml'
const CONFIG_LOCAL_FILE = 'config.local.yaml'
const MAX_SEARCH_DEPTH = 5

/**
 * Expand environment variables in a string
 * Supports: ${VAR}, ${VAR:-default}, $VAR
 */
export function expandEnvVars(str: string, env: NodeJS.ProcessEnv = process.env): string {
  // Handle ${VAR:-default} syntax
  str = str.replace(/\$\{([^}:]+):-([^}]*)\}/g, (_, varName: string, defaultValue: string) => {
    return env[varName] || defaultValue
  })

  // Handle ${VAR} syntax
  str = str.replace(/\$\{([^}]+)\}/g, (_, varName: string) => {
    return env[varName] || ''
  })

  // Handle $VAR syntax (word boundary)
  str = str.replace(/\$([A-Z_][A-Z0-9_]*)/gi, (_, varName: string) => {
    return env[varName] || ''
  })

  return str
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

/**
 * Recursively expand env vars in parsed YAML
 */
function expandEnvVarsInValue(value: unknown): unknown {
  if (typeof value === 'string') {
    return expandEnvVars(value)
  }

  if (Array.isArray(value)) {
    return value.map(item => expandEnvVarsInValue(item))
  }

  if (isRecord(value)) {
    const result: Record<string, unknown> = {}
    for (const [key, item] of Object.entries(value)) {
      result[key] = expandEnvVarsInValue(item)
    }
    return result
  }

  return value
}

/**
 * Default configuration
 */
export const DEFAULT_CONFIG: KafkagateConfig = {
  version: '1',
  project: '',
  environments: DEFAULT_ENVIRONMENTS,
  default_environment: DEFAULT_ENVIRONMENT,
  domains_dir: 'domains',
  catalogs_dir: 'catalogs',
  declaration_file: 'kafka-request.yaml',
  holder_source: 'ci'
}

const ConfigFileSchema = z.object({
  version: z.union([z.literal('1'), z.literal(1)]).optional(),
  project: z.string().optional(),
  environments: z.array(z.string().min(1)).min(1).optional(),
  default_environment: z.string().min(1).optional(),
  domains_dir: z.string().min(1).optional(),
  catalogs_dir: z.string().min(1).optional(),
  declaration_file: z.string().min(1).optional(),
  holder_source: z.enum(['ci', 'git', 'env']).optional()
})

type ConfigFile = z.infer<typeof ConfigFileSchema>

/**
 * Find the .kafkagate directory by searching up from the current directory
 */
export function findConfigDir(startDir: string = process.cwd()): string | null {
  let currentDir = path.resolve(startDir)
  let depth = 0

  while (depth < MAX_SEARCH_DEPTH) {
    const configDir = path.join(currentDir, CONFIG_DIR)
    const configFile = path.join(configDir, CONFIG_FILE)

    if (fs.existsSync(configFile)) {
      return configDir
    }

    const parentDir = path.dirname(currentDir)
    if (parentDir === currentDir) {
      // Reached root
      break
    }

    currentDir = parentDir
    depth++
  }

  return null
}

/**
 * Load a single config file
 */
function loadConfigFile(configPath: string, required: boolean = true): ConfigFile {
  if (!fs.existsSync(configPath)) {
    if (required) {
      throw new ConfigNotFoundError(configPath)
    }
    return {}
  }

  let parsed: unknown
  try {
    parsed = parseYaml(fs.readFileSync(configPath, 'utf-8'))
  } catch (err) {
    throw new InvalidConfigError(toError(err).message, configPath, toError(err))
  }

  const result = ConfigFileSchema.safeParse(expandEnvVarsInValue(parsed ?? {}))
  if (!result.success) {
    throw new InvalidConfigError(formatIssues(result.error).join('; '), configPath)
  }

  return result.data
}

function mergeConfig(base: KafkagateConfig, override: ConfigFile): KafkagateConfig {
  return {
    version: '1',
    project: override.project ?? base.project,
    environments: override.environments ?? base.environments,
    default_environment: override.default_environment ?? base.default_environment,
    domains_dir: override.domains_dir ?? base.domains_dir,
    catalogs_dir: override.catalogs_dir ?? base.catalogs_dir,
    declaration_file: override.declaration_file ?? base.declaration_file,
    holder_source: override.holder_source ?? base.holder_source
  }
}

/**
 * Load configuration from the nearest .kafkagate/config.yaml
 * Also merges config.local.yaml if it exists
 */
export function loadConfig(startDir?: string): KafkagateConfig {
  const configDir = findConfigDir(startDir)

  if (!configDir) {
    // No config found, defaults apply
    return { ...DEFAULT_CONFIG }
  }

  const configPath = path.join(configDir, CONFIG_FILE)
  let config = mergeConfig(DEFAULT_CONFIG, loadConfigFile(configPath))

  const localConfigPath = path.join(configDir, CONFIG_LOCAL_FILE)
  config = mergeConfig(config, loadConfigFile(localConfigPath, false))

  if (!config.environments.includes(config.default_environment)) {
    throw new InvalidConfigError(
      `default_environment "${config.default_environment}" is not listed in environments`,
      configPath
    )
  }

  return config
}

/**
 * Directory the configured relative paths resolve against.
 * The parent of .kafkagate/ when a config exists, the working directory otherwise.
 */
export function getProjectRoot(startDir: string = process.cwd()): string {
  const configDir = findConfigDir(startDir)
  return configDir ? path.dirname(configDir) : path.resolve(startDir)
}

/**
 * Get the project name from config or directory name
 */
export function getProjectName(config: KafkagateConfig, projectRoot: string = process.cwd()): string {
  return config.project || path.basename(projectRoot)
}

/**
 * Check that an environment is declared in the config
 */
export function resolveEnvironment(config: KafkagateConfig, environment: Environment): Environment {
  if (!config.environments.includes(environment)) {
    throw new InvalidEnvironmentError(environment, config.environments)
  }
  return environment
}

export interface ProjectPaths {
  root: string
  domainsDir: string
  catalogsDir: string
}

/**
 * Resolve the configured directories against the project root
 */
export function resolveProjectPaths(config: KafkagateConfig, projectRoot: string): ProjectPaths {
  return {
    root: projectRoot,
    domainsDir: path.resolve(projectRoot, config.domains_dir),
    catalogsDir: path.resolve(projectRoot, config.catalogs_dir)
  }
}
