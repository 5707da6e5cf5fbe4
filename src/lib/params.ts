/**
 * Environment connection parameters
 *
 * Cluster and organization identifiers come from the execution context
 * (process environment, optionally a dotenv file), never from declarations.
 * A per-environment variable wins over the plain one:
 *   KAFKA_CLUSTER_ID_PROD > KAFKA_CLUSTER_ID
 */

import fs from 'node:fs'
import dotenv from 'dotenv'
import type { Environment, EnvironmentParameters } from '../types.js'
import { FileNotFoundError } from './errors.js'

/** Environment variable carrying each parameter */
export const PARAMETER_ENV_VARS: Record<keyof EnvironmentParameters, string> = {
  organizationId: 'CONFLUENT_ORGANIZATION_ID',
  environmentId: 'CONFLUENT_ENVIRONMENT_ID',
  clusterId: 'KAFKA_CLUSTER_ID',
  restEndpoint: 'KAFKA_REST_ENDPOINT',
  schemaRegistryId: 'SCHEMA_REGISTRY_ID',
  schemaRegistryApiKey: 'SCHEMA_REGISTRY_API_KEY',
  schemaRegistryApiSecret: 'SCHEMA_REGISTRY_API_SECRET',
  schemaRegistryRestEndpoint: 'SCHEMA_REGISTRY_REST_ENDPOINT'
}

/** Snake-case parameter names used in messages */
export const PARAMETER_NAMES: Record<keyof EnvironmentParameters, string> = {
  organizationId: 'organization_id',
  environmentId: 'environment_id',
  clusterId: 'cluster_id',
  restEndpoint: 'rest_endpoint',
  schemaRegistryId: 'schema_registry_id',
  schemaRegistryApiKey: 'schema_registry_api_key',
  schemaRegistryApiSecret: 'schema_registry_api_secret',
  schemaRegistryRestEndpoint: 'schema_registry_rest_endpoint'
}

const PARAMETER_KEYS: Array<keyof EnvironmentParameters> = [
  'organizationId',
  'environmentId',
  'clusterId',
  'restEndpoint',
  'schemaRegistryId',
  'schemaRegistryApiKey',
  'schemaRegistryApiSecret',
  'schemaRegistryRestEndpoint'
]

export interface LoadParametersOptions {
  environment: Environment
  /** dotenv file whose values sit under the process environment */
  paramsFile?: string
  env?: NodeJS.ProcessEnv
}

/**
 * Suffix for per-environment overrides: "prod" → "PROD", "us-east" → "US_EAST"
 */
export function environmentSuffix(environment: Environment): string {
  return environment.toUpperCase().replace(/[^A-Z0-9]+/g, '_')
}

/**
 * Resolve connection parameters for an environment.
 * Blank values count as absent.
 */
export function loadEnvironmentParameters(options: LoadParametersOptions): EnvironmentParameters {
  const { environment, paramsFile, env = process.env } = options

  let fileValues: Record<string, string> = {}
  if (paramsFile) {
    if (!fs.existsSync(paramsFile)) {
      throw new FileNotFoundError(paramsFile)
    }
    fileValues = dotenv.parse(fs.readFileSync(paramsFile, 'utf-8'))
  }

  const suffix = environmentSuffix(environment)
  const lookup = (name: string): string | undefined => {
    const candidates = [
      env[`${name}_${suffix}`],
      fileValues[`${name}_${suffix}`],
      env[name],
      fileValues[name]
    ]
    return candidates.map(v => v?.trim()).find(v => v !== undefined && v !== '')
  }

  const params: EnvironmentParameters = {}
  for (const key of PARAMETER_KEYS) {
    const value = lookup(PARAMETER_ENV_VARS[key])
    if (value !== undefined) {
      params[key] = value
    }
  }
  return params
}
