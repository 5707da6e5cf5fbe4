/**
 * kafkagate Error Hierarchy
 *
 * Typed error classes for the CLI and programmatic usage.
 *
 * Hierarchy:
 *   KafkagateError (base)
 *   ├── ConfigError
 *   │   ├── ConfigNotFoundError
 *   │   ├── InvalidConfigError
 *   │   └── InvalidEnvironmentError
 *   ├── DeclarationError (Domain Reader)
 *   │   ├── MalformedDeclarationError
 *   │   └── DeclarationIOError
 *   ├── DomainsDirNotFoundError
 *   ├── DeclarationScanError (every per-domain failure of one scan)
 *   ├── CatalogError (Aggregator, Schema Collector, Conflict Validator)
 *   │   ├── UnknownTopicReferenceError
 *   │   ├── PathViolationError
 *   │   ├── SchemaNotFoundError
 *   │   ├── NamingConflictError
 *   │   └── InvalidCatalogError
 *   ├── LockError
 *   │   ├── AlreadyLockedError
 *   │   ├── EnvironmentLockedError
 *   │   ├── LockNotHeldError
 *   │   └── PreparedCatalogMismatchError
 *   ├── EmitError (Variable Emitter)
 *   │   ├── MissingRequiredParameterError
 *   │   ├── UnresolvedSchemaPathError
 *   │   ├── UnresolvedTopicReferenceError
 *   │   └── DuplicateResourceError
 *   ├── UsageError
 *   ├── FileNotFoundError
 *   └── StoreError
 */

import type { Conflict, PlanResourceKind, ResourceKind } from '../types.js'

interface ErrorOptions {
  suggestion?: string
  context?: Record<string, unknown>
  cause?: Error
}

/**
 * Base error class for all kafkagate errors
 */
export class KafkagateError extends Error {
  /** Error code for programmatic handling */
  readonly code: string

  /** Suggestion for how to fix the error */
  readonly suggestion?: string

  /** Additional context/data about the error */
  readonly context?: Record<string, unknown>

  constructor(message: string, code: string, options?: ErrorOptions) {
    super(message, { cause: options?.cause })
    this.name = 'KafkagateError'
    this.code = code
    this.suggestion = options?.suggestion
    this.context = options?.context

    // Maintain proper stack trace in V8 environments
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor)
    }
  }

  /**
   * Format error for CLI output
   */
  toCliOutput(): string {
    const lines = [`Error: ${this.message}`]
    if (this.suggestion) {
      lines.push(`  Suggestion: ${this.suggestion}`)
    }
    return lines.join('\n')
  }

  /**
   * Convert to JSON for logging/debugging
   */
  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      suggestion: this.suggestion,
      context: this.context,
      stack: this.stack
    }
  }
}

// =============================================================================
// Configuration Errors
// =============================================================================

export class ConfigError extends KafkagateError {
  constructor(message: string, code: string, options?: ErrorOptions) {
    super(message, code, options)
    this.name = 'ConfigError'
  }
}

/**
 * Thrown when a config file named explicitly does not exist
 */
export class ConfigNotFoundError extends ConfigError {
  constructor(searchedPath: string) {
    super(
      `Config file not found: ${searchedPath}`,
      'CONFIG_NOT_FOUND',
      {
        suggestion: 'Create .kafkagate/config.yaml or run without a config to use defaults',
        context: { searchedPath }
      }
    )
    this.name = 'ConfigNotFoundError'
  }
}

/**
 * Thrown when config.yaml has invalid content
 */
export class InvalidConfigError extends ConfigError {
  constructor(message: string, configPath?: string, cause?: Error) {
    super(
      configPath ? `Invalid config in ${configPath}: ${message}` : `Invalid config: ${message}`,
      'INVALID_CONFIG',
      {
        suggestion: 'Check your .kafkagate/config.yaml syntax',
        context: configPath ? { configPath } : undefined,
        cause
      }
    )
    this.name = 'InvalidConfigError'
  }
}

/**
 * Thrown when an environment is not listed in the config
 */
export class InvalidEnvironmentError extends ConfigError {
  constructor(environment: string, validEnvironments: string[]) {
    super(
      `Invalid environment: "${environment}"`,
      'INVALID_ENVIRONMENT',
      {
        suggestion: `Valid environments: ${validEnvironments.join(', ')}`,
        context: { environment, validEnvironments }
      }
    )
    this.name = 'InvalidEnvironmentError'
  }
}

// =============================================================================
// Declaration Errors
// =============================================================================

export class DeclarationError extends KafkagateError {
  /** Domain whose declaration failed */
  readonly domain: string

  /** File that failed to load */
  readonly filePath: string

  constructor(message: string, code: string, domain: string, filePath: string, options?: ErrorOptions) {
    super(message, code, {
      ...options,
      context: { domain, filePath, ...options?.context }
    })
    this.name = 'DeclarationError'
    this.domain = domain
    this.filePath = filePath
  }
}

/**
 * Thrown when a declaration file does not match the expected shape
 */
export class MalformedDeclarationError extends DeclarationError {
  /** Individual problems, formatted as "<path>: <message>" */
  readonly issues: string[]

  constructor(domain: string, filePath: string, issues: string[], cause?: Error) {
    super(
      `Malformed declaration for domain "${domain}" (${filePath}): ${issues.join('; ')}`,
      'MALFORMED_DECLARATION',
      domain,
      filePath,
      {
        suggestion: 'Fix the listed fields in the domain\'s kafka-request.yaml',
        context: { issues },
        cause
      }
    )
    this.name = 'MalformedDeclarationError'
    this.issues = issues
  }
}

/**
 * Thrown when a declaration file cannot be read
 */
export class DeclarationIOError extends DeclarationError {
  constructor(domain: string, filePath: string, cause?: Error) {
    super(
      `Cannot read declaration for domain "${domain}" (${filePath})${cause ? `: ${cause.message}` : ''}`,
      'IO_ERROR',
      domain,
      filePath,
      {
        suggestion: 'Check that the file exists and is readable',
        cause
      }
    )
    this.name = 'DeclarationIOError'
  }
}

/**
 * Thrown when the domains directory itself is missing
 */
export class DomainsDirNotFoundError extends KafkagateError {
  constructor(domainsDir: string) {
    super(
      `Domains directory not found: ${domainsDir}`,
      'DOMAINS_DIR_NOT_FOUND',
      {
        suggestion: 'Run from the repository root or set domains_dir in .kafkagate/config.yaml',
        context: { domainsDir }
      }
    )
    this.name = 'DomainsDirNotFoundError'
  }
}

/**
 * Thrown after a full scan when one or more domains failed to load.
 * Carries every failure so one broken file does not mask another.
 */
export class DeclarationScanError extends KafkagateError {
  readonly failures: DeclarationError[]

  constructor(environment: string, failures: DeclarationError[]) {
    const domains = failures.map(f => f.domain).join(', ')
    super(
      `Failed to load ${failures.length} declaration(s) for "${environment}": ${domains}`,
      'DECLARATION_SCAN_FAILED',
      {
        context: {
          environment,
          failures: failures.map(f => ({ domain: f.domain, code: f.code, message: f.message }))
        }
      }
    )
    this.name = 'DeclarationScanError'
    this.failures = failures
  }

  toCliOutput(): string {
    const lines = [`Error: ${this.message}`]
    for (const failure of this.failures) {
      lines.push(`  - [${failure.code}] ${failure.message}`)
    }
    return lines.join('\n')
  }
}

// =============================================================================
// Catalog Errors
// =============================================================================

export class CatalogError extends KafkagateError {
  constructor(message: string, code: string, options?: ErrorOptions) {
    super(message, code, options)
    this.name = 'CatalogError'
  }
}

/**
 * Thrown when an access entry lists a topic the environment does not declare
 */
export class UnknownTopicReferenceError extends CatalogError {
  constructor(entry: string, topic: string, domain: string) {
    super(
      `Access entry "${entry}" in domain "${domain}" references unknown topic "${topic}"`,
      'UNKNOWN_TOPIC_REFERENCE',
      {
        suggestion: `Declare topic "${topic}" in this environment or remove it from "${entry}"`,
        context: { entry, topic, domain }
      }
    )
    this.name = 'UnknownTopicReferenceError'
  }
}

/**
 * Thrown when a schema path points outside the domain's own directory
 */
export class PathViolationError extends CatalogError {
  constructor(subject: string, domain: string, schemaFile: string) {
    super(
      `Schema "${subject}" in domain "${domain}" points outside the domain directory: ${schemaFile}`,
      'PATH_VIOLATION',
      {
        suggestion: 'Schema files must live under domains/<domain>/<env>/ and use a relative path',
        context: { subject, domain, schemaFile }
      }
    )
    this.name = 'PathViolationError'
  }
}

/**
 * Thrown when a referenced schema file does not exist
 */
export class SchemaNotFoundError extends CatalogError {
  constructor(subject: string, expectedPath: string) {
    super(
      `Schema file for subject "${subject}" not found: ${expectedPath}`,
      'SCHEMA_NOT_FOUND',
      {
        suggestion: 'Add the schema file or fix schema_file in the declaration',
        context: { subject, expectedPath }
      }
    )
    this.name = 'SchemaNotFoundError'
  }
}

const KIND_LABELS: Record<ResourceKind, string> = {
  'topic': 'Topic',
  'schema': 'Schema subject',
  'service-account': 'Service account'
}

/**
 * Format one conflict as a single line
 */
export function formatConflict(conflict: Conflict): string {
  const label = KIND_LABELS[conflict.kind]
  const base = `${label} '${conflict.name}' claimed by multiple domains: ${conflict.domains.join(', ')}`
  return conflict.baselineDomain
    ? `${base} (deployed owner: ${conflict.baselineDomain})`
    : base
}

/**
 * Thrown when names collide across domains. Carries the full conflict set.
 */
export class NamingConflictError extends CatalogError {
  readonly conflicts: Conflict[]

  constructor(environment: string, conflicts: Conflict[]) {
    super(
      `${conflicts.length} naming conflict(s) in "${environment}": ${conflicts.map(c => c.name).join(', ')}`,
      'NAMING_CONFLICT',
      {
        suggestion: 'Rename the resources or agree on a single owning domain',
        context: { environment, conflicts }
      }
    )
    this.name = 'NamingConflictError'
    this.conflicts = conflicts
  }

  toCliOutput(): string {
    const lines = [`Error: ${this.message}`]
    this.conflicts.forEach((conflict, i) => {
      lines.push(`  ${i + 1}. ${formatConflict(conflict)}`)
    })
    if (this.suggestion) {
      lines.push(`  Suggestion: ${this.suggestion}`)
    }
    return lines.join('\n')
  }
}

/**
 * Thrown when a stored catalog, schema catalog or lock record cannot be parsed
 */
export class InvalidCatalogError extends CatalogError {
  constructor(filePath: string, issues: string[], cause?: Error) {
    super(
      `Invalid catalog file ${filePath}: ${issues.join('; ')}`,
      'INVALID_CATALOG',
      {
        suggestion: 'Regenerate the file with "kafkagate aggregate"',
        context: { filePath, issues },
        cause
      }
    )
    this.name = 'InvalidCatalogError'
  }
}

// =============================================================================
// Lock Errors
// =============================================================================

export class LockError extends KafkagateError {
  readonly environment: string

  /** Identity of the run currently holding the lock */
  readonly holder: string

  constructor(message: string, code: string, environment: string, holder: string, options?: ErrorOptions) {
    super(message, code, {
      ...options,
      context: { environment, holder, ...options?.context }
    })
    this.name = 'LockError'
    this.environment = environment
    this.holder = holder
  }
}

/**
 * Thrown by acquire when another run already holds the lock
 */
export class AlreadyLockedError extends LockError {
  constructor(environment: string, holder: string, acquiredAt?: string) {
    super(
      `Environment "${environment}" is already locked by ${holder}${acquiredAt ? ` since ${acquiredAt}` : ''}`,
      'ALREADY_LOCKED',
      environment,
      holder,
      {
        suggestion: 'Wait for the running deployment to finish, or release a stuck lock with "kafkagate lock release"',
        context: acquiredAt ? { acquiredAt } : undefined
      }
    )
    this.name = 'AlreadyLockedError'
  }
}

/**
 * Thrown by read-only runs when a deployment is in flight
 */
export class EnvironmentLockedError extends LockError {
  constructor(environment: string, holder: string) {
    super(
      `Environment "${environment}" is locked by ${holder}; a deployment is in progress`,
      'ENVIRONMENT_LOCKED',
      environment,
      holder,
      {
        suggestion: 'Resubmit once the lock clears'
      }
    )
    this.name = 'EnvironmentLockedError'
  }
}

/**
 * Thrown when finishing a deployment whose lock is gone or held by someone else
 */
export class LockNotHeldError extends LockError {
  constructor(environment: string, holder: string, currentHolder?: string) {
    super(
      currentHolder
        ? `Environment "${environment}" is locked by ${currentHolder}, not ${holder}`
        : `Environment "${environment}" is not locked; nothing to finish`,
      'LOCK_NOT_HELD',
      environment,
      holder,
      {
        suggestion: 'Run "kafkagate deploy prepare" first, from the same pipeline run',
        context: currentHolder ? { currentHolder } : undefined
      }
    )
    this.name = 'LockNotHeldError'
  }
}

/**
 * Thrown by finishApply when the prepared catalog is not the one pinned to the lock
 */
export class PreparedCatalogMismatchError extends LockError {
  constructor(environment: string, holder: string, expected: string, actual: string | null) {
    super(
      actual === null
        ? `Prepared catalog for "${environment}" is missing`
        : `Prepared catalog for "${environment}" does not match the one prepared by ${holder}`,
      'PREPARED_CATALOG_MISMATCH',
      environment,
      holder,
      {
        suggestion: 'Finish with --result failure and run "kafkagate deploy prepare" again',
        context: { expected, actual }
      }
    )
    this.name = 'PreparedCatalogMismatchError'
  }
}

// =============================================================================
// Emit Errors
// =============================================================================

export class EmitError extends KafkagateError {
  constructor(message: string, code: string, options?: ErrorOptions) {
    super(message, code, options)
    this.name = 'EmitError'
  }
}

/**
 * Thrown when a mandatory environment parameter is absent
 */
export class MissingRequiredParameterError extends EmitError {
  constructor(parameter: string, envVar?: string) {
    super(
      `Missing required parameter: ${parameter}`,
      'MISSING_REQUIRED_PARAMETER',
      {
        suggestion: envVar ? `Set ${envVar} in the environment or in --params-file` : undefined,
        context: { parameter, envVar }
      }
    )
    this.name = 'MissingRequiredParameterError'
  }
}

/**
 * Thrown when a schema subject has no resolved file in the schema catalog
 */
export class UnresolvedSchemaPathError extends EmitError {
  constructor(subject: string, domain: string) {
    super(
      `Schema subject "${subject}" (domain "${domain}") has no resolved file path`,
      'UNRESOLVED_SCHEMA_PATH',
      {
        suggestion: 'Regenerate schemas-catalog.json with "kafkagate aggregate"',
        context: { subject, domain }
      }
    )
    this.name = 'UnresolvedSchemaPathError'
  }
}

/**
 * Thrown when an ACL grant names a topic the catalog does not contain
 */
export class UnresolvedTopicReferenceError extends EmitError {
  constructor(account: string, topic: string) {
    super(
      `ACL for service account "${account}" references topic "${topic}", which is not in the catalog`,
      'UNRESOLVED_TOPIC_REFERENCE',
      {
        context: { account, topic }
      }
    )
    this.name = 'UnresolvedTopicReferenceError'
  }
}

/**
 * Thrown when one domain declares the same resource twice
 */
export class DuplicateResourceError extends EmitError {
  constructor(kind: PlanResourceKind, name: string, domain: string) {
    super(
      `${kind === 'acl' ? 'ACL' : KIND_LABELS[kind]} "${name}" is declared more than once by domain "${domain}"`,
      'DUPLICATE_RESOURCE',
      {
        suggestion: 'Remove the duplicate entry from the declaration',
        context: { kind, name, domain }
      }
    )
    this.name = 'DuplicateResourceError'
  }
}

// =============================================================================
// Store and File Errors
// =============================================================================

/**
 * Thrown for a missing or invalid command-line argument
 */
export class UsageError extends KafkagateError {
  constructor(message: string, suggestion?: string) {
    super(message, 'USAGE_ERROR', { suggestion })
    this.name = 'UsageError'
  }
}

/**
 * Thrown when an input file named on the command line does not exist
 */
export class FileNotFoundError extends KafkagateError {
  constructor(filePath: string) {
    super(
      `File not found: ${filePath}`,
      'FILE_NOT_FOUND',
      {
        suggestion: 'Check if the file path is correct',
        context: { filePath }
      }
    )
    this.name = 'FileNotFoundError'
  }
}

export class StoreError extends KafkagateError {
  constructor(message: string, filePath: string, cause?: Error) {
    super(message, 'STORE_ERROR', {
      context: { filePath },
      cause
    })
    this.name = 'StoreError'
  }
}

// =============================================================================
// Type Guards
// =============================================================================

export function isKafkagateError(error: unknown): error is KafkagateError {
  return error instanceof KafkagateError
}

export function isDeclarationError(error: unknown): error is DeclarationError {
  return error instanceof DeclarationError
}

export function isLockError(error: unknown): error is LockError {
  return error instanceof LockError
}

export function isCatalogError(error: unknown): error is CatalogError {
  return error instanceof CatalogError
}

// =============================================================================
// Error Formatting Helpers
// =============================================================================

/**
 * Format any error for CLI output
 */
export function formatErrorForCli(error: unknown): string {
  if (isKafkagateError(error)) {
    return error.toCliOutput()
  }
  if (error instanceof Error) {
    return `Error: ${error.message}`
  }
  return `Error: ${String(error)}`
}

/**
 * Wrap a generic error into a KafkagateError if needed
 */
export function wrapError(error: unknown, defaultCode: string = 'UNKNOWN_ERROR'): KafkagateError {
  if (isKafkagateError(error)) {
    return error
  }
  if (error instanceof Error) {
    return new KafkagateError(error.message, defaultCode, { cause: error })
  }
  return new KafkagateError(String(error), defaultCode)
}

/**
 * Narrow an unknown thrown value to an Error
 */
export function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error))
}
