/**
 * Tests for kafkagate Error Hierarchy
 */

import { describe, it, expect } from 'vitest'
import {
  KafkagateError,
  CatalogError,
  LockError,
  EmitError,
  InvalidEnvironmentError,
  MalformedDeclarationError,
  DeclarationIOError,
  DeclarationScanError,
  NamingConflictError,
  AlreadyLockedError,
  EnvironmentLockedError,
  LockNotHeldError,
  MissingRequiredParameterError,
  DuplicateResourceError,
  UnknownTopicReferenceError,
  FileNotFoundError,
  formatConflict,
  formatErrorForCli,
  isKafkagateError,
  isDeclarationError,
  isLockError,
  isCatalogError,
  wrapError,
  toError
} from '../../src/lib/errors.js'

describe('KafkagateError', () => {
  it('should carry code, suggestion and context', () => {
    const err = new KafkagateError('Something failed', 'TEST_CODE', {
      suggestion: 'Try again',
      context: { key: 'value' }
    })

    expect(err.message).toBe('Something failed')
    expect(err.code).toBe('TEST_CODE')
    expect(err.suggestion).toBe('Try again')
    expect(err.context).toEqual({ key: 'value' })
    expect(err).toBeInstanceOf(Error)
  })

  it('should format for CLI with suggestion', () => {
    const err = new KafkagateError('Something failed', 'TEST_CODE', { suggestion: 'Try again' })
    expect(err.toCliOutput()).toBe('Error: Something failed\n  Suggestion: Try again')
  })

  it('should serialize to JSON', () => {
    const json = new KafkagateError('Boom', 'BOOM').toJSON()
    expect(json.name).toBe('KafkagateError')
    expect(json.code).toBe('BOOM')
    expect(json.message).toBe('Boom')
  })

  it('should keep the cause', () => {
    const cause = new Error('root')
    const err = new KafkagateError('wrapped', 'WRAPPED', { cause })
    expect(err.cause).toBe(cause)
  })
})

describe('config errors', () => {
  it('should list valid environments in the suggestion', () => {
    const err = new InvalidEnvironmentError('stage', ['dev', 'prod'])
    expect(err.message).toBe('Invalid environment: "stage"')
    expect(err.suggestion).toBe('Valid environments: dev, prod')
    expect(err.code).toBe('INVALID_ENVIRONMENT')
  })
})

describe('declaration errors', () => {
  it('should name domain and file in a malformed declaration', () => {
    const err = new MalformedDeclarationError('orders', 'domains/orders/dev/kafka-request.yaml', [
      'topics.0.name: Required'
    ])

    expect(err.domain).toBe('orders')
    expect(err.filePath).toBe('domains/orders/dev/kafka-request.yaml')
    expect(err.issues).toEqual(['topics.0.name: Required'])
    expect(err.code).toBe('MALFORMED_DECLARATION')
    expect(isDeclarationError(err)).toBe(true)
  })

  it('should list every failure of a scan', () => {
    const err = new DeclarationScanError('dev', [
      new MalformedDeclarationError('billing', 'b.yaml', ['x: bad']),
      new DeclarationIOError('orders', 'o.yaml')
    ])

    expect(err.message).toBe('Failed to load 2 declaration(s) for "dev": billing, orders')
    expect(err.toCliOutput()).toBe([
      'Error: Failed to load 2 declaration(s) for "dev": billing, orders',
      '  - [MALFORMED_DECLARATION] Malformed declaration for domain "billing" (b.yaml): x: bad',
      '  - [IO_ERROR] Cannot read declaration for domain "orders" (o.yaml)'
    ].join('\n'))
  })
})

describe('catalog errors', () => {
  it('should describe an unknown topic reference', () => {
    const err = new UnknownTopicReferenceError('svc-a', 'missing.topic', 'orders')
    expect(err.message).toBe('Access entry "svc-a" in domain "orders" references unknown topic "missing.topic"')
    expect(err).toBeInstanceOf(CatalogError)
  })

  it('should format conflicts with and without a deployed owner', () => {
    expect(formatConflict({ kind: 'topic', name: 'orders-events', domains: ['billing', 'orders'] }))
      .toBe("Topic 'orders-events' claimed by multiple domains: billing, orders")
    expect(formatConflict({
      kind: 'service-account',
      name: 'svc-a',
      domains: ['billing', 'orders'],
      baselineDomain: 'orders'
    })).toBe("Service account 'svc-a' claimed by multiple domains: billing, orders (deployed owner: orders)")
  })

  it('should number every conflict in CLI output', () => {
    const err = new NamingConflictError('prod', [
      { kind: 'topic', name: 'a', domains: ['x', 'y'] },
      { kind: 'schema', name: 'a-value', domains: ['x', 'y'] }
    ])

    expect(err.message).toBe('2 naming conflict(s) in "prod": a, a-value')
    expect(err.conflicts).toHaveLength(2)
    expect(err.toCliOutput().split('\n')).toEqual([
      'Error: 2 naming conflict(s) in "prod": a, a-value',
      "  1. Topic 'a' claimed by multiple domains: x, y",
      "  2. Schema subject 'a-value' claimed by multiple domains: x, y",
      '  Suggestion: Rename the resources or agree on a single owning domain'
    ])
    expect(isCatalogError(err)).toBe(true)
  })
})

describe('lock errors', () => {
  it('should expose the existing holder', () => {
    const err = new AlreadyLockedError('prod', 'github:acme/infra/runs/7/attempts/1', '2024-01-01T00:00:00.000Z')
    expect(err.holder).toBe('github:acme/infra/runs/7/attempts/1')
    expect(err.environment).toBe('prod')
    expect(err.message).toBe(
      'Environment "prod" is already locked by github:acme/infra/runs/7/attempts/1 since 2024-01-01T00:00:00.000Z'
    )
    expect(isLockError(err)).toBe(true)
  })

  it('should distinguish read-only and finish failures', () => {
    expect(new EnvironmentLockedError('dev', 'alice').code).toBe('ENVIRONMENT_LOCKED')
    expect(new LockNotHeldError('dev', 'bob', 'alice').message).toBe('Environment "dev" is locked by alice, not bob')
    expect(new LockNotHeldError('dev', 'bob').message).toBe('Environment "dev" is not locked; nothing to finish')
    expect(new LockNotHeldError('dev', 'bob')).toBeInstanceOf(LockError)
  })
})

describe('emit errors', () => {
  it('should name the missing parameter and its variable', () => {
    const err = new MissingRequiredParameterError('cluster_id', 'KAFKA_CLUSTER_ID')
    expect(err.message).toBe('Missing required parameter: cluster_id')
    expect(err.suggestion).toBe('Set KAFKA_CLUSTER_ID in the environment or in --params-file')
    expect(err).toBeInstanceOf(EmitError)
  })

  it('should label duplicate resources by kind', () => {
    const err = new DuplicateResourceError('topic', 'orders.created', 'orders')
    expect(err.message).toBe('Topic "orders.created" is declared more than once by domain "orders"')
  })
})

describe('helpers', () => {
  it('should recognize kafkagate errors', () => {
    expect(isKafkagateError(new FileNotFoundError('/tmp/x'))).toBe(true)
    expect(isKafkagateError(new Error('plain'))).toBe(false)
  })

  it('should format any error for CLI', () => {
    expect(formatErrorForCli(new FileNotFoundError('/tmp/x')))
      .toBe('Error: File not found: /tmp/x\n  Suggestion: Check if the file path is correct')
    expect(formatErrorForCli(new Error('plain'))).toBe('Error: plain')
    expect(formatErrorForCli('text')).toBe('Error: text')
  })

  it('should wrap foreign errors', () => {
    const cause = new Error('disk full')
    const wrapped = wrapError(cause, 'IO')
    expect(wrapped.code).toBe('IO')
    expect(wrapped.message).toBe('disk full')
    expect(wrapped.cause).toBe(cause)

    const existing = new FileNotFoundError('/x')
    expect(wrapError(existing)).toBe(existing)
  })

  it('should narrow unknown values to Error', () => {
    const err = new Error('x')
    expect(toError(err)).toBe(err)
    expect(toError(42).message).toBe('42')
  })
})
