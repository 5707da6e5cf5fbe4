/**
 * Tests for the Catalog Aggregator
 */

import { describe, it, expect } from 'vitest'
import type { DomainDeclaration, Topic, AccessConfigEntry, SchemaRef } from '../../src/types.js'
import {
  aggregateCatalog,
  emptyCatalog,
  expandAccessEntry,
  parseCatalog,
  serializeCatalog
} from '../../src/domain/aggregate.js'
import { InvalidCatalogError, UnknownTopicReferenceError } from '../../src/lib/errors.js'

function topic(name: string, overrides: Partial<Topic> = {}): Topic {
  return { name, partitions: 3, replicationFactor: 3, config: {}, ...overrides }
}

function declaration(
  domain: string,
  parts: { topics?: Topic[]; schemas?: SchemaRef[]; accessConfig?: AccessConfigEntry[] } = {}
): DomainDeclaration {
  return {
    domain,
    environment: 'dev',
    serviceName: domain,
    description: '',
    topics: parts.topics ?? [],
    schemas: parts.schemas ?? [],
    accessConfig: parts.accessConfig ?? [],
    sourcePath: `domains/${domain}/dev/kafka-request.yaml`
  }
}

const orders = declaration('orders', {
  topics: [
    topic('orders.shipped'),
    topic('orders.created', { partitions: 6, config: { 'retention.ms': '604800000', 'cleanup.policy': 'delete' } })
  ],
  schemas: [{ subject: 'orders.created-value', schemaFile: 'schemas/order-created.avsc' }],
  accessConfig: [{
    name: 'svc-orders',
    description: 'Orders producer',
    role: 'DeveloperWrite',
    topics: ['orders.shipped', 'orders.created']
  }]
})

const billing = declaration('billing', {
  topics: [topic('billing.invoices')],
  accessConfig: [{ name: 'svc-billing', description: '', role: 'DeveloperRead', topics: ['orders.created'] }]
})

describe('aggregateCatalog', () => {
  it('should tag every resource with its domain and order by (domain, name)', () => {
    const catalog = aggregateCatalog('dev', [orders, billing])

    expect(catalog.environment).toBe('dev')
    expect(catalog.domains).toEqual(['billing', 'orders'])
    expect(catalog.topics.map(t => [t.domain, t.name])).toEqual([
      ['billing', 'billing.invoices'],
      ['orders', 'orders.created'],
      ['orders', 'orders.shipped']
    ])
    expect(catalog.schemas).toEqual([
      { subject: 'orders.created-value', schemaFile: 'schemas/order-created.avsc', domain: 'orders' }
    ])
    expect(catalog.serviceAccounts).toEqual([
      { name: 'svc-billing', description: '', domain: 'billing' },
      { name: 'svc-orders', description: 'Orders producer', domain: 'orders' }
    ])
  })

  it('should fan each access entry out into one grant per topic', () => {
    const catalog = aggregateCatalog('dev', [orders, billing])

    expect(catalog.aclGrants).toEqual([
      { account: 'svc-billing', topic: 'orders.created', role: 'DeveloperRead', domain: 'billing' },
      { account: 'svc-orders', topic: 'orders.created', role: 'DeveloperWrite', domain: 'orders' },
      { account: 'svc-orders', topic: 'orders.shipped', role: 'DeveloperWrite', domain: 'orders' }
    ])
  })

  it('should sort topic config keys', () => {
    const catalog = aggregateCatalog('dev', [orders])
    expect(Object.keys(catalog.topics[0].config)).toEqual(['cleanup.policy', 'retention.ms'])
  })

  it('should keep colliding names from different domains', () => {
    const a = declaration('alpha', { topics: [topic('orders-events')] })
    const b = declaration('beta', { topics: [topic('orders-events')] })

    const catalog = aggregateCatalog('dev', [b, a])
    expect(catalog.topics.map(t => t.domain)).toEqual(['alpha', 'beta'])
  })

  it('should reject access to a topic nobody declares', () => {
    const broken = declaration('orders', {
      topics: [topic('orders.created')],
      accessConfig: [{ name: 'svc-a', description: '', role: 'DeveloperRead', topics: ['missing.topic'] }]
    })

    expect(() => aggregateCatalog('dev', [broken])).toThrow(UnknownTopicReferenceError)
    expect(() => aggregateCatalog('dev', [broken])).toThrow(
      'Access entry "svc-a" in domain "orders" references unknown topic "missing.topic"'
    )
  })

  it('should not depend on declaration order', () => {
    const shipping = declaration('shipping', {
      topics: [topic('shipping.labels')],
      accessConfig: [{ name: 'svc-ship', description: '', role: 'DeveloperRead', topics: ['orders.shipped', 'shipping.labels'] }]
    })

    const expected = serializeCatalog(aggregateCatalog('dev', [billing, orders, shipping]))
    const permutations = [
      [orders, billing, shipping],
      [shipping, orders, billing],
      [billing, shipping, orders],
      [shipping, billing, orders]
    ]

    for (const order of permutations) {
      expect(serializeCatalog(aggregateCatalog('dev', order))).toBe(expected)
    }
  })

  it('should aggregate nothing into an empty catalog', () => {
    expect(aggregateCatalog('prod', [])).toEqual(emptyCatalog('prod'))
  })
})

describe('expandAccessEntry', () => {
  it('should return the service account and its grants', () => {
    const expanded = expandAccessEntry(
      { name: 'svc-a', description: 'reader', role: 'DeveloperRead', topics: ['t1', 't2'] },
      'orders',
      new Set(['t1', 't2'])
    )

    expect(expanded.serviceAccount).toEqual({ name: 'svc-a', description: 'reader', domain: 'orders' })
    expect(expanded.grants).toEqual([
      { account: 'svc-a', topic: 't1', role: 'DeveloperRead', domain: 'orders' },
      { account: 'svc-a', topic: 't2', role: 'DeveloperRead', domain: 'orders' }
    ])
  })
})

describe('catalog artifact', () => {
  it('should read back what it writes', () => {
    const catalog = aggregateCatalog('dev', [orders, billing])
    const content = serializeCatalog(catalog)

    expect(parseCatalog(content, 'kafka-catalog.yaml')).toEqual(catalog)
  })

  it('should write snake_case keys', () => {
    const content = serializeCatalog(aggregateCatalog('dev', [billing, orders]))

    expect(content.startsWith('environment: dev\ndomains:\n  - billing\n  - orders\n')).toBe(true)
    expect(content).toContain('    replication_factor: 3\n')
    expect(content).toContain('service_accounts:\n')
  })

  it('should reject invalid catalog files', () => {
    expect(() => parseCatalog('environment: dev\n', 'kafka-catalog.yaml')).toThrow(InvalidCatalogError)
    expect(() => parseCatalog('topics: [unclosed', 'kafka-catalog.yaml')).toThrow(InvalidCatalogError)
  })
})
