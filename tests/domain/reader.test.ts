/**
 * Tests for the Domain Reader
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest'
import path from 'node:path'
import {
  readDeclarationFile,
  readDomainDeclarations,
  readDomainDeclarationsOrThrow
} from '../../src/domain/reader.js'
import {
  DeclarationIOError,
  DeclarationScanError,
  DomainsDirNotFoundError,
  MalformedDeclarationError
} from '../../src/lib/errors.js'
import {
  BILLING_DECLARATION,
  ORDERS_DECLARATION,
  createWorkspace,
  type TestWorkspace
} from '../helpers/workspace.js'

describe('Domain Reader', () => {
  let ws: TestWorkspace

  beforeEach(() => {
    ws = createWorkspace('kafkagate-reader-test-')
  })

  afterEach(() => {
    ws.cleanup()
  })

  describe('readDeclarationFile', () => {
    it('should apply defaults and coerce config values to strings', () => {
      const filePath = ws.writeDeclaration('orders', 'dev', ORDERS_DECLARATION)
      const decl = readDeclarationFile('orders', 'dev', filePath)

      expect(decl.domain).toBe('orders')
      expect(decl.environment).toBe('dev')
      expect(decl.serviceName).toBe('orders-service')
      expect(decl.sourcePath).toBe(filePath)
      expect(decl.topics).toEqual([
        {
          name: 'orders.created',
          partitions: 6,
          replicationFactor: 3,
          config: { 'retention.ms': '604800000', 'cleanup.policy': 'delete' }
        },
        { name: 'orders.shipped', partitions: 3, replicationFactor: 3, config: {} }
      ])
      expect(decl.schemas).toEqual([
        { subject: 'orders.created-value', schemaFile: 'schemas/order-created.avsc' }
      ])
      expect(decl.accessConfig).toEqual([
        {
          name: 'svc-orders',
          description: 'Orders producer',
          role: 'DeveloperWrite',
          topics: ['orders.created', 'orders.shipped']
        }
      ])
    })

    it('should default the service name to the domain', () => {
      const filePath = ws.writeDeclaration('billing', 'dev', BILLING_DECLARATION)
      const decl = readDeclarationFile('billing', 'dev', filePath)

      expect(decl.serviceName).toBe('billing')
      expect(decl.description).toBe('')
      expect(decl.schemas).toEqual([])
    })

    it('should treat an empty file as an empty declaration', () => {
      const filePath = ws.writeDeclaration('empty', 'dev', '')
      const decl = readDeclarationFile('empty', 'dev', filePath)

      expect(decl.topics).toEqual([])
      expect(decl.accessConfig).toEqual([])
    })

    it('should return a frozen declaration', () => {
      const filePath = ws.writeDeclaration('orders', 'dev', ORDERS_DECLARATION)
      const decl = readDeclarationFile('orders', 'dev', filePath)

      expect(Object.isFrozen(decl)).toBe(true)
      expect(Object.isFrozen(decl.topics)).toBe(true)
    })

    it('should report missing fields by path', () => {
      const filePath = ws.writeDeclaration('orders', 'dev', 'topics:\n  - partitions: 3\n')

      try {
        readDeclarationFile('orders', 'dev', filePath)
        expect.fail('expected MalformedDeclarationError')
      } catch (err) {
        expect(err).toBeInstanceOf(MalformedDeclarationError)
        if (err instanceof MalformedDeclarationError) {
          expect(err.issues).toEqual(['topics.0.name: Required'])
          expect(err.domain).toBe('orders')
        }
      }
    })

    it('should reject topic names Kafka does not accept', () => {
      const filePath = ws.writeDeclaration('orders', 'dev', 'topics:\n  - name: "orders:created"\n')

      try {
        readDeclarationFile('orders', 'dev', filePath)
        expect.fail('expected MalformedDeclarationError')
      } catch (err) {
        expect(err).toBeInstanceOf(MalformedDeclarationError)
        if (err instanceof MalformedDeclarationError) {
          expect(err.issues).toEqual(['topics.0.name: topic names may only contain letters, digits, ".", "_" and "-"'])
        }
      }
    })

    it('should reject unknown roles', () => {
      const filePath = ws.writeDeclaration('orders', 'dev', [
        'topics: [{ name: a }]',
        'access_config:',
        '  - name: svc-a',
        '    role: Admin',
        '    topics: [a]'
      ].join('\n'))

      expect(() => readDeclarationFile('orders', 'dev', filePath)).toThrow(MalformedDeclarationError)
    })

    it('should reject access entries without topics', () => {
      const filePath = ws.writeDeclaration('orders', 'dev', [
        'access_config:',
        '  - name: svc-a',
        '    role: DeveloperRead',
        '    topics: []'
      ].join('\n'))

      expect(() => readDeclarationFile('orders', 'dev', filePath)).toThrow(MalformedDeclarationError)
    })

    it('should report invalid YAML as malformed', () => {
      const filePath = ws.writeDeclaration('orders', 'dev', 'topics: [unclosed')

      try {
        readDeclarationFile('orders', 'dev', filePath)
        expect.fail('expected MalformedDeclarationError')
      } catch (err) {
        expect(err).toBeInstanceOf(MalformedDeclarationError)
        if (err instanceof MalformedDeclarationError) {
          expect(err.issues).toHaveLength(1)
          expect(err.issues[0]).toMatch(/^invalid YAML: /)
        }
      }
    })

    it('should report unreadable files as IO errors', () => {
      const missing = path.join(ws.paths.domainsDir, 'ghost', 'dev', 'kafka-request.yaml')
      expect(() => readDeclarationFile('ghost', 'dev', missing)).toThrow(DeclarationIOError)
    })
  })

  describe('readDomainDeclarations', () => {
    it('should read every domain of the environment in domain order', async () => {
      ws.writeDeclaration('orders', 'dev', ORDERS_DECLARATION)
      ws.writeDeclaration('billing', 'dev', BILLING_DECLARATION)
      ws.writeDeclaration('billing', 'prod', BILLING_DECLARATION)

      const { declarations, failures } = await readDomainDeclarations({
        domainsDir: ws.paths.domainsDir,
        environment: 'dev'
      })

      expect(declarations.map(d => d.domain)).toEqual(['billing', 'orders'])
      expect(failures).toEqual([])
    })

    it('should skip domains without a declaration for the environment', async () => {
      ws.writeDeclaration('billing', 'prod', BILLING_DECLARATION)

      const { declarations } = await readDomainDeclarations({
        domainsDir: ws.paths.domainsDir,
        environment: 'dev'
      })

      expect(declarations).toEqual([])
    })

    it('should collect every failure and keep the valid siblings', async () => {
      ws.writeDeclaration('orders', 'dev', ORDERS_DECLARATION)
      ws.writeDeclaration('billing', 'dev', 'topics: [unclosed')
      ws.writeDeclaration('shipping', 'dev', 'topics:\n  - partitions: 1\n')

      const { declarations, failures } = await readDomainDeclarations({
        domainsDir: ws.paths.domainsDir,
        environment: 'dev'
      })

      expect(declarations.map(d => d.domain)).toEqual(['orders'])
      expect(failures.map(f => f.domain)).toEqual(['billing', 'shipping'])
    })

    it('should honour a custom declaration file name', async () => {
      ws.writeFile(path.join('domains', 'orders', 'dev', 'kafka.yaml'), ORDERS_DECLARATION)

      const { declarations } = await readDomainDeclarations({
        domainsDir: ws.paths.domainsDir,
        environment: 'dev',
        declarationFile: 'kafka.yaml'
      })

      expect(declarations.map(d => d.domain)).toEqual(['orders'])
    })

    it('should fail when the domains directory is missing', async () => {
      await expect(readDomainDeclarations({
        domainsDir: path.join(ws.root, 'nope'),
        environment: 'dev'
      })).rejects.toThrow(DomainsDirNotFoundError)
    })
  })

  describe('readDomainDeclarationsOrThrow', () => {
    it('should throw one error naming every failed domain', async () => {
      ws.writeDeclaration('billing', 'dev', 'topics: [unclosed')
      ws.writeDeclaration('shipping', 'dev', 'topics:\n  - partitions: 1\n')

      const promise = readDomainDeclarationsOrThrow({
        domainsDir: ws.paths.domainsDir,
        environment: 'dev'
      })

      await expect(promise).rejects.toThrow(DeclarationScanError)
      await expect(promise).rejects.toThrow('Failed to load 2 declaration(s) for "dev": billing, shipping')
    })
  })
})
