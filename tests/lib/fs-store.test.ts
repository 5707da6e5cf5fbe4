/**
 * Tests for fs-store.ts
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest'
import fs from 'node:fs'
import path from 'node:path'
import os from 'node:os'
import { FileCatalogStore, storeKeys } from '../../src/lib/fs-store.js'
import { StoreError } from '../../src/lib/errors.js'

describe('storeKeys', () => {
  it('should lay files out per environment', () => {
    expect(storeKeys.catalog('prod')).toBe('prod/kafka-catalog.yaml')
    expect(storeKeys.schemaCatalog('prod')).toBe('prod/schemas-catalog.json')
    expect(storeKeys.baselineCatalog('prod')).toBe('prod/.deployed/kafka-catalog.yaml')
    expect(storeKeys.baselineSchemaCatalog('prod')).toBe('prod/.deployed/schemas-catalog.json')
    expect(storeKeys.lock('prod')).toBe('prod/.lock.json')
  })
})

describe('FileCatalogStore', () => {
  let tempDir: string
  let store: FileCatalogStore

  beforeEach(() => {
    tempDir = fs.mkdtempSync(path.join(os.tmpdir(), 'kafkagate-store-test-'))
    store = new FileCatalogStore(tempDir)
  })

  afterEach(() => {
    fs.rmSync(tempDir, { recursive: true, force: true })
  })

  it('should return null for missing keys', async () => {
    expect(await store.read('dev/kafka-catalog.yaml')).toBeNull()
  })

  it('should write and read back, creating directories', async () => {
    await store.write('dev/.deployed/kafka-catalog.yaml', 'topics: []\n')

    expect(await store.read('dev/.deployed/kafka-catalog.yaml')).toBe('topics: []\n')
    expect(fs.readFileSync(path.join(tempDir, 'dev', '.deployed', 'kafka-catalog.yaml'), 'utf-8'))
      .toBe('topics: []\n')
  })

  it('should overwrite on write', async () => {
    await store.write('dev/a', 'one')
    await store.write('dev/a', 'two')
    expect(await store.read('dev/a')).toBe('two')
  })

  it('should create only when absent', async () => {
    expect(await store.createIfAbsent('dev/.lock.json', 'first')).toBe(true)
    expect(await store.createIfAbsent('dev/.lock.json', 'second')).toBe(false)
    expect(await store.read('dev/.lock.json')).toBe('first')
  })

  it('should let exactly one of two racing creators win', async () => {
    const results = await Promise.all([
      store.createIfAbsent('prod/.lock.json', 'a'),
      store.createIfAbsent('prod/.lock.json', 'b')
    ])

    expect(results.filter(Boolean)).toHaveLength(1)
  })

  it('should leave no temp files behind', async () => {
    await store.write('dev/a', 'x')
    await store.createIfAbsent('dev/b', 'y')
    await store.createIfAbsent('dev/b', 'z')

    expect(fs.readdirSync(path.join(tempDir, 'dev')).sort()).toEqual(['a', 'b'])
  })

  it('should report whether remove deleted anything', async () => {
    await store.write('dev/.lock.json', '{}')
    expect(await store.remove('dev/.lock.json')).toBe(true)
    expect(await store.remove('dev/.lock.json')).toBe(false)
  })

  it('should refuse keys that escape the root', () => {
    expect(() => store.resolve('../outside')).toThrow(StoreError)
    expect(() => store.resolve('/etc/passwd')).toThrow(StoreError)
    expect(() => store.resolve('dev//a')).toThrow(StoreError)
    expect(() => store.resolve('')).toThrow(StoreError)
  })
})
