/**
 * Tests for the Lock Manager
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest'
import fs from 'node:fs'
import path from 'node:path'
import os from 'node:os'
import { LockManager } from '../../src/domain/lock.js'
import { FileCatalogStore, storeKeys, type CatalogStore } from '../../src/lib/fs-store.js'
import {
  AlreadyLockedError,
  EnvironmentLockedError,
  InvalidCatalogError,
  LockNotHeldError
} from '../../src/lib/errors.js'

const FIXED_NOW = new Date('2024-05-01T12:00:00.000Z')

/**
 * In-memory store whose createIfAbsent can be made to lose a race
 */
class MemoryStore implements CatalogStore {
  readonly files = new Map<string, string>()
  /** Content another run writes just before our create lands */
  raceWith: string | null = null

  async read(key: string): Promise<string | null> {
    return this.files.get(key) ?? null
  }

  async write(key: string, content: string): Promise<void> {
    this.files.set(key, content)
  }

  async createIfAbsent(key: string, content: string): Promise<boolean> {
    if (this.raceWith !== null) {
      this.files.set(key, this.raceWith)
      this.raceWith = null
    }
    if (this.files.has(key)) return false
    this.files.set(key, content)
    return true
  }

  async remove(key: string): Promise<boolean> {
    return this.files.delete(key)
  }
}

describe('LockManager', () => {
  let tempDir: string
  let store: FileCatalogStore
  let locks: LockManager

  beforeEach(() => {
    tempDir = fs.mkdtempSync(path.join(os.tmpdir(), 'kafkagate-lock-test-'))
    store = new FileCatalogStore(tempDir)
    locks = new LockManager(store, { now: () => FIXED_NOW })
  })

  afterEach(() => {
    fs.rmSync(tempDir, { recursive: true, force: true })
  })

  it('should report a free environment', async () => {
    expect(await locks.status('prod')).toBeNull()
  })

  it('should acquire and record the holder', async () => {
    const record = await locks.acquire('prod', 'run-1')

    expect(record).toEqual({ environment: 'prod', holder: 'run-1', acquired_at: '2024-05-01T12:00:00.000Z' })
    expect(await locks.status('prod')).toEqual(record)
    expect(fs.readFileSync(path.join(tempDir, 'prod', '.lock.json'), 'utf-8')).toBe(
      '{\n  "environment": "prod",\n  "holder": "run-1",\n  "acquired_at": "2024-05-01T12:00:00.000Z"\n}\n'
    )
  })

  it('should refuse a second acquire and name the holder', async () => {
    await locks.acquire('prod', 'run-1')

    const attempt = locks.acquire('prod', 'run-2')
    await expect(attempt).rejects.toThrow(AlreadyLockedError)
    await expect(attempt).rejects.toMatchObject({ holder: 'run-1', environment: 'prod' })
  })

  it('should keep environments independent', async () => {
    await locks.acquire('prod', 'run-1')
    await expect(locks.acquire('dev', 'run-2')).resolves.toMatchObject({ holder: 'run-2' })
  })

  it('should let exactly one of two concurrent acquires win', async () => {
    const results = await Promise.allSettled([
      locks.acquire('prod', 'run-1'),
      locks.acquire('prod', 'run-2')
    ])

    const fulfilled = results.filter(r => r.status === 'fulfilled')
    const rejected = results.filter(r => r.status === 'rejected')
    expect(fulfilled).toHaveLength(1)
    expect(rejected).toHaveLength(1)
    if (rejected[0]?.status === 'rejected') {
      expect(rejected[0].reason).toBeInstanceOf(AlreadyLockedError)
    }
  })

  it('should report the winner of a lost create race', async () => {
    const memory = new MemoryStore()
    memory.raceWith = JSON.stringify({ environment: 'prod', holder: 'run-fast', acquired_at: '2024-05-01T11:59:59.000Z' })
    const racing = new LockManager(memory, { now: () => FIXED_NOW })

    const attempt = racing.acquire('prod', 'run-slow')
    await expect(attempt).rejects.toThrow(AlreadyLockedError)
    await expect(attempt).rejects.toMatchObject({ holder: 'run-fast' })
  })

  it('should release, and treat releasing a free lock as a no-op', async () => {
    await locks.acquire('prod', 'run-1')

    expect(await locks.release('prod')).toBe(true)
    expect(await locks.status('prod')).toBeNull()
    expect(await locks.release('prod')).toBe(false)

    await expect(locks.acquire('prod', 'run-2')).resolves.toMatchObject({ holder: 'run-2' })
  })

  it('should fail read-only runs while locked', async () => {
    await expect(locks.assertUnlocked('prod')).resolves.toBeUndefined()

    await locks.acquire('prod', 'run-1')
    await expect(locks.assertUnlocked('prod')).rejects.toThrow(EnvironmentLockedError)
  })

  it('should treat an unreadable lock record as an error', async () => {
    await store.write(storeKeys.lock('prod'), 'not json')
    await expect(locks.status('prod')).rejects.toThrow(InvalidCatalogError)
    await expect(locks.acquire('prod', 'run-1')).rejects.toThrow(InvalidCatalogError)
  })

  describe('recordPrepared', () => {
    const DIGEST = 'c'.repeat(64)

    it('should pin the digest on the holder\'s lock', async () => {
      await locks.acquire('prod', 'run-1')
      const record = await locks.recordPrepared('prod', 'run-1', DIGEST)

      expect(record).toEqual({
        environment: 'prod',
        holder: 'run-1',
        acquired_at: '2024-05-01T12:00:00.000Z',
        prepared_sha256: DIGEST
      })
      expect(await locks.status('prod')).toEqual(record)
    })

    it('should refuse a lock held by another run', async () => {
      await locks.acquire('prod', 'run-1')

      await expect(locks.recordPrepared('prod', 'run-2', DIGEST))
        .rejects.toThrow('Environment "prod" is locked by run-1, not run-2')
      expect((await locks.status('prod'))?.prepared_sha256).toBeUndefined()
    })

    it('should refuse a free environment', async () => {
      await expect(locks.recordPrepared('prod', 'run-1', DIGEST)).rejects.toThrow(LockNotHeldError)
      expect(await locks.status('prod')).toBeNull()
    })
  })

  describe('withLock', () => {
    it('should release after success', async () => {
      const value = await locks.withLock('prod', 'run-1', async record => record.holder)

      expect(value).toBe('run-1')
      expect(await locks.status('prod')).toBeNull()
    })

    it('should release after failure', async () => {
      await expect(locks.withLock('prod', 'run-1', async () => {
        throw new Error('provisioning failed')
      })).rejects.toThrow('provisioning failed')

      expect(await locks.status('prod')).toBeNull()
    })
  })
})
