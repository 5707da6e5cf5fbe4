/**
 * Lock Manager
 *
 * Per-environment deployment lock: FREE → HELD(holder) → FREE.
 *
 * The lock record lives in the same CatalogStore as the catalogs, so it is
 * visible through the read path used for conflict detection. Acquisition goes
 * through the store's atomic create-if-absent; a lost race becomes
 * AlreadyLockedError. Locks never expire on their own.
 */

import type { Environment, LockRecord } from '../types.js'
import { storeKeys, type CatalogStore } from '../lib/fs-store.js'
import {
  AlreadyLockedError,
  EnvironmentLockedError,
  InvalidCatalogError,
  LockNotHeldError,
  toError
} from '../lib/errors.js'
import { formatIssues } from '../lib/schema-issues.js'
import { LockRecordSchema } from './schemas.js'

export interface LockManagerOptions {
  /** Clock used for acquired_at */
  now?: () => Date
}

export class LockManager {
  private readonly store: CatalogStore
  private readonly now: () => Date

  constructor(store: CatalogStore, options: LockManagerOptions = {}) {
    this.store = store
    this.now = options.now ?? (() => new Date())
  }

  /**
   * Current lock record, or null when the environment is free
   */
  async status(environment: Environment): Promise<LockRecord | null> {
    const key = storeKeys.lock(environment)
    const content = await this.store.read(key)
    if (content === null) return null

    let raw: unknown
    try {
      raw = JSON.parse(content)
    } catch (err) {
      throw new InvalidCatalogError(key, [`invalid JSON: ${toError(err).message}`], toError(err))
    }

    const result = LockRecordSchema.safeParse(raw)
    if (!result.success) {
      throw new InvalidCatalogError(key, formatIssues(result.error))
    }
    return result.data
  }

  /**
   * Take the lock for `holder`.
   *
   * @throws AlreadyLockedError when a record exists or another run wins the create
   */
  async acquire(environment: Environment, holder: string): Promise<LockRecord> {
    const existing = await this.status(environment)
    if (existing) {
      throw new AlreadyLockedError(environment, existing.holder, existing.acquired_at)
    }

    const record: LockRecord = {
      environment,
      holder,
      acquired_at: this.now().toISOString()
    }

    const created = await this.store.createIfAbsent(
      storeKeys.lock(environment),
      JSON.stringify(record, null, 2) + '\n'
    )

    if (!created) {
      // Lost the race between the check above and the create
      const winner = await this.status(environment)
      throw new AlreadyLockedError(environment, winner?.holder ?? 'another run', winner?.acquired_at)
    }

    return record
  }

  /**
   * Pin the digest of the prepared catalog to the lock `holder` owns.
   *
   * @throws LockNotHeldError when the lock is gone or belongs to another run
   */
  async recordPrepared(environment: Environment, holder: string, sha256: string): Promise<LockRecord> {
    const current = await this.status(environment)
    if (!current) {
      throw new LockNotHeldError(environment, holder)
    }
    if (current.holder !== holder) {
      throw new LockNotHeldError(environment, holder, current.holder)
    }

    const record: LockRecord = { ...current, prepared_sha256: sha256 }
    await this.store.write(storeKeys.lock(environment), JSON.stringify(record, null, 2) + '\n')
    return record
  }

  /**
   * Remove the lock. Releasing a free environment is not an error.
   *
   * @returns whether a lock record was removed
   */
  async release(environment: Environment): Promise<boolean> {
    return this.store.remove(storeKeys.lock(environment))
  }

  /**
   * Fail fast for read-only runs while a deployment is in flight
   */
  async assertUnlocked(environment: Environment): Promise<void> {
    const existing = await this.status(environment)
    if (existing) {
      throw new EnvironmentLockedError(environment, existing.holder)
    }
  }

  /**
   * Run `fn` while holding the lock; release on every exit path.
   */
  async withLock<T>(
    environment: Environment,
    holder: string,
    fn: (record: LockRecord) => Promise<T>
  ): Promise<T> {
    const record = await this.acquire(environment, holder)
    try {
      return await fn(record)
    } finally {
      await this.release(environment)
    }
  }
}
