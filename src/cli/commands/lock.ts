/**
 * `lock` Command Group
 *
 *   kafkagate lock status -e prod
 *   kafkagate lock acquire -e prod [--holder <id>]
 *   kafkagate lock release -e prod
 *
 * Locks never expire; `release` is how a stuck lock is cleared.
 */

import type { LockRecord } from '../../types.js'
import { resolveHolder, type CommandContext } from '../context.js'
import { LockManager } from '../../domain/lock.js'
import { UsageError } from '../../lib/errors.js'
import { c, colorEnv, symbols } from '../lib/colors.js'
import * as ui from '../ui.js'

export type LockCommandResult =
  | { action: 'status'; lock: LockRecord | null }
  | { action: 'acquire'; lock: LockRecord }
  | { action: 'release'; released: boolean }

export async function runLockGroup(context: CommandContext): Promise<LockCommandResult> {
  const { args, environment, store, jsonOutput } = context
  const locks = new LockManager(store)
  const subcommand = args._[0]

  switch (subcommand) {
    case 'status':
    case undefined: {
      const lock = await locks.status(environment)
      if (jsonOutput) {
        ui.output(JSON.stringify({ environment, locked: lock !== null, lock }, null, 2))
      } else if (lock) {
        ui.output(`${symbols.lock} ${environment} locked by ${lock.holder} since ${lock.acquired_at}`)
      } else {
        ui.output(`${symbols.unlock} ${environment} is free`)
      }
      return { action: 'status', lock }
    }

    case 'acquire': {
      const lock = await locks.acquire(environment, resolveHolder(context))
      if (jsonOutput) {
        ui.output(JSON.stringify(lock, null, 2))
      }
      ui.log(`${symbols.success} Locked ${colorEnv(environment)} for ${c.bold(lock.holder)}`)
      return { action: 'acquire', lock }
    }

    case 'release': {
      const released = await locks.release(environment)
      if (jsonOutput) {
        ui.output(JSON.stringify({ environment, released }, null, 2))
      }
      ui.log(released
        ? `${symbols.success} Released lock on ${colorEnv(environment)}`
        : `${symbols.info} ${colorEnv(environment)} was not locked`)
      return { action: 'release', released }
    }

    default:
      throw new UsageError(
        `Unknown lock subcommand: ${subcommand}`,
        'Use one of: status, acquire, release'
      )
  }
}
