/**
 * Lock holder identity
 *
 * A holder names the run that owns an environment lock, so whoever finds the
 * lock taken knows which pipeline to look at.
 */

import { execFileSync } from 'node:child_process'
import type { HolderSource } from '../types.js'

export interface DetectHolderOptions {
  env?: NodeJS.ProcessEnv
  /** Reads a git config value; returns '' when unset */
  gitConfig?: (key: string) => string
}

function readGitConfig(key: string): string {
  try {
    // execFileSync keeps the key out of a shell
    return execFileSync('git', ['config', key], {
      encoding: 'utf8',
      stdio: ['pipe', 'pipe', 'pipe']
    }).trim()
  } catch {
    // Git missing, or key not set
    return ''
  }
}

function getUserFromEnv(env: NodeJS.ProcessEnv): string {
  return env.USER || env.USERNAME || 'anonymous'
}

/**
 * CI run identity, or null outside CI
 *
 *   GitHub Actions: "github:<repo>/runs/<id>/attempts/<n>"
 *   GitLab CI:      "gitlab:<project>/pipelines/<id>"
 */
export function detectCiRun(env: NodeJS.ProcessEnv = process.env): string | null {
  if (env.GITHUB_RUN_ID) {
    const repo = env.GITHUB_REPOSITORY || 'unknown'
    const attempt = env.GITHUB_RUN_ATTEMPT || '1'
    return `github:${repo}/runs/${env.GITHUB_RUN_ID}/attempts/${attempt}`
  }
  if (env.CI_PIPELINE_ID) {
    const project = env.CI_PROJECT_PATH || 'unknown'
    return `gitlab:${project}/pipelines/${env.CI_PIPELINE_ID}`
  }
  return null
}

function detectGitUser(gitConfig: (key: string) => string): string | null {
  const name = gitConfig('user.name')
  if (name) return name
  const email = gitConfig('user.email')
  return email || null
}

/**
 * Work out who is taking the lock.
 *
 * Each source falls back to the next: ci → git → env.
 */
export function detectHolder(source: HolderSource = 'ci', options: DetectHolderOptions = {}): string {
  const env = options.env ?? process.env
  const gitConfig = options.gitConfig ?? readGitConfig

  switch (source) {
    case 'ci': {
      const run = detectCiRun(env)
      if (run) return run
      return detectGitUser(gitConfig) ?? getUserFromEnv(env)
    }

    case 'git':
      return detectGitUser(gitConfig) ?? getUserFromEnv(env)

    case 'env':
      return getUserFromEnv(env)
  }
}
