/**
 * kafkagate CLI - Colors Utility
 *
 * Amber theme: domains and commands in warm tones, status kept semantic.
 *
 * Terminal colors using tuiuiu.js text-utils + ANSI 256 for the palette.
 * Supports NO_COLOR and FORCE_COLOR.
 */

import {
  colorize,
  style,
  styles as tuiStyles
} from 'tuiuiu.js'
import type { Formatter } from 'cli-args-parser'

// Check if colors should be enabled
export const isColorEnabled = (env: NodeJS.ProcessEnv = process.env): boolean => {
  // Respect NO_COLOR standard
  if (env.NO_COLOR !== undefined) return false
  if (env.FORCE_COLOR !== undefined) return true
  return process.stderr.isTTY ?? false
}

const enabled = isColorEnabled()

const color = (text: string, col: string): string => {
  if (!enabled) return text
  return colorize(text, col)
}

const styled = (text: string, ...styleNames: (keyof typeof tuiStyles)[]): string => {
  if (!enabled) return text
  return style(text, ...styleNames)
}

/**
 * Palette (ANSI 256)
 * - 214: Amber      (#FFAF00) — primary, commands
 * - 208: Orange     (#FF8700) — highlights
 * - 179: Sand       (#D7AF5F) — secondary, options
 * - 137: Clay       (#AF875F) — muted accents
 * - 252: Light gray (#D0D0D0) — text
 * - 245: Gray       (#8A8A8A) — muted text
 */
const ansi = {
  bold: (s: string) => enabled ? `\x1b[1m${s}\x1b[22m` : s,
  dim: (s: string) => enabled ? `\x1b[2m${s}\x1b[22m` : s,

  amber: (s: string) => enabled ? `\x1b[38;5;214m${s}\x1b[39m` : s,
  orange: (s: string) => enabled ? `\x1b[38;5;208m${s}\x1b[39m` : s,
  sand: (s: string) => enabled ? `\x1b[38;5;179m${s}\x1b[39m` : s,
  clay: (s: string) => enabled ? `\x1b[38;5;137m${s}\x1b[39m` : s,

  white: (s: string) => enabled ? `\x1b[97m${s}\x1b[39m` : s,
  gray: (s: string) => enabled ? `\x1b[38;5;245m${s}\x1b[39m` : s,
  lightGray: (s: string) => enabled ? `\x1b[38;5;252m${s}\x1b[39m` : s,
}

/**
 * Theme formatter for cli-args-parser help and errors
 */
export const kafkagateFormatter: Formatter = {
  'section-header': s => ansi.bold(ansi.white(s)),

  'program-name': s => ansi.bold(ansi.amber(s)),
  'version': s => ansi.orange(s),
  'description': s => ansi.lightGray(s),

  'command-name': s => ansi.amber(s),
  'command-alias': s => ansi.gray(s),
  'command-description': s => ansi.lightGray(s),

  'option-flag': s => ansi.orange(s),
  'option-type': s => ansi.sand(s),
  'option-default': s => ansi.dim(ansi.clay(s)),
  'option-description': s => ansi.lightGray(s),

  'positional-name': s => ansi.sand(s),

  'error-header': s => styled(color(s, 'red'), 'bold'),
  'error-message': s => color(s, 'red'),
  'error-option': s => ansi.amber(s),
}

// Semantic colors
export const c = {
  command: (text: string) => ansi.bold(ansi.amber(text)),

  domain: (text: string) => ansi.sand(text),
  path: (text: string) => ansi.clay(text),

  envDev: (text: string) => color(text, 'green'),
  envPrd: (text: string) => styled(color(text, 'red'), 'bold'),

  success: (text: string) => color(text, 'green'),
  error: (text: string) => color(text, 'red'),

  added: (text: string) => color(text, 'green'),
  removed: (text: string) => color(text, 'red'),
  modified: (text: string) => color(text, 'yellow'),

  header: (text: string) => ansi.bold(ansi.white(text)),
  bold: (text: string) => ansi.bold(text),
  muted: (text: string) => ansi.dim(text),
}

// Production-like environments stand out
export function colorEnv(env: string): string {
  if (!enabled) return env
  if (env === 'prd' || env === 'prod' || env === 'production') {
    return c.envPrd(env)
  }
  return c.envDev(env)
}

export const symbols = {
  success: enabled ? color('✓', 'green') : '[OK]',
  error: enabled ? color('✗', 'red') : '[ERROR]',
  warning: enabled ? color('⚠', 'yellow') : '[WARN]',
  info: enabled ? ansi.amber('ℹ') : '[INFO]',
  lock: enabled ? '🔒' : '[LOCKED]',
  unlock: enabled ? '🔓' : '[UNLOCKED]',
}

// Status lines go to stderr; stdout carries data only
export const print = {
  error: (msg: string) => console.error(`${symbols.error} ${c.error(msg)}`),
}
