/**
 * CLI UI utilities - TTY-aware output
 *
 * - TTY (interactive): status lines and colors on stderr
 * - Pipe: data only on stdout, errors and warnings still on stderr
 */

// Detect if running in interactive terminal
export const isTTY = process.stdout.isTTY ?? false

let quiet = false

/**
 * Suppress non-essential output (errors and warnings are still shown)
 */
export function setQuiet(value: boolean): void {
  quiet = value
}

/**
 * Output data to stdout (for pipes)
 * This is the ONLY function that should write to stdout for data
 */
export function output(data: string): void {
  process.stdout.write(data + '\n')
}

/**
 * Log message to stderr (doesn't interfere with pipes)
 */
export function log(message: string): void {
  if (isTTY && !quiet) {
    console.error(message)
  }
}

/**
 * Log verbose message (only with the verbose flag)
 */
export function verbose(message: string, enabled: boolean): void {
  if (enabled && !quiet) {
    console.error(`[kafkagate] ${message}`)
  }
}

/**
 * Format key-value pairs
 */
export function formatKeyValue(pairs: Array<[string, string]>, separator = ':'): string {
  if (!isTTY) {
    return pairs.map(([k, v]) => `${k}${separator} ${v}`).join('\n')
  }

  const maxKeyLen = Math.max(...pairs.map(([k]) => k.length))
  return pairs
    .map(([k, v]) => `${k.padEnd(maxKeyLen)} ${separator} ${v}`)
    .join('\n')
}
