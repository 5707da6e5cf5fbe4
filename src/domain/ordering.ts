/**
 * Code-point string comparison.
 *
 * Used for every ordering that ends up in an artifact, so output never
 * depends on the host locale.
 */
export function compareStrings(a: string, b: string): number {
  if (a < b) return -1
  if (a > b) return 1
  return 0
}

/**
 * Compare by a list of string keys, left to right
 */
export function compareBy<T>(...keys: Array<(item: T) => string>): (a: T, b: T) => number {
  return (a, b) => {
    for (const key of keys) {
      const result = compareStrings(key(a), key(b))
      if (result !== 0) return result
    }
    return 0
  }
}

/**
 * Copy a record with its keys in code-point order
 */
export function sortRecord<V>(record: Record<string, V>): Record<string, V> {
  const sorted: Record<string, V> = {}
  for (const key of Object.keys(record).sort(compareStrings)) {
    sorted[key] = record[key]
  }
  return sorted
}
