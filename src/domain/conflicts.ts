/**
 * Conflict Validator
 *
 * Flags every resource name claimed by more than one domain, either within
 * the fresh catalog or between the fresh catalog and the deployed baseline.
 * Read-only; returns the full conflict set in one pass.
 */

import type { Catalog, Conflict, ResourceKind } from '../types.js'
import { NamingConflictError } from '../lib/errors.js'
import { compareStrings } from './ordering.js'

const KIND_ORDER: ResourceKind[] = ['topic', 'schema', 'service-account']

interface Owned {
  name: string
  domain: string
}

function resourcesOf(catalog: Catalog, kind: ResourceKind): Owned[] {
  switch (kind) {
    case 'topic':
      return catalog.topics.map(t => ({ name: t.name, domain: t.domain }))
    case 'schema':
      return catalog.schemas.map(s => ({ name: s.subject, domain: s.domain }))
    case 'service-account':
      return catalog.serviceAccounts.map(a => ({ name: a.name, domain: a.domain }))
  }
}

function ownersByName(resources: Owned[]): Map<string, Set<string>> {
  const owners = new Map<string, Set<string>>()
  for (const { name, domain } of resources) {
    const set = owners.get(name) ?? new Set<string>()
    set.add(domain)
    owners.set(name, set)
  }
  return owners
}

/**
 * Compute all naming conflicts of `current` against itself and `baseline`.
 *
 * Only names present in `current` are checked: a name that disappears from
 * the catalog is a deletion, not a collision.
 */
export function validateConflicts(current: Catalog, baseline: Catalog | null): Conflict[] {
  const conflicts: Conflict[] = []

  for (const kind of KIND_ORDER) {
    const currentOwners = ownersByName(resourcesOf(current, kind))
    const baselineOwners = baseline ? ownersByName(resourcesOf(baseline, kind)) : new Map<string, Set<string>>()

    const names = [...currentOwners.keys()].sort(compareStrings)
    for (const name of names) {
      const owners = new Set(currentOwners.get(name))
      const deployed = [...(baselineOwners.get(name) ?? [])].sort(compareStrings)
      for (const domain of deployed) owners.add(domain)

      if (owners.size <= 1) continue

      conflicts.push({
        kind,
        name,
        domains: [...owners].sort(compareStrings),
        ...(deployed.length > 0 ? { baselineDomain: deployed[0] } : {})
      })
    }
  }

  return conflicts
}

/**
 * Throw NamingConflictError carrying every conflict, if there are any.
 */
export function assertNoConflicts(environment: string, conflicts: Conflict[]): void {
  if (conflicts.length > 0) {
    throw new NamingConflictError(environment, conflicts)
  }
}
