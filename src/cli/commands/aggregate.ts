/**
 * `aggregate` Command
 *
 * Reads every domain declaration for an environment and writes the catalog
 * artifacts under catalogs/<env>/. Refuses to run while a deployment holds
 * the environment lock.
 *
 * Usage:
 *   kafkagate aggregate -e dev
 *   kafkagate aggregate -e prod --json
 */

import { toPipelineContext, type CommandContext } from '../context.js'
import { buildCatalog } from '../../domain/pipeline.js'
import { LockManager } from '../../domain/lock.js'
import { writeCatalogArtifacts } from '../../domain/state.js'
import { c, colorEnv, symbols } from '../lib/colors.js'
import * as ui from '../ui.js'

export interface AggregateSummary {
  environment: string
  domains: string[]
  topics: number
  schemas: number
  serviceAccounts: number
  aclGrants: number
  catalog: string
  schemaCatalog: string
}

export async function runAggregate(context: CommandContext): Promise<AggregateSummary> {
  const { environment, store, verbose, jsonOutput } = context

  await new LockManager(store).assertUnlocked(environment)

  ui.log(`${symbols.info} Aggregating declarations for ${colorEnv(environment)}...`)

  const { catalog, schemaCatalog } = await buildCatalog(toPipelineContext(context))
  const keys = await writeCatalogArtifacts(store, catalog, schemaCatalog)

  const summary: AggregateSummary = {
    environment,
    domains: catalog.domains,
    topics: catalog.topics.length,
    schemas: schemaCatalog.schemas.length,
    serviceAccounts: catalog.serviceAccounts.length,
    aclGrants: catalog.aclGrants.length,
    catalog: keys.catalogKey,
    schemaCatalog: keys.schemaCatalogKey
  }

  if (jsonOutput) {
    ui.output(JSON.stringify(summary, null, 2))
    return summary
  }

  for (const domain of catalog.domains) {
    ui.verbose(`domain ${domain}`, verbose)
  }

  ui.log(ui.formatKeyValue([
    ['Domains', String(summary.domains.length)],
    ['Topics', String(summary.topics)],
    ['Schemas', String(summary.schemas)],
    ['Service accounts', String(summary.serviceAccounts)],
    ['ACL grants', String(summary.aclGrants)]
  ]))
  ui.log(`${symbols.success} Wrote ${c.path(summary.catalog)} and ${c.path(summary.schemaCatalog)}`)

  return summary
}
