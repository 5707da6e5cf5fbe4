/**
 * Shapes of the files kafkagate reads: domain declarations, stored catalogs
 * and lock records.
 */

import { z } from 'zod'
import { ACCESS_ROLES } from '../types.js'

const ConfigValueSchema = z
  .union([z.string(), z.number(), z.boolean()])
  .transform(value => String(value))

/** Characters Kafka accepts in a topic name */
export const TOPIC_NAME_PATTERN = /^[A-Za-z0-9._-]+$/

const TopicNameSchema = z
  .string()
  .min(1)
  .max(249)
  .regex(TOPIC_NAME_PATTERN, 'topic names may only contain letters, digits, ".", "_" and "-"')

// ============================================================================
// Declaration file (domains/<domain>/<env>/kafka-request.yaml)
// ============================================================================

export const TopicDeclarationSchema = z.object({
  name: TopicNameSchema,
  partitions: z.number().int().positive().default(3),
  replication_factor: z.number().int().positive().default(3),
  config: z.record(z.string(), ConfigValueSchema).default({})
})

export const SchemaDeclarationSchema = z.object({
  subject: z.string().min(1),
  schema_file: z.string().min(1)
})

export const AccessConfigDeclarationSchema = z.object({
  name: z.string().min(1),
  description: z.string().default(''),
  role: z.enum(ACCESS_ROLES),
  topics: z.array(z.string().min(1)).min(1)
})

export const DeclarationFileSchema = z.object({
  service_name: z.string().min(1).optional(),
  description: z.string().default(''),
  topics: z.array(TopicDeclarationSchema).default([]),
  schemas: z.array(SchemaDeclarationSchema).default([]),
  access_config: z.array(AccessConfigDeclarationSchema).default([])
})

export type DeclarationFile = z.infer<typeof DeclarationFileSchema>

// ============================================================================
// Catalog file (catalogs/<env>/kafka-catalog.yaml)
// ============================================================================

export const CatalogFileSchema = z.object({
  environment: z.string().min(1),
  domains: z.array(z.string()),
  topics: z.array(z.object({
    name: TopicNameSchema,
    domain: z.string().min(1),
    partitions: z.number().int().positive(),
    replication_factor: z.number().int().positive(),
    config: z.record(z.string(), ConfigValueSchema)
  })),
  schemas: z.array(z.object({
    subject: z.string().min(1),
    domain: z.string().min(1),
    schema_file: z.string().min(1)
  })),
  service_accounts: z.array(z.object({
    name: z.string().min(1),
    domain: z.string().min(1),
    description: z.string()
  })),
  acls: z.array(z.object({
    account: z.string().min(1),
    topic: z.string().min(1),
    role: z.enum(ACCESS_ROLES),
    domain: z.string().min(1)
  }))
})

export type CatalogFile = z.infer<typeof CatalogFileSchema>

// ============================================================================
// Schema catalog file (catalogs/<env>/schemas-catalog.json)
// ============================================================================

export const SchemaCatalogFileSchema = z.object({
  environment: z.string().min(1),
  schemas: z.array(z.object({
    subject: z.string().min(1),
    domain: z.string().min(1),
    file_path: z.string().min(1),
    file_name: z.string().min(1),
    sha256: z.string().regex(/^[0-9a-f]{64}$/)
  }))
})

export type SchemaCatalogFile = z.infer<typeof SchemaCatalogFileSchema>

// ============================================================================
// Lock record (catalogs/<env>/.lock.json)
// ============================================================================

export const LockRecordSchema = z.object({
  environment: z.string().min(1),
  holder: z.string().min(1),
  acquired_at: z.string().min(1),
  prepared_sha256: z.string().regex(/^[0-9a-f]{64}$/).optional()
})
