/**
 * Reconciler settings, parsed from the environment with zod.
 *
 * Environment variables:
 * - CATALOG_STORE: file | pg (default: file)
 * - CATALOG_DATA_DIR: directory of the file store (default: ./catalog)
 * - DATABASE_URL: required when CATALOG_STORE=pg
 * - CATALOG_LEASE: redis | memory (default: redis; the CLI refuses memory for writing commands)
 * - REDIS_URL or REDIS_HOST/REDIS_PORT/REDIS_PASSWORD: used when CATALOG_LEASE=redis
 * - RECONCILE_SHARDS: key shards processed independently (default: 4)
 * - RECONCILE_LEASE_TTL_MS: run lease TTL (default: 120000)
 * - PUBLISH_MODE: strict | preview-only (default: strict)
 * - KEY_COLLISION_THRESHOLD: name similarity below which a key is split (default: 0.5)
 * - KEY_STRIP_SINGLE_SIZES: strip "2kg"-style tokens from name slugs (default: false)
 * - PRICE_BUCKET_LOW_MAX / PRICE_BUCKET_MID_MAX: price-per-kg bucket bounds (default: 5 / 15)
 */

import { z } from 'zod'
import { ReconcileError } from '../errors'
import type { PriceBucketThresholds, PublishMode } from '../types'

const booleanFlag = z
  .enum(['true', 'false', '1', '0', 'yes', 'no'])
  .default('false')
  .transform((value) => value === 'true' || value === '1' || value === 'yes')

export const settingsSchema = z
  .object({
    CATALOG_STORE: z.enum(['file', 'pg']).default('file'),
    CATALOG_DATA_DIR: z.string().min(1).default('./catalog'),
    DATABASE_URL: z.string().url().optional(),
    CATALOG_LEASE: z.enum(['redis', 'memory']).default('redis'),
    RECONCILE_SHARDS: z.coerce.number().int().min(1).max(64).default(4),
    RECONCILE_LEASE_TTL_MS: z.coerce.number().int().min(1_000).default(120_000),
    PUBLISH_MODE: z.enum(['strict', 'preview-only']).default('strict'),
    KEY_COLLISION_THRESHOLD: z.coerce.number().min(0).max(1).default(0.5),
    KEY_STRIP_SINGLE_SIZES: booleanFlag,
    PRICE_BUCKET_LOW_MAX: z.coerce.number().positive().default(5),
    PRICE_BUCKET_MID_MAX: z.coerce.number().positive().default(15),
  })
  .superRefine((env, ctx) => {
    if (env.CATALOG_STORE === 'pg' && !env.DATABASE_URL) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['DATABASE_URL'],
        message: 'DATABASE_URL is required when CATALOG_STORE=pg',
      })
    }
    if (env.PRICE_BUCKET_LOW_MAX > env.PRICE_BUCKET_MID_MAX) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['PRICE_BUCKET_LOW_MAX'],
        message: 'PRICE_BUCKET_LOW_MAX must not exceed PRICE_BUCKET_MID_MAX',
      })
    }
  })

export interface Settings {
  store: { kind: 'file'; dataDir: string } | { kind: 'pg'; databaseUrl: string }
  lease: 'redis' | 'memory'
  shards: number
  leaseTtlMs: number
  publishMode: PublishMode
  collisionThreshold: number
  stripSingleSizes: boolean
  priceBuckets: PriceBucketThresholds
}

/**
 * Parse settings from an environment. Throws CONFIGURATION_ERROR listing every bad variable.
 */
export function loadSettings(env: NodeJS.ProcessEnv = process.env): Settings {
  const parsed = settingsSchema.safeParse(env)
  if (!parsed.success) {
    const problems = parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`)
    throw new ReconcileError('CONFIGURATION_ERROR', `Invalid settings: ${problems.join('; ')}`, {
      cause: parsed.error,
      details: { problems },
    })
  }

  const values = parsed.data
  const store: Settings['store'] =
    values.CATALOG_STORE === 'pg' && values.DATABASE_URL
      ? { kind: 'pg', databaseUrl: values.DATABASE_URL }
      : { kind: 'file', dataDir: values.CATALOG_DATA_DIR }

  return {
    store,
    lease: values.CATALOG_LEASE,
    shards: values.RECONCILE_SHARDS,
    leaseTtlMs: values.RECONCILE_LEASE_TTL_MS,
    publishMode: values.PUBLISH_MODE,
    collisionThreshold: values.KEY_COLLISION_THRESHOLD,
    stripSingleSizes: values.KEY_STRIP_SINGLE_SIZES,
    priceBuckets: {
      lowMax: values.PRICE_BUCKET_LOW_MAX,
      midMax: values.PRICE_BUCKET_MID_MAX,
    },
  }
}
