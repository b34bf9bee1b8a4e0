/**
 * Postgres-backed catalog store.
 *
 * Rows are read as jsonb (nulls stripped) and validated with the same zod
 * schemas as every other store. Staging and the published-view swap each run
 * in one transaction.
 */

import { readFile } from 'fs/promises'
import { fileURLToPath } from 'url'
import { dirname, resolve } from 'path'
import { Pool, type PoolConfig } from 'pg'
import { z } from 'zod'
import type { BrandAliasMap } from '@kibble/brand'
import {
  brandAliasMapSchema,
  brandAllowlistSchema,
  mergeDecisionSchema,
  overrideSchema,
  publishedSnapshotSchema,
} from '../records/schema'
import { ReconcileError, toStoreError } from '../errors'
import type { BrandAllowlist, MergeDecision, Override, PublishedSnapshot } from '../types'
import { parseCandidateRows, parseTable } from './records'
import { PUBLISHED_VIEWS, type CandidateBatch, type CatalogStore, type PublishedView, type StagedViews } from './types'

const __dirname = dirname(fileURLToPath(import.meta.url))
export const SCHEMA_FILE = resolve(__dirname, '..', '..', 'sql', 'schema.sql')

/**
 * The slice of pg the store uses. A pg Pool satisfies it.
 */
export interface SqlClient {
  query(text: string, values?: unknown[]): Promise<{ rows: unknown[] }>
}

export interface SqlPoolClient extends SqlClient {
  release(): void
}

export interface SqlPool extends SqlClient {
  connect(): Promise<SqlPoolClient>
  end(): Promise<void>
}

/**
 * Environment variables:
 * - DB_POOL_MAX: Maximum connections (default: 5)
 * - DB_SERVICE_NAME: Application name for pg_stat_activity (default: catalog-reconciler)
 */
export function getPoolConfig(connectionString: string, env: NodeJS.ProcessEnv = process.env): PoolConfig {
  return {
    connectionString,
    max: parseInt(env.DB_POOL_MAX || '5', 10),
    idleTimeoutMillis: 30000,
    connectionTimeoutMillis: 5000,
    keepAlive: true,
    keepAliveInitialDelayMillis: 10000,
    application_name: env.DB_SERVICE_NAME || 'catalog-reconciler',
  }
}

const jsonRowSchema = z.object({ row: z.unknown() })
const versionRowSchema = z.object({ version: z.string().nullable() })

function toCamel(key: string): string {
  return key.replace(/_([a-z0-9])/g, (_, next: string) => next.toUpperCase())
}

/**
 * snake_case column names to the camelCase keys the schemas use.
 */
export function camelizeKeys(value: unknown): Record<string, unknown> {
  const record = z.record(z.unknown()).parse(value)
  return Object.fromEntries(Object.entries(record).map(([key, entry]) => [toCamel(key), entry]))
}

function jsonRows(rows: readonly unknown[]): unknown[] {
  return rows.map((row) => jsonRowSchema.parse(row).row)
}

export class PgCatalogStore implements CatalogStore {
  readonly kind = 'pg'

  constructor(
    private readonly pool: SqlPool,
    private readonly ownsPool = false
  ) {}

  static connect(databaseUrl: string): PgCatalogStore {
    return new PgCatalogStore(new Pool(getPoolConfig(databaseUrl)), true)
  }

  private async query(text: string, values?: unknown[]): Promise<unknown[]> {
    try {
      return (await this.pool.query(text, values)).rows
    } catch (error) {
      throw toStoreError(error, 'Catalog query failed')
    }
  }

  private async transaction(work: (client: SqlClient) => Promise<void>, label: string): Promise<void> {
    const client = await this.pool.connect()
    try {
      await client.query('BEGIN')
      await work(client)
      await client.query('COMMIT')
    } catch (error) {
      await client.query('ROLLBACK')
      throw toStoreError(error, `${label} failed`)
    } finally {
      client.release()
    }
  }

  async ensureSchema(): Promise<void> {
    await this.query(await readFile(SCHEMA_FILE, 'utf8'))
  }

  async readCandidates(watermark: string): Promise<CandidateBatch> {
    const rows = await this.query(
      `SELECT jsonb_strip_nulls(to_jsonb(c)) AS row
         FROM raw_candidates c
        WHERE c.last_seen_at <= $1
        ORDER BY c.source_id, c.last_seen_at`,
      [watermark]
    )
    const batch = parseCandidateRows(jsonRows(rows).map(camelizeKeys))
    return {
      records: batch.records,
      rejected: batch.rejected.map((row) => ({ ...row, source: 'raw_candidates' })),
    }
  }

  async readOverrides(): Promise<Override[]> {
    const rows = await this.query(
      'SELECT jsonb_strip_nulls(to_jsonb(o)) AS row FROM overrides o ORDER BY o.created_at, o.id'
    )
    return parseTable(z.array(overrideSchema), jsonRows(rows).map(camelizeKeys), 'overrides')
  }

  private async latestVersion(table: 'brand_aliases' | 'brand_allowlist'): Promise<string | null> {
    const [row] = await this.query(`SELECT max(version) AS version FROM ${table}`)
    return row === undefined ? null : versionRowSchema.parse(row).version
  }

  async readAliasMap(): Promise<BrandAliasMap | null> {
    const version = await this.latestVersion('brand_aliases')
    if (version === null) return null

    const entries = await this.query(
      `SELECT jsonb_strip_nulls(jsonb_build_object(
                'alias', alias_phrase, 'brandSlug', brand_slug, 'brandLine', brand_line,
                'isDenylisted', is_denylisted, 'displayName', display_name)) AS row
         FROM brand_aliases WHERE version = $1 ORDER BY alias_phrase, brand_slug`,
      [version]
    )
    const splitPatterns = await this.query(
      `SELECT jsonb_strip_nulls(jsonb_build_object(
                'stem', stem, 'fragment', fragment, 'brandSlug', brand_slug, 'brandLine', brand_line)) AS row
         FROM brand_split_patterns WHERE version = $1 ORDER BY stem, fragment`,
      [version]
    )
    const stems = await this.query(
      'SELECT to_jsonb(brand_slug) AS row FROM brand_incomplete_stems WHERE version = $1 ORDER BY brand_slug',
      [version]
    )

    return parseTable(
      brandAliasMapSchema,
      {
        version,
        entries: jsonRows(entries),
        splitPatterns: jsonRows(splitPatterns),
        incompleteStems: jsonRows(stems),
      },
      'brand_aliases'
    )
  }

  async readAllowlist(): Promise<BrandAllowlist> {
    const version = await this.latestVersion('brand_allowlist')
    if (version === null) return { version: 'empty', brands: [] }

    const rows = await this.query(
      `SELECT jsonb_build_object('brandSlug', brand_slug, 'status', status) AS row
         FROM brand_allowlist WHERE version = $1 ORDER BY brand_slug`,
      [version]
    )
    return parseTable(brandAllowlistSchema, { version, brands: jsonRows(rows) }, 'brand_allowlist')
  }

  async readMergeDecisions(): Promise<MergeDecision[]> {
    const rows = await this.query(
      'SELECT jsonb_strip_nulls(to_jsonb(m)) AS row FROM brand_merge_log m ORDER BY m.base_key, m.decided_at'
    )
    return parseTable(z.array(mergeDecisionSchema), jsonRows(rows).map(camelizeKeys), 'brand_merge_log')
  }

  async writeOverride(override: Override): Promise<void> {
    await this.query(
      `INSERT INTO overrides (id, product_key, brand_slug, fields, reason, created_at, revoked_at)
       VALUES ($1, $2, $3, $4, $5, $6, $7)
       ON CONFLICT (id) DO UPDATE SET
         product_key = EXCLUDED.product_key,
         brand_slug = EXCLUDED.brand_slug,
         fields = EXCLUDED.fields,
         reason = EXCLUDED.reason,
         created_at = EXCLUDED.created_at,
         revoked_at = EXCLUDED.revoked_at`,
      [
        override.id,
        override.productKey,
        override.brandSlug,
        JSON.stringify(override.fields),
        override.reason,
        override.createdAt,
        override.revokedAt,
      ]
    )
  }

  async revokeOverride(id: string, revokedAt: string): Promise<Override | null> {
    const rows = await this.query(
      `UPDATE overrides SET revoked_at = $2
        WHERE id = $1 AND revoked_at IS NULL
       RETURNING jsonb_strip_nulls(to_jsonb(overrides)) AS row`,
      [id, revokedAt]
    )
    const [revoked] = parseTable(z.array(overrideSchema), jsonRows(rows).map(camelizeKeys), 'overrides')
    return revoked ?? null
  }

  async writeStaging(runId: string, views: StagedViews): Promise<void> {
    await this.transaction(async (client) => {
      for (const view of PUBLISHED_VIEWS) {
        const snapshot = views[view]
        if (!snapshot) continue
        await client.query(
          `INSERT INTO catalog_snapshots (run_id, view, payload) VALUES ($1, $2, $3)
           ON CONFLICT (run_id, view) DO UPDATE SET payload = EXCLUDED.payload`,
          [runId, view, JSON.stringify(snapshot)]
        )
      }
    }, `Staging run ${runId}`)
  }

  async swapPublished(runId: string, views: readonly PublishedView[]): Promise<void> {
    await this.transaction(async (client) => {
      for (const view of views) {
        const staged = await client.query('SELECT 1 FROM catalog_snapshots WHERE run_id = $1 AND view = $2', [
          runId,
          view,
        ])
        if (staged.rows.length === 0) {
          throw new ReconcileError('STORE_ERROR', `Run ${runId} staged no ${view} view`)
        }
        await client.query(
          `INSERT INTO published_views (view, run_id, published_at) VALUES ($1, $2, now())
           ON CONFLICT (view) DO UPDATE SET run_id = EXCLUDED.run_id, published_at = EXCLUDED.published_at`,
          [view, runId]
        )
      }
    }, `Publishing run ${runId}`)
  }

  async discardStaging(runId: string): Promise<void> {
    await this.query(
      `DELETE FROM catalog_snapshots s
        WHERE s.run_id = $1
          AND NOT EXISTS (SELECT 1 FROM published_views p WHERE p.run_id = s.run_id AND p.view = s.view)`,
      [runId]
    )
  }

  async readPublished(view: PublishedView): Promise<PublishedSnapshot | null> {
    const [payload] = jsonRows(
      await this.query(
        `SELECT s.payload AS row
           FROM published_views p
           JOIN catalog_snapshots s ON s.run_id = p.run_id AND s.view = p.view
          WHERE p.view = $1`,
        [view]
      )
    )
    return payload === undefined ? null : parseTable(publishedSnapshotSchema, payload, `${view} snapshot`)
  }

  async close(): Promise<void> {
    if (this.ownsPool) {
      await this.pool.end()
    }
  }
}
