import { afterEach, beforeEach, describe, expect, it, vi, type MockInstance } from 'vitest'
import { readFileSync } from 'fs'
import { loadSettings } from '../../config/settings'
import { MemoryCatalogStore, type MemoryStoreSeed } from '../../store/memory-store'
import { PgCatalogStore, SCHEMA_FILE, type SqlPool, type SqlPoolClient } from '../../store/pg-store'
import { MemoryRunLease } from '../../lease/run-lease'
import { ReconcileError } from '../../errors'
import { closeCommandContext, openCommandContext, withDataDir, type CommandContext } from '../context'
import { runReconcileCommand } from '../commands/reconcile'
import { runGuardsCommand } from '../commands/guards'
import { runCanonicalizeCommand } from '../commands/canonicalize'
import { runOverrideRevokeCommand, runOverrideSetCommand } from '../commands/override'
import { runSchemaApplyCommand } from '../commands/schema'

const listing = (sourceId: string, brandRaw: string, productNameRaw: string) => ({
  sourceId,
  sourceDomain: sourceId.split('/')[0],
  brandRaw,
  productNameRaw,
  formRaw: 'dry',
  firstSeenAt: '2026-09-01T00:00:00Z',
  lastSeenAt: '2026-09-10T00:00:00Z',
})

function context(seed: MemoryStoreSeed = {}): CommandContext & { store: MemoryCatalogStore; lease: MemoryRunLease } {
  return {
    settings: loadSettings({}),
    store: new MemoryCatalogStore({
      candidates: [listing('shop-a.example/rc-adult', 'Royal Canin', 'Adult')],
      allowlist: { version: '2026-10-01', brands: [{ brandSlug: 'royal_canin', status: 'ACTIVE' }] },
      ...seed,
    }),
    lease: new MemoryRunLease(),
    now: () => new Date('2026-09-15T00:00:00Z'),
  }
}

let logSpy: MockInstance<typeof console.log>
let errorSpy: MockInstance<typeof console.error>

beforeEach(() => {
  logSpy = vi.spyOn(console, 'log').mockImplementation(() => undefined)
  errorSpy = vi.spyOn(console, 'error').mockImplementation(() => undefined)
  vi.spyOn(console, 'warn').mockImplementation(() => undefined)
})

afterEach(() => {
  vi.restoreAllMocks()
})

function printed(spy: MockInstance<typeof console.log>): string[] {
  return spy.mock.calls.map((call) => String(call[0]))
}

describe('reconcile command', () => {
  it('exits 0 after a clean run', async () => {
    const ctx = context()

    expect(await runReconcileCommand({ runId: 'run-1' }, ctx)).toBe(0)
    expect(printed(logSpy)[0]).toBe('Run run-1: PUBLISHED (watermark 2026-09-15T00:00:00.000Z)')
    expect((await ctx.store.readPublished('production'))?.products).toHaveLength(1)
  })

  it('exits 1 when a guard blocks promotion', async () => {
    const ctx = context({
      candidates: [
        listing('shop-a.example/rc-adult', 'Royal Canin', 'Adult'),
        listing('shop-d.example/royal-kitten', 'Royal', 'Kitten'),
      ],
    })

    expect(await runReconcileCommand({}, ctx)).toBe(1)
    expect(ctx.store.published.size).toBe(0)
  })

  it('exits 0 when another run holds the lease', async () => {
    const ctx = context()
    await ctx.lease.acquire('run-lease:catalog')

    expect(await runReconcileCommand({}, ctx)).toBe(0)
    expect(ctx.store.published.size).toBe(0)
  })

  it('rejects a bad shard count as a usage error', async () => {
    expect(await runReconcileCommand({ shards: Number.NaN }, context())).toBe(2)
    expect(printed(errorSpy)).toEqual(['--shards must be a positive integer'])
  })
})

describe('guards command', () => {
  it('reports a passing preview', async () => {
    const ctx = context()
    await runReconcileCommand({ runId: 'run-1' }, ctx)
    logSpy.mockClear()

    expect(await runGuardsCommand(ctx)).toBe(0)
    const report: unknown = JSON.parse(printed(logSpy)[0])
    expect(report).toMatchObject({
      runId: 'run-1',
      status: 'PASS',
      guards: [
        { guard_name: 'ORPHAN_FRAGMENT', violation_count: 0, sample_violations: [] },
        { guard_name: 'INCOMPLETE_SLUG', violation_count: 0, sample_violations: [] },
        { guard_name: 'SPLIT_BRAND', violation_count: 0, sample_violations: [] },
        { guard_name: 'KEY_COLLISION', violation_count: 0, sample_violations: [] },
      ],
    })
  })

  it('exits 1 without a published preview', async () => {
    expect(await runGuardsCommand(context())).toBe(1)
  })
})

describe('canonicalize command', () => {
  it('repairs a split brand with the shipped alias map', async () => {
    expect(await runCanonicalizeCommand({ brand: 'Royal', name: 'Canin Adult' }, context())).toBe(0)

    expect(JSON.parse(printed(logSpy)[0])).toEqual({
      aliasMapVersion: '2026-10-01',
      brandSlug: 'royal_canin',
      brandLine: null,
      brand: 'Royal Canin',
      cleanedProductName: 'Adult',
      confidence: 'medium',
      matchedAlias: 'royal canin',
      splitRepaired: true,
    })
  })

  it('needs a product name', async () => {
    expect(await runCanonicalizeCommand({ brand: 'Acana', name: '' }, context())).toBe(2)
  })
})

describe('override commands', () => {
  it('sets and revokes an override', async () => {
    const ctx = context()

    const setCode = await runOverrideSetCommand(
      { id: 'ovr-1', productKey: 'royal_canin::adult::dry', fields: '{"kcalPer100g": 365}', reason: 'label photo' },
      ctx
    )
    expect(setCode).toBe(0)
    expect(ctx.store.overrides.map((override) => override.id)).toEqual(['ovr-1'])

    expect(await runOverrideRevokeCommand({ id: 'ovr-1' }, ctx)).toBe(0)
    expect(printed(logSpy).at(-1)).toBe('Revoked ovr-1 at 2026-09-15T00:00:00.000Z')
    expect(await runOverrideRevokeCommand({ id: 'ovr-1' }, ctx)).toBe(1)
  })

  it('treats malformed input as a usage error', async () => {
    const ctx = context()

    expect(await runOverrideSetCommand({ brandSlug: 'acana', fields: '{kcal', reason: 'typo' }, ctx)).toBe(2)
    expect(
      await runOverrideSetCommand({ brandSlug: 'acana', fields: '{"colour": "red"}', reason: 'typo' }, ctx)
    ).toBe(2)
    expect(await runOverrideRevokeCommand({ id: '' }, ctx)).toBe(2)
    expect(ctx.store.overrides).toEqual([])
  })
})

describe('schema:apply command', () => {
  class RecordingPool implements SqlPool {
    readonly statements: string[] = []

    async query(text: string): Promise<{ rows: unknown[] }> {
      this.statements.push(text)
      return { rows: [] }
    }

    async connect(): Promise<SqlPoolClient> {
      return { query: (text) => this.query(text), release: () => undefined }
    }

    async end(): Promise<void> {}
  }

  it('runs the schema file against the Postgres store', async () => {
    const pool = new RecordingPool()
    const ctx: CommandContext = { ...context(), store: new PgCatalogStore(pool) }

    expect(await runSchemaApplyCommand(ctx)).toBe(0)
    expect(pool.statements).toEqual([readFileSync(SCHEMA_FILE, 'utf8')])
    expect(printed(logSpy)).toEqual([`Applied ${SCHEMA_FILE}`])
  })

  it('refuses stores without a schema', async () => {
    expect(await runSchemaApplyCommand(context())).toBe(2)
    expect(printed(errorSpy)).toEqual(['schema:apply needs CATALOG_STORE=pg (current store: memory)'])
  })
})

describe('withDataDir', () => {
  it('redirects only the file store', () => {
    const settings = loadSettings({})
    expect(withDataDir(settings, '/tmp/catalog').store).toEqual({ kind: 'file', dataDir: '/tmp/catalog' })
    expect(withDataDir(settings, undefined)).toBe(settings)

    const pg = loadSettings({ CATALOG_STORE: 'pg', DATABASE_URL: 'postgres://localhost/catalog' })
    expect(withDataDir(pg, '/tmp/catalog').store).toEqual({ kind: 'pg', databaseUrl: 'postgres://localhost/catalog' })
  })
})

describe('openCommandContext', () => {
  const memoryLease = loadSettings({ CATALOG_LEASE: 'memory', CATALOG_DATA_DIR: '/tmp/catalog' })

  it('refuses the in-process lease for commands that write a shared store', () => {
    expect(() => openCommandContext(memoryLease, { writes: true })).toThrow(ReconcileError)
    expect(() => openCommandContext(memoryLease, { writes: true })).toThrow(
      'CATALOG_LEASE=memory cannot guard a shared file store; set CATALOG_LEASE=redis'
    )
  })

  it('opens read-only commands without a Redis lease', async () => {
    const ctx = openCommandContext(memoryLease, { writes: false })

    expect(ctx.store.kind).toBe('file')
    expect(ctx.lease.kind).toBe('memory')
    await closeCommandContext(ctx)
  })
})
