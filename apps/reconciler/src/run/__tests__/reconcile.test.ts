import { describe, it, expect } from 'vitest'
import { reconcile, type ReconcileOptions } from '../reconcile'
import { MemoryCatalogStore, type MemoryStoreSeed } from '../../store/memory-store'
import type { StagedViews } from '../../store/types'
import { MemoryRunLease } from '../../lease/run-lease'
import { overrideSchema } from '../../records/schema'
import { ReconcileError } from '../../errors'
import type { BrandAllowlist, RawCandidateInput } from '../../types'

const WATERMARK = '2026-09-15T00:00:00.000Z'

const options: ReconcileOptions = {
  runId: 'run-1',
  watermark: WATERMARK,
  now: () => new Date('2026-09-15T00:05:00Z'),
}

const allowlist: BrandAllowlist = {
  version: '2026-10-01',
  brands: [
    { brandSlug: 'royal_canin', status: 'ACTIVE' },
    { brandSlug: 'acana', status: 'PAUSED' },
  ],
}

function row(input: Partial<RawCandidateInput> & { sourceId: string }) {
  return {
    sourceDomain: input.sourceId.split('/')[0],
    firstSeenAt: '2026-09-01T00:00:00Z',
    lastSeenAt: '2026-09-10T00:00:00Z',
    ...input,
  }
}

const feed = [
  row({
    sourceId: 'shop-a.example/rc-adult',
    brandRaw: 'Royal Canin',
    productNameRaw: 'Adult',
    formRaw: 'dry',
    kcalPer100g: 365,
    price: 45,
    packSizes: ['10kg'],
  }),
  row({
    sourceId: 'shop-b.example/rc-adult',
    brandRaw: 'Royal',
    productNameRaw: 'Canin Adult',
    formRaw: 'dry',
    price: 40,
    packSizes: ['10kg'],
    lastSeenAt: '2026-09-11T00:00:00Z',
  }),
  row({ sourceId: 'shop-a.example/acana-heritage', brandRaw: 'Acana', productNameRaw: 'Heritage', formRaw: 'dry' }),
  row({
    sourceId: 'shop-c.example/acana-puppy',
    brandRaw: 'Acana',
    productNameRaw: 'Puppy',
    formRaw: 'dry',
    lastSeenAt: '2026-09-20T00:00:00Z',
  }),
  { sourceId: 'shop-c.example/broken', sourceDomain: 'shop-c.example' },
]

const incompleteBrand = row({
  sourceId: 'shop-d.example/royal-kitten',
  brandRaw: 'Royal',
  productNameRaw: 'Kitten',
  formRaw: 'dry',
})

const chickenCollision = [
  row({
    sourceId: 'shop-a.example/classic-chicken',
    brandRaw: 'Acana',
    productNameRaw: 'Classic Chicken Recipe',
    kcalPer100g: 380,
  }),
  row({ sourceId: 'shop-b.example/chicken-formula', brandRaw: 'Acana', productNameRaw: 'Chicken Formula' }),
]

function setup(seed: MemoryStoreSeed = {}) {
  const store = new MemoryCatalogStore({ candidates: feed, allowlist, ...seed })
  const lease = new MemoryRunLease()
  return { store, lease }
}

class AbortingStore extends MemoryCatalogStore {
  constructor(
    seed: MemoryStoreSeed,
    private readonly controller: AbortController
  ) {
    super(seed)
  }

  async writeStaging(runId: string, views: StagedViews): Promise<void> {
    await super.writeStaging(runId, views)
    this.controller.abort()
  }
}

describe('reconcile', () => {
  it('publishes preview and promotes ACTIVE brands', async () => {
    const deps = setup()

    const result = await reconcile(deps, options)

    expect(result.status).toBe('PUBLISHED')
    expect(result.products.map((product) => product.productKey)).toEqual([
      'acana::heritage::dry',
      'royal_canin::adult::dry',
    ])
    expect(result.production?.map((product) => product.productKey)).toEqual(['royal_canin::adult::dry'])
    expect(result.stats).toMatchObject({ recordsRead: 3, recordsRejected: 1, baseKeys: 2, products: 2 })
    expect(result.issues.map((issue) => [issue.code, issue.sourceId])).toEqual([
      ['INVALID_RECORD', 'shop-c.example/broken'],
    ])

    const production = await deps.store.readPublished('production')
    expect(production?.runId).toBe('run-1')
    expect(production?.generatedAt).toBe('2026-09-15T00:05:00.000Z')
    expect(production?.products.map((product) => product.productKey)).toEqual(['royal_canin::adult::dry'])
    expect((await deps.store.readPublished('preview'))?.products).toHaveLength(2)
    expect(deps.lease.isLocked('run-lease:catalog')).toBe(false)
  })

  it('merges a split-brand listing into the repaired product', async () => {
    const result = await reconcile(setup(), options)
    const royalCanin = result.products.find((product) => product.brandSlug === 'royal_canin')

    expect(royalCanin?.sources.map((source) => source.sourceId).sort()).toEqual([
      'shop-a.example/rc-adult',
      'shop-b.example/rc-adult',
    ])
    expect(royalCanin?.productName).toBe('Adult')
  })

  it('gives the same catalog for any input order and shard count', async () => {
    const rows = [...feed, incompleteBrand, ...chickenCollision]
    const first = await reconcile(setup({ candidates: rows }), { ...options, shards: 1, publishMode: 'preview-only' })
    const second = await reconcile(setup({ candidates: [...rows].reverse() }), {
      ...options,
      shards: 3,
      publishMode: 'preview-only',
    })

    expect(second.products).toEqual(first.products)
    expect(second.guardReport).toEqual(first.guardReport)
    expect(second.reviewQueue).toEqual(first.reviewQueue)
    expect(second.brandQuality).toEqual(first.brandQuality)
  })

  it('applies overrides in effect at the watermark and reports conflicts', async () => {
    const override = (input: { id: string; productKey: string; createdAt: string; kcal: number }) =>
      overrideSchema.parse({
        id: input.id,
        productKey: input.productKey,
        fields: { kcalPer100g: input.kcal },
        reason: 'label photo',
        createdAt: input.createdAt,
      })
    const deps = setup({
      overrides: [
        override({ id: 'ovr-1', productKey: 'acana::heritage::dry', createdAt: '2026-09-12T00:00:00Z', kcal: 371 }),
        override({ id: 'ovr-2', productKey: 'acana::gone::dry', createdAt: '2026-09-12T00:00:00Z', kcal: 400 }),
        override({ id: 'ovr-3', productKey: 'royal_canin::adult::dry', createdAt: '2026-09-20T00:00:00Z', kcal: 999 }),
      ],
    })

    const result = await reconcile(deps, options)
    const byKey = new Map(result.products.map((product) => [product.productKey, product]))

    expect(byKey.get('acana::heritage::dry')?.kcalPer100g).toBe(371)
    expect(byKey.get('acana::heritage::dry')?.provenance.kcalPer100g).toEqual({
      kind: 'override',
      overrideId: 'ovr-1',
      reason: 'label photo',
    })
    expect(byKey.get('royal_canin::adult::dry')?.kcalPer100g).toBe(365)
    expect(result.issues.filter((issue) => issue.code === 'OVERRIDE_CONFLICT').map((issue) => issue.overrideId)).toEqual([
      'ovr-2',
    ])
    expect(result.stats.overrideConflicts).toBe(1)
  })

  it('keeps colliding names apart and queues them for review', async () => {
    const result = await reconcile(setup({ candidates: chickenCollision }), { ...options, publishMode: 'preview-only' })

    expect(result.products.map((product) => product.productKey)).toEqual([
      'acana::chicken::any',
      'acana::chicken::any#2',
    ])
    expect(result.reviewQueue.map((item) => item.baseKey)).toEqual(['acana::chicken::any'])
    expect(result.issues.map((issue) => issue.code)).toEqual(['KEY_COLLISION_DETECTED', 'GUARD_VIOLATION'])
    expect(result.status).toBe('PREVIEW_ONLY')
  })

  it('keeps dog and cat recipes as separate products', async () => {
    const speciesPair = [
      row({ sourceId: 'shop-a.example/rc-dog', brandRaw: 'Royal Canin', productNameRaw: 'Adult Dog Chicken', formRaw: 'dry' }),
      row({ sourceId: 'shop-b.example/rc-cat', brandRaw: 'Royal Canin', productNameRaw: 'Adult Cat Chicken', formRaw: 'dry' }),
    ]

    const result = await reconcile(setup({ candidates: speciesPair }), options)

    expect(result.products.map((product) => product.productKey)).toEqual([
      'royal_canin::adult-cat-chicken::dry',
      'royal_canin::adult-dog-chicken::dry',
    ])
    expect(result.reviewQueue).toEqual([])
    expect(result.status).toBe('PUBLISHED')
  })

  it('publishes a split approved in the merge log', async () => {
    const result = await reconcile(
      setup({
        candidates: chickenCollision,
        mergeDecisions: [
          { baseKey: 'acana::chicken::any', decision: 'SPLIT', approved: true, reason: 'different recipes', decidedAt: null },
        ],
      }),
      options
    )

    expect(result.status).toBe('PUBLISHED')
    expect(result.reviewQueue).toEqual([])
    expect(result.stats.collisions).toBe(1)
  })

  it('publishes nothing in strict mode when a guard fails', async () => {
    const deps = setup({ candidates: [...feed, incompleteBrand] })

    const result = await reconcile(deps, options)

    expect(result.status).toBe('BLOCKED')
    expect(result.guardReport?.guards.map((guard) => [guard.guardName, guard.violationCount])).toEqual([
      ['ORPHAN_FRAGMENT', 0],
      ['INCOMPLETE_SLUG', 1],
      ['SPLIT_BRAND', 0],
      ['KEY_COLLISION', 0],
    ])
    expect(result.issues.filter((issue) => issue.code === 'ALIAS_UNRESOLVED').map((issue) => issue.brandSlug)).toEqual([
      'royal',
    ])
    expect(deps.store.staging.size).toBe(0)
    expect(deps.store.published.size).toBe(0)
  })

  it('publishes only preview in preview-only mode when a guard fails', async () => {
    const deps = setup({ candidates: [...feed, incompleteBrand] })

    const result = await reconcile(deps, { ...options, publishMode: 'preview-only' })

    expect(result.status).toBe('PREVIEW_ONLY')
    expect(result.production).toBeNull()
    expect((await deps.store.readPublished('preview'))?.products).toHaveLength(3)
    expect(await deps.store.readPublished('production')).toBeNull()
  })

  it('writes nothing on a dry run', async () => {
    const deps = setup()

    const result = await reconcile(deps, { ...options, dryRun: true })

    expect(result.status).toBe('DRY_RUN')
    expect(result.production).toHaveLength(1)
    expect(deps.store.staging.size).toBe(0)
    expect(deps.store.published.size).toBe(0)
  })

  it('skips the run while another run holds the lease', async () => {
    const deps = setup()
    await deps.lease.acquire('run-lease:catalog')

    const result = await reconcile(deps, options)

    expect(result.status).toBe('SKIPPED')
    expect(result.issues.map((issue) => issue.code)).toEqual(['SNAPSHOT_RACE'])
    expect(deps.store.staging.size).toBe(0)
    expect(deps.store.published.size).toBe(0)
  })

  it('leaves published views untouched when aborted before the swap', async () => {
    const controller = new AbortController()
    const store = new AbortingStore({ candidates: feed, allowlist }, controller)
    const lease = new MemoryRunLease()

    const error = await reconcile({ store, lease }, { ...options, signal: controller.signal }).catch(
      (caught: unknown) => caught
    )

    expect(error).toBeInstanceOf(ReconcileError)
    expect(error).toMatchObject({ code: 'RUN_ABORTED' })
    expect(store.published.size).toBe(0)
    expect(store.staging.size).toBe(0)
    expect(lease.isLocked('run-lease:catalog')).toBe(false)
  })

  it('rejects an unparseable watermark', async () => {
    await expect(reconcile(setup(), { ...options, watermark: 'yesterday' })).rejects.toMatchObject({
      code: 'CONFIGURATION_ERROR',
    })
  })
})
