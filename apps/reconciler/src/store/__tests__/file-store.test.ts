import { describe, it, expect, beforeEach, afterEach } from 'vitest'
import { mkdtemp, readdir, rm, writeFile } from 'fs/promises'
import { tmpdir } from 'os'
import { join } from 'path'
import { FileCatalogStore, csvRowToCandidate, parseCsvFeed, parseJsonFeed, parseJsonLinesFeed } from '../file-store'
import { overrideSchema } from '../../records/schema'
import { ReconcileError } from '../../errors'
import { canonical, snapshot } from '../../__tests__/fixtures'

const CSV_HEADER = 'sourceId,sourceDomain,brandRaw,productNameRaw,kcalPer100g,packSizes,availableCountries,imageUrl,firstSeenAt,lastSeenAt'

describe('csvRowToCandidate', () => {
  it('splits list cells and nulls empty cells', () => {
    expect(
      csvRowToCandidate({ sourceId: 'shop-a.example/rc', kcalPer100g: '365', packSizes: '2kg | 12kg', imageUrl: '' })
    ).toEqual({ sourceId: 'shop-a.example/rc', kcalPer100g: 365, packSizes: ['2kg', '12kg'], imageUrl: null })
  })

  it('reads an empty list cell as an empty list', () => {
    expect(csvRowToCandidate({ availableCountries: '' })).toEqual({ availableCountries: [] })
  })
})

describe('parseCsvFeed', () => {
  it('validates rows and numbers them from the first data line', () => {
    const batch = parseCsvFeed(
      [
        CSV_HEADER,
        'shop-a.example/rc,shop-a.example,Royal Canin,Adult,365,2kg|12kg,gb|FR,,2026-09-01T00:00:00Z,2026-09-10T00:00:00Z',
        ',shop-a.example,Acana,Heritage,,,,,2026-09-01T00:00:00Z,2026-09-10T00:00:00Z',
      ].join('\n')
    )

    expect(batch.records).toHaveLength(1)
    expect(batch.records[0]).toMatchObject({
      sourceId: 'shop-a.example/rc',
      brandRaw: 'Royal Canin',
      kcalPer100g: 365,
      packSizes: ['2kg', '12kg'],
      availableCountries: ['FR', 'GB'],
      imageUrl: null,
      lastSeenAt: '2026-09-10T00:00:00.000Z',
    })
    expect(batch.rejected.map((row) => [row.row, row.sourceId])).toEqual([[3, null]])
  })
})

describe('parseJsonLinesFeed', () => {
  it('reports broken and invalid lines by line number', () => {
    const valid = JSON.stringify({
      sourceId: 'shop-a.example/rc',
      sourceDomain: 'shop-a.example',
      productNameRaw: 'Adult',
      firstSeenAt: '2026-09-01T00:00:00Z',
      lastSeenAt: '2026-09-10T00:00:00Z',
    })
    const missingName = JSON.stringify({
      sourceId: 'shop-a.example/acana',
      sourceDomain: 'shop-a.example',
      firstSeenAt: '2026-09-01T00:00:00Z',
      lastSeenAt: '2026-09-10T00:00:00Z',
    })

    const batch = parseJsonLinesFeed([valid, '', '{broken', missingName].join('\n'))

    expect(batch.records.map((record) => record.sourceId)).toEqual(['shop-a.example/rc'])
    expect(batch.rejected.map((row) => [row.row, row.sourceId])).toEqual([
      [3, null],
      [4, 'shop-a.example/acana'],
    ])
    expect(batch.rejected[0]?.errors[0]).toMatch(/^Invalid JSON/)
  })
})

describe('parseJsonFeed', () => {
  it('reports malformed JSON as a store error', () => {
    expect(() => parseJsonFeed('[{"sourceId": ')).toThrow(ReconcileError)
    expect(() => parseJsonFeed('[{"sourceId": ')).toThrow('candidates.json is not valid JSON')
  })

  it('requires an array of rows', () => {
    expect(() => parseJsonFeed('{"sourceId": "shop-a.example/rc"}')).toThrow('candidates.json must hold an array of rows')
  })
})

describe('FileCatalogStore', () => {
  let dataDir: string
  let store: FileCatalogStore

  beforeEach(async () => {
    dataDir = await mkdtemp(join(tmpdir(), 'catalog-store-'))
    store = new FileCatalogStore(dataDir)
  })

  afterEach(async () => {
    await rm(dataDir, { recursive: true, force: true })
  })

  it('reads every feed file up to the watermark', async () => {
    await writeFile(
      join(dataDir, 'candidates.json'),
      JSON.stringify([
        {
          sourceId: 'shop-a.example/rc',
          sourceDomain: 'shop-a.example',
          productNameRaw: 'Adult',
          firstSeenAt: '2026-09-01T00:00:00Z',
          lastSeenAt: '2026-09-10T00:00:00Z',
        },
        {
          sourceId: 'shop-a.example/late',
          sourceDomain: 'shop-a.example',
          productNameRaw: 'Puppy',
          firstSeenAt: '2026-09-01T00:00:00Z',
          lastSeenAt: '2026-09-20T00:00:00Z',
        },
      ])
    )
    await writeFile(
      join(dataDir, 'candidates.csv'),
      [
        CSV_HEADER,
        'shop-b.example/acana,shop-b.example,Acana,Heritage,,,,,2026-09-02T00:00:00Z,2026-09-12T00:00:00Z',
        ',shop-b.example,Acana,Heritage,,,,,2026-09-02T00:00:00Z,2026-09-12T00:00:00Z',
      ].join('\n')
    )

    const batch = await store.readCandidates('2026-09-15T00:00:00.000Z')

    expect(batch.records.map((record) => record.sourceId)).toEqual(['shop-a.example/rc', 'shop-b.example/acana'])
    expect(batch.rejected.map((row) => [row.source, row.row])).toEqual([['candidates.csv', 3]])
  })

  it('treats missing reference tables as empty', async () => {
    expect(await store.readAliasMap()).toBeNull()
    expect(await store.readAllowlist()).toEqual({ version: 'empty', brands: [] })
    expect(await store.readOverrides()).toEqual([])
    expect(await store.readMergeDecisions()).toEqual([])
  })

  it('fails the read when a reference table is invalid', async () => {
    await writeFile(join(dataDir, 'allowlist.json'), JSON.stringify({ version: 'v1', brands: [{ brandSlug: 'acana' }] }))
    await expect(store.readAllowlist()).rejects.toBeInstanceOf(ReconcileError)
  })

  it('writes and revokes overrides', async () => {
    const override = overrideSchema.parse({
      id: 'ovr-1',
      productKey: 'acana::heritage::dry',
      fields: { kcalPer100g: 371 },
      reason: 'label photo',
      createdAt: '2026-09-12T00:00:00Z',
    })

    await store.writeOverride(override)
    const revoked = await store.revokeOverride('ovr-1', '2026-09-14T00:00:00.000Z')

    expect(revoked?.revokedAt).toBe('2026-09-14T00:00:00.000Z')
    expect(await store.readOverrides()).toEqual([{ ...override, revokedAt: '2026-09-14T00:00:00.000Z' }])
    expect(await store.revokeOverride('ovr-1', '2026-09-15T00:00:00.000Z')).toBeNull()
    expect(await store.revokeOverride('missing', '2026-09-15T00:00:00.000Z')).toBeNull()
  })

  it('fails the feed read with a store error when candidates.json is malformed', async () => {
    await writeFile(join(dataDir, 'candidates.json'), '[{"sourceId": "shop-a.example/rc",')

    await expect(store.readCandidates('2026-09-15T00:00:00.000Z')).rejects.toMatchObject({
      code: 'STORE_ERROR',
      message: 'candidates.json is not valid JSON',
    })
  })

  it('gives concurrent writes their own temp files', async () => {
    const draft = (id: string) =>
      overrideSchema.parse({
        id,
        brandSlug: 'acana',
        fields: { kcalPer100g: 371 },
        reason: 'label photo',
        createdAt: '2026-09-12T00:00:00Z',
      })

    await expect(Promise.all([store.writeOverride(draft('ovr-1')), store.writeOverride(draft('ovr-2'))])).resolves.toEqual([
      undefined,
      undefined,
    ])
    expect((await readdir(dataDir)).filter((name) => name.includes('.tmp-'))).toEqual([])
  })

  it('publishes staged views by swapping the pointer', async () => {
    const preview = snapshot('run-1', [
      canonical({ sourceId: 'shop-a.example/rc', brandRaw: 'Royal Canin', productNameRaw: 'Adult', formRaw: 'dry' }),
    ])
    await store.writeStaging('run-1', { preview, production: null })

    expect(await store.readPublished('preview')).toBeNull()

    await store.swapPublished('run-1', ['preview'])

    expect(await store.readPublished('preview')).toEqual(preview)
    expect(await store.readPublished('production')).toBeNull()
  })

  it('leaves the pointer alone when a view was never staged', async () => {
    await store.writeStaging('run-1', { preview: snapshot('run-1'), production: null })
    await store.swapPublished('run-1', ['preview'])
    await store.writeStaging('run-2', { preview: snapshot('run-2'), production: null })

    await expect(store.swapPublished('run-2', ['preview', 'production'])).rejects.toThrow(
      'Run run-2 staged no production view'
    )
    expect((await store.readPublished('preview'))?.runId).toBe('run-1')
  })

  it('discards unpublished staging only', async () => {
    await store.writeStaging('run-1', { preview: snapshot('run-1'), production: null })
    await store.swapPublished('run-1', ['preview'])
    await store.writeStaging('run-2', { preview: snapshot('run-2'), production: null })

    await store.discardStaging('run-1')
    await store.discardStaging('run-2')

    expect(await readdir(join(dataDir, 'snapshots'))).toEqual(['run-1'])
  })
})
