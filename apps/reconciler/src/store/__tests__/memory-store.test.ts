import { describe, it, expect } from 'vitest'
import { MemoryCatalogStore } from '../memory-store'
import { snapshot } from '../../__tests__/fixtures'

describe('MemoryCatalogStore', () => {
  it('keeps invalid seed rows as rejected', async () => {
    const store = new MemoryCatalogStore({
      candidates: [
        {
          sourceId: 'shop-a.example/rc',
          sourceDomain: 'www.Shop-A.example',
          productNameRaw: 'Adult',
          firstSeenAt: '2026-09-01T00:00:00Z',
          lastSeenAt: '2026-09-10T00:00:00Z',
        },
        { sourceId: 'shop-a.example/broken', sourceDomain: 'shop-a.example' },
      ],
    })

    const batch = await store.readCandidates('2026-09-15T00:00:00.000Z')

    expect(batch.records.map((record) => record.sourceDomain)).toEqual(['shop-a.example'])
    expect(batch.rejected.map((row) => [row.row, row.sourceId])).toEqual([[2, 'shop-a.example/broken']])
  })

  it('excludes observations after the watermark', async () => {
    const store = new MemoryCatalogStore({
      candidates: [
        {
          sourceId: 'shop-a.example/rc',
          sourceDomain: 'shop-a.example',
          productNameRaw: 'Adult',
          firstSeenAt: '2026-09-01T00:00:00Z',
          lastSeenAt: '2026-09-20T00:00:00Z',
        },
      ],
    })

    expect((await store.readCandidates('2026-09-15T00:00:00.000Z')).records).toEqual([])
  })

  it('swaps views all or nothing', async () => {
    const store = new MemoryCatalogStore()
    await store.writeStaging('run-1', { preview: snapshot('run-1'), production: null })

    await expect(store.swapPublished('run-1', ['preview', 'production'])).rejects.toThrow(
      'Run run-1 staged no production view'
    )
    expect(store.published.size).toBe(0)

    await store.swapPublished('run-1', ['preview'])
    expect((await store.readPublished('preview'))?.runId).toBe('run-1')
  })

  it('refuses to publish an unknown run', async () => {
    await expect(new MemoryCatalogStore().swapPublished('run-9', ['preview'])).rejects.toThrow(
      'No staged snapshot for run run-9'
    )
  })
})
