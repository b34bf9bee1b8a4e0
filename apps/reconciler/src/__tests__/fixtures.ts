/**
 * Shared test data builders.
 */

import { rawCandidateRecordSchema, type RawCandidateInput, type RawCandidateRecord } from '../records/schema'
import { createPrepareContext, prepareRecord, type PrepareContext } from '../run/prepare'
import { mergeGroup } from '../merge/merge'
import type { CanonicalProduct, PreparedRecord, PublishedSnapshot } from '../types'

let defaultContext: PrepareContext | null = null

export function testContext(): PrepareContext {
  defaultContext ??= createPrepareContext()
  return defaultContext
}

export function candidate(input: Partial<RawCandidateInput> & { sourceId: string }): RawCandidateRecord {
  return rawCandidateRecordSchema.parse({
    sourceDomain: input.sourceId.split('/')[0],
    productNameRaw: 'Adult',
    firstSeenAt: '2026-09-01T00:00:00.000Z',
    lastSeenAt: '2026-09-10T00:00:00.000Z',
    ...input,
  })
}

export function prepared(input: Partial<RawCandidateInput> & { sourceId: string }): PreparedRecord {
  return prepareRecord(candidate(input), testContext())
}

/**
 * Canonical product merged from a single record.
 */
export function canonical(input: Partial<RawCandidateInput> & { sourceId: string }): CanonicalProduct {
  const record = prepared(input)
  return mergeGroup(record.baseKey, record.baseKey, [record])
}

export function snapshot(runId: string, products: CanonicalProduct[] = []): PublishedSnapshot {
  return {
    runId,
    watermark: '2026-09-15T00:00:00.000Z',
    generatedAt: '2026-09-15T00:05:00.000Z',
    aliasMapVersion: '2026-10-01',
    allowlistVersion: 'empty',
    products,
    guardReport: { status: 'PASS', guards: [] },
    brandQuality: [],
    reviewQueue: [],
  }
}
