/**
 * In-memory catalog store for tests and single-process dry runs.
 */

import type { BrandAliasMap } from '@kibble/brand'
import type {
  BrandAllowlist,
  MergeDecision,
  Override,
  PublishedSnapshot,
  RejectedRow,
} from '../types'
import { parseCandidateRows, withinWatermark } from './records'
import type { CandidateBatch, CatalogStore, PublishedView, StagedViews } from './types'
import { ReconcileError } from '../errors'

export interface MemoryStoreSeed {
  /** Raw feed rows; invalid ones are kept as rejected */
  candidates?: readonly unknown[]
  overrides?: readonly Override[]
  aliasMap?: BrandAliasMap | null
  allowlist?: BrandAllowlist
  mergeDecisions?: readonly MergeDecision[]
}

const EMPTY_ALLOWLIST: BrandAllowlist = { version: 'empty', brands: [] }

export class MemoryCatalogStore implements CatalogStore {
  readonly kind = 'memory'

  private batch: CandidateBatch
  overrides: Override[]
  aliasMap: BrandAliasMap | null
  allowlist: BrandAllowlist
  mergeDecisions: MergeDecision[]
  readonly staging = new Map<string, StagedViews>()
  readonly published = new Map<PublishedView, PublishedSnapshot>()

  constructor(seed: MemoryStoreSeed = {}) {
    this.batch = parseCandidateRows(seed.candidates ?? [])
    this.overrides = [...(seed.overrides ?? [])]
    this.aliasMap = seed.aliasMap ?? null
    this.allowlist = seed.allowlist ?? EMPTY_ALLOWLIST
    this.mergeDecisions = [...(seed.mergeDecisions ?? [])]
  }

  get rejected(): RejectedRow[] {
    return this.batch.rejected
  }

  async readCandidates(watermark: string): Promise<CandidateBatch> {
    return withinWatermark(this.batch, watermark)
  }

  async readOverrides(): Promise<Override[]> {
    return [...this.overrides]
  }

  async readAliasMap(): Promise<BrandAliasMap | null> {
    return this.aliasMap
  }

  async readAllowlist(): Promise<BrandAllowlist> {
    return this.allowlist
  }

  async readMergeDecisions(): Promise<MergeDecision[]> {
    return [...this.mergeDecisions]
  }

  async writeOverride(override: Override): Promise<void> {
    this.overrides = [...this.overrides.filter((existing) => existing.id !== override.id), override]
  }

  async revokeOverride(id: string, revokedAt: string): Promise<Override | null> {
    const current = this.overrides.find((override) => override.id === id)
    if (!current || current.revokedAt !== null) return null
    const revoked = { ...current, revokedAt }
    await this.writeOverride(revoked)
    return revoked
  }

  async writeStaging(runId: string, views: StagedViews): Promise<void> {
    this.staging.set(runId, views)
  }

  async swapPublished(runId: string, views: readonly PublishedView[]): Promise<void> {
    const staged = this.staging.get(runId)
    if (!staged) {
      throw new ReconcileError('STORE_ERROR', `No staged snapshot for run ${runId}`)
    }
    const next = new Map(this.published)
    for (const view of views) {
      const snapshot = staged[view]
      if (!snapshot) {
        throw new ReconcileError('STORE_ERROR', `Run ${runId} staged no ${view} view`)
      }
      next.set(view, snapshot)
    }
    for (const [view, snapshot] of next) {
      this.published.set(view, snapshot)
    }
  }

  async discardStaging(runId: string): Promise<void> {
    this.staging.delete(runId)
  }

  async readPublished(view: PublishedView): Promise<PublishedSnapshot | null> {
    return this.published.get(view) ?? null
  }

  async close(): Promise<void> {}
}
