/**
 * Catalog store contract.
 *
 * Reads are bounded by a run watermark. Publishing is two-phase: a run writes
 * its views to staging, then swaps the published pointers in one atomic step.
 * Consumers only ever see a fully written snapshot.
 */

import type { BrandAliasMap } from '@kibble/brand'
import type {
  BrandAllowlist,
  MergeDecision,
  Override,
  PublishedSnapshot,
  RawCandidateRecord,
  RejectedRow,
} from '../types'

export const PUBLISHED_VIEWS = ['preview', 'production'] as const
export type PublishedView = (typeof PUBLISHED_VIEWS)[number]

export interface CandidateBatch {
  records: RawCandidateRecord[]
  rejected: RejectedRow[]
}

export type StagedViews = Record<PublishedView, PublishedSnapshot | null>

export interface CatalogStore {
  readonly kind: 'memory' | 'file' | 'pg'

  /** Every observation with lastSeenAt at or before the watermark */
  readCandidates(watermark: string): Promise<CandidateBatch>
  /** Every override, revoked ones included; callers filter by watermark */
  readOverrides(): Promise<Override[]>
  /** null when the store carries no alias map of its own */
  readAliasMap(): Promise<BrandAliasMap | null>
  readAllowlist(): Promise<BrandAllowlist>
  readMergeDecisions(): Promise<MergeDecision[]>

  /** Insert or replace by id */
  writeOverride(override: Override): Promise<void>
  /** Returns the revoked override, or null when unknown or already revoked */
  revokeOverride(id: string, revokedAt: string): Promise<Override | null>

  writeStaging(runId: string, views: StagedViews): Promise<void>
  /** Point every listed view at the run's staged snapshot, all or nothing */
  swapPublished(runId: string, views: readonly PublishedView[]): Promise<void>
  discardStaging(runId: string): Promise<void>
  readPublished(view: PublishedView): Promise<PublishedSnapshot | null>

  close(): Promise<void>
}
