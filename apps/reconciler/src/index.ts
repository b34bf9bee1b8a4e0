/**
 * @kibble/reconciler - rebuilds the canonical pet-food catalog from raw source records
 */

export {
  DEFAULT_RUN_TARGET,
  reconcile,
  type ReconcileDeps,
  type ReconcileOptions,
  type RunResult,
  type RunStats,
  type RunStatus,
} from './run/reconcile'
export { createPrepareContext, prepareRecord, type PrepareContext, type PrepareContextInput } from './run/prepare'
export { partitionByShard, shardOf } from './run/shards'
export { getMetricsSnapshot, getPrometheusMetrics, resetMetrics, type RunMetricsSnapshot } from './run/metrics'

export { buildKey, buildNameSlug, formatKey, parseKey, type KeyOptions, type ProductKeyParts } from './keys/build-key'
export { parsePackSize, weightKg, type PackSize } from './keys/pack-size'
export {
  DEFAULT_SCORING_SCHEME,
  createQualityScoringStrategy,
  score,
  type QualityScoringStrategy,
  type ScoringSchemeConfig,
} from './scoring/quality-score'

export { mergeGroup, latestObservations, type MergeOptions } from './merge/merge'
export { detectCollisions, type CollisionResult, type KeyCluster } from './merge/collisions'
export { FIELD_PRECEDENCE, resolveField, type PrecedenceStrategy } from './merge/precedence'
export { DEFAULT_PRICE_BUCKETS, estimateKcal, priceBucket, pricePerUnit } from './merge/pricing'

export { activeOverrides, applyOverrides, findOverrideConflicts } from './overrides/apply'
export { gradeCompleteness, type CompletenessTiers } from './overrides/completeness'
export { revokeOverride, setOverride, type OverrideDraft, type OverrideEditorDeps } from './overrides/editor'

export { GUARD_RULES, checkGuard, getGuardRule, type GuardContext, type GuardRule } from './guards/rules'
export { guardsPassed, runGuards, type GuardRun } from './guards/report'
export { buildBrandQualityReport } from './publish/brand-quality'
export { publish, type PublishOptions, type PublishOutcome, type PublishedViews } from './publish/publisher'

export {
  createCatalogStore,
  FileCatalogStore,
  MemoryCatalogStore,
  PgCatalogStore,
  type CatalogStore,
  type PublishedView,
} from './store'
export { createRunLease, MemoryRunLease, RedisRunLease, type LeaseHandle, type RunLease } from './lease'

export { loadSettings, type Settings } from './config/settings'
export { ReconcileError, classifyError, type ReconcileErrorCode } from './errors'
export * from './types'
