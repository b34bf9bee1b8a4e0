/**
 * Reconcile run orchestration
 *
 * One run rebuilds the whole catalog as of a fixed watermark:
 * 1. take the run lease (a held lease skips the run untouched)
 * 2. read candidates, overrides, alias map, allowlist and merge log at the watermark
 * 3. prepare records, group by base key, reconcile each shard independently
 * 4. apply overrides, run guards, build the brand quality report and review queue
 * 5. stage the views, then swap them into place in one step
 *
 * An abort (signal or lost lease) before the swap leaves published views as they were.
 */

import { randomUUID } from 'crypto'
import type { BrandAliasMap } from '@kibble/brand'
import { loggers } from '../config/logger'
import { createWorkflowLogger, type WorkflowLogger } from '../config/structured-log'
import { loadDefaultAliasMap, loadDefaultCompletenessTiers } from '../config/data'
import { ReconcileError, classifyError, formatErrorForLog } from '../errors'
import { DEFAULT_COLLISION_THRESHOLD, detectCollisions } from '../merge/collisions'
import { compareStrings, latestObservations, mergeGroup, type MergeOptions } from '../merge/merge'
import { DEFAULT_PRICE_BUCKETS } from '../merge/pricing'
import { activeOverrides, applyOverrides, findOverrideConflicts } from '../overrides/apply'
import type { CompletenessTiers } from '../overrides/completeness'
import { runGuards } from '../guards/report'
import { buildBrandQualityReport } from '../publish/brand-quality'
import { inheritAllowlistStatus, publish } from '../publish/publisher'
import type { ScoringSchemeConfig } from '../scoring/quality-score'
import { runLeaseKey, type LeaseHandle, type RunLease } from '../lease/run-lease'
import type { CatalogStore, PublishedView, StagedViews } from '../store/types'
import type {
  BrandAllowlist,
  BrandQualityRow,
  CanonicalProduct,
  GuardReport,
  MergeDecision,
  PreparedRecord,
  PriceBucketThresholds,
  PublishMode,
  PublishedSnapshot,
  ReconcileIssue,
  RejectedRow,
  ReviewItem,
} from '../types'
import { createPrepareContext, prepareRecord } from './prepare'
import { partitionByShard } from './shards'
import {
  recordCollisions,
  recordDuration,
  recordGuardViolations,
  recordOverrideConflicts,
  recordProducts,
  recordRecords,
  recordRunStatus,
} from './metrics'

export const DEFAULT_RUN_TARGET = 'catalog'

export type RunStatus = 'PUBLISHED' | 'PREVIEW_ONLY' | 'BLOCKED' | 'SKIPPED' | 'DRY_RUN'

export interface ReconcileDeps {
  store: CatalogStore
  lease: RunLease
  /** Used when the store carries no alias map; default: the shipped map */
  aliasMap?: BrandAliasMap
  stopWords?: readonly string[]
  scoringScheme?: ScoringSchemeConfig
  completenessTiers?: CompletenessTiers
}

export interface ReconcileOptions {
  runId?: string
  /** Lease target; runs on one target never overlap */
  target?: string
  /** Upper bound on lastSeenAt and override createdAt; default: run start */
  watermark?: string
  shards?: number
  publishMode?: PublishMode
  allowPending?: boolean
  /** Compute everything, write nothing */
  dryRun?: boolean
  collisionThreshold?: number
  stripSingleSizes?: boolean
  priceBuckets?: PriceBucketThresholds
  signal?: AbortSignal
  now?: () => Date
}

export interface RunStats {
  recordsRead: number
  recordsRejected: number
  baseKeys: number
  products: number
  productionProducts: number
  collisions: number
  overrideConflicts: number
  guardViolations: number
  durationMs: number
}

export interface RunResult {
  runId: string
  status: RunStatus
  watermark: string
  /** Every reconciled product, key order */
  products: CanonicalProduct[]
  /** Products promoted to production, or null when production was not promoted */
  production: CanonicalProduct[] | null
  guardReport: GuardReport | null
  brandQuality: BrandQualityRow[]
  reviewQueue: ReviewItem[]
  issues: ReconcileIssue[]
  rejected: RejectedRow[]
  stats: RunStats
}

interface ShardOutput {
  products: CanonicalProduct[]
  reviewQueue: ReviewItem[]
  collisions: number
}

function resolveWatermark(watermark: string | undefined, now: () => Date): string {
  if (watermark === undefined) return now().toISOString()
  const parsed = new Date(watermark)
  if (Number.isNaN(parsed.getTime())) {
    throw new ReconcileError('CONFIGURATION_ERROR', `Invalid watermark "${watermark}"`)
  }
  return parsed.toISOString()
}

function checkAborted(signal: AbortSignal | undefined, stage: string): void {
  if (signal?.aborted) {
    throw new ReconcileError('RUN_ABORTED', `Run aborted during ${stage}`, { cause: signal.reason })
  }
}

function emptyStats(durationMs: number): RunStats {
  return {
    recordsRead: 0,
    recordsRejected: 0,
    baseKeys: 0,
    products: 0,
    productionProducts: 0,
    collisions: 0,
    overrideConflicts: 0,
    guardViolations: 0,
    durationMs,
  }
}

/**
 * Reconcile the members of one shard. Groups are visited in key order.
 */
function reconcileShard(
  groups: ReadonlyMap<string, PreparedRecord[]>,
  mergeDecisions: readonly MergeDecision[],
  threshold: number,
  mergeOptions: MergeOptions
): ShardOutput {
  const output: ShardOutput = { products: [], reviewQueue: [], collisions: 0 }
  for (const [baseKey, members] of groups) {
    const result = detectCollisions(baseKey, members, mergeDecisions, threshold)
    if (result.clusters.length > 1) output.collisions += 1
    if (result.review) output.reviewQueue.push(result.review)
    for (const cluster of result.clusters) {
      output.products.push(mergeGroup(cluster.productKey, baseKey, cluster.members, mergeOptions))
    }
  }
  return output
}

export async function reconcile(deps: ReconcileDeps, options: ReconcileOptions = {}): Promise<RunResult> {
  const startedAt = Date.now()
  const now = options.now ?? (() => new Date())
  const runId = options.runId ?? randomUUID()
  const watermark = resolveWatermark(options.watermark, now)
  const target = options.target ?? DEFAULT_RUN_TARGET
  const log = createWorkflowLogger(loggers.run, { workflow: 'reconcile', stage: 'lease', runId, watermark })

  const handle = await deps.lease.acquire(runLeaseKey(target))
  if (!handle) {
    log.warn('SNAPSHOT_RACE', { target, leaseKind: deps.lease.kind })
    recordRunStatus('SKIPPED')
    return {
      runId,
      status: 'SKIPPED',
      watermark,
      products: [],
      production: null,
      guardReport: null,
      brandQuality: [],
      reviewQueue: [],
      issues: [{ code: 'SNAPSHOT_RACE', message: `Another run holds the lease for ${target}` }],
      rejected: [],
      stats: emptyStats(Date.now() - startedAt),
    }
  }

  try {
    const result = await execute(deps, options, { runId, watermark, handle, log, now, startedAt })
    recordRunStatus(result.status)
    recordDuration(result.stats.durationMs)
    return result
  } catch (error) {
    recordRunStatus('FAILED')
    log.error('RUN_FAILED', formatErrorForLog(classifyError(error)), error)
    throw error
  } finally {
    await handle.release()
  }
}

interface RunContext {
  runId: string
  watermark: string
  handle: LeaseHandle
  log: WorkflowLogger
  now: () => Date
  startedAt: number
}

async function execute(deps: ReconcileDeps, options: ReconcileOptions, run: RunContext): Promise<RunResult> {
  const { store } = deps
  const { runId, watermark } = run
  const signal = options.signal
  const issues: ReconcileIssue[] = []

  // Read everything as of the watermark
  let log = run.log.child({ stage: 'read' })
  log.info('RUN_START', {
    storeKind: store.kind,
    shards: options.shards ?? 1,
    publishMode: options.publishMode ?? 'strict',
    dryRun: options.dryRun ?? false,
  })

  const batch = await store.readCandidates(watermark)
  const overrides = activeOverrides(await store.readOverrides(), watermark)
  const aliasMap = (await store.readAliasMap()) ?? deps.aliasMap ?? loadDefaultAliasMap()
  const allowlist: BrandAllowlist = await store.readAllowlist()
  const mergeDecisions = await store.readMergeDecisions()

  for (const rejected of batch.rejected) {
    issues.push({
      code: 'INVALID_RECORD',
      message: rejected.errors.join('; '),
      sourceId: rejected.sourceId ?? undefined,
      details: { source: rejected.source, row: rejected.row },
    })
    log.warn('INVALID_RECORD', { source: rejected.source, row: rejected.row, sourceId: rejected.sourceId })
  }
  recordRecords('read', batch.records.length)
  recordRecords('rejected', batch.rejected.length)
  log.info('RECORDS_READ', {
    records: batch.records.length,
    rejected: batch.rejected.length,
    overrides: overrides.length,
    aliasMapVersion: aliasMap.version,
    allowlistVersion: allowlist.version,
  })
  checkAborted(signal, 'read')

  // Prepare and group by base key
  log = run.log.child({ stage: 'prepare' })
  const context = createPrepareContext({
    aliasMap,
    stopWords: deps.stopWords,
    stripSingleSizes: options.stripSingleSizes,
    scoringScheme: deps.scoringScheme,
  })
  const current = latestObservations(batch.records.map((record) => prepareRecord(record, context)))

  const groups = new Map<string, PreparedRecord[]>()
  for (const member of current) {
    if (member.brand.confidence === 'low') {
      issues.push({
        code: 'ALIAS_UNRESOLVED',
        message: `Brand "${member.record.brandRaw ?? ''}" matched no alias`,
        sourceId: member.record.sourceId,
        brandSlug: member.brand.brandSlug,
      })
      log.debug('ALIAS_UNRESOLVED', { sourceId: member.record.sourceId, brandSlug: member.brand.brandSlug })
    }
    const group = groups.get(member.baseKey)
    if (group) {
      group.push(member)
    } else {
      groups.set(member.baseKey, [member])
    }
  }
  checkAborted(signal, 'prepare')

  // Reconcile shards independently
  log = run.log.child({ stage: 'merge' })
  const mergeOptions: MergeOptions = {
    priceBuckets: options.priceBuckets ?? DEFAULT_PRICE_BUCKETS,
    completenessTiers: deps.completenessTiers ?? loadDefaultCompletenessTiers(),
  }
  const threshold = options.collisionThreshold ?? DEFAULT_COLLISION_THRESHOLD
  const merged: CanonicalProduct[] = []
  const reviewQueue: ReviewItem[] = []
  let collisions = 0

  const shards = partitionByShard(groups, options.shards ?? 1)
  for (const [shard, shardGroups] of shards.entries()) {
    const output = reconcileShard(shardGroups, mergeDecisions, threshold, mergeOptions)
    merged.push(...output.products)
    reviewQueue.push(...output.reviewQueue)
    collisions += output.collisions
    log.debug('SHARD_DONE', { shard, baseKeys: shardGroups.size, products: output.products.length })
    checkAborted(signal, `merge of shard ${shard}`)
  }

  reviewQueue.sort((a, b) => compareStrings(a.baseKey, b.baseKey))
  for (const item of reviewQueue) {
    issues.push({
      code: 'KEY_COLLISION_DETECTED',
      message: `Base key ${item.baseKey} split into ${item.clusters.length} products`,
      productKey: item.baseKey,
      details: { productKeys: item.clusters.map((cluster) => cluster.productKey) },
    })
    log.warn('KEY_COLLISION_DETECTED', { baseKey: item.baseKey, clusters: item.clusters.length })
  }
  recordCollisions(collisions)

  // Overrides
  log = run.log.child({ stage: 'overrides' })
  const productKeys = new Set(merged.map((product) => product.productKey))
  const conflicts = findOverrideConflicts(overrides, productKeys)
  for (const conflict of conflicts) {
    issues.push({
      code: 'OVERRIDE_CONFLICT',
      message: `Override ${conflict.id} targets unknown product key ${conflict.productKey ?? ''}`,
      overrideId: conflict.id,
      productKey: conflict.productKey ?? undefined,
    })
    log.warn('OVERRIDE_CONFLICT', { overrideId: conflict.id, productKey: conflict.productKey })
  }
  recordOverrideConflicts(conflicts.length)

  const products = inheritAllowlistStatus(
    merged
      .map((product) => applyOverrides(product, overrides, mergeOptions))
      .sort((a, b) => compareStrings(a.productKey, b.productKey)),
    allowlist
  )

  // Guards and reports
  log = run.log.child({ stage: 'guards' })
  const guards = runGuards(products, { aliasMap, mergeDecisions })
  for (const violation of guards.violations) {
    issues.push({
      code: 'GUARD_VIOLATION',
      message: violation.detail,
      productKey: violation.productKey,
      brandSlug: violation.brandSlug,
      details: { guard: violation.guard },
    })
  }
  for (const guard of guards.report.guards) {
    recordGuardViolations(guard.guardName, guard.violationCount)
    if (guard.violationCount > 0) {
      log.warn('GUARD_VIOLATION', { guard: guard.guardName, violations: guard.violationCount })
    }
  }
  const brandQuality = buildBrandQualityReport(products)
  checkAborted(signal, 'guards')

  // Publish
  log = run.log.child({ stage: 'publish' })
  const views = publish(products, guards.report, allowlist, options.publishMode ?? 'strict', {
    allowPending: options.allowPending,
  })

  const snapshotOf = (viewProducts: CanonicalProduct[]): PublishedSnapshot => ({
    runId,
    watermark,
    generatedAt: run.now().toISOString(),
    aliasMapVersion: aliasMap.version,
    allowlistVersion: allowlist.version,
    products: viewProducts,
    guardReport: guards.report,
    brandQuality,
    reviewQueue,
  })
  const staged: StagedViews = {
    preview: views.preview ? snapshotOf(views.preview) : null,
    production: views.production ? snapshotOf(views.production) : null,
  }
  const swapViews: PublishedView[] = []
  if (staged.preview) swapViews.push('preview')
  if (staged.production) swapViews.push('production')

  let status: RunStatus
  if (options.dryRun) {
    status = 'DRY_RUN'
  } else if (views.outcome === 'BLOCKED') {
    status = 'BLOCKED'
  } else {
    await store.writeStaging(runId, staged)
    try {
      checkAborted(signal, 'publish')
      if (!run.handle.isHeld()) {
        throw new ReconcileError('RUN_ABORTED', 'Run lease lost before publish')
      }
      await store.swapPublished(runId, swapViews)
    } catch (error) {
      await store.discardStaging(runId)
      throw error
    }
    status = views.outcome
    for (const view of swapViews) {
      recordProducts(view, staged[view]?.products.length ?? 0)
    }
  }

  const stats: RunStats = {
    recordsRead: batch.records.length,
    recordsRejected: batch.rejected.length,
    baseKeys: groups.size,
    products: products.length,
    productionProducts: views.production?.length ?? 0,
    collisions,
    overrideConflicts: conflicts.length,
    guardViolations: guards.violations.length,
    durationMs: Date.now() - run.startedAt,
  }

  log.info('RUN_END', { status, guardStatus: guards.report.status, views: swapViews, ...stats })

  return {
    runId,
    status,
    watermark,
    products,
    production: views.production,
    guardReport: guards.report,
    brandQuality,
    reviewQueue,
    issues,
    rejected: batch.rejected,
    stats,
  }
}
