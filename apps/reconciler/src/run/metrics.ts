/**
 * Reconcile Run Metrics
 *
 * In-memory metrics for reconcile runs, exportable as Prometheus text.
 *
 * Metrics:
 * - reconcile_runs_total: Counter by status
 * - reconcile_records_total: Counter by outcome (read, rejected)
 * - reconcile_products_total: Counter by view (preview, production)
 * - reconcile_collisions_total: Counter
 * - reconcile_override_conflicts_total: Counter
 * - reconcile_guard_violations_total: Counter by guard
 * - reconcile_run_duration_ms: Histogram
 *
 * No high-cardinality labels (no productKey, sourceId, brandSlug).
 */

import type { GuardName } from '../types'

export type RunStatusLabel = 'PUBLISHED' | 'PREVIEW_ONLY' | 'BLOCKED' | 'SKIPPED' | 'DRY_RUN' | 'FAILED'
export type RecordOutcomeLabel = 'read' | 'rejected'
export type ViewLabel = 'preview' | 'production'

export interface RunMetricsSnapshot {
  runs: Partial<Record<RunStatusLabel, number>>
  records: Partial<Record<RecordOutcomeLabel, number>>
  products: Partial<Record<ViewLabel, number>>
  collisions: number
  overrideConflicts: number
  guardViolations: Partial<Record<GuardName, number>>
  duration: {
    count: number
    sum: number
    buckets: Record<number, number> // bucket threshold -> count
  }
}

// ═══════════════════════════════════════════════════════════════════════════════
// Histogram buckets (milliseconds)
// ═══════════════════════════════════════════════════════════════════════════════

const DURATION_BUCKETS = [100, 500, 1000, 5000, 15000, 60000, 300000]

// ═══════════════════════════════════════════════════════════════════════════════
// In-memory storage
// ═══════════════════════════════════════════════════════════════════════════════

const runs = new Map<RunStatusLabel, number>()
const records = new Map<RecordOutcomeLabel, number>()
const products = new Map<ViewLabel, number>()
const guardViolations = new Map<GuardName, number>()
let collisions = 0
let overrideConflicts = 0
const duration = {
  count: 0,
  sum: 0,
  buckets: new Map<number, number>(),
}

for (const bucket of DURATION_BUCKETS) {
  duration.buckets.set(bucket, 0)
}

function increment<K>(map: Map<K, number>, key: K, by = 1): void {
  map.set(key, (map.get(key) ?? 0) + by)
}

// ═══════════════════════════════════════════════════════════════════════════════
// Metric recording functions
// ═══════════════════════════════════════════════════════════════════════════════

export function recordRunStatus(status: RunStatusLabel): void {
  increment(runs, status)
}

export function recordRecords(outcome: RecordOutcomeLabel, count: number): void {
  increment(records, outcome, count)
}

export function recordProducts(view: ViewLabel, count: number): void {
  increment(products, view, count)
}

export function recordCollisions(count: number): void {
  collisions += count
}

export function recordOverrideConflicts(count: number): void {
  overrideConflicts += count
}

export function recordGuardViolations(guard: GuardName, count: number): void {
  if (count > 0) increment(guardViolations, guard, count)
}

/**
 * Record reconcile_run_duration_ms (cumulative buckets)
 */
export function recordDuration(durationMs: number): void {
  duration.count++
  duration.sum += durationMs

  for (const bucket of DURATION_BUCKETS) {
    if (durationMs <= bucket) {
      increment(duration.buckets, bucket)
    }
  }
}

// ═══════════════════════════════════════════════════════════════════════════════
// Export / snapshot functions
// ═══════════════════════════════════════════════════════════════════════════════

function toRecord<K extends string | number>(map: ReadonlyMap<K, number>): Partial<Record<K, number>> {
  const record: Partial<Record<K, number>> = {}
  for (const [key, count] of map) {
    record[key] = count
  }
  return record
}

export function getMetricsSnapshot(): RunMetricsSnapshot {
  const buckets: Record<number, number> = {}
  for (const [bucket, count] of duration.buckets) {
    buckets[bucket] = count
  }

  return {
    runs: toRecord(runs),
    records: toRecord(records),
    products: toRecord(products),
    collisions,
    overrideConflicts,
    guardViolations: toRecord(guardViolations),
    duration: {
      count: duration.count,
      sum: duration.sum,
      buckets,
    },
  }
}

/**
 * Get metrics in Prometheus exposition format
 */
export function getPrometheusMetrics(): string {
  const lines: string[] = []

  lines.push('# HELP reconcile_runs_total Total reconcile runs by status')
  lines.push('# TYPE reconcile_runs_total counter')
  for (const [status, count] of runs) {
    lines.push(`reconcile_runs_total{status="${status}"} ${count}`)
  }

  lines.push('# HELP reconcile_records_total Feed records by outcome')
  lines.push('# TYPE reconcile_records_total counter')
  for (const [outcome, count] of records) {
    lines.push(`reconcile_records_total{outcome="${outcome}"} ${count}`)
  }

  lines.push('# HELP reconcile_products_total Products written per published view')
  lines.push('# TYPE reconcile_products_total counter')
  for (const [view, count] of products) {
    lines.push(`reconcile_products_total{view="${view}"} ${count}`)
  }

  lines.push('# HELP reconcile_collisions_total Base keys split by a name collision')
  lines.push('# TYPE reconcile_collisions_total counter')
  lines.push(`reconcile_collisions_total ${collisions}`)

  lines.push('# HELP reconcile_override_conflicts_total Overrides whose product key no longer exists')
  lines.push('# TYPE reconcile_override_conflicts_total counter')
  lines.push(`reconcile_override_conflicts_total ${overrideConflicts}`)

  lines.push('# HELP reconcile_guard_violations_total Guard violations by guard')
  lines.push('# TYPE reconcile_guard_violations_total counter')
  for (const [guard, count] of guardViolations) {
    lines.push(`reconcile_guard_violations_total{guard="${guard}"} ${count}`)
  }

  lines.push('# HELP reconcile_run_duration_ms Reconcile run duration in milliseconds')
  lines.push('# TYPE reconcile_run_duration_ms histogram')
  for (const [bucket, count] of duration.buckets) {
    lines.push(`reconcile_run_duration_ms_bucket{le="${bucket}"} ${count}`)
  }
  lines.push(`reconcile_run_duration_ms_bucket{le="+Inf"} ${duration.count}`)
  lines.push(`reconcile_run_duration_ms_sum ${duration.sum}`)
  lines.push(`reconcile_run_duration_ms_count ${duration.count}`)

  return lines.join('\n')
}

/**
 * Reset all metrics (for testing only)
 */
export function resetMetrics(): void {
  runs.clear()
  records.clear()
  products.clear()
  guardViolations.clear()
  collisions = 0
  overrideConflicts = 0
  duration.count = 0
  duration.sum = 0
  for (const bucket of DURATION_BUCKETS) {
    duration.buckets.set(bucket, 0)
  }
}
