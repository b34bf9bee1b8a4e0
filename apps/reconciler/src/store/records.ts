/**
 * Row validation shared by every store.
 *
 * Feed rows that fail the schema are rejected and reported, never coerced.
 * Reference tables (overrides, allowlist, merge log) must parse in full.
 */

import { z } from 'zod'
import { ReconcileError } from '../errors'
import { rawCandidateRecordSchema } from '../records/schema'
import type { RawCandidateRecord, RejectedRow } from '../types'
import type { CandidateBatch } from './types'

function describeIssues(error: z.ZodError): string[] {
  return error.issues.map((issue) => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
}

function sourceIdOf(row: unknown): string | null {
  if (typeof row !== 'object' || row === null) return null
  const value: unknown = Reflect.get(row, 'sourceId')
  return typeof value === 'string' && value.length > 0 ? value : null
}

/**
 * Validate feed rows. Row numbers are 1-based from `firstRow`.
 */
export function parseCandidateRows(rows: readonly unknown[], firstRow = 1): CandidateBatch {
  const records: RawCandidateRecord[] = []
  const rejected: RejectedRow[] = []

  rows.forEach((row, index) => {
    const parsed = rawCandidateRecordSchema.safeParse(row)
    if (parsed.success) {
      records.push(parsed.data)
    } else {
      rejected.push({ row: firstRow + index, sourceId: sourceIdOf(row), errors: describeIssues(parsed.error) })
    }
  })

  return { records, rejected }
}

export function withinWatermark(batch: CandidateBatch, watermark: string): CandidateBatch {
  return {
    records: batch.records.filter((record) => record.lastSeenAt <= watermark),
    rejected: batch.rejected,
  }
}

/**
 * Parse a reference table; any bad row fails the read.
 */
export function parseTable<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, value: unknown, table: string): T {
  const parsed = schema.safeParse(value)
  if (!parsed.success) {
    const problems = describeIssues(parsed.error)
    throw new ReconcileError('STORE_ERROR', `Invalid ${table}: ${problems.join('; ')}`, {
      cause: parsed.error,
      details: { table, problems },
    })
  }
  return parsed.data
}
