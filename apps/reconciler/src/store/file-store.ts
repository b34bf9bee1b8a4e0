/**
 * File-backed catalog store.
 *
 * Layout under the data directory:
 *   candidates.json | candidates.jsonl | candidates.csv   feed rows (any that exist)
 *   overrides.json                                          override list
 *   brand-aliases.json, allowlist.json, merge-log.json     reference tables (optional)
 *   snapshots/<runId>/<view>.json                          staged and published snapshots
 *   published.json                                         view -> snapshot pointer
 *
 * The pointer file is replaced by write-then-rename, so readers see either the
 * previous or the next set of views, never a mix.
 */

import { randomUUID } from 'crypto'
import { mkdir, readFile, rename, rm, writeFile } from 'fs/promises'
import { join } from 'path'
import { parse as csvParse } from 'csv-parse/sync'
import { z } from 'zod'
import type { BrandAliasMap } from '@kibble/brand'
import {
  brandAliasMapSchema,
  brandAllowlistSchema,
  mergeDecisionSchema,
  overrideSchema,
  publishedSnapshotSchema,
} from '../records/schema'
import { ReconcileError, toStoreError } from '../errors'
import type { BrandAllowlist, MergeDecision, Override, PublishedSnapshot, RejectedRow } from '../types'
import { parseCandidateRows, parseTable, withinWatermark } from './records'
import { PUBLISHED_VIEWS, type CandidateBatch, type CatalogStore, type PublishedView, type StagedViews } from './types'

export const FEED_FILES = ['candidates.json', 'candidates.jsonl', 'candidates.csv'] as const

const POINTER_FILE = 'published.json'
const LIST_SEPARATOR = '|'

const NUMERIC_COLUMNS = new Set([
  'kcalPer100g',
  'proteinPercent',
  'fatPercent',
  'fiberPercent',
  'ashPercent',
  'moisturePercent',
  'price',
])
const LIST_COLUMNS = new Set(['packSizes', 'availableCountries'])

const pointerSchema = z.object({
  preview: z.object({ runId: z.string(), path: z.string() }).nullable().default(null),
  production: z.object({ runId: z.string(), path: z.string() }).nullable().default(null),
})

type Pointer = z.infer<typeof pointerSchema>

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && Reflect.get(error, 'code') === 'ENOENT'
}

/**
 * Convert one CSV row into a feed row: empty cells are null, list cells split on "|".
 */
export function csvRowToCandidate(row: Record<string, string>): Record<string, unknown> {
  const candidate: Record<string, unknown> = {}
  for (const [column, cell] of Object.entries(row)) {
    if (LIST_COLUMNS.has(column)) {
      candidate[column] = cell
        .split(LIST_SEPARATOR)
        .map((item) => item.trim())
        .filter((item) => item.length > 0)
    } else if (cell === '') {
      candidate[column] = null
    } else if (NUMERIC_COLUMNS.has(column)) {
      candidate[column] = Number(cell)
    } else {
      candidate[column] = cell
    }
  }
  return candidate
}

export function parseCsvFeed(content: string): CandidateBatch {
  const rows = z.array(z.record(z.string())).parse(
    csvParse(content, {
      columns: true,
      skip_empty_lines: true,
      trim: true,
      relax_column_count: true,
    })
  )
  // Row 1 is the header
  return parseCandidateRows(rows.map(csvRowToCandidate), 2)
}

export function parseJsonLinesFeed(content: string): CandidateBatch {
  const rows: unknown[] = []
  const broken: RejectedRow[] = []
  const lineNumbers: number[] = []

  content.split(/\r?\n/).forEach((line, index) => {
    if (line.trim().length === 0) return
    try {
      rows.push(JSON.parse(line))
      lineNumbers.push(index + 1)
    } catch (error) {
      broken.push({ row: index + 1, sourceId: null, errors: [`Invalid JSON: ${String(error)}`] })
    }
  })

  const parsed = parseCandidateRows(rows)
  return {
    records: parsed.records,
    rejected: [
      ...broken,
      ...parsed.rejected.map((rejected) => ({ ...rejected, row: lineNumbers[rejected.row - 1] ?? rejected.row })),
    ].sort((a, b) => a.row - b.row),
  }
}

export function parseJsonFeed(content: string): CandidateBatch {
  let data: unknown
  try {
    data = JSON.parse(content)
  } catch (error) {
    throw new ReconcileError('STORE_ERROR', 'candidates.json is not valid JSON', { cause: error })
  }
  if (!Array.isArray(data)) {
    throw new ReconcileError('STORE_ERROR', 'candidates.json must hold an array of rows')
  }
  return parseCandidateRows(data)
}

export class FileCatalogStore implements CatalogStore {
  readonly kind = 'file'

  constructor(readonly dataDir: string) {}

  private path(...segments: string[]): string {
    return join(this.dataDir, ...segments)
  }

  private async readOptional(fileName: string): Promise<string | null> {
    try {
      return await readFile(this.path(fileName), 'utf8')
    } catch (error) {
      if (isMissingFile(error)) return null
      throw toStoreError(error, `Failed to read ${fileName}`)
    }
  }

  private async readJson(fileName: string): Promise<unknown> {
    const content = await this.readOptional(fileName)
    if (content === null) return null
    try {
      return JSON.parse(content)
    } catch (error) {
      throw new ReconcileError('STORE_ERROR', `${fileName} is not valid JSON`, { cause: error })
    }
  }

  private async writeAtomic(fileName: string, value: unknown): Promise<void> {
    const target = this.path(fileName)
    const temp = `${target}.tmp-${randomUUID()}`
    try {
      await mkdir(this.dataDir, { recursive: true })
      await writeFile(temp, `${JSON.stringify(value, null, 2)}\n`, 'utf8')
      await rename(temp, target)
    } catch (error) {
      await rm(temp, { force: true })
      throw toStoreError(error, `Failed to write ${fileName}`)
    }
  }

  async readCandidates(watermark: string): Promise<CandidateBatch> {
    const records: CandidateBatch['records'] = []
    const rejected: RejectedRow[] = []

    for (const fileName of FEED_FILES) {
      const content = await this.readOptional(fileName)
      if (content === null) continue
      const batch = fileName.endsWith('.csv')
        ? parseCsvFeed(content)
        : fileName.endsWith('.jsonl')
          ? parseJsonLinesFeed(content)
          : parseJsonFeed(content)
      records.push(...batch.records)
      rejected.push(...batch.rejected.map((row) => ({ ...row, source: fileName })))
    }

    return withinWatermark({ records, rejected }, watermark)
  }

  async readOverrides(): Promise<Override[]> {
    const raw = await this.readJson('overrides.json')
    return raw === null ? [] : parseTable(z.array(overrideSchema), raw, 'overrides.json')
  }

  async readAliasMap(): Promise<BrandAliasMap | null> {
    const raw = await this.readJson('brand-aliases.json')
    return raw === null ? null : parseTable(brandAliasMapSchema, raw, 'brand-aliases.json')
  }

  async readAllowlist(): Promise<BrandAllowlist> {
    const raw = await this.readJson('allowlist.json')
    return raw === null ? { version: 'empty', brands: [] } : parseTable(brandAllowlistSchema, raw, 'allowlist.json')
  }

  async readMergeDecisions(): Promise<MergeDecision[]> {
    const raw = await this.readJson('merge-log.json')
    return raw === null ? [] : parseTable(z.array(mergeDecisionSchema), raw, 'merge-log.json')
  }

  async writeOverride(override: Override): Promise<void> {
    const overrides = await this.readOverrides()
    await this.writeAtomic('overrides.json', [...overrides.filter((existing) => existing.id !== override.id), override])
  }

  async revokeOverride(id: string, revokedAt: string): Promise<Override | null> {
    const current = (await this.readOverrides()).find((override) => override.id === id)
    if (!current || current.revokedAt !== null) return null
    const revoked = { ...current, revokedAt }
    await this.writeOverride(revoked)
    return revoked
  }

  private snapshotPath(runId: string, view: PublishedView): string {
    return join('snapshots', runId, `${view}.json`)
  }

  async writeStaging(runId: string, views: StagedViews): Promise<void> {
    try {
      await mkdir(this.path('snapshots', runId), { recursive: true })
      for (const view of PUBLISHED_VIEWS) {
        const snapshot = views[view]
        if (!snapshot) continue
        await writeFile(this.path(this.snapshotPath(runId, view)), JSON.stringify(snapshot), 'utf8')
      }
    } catch (error) {
      throw toStoreError(error, `Failed to stage run ${runId}`)
    }
  }

  private async readPointer(): Promise<Pointer> {
    const raw = await this.readJson(POINTER_FILE)
    return raw === null ? { preview: null, production: null } : parseTable(pointerSchema, raw, POINTER_FILE)
  }

  async swapPublished(runId: string, views: readonly PublishedView[]): Promise<void> {
    const pointer = await this.readPointer()
    const next: Pointer = { ...pointer }
    for (const view of views) {
      const path = this.snapshotPath(runId, view)
      if ((await this.readOptional(path)) === null) {
        throw new ReconcileError('STORE_ERROR', `Run ${runId} staged no ${view} view`)
      }
      next[view] = { runId, path }
    }
    await this.writeAtomic(POINTER_FILE, next)
  }

  async discardStaging(runId: string): Promise<void> {
    const pointer = await this.readPointer()
    if (pointer.preview?.runId === runId || pointer.production?.runId === runId) return
    await rm(this.path('snapshots', runId), { recursive: true, force: true })
  }

  async readPublished(view: PublishedView): Promise<PublishedSnapshot | null> {
    const entry = (await this.readPointer())[view]
    if (!entry) return null
    const raw = await this.readJson(entry.path)
    if (raw === null) {
      throw new ReconcileError('STORE_ERROR', `Published ${view} snapshot ${entry.path} is missing`)
    }
    return parseTable(publishedSnapshotSchema, raw, entry.path)
  }

  async close(): Promise<void> {}
}
