/**
 * Deduplicator / Merge Engine
 *
 * Merges every observation that shares a product key into one canonical
 * product: the best-scored record is the base, a few fields are enriched from
 * the best non-null member, and every value carries its provenance.
 */

import type {
  CanonicalProduct,
  PreparedRecord,
  PriceBucket,
  PriceBucketThresholds,
  Provenance,
  ProvenanceField,
  RawCandidateRecord,
} from '../types'
import { PROVENANCE_FIELDS } from '../records/schema'
import { DEFAULT_COMPLETENESS_TIERS, gradeCompleteness, type CompletenessTiers } from '../overrides/completeness'
import { DEFAULT_PRICE_BUCKETS, estimateKcal, priceBucket, pricePerUnit } from './pricing'
import { resolveField, type Resolved } from './precedence'

export interface MergeOptions {
  priceBuckets: PriceBucketThresholds
  completenessTiers: CompletenessTiers
}

export const DEFAULT_MERGE_OPTIONS: MergeOptions = {
  priceBuckets: DEFAULT_PRICE_BUCKETS,
  completenessTiers: DEFAULT_COMPLETENESS_TIERS,
}

export const DERIVATION_RULES = {
  pricePerUnit: 'price-per-kg',
  priceBucket: 'price-bucket',
  kcal: 'atwater-estimate',
  countries: 'country-union',
} as const

// =============================================================================
// Ordering
// =============================================================================

export function compareStrings(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0
}

/**
 * Merge order: score desc, then lastSeenAt desc, then sourceId asc.
 * Total once observations are collapsed to one per sourceId.
 */
export function compareRecords(a: PreparedRecord, b: PreparedRecord): number {
  if (a.score !== b.score) return b.score - a.score
  if (a.record.lastSeenAt !== b.record.lastSeenAt) {
    return compareStrings(b.record.lastSeenAt, a.record.lastSeenAt)
  }
  return compareStrings(a.record.sourceId, b.record.sourceId)
}

/**
 * Keep the latest observation per sourceId. Redelivered duplicates of the
 * same (sourceId, lastSeenAt) collapse to one; a content-derived tie-break
 * keeps the choice independent of read order.
 */
export function latestObservations<T extends { record: RawCandidateRecord; score: number }>(
  items: readonly T[]
): T[] {
  const bySource = new Map<string, T>()
  for (const item of items) {
    const current = bySource.get(item.record.sourceId)
    if (!current || supersedes(item, current)) {
      bySource.set(item.record.sourceId, item)
    }
  }
  return [...bySource.values()]
}

function supersedes<T extends { record: RawCandidateRecord; score: number }>(next: T, current: T): boolean {
  if (next.record.lastSeenAt !== current.record.lastSeenAt) {
    return next.record.lastSeenAt > current.record.lastSeenAt
  }
  if (next.score !== current.score) return next.score > current.score
  return JSON.stringify(next.record) < JSON.stringify(current.record)
}

// =============================================================================
// Merge
// =============================================================================

function fromSource<T>(value: T, sourceId: string): { value: T; provenance: Provenance } {
  return { value, provenance: { kind: 'source', sourceId } }
}

function derived<T>(value: T, rule: string, sourceId?: string): { value: T; provenance: Provenance } {
  return {
    value,
    provenance: sourceId === undefined ? { kind: 'derived', rule } : { kind: 'derived', rule, sourceId },
  }
}

function firstNonNull<T>(
  members: readonly PreparedRecord[],
  pick: (member: PreparedRecord) => T | null
): { value: T; sourceId: string } | null {
  for (const member of members) {
    const value = pick(member)
    if (value !== null) return { value, sourceId: member.record.sourceId }
  }
  return null
}

/**
 * Source a field value came from, directly or through a derivation.
 */
export function contributingSource(provenance: Provenance | undefined): string | null {
  if (!provenance) return null
  if (provenance.kind === 'source') return provenance.sourceId
  if (provenance.kind === 'derived') return provenance.sourceId ?? null
  return null
}

/**
 * Merge the members of one key group. Members may arrive in any order and
 * may contain several observations per source; the output is identical
 * for every permutation of the same input.
 */
export function mergeGroup(
  productKey: string,
  baseKey: string,
  records: readonly PreparedRecord[],
  options: MergeOptions = DEFAULT_MERGE_OPTIONS
): CanonicalProduct {
  const members = latestObservations(records).sort(compareRecords)
  const base = members[0]
  if (!base) {
    throw new Error(`Cannot merge empty group ${productKey}`)
  }

  const baseId = base.record.sourceId
  const raw = base.record
  const resolved = new Map<ProvenanceField, Provenance>()
  const track = <T>(field: ProvenanceField, result: Resolved<T>): T => {
    if (result.provenance && result.value !== null) resolved.set(field, result.provenance)
    return result.value
  }
  const baseField = <T>(field: ProvenanceField, value: T | null): T | null =>
    track(field, resolveField<T>({ 'best-scored-merge': fromSource(value, baseId) }))
  const required = <T>(field: ProvenanceField, value: T): T => {
    resolved.set(field, { kind: 'source', sourceId: baseId })
    return value
  }

  // Base record fields
  const brand = required('brand', base.brand.brand)
  const brandLine = baseField('brandLine', base.brand.brandLine)
  const productName = required('productName', base.brand.cleanedProductName)
  const form = required('form', base.form)
  const lifeStage = baseField('lifeStage', base.lifeStage)
  const proteinPercent = baseField('proteinPercent', raw.proteinPercent)
  const fatPercent = baseField('fatPercent', raw.fatPercent)
  const fiberPercent = baseField('fiberPercent', raw.fiberPercent)
  const ashPercent = baseField('ashPercent', raw.ashPercent)
  const moisturePercent = baseField('moisturePercent', raw.moisturePercent)
  const ingredientsRaw = baseField('ingredientsRaw', raw.ingredientsRaw)
  const packSizes = raw.packSizes.length > 0 ? required('packSizes', raw.packSizes) : raw.packSizes
  const price = baseField('price', raw.price)

  // Energy: measured on the base record, else estimated from its macros
  const kcalResult = resolveField<number>({
    'best-scored-merge': fromSource(raw.kcalPer100g, baseId),
    'derived-default': derived(estimateKcal(raw), DERIVATION_RULES.kcal, baseId),
  })
  const kcalPer100g = track('kcalPer100g', kcalResult)
  const kcalBasis =
    kcalResult.value === null ? null : kcalResult.strategy === 'derived-default' ? 'estimated' : 'measured'

  // Enriched from the best non-null member
  const unitPrice = firstNonNull(members, (member) => pricePerUnit(member.record.price, member.record.packSizes))
  const pricePerUnitValue = track(
    'pricePerUnit',
    resolveField<number>({
      'derived-default': unitPrice
        ? derived(unitPrice.value, DERIVATION_RULES.pricePerUnit, unitPrice.sourceId)
        : undefined,
    })
  )
  const bucket = track(
    'priceBucket',
    resolveField<PriceBucket>({
      'derived-default': derived(
        priceBucket(pricePerUnitValue, options.priceBuckets),
        DERIVATION_RULES.priceBucket,
        unitPrice?.sourceId
      ),
    })
  )

  const image = firstNonNull(members, (member) => member.record.imageUrl)
  const imageUrl = track(
    'imageUrl',
    resolveField<string>({ 'best-scored-merge': image ? fromSource(image.value, image.sourceId) : undefined })
  )

  const availableCountries = [...new Set(members.flatMap((member) => member.record.availableCountries))].sort()
  if (availableCountries.length > 0) {
    resolved.set('availableCountries', { kind: 'derived', rule: DERIVATION_RULES.countries })
  }

  const firstSeenAt = members
    .map((member) => member.record.firstSeenAt)
    .reduce((min, value) => (value < min ? value : min))
  const lastSeenAt = members
    .map((member) => member.record.lastSeenAt)
    .reduce((max, value) => (value > max ? value : max))

  const provenance: CanonicalProduct['provenance'] = {}
  for (const field of PROVENANCE_FIELDS) {
    const entry = resolved.get(field)
    if (entry) provenance[field] = entry
  }

  const sources = members.map((member) => {
    const sourceId = member.record.sourceId
    const fieldsContributed = PROVENANCE_FIELDS.filter((field) =>
      field === 'availableCountries'
        ? member.record.availableCountries.length > 0
        : contributingSource(provenance[field]) === sourceId
    )
    return { sourceId, score: member.score, fieldsContributed: [...fieldsContributed] }
  })

  const product: CanonicalProduct = {
    productKey,
    baseKey,
    brandSlug: base.brand.brandSlug,
    brandLine,
    brand,
    brandConfidence: base.brand.confidence,
    productName,
    nameSlug: base.nameSlug,
    form,
    lifeStage,
    kcalPer100g,
    kcalBasis,
    proteinPercent,
    fatPercent,
    fiberPercent,
    ashPercent,
    moisturePercent,
    ingredientsRaw,
    ingredientsTokens: base.ingredientsTokens,
    packSizes,
    price,
    pricePerUnit: pricePerUnitValue,
    priceBucket: bucket,
    imageUrl,
    availableCountries,
    firstSeenAt,
    lastSeenAt,
    qualityScore: base.score,
    provenance,
    sources,
    completenessGrade: 'C',
    allowlistStatus: 'PENDING',
  }

  return { ...product, completenessGrade: gradeCompleteness(product, options.completenessTiers) }
}
