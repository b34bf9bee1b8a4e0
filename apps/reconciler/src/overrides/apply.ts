/**
 * Override & Precedence Resolver
 *
 * Layers manual corrections over merged products. Product-key overrides beat
 * brand overrides; within a level the latest override wins per field. A field
 * is only blanked by an explicit { cleared: true } marker.
 */

import type {
  CanonicalProduct,
  ClearedMarker,
  Override,
  OverrideFields,
  Provenance,
  ProvenanceField,
} from '../types'
import { tokenizeIngredients } from '../scoring/quality-score'
import { estimateKcal, priceBucket, pricePerUnit } from '../merge/pricing'
import { DEFAULT_MERGE_OPTIONS, DERIVATION_RULES, contributingSource, type MergeOptions } from '../merge/merge'
import { provenanceFieldSchema } from '../records/schema'
import { resolveField, resolveRequiredField, type Candidate } from '../merge/precedence'
import { gradeCompleteness } from './completeness'

function isCleared(value: unknown): value is ClearedMarker {
  return typeof value === 'object' && value !== null && !Array.isArray(value) && 'cleared' in value
}

/**
 * Overrides in effect at a watermark: created at or before it and not yet revoked.
 */
export function activeOverrides(overrides: readonly Override[], watermark: string): Override[] {
  return overrides.filter(
    (override) =>
      override.createdAt <= watermark && (override.revokedAt === null || override.revokedAt > watermark)
  )
}

/**
 * Overrides for one product in ascending precedence: brand level first, then
 * product level, each by createdAt then id.
 */
export function selectOverrides(product: CanonicalProduct, overrides: readonly Override[]): Override[] {
  const byAge = (a: Override, b: Override) =>
    a.createdAt !== b.createdAt ? (a.createdAt < b.createdAt ? -1 : 1) : a.id < b.id ? -1 : a.id > b.id ? 1 : 0
  const brandLevel = overrides.filter((override) => override.productKey === null && override.brandSlug === product.brandSlug)
  const productLevel = overrides.filter((override) => override.productKey === product.productKey)
  return [...brandLevel.sort(byAge), ...productLevel.sort(byAge)]
}

/**
 * Product-key overrides whose key no longer exists in this run.
 */
export function findOverrideConflicts(overrides: readonly Override[], productKeys: ReadonlySet<string>): Override[] {
  return overrides.filter((override) => override.productKey !== null && !productKeys.has(override.productKey))
}

/**
 * Last override in precedence order that sets the field. Cleared fields yield null.
 */
function overrideCandidate<T>(
  ordered: readonly Override[],
  read: (fields: OverrideFields) => ClearedMarker | T | null | undefined
): Candidate<T | null> | undefined {
  let picked: Candidate<T | null> | undefined
  for (const override of ordered) {
    const value = read(override.fields)
    if (value === null || value === undefined) continue
    const provenance: Provenance = { kind: 'override', overrideId: override.id, reason: override.reason }
    picked = isCleared(value) ? { value: null, provenance } : { value, provenance }
  }
  return picked
}

export function applyOverrides(
  canonical: CanonicalProduct,
  overrides: readonly Override[],
  options: MergeOptions = DEFAULT_MERGE_OPTIONS
): CanonicalProduct {
  const ordered = selectOverrides(canonical, overrides)
  if (ordered.length === 0) return canonical

  const provenance: CanonicalProduct['provenance'] = { ...canonical.provenance }
  const overridden = new Set<ProvenanceField>()

  const field = <T>(
    name: ProvenanceField,
    merged: T | null,
    read: (fields: OverrideFields) => ClearedMarker | T | null | undefined
  ): T | null => {
    const result = resolveField<T>({
      override: overrideCandidate(ordered, read),
      'best-scored-merge': { value: merged, provenance: provenance[name] ?? null },
    })
    if (result.strategy === 'override' && result.provenance) {
      provenance[name] = result.provenance
      overridden.add(name)
    }
    return result.value
  }

  // Fields that always carry a value ignore a cleared marker
  const required = <T>(
    name: ProvenanceField,
    merged: T,
    read: (fields: OverrideFields) => ClearedMarker | T | null | undefined
  ): T => {
    const candidate = overrideCandidate(ordered, read)
    const result = resolveRequiredField<T>(
      { override: candidate && candidate.value !== null ? { value: candidate.value, provenance: candidate.provenance } : undefined },
      { value: merged, provenance: provenance[name] ?? null }
    )
    if (result.strategy === 'override' && result.provenance) {
      provenance[name] = result.provenance
      overridden.add(name)
    }
    return result.value
  }

  const brand = required('brand', canonical.brand, (fields) => fields.brand)
  const brandLine = field('brandLine', canonical.brandLine, (fields) => fields.brandLine)
  const productName = required('productName', canonical.productName, (fields) => fields.productName)
  const form = required('form', canonical.form, (fields) => fields.form)
  const lifeStage = field('lifeStage', canonical.lifeStage, (fields) => fields.lifeStage)
  const proteinPercent = field('proteinPercent', canonical.proteinPercent, (fields) => fields.proteinPercent)
  const fatPercent = field('fatPercent', canonical.fatPercent, (fields) => fields.fatPercent)
  const fiberPercent = field('fiberPercent', canonical.fiberPercent, (fields) => fields.fiberPercent)
  const ashPercent = field('ashPercent', canonical.ashPercent, (fields) => fields.ashPercent)
  const moisturePercent = field('moisturePercent', canonical.moisturePercent, (fields) => fields.moisturePercent)
  const ingredientsRaw = field('ingredientsRaw', canonical.ingredientsRaw, (fields) => fields.ingredientsRaw)
  const packSizes = field('packSizes', canonical.packSizes, (fields) => fields.packSizes) ?? []
  const price = field('price', canonical.price, (fields) => fields.price)
  const imageUrl = field('imageUrl', canonical.imageUrl, (fields) => fields.imageUrl)

  // Energy: an override is a measured value; an estimate follows overridden macros
  let kcalPer100g = field('kcalPer100g', canonical.kcalPer100g, (fields) => fields.kcalPer100g)
  let kcalBasis = canonical.kcalBasis
  if (overridden.has('kcalPer100g')) {
    kcalBasis = kcalPer100g === null ? null : 'measured'
  } else if (canonical.kcalBasis === 'estimated' || canonical.kcalPer100g === null) {
    const macrosChanged = (['proteinPercent', 'fatPercent', 'fiberPercent', 'ashPercent', 'moisturePercent'] as const).some(
      (name) => overridden.has(name)
    )
    if (macrosChanged) {
      kcalPer100g = estimateKcal({ proteinPercent, fatPercent, fiberPercent, ashPercent, moisturePercent })
      kcalBasis = kcalPer100g === null ? null : 'estimated'
      if (kcalPer100g === null) {
        delete provenance.kcalPer100g
      } else {
        provenance.kcalPer100g = { kind: 'derived', rule: DERIVATION_RULES.kcal }
      }
    }
  }

  // Price per unit follows an overridden price or pack size unless itself overridden
  let unitPrice = field('pricePerUnit', canonical.pricePerUnit, (fields) => fields.pricePerUnit)
  if (!overridden.has('pricePerUnit') && (overridden.has('price') || overridden.has('packSizes'))) {
    unitPrice = pricePerUnit(price, packSizes)
    if (unitPrice === null) {
      delete provenance.pricePerUnit
    } else {
      provenance.pricePerUnit = { kind: 'derived', rule: DERIVATION_RULES.pricePerUnit }
    }
  }

  let bucket = canonical.priceBucket
  if (unitPrice !== canonical.pricePerUnit) {
    bucket = priceBucket(unitPrice, options.priceBuckets)
    if (bucket === null) {
      delete provenance.priceBucket
    } else {
      provenance.priceBucket = { kind: 'derived', rule: DERIVATION_RULES.priceBucket }
    }
  }

  const ingredientsTokens = overridden.has('ingredientsRaw') ? tokenizeIngredients(ingredientsRaw) : canonical.ingredientsTokens

  const sources = canonical.sources.map((source) => ({
    ...source,
    fieldsContributed: source.fieldsContributed.filter((name) => {
      if (name === 'availableCountries') return true
      const parsed = provenanceFieldSchema.safeParse(name)
      return parsed.success && contributingSource(provenance[parsed.data]) === source.sourceId
    }),
  }))

  const product: CanonicalProduct = {
    ...canonical,
    brand,
    brandLine,
    productName,
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
    ingredientsTokens,
    packSizes,
    price,
    pricePerUnit: unitPrice,
    priceBucket: bucket,
    imageUrl,
    provenance,
    sources,
  }

  return { ...product, completenessGrade: gradeCompleteness(product, options.completenessTiers) }
}
