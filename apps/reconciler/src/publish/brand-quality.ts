/**
 * Brand quality report over the preview set.
 *
 * Coverage is the percentage of a brand's SKUs with the field present.
 * Brands resolved with low confidence are left out; their slug is raw text.
 */

import { PLAUSIBLE_KCAL_MAX, PLAUSIBLE_KCAL_MIN, round } from '../merge/pricing'
import type { BrandQualityRow, CanonicalProduct } from '../types'

export interface QualityGate {
  form: number
  lifeStage: number
  ingredients: number
  priceBucket: number
  maxKcalOutliers: number
}

export const PASS_GATE: QualityGate = { form: 95, lifeStage: 95, ingredients: 85, priceBucket: 70, maxKcalOutliers: 0 }
export const NEAR_GATE: QualityGate = { form: 90, lifeStage: 90, ingredients: 80, priceBucket: 65, maxKcalOutliers: 2 }

function coverage(products: readonly CanonicalProduct[], present: (product: CanonicalProduct) => boolean): number {
  if (products.length === 0) return 0
  return round((products.filter(present).length * 100) / products.length, 2)
}

function meets(row: Omit<BrandQualityRow, 'status'>, gate: QualityGate): boolean {
  return (
    row.formCoverage >= gate.form &&
    row.lifeStageCoverage >= gate.lifeStage &&
    row.ingredientsCoverage >= gate.ingredients &&
    row.priceBucketCoverage >= gate.priceBucket &&
    row.kcalOutliers <= gate.maxKcalOutliers
  )
}

export function isKcalOutlier(kcal: number | null): boolean {
  return kcal !== null && (kcal < PLAUSIBLE_KCAL_MIN || kcal > PLAUSIBLE_KCAL_MAX)
}

export function brandQualityRow(brandSlug: string, products: readonly CanonicalProduct[]): BrandQualityRow {
  const metrics = {
    brandSlug,
    skuCount: products.length,
    formCoverage: coverage(products, (product) => product.form !== 'any'),
    lifeStageCoverage: coverage(products, (product) => product.lifeStage !== null),
    ingredientsCoverage: coverage(products, (product) => product.ingredientsTokens.length > 0),
    kcalCoverage: coverage(products, (product) => product.kcalPer100g !== null),
    priceBucketCoverage: coverage(products, (product) => product.priceBucket !== null),
    kcalOutliers: products.filter((product) => isKcalOutlier(product.kcalPer100g)).length,
  }

  const status = meets(metrics, PASS_GATE) ? 'PASS' : meets(metrics, NEAR_GATE) ? 'NEAR' : 'TODO'
  return { ...metrics, status }
}

/**
 * One row per brand slug, ordered by slug.
 */
export function buildBrandQualityReport(products: readonly CanonicalProduct[]): BrandQualityRow[] {
  const byBrand = new Map<string, CanonicalProduct[]>()
  for (const product of products) {
    if (product.brandConfidence === 'low') continue
    const group = byBrand.get(product.brandSlug) ?? []
    group.push(product)
    byBrand.set(product.brandSlug, group)
  }

  return [...byBrand.keys()].sort().map((brandSlug) => brandQualityRow(brandSlug, byBrand.get(brandSlug) ?? []))
}
