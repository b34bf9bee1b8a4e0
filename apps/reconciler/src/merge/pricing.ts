/**
 * Derived values: price per kg, price bucket and estimated energy.
 */

import { weightKg } from '../keys/pack-size'
import type { PriceBucket, PriceBucketThresholds } from '../types'

export const DEFAULT_PRICE_BUCKETS: PriceBucketThresholds = { lowMax: 5, midMax: 15 }

// Pet food outside this range is a parsing error, not a product
export const PLAUSIBLE_KCAL_MIN = 200
export const PLAUSIBLE_KCAL_MAX = 600

const DEFAULT_ASH_PERCENT = 8
const DEFAULT_MOISTURE_PERCENT = 10

export function round(value: number, decimals: number): number {
  const factor = 10 ** decimals
  return Math.round((value + Number.EPSILON) * factor) / factor
}

/**
 * Price per kg of the first pack size, rounded to 2 decimals.
 */
export function pricePerUnit(price: number | null, packSizes: readonly string[]): number | null {
  if (price === null || price <= 0) return null
  const kg = weightKg(packSizes[0])
  if (kg === null) return null
  return round(price / kg, 2)
}

/**
 * low below lowMax, high above midMax, mid in between (bounds inclusive).
 */
export function priceBucket(
  perUnit: number | null,
  thresholds: PriceBucketThresholds = DEFAULT_PRICE_BUCKETS
): PriceBucket | null {
  if (perUnit === null) return null
  if (perUnit < thresholds.lowMax) return 'low'
  if (perUnit > thresholds.midMax) return 'high'
  return 'mid'
}

export interface Macros {
  proteinPercent: number | null
  fatPercent: number | null
  fiberPercent: number | null
  ashPercent: number | null
  moisturePercent: number | null
}

/**
 * Modified Atwater estimate in kcal/100g: protein 3.5, fat 8.5, carbohydrate 3.5.
 * Carbohydrate is what remains after protein, fat, fiber, ash and moisture.
 * Returns null without protein and fat, or when the estimate is implausible.
 */
export function estimateKcal(macros: Macros): number | null {
  const { proteinPercent: protein, fatPercent: fat } = macros
  if (protein === null || fat === null || protein <= 0 || fat <= 0) return null

  const fiber = macros.fiberPercent ?? 0
  const ash = macros.ashPercent ?? DEFAULT_ASH_PERCENT
  const moisture = macros.moisturePercent ?? DEFAULT_MOISTURE_PERCENT
  const carbs = Math.max(0, 100 - (protein + fat + fiber + ash + moisture))

  const kcal = protein * 3.5 + fat * 8.5 + carbs * 3.5
  if (kcal < PLAUSIBLE_KCAL_MIN || kcal > PLAUSIBLE_KCAL_MAX) return null
  return round(kcal, 1)
}
