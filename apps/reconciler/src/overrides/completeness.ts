/**
 * Completeness grading from an ordered tier list.
 *
 * A product gets the first tier where at least one of the tier's field sets
 * is fully present; otherwise the fallback grade.
 */

import { z } from 'zod'
import { completenessGradeSchema, type CanonicalProduct, type CompletenessGrade } from '../records/schema'

export const COMPLETENESS_FIELDS = [
  'kcalPer100g',
  'proteinPercent',
  'fatPercent',
  'ingredients',
  'form',
  'lifeStage',
  'pricePerUnit',
  'imageUrl',
] as const

export type CompletenessField = (typeof COMPLETENESS_FIELDS)[number]

export const completenessTiersSchema = z.object({
  fallback: completenessGradeSchema,
  tiers: z.array(
    z.object({
      grade: completenessGradeSchema,
      anyOf: z.array(z.array(z.enum(COMPLETENESS_FIELDS)).min(1)).min(1),
    })
  ),
})

export type CompletenessTiers = z.infer<typeof completenessTiersSchema>

export const DEFAULT_COMPLETENESS_TIERS: CompletenessTiers = {
  fallback: 'C',
  tiers: [
    {
      grade: 'A+',
      anyOf: [['kcalPer100g', 'proteinPercent', 'fatPercent', 'ingredients', 'form', 'lifeStage', 'pricePerUnit']],
    },
    { grade: 'A', anyOf: [['kcalPer100g', 'proteinPercent', 'fatPercent', 'ingredients']] },
    { grade: 'B', anyOf: [['kcalPer100g'], ['proteinPercent', 'fatPercent']] },
  ],
}

type GradedFields = Pick<
  CanonicalProduct,
  'kcalPer100g' | 'proteinPercent' | 'fatPercent' | 'ingredientsTokens' | 'form' | 'lifeStage' | 'pricePerUnit' | 'imageUrl'
>

function hasField(product: GradedFields, field: CompletenessField): boolean {
  switch (field) {
    case 'ingredients':
      return product.ingredientsTokens.length > 0
    case 'form':
      return product.form !== 'any'
    default:
      return product[field] !== null
  }
}

export function gradeCompleteness(
  product: GradedFields,
  tiers: CompletenessTiers = DEFAULT_COMPLETENESS_TIERS
): CompletenessGrade {
  for (const tier of tiers.tiers) {
    if (tier.anyOf.some((fields) => fields.every((field) => hasField(product, field)))) {
      return tier.grade
    }
  }
  return tiers.fallback
}
