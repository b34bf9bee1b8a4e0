/**
 * Zod schemas for every shape the reconciler reads or persists.
 * Types are inferred from these so stored rows and in-memory values cannot drift.
 */

import { z } from 'zod'

const isoTimestamp = z
  .string()
  .datetime({ offset: true })
  .transform((value) => new Date(value).toISOString())

const nullableText = z
  .string()
  .nullable()
  .default(null)
  .transform((value) => (value !== null && value.trim().length > 0 ? value.trim() : null))

const nullableAmount = z.number().finite().nonnegative().nullable().default(null)

const nullablePercent = z.number().finite().min(0).max(100).nullable().default(null)

export const FORMS = ['dry', 'wet', 'raw', 'freeze_dried', 'treat', 'any'] as const
export const formSchema = z.enum(FORMS)
export type Form = z.infer<typeof formSchema>

export const LIFE_STAGES = ['puppy', 'kitten', 'adult', 'senior', 'all_life_stages'] as const
export const lifeStageSchema = z.enum(LIFE_STAGES)
export type LifeStage = z.infer<typeof lifeStageSchema>

export const ALLOWLIST_STATUSES = ['ACTIVE', 'PENDING', 'PAUSED', 'REMOVED'] as const
export const allowlistStatusSchema = z.enum(ALLOWLIST_STATUSES)

export const COMPLETENESS_GRADES = ['A+', 'A', 'B', 'C'] as const
export const completenessGradeSchema = z.enum(COMPLETENESS_GRADES)
export type CompletenessGrade = z.infer<typeof completenessGradeSchema>

export const priceBucketSchema = z.enum(['low', 'mid', 'high'])
export type PriceBucket = z.infer<typeof priceBucketSchema>
export const kcalBasisSchema = z.enum(['measured', 'estimated'])
export const brandConfidenceSchema = z.enum(['high', 'medium', 'low'])

// =============================================================================
// Input feed
// =============================================================================

export const rawCandidateRecordSchema = z
  .object({
    sourceId: z.string().trim().min(1),
    sourceDomain: z
      .string()
      .trim()
      .min(1)
      .transform((value) => value.toLowerCase().replace(/^www\./, '')),
    sourceUrl: nullableText,
    brandRaw: nullableText,
    productNameRaw: z.string().trim().min(1),
    formRaw: nullableText,
    lifeStageRaw: nullableText,
    ingredientsRaw: nullableText,
    kcalPer100g: nullableAmount,
    proteinPercent: nullablePercent,
    fatPercent: nullablePercent,
    fiberPercent: nullablePercent,
    ashPercent: nullablePercent,
    moisturePercent: nullablePercent,
    price: nullableAmount,
    packSizes: z.array(z.string().trim().min(1)).default([]),
    availableCountries: z
      .array(z.string().trim().regex(/^[A-Za-z]{2}$/, 'Expected a 2-letter country code'))
      .default([])
      .transform((codes) => [...new Set(codes.map((code) => code.toUpperCase()))].sort()),
    imageUrl: nullableText,
    firstSeenAt: isoTimestamp,
    lastSeenAt: isoTimestamp,
  })
  .refine((record) => record.firstSeenAt <= record.lastSeenAt, {
    message: 'firstSeenAt must not be after lastSeenAt',
    path: ['firstSeenAt'],
  })

export type RawCandidateRecord = z.infer<typeof rawCandidateRecordSchema>
export type RawCandidateInput = z.input<typeof rawCandidateRecordSchema>

// =============================================================================
// Brand alias map
// =============================================================================

export const brandAliasMapSchema = z.object({
  version: z.string().min(1),
  entries: z.array(
    z.object({
      alias: z.string().min(1),
      brandSlug: z.string().regex(/^[a-z0-9_]+$/),
      brandLine: z.string().nullable().optional(),
      isDenylisted: z.boolean().optional(),
      displayName: z.string().optional(),
    })
  ),
  splitPatterns: z
    .array(
      z.object({
        stem: z.string().min(1),
        fragment: z.string().min(1),
        brandSlug: z.string().regex(/^[a-z0-9_]+$/),
        brandLine: z.string().nullable().optional(),
      })
    )
    .default([]),
  incompleteStems: z.array(z.string().min(1)).default([]),
})

// =============================================================================
// Overrides
// =============================================================================

export const clearedMarkerSchema = z.object({ cleared: z.literal(true) }).strict()
export type ClearedMarker = z.infer<typeof clearedMarkerSchema>

function overrideField<T extends z.ZodTypeAny>(schema: T) {
  return z.union([clearedMarkerSchema, schema]).nullable().optional()
}

export const overrideFieldsSchema = z
  .object({
    brand: overrideField(z.string().min(1)),
    brandLine: overrideField(z.string().min(1)),
    productName: overrideField(z.string().min(1)),
    form: overrideField(formSchema),
    lifeStage: overrideField(lifeStageSchema),
    kcalPer100g: overrideField(z.number().finite().nonnegative()),
    proteinPercent: overrideField(z.number().finite().min(0).max(100)),
    fatPercent: overrideField(z.number().finite().min(0).max(100)),
    fiberPercent: overrideField(z.number().finite().min(0).max(100)),
    ashPercent: overrideField(z.number().finite().min(0).max(100)),
    moisturePercent: overrideField(z.number().finite().min(0).max(100)),
    ingredientsRaw: overrideField(z.string().min(1)),
    packSizes: overrideField(z.array(z.string().min(1)).min(1)),
    price: overrideField(z.number().finite().nonnegative()),
    pricePerUnit: overrideField(z.number().finite().nonnegative()),
    imageUrl: overrideField(z.string().min(1)),
  })
  .strict()

export type OverrideFields = z.infer<typeof overrideFieldsSchema>
export type OverrideFieldName = keyof OverrideFields

export const overrideSchema = z
  .object({
    id: z.string().min(1),
    productKey: z.string().min(1).nullable().default(null),
    brandSlug: z.string().min(1).nullable().default(null),
    fields: overrideFieldsSchema,
    reason: z.string().trim().min(1),
    createdAt: isoTimestamp,
    revokedAt: isoTimestamp.nullable().default(null),
  })
  .refine((override) => (override.productKey === null) !== (override.brandSlug === null), {
    message: 'Override must target exactly one of productKey or brandSlug',
    path: ['productKey'],
  })

export type Override = z.infer<typeof overrideSchema>
export type OverrideInput = z.input<typeof overrideSchema>

// =============================================================================
// Allowlist and merge log
// =============================================================================

export const brandAllowlistSchema = z.object({
  version: z.string().min(1),
  brands: z.array(
    z.object({
      brandSlug: z.string().min(1),
      status: allowlistStatusSchema,
    })
  ),
})

export type BrandAllowlist = z.infer<typeof brandAllowlistSchema>
export type AllowlistStatus = z.infer<typeof allowlistStatusSchema>

export const mergeDecisionSchema = z.object({
  baseKey: z.string().min(1),
  decision: z.enum(['MERGE', 'SPLIT']),
  approved: z.boolean(),
  reason: z.string().min(1),
  decidedAt: isoTimestamp.nullable().default(null),
})

export type MergeDecision = z.infer<typeof mergeDecisionSchema>

// =============================================================================
// Canonical products
// =============================================================================

export const PROVENANCE_FIELDS = [
  'brand',
  'brandLine',
  'productName',
  'form',
  'lifeStage',
  'kcalPer100g',
  'proteinPercent',
  'fatPercent',
  'fiberPercent',
  'ashPercent',
  'moisturePercent',
  'ingredientsRaw',
  'packSizes',
  'price',
  'pricePerUnit',
  'priceBucket',
  'imageUrl',
  'availableCountries',
] as const

export const provenanceFieldSchema = z.enum(PROVENANCE_FIELDS)
export type ProvenanceField = z.infer<typeof provenanceFieldSchema>

export const provenanceSchema = z.discriminatedUnion('kind', [
  z.object({ kind: z.literal('source'), sourceId: z.string() }),
  z.object({ kind: z.literal('override'), overrideId: z.string(), reason: z.string() }),
  z.object({ kind: z.literal('derived'), rule: z.string(), sourceId: z.string().optional() }),
])

export type Provenance = z.infer<typeof provenanceSchema>

export const canonicalProductSchema = z.object({
  productKey: z.string(),
  baseKey: z.string(),
  brandSlug: z.string(),
  brandLine: z.string().nullable(),
  brand: z.string(),
  brandConfidence: brandConfidenceSchema,
  productName: z.string(),
  nameSlug: z.string(),
  form: formSchema,
  lifeStage: lifeStageSchema.nullable(),
  kcalPer100g: z.number().nullable(),
  kcalBasis: kcalBasisSchema.nullable(),
  proteinPercent: z.number().nullable(),
  fatPercent: z.number().nullable(),
  fiberPercent: z.number().nullable(),
  ashPercent: z.number().nullable(),
  moisturePercent: z.number().nullable(),
  ingredientsRaw: z.string().nullable(),
  ingredientsTokens: z.array(z.string()),
  packSizes: z.array(z.string()),
  price: z.number().nullable(),
  pricePerUnit: z.number().nullable(),
  priceBucket: priceBucketSchema.nullable(),
  imageUrl: z.string().nullable(),
  availableCountries: z.array(z.string()),
  firstSeenAt: z.string(),
  lastSeenAt: z.string(),
  qualityScore: z.number().int().nonnegative(),
  provenance: z.record(provenanceFieldSchema, provenanceSchema),
  sources: z.array(
    z.object({
      sourceId: z.string(),
      score: z.number().int().nonnegative(),
      fieldsContributed: z.array(z.string()),
    })
  ),
  completenessGrade: completenessGradeSchema,
  allowlistStatus: allowlistStatusSchema,
})

export type CanonicalProduct = z.infer<typeof canonicalProductSchema>

// =============================================================================
// Run outputs
// =============================================================================

export const GUARD_NAMES = ['ORPHAN_FRAGMENT', 'INCOMPLETE_SLUG', 'SPLIT_BRAND', 'KEY_COLLISION'] as const
export const guardNameSchema = z.enum(GUARD_NAMES)
export type GuardName = z.infer<typeof guardNameSchema>

export const violationSchema = z.object({
  guard: guardNameSchema,
  productKey: z.string(),
  brandSlug: z.string(),
  productName: z.string(),
  detail: z.string(),
})

export type Violation = z.infer<typeof violationSchema>

export const guardReportSchema = z.object({
  status: z.enum(['PASS', 'FAIL']),
  guards: z.array(
    z.object({
      guardName: guardNameSchema,
      violationCount: z.number().int().nonnegative(),
      sampleViolations: z.array(violationSchema),
    })
  ),
})

export type GuardReport = z.infer<typeof guardReportSchema>

export const brandQualityRowSchema = z.object({
  brandSlug: z.string(),
  skuCount: z.number().int().nonnegative(),
  formCoverage: z.number(),
  lifeStageCoverage: z.number(),
  ingredientsCoverage: z.number(),
  kcalCoverage: z.number(),
  priceBucketCoverage: z.number(),
  kcalOutliers: z.number().int().nonnegative(),
  status: z.enum(['PASS', 'NEAR', 'TODO']),
})

export type BrandQualityRow = z.infer<typeof brandQualityRowSchema>

export const reviewItemSchema = z.object({
  baseKey: z.string(),
  reason: z.literal('KEY_COLLISION'),
  clusters: z.array(
    z.object({
      productKey: z.string(),
      anchorName: z.string(),
      similarity: z.number(),
      sourceIds: z.array(z.string()),
    })
  ),
})

export type ReviewItem = z.infer<typeof reviewItemSchema>

export const publishedSnapshotSchema = z.object({
  runId: z.string(),
  watermark: z.string(),
  generatedAt: z.string(),
  aliasMapVersion: z.string(),
  allowlistVersion: z.string(),
  products: z.array(canonicalProductSchema),
  guardReport: guardReportSchema,
  brandQuality: z.array(brandQualityRowSchema),
  reviewQueue: z.array(reviewItemSchema),
})

export type PublishedSnapshot = z.infer<typeof publishedSnapshotSchema>
