/**
 * Reconciler domain types.
 *
 * Persisted shapes are inferred from the zod schemas in records/schema.
 */

import type { CanonicalBrand } from '@kibble/brand'
import type { Form, LifeStage, RawCandidateRecord } from './records/schema'

export type {
  AllowlistStatus,
  BrandAllowlist,
  BrandQualityRow,
  CanonicalProduct,
  ClearedMarker,
  CompletenessGrade,
  Form,
  GuardName,
  GuardReport,
  LifeStage,
  MergeDecision,
  Override,
  OverrideFieldName,
  OverrideFields,
  OverrideInput,
  PriceBucket,
  Provenance,
  ProvenanceField,
  PublishedSnapshot,
  RawCandidateInput,
  RawCandidateRecord,
  ReviewItem,
  Violation,
} from './records/schema'

export type PublishMode = 'strict' | 'preview-only'

/**
 * A candidate record after canonicalization, keying and scoring.
 */
export interface PreparedRecord {
  record: RawCandidateRecord
  brand: CanonicalBrand
  /** Key before collision suffixing */
  baseKey: string
  nameSlug: string
  form: Form
  lifeStage: LifeStage | null
  ingredientsTokens: string[]
  score: number
}

export interface PriceBucketThresholds {
  /** pricePerUnit below this is "low" */
  lowMax: number
  /** pricePerUnit above this is "high" */
  midMax: number
}

// =============================================================================
// Issues
// =============================================================================

/**
 * Recoverable conditions collected into the run report. None of them aborts a run.
 */
export type IssueCode =
  | 'ALIAS_UNRESOLVED'
  | 'KEY_COLLISION_DETECTED'
  | 'GUARD_VIOLATION'
  | 'OVERRIDE_CONFLICT'
  | 'SNAPSHOT_RACE'
  | 'INVALID_RECORD'

export interface ReconcileIssue {
  code: IssueCode
  message: string
  sourceId?: string
  productKey?: string
  brandSlug?: string
  overrideId?: string
  details?: Record<string, unknown>
}

export interface RejectedRow {
  /** Feed file or table the row came from */
  source?: string
  /** 1-based row or line number in the feed */
  row: number
  sourceId: string | null
  errors: string[]
}
