/**
 * Per-record preparation: canonicalize brand, build the key, score.
 */

import { canonicalizeBrand, type BrandAliasMap } from '@kibble/brand'
import { buildNameSlug, formatKey, normalizeForm, normalizeLifeStage, type KeyOptions } from '../keys/build-key'
import {
  createQualityScoringStrategy,
  tokenizeIngredients,
  type QualityScoringStrategy,
  type ScoringSchemeConfig,
} from '../scoring/quality-score'
import { loadDefaultAliasMap, loadDefaultScoringScheme, loadDefaultStopWords } from '../config/data'
import type { PreparedRecord, RawCandidateRecord } from '../types'

export interface PrepareContext {
  aliasMap: BrandAliasMap
  keyOptions: KeyOptions
  scoring: QualityScoringStrategy
}

export interface PrepareContextInput {
  aliasMap?: BrandAliasMap
  stopWords?: readonly string[]
  stripSingleSizes?: boolean
  scoringScheme?: ScoringSchemeConfig
}

/**
 * Build a context, falling back to the reference data shipped with the app.
 */
export function createPrepareContext(input: PrepareContextInput = {}): PrepareContext {
  return {
    aliasMap: input.aliasMap ?? loadDefaultAliasMap(),
    keyOptions: {
      stopWords: new Set(input.stopWords ?? loadDefaultStopWords()),
      stripSingleSizes: input.stripSingleSizes ?? false,
    },
    scoring: createQualityScoringStrategy(input.scoringScheme ?? loadDefaultScoringScheme()),
  }
}

export function prepareRecord(record: RawCandidateRecord, context: PrepareContext): PreparedRecord {
  const brand = canonicalizeBrand(record.brandRaw, record.productNameRaw, context.aliasMap)
  const form = normalizeForm(record.formRaw)
  const nameSlug = buildNameSlug(brand.brandSlug, brand.cleanedProductName, context.keyOptions)

  return {
    record,
    brand,
    baseKey: formatKey({ brandSlug: brand.brandSlug, nameSlug, form }),
    nameSlug,
    form,
    lifeStage: normalizeLifeStage(record.lifeStageRaw, brand.cleanedProductName),
    ingredientsTokens: tokenizeIngredients(record.ingredientsRaw),
    score: context.scoring.score(record).total,
  }
}
