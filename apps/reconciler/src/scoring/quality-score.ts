/**
 * Quality Scoring Strategy
 *
 * Scores one candidate record from field presence plus a fixed per-domain
 * trust bonus. Pure: other records in the group are never consulted.
 */

import { z } from 'zod'
import type { RawCandidateRecord } from '../records/schema'

export const scoringSchemeConfigSchema = z.object({
  version: z.string().min(1),
  weights: z.object({
    kcal: z.number().int().nonnegative(),
    protein: z.number().int().nonnegative(),
    fat: z.number().int().nonnegative(),
    ingredients: z.number().int().nonnegative(),
    image: z.number().int().nonnegative(),
  }),
  domainTrust: z.record(z.string(), z.number().int().nonnegative()),
})

export type ScoringSchemeConfig = z.infer<typeof scoringSchemeConfigSchema>
export type QualityWeights = ScoringSchemeConfig['weights']

export interface QualityScoreBreakdown {
  total: number
  componentScores: QualityWeights & { trust: number }
}

export interface QualityScoringStrategy {
  name: string
  version: string
  score(record: RawCandidateRecord): QualityScoreBreakdown
}

/**
 * Default weights (scheme v1)
 *
 * - Energy (100): kcal is what the catalog is gated on; nothing else outweighs it
 * - Protein / fat (10 each): enough for an Atwater estimate when kcal is missing
 * - Ingredients (5): only counted when tokenization leaves something
 * - Image (2): tie-breaker between otherwise equal listings
 */
export const DEFAULT_SCORING_SCHEME: ScoringSchemeConfig = {
  version: 'v1',
  weights: {
    kcal: 100,
    protein: 10,
    fat: 10,
    ingredients: 5,
    image: 2,
  },
  domainTrust: {
    'allaboutdogfood.co.uk': 5,
    'petfoodexpert.com': 3,
  },
}

/**
 * Split a raw ingredients declaration into lowercase tokens.
 * Parenthetical detail ("(26%)", "(dried)") is dropped; order is kept, duplicates are not.
 */
export function tokenizeIngredients(raw: string | null | undefined): string[] {
  if (!raw) return []
  let text = raw
  // Nested parentheses: strip innermost first
  let previous = ''
  while (previous !== text) {
    previous = text
    text = text.replace(/\([^()]*\)/g, ' ')
  }

  const tokens: string[] = []
  const seen = new Set<string>()
  for (const part of text.split(/[,;]/)) {
    const token = part.replace(/\s+/g, ' ').replace(/[.:]+$/, '').trim().toLowerCase()
    if (token.length <= 2 || seen.has(token)) continue
    seen.add(token)
    tokens.push(token)
  }
  return tokens
}

/**
 * Trust bonus for a source domain. Subdomains inherit their parent's trust.
 */
export function domainTrust(scheme: ScoringSchemeConfig, sourceDomain: string): number {
  let domain = sourceDomain.toLowerCase().replace(/^www\./, '')
  while (domain.length > 0) {
    const trust = scheme.domainTrust[domain]
    if (trust !== undefined) return trust
    const dot = domain.indexOf('.')
    if (dot < 0) break
    domain = domain.slice(dot + 1)
  }
  return 0
}

/**
 * Create a quality scoring strategy from a scheme.
 * Weights must be non-negative integers so scores stay integral and monotonic.
 */
export function createQualityScoringStrategy(
  scheme: ScoringSchemeConfig = DEFAULT_SCORING_SCHEME
): QualityScoringStrategy {
  const parsed = scoringSchemeConfigSchema.safeParse(scheme)
  if (!parsed.success) {
    throw new Error(`Invalid scoring scheme ${scheme.version}: ${parsed.error.issues[0]?.message}`)
  }
  const weights = parsed.data.weights

  return {
    name: 'field-presence',
    version: parsed.data.version,

    score(record: RawCandidateRecord): QualityScoreBreakdown {
      const componentScores = {
        kcal: record.kcalPer100g !== null ? weights.kcal : 0,
        protein: record.proteinPercent !== null ? weights.protein : 0,
        fat: record.fatPercent !== null ? weights.fat : 0,
        ingredients: tokenizeIngredients(record.ingredientsRaw).length > 0 ? weights.ingredients : 0,
        image: record.imageUrl !== null ? weights.image : 0,
        trust: domainTrust(parsed.data, record.sourceDomain),
      }

      const total =
        componentScores.kcal +
        componentScores.protein +
        componentScores.fat +
        componentScores.ingredients +
        componentScores.image +
        componentScores.trust

      return { total, componentScores }
    },
  }
}

/**
 * Default strategy instance with scheme v1
 */
export const DefaultQualityScoringStrategy = createQualityScoringStrategy()

/**
 * Score one record under a scheme.
 */
export function score(record: RawCandidateRecord, scheme: ScoringSchemeConfig = DEFAULT_SCORING_SCHEME): number {
  if (scheme === DEFAULT_SCORING_SCHEME) {
    return DefaultQualityScoringStrategy.score(record).total
  }
  return createQualityScoringStrategy(scheme).score(record).total
}
