/**
 * Key Builder
 *
 * productKey = brandSlug::nameSlug::form
 *
 * Pure: the same brand slug, cleaned name and form always produce the same key.
 */

import { normalizeText, startsWithTokens, tokenize } from '@kibble/brand'
import type { Form, LifeStage } from '../records/schema'
import { MULTIPACK_IN_TEXT, SINGLE_SIZE_IN_TEXT } from './pack-size'

export const KEY_SEPARATOR = '::'
export const EMPTY_NAME_SLUG = 'unnamed'

export interface KeyOptions {
  /** Boilerplate words dropped from the name slug */
  stopWords: ReadonlySet<string>
  /** Also strip single sizes such as "2kg"; multipacks are always stripped */
  stripSingleSizes: boolean
}

export interface ProductKeyParts {
  brandSlug: string
  nameSlug: string
  form: Form
}

/**
 * Slug a cleaned product name. Leading brand words are dropped so
 * "Royal Canin Adult" under royal_canin slugs the same as "Adult".
 */
export function buildNameSlug(brandSlug: string, cleanedProductName: string, options: KeyOptions): string {
  let text = cleanedProductName
    .normalize('NFKD')
    .replace(/[\u0300-\u036f]/g, '')
    .toLowerCase()
    .replace(MULTIPACK_IN_TEXT, ' ')
  if (options.stripSingleSizes) {
    text = text.replace(SINGLE_SIZE_IN_TEXT, ' ')
  }

  let tokens = tokenize(text)
  const brandTokens = tokenize(brandSlug)
  if (brandTokens.length > 0 && startsWithTokens(tokens, brandTokens)) {
    tokens = tokens.slice(brandTokens.length)
  }

  const kept = tokens.filter((token) => !options.stopWords.has(token))
  return kept.length > 0 ? kept.join('-') : EMPTY_NAME_SLUG
}

export function buildKey(
  brandSlug: string,
  cleanedProductName: string,
  form: Form | null | undefined,
  options: KeyOptions
): string {
  return formatKey({
    brandSlug,
    nameSlug: buildNameSlug(brandSlug, cleanedProductName, options),
    form: form ?? 'any',
  })
}

export function formatKey(parts: ProductKeyParts): string {
  return [parts.brandSlug, parts.nameSlug, parts.form].join(KEY_SEPARATOR)
}

export function parseKey(productKey: string): ProductKeyParts | null {
  const base = productKey.split('#')[0]
  const [brandSlug, nameSlug, form, ...rest] = base.split(KEY_SEPARATOR)
  if (!brandSlug || !nameSlug || !form || rest.length > 0) return null
  const normalized = FORM_SYNONYMS.get(form)
  if (normalized === undefined && form !== 'any') return null
  return { brandSlug, nameSlug, form: normalized ?? 'any' }
}

// =============================================================================
// Form and life stage
// =============================================================================

const FORM_SYNONYMS = new Map<string, Form>([
  ['dry', 'dry'],
  ['kibble', 'dry'],
  ['croquette', 'dry'],
  ['croquettes', 'dry'],
  ['biscuit', 'dry'],
  ['pellet', 'dry'],
  ['pellets', 'dry'],
  ['wet', 'wet'],
  ['can', 'wet'],
  ['canned', 'wet'],
  ['tin', 'wet'],
  ['tins', 'wet'],
  ['pouch', 'wet'],
  ['pouches', 'wet'],
  ['tray', 'wet'],
  ['pate', 'wet'],
  ['terrine', 'wet'],
  ['raw', 'raw'],
  ['frozen', 'raw'],
  ['fresh', 'raw'],
  ['freeze dried', 'freeze_dried'],
  ['freeze_dried', 'freeze_dried'],
  ['freezedried', 'freeze_dried'],
  ['dehydrated', 'freeze_dried'],
  ['treat', 'treat'],
  ['treats', 'treat'],
  ['snack', 'treat'],
  ['snacks', 'treat'],
  ['chew', 'treat'],
  ['chews', 'treat'],
])

const LIFE_STAGE_SYNONYMS = new Map<string, LifeStage>([
  ['all life stages', 'all_life_stages'],
  ['all_life_stages', 'all_life_stages'],
  ['all ages', 'all_life_stages'],
  ['puppy', 'puppy'],
  ['junior', 'puppy'],
  ['growth', 'puppy'],
  ['kitten', 'kitten'],
  ['adult', 'adult'],
  ['maintenance', 'adult'],
  ['senior', 'senior'],
  ['mature', 'senior'],
  ['aging', 'senior'],
  ['veteran', 'senior'],
])

/**
 * Look up a synonym table: whole phrase first, then windows of three, two
 * and one words, left to right. Never substring matching.
 */
function lookupSynonym<T>(table: ReadonlyMap<string, T>, raw: string | null | undefined): T | null {
  if (!raw) return null
  const normalized = normalizeText(raw)
  if (!normalized) return null

  const whole = table.get(normalized)
  if (whole !== undefined) return whole

  const tokens = normalized.split(' ')
  for (let i = 0; i < tokens.length; i++) {
    if (i + 2 < tokens.length) {
      const triple = table.get(tokens.slice(i, i + 3).join(' '))
      if (triple !== undefined) return triple
    }
    if (i + 1 < tokens.length) {
      const pair = table.get(`${tokens[i]} ${tokens[i + 1]}`)
      if (pair !== undefined) return pair
    }
    const single = table.get(tokens[i])
    if (single !== undefined) return single
  }
  return null
}

/**
 * Map raw form text to a form; missing or unknown text is "any".
 */
export function normalizeForm(formRaw: string | null | undefined): Form {
  return lookupSynonym(FORM_SYNONYMS, formRaw) ?? 'any'
}

/**
 * Map raw life-stage text to a life stage. When the field is empty, the
 * product name is searched for the same words.
 */
export function normalizeLifeStage(
  lifeStageRaw: string | null | undefined,
  productName?: string | null
): LifeStage | null {
  return lookupSynonym(LIFE_STAGE_SYNONYMS, lifeStageRaw) ?? lookupSynonym(LIFE_STAGE_SYNONYMS, productName)
}
