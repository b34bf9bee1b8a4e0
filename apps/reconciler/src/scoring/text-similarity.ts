/**
 * Text Similarity Module
 *
 * Token Jaccard over normalized product names, used to decide whether records
 * sharing a key really describe one product.
 */

import { tokenize as tokenizeText } from '@kibble/brand'
import { isPackSizeToken } from '../keys/pack-size'

/**
 * Tokenize a product name for similarity comparison
 *
 * Normalizations:
 * - Brand normalization (lowercase, diacritics, "&" -> "and", apostrophes dropped)
 * - Pack sizes removed ("400g" says nothing about which product it is)
 * - Optional stop words removed
 */
export function tokenize(text: string, stopWords: ReadonlySet<string> = new Set()): string[] {
  return tokenizeText(text).filter((token) => !isPackSizeToken(token) && !stopWords.has(token))
}

/**
 * Jaccard(A, B) = |A ∩ B| / |A ∪ B| over token sets
 */
export function jaccardFromTokens(tokens1: readonly string[], tokens2: readonly string[]): number {
  const set1 = new Set(tokens1)
  const set2 = new Set(tokens2)

  // Two empty names are the same (empty) name
  if (set1.size === 0 && set2.size === 0) return 1
  if (set1.size === 0 || set2.size === 0) return 0

  let intersection = 0
  for (const token of set1) {
    if (set2.has(token)) intersection++
  }

  const union = set1.size + set2.size - intersection
  return union === 0 ? 0 : intersection / union
}

/**
 * Compute Jaccard similarity between two product names
 */
export function jaccardSimilarity(
  text1: string,
  text2: string,
  stopWords: ReadonlySet<string> = new Set()
): number {
  return jaccardFromTokens(tokenize(text1, stopWords), tokenize(text2, stopWords))
}
