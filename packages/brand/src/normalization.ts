/**
 * Brand and product-name text normalization shared by matching, slugging and guards.
 */

/**
 * Normalize free text for whole-word comparison.
 *
 * Trademark symbols go, diacritics are stripped, "&" becomes "and",
 * apostrophes vanish ("Hill's" -> "hills") and every other separator
 * becomes a single space.
 */
export function normalizeText(text?: string | null): string {
  if (!text) return ''

  let normalized = text

  // Strip trademark symbols BEFORE NFKD; NFKD turns ™ into "TM".
  normalized = normalized.replace(/[\u2122\u00AE\u00A9]/g, '')
  normalized = normalized.replace(/\((tm|r|c)\)/gi, '')

  normalized = normalized.normalize('NFKD')
  normalized = normalized.replace(/[\u0300-\u036f]/g, '')
  normalized = normalized.toLowerCase()
  normalized = normalized.replace(/&/g, ' and ')
  normalized = normalized.replace(/['\u2018\u2019`]/g, '')
  normalized = normalized.replace(/[^a-z0-9]+/g, ' ')

  return normalized.trim()
}

/**
 * Split normalized text into whole-word tokens.
 */
export function tokenize(text?: string | null): string[] {
  const normalized = normalizeText(text)
  return normalized.length > 0 ? normalized.split(' ') : []
}

/**
 * Normalize a brand string for matching.
 *
 * Like normalizeText, plus trailing corporate suffixes ("Ltd", "GmbH") are removed.
 *
 * @returns Normalized brand string, or undefined if nothing is left
 */
export function normalizeBrandString(brand?: string | null): string | undefined {
  const tokens = tokenize(brand)

  while (tokens.length > 1 && CORPORATE_SUFFIXES.has(tokens[tokens.length - 1])) {
    tokens.pop()
  }

  if (tokens.length === 0) {
    return undefined
  }

  return tokens.join(' ')
}

/**
 * Machine slug for a brand: normalized brand words joined with "_".
 */
export function slugifyBrand(brand?: string | null): string | undefined {
  return normalizeBrandString(brand)?.replace(/ /g, '_')
}

/**
 * Title-case whitespace-separated words, keeping inner punctuation.
 */
export function titleCase(text: string): string {
  return text
    .trim()
    .split(/\s+/)
    .filter((word) => word.length > 0)
    .map((word) => word.charAt(0).toUpperCase() + word.slice(1).toLowerCase())
    .join(' ')
}

/**
 * True when `tokens` begins with every token of `prefix`, in order.
 */
export function startsWithTokens(tokens: readonly string[], prefix: readonly string[]): boolean {
  if (prefix.length === 0 || prefix.length > tokens.length) return false
  return prefix.every((token, index) => tokens[index] === token)
}
