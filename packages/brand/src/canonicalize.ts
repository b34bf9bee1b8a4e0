import { normalizeBrandString, slugifyBrand, startsWithTokens, titleCase, tokenize } from './normalization'

export interface BrandAliasEntry {
  /** Phrase as curated, e.g. "Royal Canin" or "Hill's Science Plan" */
  alias: string
  brandSlug: string
  brandLine?: string | null
  /** Phrase that must never trigger a match, e.g. "Royal Canine" */
  isDenylisted?: boolean
  /** Display name of the canonical brand */
  displayName?: string
}

/**
 * Known split-brand shape: the brand field holds `stem`, the product name starts with `fragment`.
 */
export interface SplitPattern {
  stem: string
  fragment: string
  brandSlug: string
  brandLine?: string | null
}

export interface BrandAliasMap {
  version: string
  entries: BrandAliasEntry[]
  splitPatterns: SplitPattern[]
  /** Slugs that must always resolve to a longer canonical slug */
  incompleteStems: string[]
}

export type BrandConfidence = 'high' | 'medium' | 'low'

export interface CanonicalBrand {
  brandSlug: string
  brandLine: string | null
  /** Display name */
  brand: string
  cleanedProductName: string
  confidence: BrandConfidence
  matchedAlias: string | null
  /** True when leading product-name words were moved into the brand */
  splitRepaired: boolean
}

interface CompiledAlias {
  tokens: string[]
  phrase: string
  brandSlug: string
  brandLine: string | null
}

export interface CompiledAliasMap {
  version: string
  /** Longest first: token count, then length, then lexical */
  aliases: CompiledAlias[]
  denylist: string[][]
  displayNames: Map<string, string>
  splitPatterns: Array<SplitPattern & { stemTokens: string[]; fragmentTokens: string[] }>
  incompleteStems: Set<string>
}

function compareAliases(a: CompiledAlias, b: CompiledAlias): number {
  if (a.tokens.length !== b.tokens.length) return b.tokens.length - a.tokens.length
  if (a.phrase.length !== b.phrase.length) return b.phrase.length - a.phrase.length
  if (a.phrase !== b.phrase) return a.phrase < b.phrase ? -1 : 1
  return a.brandSlug < b.brandSlug ? -1 : a.brandSlug > b.brandSlug ? 1 : 0
}

const compiledCache = new WeakMap<BrandAliasMap, CompiledAliasMap>()

/**
 * Tokenize and order an alias map for matching. Split patterns become
 * implicit "stem fragment" aliases unless the map already has that phrase.
 */
export function compileAliasMap(map: BrandAliasMap): CompiledAliasMap {
  const cached = compiledCache.get(map)
  if (cached) return cached

  const aliases: CompiledAlias[] = []
  const denylist: string[][] = []
  const displayNames = new Map<string, string>()
  const seen = new Set<string>()

  for (const entry of map.entries) {
    const tokens = tokenize(entry.alias)
    if (tokens.length === 0) continue
    const phrase = tokens.join(' ')

    if (entry.isDenylisted) {
      denylist.push(tokens)
      continue
    }

    if (entry.displayName && !displayNames.has(entry.brandSlug)) {
      displayNames.set(entry.brandSlug, entry.displayName)
    }
    if (seen.has(phrase)) continue
    seen.add(phrase)
    aliases.push({ tokens, phrase, brandSlug: entry.brandSlug, brandLine: entry.brandLine ?? null })
  }

  const splitPatterns = map.splitPatterns.map((pattern) => ({
    ...pattern,
    stemTokens: tokenize(pattern.stem),
    fragmentTokens: tokenize(pattern.fragment),
  }))

  for (const pattern of splitPatterns) {
    const tokens = [...pattern.stemTokens, ...pattern.fragmentTokens]
    const phrase = tokens.join(' ')
    if (pattern.fragmentTokens.length === 0 || seen.has(phrase)) continue
    seen.add(phrase)
    aliases.push({ tokens, phrase, brandSlug: pattern.brandSlug, brandLine: pattern.brandLine ?? null })
  }

  aliases.sort(compareAliases)

  const compiled: CompiledAliasMap = {
    version: map.version,
    aliases,
    denylist,
    displayNames,
    splitPatterns,
    incompleteStems: new Set(map.incompleteStems),
  }
  compiledCache.set(map, compiled)
  return compiled
}

/**
 * True when a denylisted phrase matches the start of `tokens` and covers at least `minLength` tokens.
 */
export function isDenylistedPrefix(
  compiled: CompiledAliasMap,
  tokens: readonly string[],
  minLength = 1
): boolean {
  return compiled.denylist.some(
    (phrase) => phrase.length >= minLength && startsWithTokens(tokens, phrase)
  )
}

/**
 * Display name for a brand slug: curated name, else the slug title-cased.
 */
export function brandDisplayName(compiled: CompiledAliasMap, brandSlug: string): string {
  return compiled.displayNames.get(brandSlug) ?? titleCase(brandSlug.replace(/_/g, ' '))
}

interface NameWords {
  words: string[]
  tokens: string[]
  /** tokens consumed after the first i+1 words */
  boundaries: number[]
}

function splitName(productNameRaw: string): NameWords {
  const words = productNameRaw.trim().split(/\s+/).filter((word) => word.length > 0)
  const tokens: string[] = []
  const boundaries: number[] = []
  for (const word of words) {
    tokens.push(...tokenize(word))
    boundaries.push(tokens.length)
  }
  return { words, tokens, boundaries }
}

/**
 * Number of leading raw words that cover exactly `count` name tokens, or -1
 * when the match would end inside a word. Words that normalize to nothing
 * ("-", "|") right after the match are taken along.
 */
function wordsCovering(name: NameWords, count: number): number {
  let covering = -1
  name.boundaries.forEach((boundary, index) => {
    if (boundary === count) covering = index + 1
  })
  return covering
}

function matchBrand(
  compiled: CompiledAliasMap,
  brandRaw: string | null | undefined,
  productNameRaw: string | null | undefined
): CanonicalBrand {
  const brandTokens = tokenize(normalizeBrandString(brandRaw))
  const name = splitName(productNameRaw ?? '')
  const stream = [...brandTokens, ...name.tokens]
  const collapsedName = name.words.join(' ')

  for (const alias of compiled.aliases) {
    if (!startsWithTokens(stream, alias.tokens)) continue

    const end = alias.tokens.length
    let wordsTaken = 0
    if (end > brandTokens.length) {
      wordsTaken = wordsCovering(name, end - brandTokens.length)
      if (wordsTaken < 0) continue
    }

    if (isDenylistedPrefix(compiled, stream, end)) continue

    const leftover = end < brandTokens.length ? brandTokens.slice(end).join('_') : null
    const splitRepaired = wordsTaken > 0

    return {
      brandSlug: alias.brandSlug,
      brandLine: alias.brandLine ?? leftover,
      brand: brandDisplayName(compiled, alias.brandSlug),
      cleanedProductName: splitRepaired ? name.words.slice(wordsTaken).join(' ') : collapsedName,
      confidence: splitRepaired || leftover ? 'medium' : 'high',
      matchedAlias: alias.phrase,
      splitRepaired,
    }
  }

  const trimmedBrand = (brandRaw ?? '').trim()
  return {
    brandSlug: slugifyBrand(trimmedBrand) ?? 'unknown',
    brandLine: null,
    brand: trimmedBrand.length > 0 ? titleCase(trimmedBrand) : 'Unknown',
    cleanedProductName: collapsedName,
    confidence: 'low',
    matchedAlias: null,
    splitRepaired: false,
  }
}

/**
 * Resolve raw brand and product-name text to a canonical brand.
 *
 * Aliases are matched whole-word over `brand tokens ++ name tokens`, longest
 * first. A match that runs into the product name repairs a split brand
 * ("Royal" + "Canin Adult" -> royal_canin + "Adult"). A denylisted phrase that
 * covers at least as much of the stream vetoes the match.
 *
 * The result is then matched again as (brandSlug, cleanedProductName) until
 * nothing changes, so a repeated product line is stripped too
 * ("Pro Plan" + "Pro Plan Adult" -> purina + "Adult") and feeding the output
 * back in returns the same slug and name.
 *
 * No match: the raw brand is slugged and flagged `confidence: 'low'`.
 */
export function canonicalizeBrand(
  brandRaw: string | null | undefined,
  productNameRaw: string | null | undefined,
  aliasMap: BrandAliasMap
): CanonicalBrand {
  const compiled = compileAliasMap(aliasMap)
  let result = matchBrand(compiled, brandRaw, productNameRaw)

  // Each change strips at least one name word or moves to another slug.
  const maxPasses = splitName(productNameRaw ?? '').words.length + 2
  for (let pass = 0; pass < maxPasses; pass++) {
    const again = matchBrand(compiled, result.brandSlug, result.cleanedProductName)
    if (again.brandSlug === result.brandSlug && again.cleanedProductName === result.cleanedProductName) break

    const sameBrand = again.brandSlug === result.brandSlug
    result = {
      ...result,
      brandSlug: again.brandSlug,
      brand: again.brand,
      brandLine: sameBrand ? result.brandLine ?? again.brandLine : again.brandLine,
      cleanedProductName: again.cleanedProductName,
      matchedAlias: result.matchedAlias ?? again.matchedAlias,
    }
  }

  return result
}
