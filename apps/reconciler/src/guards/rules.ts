/**
 * Guard / Invariant Checker
 *
 * Guards are pure predicates over a published product set. Each returns the
 * products that break its invariant; the target is always an empty list.
 *
 * - ORPHAN_FRAGMENT: name starts with a split pattern's fragment under another brand
 * - INCOMPLETE_SLUG: brand slug is a known partial stem ("royal", "arden")
 * - SPLIT_BRAND: brand text is a stem and the name starts with its fragment
 * - KEY_COLLISION: one key maps to several products without an approved decision
 */

import {
  compileAliasMap,
  isDenylistedPrefix,
  normalizeBrandString,
  startsWithTokens,
  tokenize,
  type BrandAliasMap,
  type CompiledAliasMap,
} from '@kibble/brand'
import { approvedDecision } from '../merge/collisions'
import { compareStrings } from '../merge/merge'
import type { CanonicalProduct, GuardName, MergeDecision, Violation } from '../types'

export interface GuardContext {
  aliasMap: BrandAliasMap
  mergeDecisions: readonly MergeDecision[]
}

export interface GuardRule {
  name: GuardName
  description: string
  check(products: readonly CanonicalProduct[], context: GuardContext): Violation[]
}

function violation(guard: GuardName, product: CanonicalProduct, detail: string): Violation {
  return {
    guard,
    productKey: product.productKey,
    brandSlug: product.brandSlug,
    productName: product.productName,
    detail,
  }
}

/**
 * Split patterns whose fragment opens the product name, as whole words.
 * A denylisted phrase spanning stem and fragment suppresses the match.
 */
function leadingFragments(compiled: CompiledAliasMap, product: CanonicalProduct) {
  const nameTokens = tokenize(product.productName)
  return compiled.splitPatterns.filter((pattern) => {
    if (!startsWithTokens(nameTokens, pattern.fragmentTokens)) return false
    const stream = [...pattern.stemTokens, ...nameTokens]
    return !isDenylistedPrefix(compiled, stream, pattern.stemTokens.length + pattern.fragmentTokens.length)
  })
}

export const orphanFragmentGuard: GuardRule = {
  name: 'ORPHAN_FRAGMENT',
  description: 'Product name starts with an orphaned brand fragment',
  check(products, context) {
    const compiled = compileAliasMap(context.aliasMap)
    const violations: Violation[] = []
    for (const product of products) {
      const pattern = leadingFragments(compiled, product).find(
        (candidate) => candidate.brandSlug !== product.brandSlug
      )
      if (!pattern) continue
      violations.push(
        violation(
          'ORPHAN_FRAGMENT',
          product,
          `Name starts with "${pattern.fragment}" (expected brand ${pattern.brandSlug})`
        )
      )
    }
    return violations
  },
}

export const incompleteSlugGuard: GuardRule = {
  name: 'INCOMPLETE_SLUG',
  description: 'Brand slug is a known partial stem',
  check(products, context) {
    const compiled = compileAliasMap(context.aliasMap)
    return products
      .filter((product) => compiled.incompleteStems.has(product.brandSlug))
      .map((product) => violation('INCOMPLETE_SLUG', product, `Incomplete brand slug "${product.brandSlug}"`))
  },
}

export const splitBrandGuard: GuardRule = {
  name: 'SPLIT_BRAND',
  description: 'Brand and name hold the two halves of a split brand',
  check(products, context) {
    const compiled = compileAliasMap(context.aliasMap)
    const violations: Violation[] = []
    for (const product of products) {
      const brandText = normalizeBrandString(product.brand)
      if (brandText === undefined) continue
      const pattern = leadingFragments(compiled, product).find(
        (candidate) => candidate.stemTokens.join(' ') === brandText
      )
      if (!pattern) continue
      violations.push(violation('SPLIT_BRAND', product, `${pattern.stem}|${pattern.fragment} split`))
    }
    return violations
  },
}

export const keyCollisionGuard: GuardRule = {
  name: 'KEY_COLLISION',
  description: 'Key maps to more than one product without an approved merge-log decision',
  check(products, context) {
    const violations: Violation[] = []

    const byProductKey = groupBy(products, (product) => product.productKey)
    for (const [productKey, group] of byProductKey) {
      if (group.length < 2 || approvedDecision(context.mergeDecisions, productKey)) continue
      violations.push(
        violation('KEY_COLLISION', group[0], `${group.length} products share key ${productKey}`)
      )
    }

    const byBaseKey = groupBy(products, (product) => product.baseKey)
    for (const [baseKey, group] of byBaseKey) {
      const keys = [...new Set(group.map((product) => product.productKey))].sort()
      if (keys.length < 2 || approvedDecision(context.mergeDecisions, baseKey)) continue
      violations.push(
        violation('KEY_COLLISION', group[0], `Base key ${baseKey} split into ${keys.join(', ')}`)
      )
    }

    return violations
  },
}

function groupBy<T>(items: readonly T[], key: (item: T) => string): Map<string, T[]> {
  const groups = new Map<string, T[]>()
  for (const item of items) {
    const k = key(item)
    const group = groups.get(k)
    if (group) {
      group.push(item)
    } else {
      groups.set(k, [item])
    }
  }
  return groups
}

export const GUARD_RULES: readonly GuardRule[] = [
  orphanFragmentGuard,
  incompleteSlugGuard,
  splitBrandGuard,
  keyCollisionGuard,
]

export function getGuardRule(name: GuardName): GuardRule {
  const rule = GUARD_RULES.find((candidate) => candidate.name === name)
  if (!rule) {
    throw new Error(`Unknown guard: ${name}`)
  }
  return rule
}

/**
 * Evaluate one guard. Violations come back ordered by product key.
 */
export function checkGuard(
  rule: GuardRule,
  products: readonly CanonicalProduct[],
  context: GuardContext
): Violation[] {
  return rule
    .check(products, context)
    .sort((a, b) => compareStrings(a.productKey, b.productKey) || compareStrings(a.detail, b.detail))
}
