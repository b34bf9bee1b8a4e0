/**
 * Publisher
 *
 * Splits a reconciled product set into the two views consumers read:
 * preview holds every canonical product, production only ACTIVE brands and
 * only when every guard passed.
 *
 * - strict: any violation publishes nothing
 * - preview-only: violations still publish preview; production is not promoted
 */

import type { AllowlistStatus, BrandAllowlist, CanonicalProduct, GuardReport, PublishMode } from '../types'

export type PublishOutcome = 'PUBLISHED' | 'PREVIEW_ONLY' | 'BLOCKED'

export interface PublishedViews {
  outcome: PublishOutcome
  /** null when the preview view is left as it was */
  preview: CanonicalProduct[] | null
  /** null when production is not promoted */
  production: CanonicalProduct[] | null
}

export interface PublishOptions {
  /** Promote PENDING brands to production as well (manual runs) */
  allowPending?: boolean
}

/**
 * Allowlist status of a brand; unlisted brands are PENDING.
 */
export function allowlistStatusFor(allowlist: BrandAllowlist, brandSlug: string): AllowlistStatus {
  return allowlist.brands.find((entry) => entry.brandSlug === brandSlug)?.status ?? 'PENDING'
}

export function inheritAllowlistStatus(
  products: readonly CanonicalProduct[],
  allowlist: BrandAllowlist
): CanonicalProduct[] {
  return products.map((product) => ({
    ...product,
    allowlistStatus: allowlistStatusFor(allowlist, product.brandSlug),
  }))
}

export function publish(
  products: readonly CanonicalProduct[],
  guardReport: GuardReport,
  allowlist: BrandAllowlist,
  mode: PublishMode,
  options: PublishOptions = {}
): PublishedViews {
  const withStatus = inheritAllowlistStatus(products, allowlist)

  if (guardReport.status === 'FAIL') {
    return mode === 'preview-only'
      ? { outcome: 'PREVIEW_ONLY', preview: withStatus, production: null }
      : { outcome: 'BLOCKED', preview: null, production: null }
  }

  const promotable = new Set<AllowlistStatus>(options.allowPending ? ['ACTIVE', 'PENDING'] : ['ACTIVE'])
  return {
    outcome: 'PUBLISHED',
    preview: withStatus,
    production: withStatus.filter((product) => promotable.has(product.allowlistStatus)),
  }
}
