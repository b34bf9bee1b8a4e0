/**
 * Override edits. Writes to one target (a product key or a brand slug) are
 * serialized through a single-writer lock so concurrent editors cannot
 * interleave a read-modify-write.
 */

import { randomUUID } from 'crypto'
import { ReconcileError } from '../errors'
import { loggers } from '../config/logger'
import { overrideSchema } from '../records/schema'
import { overrideLockKey, withLease, type RunLease } from '../lease/run-lease'
import type { CatalogStore } from '../store/types'
import type { Override } from '../types'

const log = loggers.overrides

export interface OverrideEditorDeps {
  store: CatalogStore
  lease: RunLease
  now?: () => Date
  /** Lock attempts before giving up (default: 5) */
  attempts?: number
  retryDelayMs?: number
}

export interface OverrideDraft {
  id?: string
  productKey?: string | null
  brandSlug?: string | null
  fields: unknown
  reason: string
}

function sleep(ms: number) {
  return new Promise((resolve) => setTimeout(resolve, ms))
}

function lockTarget(override: Pick<Override, 'productKey' | 'brandSlug'>): string {
  return override.productKey ?? `brand:${override.brandSlug ?? ''}`
}

async function underTargetLock<T>(deps: OverrideEditorDeps, target: string, work: () => Promise<T>): Promise<T> {
  const key = overrideLockKey(target)
  const attempts = deps.attempts ?? 5
  for (let attempt = 1; attempt <= attempts; attempt++) {
    const result = await withLease(deps.lease, key, work)
    if (result) return result.value
    log.debug('Override target busy', { key, attempt })
    if (attempt < attempts) await sleep(deps.retryDelayMs ?? 200)
  }
  throw new ReconcileError('LEASE_UNAVAILABLE', `Override target ${target} is locked by another editor`, {
    details: { key, attempts },
  })
}

/**
 * Validate and store an override. Throws the ZodError when the draft is invalid.
 */
export async function setOverride(deps: OverrideEditorDeps, draft: OverrideDraft): Promise<Override> {
  const override = overrideSchema.parse({
    id: draft.id ?? randomUUID(),
    productKey: draft.productKey ?? null,
    brandSlug: draft.brandSlug ?? null,
    fields: draft.fields,
    reason: draft.reason,
    createdAt: (deps.now ?? (() => new Date()))().toISOString(),
    revokedAt: null,
  })

  await underTargetLock(deps, lockTarget(override), () => deps.store.writeOverride(override))
  log.info('Override set', {
    overrideId: override.id,
    productKey: override.productKey,
    brandSlug: override.brandSlug,
    fields: Object.keys(override.fields),
  })
  return override
}

/**
 * Revoke an override by id. Returns null when it is unknown or already revoked.
 */
export async function revokeOverride(deps: OverrideEditorDeps, id: string): Promise<Override | null> {
  const current = (await deps.store.readOverrides()).find((override) => override.id === id)
  if (!current) {
    log.warn('Override not found', { overrideId: id })
    return null
  }

  const revokedAt = (deps.now ?? (() => new Date()))().toISOString()
  const revoked = await underTargetLock(deps, lockTarget(current), () => deps.store.revokeOverride(id, revokedAt))
  if (revoked) {
    log.info('Override revoked', { overrideId: id, revokedAt })
  } else {
    log.warn('Override already revoked', { overrideId: id })
  }
  return revoked
}
