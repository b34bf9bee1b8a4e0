/**
 * Field precedence as an ordered list of named strategies.
 *
 * Each field of a canonical product is resolved by asking the strategies in
 * order; the first one that yields a value wins and names the provenance.
 */

import type { Provenance } from '../records/schema'

export const FIELD_PRECEDENCE = ['override', 'best-scored-merge', 'derived-default'] as const

export type PrecedenceStrategy = (typeof FIELD_PRECEDENCE)[number]

export interface Candidate<T> {
  value: T
  /** null when the value predates provenance tracking or was never attributed */
  provenance: Provenance | null
}

/**
 * What each strategy offers for one field. `undefined` means the strategy has
 * nothing to say; a Candidate whose value is null is an explicit null.
 */
export type FieldCandidates<T> = Partial<Record<PrecedenceStrategy, Candidate<T>>>

export interface Resolved<T> {
  value: T
  provenance: Provenance | null
  strategy: PrecedenceStrategy | null
}

/**
 * Resolve one field: strategies are evaluated left to right and the first
 * non-null value wins. An override candidate wins even when null (a cleared field).
 */
export function resolveField<T>(
  candidates: FieldCandidates<T | null>,
  order: readonly PrecedenceStrategy[] = FIELD_PRECEDENCE
): Resolved<T | null> {
  for (const strategy of order) {
    const candidate = candidates[strategy]
    if (candidate === undefined) continue
    if (candidate.value !== null || strategy === 'override') {
      return { value: candidate.value, provenance: candidate.provenance, strategy }
    }
  }
  return { value: null, provenance: null, strategy: null }
}

/**
 * Resolve a field that always has a value (brand, product name, form).
 */
export function resolveRequiredField<T>(
  candidates: FieldCandidates<T>,
  fallback: Candidate<T>,
  order: readonly PrecedenceStrategy[] = FIELD_PRECEDENCE
): Resolved<T> {
  for (const strategy of order) {
    const candidate = candidates[strategy]
    if (candidate !== undefined) {
      return { value: candidate.value, provenance: candidate.provenance, strategy }
    }
  }
  return { value: fallback.value, provenance: fallback.provenance, strategy: null }
}
