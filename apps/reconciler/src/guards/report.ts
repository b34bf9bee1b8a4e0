/**
 * Guard report: every registered guard evaluated over one product set.
 */

import type { CanonicalProduct, GuardReport, Violation } from '../types'
import { GUARD_RULES, checkGuard, type GuardContext, type GuardRule } from './rules'

export const GUARD_SAMPLE_SIZE = 5

export interface GuardRun {
  report: GuardReport
  /** Every violation, not only the samples */
  violations: Violation[]
}

export function runGuards(
  products: readonly CanonicalProduct[],
  context: GuardContext,
  rules: readonly GuardRule[] = GUARD_RULES
): GuardRun {
  const violations: Violation[] = []
  const guards = rules.map((rule) => {
    const found = checkGuard(rule, products, context)
    violations.push(...found)
    return {
      guardName: rule.name,
      violationCount: found.length,
      sampleViolations: found.slice(0, GUARD_SAMPLE_SIZE),
    }
  })

  return {
    report: {
      status: guards.every((guard) => guard.violationCount === 0) ? 'PASS' : 'FAIL',
      guards,
    },
    violations,
  }
}

export function guardsPassed(report: GuardReport): boolean {
  return report.status === 'PASS'
}
