import { loadDefaultAliasMap } from '../../config/data'
import { runGuards } from '../../guards/report'
import type { CommandContext } from '../context'

/**
 * Re-check the published preview against the current alias map and merge log.
 * Prints the machine-readable report; exits 1 when any guard has violations.
 */
export async function runGuardsCommand(context: CommandContext): Promise<number> {
  const { store } = context
  const preview = await store.readPublished('preview')
  if (!preview) {
    console.error('No published preview to check')
    return 1
  }

  const aliasMap = (await store.readAliasMap()) ?? loadDefaultAliasMap()
  const mergeDecisions = await store.readMergeDecisions()
  const { report } = runGuards(preview.products, { aliasMap, mergeDecisions })

  console.log(
    JSON.stringify(
      {
        runId: preview.runId,
        status: report.status,
        guards: report.guards.map((guard) => ({
          guard_name: guard.guardName,
          violation_count: guard.violationCount,
          sample_violations: guard.sampleViolations,
        })),
      },
      null,
      2
    )
  )

  return report.guards.some((guard) => guard.violationCount > 0) ? 1 : 0
}
