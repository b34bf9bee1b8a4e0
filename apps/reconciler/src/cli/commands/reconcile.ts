import { reconcile, type RunResult } from '../../run/reconcile'
import type { CommandContext } from '../context'

interface ReconcileCommandArgs {
  watermark?: string
  shards?: number
  allowPending?: boolean
  dryRun?: boolean
  runId?: string
}

function printSummary(result: RunResult): void {
  console.log(`Run ${result.runId}: ${result.status} (watermark ${result.watermark})`)
  console.log(
    `  records ${result.stats.recordsRead} read, ${result.stats.recordsRejected} rejected; ` +
      `${result.stats.products} products, ${result.stats.productionProducts} in production`
  )
  if (result.guardReport) {
    for (const guard of result.guardReport.guards) {
      console.log(`  ${guard.guardName}: ${guard.violationCount}`)
    }
  }
  for (const issue of result.issues) {
    console.warn(`  ${issue.code}: ${issue.message}`)
  }
}

export async function runReconcileCommand(args: ReconcileCommandArgs, context: CommandContext): Promise<number> {
  if (args.shards !== undefined && (!Number.isInteger(args.shards) || args.shards < 1)) {
    console.error('--shards must be a positive integer')
    return 2
  }

  const { settings } = context
  const result = await reconcile(
    { store: context.store, lease: context.lease },
    {
      runId: args.runId,
      watermark: args.watermark,
      shards: args.shards ?? settings.shards,
      publishMode: settings.publishMode,
      allowPending: args.allowPending === true,
      dryRun: args.dryRun === true,
      collisionThreshold: settings.collisionThreshold,
      stripSingleSizes: settings.stripSingleSizes,
      priceBuckets: settings.priceBuckets,
      now: context.now,
    }
  )

  printSummary(result)

  if (result.status === 'SKIPPED') {
    return 0
  }
  return result.guardReport?.status === 'FAIL' ? 1 : 0
}
