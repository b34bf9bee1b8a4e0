import '../env'
import { loadSettings } from '../config/settings'
import { loggers } from '../config/logger'
import { ReconcileError, classifyError, formatErrorForLog } from '../errors'
import { closeCommandContext, openCommandContext, withDataDir, type CommandContext } from './context'
import { asInteger, asOptionalString, asString, parseFlags } from './parse-flags'
import { runReconcileCommand } from './commands/reconcile'
import { runGuardsCommand } from './commands/guards'
import { runCanonicalizeCommand } from './commands/canonicalize'
import { runOverrideRevokeCommand, runOverrideSetCommand } from './commands/override'
import { runSchemaApplyCommand } from './commands/schema'

const log = loggers.cli

const COMMANDS = ['reconcile', 'guards', 'canonicalize', 'override:set', 'override:revoke', 'schema:apply'] as const
const WRITING_COMMANDS: ReadonlySet<string> = new Set(['reconcile', 'override:set', 'override:revoke'])

function printHelp(): void {
  console.log('Catalog reconciler CLI')
  console.log('')
  console.log('Commands:')
  console.log('  reconcile [--data-dir <dir>] [--watermark <iso>] [--shards <n>] [--allow-pending] [--dry-run]')
  console.log('  guards [--data-dir <dir>]')
  console.log('  canonicalize --brand "<brand>" --name "<product name>"')
  console.log('  override:set (--product-key <key> | --brand-slug <slug>) --fields \'<json>\' --reason "<why>" [--id <id>]')
  console.log('  override:revoke --id <overrideId>')
  console.log('  schema:apply')
  console.log('')
  console.log('Exit codes: 0 success or run lease held, 1 guard failure or blocked promotion, 2 usage or configuration error')
  console.log('reconcile and override:* need CATALOG_LEASE=redis')
}

function isCommand(value: string): value is (typeof COMMANDS)[number] {
  return COMMANDS.some((command) => command === value)
}

async function dispatch(
  command: (typeof COMMANDS)[number],
  flags: ReturnType<typeof parseFlags>,
  context: CommandContext
): Promise<number> {
  switch (command) {
    case 'reconcile':
      return runReconcileCommand(
        {
          watermark: asOptionalString(flags.watermark),
          shards: asInteger(flags.shards),
          allowPending: flags['allow-pending'] === true,
          dryRun: flags['dry-run'] === true,
          runId: asOptionalString(flags['run-id']),
        },
        context
      )
    case 'guards':
      return runGuardsCommand(context)
    case 'canonicalize':
      return runCanonicalizeCommand({ brand: asString(flags.brand), name: asString(flags.name) }, context)
    case 'override:set':
      return runOverrideSetCommand(
        {
          id: asOptionalString(flags.id),
          productKey: asOptionalString(flags['product-key']),
          brandSlug: asOptionalString(flags['brand-slug']),
          fields: asString(flags.fields),
          reason: asString(flags.reason),
        },
        context
      )
    case 'override:revoke':
      return runOverrideRevokeCommand({ id: asString(flags.id) }, context)
    case 'schema:apply':
      return runSchemaApplyCommand(context)
  }
}

async function main(): Promise<number> {
  const [, , command, ...rest] = process.argv
  if (!command || command === '--help' || command === '-h') {
    printHelp()
    return 0
  }

  const flags = parseFlags(rest)
  if (flags.help === true || flags.h === true) {
    printHelp()
    return 0
  }

  if (!isCommand(command)) {
    console.error(`Unknown command: ${command}`)
    printHelp()
    return 2
  }

  const settings = withDataDir(loadSettings(), asOptionalString(flags['data-dir']))
  const context = openCommandContext(settings, { writes: WRITING_COMMANDS.has(command) })
  try {
    return await dispatch(command, flags, context)
  } finally {
    await closeCommandContext(context)
  }
}

main()
  .then((exitCode) => {
    process.exit(exitCode)
  })
  .catch((error: unknown) => {
    const classified = classifyError(error)
    log.error('Command failed', formatErrorForLog(classified), error)
    console.error(error instanceof Error ? error.message : String(error))
    const configurationError = error instanceof ReconcileError && error.code === 'CONFIGURATION_ERROR'
    process.exit(configurationError ? 2 : 1)
  })
