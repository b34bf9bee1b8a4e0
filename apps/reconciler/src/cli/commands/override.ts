import { ZodError } from 'zod'
import { revokeOverride, setOverride } from '../../overrides/editor'
import type { CommandContext } from '../context'

interface OverrideSetCommandArgs {
  id?: string
  productKey?: string
  brandSlug?: string
  /** JSON object of field values */
  fields: string
  reason: string
}

interface OverrideRevokeCommandArgs {
  id: string
}

type JsonParseResult = { ok: true; value: unknown } | { ok: false; error: string }

function parseJson(raw: string): JsonParseResult {
  try {
    const value: unknown = JSON.parse(raw)
    return { ok: true, value }
  } catch (error) {
    return { ok: false, error: error instanceof Error ? error.message : String(error) }
  }
}

export async function runOverrideSetCommand(args: OverrideSetCommandArgs, context: CommandContext): Promise<number> {
  if (!args.fields) {
    console.error('Missing --fields \'{"field": value}\'')
    return 2
  }
  const fields = parseJson(args.fields)
  if (!fields.ok) {
    console.error(`Invalid --fields JSON: ${fields.error}`)
    return 2
  }

  try {
    const override = await setOverride(
      { store: context.store, lease: context.lease, now: context.now },
      {
        id: args.id,
        productKey: args.productKey,
        brandSlug: args.brandSlug,
        fields: fields.value,
        reason: args.reason,
      }
    )
    console.log(JSON.stringify(override, null, 2))
    return 0
  } catch (error) {
    if (error instanceof ZodError) {
      for (const issue of error.issues) {
        console.error(`${issue.path.join('.') || 'override'}: ${issue.message}`)
      }
      return 2
    }
    throw error
  }
}

export async function runOverrideRevokeCommand(
  args: OverrideRevokeCommandArgs,
  context: CommandContext
): Promise<number> {
  if (!args.id) {
    console.error('Missing --id <overrideId>')
    return 2
  }

  const revoked = await revokeOverride({ store: context.store, lease: context.lease, now: context.now }, args.id)
  if (!revoked) {
    console.error(`Override ${args.id} is unknown or already revoked`)
    return 1
  }
  console.log(`Revoked ${revoked.id} at ${revoked.revokedAt ?? ''}`)
  return 0
}
