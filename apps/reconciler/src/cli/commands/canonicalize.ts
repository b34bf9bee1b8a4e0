import { canonicalizeBrand } from '@kibble/brand'
import { loadDefaultAliasMap } from '../../config/data'
import type { CommandContext } from '../context'

interface CanonicalizeCommandArgs {
  brand: string
  name: string
}

export async function runCanonicalizeCommand(args: CanonicalizeCommandArgs, context: CommandContext): Promise<number> {
  if (!args.name) {
    console.error('Missing --name "<product name>"')
    return 2
  }

  const aliasMap = (await context.store.readAliasMap()) ?? loadDefaultAliasMap()
  const brand = canonicalizeBrand(args.brand || null, args.name, aliasMap)
  console.log(JSON.stringify({ aliasMapVersion: aliasMap.version, ...brand }, null, 2))
  return 0
}
