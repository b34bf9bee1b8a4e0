import { PgCatalogStore, SCHEMA_FILE } from '../../store/pg-store'
import type { CommandContext } from '../context'

/**
 * Create the Postgres tables. The file and memory stores need no schema.
 */
export async function runSchemaApplyCommand(context: CommandContext): Promise<number> {
  if (!(context.store instanceof PgCatalogStore)) {
    console.error(`schema:apply needs CATALOG_STORE=pg (current store: ${context.store.kind})`)
    return 2
  }

  await context.store.ensureSchema()
  console.log(`Applied ${SCHEMA_FILE}`)
  return 0
}
