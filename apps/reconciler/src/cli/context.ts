import { disconnectRedis } from '@kibble/redis'
import type { Settings } from '../config/settings'
import { createCatalogStore, type CatalogStore } from '../store'
import { MemoryRunLease, createRunLease, type RunLease } from '../lease'
import { ReconcileError } from '../errors'

/**
 * What every command runs against. Tests build one around a memory store.
 */
export interface CommandContext {
  settings: Settings
  store: CatalogStore
  lease: RunLease
  now?: () => Date
}

/**
 * Commands that write the catalog need the Redis lease: the memory lease only
 * serializes callers inside one process, and the file and pg stores are shared.
 * Read-only commands get an unused memory lease and never connect to Redis.
 */
export function openCommandContext(settings: Settings, options: { writes: boolean }): CommandContext {
  if (options.writes && settings.lease !== 'redis') {
    throw new ReconcileError(
      'CONFIGURATION_ERROR',
      `CATALOG_LEASE=${settings.lease} cannot guard a shared ${settings.store.kind} store; set CATALOG_LEASE=redis`,
      { details: { lease: settings.lease, store: settings.store.kind } }
    )
  }
  return {
    settings,
    store: createCatalogStore(settings),
    lease: options.writes ? createRunLease(settings) : new MemoryRunLease(),
  }
}

export async function closeCommandContext(context: CommandContext): Promise<void> {
  await context.store.close()
  if (context.lease.kind === 'redis') {
    await disconnectRedis()
  }
}

/**
 * Point the file store at another directory; other store kinds are left alone.
 */
export function withDataDir(settings: Settings, dataDir: string | undefined): Settings {
  if (!dataDir) return settings
  if (settings.store.kind !== 'file') return settings
  return { ...settings, store: { kind: 'file', dataDir } }
}
