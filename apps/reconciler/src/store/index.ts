import type { Settings } from '../config/settings'
import { FileCatalogStore } from './file-store'
import { PgCatalogStore } from './pg-store'
import type { CatalogStore } from './types'

export * from './types'
export { FileCatalogStore } from './file-store'
export { MemoryCatalogStore, type MemoryStoreSeed } from './memory-store'
export { PgCatalogStore, type SqlClient, type SqlPool, type SqlPoolClient } from './pg-store'

export function createCatalogStore(settings: Pick<Settings, 'store'>): CatalogStore {
  switch (settings.store.kind) {
    case 'pg':
      return PgCatalogStore.connect(settings.store.databaseUrl)
    case 'file':
      return new FileCatalogStore(settings.store.dataDir)
  }
}
