/**
 * Environment loader - import first, before any module that reads process.env.
 *
 * Loads apps/reconciler/.env.local explicitly instead of a monorepo-root .env.
 * Production takes its environment from the process manager.
 */
import { config } from 'dotenv'
import { fileURLToPath } from 'url'
import { dirname, resolve } from 'path'

const __filename = fileURLToPath(import.meta.url)
const __dirname = dirname(__filename)
const envPath = resolve(__dirname, '..', '.env.local')

if (process.env.NODE_ENV !== 'production') {
  config({ path: envPath })
}
