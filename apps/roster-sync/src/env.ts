/**
 * Environment loader - must be imported first before any other modules
 *
 * Loads apps/roster-sync/.env.local outside production.
 */
import { config } from 'dotenv'
import { dirname, resolve } from 'node:path'
import { fileURLToPath } from 'node:url'

if (process.env.NODE_ENV !== 'production') {
  const appDir = resolve(dirname(fileURLToPath(import.meta.url)), '..')
  config({ path: resolve(appDir, '.env.local') })
}
