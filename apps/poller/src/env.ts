/**
 * Environment loader - import first, before any module that reads process.env.
 *
 * Loads apps/poller/.env.local outside production. Production deployments
 * inject variables directly.
 */
import { config } from 'dotenv'
import { fileURLToPath } from 'url'

if (process.env.NODE_ENV !== 'production') {
  config({ path: fileURLToPath(new URL('../.env.local', import.meta.url)) })
}
