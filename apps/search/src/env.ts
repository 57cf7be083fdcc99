/**
 * Environment loader - import first in entry points, before any config is read.
 *
 * Loads apps/search/.env.local in development only. Production injects
 * variables through the platform.
 */
import { config } from 'dotenv'
import { fileURLToPath } from 'node:url'

if (process.env.NODE_ENV !== 'production') {
  config({ path: fileURLToPath(new URL('../.env.local', import.meta.url)) })
}
