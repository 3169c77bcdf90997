/**
 * Backend configuration, read from the environment.
 */

export interface BackendConfig {
  /** MongoDB connection string */
  mongoUrl: string
  /** Database holding the sale collections */
  dbName: string
  /** Key of the sale document */
  saleId: string
}

export const DEFAULT_BACKEND_CONFIG: Readonly<BackendConfig> = {
  mongoUrl: 'mongodb://localhost:27017',
  dbName: 'gatemint',
  saleId: 'default'
}

/**
 * Resolve the backend config from environment variables:
 * GATEMINT_MONGO_URL, GATEMINT_MONGO_DB and GATEMINT_SALE_ID.
 */
export function loadBackendConfig (env: Record<string, string | undefined> = process.env): BackendConfig {
  const mongoUrl = nonEmpty(env.GATEMINT_MONGO_URL) ?? DEFAULT_BACKEND_CONFIG.mongoUrl
  if (!mongoUrl.startsWith('mongodb://') && !mongoUrl.startsWith('mongodb+srv://')) {
    throw new Error(`GATEMINT_MONGO_URL must be a mongodb:// or mongodb+srv:// URL, got: ${mongoUrl}`)
  }
  return {
    mongoUrl,
    dbName: nonEmpty(env.GATEMINT_MONGO_DB) ?? DEFAULT_BACKEND_CONFIG.dbName,
    saleId: nonEmpty(env.GATEMINT_SALE_ID) ?? DEFAULT_BACKEND_CONFIG.saleId
  }
}

function nonEmpty (value: string | undefined): string | undefined {
  const trimmed = value?.trim()
  return trimmed === undefined || trimmed === '' ? undefined : trimmed
}
