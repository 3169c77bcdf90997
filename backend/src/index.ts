/**
 * @gatemint/backend - MongoDB persistence and an issuance index for gated sales
 *
 * @example
 * ```typescript
 * import { connectSaleBackend, loadBackendConfig } from '@gatemint/backend'
 *
 * const backend = await connectSaleBackend(loadBackendConfig(), { owner, treasury })
 * await backend.sale.activatePreSale(owner)
 * const mints = await backend.issuanceIndex.lookup({ kind: 'whitelist' })
 * await backend.close()
 * ```
 *
 * @packageDocumentation
 */

import { Db, MongoClient } from 'mongodb'
import { GatedSale, log } from '@gatemint/core'
import type { GatedSaleConfig } from '@gatemint/core'
import { BackendConfig } from './config.js'
import createIssuanceIndex, { IssuanceIndex } from './issuance-index/IssuanceIndex.js'
import { MongoSaleStore } from './storage/MongoSaleStore.js'

/**
 * Sale settings for a MongoDB-backed sale. The store comes from the backend.
 */
export type SaleBackendConfig = Omit<GatedSaleConfig, 'store'> & {
  saleId?: string
}

export interface SaleBackend {
  sale: GatedSale
  store: MongoSaleStore
  issuanceIndex: IssuanceIndex
}

export interface ConnectedSaleBackend extends SaleBackend {
  close: () => Promise<void>
}

/**
 * Wire a sale to MongoDB: state and claims in a MongoSaleStore, and every
 * successful mint recorded in the issuance index.
 */
export function createSaleBackend (db: Db, config: SaleBackendConfig): SaleBackend {
  const { saleId, ...saleConfig } = config
  const store = new MongoSaleStore(db, saleId)
  const issuanceIndex = createIssuanceIndex(db)
  const sale = new GatedSale({
    ...saleConfig,
    store,
    observers: [...(saleConfig.observers ?? []), issuanceIndex]
  })
  return { sale, store, issuanceIndex }
}

/**
 * Connect to MongoDB and create the sale backend on the configured database.
 */
export async function connectSaleBackend (
  backendConfig: BackendConfig,
  config: SaleBackendConfig
): Promise<ConnectedSaleBackend> {
  const client = new MongoClient(backendConfig.mongoUrl)
  await client.connect()
  log.info(`Connected to MongoDB database ${backendConfig.dbName}`)

  const backend = createSaleBackend(client.db(backendConfig.dbName), {
    saleId: backendConfig.saleId,
    ...config
  })
  return {
    ...backend,
    close: async () => await client.close()
  }
}

export { MongoSaleStore, DEFAULT_SALE_ID } from './storage/MongoSaleStore.js'
export { IssuanceIndex } from './issuance-index/IssuanceIndex.js'
export { IssuanceStorageManager } from './issuance-index/IssuanceStorageManager.js'
export { loadBackendConfig, DEFAULT_BACKEND_CONFIG } from './config.js'
export type { BackendConfig } from './config.js'
export type {
  IssuanceQuery,
  IssuanceRecord,
  IssuanceIndexMetaData,
  SaleStateDocument,
  SaleClaimDocument,
  StoredSaleConfig
} from './types.js'
