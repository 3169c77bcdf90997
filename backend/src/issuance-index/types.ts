import type { Address, AssetId, BuyerClass } from '@gatemint/core'

/**
 * Query parameters for issuance lookups
 */
export interface IssuanceQuery {
  buyer?: Address
  kind?: BuyerClass
  limit?: number
  skip?: number
  sortOrder?: 'asc' | 'desc'
}

/**
 * A record stored in the issuance index, one per successful mint
 */
export interface IssuanceRecord {
  kind: BuyerClass
  buyer: Address
  quantity: number
  assetIds: AssetId[]
  paid: string
  required: string
  treasury: Address
  createdAt: Date
}

/**
 * Metadata describing the index
 */
export interface IssuanceIndexMetaData {
  name: string
  shortDescription: string
  iconURL?: string
  version?: string
  informationURL?: string
}
