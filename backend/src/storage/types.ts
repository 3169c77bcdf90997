import type { Address, Hash32 } from '@gatemint/core'

/**
 * Sale config as stored in MongoDB. Prices are decimal strings, since BSON
 * has no arbitrary-precision integer type.
 */
export interface StoredSaleConfig {
  presaleActive: boolean
  publicSaleActive: boolean
  whitelistUnitPrice: string
  publicUnitPrice: string
  maxSupply: number
  maxPublicMintPerAddress: number
  maxWhitelistMintPerAddress: number
}

/**
 * The single state document of a sale
 */
export interface SaleStateDocument {
  saleId: string
  config: StoredSaleConfig
  allowlistRoot: Hash32
  treasury: Address
  paused: boolean
  baseURI: string
  admins: Address[]
  updatedAt: Date
}

/**
 * Claim counters of one address in one sale
 */
export interface SaleClaimDocument {
  saleId: string
  address: Address
  whitelistClaimed: number
  publicClaimed: number
}
