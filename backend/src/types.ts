/**
 * Type definitions for gatemint backend services
 * @module types
 */

// Re-export issuance index types
export type { IssuanceQuery, IssuanceRecord, IssuanceIndexMetaData } from './issuance-index/types.js'

// Re-export storage document types
export type { SaleStateDocument, SaleClaimDocument, StoredSaleConfig } from './storage/types.js'
