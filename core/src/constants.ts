/**
 * Gatemint Constants
 *
 * Defaults and protocol constants shared by the core library.
 */

import type { Hash32 } from './types.js'

// ---------------------------------------------------------------------------
// Commitment Constants
// ---------------------------------------------------------------------------

/** Length of every node of the allowlist tree */
export const HASH_BYTE_LENGTH = 32

/** Root that no authentication path can reproduce; admits nobody */
export const ZERO_ROOT: Hash32 = '00'.repeat(HASH_BYTE_LENGTH)

// ---------------------------------------------------------------------------
// Sale Defaults
// ---------------------------------------------------------------------------

/** Default global issuance ceiling */
export const DEFAULT_MAX_SUPPLY = 10000

/** Default per-address cap for both buyer classes */
export const DEFAULT_MAX_PER_ADDRESS = 5

/** Suffix appended to the asset id when resolving a metadata URI */
export const METADATA_URI_SUFFIX = '.json'

/** Identifier of the first asset the reference ledger issues */
export const FIRST_ASSET_ID = 1

// ---------------------------------------------------------------------------
// Operation Names
// ---------------------------------------------------------------------------

/** Names under which operations hold the sale lock (also used in logs) */
export const OPERATIONS = {
  WHITELIST_MINT: 'whitelistMint',
  PUBLIC_MINT: 'publicMint'
} as const
