/**
 * @gatemint/core - allowlist-gated issuance of unique assets
 *
 * This library provides:
 * - An allowlisted presale, membership proven against a Merkle root
 * - An open public phase
 * - Per-address claim caps for each buyer class and a global supply ceiling
 * - A privileged admin surface over prices, caps, phases and the allowlist
 *
 * @example
 * ```typescript
 * import { AllowlistTree, GatedSale } from '@gatemint/core'
 *
 * const tree = new AllowlistTree(allowlist)
 * const sale = new GatedSale({ owner, treasury, sale: { allowlistRoot: tree.getRoot() } })
 *
 * await sale.activatePreSale(owner)
 * const result = await sale.whitelistMint({ caller, value: 0n }, 1, tree.getProof(caller))
 * ```
 *
 * @packageDocumentation
 */

// Main class
export { GatedSale } from './GatedSale.js'

// Components
export { IssuanceEngine } from './IssuanceEngine.js'
export type { IssuanceEngineDeps } from './IssuanceEngine.js'
export { AdminController } from './AdminController.js'
export type { AdminControllerDeps } from './AdminController.js'
export { ClaimLedger } from './ClaimLedger.js'
export { OwnerAdminAccessControl } from './AccessControl.js'
export { ReentrancyGuard } from './ReentrancyGuard.js'
export type { ReentryMode } from './ReentrancyGuard.js'

// Allowlist commitments
export { AllowlistTree, verify, hashLeaf, hashPair, compareBytes } from './MembershipProof.js'

// Sale config helpers
export {
  DEFAULT_SALE_CONFIG,
  resolveSaleConfig,
  validateSaleConfig,
  isPhaseOpen,
  unitPriceFor,
  capFor,
  claimedFor,
  requiredPayment
} from './SaleConfig.js'

// In-process collaborators
export { MemorySaleStore } from './MemorySaleStore.js'
export { MemoryTokenLedger } from './MemoryTokenLedger.js'
export { MemoryTreasury } from './MemoryTreasury.js'
export type { DepositRecord, DepositHook, RefundRecord } from './MemoryTreasury.js'

// Errors
export { SaleError, InvariantViolationError, isSaleError } from './errors.js'
export type { SaleErrorCode } from './errors.js'

// Logging
export { log, logWithTimestamp, configureLogging } from './logging.js'

// Utilities
export { normalizeAddress, normalizeHash32, isAddress, isHash32, cloneState, emptyClaimRecord } from './utils.js'

// Types
export type {
  Address,
  Hash32,
  AssetId,
  BuyerClass,
  SaleConfig,
  ClaimRecord,
  SaleState,
  SaleStateStore,
  TokenLedger,
  Treasury,
  AccessControl,
  SaleObserver,
  CallContext,
  MintReceipt,
  MintSuccess,
  MintFailure,
  MintResult,
  SaleSettings,
  GatedSaleConfig,
  ResolvedGatedSaleConfig
} from './types.js'

// Constants
export {
  HASH_BYTE_LENGTH,
  ZERO_ROOT,
  DEFAULT_MAX_SUPPLY,
  DEFAULT_MAX_PER_ADDRESS,
  METADATA_URI_SUFFIX,
  FIRST_ASSET_ID,
  OPERATIONS
} from './constants.js'
