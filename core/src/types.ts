/**
 * Gatemint Core Type Definitions
 *
 * Type definitions for the allowlist-gated issuance engine and the
 * collaborators it drives (token ledger, treasury, access control, storage).
 */

import type { HexString, PubKeyHex } from '@bsv/sdk'

import type { SaleErrorCode } from './errors.js'

// ---------------------------------------------------------------------------
// Primitive Types
// ---------------------------------------------------------------------------

/**
 * Hex encoding of the raw address bytes.
 * Identity keys (compressed public keys) are the usual form.
 */
export type Address = PubKeyHex

/** 32-byte hash as 64 hex characters */
export type Hash32 = HexString

/** Identifier of a unique issued asset */
export type AssetId = number

/**
 * The two independent buyer classes.
 * Each has its own price, per-address cap and claim counter.
 */
export type BuyerClass = 'whitelist' | 'public'

// ---------------------------------------------------------------------------
// Sale State
// ---------------------------------------------------------------------------

/**
 * Phase flags, prices and ceilings of the sale
 */
export interface SaleConfig {
  /** Whether the allowlisted presale is open */
  presaleActive: boolean
  /** Whether the public phase is open */
  publicSaleActive: boolean
  /** Price per unit for allowlisted buyers, in the smallest currency unit */
  whitelistUnitPrice: bigint
  /** Price per unit for public buyers, in the smallest currency unit */
  publicUnitPrice: bigint
  /** Global issuance ceiling */
  maxSupply: number
  /** Cumulative public-class claims allowed per address */
  maxPublicMintPerAddress: number
  /** Cumulative whitelist-class claims allowed per address */
  maxWhitelistMintPerAddress: number
}

/**
 * Per-address claim counters
 */
export interface ClaimRecord {
  whitelistClaimed: number
  publicClaimed: number
}

/**
 * Every singleton piece of persistent sale state
 */
export interface SaleState {
  config: SaleConfig
  /** Allowlist commitment (Merkle root) */
  allowlistRoot: Hash32
  /** Destination of all routed funds */
  treasury: Address
  paused: boolean
  /** Prefix for asset metadata URIs */
  baseURI: string
  /** Privileged set (the owner is implicit and never stored here) */
  admins: Address[]
}

// ---------------------------------------------------------------------------
// Collaborator Interfaces
// ---------------------------------------------------------------------------

/**
 * Persistence of sale state and the claim ledger.
 */
export interface SaleStateStore {
  /**
   * Store the initial state unless a state already exists.
   * @returns The state now in effect
   */
  initialize(initial: SaleState): Promise<SaleState>
  getState(): Promise<SaleState>
  /**
   * Apply every field of the patch in one write.
   * @returns The updated state
   */
  updateState(patch: Partial<SaleState>): Promise<SaleState>
  getClaims(address: Address): Promise<ClaimRecord | undefined>
  /**
   * Add `quantity` to one counter in a single atomic step, but only if the
   * result stays within `cap`. Creates the entry on first claim.
   * @returns The counters after the claim, or undefined when the cap would be exceeded
   */
  incrementClaims(address: Address, kind: BuyerClass, quantity: number, cap: number): Promise<ClaimRecord | undefined>
  /** Take back `quantity` from one counter (unwinding a mint that did not complete) */
  decrementClaims(address: Address, kind: BuyerClass, quantity: number): Promise<void>
}

/**
 * Ledger that owns the unique assets and tracks the issued count.
 */
export interface TokenLedger {
  /** Number of assets issued so far */
  totalIssued(): Promise<number>
  /**
   * Issue `quantity` new assets to `recipient`.
   * @returns Identifiers of the new assets
   */
  issue(recipient: Address, quantity: number): Promise<AssetId[]>
  /** Current owner, or undefined when the asset does not exist */
  ownerOf(assetId: AssetId): Promise<Address | undefined>
  burn(assetId: AssetId): Promise<void>
}

/**
 * Receives routed funds.
 * A deposit may run recipient code that calls back into the sale.
 */
export interface Treasury {
  deposit(treasury: Address, from: Address, amount: bigint): Promise<void>
  /** Reverse a deposit of a mint that did not complete */
  refund(treasury: Address, to: Address, amount: bigint): Promise<void>
}

/**
 * Capability check for the admin surface
 */
export interface AccessControl {
  isPrivileged(caller: Address): Promise<boolean>
}

/**
 * Notified after every successful mint, while the sale is still locked.
 */
export interface SaleObserver {
  onMint(receipt: MintReceipt): Promise<void>
}

// ---------------------------------------------------------------------------
// Operation Types
// ---------------------------------------------------------------------------

/**
 * Who is calling and how much value they attached
 */
export interface CallContext {
  caller: Address
  /** Attached payment (defaults to zero) */
  value?: bigint
}

/**
 * Effects of a successful mint
 */
export interface MintReceipt {
  kind: BuyerClass
  /** Normalised address of the buyer */
  buyer: Address
  quantity: number
  /** Identifiers issued to the buyer */
  assetIds: AssetId[]
  /** Attached value, all of which went to the treasury */
  paid: bigint
  /** quantity × unit price at the time of the mint */
  required: bigint
  /** Claim counters after the mint */
  claims: ClaimRecord
  /** Treasury that received the funds */
  treasury: Address
}

/**
 * Successful mint result
 */
export interface MintSuccess extends MintReceipt {
  success: true
}

/**
 * Rejected mint result. Nothing changed and no funds moved.
 */
export interface MintFailure {
  success: false
  kind: BuyerClass
  /** Lower-cased caller, or the caller as given when it is not an address */
  buyer: Address
  quantity: number
  /** Named failure condition */
  code: SaleErrorCode
  /** Human-readable description */
  error: string
}

/**
 * Result of a mint request
 */
export type MintResult = MintSuccess | MintFailure

// ---------------------------------------------------------------------------
// Configuration Types
// ---------------------------------------------------------------------------

/**
 * Initial sale settings. Any field left out takes its default.
 */
export interface SaleSettings extends Partial<SaleConfig> {
  /** Allowlist commitment (default: all-zero root, which admits nobody) */
  allowlistRoot?: Hash32
  /** Metadata URI prefix (default: '') */
  baseURI?: string
  /** Initial privileged set (default: empty) */
  admins?: Address[]
  /** Start paused (default: false) */
  paused?: boolean
}

/**
 * Gated sale configuration options
 */
export interface GatedSaleConfig {
  /** Distinguished owner with implicit admin capability */
  owner: Address
  /** Initial treasury destination */
  treasury: Address
  /** Initial sale settings */
  sale?: SaleSettings
  /** State persistence (default: new MemorySaleStore()) */
  store?: SaleStateStore
  /** Token ledger (default: new MemoryTokenLedger()) */
  tokenLedger?: TokenLedger
  /** Fund transfer (default: new MemoryTreasury()) */
  treasuryBank?: Treasury
  /** Capability check (default: owner or stored admin) */
  accessControl?: AccessControl
  /** Mint observers (default: none) */
  observers?: SaleObserver[]
}

/**
 * Gated sale configuration with all defaults applied
 */
export interface ResolvedGatedSaleConfig {
  owner: Address
  initialState: SaleState
  store: SaleStateStore
  tokenLedger: TokenLedger
  treasuryBank: Treasury
  accessControl: AccessControl
  observers: SaleObserver[]
}
