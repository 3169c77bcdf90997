/**
 * GatedSale - allowlisted presale and public sale of unique assets
 *
 * Main class of the library. Provides:
 * - Presale minting with allowlist proofs
 * - Public minting
 * - Eligibility checks
 * - The privileged admin surface
 * - Reads of the published sale state
 */

import { OwnerAdminAccessControl } from './AccessControl.js'
import { AdminController } from './AdminController.js'
import { ClaimLedger } from './ClaimLedger.js'
import { METADATA_URI_SUFFIX, ZERO_ROOT } from './constants.js'
import { isSaleError, SaleError } from './errors.js'
import { IssuanceEngine } from './IssuanceEngine.js'
import { verify } from './MembershipProof.js'
import { MemorySaleStore } from './MemorySaleStore.js'
import { MemoryTokenLedger } from './MemoryTokenLedger.js'
import { MemoryTreasury } from './MemoryTreasury.js'
import { ReentrancyGuard } from './ReentrancyGuard.js'
import { resolveSaleConfig } from './SaleConfig.js'
import type {
  Address,
  AssetId,
  BuyerClass,
  CallContext,
  ClaimRecord,
  GatedSaleConfig,
  Hash32,
  MintReceipt,
  MintResult,
  ResolvedGatedSaleConfig,
  SaleConfig,
  SaleState,
  TokenLedger
} from './types.js'
import { isAddress, normalizeAddress, normalizeHash32 } from './utils.js'

/**
 * GatedSale
 *
 * @example
 * ```typescript
 * const tree = new AllowlistTree([alice, bob])
 * const sale = new GatedSale({
 *   owner,
 *   treasury,
 *   sale: { allowlistRoot: tree.getRoot(), whitelistUnitPrice: 1000n, presaleActive: true }
 * })
 *
 * // Presale mint with a proof
 * const result = await sale.whitelistMint({ caller: alice, value: 2000n }, 2, tree.getProof(alice))
 * if (!result.success) console.log(result.code, result.error)
 *
 * // Open the public phase
 * await sale.switchToPublicPhase(owner)
 * ```
 */
export class GatedSale {
  private readonly config: ResolvedGatedSaleConfig
  private readonly engine: IssuanceEngine
  private readonly admin: AdminController
  private readonly claims: ClaimLedger
  private initialized?: Promise<SaleState>

  constructor(config: GatedSaleConfig) {
    this.config = this.resolveConfig(config)

    const guard = new ReentrancyGuard()
    const { store, tokenLedger, treasuryBank, accessControl, observers } = this.config
    this.claims = new ClaimLedger(store)
    this.engine = new IssuanceEngine({ store, claims: this.claims, tokenLedger, treasuryBank, guard, observers })
    this.admin = new AdminController({ store, accessControl, tokenLedger, guard })
  }

  // ---------------------------------------------------------------------------
  // Minting
  // ---------------------------------------------------------------------------

  /**
   * Mint during the presale.
   *
   * Checks, in order: presale open, proof against the current root, the
   * caller's whitelist cap, payment, and the max supply. On success the whole
   * attached value goes to the treasury.
   *
   * @param ctx - Caller and attached payment
   * @param quantity - Number of assets (positive integer)
   * @param authPath - Authentication path for the caller
   * @returns Mint result; failures carry a code and change nothing
   */
  async whitelistMint(ctx: CallContext, quantity: number, authPath: readonly Hash32[]): Promise<MintResult> {
    await this.ready()
    return await this.toResult('whitelist', ctx, quantity, async () =>
      await this.engine.whitelistMint(ctx, quantity, authPath))
  }

  /**
   * Mint during the public phase. Same as `whitelistMint`, without a proof.
   */
  async publicMint(ctx: CallContext, quantity: number): Promise<MintResult> {
    await this.ready()
    return await this.toResult('public', ctx, quantity, async () =>
      await this.engine.publicMint(ctx, quantity))
  }

  /**
   * Whether the address is on the allowlist, whatever the phase or pause state.
   */
  async isEligible(authPath: readonly Hash32[], address: Address): Promise<boolean> {
    const { allowlistRoot } = await this.ready()
    return verify(authPath, allowlistRoot, address)
  }

  // ---------------------------------------------------------------------------
  // Admin Surface
  // ---------------------------------------------------------------------------

  async setAllowlistRoot(caller: Address, root: Hash32): Promise<void> {
    await this.ready()
    await this.admin.setAllowlistRoot(caller, root)
  }

  async setTreasury(caller: Address, treasury: Address): Promise<void> {
    await this.ready()
    await this.admin.setTreasury(caller, treasury)
  }

  async setBaseURI(caller: Address, baseURI: string): Promise<void> {
    await this.ready()
    await this.admin.setBaseURI(caller, baseURI)
  }

  async setUnitPrice(caller: Address, kind: BuyerClass, amount: bigint): Promise<void> {
    await this.ready()
    await this.admin.setUnitPrice(caller, kind, amount)
  }

  async setMaxSupply(caller: Address, maxSupply: number): Promise<void> {
    await this.ready()
    await this.admin.setMaxSupply(caller, maxSupply)
  }

  async setPerAddressCap(caller: Address, kind: BuyerClass, cap: number): Promise<void> {
    await this.ready()
    await this.admin.setPerAddressCap(caller, kind, cap)
  }

  async setPhase(caller: Address, presaleActive: boolean, publicSaleActive: boolean): Promise<void> {
    await this.ready()
    await this.admin.setPhase(caller, presaleActive, publicSaleActive)
  }

  async setPreSale(caller: Address, active: boolean): Promise<void> {
    await this.ready()
    await this.admin.setPreSale(caller, active)
  }

  /**
   * Open the presale. Leaves the public phase as it is.
   */
  async activatePreSale(caller: Address): Promise<void> {
    await this.setPreSale(caller, true)
  }

  async switchToPublicPhase(caller: Address): Promise<void> {
    await this.ready()
    await this.admin.switchToPublicPhase(caller)
  }

  async addAdmins(caller: Address, addresses: readonly Address[]): Promise<void> {
    await this.ready()
    await this.admin.addAdmins(caller, addresses)
  }

  async removeAdmins(caller: Address, addresses: readonly Address[]): Promise<void> {
    await this.ready()
    await this.admin.removeAdmins(caller, addresses)
  }

  async pause(caller: Address): Promise<void> {
    await this.ready()
    await this.admin.pause(caller)
  }

  async unpause(caller: Address): Promise<void> {
    await this.ready()
    await this.admin.unpause(caller)
  }

  /**
   * Burn an asset held by the caller. Requires privilege as well.
   */
  async burn(caller: Address, assetId: AssetId): Promise<void> {
    await this.ready()
    await this.admin.burn(caller, assetId)
  }

  // ---------------------------------------------------------------------------
  // Published State
  // ---------------------------------------------------------------------------

  async getSaleConfig(): Promise<SaleConfig> {
    await this.ready()
    return (await this.config.store.getState()).config
  }

  async getAllowlistRoot(): Promise<Hash32> {
    await this.ready()
    return (await this.config.store.getState()).allowlistRoot
  }

  async getTreasury(): Promise<Address> {
    await this.ready()
    return (await this.config.store.getState()).treasury
  }

  async isPaused(): Promise<boolean> {
    await this.ready()
    return (await this.config.store.getState()).paused
  }

  async getClaims(address: Address): Promise<ClaimRecord> {
    await this.ready()
    return await this.claims.get(normalizeAddress(address))
  }

  getOwner(): Address {
    return this.config.owner
  }

  async isAdmin(address: Address): Promise<boolean> {
    await this.ready()
    return (await this.config.store.getState()).admins.includes(normalizeAddress(address))
  }

  async totalIssued(): Promise<number> {
    return await this.config.tokenLedger.totalIssued()
  }

  /**
   * Metadata URI of an issued asset.
   *
   * @throws SaleError AssetNotFound for an id that was never issued or was burned
   */
  async assetURI(assetId: AssetId): Promise<string> {
    const { baseURI } = await this.ready()
    if ((await this.config.tokenLedger.ownerOf(assetId)) === undefined) {
      throw new SaleError('AssetNotFound', `Asset ${assetId} does not exist`)
    }
    return `${baseURI}${assetId}${METADATA_URI_SUFFIX}`
  }

  get tokenLedger(): TokenLedger {
    return this.config.tokenLedger
  }

  // ---------------------------------------------------------------------------
  // Private Methods
  // ---------------------------------------------------------------------------

  /**
   * Store the initial state once; later calls reuse the stored state.
   */
  private async ready(): Promise<SaleState> {
    if (this.initialized === undefined) {
      this.initialized = this.config.store.initialize(this.config.initialState)
      // Let a later call retry when the store was not reachable
      this.initialized.catch(() => { this.initialized = undefined })
    }
    await this.initialized
    return await this.config.store.getState()
  }

  private async toResult(
    kind: BuyerClass,
    ctx: CallContext,
    quantity: number,
    mint: () => Promise<MintReceipt>
  ): Promise<MintResult> {
    try {
      return { success: true, ...(await mint()) }
    } catch (error) {
      if (!isSaleError(error)) throw error
      return {
        success: false,
        kind,
        buyer: isAddress(ctx.caller) ? ctx.caller.toLowerCase() : ctx.caller,
        quantity,
        code: error.code,
        error: error.message
      }
    }
  }

  private resolveConfig(config: GatedSaleConfig): ResolvedGatedSaleConfig {
    const owner = normalizeAddress(config.owner)
    const store = config.store ?? new MemorySaleStore()
    const settings = config.sale ?? {}
    return {
      owner,
      initialState: {
        config: resolveSaleConfig(settings),
        allowlistRoot: normalizeHash32(settings.allowlistRoot ?? ZERO_ROOT),
        treasury: normalizeAddress(config.treasury),
        paused: settings.paused ?? false,
        baseURI: settings.baseURI ?? '',
        admins: [...new Set((settings.admins ?? []).map(normalizeAddress))]
      },
      store,
      tokenLedger: config.tokenLedger ?? new MemoryTokenLedger(),
      treasuryBank: config.treasuryBank ?? new MemoryTreasury(),
      accessControl: config.accessControl ?? new OwnerAdminAccessControl(owner, store),
      observers: config.observers ?? []
    }
  }
}
