/**
 * IssuanceEngine - allowlist-gated and public minting
 *
 * A mint checks, in order: phase, allowlist proof (presale only), the buyer's
 * per-address cap, payment, and the global supply. Only when every check has
 * passed does it count the claim, move funds and request issuance; a failure
 * in a later step undoes the earlier ones.
 */

import { OPERATIONS } from './constants.js'
import { ClaimLedger } from './ClaimLedger.js'
import { SaleError } from './errors.js'
import { log, logWithTimestamp } from './logging.js'
import { verify } from './MembershipProof.js'
import type { ReentrancyGuard } from './ReentrancyGuard.js'
import { capFor, claimedFor, isPhaseOpen, requiredPayment } from './SaleConfig.js'
import type {
  BuyerClass,
  CallContext,
  Hash32,
  MintReceipt,
  SaleObserver,
  SaleStateStore,
  TokenLedger,
  Treasury
} from './types.js'
import { checkedAdd, isPositiveSafeInteger, normalizeAddress } from './utils.js'

export interface IssuanceEngineDeps {
  store: SaleStateStore
  claims: ClaimLedger
  tokenLedger: TokenLedger
  treasuryBank: Treasury
  guard: ReentrancyGuard
  observers: SaleObserver[]
}

export class IssuanceEngine {
  constructor(private readonly deps: IssuanceEngineDeps) { }

  /**
   * Mint during the presale with a proof of allowlist membership.
   *
   * @param ctx - Caller and attached payment
   * @param quantity - Number of assets (positive integer)
   * @param authPath - Sibling hashes proving the caller is on the allowlist
   * @throws SaleError on any failed check, before anything changes
   */
  async whitelistMint(ctx: CallContext, quantity: number, authPath: readonly Hash32[]): Promise<MintReceipt> {
    return await this.deps.guard.run(
      OPERATIONS.WHITELIST_MINT,
      'reject',
      async () => await this.mint('whitelist', ctx, quantity, authPath)
    )
  }

  /**
   * Mint during the public phase.
   *
   * @throws SaleError on any failed check, before anything changes
   */
  async publicMint(ctx: CallContext, quantity: number): Promise<MintReceipt> {
    return await this.deps.guard.run(
      OPERATIONS.PUBLIC_MINT,
      'reject',
      async () => await this.mint('public', ctx, quantity)
    )
  }

  private async mint(
    kind: BuyerClass,
    ctx: CallContext,
    quantity: number,
    authPath: readonly Hash32[] = []
  ): Promise<MintReceipt> {
    const { store, claims, tokenLedger, treasuryBank } = this.deps
    const state = await store.getState()

    if (state.paused) {
      throw new SaleError('Paused')
    }

    if (!isPositiveSafeInteger(quantity)) {
      throw new SaleError('InvalidQuantity', `Quantity must be a positive integer: ${quantity}`)
    }
    const buyer = normalizeAddress(ctx.caller)
    const value = ctx.value ?? 0n
    if (value < 0n) {
      throw new SaleError('InvalidArgument', `Attached value must not be negative: ${value}`)
    }

    const { config } = state

    // 1. Phase
    if (!isPhaseOpen(config, kind)) {
      throw new SaleError('PhaseInactive', kind === 'whitelist' ? 'Presale is not active' : 'Public sale is not active')
    }

    // 2. Allowlist membership
    if (kind === 'whitelist' && !verify(authPath, state.allowlistRoot, buyer)) {
      throw new SaleError('NotEligible')
    }

    // 3. Per-address cap
    const before = await claims.get(buyer)
    const cap = capFor(config, kind)
    const claimedAfter = checkedAdd(claimedFor(before, kind), quantity, `${kind} claims`)
    if (claimedAfter > cap) {
      throw new SaleError(
        'PerAddressCapExceeded',
        `Claiming ${quantity} would bring ${kind} claims to ${claimedAfter}, above the cap of ${cap}`
      )
    }

    // 4. Payment
    const required = requiredPayment(config, kind, quantity)
    if (value < required) {
      throw new SaleError('InsufficientPayment', `Attached ${value}, need ${required}`)
    }

    // 5. Supply
    const issued = await tokenLedger.totalIssued()
    if (checkedAdd(issued, quantity, 'total issued') > config.maxSupply) {
      throw new SaleError(
        'SupplyExceeded',
        `Issuing ${quantity} would exceed the max supply of ${config.maxSupply} (${issued} issued)`
      )
    }

    // Counting is the atomic cap check; a sale sharing the store may have claimed since the read above
    const after = await claims.record(buyer, kind, quantity, cap)

    // The whole attached value goes to the treasury, overpayment included
    await treasuryBank.deposit(state.treasury, buyer, value).catch(async (error: unknown) => {
      await claims.release(buyer, kind, quantity)
      throw error
    })
    const assetIds = await tokenLedger.issue(buyer, quantity).catch(async (error: unknown) => {
      await claims.release(buyer, kind, quantity)
      await treasuryBank.refund(state.treasury, buyer, value)
      throw error
    })

    const receipt: MintReceipt = {
      kind,
      buyer,
      quantity,
      assetIds,
      paid: value,
      required,
      claims: after,
      treasury: state.treasury
    }
    logWithTimestamp('IssuanceEngine', `${kind} mint of ${quantity} to ${buyer}`, { assetIds, paid: value.toString() })

    for (const observer of this.deps.observers) {
      try {
        await observer.onMint(receipt)
      } catch (error) {
        log.error('Mint observer failed:', error)
      }
    }

    return receipt
  }
}
