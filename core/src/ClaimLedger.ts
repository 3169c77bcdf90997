/**
 * ClaimLedger - per-address claim counters
 *
 * Entries are created on the first claim and only ever grow, except when a
 * mint that already counted a claim is unwound by `release`.
 */

import type { Address, BuyerClass, ClaimRecord, SaleStateStore } from './types.js'
import { claimedFor } from './SaleConfig.js'
import { SaleError } from './errors.js'
import { emptyClaimRecord } from './utils.js'

export class ClaimLedger {
  constructor(private readonly store: SaleStateStore) { }

  /**
   * Counters for an address (zero when it never claimed).
   */
  async get(address: Address): Promise<ClaimRecord> {
    return (await this.store.getClaims(address)) ?? emptyClaimRecord()
  }

  async claimed(address: Address, kind: BuyerClass): Promise<number> {
    return claimedFor(await this.get(address), kind)
  }

  /**
   * Count a claim, provided the counter stays within `cap`.
   *
   * The check and the increment are one store operation, so concurrent sales
   * on a shared store cannot both pass the cap.
   *
   * @returns The counters after the claim
   * @throws SaleError PerAddressCapExceeded
   * @throws InvariantViolationError if the counter would overflow
   */
  async record(address: Address, kind: BuyerClass, quantity: number, cap: number): Promise<ClaimRecord> {
    const after = await this.store.incrementClaims(address, kind, quantity, cap)
    if (after === undefined) {
      throw new SaleError('PerAddressCapExceeded', `Claiming ${quantity} would exceed the ${kind} cap of ${cap}`)
    }
    return after
  }

  /**
   * Take back a claim counted by a mint that did not complete.
   */
  async release(address: Address, kind: BuyerClass, quantity: number): Promise<void> {
    await this.store.decrementClaims(address, kind, quantity)
  }
}
