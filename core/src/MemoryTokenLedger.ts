import { FIRST_ASSET_ID } from './constants.js'
import { SaleError } from './errors.js'
import type { Address, AssetId, TokenLedger } from './types.js'
import { isPositiveSafeInteger } from './utils.js'

/**
 * In-process token ledger.
 *
 * Asset ids are sequential. `totalIssued` counts every asset ever issued, so
 * burning an asset does not make room under the supply ceiling.
 */
export class MemoryTokenLedger implements TokenLedger {
  private readonly owners = new Map<AssetId, Address>()
  private nextId: AssetId

  constructor(private readonly firstId: AssetId = FIRST_ASSET_ID) {
    this.nextId = firstId
  }

  async totalIssued(): Promise<number> {
    return this.nextId - this.firstId
  }

  async issue(recipient: Address, quantity: number): Promise<AssetId[]> {
    if (!isPositiveSafeInteger(quantity)) {
      throw new SaleError('InvalidQuantity')
    }
    const issued: AssetId[] = []
    for (let i = 0; i < quantity; i++) {
      const assetId = this.nextId++
      this.owners.set(assetId, recipient)
      issued.push(assetId)
    }
    return issued
  }

  async ownerOf(assetId: AssetId): Promise<Address | undefined> {
    return this.owners.get(assetId)
  }

  async burn(assetId: AssetId): Promise<void> {
    if (!this.owners.delete(assetId)) {
      throw new SaleError('AssetNotFound', `Asset ${assetId} does not exist`)
    }
  }

  /**
   * Number of live assets held by an address.
   */
  balanceOf(owner: Address): number {
    let balance = 0
    for (const holder of this.owners.values()) {
      if (holder === owner) balance++
    }
    return balance
  }
}
