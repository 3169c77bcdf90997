/**
 * AdminController - capability-gated mutations of the sale
 *
 * Every operation requires the caller to be privileged (the owner or an
 * admin) and applies its change in a single store update.
 */

import { SaleError } from './errors.js'
import { logWithTimestamp } from './logging.js'
import type { ReentrancyGuard } from './ReentrancyGuard.js'
import {
  withMaxSupply,
  withPerAddressCap,
  withPublicPhase,
  withUnitPrice
} from './SaleConfig.js'
import type {
  AccessControl,
  Address,
  AssetId,
  BuyerClass,
  Hash32,
  SaleConfig,
  SaleState,
  SaleStateStore,
  TokenLedger
} from './types.js'
import { normalizeAddress, normalizeHash32 } from './utils.js'

export interface AdminControllerDeps {
  store: SaleStateStore
  accessControl: AccessControl
  tokenLedger: TokenLedger
  guard: ReentrancyGuard
}

export class AdminController {
  constructor(private readonly deps: AdminControllerDeps) { }

  // ---------------------------------------------------------------------------
  // Commitment and Treasury
  // ---------------------------------------------------------------------------

  async setAllowlistRoot(caller: Address, root: Hash32): Promise<SaleState> {
    return await this.privileged(caller, 'setAllowlistRoot', async () => {
      const allowlistRoot = normalizeHash32(root)
      return await this.deps.store.updateState({ allowlistRoot })
    })
  }

  async setTreasury(caller: Address, treasury: Address): Promise<SaleState> {
    return await this.privileged(caller, 'setTreasury', async () => {
      return await this.deps.store.updateState({ treasury: normalizeAddress(treasury) })
    })
  }

  async setBaseURI(caller: Address, baseURI: string): Promise<SaleState> {
    return await this.privileged(caller, 'setBaseURI', async () => {
      return await this.deps.store.updateState({ baseURI })
    })
  }

  // ---------------------------------------------------------------------------
  // Prices and Ceilings
  // ---------------------------------------------------------------------------

  async setUnitPrice(caller: Address, kind: BuyerClass, amount: bigint): Promise<SaleState> {
    return await this.privileged(caller, 'setUnitPrice', async () => {
      return await this.updateConfig(config => withUnitPrice(config, kind, amount))
    })
  }

  async setMaxSupply(caller: Address, maxSupply: number): Promise<SaleState> {
    return await this.privileged(caller, 'setMaxSupply', async () => {
      return await this.updateConfig(config => withMaxSupply(config, maxSupply))
    })
  }

  async setPerAddressCap(caller: Address, kind: BuyerClass, cap: number): Promise<SaleState> {
    return await this.privileged(caller, 'setPerAddressCap', async () => {
      return await this.updateConfig(config => withPerAddressCap(config, kind, cap))
    })
  }

  // ---------------------------------------------------------------------------
  // Phases
  // ---------------------------------------------------------------------------

  /**
   * Set both phase flags. They are independent; both may be open or closed.
   */
  async setPhase(caller: Address, presaleActive: boolean, publicSaleActive: boolean): Promise<SaleState> {
    return await this.privileged(caller, 'setPhase', async () => {
      return await this.updateConfig(config => ({ ...config, presaleActive, publicSaleActive }))
    })
  }

  /**
   * Open or close the presale without touching the public phase.
   */
  async setPreSale(caller: Address, active: boolean): Promise<SaleState> {
    return await this.privileged(caller, 'setPreSale', async () => {
      return await this.updateConfig(config => ({ ...config, presaleActive: active }))
    })
  }

  /**
   * Close the presale and open the public phase in one update.
   */
  async switchToPublicPhase(caller: Address): Promise<SaleState> {
    return await this.privileged(caller, 'switchToPublicPhase', async () => {
      return await this.updateConfig(withPublicPhase)
    })
  }

  // ---------------------------------------------------------------------------
  // Privileged Set and Pause
  // ---------------------------------------------------------------------------

  async addAdmins(caller: Address, addresses: readonly Address[]): Promise<SaleState> {
    return await this.privileged(caller, 'addAdmins', async () => {
      const added = addresses.map(normalizeAddress)
      const { admins } = await this.deps.store.getState()
      return await this.deps.store.updateState({ admins: [...new Set([...admins, ...added])] })
    })
  }

  async removeAdmins(caller: Address, addresses: readonly Address[]): Promise<SaleState> {
    return await this.privileged(caller, 'removeAdmins', async () => {
      const removed = new Set(addresses.map(normalizeAddress))
      const { admins } = await this.deps.store.getState()
      return await this.deps.store.updateState({ admins: admins.filter(admin => !removed.has(admin)) })
    })
  }

  async pause(caller: Address): Promise<SaleState> {
    return await this.privileged(caller, 'pause', async () => {
      return await this.deps.store.updateState({ paused: true })
    })
  }

  async unpause(caller: Address): Promise<SaleState> {
    return await this.privileged(caller, 'unpause', async () => {
      return await this.deps.store.updateState({ paused: false })
    })
  }

  // ---------------------------------------------------------------------------
  // Assets
  // ---------------------------------------------------------------------------

  /**
   * Burn an asset. The caller must be privileged and must also own the asset,
   * so an admin cannot burn assets held by someone else.
   *
   * @throws SaleError Unauthorized, AssetNotFound or NotAssetOwner
   */
  async burn(caller: Address, assetId: AssetId): Promise<void> {
    await this.privileged(caller, 'burn', async () => {
      const owner = await this.deps.tokenLedger.ownerOf(assetId)
      if (owner === undefined) {
        throw new SaleError('AssetNotFound', `Asset ${assetId} does not exist`)
      }
      if (owner !== normalizeAddress(caller)) {
        throw new SaleError('NotAssetOwner', `Asset ${assetId} is not owned by ${caller}`)
      }
      await this.deps.tokenLedger.burn(assetId)
    })
  }

  // ---------------------------------------------------------------------------
  // Private Methods
  // ---------------------------------------------------------------------------

  private async privileged<T>(caller: Address, operation: string, fn: () => Promise<T>): Promise<T> {
    return await this.deps.guard.run(operation, 'inline', async () => {
      if (!(await this.deps.accessControl.isPrivileged(caller))) {
        throw new SaleError('Unauthorized', `${caller} may not call ${operation}`)
      }
      const result = await fn()
      logWithTimestamp('AdminController', `${operation} by ${caller}`)
      return result
    })
  }

  private async updateConfig(change: (config: SaleConfig) => SaleConfig): Promise<SaleState> {
    const { config } = await this.deps.store.getState()
    return await this.deps.store.updateState({ config: change(config) })
  }
}
