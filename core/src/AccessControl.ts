import type { AccessControl, Address, SaleStateStore } from './types.js'
import { isAddress } from './utils.js'

/**
 * Privileged means the distinguished owner or a member of the stored admin set.
 */
export class OwnerAdminAccessControl implements AccessControl {
  private readonly owner: Address

  constructor(owner: Address, private readonly store: SaleStateStore) {
    this.owner = owner.toLowerCase()
  }

  async isPrivileged(caller: Address): Promise<boolean> {
    if (!isAddress(caller)) return false
    const normalized = caller.toLowerCase()
    if (normalized === this.owner) return true
    const { admins } = await this.store.getState()
    return admins.includes(normalized)
  }

  isOwner(caller: Address): boolean {
    return isAddress(caller) && caller.toLowerCase() === this.owner
  }
}
