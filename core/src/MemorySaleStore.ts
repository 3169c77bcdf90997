import type { Address, BuyerClass, ClaimRecord, SaleState, SaleStateStore } from './types.js'
import { checkedAdd, cloneState, emptyClaimRecord } from './utils.js'

/**
 * In-process sale state store.
 * Hands out copies so nothing outside the store can change its state.
 * Claim increments run without an await in between, so sales sharing one
 * store never interleave inside one.
 */
export class MemorySaleStore implements SaleStateStore {
  private state?: SaleState
  private readonly claims = new Map<Address, ClaimRecord>()

  async initialize(initial: SaleState): Promise<SaleState> {
    if (this.state === undefined) {
      this.state = cloneState(initial)
    }
    return cloneState(this.state)
  }

  async getState(): Promise<SaleState> {
    return cloneState(this.requireState())
  }

  async updateState(patch: Partial<SaleState>): Promise<SaleState> {
    this.state = cloneState({ ...this.requireState(), ...patch })
    return cloneState(this.state)
  }

  async getClaims(address: Address): Promise<ClaimRecord | undefined> {
    const record = this.claims.get(address)
    return record === undefined ? undefined : { ...record }
  }

  async incrementClaims(address: Address, kind: BuyerClass, quantity: number, cap: number): Promise<ClaimRecord | undefined> {
    const current = this.claims.get(address) ?? emptyClaimRecord()
    const field = kind === 'whitelist' ? 'whitelistClaimed' : 'publicClaimed'
    const next = checkedAdd(current[field], quantity, field)
    if (next > cap) return undefined

    const record: ClaimRecord = { ...current, [field]: next }
    this.claims.set(address, record)
    return { ...record }
  }

  async decrementClaims(address: Address, kind: BuyerClass, quantity: number): Promise<void> {
    const current = this.claims.get(address)
    if (current === undefined) return
    const field = kind === 'whitelist' ? 'whitelistClaimed' : 'publicClaimed'
    this.claims.set(address, { ...current, [field]: Math.max(0, current[field] - quantity) })
  }

  private requireState(): SaleState {
    if (this.state === undefined) {
      throw new Error('Sale state has not been initialized')
    }
    return this.state
  }
}
