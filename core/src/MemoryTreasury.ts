import type { Address, Treasury } from './types.js'

/**
 * A completed transfer into a treasury
 */
export interface DepositRecord {
  treasury: Address
  from: Address
  amount: bigint
}

/**
 * Funds returned from a treasury to the payer
 */
export interface RefundRecord {
  treasury: Address
  to: Address
  amount: bigint
}

/**
 * Code run by the receiving side once a deposit has been credited
 */
export type DepositHook = (deposit: DepositRecord) => Promise<void>

/**
 * In-process treasury that keeps balances per destination.
 *
 * The optional `onDeposit` hook plays the part of recipient code, which may
 * call back into the sale while the deposit is in flight.
 */
export class MemoryTreasury implements Treasury {
  readonly deposits: DepositRecord[] = []
  readonly refunds: RefundRecord[] = []
  private readonly balances = new Map<Address, bigint>()

  constructor(public onDeposit?: DepositHook) { }

  async deposit(treasury: Address, from: Address, amount: bigint): Promise<void> {
    if (amount < 0n) {
      throw new Error(`Deposit amount must not be negative: ${amount}`)
    }
    const record: DepositRecord = { treasury, from, amount }
    this.balances.set(treasury, this.balanceOf(treasury) + amount)
    this.deposits.push(record)

    if (this.onDeposit !== undefined) {
      await this.onDeposit(record)
    }
  }

  /**
   * Return funds from a treasury to the payer.
   *
   * @throws Error when the treasury holds less than `amount`
   */
  async refund(treasury: Address, to: Address, amount: bigint): Promise<void> {
    if (amount < 0n) {
      throw new Error(`Refund amount must not be negative: ${amount}`)
    }
    const balance = this.balanceOf(treasury)
    if (balance < amount) {
      throw new Error(`Treasury ${treasury} holds ${balance}, cannot refund ${amount}`)
    }
    this.balances.set(treasury, balance - amount)
    this.refunds.push({ treasury, to, amount })
  }

  balanceOf(treasury: Address): bigint {
    return this.balances.get(treasury) ?? 0n
  }
}
