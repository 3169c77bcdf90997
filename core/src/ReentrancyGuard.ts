/**
 * ReentrancyGuard - one operation at a time
 *
 * Operations from independent callers queue up and run in arrival order.
 * A call made from inside an operation that is still in flight (for example
 * from a treasury deposit hook) is recognised through its async context:
 * a guarded operation rejects it, an unguarded one runs it inline, since
 * queueing it behind its own caller would never finish.
 */

import { AsyncLocalStorage } from 'node:async_hooks'

import { SaleError } from './errors.js'

/**
 * What a nested call does while another operation holds the lock
 */
export type ReentryMode = 'reject' | 'inline'

export class ReentrancyGuard {
  private readonly context = new AsyncLocalStorage<string>()
  private tail: Promise<void> = Promise.resolve()

  /** Name of the operation holding the lock in the current async context */
  get current(): string | undefined {
    return this.context.getStore()
  }

  /**
   * Run `fn` while holding the lock. The lock is released however `fn` settles.
   *
   * @param operation - Name reported in errors and held in the async context
   * @param mode - Handling of a call nested inside an operation in flight
   * @throws SaleError ReentrantCall for a nested call in 'reject' mode
   */
  async run<T>(operation: string, mode: ReentryMode, fn: () => Promise<T>): Promise<T> {
    const active = this.context.getStore()
    if (active !== undefined) {
      if (mode === 'reject') {
        throw new SaleError('ReentrantCall', `${operation} called while ${active} is in progress`)
      }
      return await fn()
    }

    const turn = this.tail.then(async () => await this.context.run(operation, fn))
    // The queue moves on after a failure; the caller still receives it through `turn`
    this.tail = turn.then(() => undefined, () => undefined)
    return await turn
  }
}
