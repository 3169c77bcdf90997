/**
 * Utility functions for gatemint
 */

import { HASH_BYTE_LENGTH } from './constants.js'
import { InvariantViolationError, SaleError } from './errors.js'
import type { Address, ClaimRecord, Hash32, SaleState } from './types.js'

const HEX_PATTERN = /^(?:[0-9a-fA-F]{2})+$/

/**
 * Check that a value is non-empty, even-length hex.
 */
export function isAddress(value: unknown): value is Address {
  return typeof value === 'string' && HEX_PATTERN.test(value)
}

export function isHash32(value: unknown): value is Hash32 {
  return isAddress(value) && value.length === HASH_BYTE_LENGTH * 2
}

/**
 * Lower-case an address, rejecting anything that is not hex.
 *
 * @throws SaleError InvalidArgument
 */
export function normalizeAddress(address: string): Address {
  if (!isAddress(address)) {
    throw new SaleError('InvalidArgument', `Invalid address: ${address}`)
  }
  return address.toLowerCase()
}

/**
 * @throws SaleError InvalidArgument
 */
export function normalizeHash32(hash: string): Hash32 {
  if (!isHash32(hash)) {
    throw new SaleError('InvalidArgument', `Expected a ${HASH_BYTE_LENGTH}-byte hex hash, got: ${hash}`)
  }
  return hash.toLowerCase()
}

export function isPositiveSafeInteger(value: number): boolean {
  return Number.isSafeInteger(value) && value > 0
}

export function isNonNegativeSafeInteger(value: number): boolean {
  return Number.isSafeInteger(value) && value >= 0
}

/**
 * Add two counters, failing loudly instead of losing precision.
 *
 * @throws InvariantViolationError when the sum is not a safe integer
 */
export function checkedAdd(a: number, b: number, what: string): number {
  const sum = a + b
  if (!Number.isSafeInteger(sum)) {
    throw new InvariantViolationError(`${what} overflowed: ${a} + ${b}`)
  }
  return sum
}

export function emptyClaimRecord(): ClaimRecord {
  return { whitelistClaimed: 0, publicClaimed: 0 }
}

/**
 * Copy a state so callers never share mutable structure with a store.
 */
export function cloneState(state: SaleState): SaleState {
  return {
    ...state,
    config: { ...state.config },
    admins: [...state.admins]
  }
}
