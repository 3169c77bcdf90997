/**
 * Named failure conditions of the sale.
 *
 * Every condition aborts the whole operation before any state changes.
 */

export type SaleErrorCode =
  | 'PhaseInactive'
  | 'NotEligible'
  | 'PerAddressCapExceeded'
  | 'InsufficientPayment'
  | 'SupplyExceeded'
  | 'Unauthorized'
  | 'AssetNotFound'
  | 'NotAssetOwner'
  | 'Paused'
  | 'ReentrantCall'
  | 'InvalidQuantity'
  | 'InvalidArgument'

const DEFAULT_MESSAGES: Record<SaleErrorCode, string> = {
  PhaseInactive: 'The requested sale phase is not open',
  NotEligible: 'Address is not on the allowlist',
  PerAddressCapExceeded: 'Claim would exceed the per-address cap',
  InsufficientPayment: 'Attached value is below the required price',
  SupplyExceeded: 'Claim would exceed the maximum supply',
  Unauthorized: 'Caller is not privileged',
  AssetNotFound: 'Asset does not exist',
  NotAssetOwner: 'Caller does not own the asset',
  Paused: 'Minting is paused',
  ReentrantCall: 'Reentrant call',
  InvalidQuantity: 'Quantity must be a positive integer',
  InvalidArgument: 'Invalid argument'
}

export class SaleError extends Error {
  readonly code: SaleErrorCode

  constructor(code: SaleErrorCode, message: string = DEFAULT_MESSAGES[code]) {
    super(message)
    this.name = 'SaleError'
    this.code = code
  }
}

/**
 * A state that the checks before it should have made unreachable.
 * Never reported as a sale failure.
 */
export class InvariantViolationError extends Error {
  constructor(message: string) {
    super(message)
    this.name = 'InvariantViolationError'
  }
}

export function isSaleError(error: unknown, code?: SaleErrorCode): error is SaleError {
  return error instanceof SaleError && (code === undefined || error.code === code)
}
