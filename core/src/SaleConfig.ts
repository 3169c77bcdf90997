/**
 * SaleConfig - phase flags, prices and ceilings
 *
 * Configs are treated as immutable values: every change produces a new config
 * that is written back in a single store update, so a compound change such as
 * switching to the public phase is never observable half-applied.
 */

import { DEFAULT_MAX_PER_ADDRESS, DEFAULT_MAX_SUPPLY } from './constants.js'
import { SaleError } from './errors.js'
import type { BuyerClass, ClaimRecord, SaleConfig } from './types.js'
import { isNonNegativeSafeInteger } from './utils.js'

export const DEFAULT_SALE_CONFIG: Readonly<SaleConfig> = {
  presaleActive: false,
  publicSaleActive: false,
  whitelistUnitPrice: 0n,
  publicUnitPrice: 0n,
  maxSupply: DEFAULT_MAX_SUPPLY,
  maxPublicMintPerAddress: DEFAULT_MAX_PER_ADDRESS,
  maxWhitelistMintPerAddress: DEFAULT_MAX_PER_ADDRESS
}

export function isPhaseOpen(config: SaleConfig, kind: BuyerClass): boolean {
  return kind === 'whitelist' ? config.presaleActive : config.publicSaleActive
}

export function unitPriceFor(config: SaleConfig, kind: BuyerClass): bigint {
  return kind === 'whitelist' ? config.whitelistUnitPrice : config.publicUnitPrice
}

export function capFor(config: SaleConfig, kind: BuyerClass): number {
  return kind === 'whitelist' ? config.maxWhitelistMintPerAddress : config.maxPublicMintPerAddress
}

export function claimedFor(record: ClaimRecord, kind: BuyerClass): number {
  return kind === 'whitelist' ? record.whitelistClaimed : record.publicClaimed
}

/**
 * Total price of `quantity` units for a buyer class.
 */
export function requiredPayment(config: SaleConfig, kind: BuyerClass, quantity: number): bigint {
  return BigInt(quantity) * unitPriceFor(config, kind)
}

export function withUnitPrice(config: SaleConfig, kind: BuyerClass, amount: bigint): SaleConfig {
  assertPrice(amount)
  return kind === 'whitelist'
    ? { ...config, whitelistUnitPrice: amount }
    : { ...config, publicUnitPrice: amount }
}

export function withPerAddressCap(config: SaleConfig, kind: BuyerClass, cap: number): SaleConfig {
  assertCount(cap, 'Per-address cap')
  return kind === 'whitelist'
    ? { ...config, maxWhitelistMintPerAddress: cap }
    : { ...config, maxPublicMintPerAddress: cap }
}

export function withMaxSupply(config: SaleConfig, maxSupply: number): SaleConfig {
  assertCount(maxSupply, 'Max supply')
  return { ...config, maxSupply }
}

/**
 * Close the presale and open the public phase together.
 */
export function withPublicPhase(config: SaleConfig): SaleConfig {
  return { ...config, presaleActive: false, publicSaleActive: true }
}

/**
 * Merge partial settings over the defaults and validate the result.
 *
 * @throws SaleError InvalidArgument
 */
export function resolveSaleConfig(settings: Partial<SaleConfig> = {}): SaleConfig {
  const config: SaleConfig = {
    presaleActive: settings.presaleActive ?? DEFAULT_SALE_CONFIG.presaleActive,
    publicSaleActive: settings.publicSaleActive ?? DEFAULT_SALE_CONFIG.publicSaleActive,
    whitelistUnitPrice: settings.whitelistUnitPrice ?? DEFAULT_SALE_CONFIG.whitelistUnitPrice,
    publicUnitPrice: settings.publicUnitPrice ?? DEFAULT_SALE_CONFIG.publicUnitPrice,
    maxSupply: settings.maxSupply ?? DEFAULT_SALE_CONFIG.maxSupply,
    maxPublicMintPerAddress: settings.maxPublicMintPerAddress ?? DEFAULT_SALE_CONFIG.maxPublicMintPerAddress,
    maxWhitelistMintPerAddress: settings.maxWhitelistMintPerAddress ?? DEFAULT_SALE_CONFIG.maxWhitelistMintPerAddress
  }
  validateSaleConfig(config)
  return config
}

/**
 * @throws SaleError InvalidArgument
 */
export function validateSaleConfig(config: SaleConfig): void {
  assertPrice(config.whitelistUnitPrice)
  assertPrice(config.publicUnitPrice)
  assertCount(config.maxSupply, 'Max supply')
  assertCount(config.maxPublicMintPerAddress, 'Per-address cap')
  assertCount(config.maxWhitelistMintPerAddress, 'Per-address cap')
}

function assertPrice(amount: bigint): void {
  if (amount < 0n) {
    throw new SaleError('InvalidArgument', `Unit price must not be negative: ${amount}`)
  }
}

function assertCount(value: number, what: string): void {
  if (!isNonNegativeSafeInteger(value)) {
    throw new SaleError('InvalidArgument', `${what} must be a non-negative integer: ${value}`)
  }
}
