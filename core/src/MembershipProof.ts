/**
 * MembershipProof - Allowlist Commitments
 *
 * An allowlist is committed to as the root of a binary SHA-256 Merkle tree.
 * Leaves are the hash of the raw address bytes. Every interior node hashes its
 * two children with the smaller one first, so an authentication path is just
 * the list of siblings, without left/right flags.
 */

import { Hash, Utils } from '@bsv/sdk'

import type { Address, Hash32 } from './types.js'
import { isAddress, isHash32, normalizeAddress } from './utils.js'

/**
 * Compare two byte arrays as unsigned big-endian numbers of equal length.
 */
export function compareBytes(a: number[], b: number[]): number {
  const length = Math.min(a.length, b.length)
  for (let i = 0; i < length; i++) {
    if (a[i] !== b[i]) return a[i] - b[i]
  }
  return a.length - b.length
}

/**
 * Hash an address into its leaf.
 */
export function hashLeaf(address: Address): number[] {
  return Hash.sha256(Utils.toArray(normalizeAddress(address), 'hex'))
}

/**
 * Combine two nodes, smaller first.
 */
export function hashPair(a: number[], b: number[]): number[] {
  const [left, right] = compareBytes(a, b) <= 0 ? [a, b] : [b, a]
  return Hash.sha256([...left, ...right])
}

/**
 * Check that `claimant` is committed to by `root`.
 *
 * Malformed input (non-hex path entries, a root that is not 32 bytes, an
 * address that is not hex) is never a member.
 *
 * @param authPath - Sibling hashes from the leaf up to the root
 * @param root - Published allowlist commitment
 * @param claimant - Address claiming membership
 */
export function verify(authPath: readonly Hash32[], root: Hash32, claimant: Address): boolean {
  if (!isHash32(root) || !isAddress(claimant)) return false
  if (!authPath.every(isHash32)) return false

  const computed = authPath.reduce<number[]>(
    (node, sibling) => hashPair(node, Utils.toArray(sibling, 'hex')),
    hashLeaf(claimant)
  )
  return Utils.toHex(computed) === root.toLowerCase()
}

/**
 * Builds the commitment and authentication paths for a list of addresses.
 *
 * An unpaired node at the end of a level moves up unchanged, so its path
 * simply has no sibling for that level.
 *
 * @example
 * ```typescript
 * const tree = new AllowlistTree([alice, bob, carol])
 * await sale.setAllowlistRoot(owner, tree.getRoot())
 *
 * const proof = tree.getProof(bob)
 * await sale.whitelistMint({ caller: bob, value: price }, 1, proof)
 * ```
 */
export class AllowlistTree {
  private readonly layers: number[][][]
  private readonly positions = new Map<Address, number>()

  constructor(addresses: readonly Address[]) {
    if (addresses.length === 0) {
      throw new Error('Cannot build an allowlist tree without addresses')
    }

    const leaves: number[][] = []
    for (const address of addresses) {
      const normalized = normalizeAddress(address)
      if (this.positions.has(normalized)) {
        throw new Error(`Duplicate allowlist address: ${normalized}`)
      }
      this.positions.set(normalized, leaves.length)
      leaves.push(hashLeaf(normalized))
    }

    this.layers = [leaves]
    let level = leaves
    while (level.length > 1) {
      const next: number[][] = []
      for (let i = 0; i < level.length; i += 2) {
        const right = level[i + 1]
        next.push(right === undefined ? level[i] : hashPair(level[i], right))
      }
      this.layers.push(next)
      level = next
    }
  }

  /** Number of committed addresses */
  get size(): number {
    return this.positions.size
  }

  getRoot(): Hash32 {
    return Utils.toHex(this.layers[this.layers.length - 1][0])
  }

  has(address: Address): boolean {
    return isAddress(address) && this.positions.has(address.toLowerCase())
  }

  /**
   * Authentication path for a committed address.
   *
   * @throws Error if the address is not in the tree
   */
  getProof(address: Address): Hash32[] {
    let index = isAddress(address) ? this.positions.get(address.toLowerCase()) : undefined
    if (index === undefined) {
      throw new Error(`Address is not on the allowlist: ${address}`)
    }

    const proof: Hash32[] = []
    for (let level = 0; level < this.layers.length - 1; level++) {
      const sibling = this.layers[level][index % 2 === 1 ? index - 1 : index + 1]
      if (sibling !== undefined) {
        proof.push(Utils.toHex(sibling))
      }
      index = Math.floor(index / 2)
    }
    return proof
  }
}
