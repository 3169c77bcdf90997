import { Collection, Db, Filter, MongoServerError, UpdateFilter } from 'mongodb'
import { log } from '@gatemint/core'
import type { Address, BuyerClass, ClaimRecord, SaleConfig, SaleState, SaleStateStore } from '@gatemint/core'
import { SaleClaimDocument, SaleStateDocument, StoredSaleConfig } from './types.js'

export const DEFAULT_SALE_ID = 'default'

/**
 * Sale state store backed by MongoDB.
 *
 * One document per sale in `saleState`, and one document per address and
 * sale in `saleClaims`.
 */
export class MongoSaleStore implements SaleStateStore {
  private readonly states: Collection<SaleStateDocument>
  private readonly claims: Collection<SaleClaimDocument>

  /**
   * @param db A connected MongoDB database handle.
   * @param saleId Key of the sale, so several sales can share a database.
   */
  constructor (private readonly db: Db, readonly saleId: string = DEFAULT_SALE_ID) {
    this.states = db.collection<SaleStateDocument>('saleState')
    this.claims = db.collection<SaleClaimDocument>('saleClaims')

    this.states
      .createIndex({ saleId: 1 }, { unique: true })
      .catch(log.error)

    // One claim document per address
    this.claims
      .createIndex({ saleId: 1, address: 1 }, { unique: true })
      .catch(log.error)
  }

  /**
   * Write the initial state unless the sale already has one.
   */
  async initialize (initial: SaleState): Promise<SaleState> {
    await this.states.updateOne(
      { saleId: this.saleId },
      { $setOnInsert: this.toDocument(initial) },
      { upsert: true }
    )
    return await this.getState()
  }

  async getState (): Promise<SaleState> {
    const document = await this.states.findOne({ saleId: this.saleId })
    if (document === null) {
      throw new Error(`Sale state has not been initialized: ${this.saleId}`)
    }
    return this.fromDocument(document)
  }

  /**
   * Apply a patch to the state in one document update.
   */
  async updateState (patch: Partial<SaleState>): Promise<SaleState> {
    const update: Partial<SaleStateDocument> = { updatedAt: new Date() }
    if (patch.config !== undefined) update.config = this.toStoredConfig(patch.config)
    if (patch.allowlistRoot !== undefined) update.allowlistRoot = patch.allowlistRoot
    if (patch.treasury !== undefined) update.treasury = patch.treasury
    if (patch.paused !== undefined) update.paused = patch.paused
    if (patch.baseURI !== undefined) update.baseURI = patch.baseURI
    if (patch.admins !== undefined) update.admins = [...patch.admins]

    const document = await this.states.findOneAndUpdate(
      { saleId: this.saleId },
      { $set: update },
      { returnDocument: 'after' }
    )
    if (document === null) {
      throw new Error(`Sale state has not been initialized: ${this.saleId}`)
    }
    return this.fromDocument(document)
  }

  async getClaims (address: Address): Promise<ClaimRecord | undefined> {
    const document = await this.claims.findOne({ saleId: this.saleId, address })
    if (document === null) return undefined
    return {
      whitelistClaimed: document.whitelistClaimed,
      publicClaimed: document.publicClaimed
    }
  }

  /**
   * Count a claim in a single conditional update. The filter only matches a
   * document whose counter leaves room for `quantity`; when none matches,
   * the upsert collides with the unique index on an existing document.
   */
  async incrementClaims (address: Address, kind: BuyerClass, quantity: number, cap: number): Promise<ClaimRecord | undefined> {
    if (quantity > cap) return undefined
    const room = cap - quantity
    const filter: Filter<SaleClaimDocument> = kind === 'whitelist'
      ? { saleId: this.saleId, address, whitelistClaimed: { $lte: room } }
      : { saleId: this.saleId, address, publicClaimed: { $lte: room } }
    const update: UpdateFilter<SaleClaimDocument> = kind === 'whitelist'
      ? { $inc: { whitelistClaimed: quantity }, $setOnInsert: { publicClaimed: 0 } }
      : { $inc: { publicClaimed: quantity }, $setOnInsert: { whitelistClaimed: 0 } }

    let document: SaleClaimDocument | null
    try {
      document = await this.claims.findOneAndUpdate(filter, update, { upsert: true, returnDocument: 'after' })
    } catch (error) {
      if (!(error instanceof MongoServerError) || error.code !== 11000) throw error
      // The document exists: either over the cap, or inserted by a concurrent first claim
      document = await this.claims.findOneAndUpdate(filter, update, { returnDocument: 'after' })
    }
    if (document === null) return undefined
    return {
      whitelistClaimed: document.whitelistClaimed,
      publicClaimed: document.publicClaimed
    }
  }

  async decrementClaims (address: Address, kind: BuyerClass, quantity: number): Promise<void> {
    const update: UpdateFilter<SaleClaimDocument> = kind === 'whitelist'
      ? { $inc: { whitelistClaimed: -quantity } }
      : { $inc: { publicClaimed: -quantity } }
    await this.claims.updateOne({ saleId: this.saleId, address }, update)
  }

  // ---------------------------------------------------------------------------
  // Document mapping
  // ---------------------------------------------------------------------------

  private toDocument (state: SaleState): SaleStateDocument {
    return {
      saleId: this.saleId,
      config: this.toStoredConfig(state.config),
      allowlistRoot: state.allowlistRoot,
      treasury: state.treasury,
      paused: state.paused,
      baseURI: state.baseURI,
      admins: [...state.admins],
      updatedAt: new Date()
    }
  }

  private fromDocument (document: SaleStateDocument): SaleState {
    return {
      config: this.fromStoredConfig(document.config),
      allowlistRoot: document.allowlistRoot,
      treasury: document.treasury,
      paused: document.paused,
      baseURI: document.baseURI,
      admins: [...document.admins]
    }
  }

  private toStoredConfig (config: SaleConfig): StoredSaleConfig {
    return {
      ...config,
      whitelistUnitPrice: config.whitelistUnitPrice.toString(),
      publicUnitPrice: config.publicUnitPrice.toString()
    }
  }

  private fromStoredConfig (config: StoredSaleConfig): SaleConfig {
    return {
      presaleActive: config.presaleActive,
      publicSaleActive: config.publicSaleActive,
      whitelistUnitPrice: BigInt(config.whitelistUnitPrice),
      publicUnitPrice: BigInt(config.publicUnitPrice),
      maxSupply: config.maxSupply,
      maxPublicMintPerAddress: config.maxPublicMintPerAddress,
      maxWhitelistMintPerAddress: config.maxWhitelistMintPerAddress
    }
  }
}
