import { Collection, Db } from 'mongodb'
import { log } from '@gatemint/core'
import type { Address, BuyerClass, MintReceipt } from '@gatemint/core'
import { IssuanceRecord } from './types.js'

/**
 * Storage manager for the issuance index using MongoDB.
 */
export class IssuanceStorageManager {
  private readonly records: Collection<IssuanceRecord>

  /**
   * @param db A connected MongoDB database handle.
   */
  constructor (private readonly db: Db) {
    this.records = db.collection<IssuanceRecord>('issuanceRecords')

    this.records
      .createIndex({ buyer: 1 })
      .catch(log.error)

    this.records
      .createIndex({ kind: 1, createdAt: -1 })
      .catch(log.error)
  }

  /**
   * Insert the record of a successful mint.
   */
  async storeRecord (receipt: MintReceipt): Promise<void> {
    const record: IssuanceRecord = {
      kind: receipt.kind,
      buyer: receipt.buyer,
      quantity: receipt.quantity,
      assetIds: [...receipt.assetIds],
      paid: receipt.paid.toString(),
      required: receipt.required.toString(),
      treasury: receipt.treasury,
      createdAt: new Date()
    }
    await this.records.insertOne(record)
  }

  /**
   * Find records with dynamic filter combinations.
   */
  async findWithFilters (
    filters: {
      buyer?: Address
      kind?: BuyerClass
    },
    limit: number = 50,
    skip: number = 0,
    sortOrder: 'asc' | 'desc' = 'desc'
  ): Promise<IssuanceRecord[]> {
    const query: Partial<IssuanceRecord> = {}

    if (filters.buyer !== undefined) {
      query.buyer = filters.buyer
    }

    if (filters.kind !== undefined) {
      query.kind = filters.kind
    }

    return await this.findRecordWithQuery(query, limit, skip, sortOrder)
  }

  /**
   * Fetch all records without filtering, with pagination and sorting.
   */
  async findAllRecords (
    limit: number = 50,
    skip: number = 0,
    sortOrder: 'asc' | 'desc' = 'desc'
  ): Promise<IssuanceRecord[]> {
    return await this.findRecordWithQuery({}, limit, skip, sortOrder)
  }

  private async findRecordWithQuery (
    query: Partial<IssuanceRecord>,
    limit: number,
    skip: number,
    sortOrder: 'asc' | 'desc'
  ): Promise<IssuanceRecord[]> {
    const sortDirection = sortOrder === 'desc' ? -1 : 1

    const results = await this.records
      .find(query, { projection: { _id: 0 } })
      .sort({ createdAt: sortDirection })
      .skip(skip)
      .limit(limit)
      .toArray()

    return results.map(({ kind, buyer, quantity, assetIds, paid, required, treasury, createdAt }) => ({
      kind, buyer, quantity, assetIds, paid, required, treasury, createdAt
    }))
  }
}
