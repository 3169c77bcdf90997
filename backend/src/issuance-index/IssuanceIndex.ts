import { IssuanceStorageManager } from './IssuanceStorageManager.js'
import { isAddress, logWithTimestamp } from '@gatemint/core'
import type { MintReceipt, SaleObserver } from '@gatemint/core'
import { Db } from 'mongodb'
import { IssuanceIndexMetaData, IssuanceQuery, IssuanceRecord } from './types.js'
import docs from '../docs/IssuanceIndexDocs.js'

/**
 * Records every successful mint and answers queries over them
 * @public
 */
class IssuanceIndex implements SaleObserver {
  constructor(public storageManager: IssuanceStorageManager) { }

  async onMint(receipt: MintReceipt): Promise<void> {
    await this.storageManager.storeRecord(receipt)
    logWithTimestamp('IssuanceIndex', `Indexed ${receipt.kind} mint of ${receipt.quantity} to ${receipt.buyer}`)
  }

  async lookup(query: IssuanceQuery | null | undefined): Promise<IssuanceRecord[]> {
    if (query === undefined || query === null) {
      throw new Error('A valid query must be provided')
    }
    if (query.kind !== undefined && query.kind !== 'whitelist' && query.kind !== 'public') {
      throw new Error(`Unknown buyer class: ${String(query.kind)}`)
    }
    if (query.buyer !== undefined && !isAddress(query.buyer)) {
      throw new Error(`Invalid buyer address: ${query.buyer}`)
    }

    const buyer = query.buyer?.toLowerCase()
    const hasFilters = buyer !== undefined || query.kind !== undefined

    if (hasFilters) {
      return await this.storageManager.findWithFilters(
        { buyer, kind: query.kind },
        query.limit,
        query.skip,
        query.sortOrder
      )
    }
    return await this.storageManager.findAllRecords(
      query.limit,
      query.skip,
      query.sortOrder
    )
  }

  async getDocumentation(): Promise<string> {
    return docs
  }

  async getMetaData(): Promise<IssuanceIndexMetaData> {
    return {
      name: 'Issuance Index',
      shortDescription: 'Find mints of a gated sale by buyer or buyer class.'
    }
  }
}

// Factory function
export default (db: Db): IssuanceIndex => {
  return new IssuanceIndex(new IssuanceStorageManager(db))
}

export { IssuanceIndex }
