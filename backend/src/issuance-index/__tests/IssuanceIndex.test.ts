import { IssuanceIndex } from '../IssuanceIndex'
import { IssuanceStorageManager } from '../IssuanceStorageManager'
import { IssuanceRecord } from '../types'
import { configureLogging } from '@gatemint/core'
import type { Address, BuyerClass, MintReceipt } from '@gatemint/core'

const TREASURY = '02' + '0f'.repeat(32)
const ALICE = '02' + 'a1'.repeat(32)
const BOB = '03' + 'b2'.repeat(32)

/**
 * Mock storage manager for testing
 */
class MockIssuanceStorageManager {
  records: IssuanceRecord[] = []
  lastCall?: { filters?: { buyer?: Address, kind?: BuyerClass }, limit?: number, skip?: number, sortOrder?: 'asc' | 'desc' }

  async storeRecord(receipt: MintReceipt): Promise<void> {
    this.records.push({
      kind: receipt.kind,
      buyer: receipt.buyer,
      quantity: receipt.quantity,
      assetIds: receipt.assetIds,
      paid: receipt.paid.toString(),
      required: receipt.required.toString(),
      treasury: receipt.treasury,
      createdAt: new Date()
    })
  }

  async findWithFilters(
    filters: { buyer?: Address, kind?: BuyerClass },
    limit?: number,
    skip?: number,
    sortOrder?: 'asc' | 'desc'
  ): Promise<IssuanceRecord[]> {
    this.lastCall = { filters, limit, skip, sortOrder }
    return this.records.filter(r =>
      (filters.buyer === undefined || r.buyer === filters.buyer) &&
      (filters.kind === undefined || r.kind === filters.kind))
  }

  async findAllRecords(limit?: number, skip?: number, sortOrder?: 'asc' | 'desc'): Promise<IssuanceRecord[]> {
    this.lastCall = { limit, skip, sortOrder }
    return this.records
  }
}

function receipt(kind: BuyerClass, buyer: Address, assetIds: number[]): MintReceipt {
  return {
    kind,
    buyer,
    quantity: assetIds.length,
    assetIds,
    paid: 1000n,
    required: 1000n,
    claims: { whitelistClaimed: 0, publicClaimed: 0 },
    treasury: TREASURY
  }
}

describe('Issuance Index', () => {
  let index: IssuanceIndex
  let mockStorage: MockIssuanceStorageManager

  beforeAll(() => {
    configureLogging({ IssuanceIndex: false })
  })

  beforeEach(() => {
    mockStorage = new MockIssuanceStorageManager()
    index = new IssuanceIndex(mockStorage as unknown as IssuanceStorageManager)
  })

  describe('onMint', () => {
    it('stores a record per mint', async () => {
      await index.onMint(receipt('whitelist', ALICE, [1, 2]))

      expect(mockStorage.records).toHaveLength(1)
      expect(mockStorage.records[0]).toMatchObject({ kind: 'whitelist', buyer: ALICE, quantity: 2, paid: '1000' })
    })

    it('propagates storage failures', async () => {
      mockStorage.storeRecord = async () => { throw new Error('write failed') }

      await expect(index.onMint(receipt('public', BOB, [3]))).rejects.toThrow('write failed')
    })
  })

  describe('lookup', () => {
    beforeEach(async () => {
      await index.onMint(receipt('whitelist', ALICE, [1]))
      await index.onMint(receipt('public', ALICE, [2]))
      await index.onMint(receipt('public', BOB, [3]))
    })

    it('looks up all records when no filters', async () => {
      const result = await index.lookup({})

      expect(result).toHaveLength(3)
      expect(mockStorage.lastCall).toEqual({ limit: undefined, skip: undefined, sortOrder: undefined })
    })

    it('filters by buyer, whatever the case of the address', async () => {
      const result = await index.lookup({ buyer: ALICE.toUpperCase() })

      expect(result.map(r => r.assetIds[0])).toEqual([1, 2])
    })

    it('filters by buyer class', async () => {
      const result = await index.lookup({ kind: 'public' })

      expect(result.map(r => r.buyer)).toEqual([ALICE, BOB])
    })

    it('passes pagination through', async () => {
      await index.lookup({ kind: 'public', limit: 2, skip: 1, sortOrder: 'asc' })

      expect(mockStorage.lastCall).toEqual({
        filters: { buyer: undefined, kind: 'public' },
        limit: 2,
        skip: 1,
        sortOrder: 'asc'
      })
    })

    it('throws on missing query', async () => {
      await expect(index.lookup(null)).rejects.toThrow('A valid query must be provided')
    })

    it('throws on an unknown buyer class', async () => {
      const query = JSON.parse('{"kind":"vip"}')
      await expect(index.lookup(query)).rejects.toThrow('Unknown buyer class: vip')
    })

    it('throws on an invalid buyer address', async () => {
      await expect(index.lookup({ buyer: 'not-hex' })).rejects.toThrow('Invalid buyer address: not-hex')
    })
  })

  describe('getDocumentation', () => {
    it('returns documentation string', async () => {
      const docsResult = await index.getDocumentation()
      expect(docsResult.startsWith('# Issuance Index')).toBe(true)
    })
  })

  describe('getMetaData', () => {
    it('returns metadata object', async () => {
      const meta = await index.getMetaData()
      expect(meta.name).toBe('Issuance Index')
      expect(meta.shortDescription).toBeDefined()
    })
  })
})
