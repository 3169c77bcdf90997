import { IssuanceStorageManager } from '../IssuanceStorageManager'
import { FakeDb } from '../../__tests/FakeMongo'
import { Db } from 'mongodb'
import type { MintReceipt } from '@gatemint/core'

const TREASURY = '02' + '0f'.repeat(32)
const ALICE = '02' + 'a1'.repeat(32)
const BOB = '03' + 'b2'.repeat(32)

function receipt(overrides: Partial<MintReceipt> = {}): MintReceipt {
  return {
    kind: 'whitelist',
    buyer: ALICE,
    quantity: 2,
    assetIds: [1, 2],
    paid: 2500n,
    required: 2000n,
    claims: { whitelistClaimed: 2, publicClaimed: 0 },
    treasury: TREASURY,
    ...overrides
  }
}

describe('IssuanceStorageManager', () => {
  let fakeDb: FakeDb
  let storage: IssuanceStorageManager

  beforeEach(() => {
    fakeDb = new FakeDb()
    storage = new IssuanceStorageManager(fakeDb as unknown as Db)
  })

  it('creates indexes on buyer and on buyer class', () => {
    expect(fakeDb.get('issuanceRecords').indexes.map(index => index.spec)).toEqual([
      { buyer: 1 },
      { kind: 1, createdAt: -1 }
    ])
  })

  it('stores amounts as decimal strings', async () => {
    await storage.storeRecord(receipt())

    const [record] = await storage.findAllRecords()
    expect(record).toMatchObject({
      kind: 'whitelist',
      buyer: ALICE,
      quantity: 2,
      assetIds: [1, 2],
      paid: '2500',
      required: '2000',
      treasury: TREASURY
    })
    expect(record.createdAt).toBeInstanceOf(Date)
    expect(Object.keys(record)).not.toContain('_id')
  })

  describe('queries', () => {
    beforeEach(async () => {
      const records = fakeDb.get('issuanceRecords')
      await records.insertOne({ kind: 'whitelist', buyer: ALICE, quantity: 1, assetIds: [1], paid: '1', required: '1', treasury: TREASURY, createdAt: new Date('2026-01-01T00:00:00Z') })
      await records.insertOne({ kind: 'public', buyer: ALICE, quantity: 1, assetIds: [2], paid: '2', required: '2', treasury: TREASURY, createdAt: new Date('2026-01-02T00:00:00Z') })
      await records.insertOne({ kind: 'public', buyer: BOB, quantity: 1, assetIds: [3], paid: '2', required: '2', treasury: TREASURY, createdAt: new Date('2026-01-03T00:00:00Z') })
    })

    it('returns the newest records first by default', async () => {
      const results = await storage.findAllRecords()

      expect(results.map(r => r.assetIds[0])).toEqual([3, 2, 1])
    })

    it('returns the oldest records first in ascending order', async () => {
      const results = await storage.findAllRecords(50, 0, 'asc')

      expect(results.map(r => r.assetIds[0])).toEqual([1, 2, 3])
    })

    it('filters by buyer', async () => {
      const results = await storage.findWithFilters({ buyer: ALICE })

      expect(results.map(r => r.assetIds[0])).toEqual([2, 1])
    })

    it('filters by buyer and buyer class together', async () => {
      const results = await storage.findWithFilters({ buyer: ALICE, kind: 'public' })

      expect(results.map(r => r.assetIds[0])).toEqual([2])
    })

    it('applies pagination after sorting', async () => {
      const results = await storage.findAllRecords(1, 1)

      expect(results.map(r => r.assetIds[0])).toEqual([2])
    })
  })
})
