import { createSaleBackend } from '../index'
import { loadBackendConfig } from '../config'
import { FakeDb } from './FakeMongo'
import { Db } from 'mongodb'
import { AllowlistTree, MemoryTokenLedger, configureLogging } from '@gatemint/core'

const OWNER = '02' + '01'.repeat(32)
const TREASURY = '02' + '0f'.repeat(32)
const ALICE = '02' + 'a1'.repeat(32)
const BOB = '03' + 'b2'.repeat(32)

describe('Sale backend', () => {
  const tree = new AllowlistTree([ALICE, BOB])

  beforeAll(() => {
    configureLogging({ default: false, IssuanceEngine: false, AdminController: false, IssuanceIndex: false })
  })

  describe('createSaleBackend', () => {
    it('persists claims and indexes successful mints', async () => {
      const fakeDb = new FakeDb()
      const { sale, issuanceIndex } = createSaleBackend(fakeDb as unknown as Db, {
        owner: OWNER,
        treasury: TREASURY,
        sale: { allowlistRoot: tree.getRoot(), whitelistUnitPrice: 100n, presaleActive: true }
      })

      const result = await sale.whitelistMint({ caller: ALICE, value: 250n }, 2, tree.getProof(ALICE))
      await sale.whitelistMint({ caller: BOB, value: 0n }, 1, tree.getProof(BOB))

      expect(result.success).toBe(true)
      expect(fakeDb.get('saleClaims').documents).toHaveLength(1)
      expect(fakeDb.get('saleClaims').documents[0]).toMatchObject({ saleId: 'default', address: ALICE, whitelistClaimed: 2 })

      const records = await issuanceIndex.lookup({})
      expect(records).toHaveLength(1)
      expect(records[0]).toMatchObject({ kind: 'whitelist', buyer: ALICE, assetIds: [1, 2], paid: '250', required: '200' })
    })

    it('keeps admin changes across instances on the same database', async () => {
      const fakeDb = new FakeDb()
      const config = { owner: OWNER, treasury: TREASURY, saleId: 'drop-1' }
      const first = createSaleBackend(fakeDb as unknown as Db, config)
      await first.sale.switchToPublicPhase(OWNER)
      await first.sale.setUnitPrice(OWNER, 'public', 10n ** 18n)

      const second = createSaleBackend(fakeDb as unknown as Db, config)

      expect(await second.sale.getSaleConfig()).toMatchObject({
        presaleActive: false,
        publicSaleActive: true,
        publicUnitPrice: 10n ** 18n
      })
    })

    it('holds the per-address cap across instances on the same database', async () => {
      const fakeDb = new FakeDb()
      const tokenLedger = new MemoryTokenLedger()
      const config = {
        owner: OWNER,
        treasury: TREASURY,
        tokenLedger,
        sale: { allowlistRoot: tree.getRoot(), presaleActive: true, maxWhitelistMintPerAddress: 5 }
      }
      const first = createSaleBackend(fakeDb as unknown as Db, config)
      const second = createSaleBackend(fakeDb as unknown as Db, config)

      const results = await Promise.all([
        first.sale.whitelistMint({ caller: ALICE }, 3, tree.getProof(ALICE)),
        second.sale.whitelistMint({ caller: ALICE }, 3, tree.getProof(ALICE))
      ])

      expect(results.filter(result => !result.success)).toEqual([
        expect.objectContaining({ code: 'PerAddressCapExceeded' })
      ])
      expect(fakeDb.get('saleClaims').documents).toHaveLength(1)
      expect(fakeDb.get('saleClaims').documents[0]).toMatchObject({ whitelistClaimed: 3, publicClaimed: 0 })
      expect(await tokenLedger.totalIssued()).toBe(3)
    })

    it('notifies caller-supplied observers as well as the index', async () => {
      const fakeDb = new FakeDb()
      const seen: number[] = []
      const { sale } = createSaleBackend(fakeDb as unknown as Db, {
        owner: OWNER,
        treasury: TREASURY,
        sale: { publicSaleActive: true },
        observers: [{ onMint: async (receipt) => { seen.push(...receipt.assetIds) } }]
      })

      await sale.publicMint({ caller: BOB }, 3)

      expect(seen).toEqual([1, 2, 3])
      expect(fakeDb.get('issuanceRecords').documents).toHaveLength(1)
    })
  })

  describe('loadBackendConfig', () => {
    it('uses defaults for missing variables', () => {
      expect(loadBackendConfig({})).toEqual({
        mongoUrl: 'mongodb://localhost:27017',
        dbName: 'gatemint',
        saleId: 'default'
      })
    })

    it('reads the environment', () => {
      expect(loadBackendConfig({
        GATEMINT_MONGO_URL: 'mongodb+srv://cluster.test/',
        GATEMINT_MONGO_DB: 'sales',
        GATEMINT_SALE_ID: ' drop-2 '
      })).toEqual({
        mongoUrl: 'mongodb+srv://cluster.test/',
        dbName: 'sales',
        saleId: 'drop-2'
      })
    })

    it('rejects a URL that is not a MongoDB URL', () => {
      expect(() => loadBackendConfig({ GATEMINT_MONGO_URL: 'http://localhost' }))
        .toThrow('GATEMINT_MONGO_URL must be a mongodb:// or mongodb+srv:// URL, got: http://localhost')
    })
  })
})
