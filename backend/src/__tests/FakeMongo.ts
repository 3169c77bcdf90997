/**
 * In-process stand-in for the parts of the MongoDB driver the backend uses.
 * Filters match top-level fields on equality or `$lte`. Unique indexes are
 * enforced on insert.
 */

import { MongoServerError } from 'mongodb'

type Document = Record<string, unknown>

interface UpdateSpec {
  $set?: Document
  $setOnInsert?: Document
  $inc?: Record<string, number>
}

function isLte(value: unknown): value is { $lte: number } {
  return typeof value === 'object' && value !== null && '$lte' in value
}

function matches(document: Document, filter: Document): boolean {
  return Object.entries(filter).every(([key, value]) => {
    if (isLte(value)) {
      const field = document[key]
      return typeof field === 'number' && field <= value.$lte
    }
    return document[key] === value
  })
}

function equalityFields(filter: Document): Document {
  return Object.fromEntries(Object.entries(filter).filter(([, value]) => !isLte(value)))
}

function applyUpdate(document: Document, update: UpdateSpec): void {
  Object.assign(document, structuredClone(update.$set ?? {}))
  for (const [key, amount] of Object.entries(update.$inc ?? {})) {
    const current = document[key]
    document[key] = (typeof current === 'number' ? current : 0) + amount
  }
}

function sortValue(value: unknown): number | string {
  if (value instanceof Date) return value.getTime()
  if (typeof value === 'number' || typeof value === 'string') return value
  return 0
}

class FakeCursor {
  constructor(private documents: Document[]) { }

  sort(spec: Record<string, 1 | -1>): FakeCursor {
    const [key, direction] = Object.entries(spec)[0]
    // Stable sort keeps insertion order for equal keys
    this.documents = [...this.documents].sort((a, b) => {
      const left = sortValue(a[key])
      const right = sortValue(b[key])
      if (left === right) return 0
      return (left < right ? -1 : 1) * direction
    })
    return this
  }

  skip(count: number): FakeCursor {
    this.documents = this.documents.slice(count)
    return this
  }

  limit(count: number): FakeCursor {
    this.documents = this.documents.slice(0, count)
    return this
  }

  async toArray(): Promise<Document[]> {
    return this.documents.map(document => structuredClone(document))
  }
}

export class FakeCollection {
  readonly documents: Document[] = []
  readonly indexes: Array<{ spec: Document, options?: Document }> = []
  private nextId = 1

  async createIndex(spec: Document, options?: Document): Promise<string> {
    this.indexes.push({ spec, options })
    return Object.keys(spec).join('_')
  }

  async insertOne(document: Document): Promise<{ acknowledged: boolean, insertedId: number }> {
    for (const { spec, options } of this.indexes) {
      if (options?.unique !== true) continue
      const keys = Object.keys(spec)
      if (this.documents.some(existing => keys.every(key => existing[key] === document[key]))) {
        throw new MongoServerError({ message: `E11000 duplicate key error: ${keys.join('_')}`, code: 11000 })
      }
    }
    const insertedId = this.nextId++
    this.documents.push(structuredClone({ _id: insertedId, ...document }))
    return { acknowledged: true, insertedId }
  }

  async findOne(filter: Document): Promise<Document | null> {
    const found = this.documents.find(document => matches(document, filter))
    return found === undefined ? null : structuredClone(found)
  }

  find(filter: Document, options?: { projection?: Document }): FakeCursor {
    const hidden = Object.entries(options?.projection ?? {})
      .filter(([, include]) => include === 0)
      .map(([key]) => key)
    const found = this.documents
      .filter(document => matches(document, filter))
      .map(document => {
        const copy = { ...document }
        for (const key of hidden) delete copy[key]
        return copy
      })
    return new FakeCursor(found)
  }

  async updateOne(
    filter: Document,
    update: UpdateSpec,
    options: { upsert?: boolean } = {}
  ): Promise<{ matchedCount: number, upsertedCount: number }> {
    const found = this.documents.find(document => matches(document, filter))
    if (found !== undefined) {
      applyUpdate(found, update)
      return { matchedCount: 1, upsertedCount: 0 }
    }
    if (options.upsert === true) {
      await this.insertOne(this.upserted(filter, update))
      return { matchedCount: 0, upsertedCount: 1 }
    }
    return { matchedCount: 0, upsertedCount: 0 }
  }

  async findOneAndUpdate(
    filter: Document,
    update: UpdateSpec,
    options: { upsert?: boolean, returnDocument?: 'before' | 'after' } = {}
  ): Promise<Document | null> {
    const found = this.documents.find(document => matches(document, filter))
    if (found === undefined) {
      if (options.upsert !== true) return null
      const { insertedId } = await this.insertOne(this.upserted(filter, update))
      return options.returnDocument === 'after' ? this.findOne({ _id: insertedId }) : null
    }
    const before = structuredClone(found)
    applyUpdate(found, update)
    return options.returnDocument === 'after' ? structuredClone(found) : before
  }

  private upserted(filter: Document, update: UpdateSpec): Document {
    const document = { ...equalityFields(filter), ...update.$setOnInsert }
    applyUpdate(document, update)
    return document
  }
}

export class FakeDb {
  readonly collections = new Map<string, FakeCollection>()

  collection(name: string): FakeCollection {
    let collection = this.collections.get(name)
    if (collection === undefined) {
      collection = new FakeCollection()
      this.collections.set(name, collection)
    }
    return collection
  }

  get(name: string): FakeCollection {
    return this.collection(name)
  }
}
