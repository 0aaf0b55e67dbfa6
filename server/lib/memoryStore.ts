import type { Doc, DocFields, TableName } from '../schema'
import type { DatabaseReader, DatabaseWriter, LedgerStore, TransactionOptions } from './database'

type TableData = { [T in TableName]: Map<string, Doc<T>> }

const createEmptyTables = (): TableData => ({
  accounts: new Map(),
  loanDetails: new Map(),
  transactions: new Map(),
  bills: new Map(),
  savingsGoals: new Map(),
  goalEvents: new Map(),
  auditEvents: new Map(),
})

class MemoryDatabase implements DatabaseWriter {
  constructor(
    private readonly tables: TableData,
    private readonly nextId: (table: TableName) => string,
    private readonly now: Date = new Date(),
  ) {}

  async get<T extends TableName>(table: T, id: string): Promise<Doc<T> | null> {
    const doc = this.tables[table].get(id)
    return doc ? structuredClone(doc) : null
  }

  async listByUser<T extends TableName>(table: T, userId: string): Promise<Array<Doc<T>>> {
    const rows: Array<Doc<T>> = []
    for (const doc of this.tables[table].values()) {
      if (doc.userId === userId) {
        rows.push(structuredClone(doc))
      }
    }
    return rows
  }

  async insert<T extends TableName>(table: T, value: DocFields<T>): Promise<string> {
    const id = this.nextId(table)
    const doc: Doc<T> = { ...structuredClone(value), _id: id, _creationTime: this.now.getTime() }
    this.tables[table].set(id, doc)
    return id
  }

  async patch<T extends TableName>(table: T, id: string, value: Partial<DocFields<T>>): Promise<void> {
    const existing = this.tables[table].get(id)
    if (!existing) {
      throw new Error(`Cannot patch missing document ${id} in ${table}.`)
    }
    this.tables[table].set(id, { ...existing, ...structuredClone(value) })
  }

  async delete<T extends TableName>(table: T, id: string): Promise<void> {
    if (!this.tables[table].delete(id)) {
      throw new Error(`Cannot delete missing document ${id} in ${table}.`)
    }
  }
}

/**
 * In-process store. Transactions run one at a time against a copy of the tables, and the copy
 * replaces the committed tables only when the transaction function resolves.
 */
export class MemoryLedgerStore implements LedgerStore {
  private committed: TableData = createEmptyTables()
  private tail: Promise<void> = Promise.resolve()
  private idSequence = 0

  runTransaction<R>(fn: (db: DatabaseWriter) => Promise<R>, options: TransactionOptions = {}): Promise<R> {
    const result = this.tail.then(() => this.execute(fn, options.now ?? new Date()))
    // The failure reaches the caller through `result`; the queue only needs to keep moving.
    this.tail = result.then(
      () => undefined,
      () => undefined,
    )
    return result
  }

  async runQuery<R>(fn: (db: DatabaseReader) => Promise<R>): Promise<R> {
    return fn(new MemoryDatabase(this.committed, this.nextId))
  }

  private async execute<R>(fn: (db: DatabaseWriter) => Promise<R>, now: Date): Promise<R> {
    const working = structuredClone(this.committed)
    const result = await fn(new MemoryDatabase(working, this.nextId, now))
    this.committed = working
    return result
  }

  private readonly nextId = (table: TableName) => {
    this.idSequence += 1
    return `${table}_${this.idSequence}`
  }
}
