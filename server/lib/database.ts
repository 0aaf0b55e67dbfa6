import type { Doc, DocFields, TableName } from '../schema'

export type DatabaseReader = {
  get: <T extends TableName>(table: T, id: string) => Promise<Doc<T> | null>
  listByUser: <T extends TableName>(table: T, userId: string) => Promise<Array<Doc<T>>>
}

export type DatabaseWriter = DatabaseReader & {
  insert: <T extends TableName>(table: T, value: DocFields<T>) => Promise<string>
  patch: <T extends TableName>(table: T, id: string, value: Partial<DocFields<T>>) => Promise<void>
  delete: <T extends TableName>(table: T, id: string) => Promise<void>
}

/**
 * Storage collaborator. `runTransaction` must commit every write made through the writer or none
 * of them, and must serialize transactions that touch the same documents. Adapters report write
 * conflicts by throwing `ConflictError`. Documents inserted in a transaction are stamped with its
 * `now`.
 */
export type TransactionOptions = {
  now?: Date
}

export type LedgerStore = {
  runTransaction: <R>(fn: (db: DatabaseWriter) => Promise<R>, options?: TransactionOptions) => Promise<R>
  runQuery: <R>(fn: (db: DatabaseReader) => Promise<R>) => Promise<R>
}
