import { applyPosting, reversePosting, type AccountBalances } from './accountBalance'
import { clearedPaymentState, paidStateFor } from './billCycle'
import { recordAuditEvent } from './lib/audit'
import { getOwned } from './lib/authz'
import type { DatabaseWriter } from './lib/database'
import { toIsoDate } from './lib/dates'
import { ValidationError } from './lib/errors'
import { validateTransactionType } from './lib/validation'
import type { Doc, TransactionType } from './schema'

export type TransactionFields = {
  accountId: string
  description: string
  /** Minor units, always positive. */
  amount: number
  category: string
  transactionType: TransactionType
  date: string
  billId?: string
}

export type TransactionChanges = Partial<Omit<TransactionFields, 'billId'>>

type AccountUpdate = {
  account: Doc<'accounts'>
  balances: AccountBalances
}

const balancesOf = (account: Doc<'accounts'>): AccountBalances => ({
  balance: account.balance,
  currentBalance: account.currentBalance,
})

const assertPostable = (fields: Pick<TransactionFields, 'amount' | 'transactionType'>) => {
  if (!Number.isSafeInteger(fields.amount) || fields.amount <= 0) {
    throw new ValidationError('amount', 'Transaction amount must be greater than 0.')
  }
  validateTransactionType(fields.transactionType)
}

const writeAccountUpdates = async (db: DatabaseWriter, updates: AccountUpdate[]) => {
  for (const update of updates) {
    await db.patch('accounts', update.account._id, update.balances)
  }
  return updates.map((update) => ({ ...update.account, ...update.balances }))
}

const snapshotTransaction = (fields: TransactionFields) => ({
  accountId: fields.accountId,
  description: fields.description,
  amount: fields.amount,
  category: fields.category,
  transactionType: fields.transactionType,
  date: fields.date,
})

export const postTransaction = async (
  db: DatabaseWriter,
  userId: string,
  fields: TransactionFields,
  occurredAt: number,
) => {
  assertPostable(fields)
  const account = await getOwned(db, 'accounts', fields.accountId, userId, 'Account')
  const [updatedAccount] = await writeAccountUpdates(db, [
    { account, balances: applyPosting(account.kind, balancesOf(account), fields) },
  ])

  const document = { userId, ...fields, createdAt: occurredAt }
  const transactionId = await db.insert('transactions', document)

  await recordAuditEvent(db, {
    userId,
    entityType: 'transaction',
    entityId: transactionId,
    action: 'created',
    after: snapshotTransaction(fields),
    metadata: { billId: fields.billId },
    occurredAt,
  })

  const transaction: Doc<'transactions'> = { ...document, _id: transactionId, _creationTime: occurredAt }
  return { transaction, account: updatedAccount }
}

/**
 * Reverses the stored posting and applies the edited one, so the end balances match deleting the
 * old transaction and creating the new one. A move reverses on the old account and applies on the
 * new one. Every referenced document is resolved before the first write.
 */
export const editTransaction = async (
  db: DatabaseWriter,
  userId: string,
  transactionId: string,
  changes: TransactionChanges,
  occurredAt: number,
) => {
  const existing = await getOwned(db, 'transactions', transactionId, userId, 'Transaction')
  const next: TransactionFields = {
    accountId: changes.accountId ?? existing.accountId,
    description: changes.description ?? existing.description,
    amount: changes.amount ?? existing.amount,
    category: changes.category ?? existing.category,
    transactionType: changes.transactionType ?? existing.transactionType,
    date: changes.date ?? existing.date,
    billId: existing.billId,
  }
  assertPostable(next)

  const previousAccount = await getOwned(db, 'accounts', existing.accountId, userId, 'Account')
  const reversed = reversePosting(previousAccount.kind, balancesOf(previousAccount), existing)

  let updates: AccountUpdate[]
  if (next.accountId === existing.accountId) {
    updates = [{ account: previousAccount, balances: applyPosting(previousAccount.kind, reversed, next) }]
  } else {
    const targetAccount = await db.get('accounts', next.accountId)
    if (!targetAccount || targetAccount.userId !== userId) {
      throw new ValidationError('accountId', 'Transactions can only move to one of your own accounts.')
    }
    updates = [
      { account: previousAccount, balances: reversed },
      { account: targetAccount, balances: applyPosting(targetAccount.kind, balancesOf(targetAccount), next) },
    ]
  }

  const accounts = await writeAccountUpdates(db, updates)
  await db.patch('transactions', existing._id, snapshotTransaction(next))

  await recordAuditEvent(db, {
    userId,
    entityType: 'transaction',
    entityId: existing._id,
    action: next.accountId === existing.accountId ? 'updated' : 'moved',
    before: snapshotTransaction(existing),
    after: snapshotTransaction(next),
    occurredAt,
  })

  const transaction: Doc<'transactions'> = { ...existing, ...snapshotTransaction(next) }
  return { transaction, accounts }
}

export const deleteTransaction = async (
  db: DatabaseWriter,
  userId: string,
  transactionId: string,
  occurredAt: number,
) => {
  const existing = await getOwned(db, 'transactions', transactionId, userId, 'Transaction')
  const account = await getOwned(db, 'accounts', existing.accountId, userId, 'Account')
  const [updatedAccount] = await writeAccountUpdates(db, [
    { account, balances: reversePosting(account.kind, balancesOf(account), existing) },
  ])

  await db.delete('transactions', existing._id)

  await recordAuditEvent(db, {
    userId,
    entityType: 'transaction',
    entityId: existing._id,
    action: 'removed',
    before: snapshotTransaction(existing),
    occurredAt,
  })

  return { transactionId: existing._id, account: updatedAccount }
}

/** Marks the bill paid for the month of `now` and posts the generated expense. */
export const postBillPayment = async (db: DatabaseWriter, userId: string, bill: Doc<'bills'>, now: Date) => {
  await db.patch('bills', bill._id, paidStateFor(now))
  return postTransaction(
    db,
    userId,
    {
      accountId: bill.accountId,
      description: `Bill Payment: ${bill.name}`,
      amount: bill.amount,
      category: bill.category,
      transactionType: 'expense',
      date: toIsoDate(now),
      billId: bill._id,
    },
    now.getTime(),
  )
}

/**
 * Clears the bill's payment state only. The transaction generated when it was marked paid keeps
 * its balance effect.
 */
export const reverseBillPayment = async (db: DatabaseWriter, bill: Doc<'bills'>) => {
  await db.patch('bills', bill._id, clearedPaymentState())
}
