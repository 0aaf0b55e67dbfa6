import { v } from 'convex/values'
import { recordAuditEvent } from './lib/audit'
import { requireIdentity } from './lib/authz'
import type { DatabaseWriter } from './lib/database'
import { NotFoundError, ValidationError } from './lib/errors'
import { mutation, query } from './lib/functions'
import { DEFAULT_CATEGORY, validateCategory, validateRequiredText } from './lib/validation'

export type CategoryUsage = {
  name: string
  transactionCount: number
  billCount: number
  /** Transactions plus bills filed under the category. */
  total: number
}

/** Moves every transaction and bill of the user from one category to another. Balances are untouched. */
const moveCategory = async (db: DatabaseWriter, userId: string, from: string, to: string) => {
  const [transactions, bills] = await Promise.all([
    db.listByUser('transactions', userId),
    db.listByUser('bills', userId),
  ])
  const matchingTransactions = transactions.filter((transaction) => transaction.category === from)
  const matchingBills = bills.filter((bill) => bill.category === from)

  if (matchingTransactions.length === 0 && matchingBills.length === 0) {
    throw new NotFoundError('Category not found.')
  }

  for (const transaction of matchingTransactions) {
    await db.patch('transactions', transaction._id, { category: to })
  }
  for (const bill of matchingBills) {
    await db.patch('bills', bill._id, { category: to })
  }

  return {
    updatedTransactions: matchingTransactions.length,
    updatedBills: matchingBills.length,
  }
}

export const listCategories = query({
  args: {},
  handler: async (ctx) => {
    const identity = await requireIdentity(ctx)
    const [transactions, bills] = await Promise.all([
      ctx.db.listByUser('transactions', identity.subject),
      ctx.db.listByUser('bills', identity.subject),
    ])

    const usage = new Map<string, { transactionCount: number; billCount: number }>()
    const entryFor = (name: string) => {
      const existing = usage.get(name)
      if (existing) return existing
      const created = { transactionCount: 0, billCount: 0 }
      usage.set(name, created)
      return created
    }

    for (const transaction of transactions) {
      const entry = entryFor(transaction.category)
      entry.transactionCount += 1
    }
    for (const bill of bills) {
      entryFor(bill.category).billCount += 1
    }

    return [...usage.entries()]
      .map(
        ([name, entry]): CategoryUsage => ({
          name,
          transactionCount: entry.transactionCount,
          billCount: entry.billCount,
          total: entry.transactionCount + entry.billCount,
        }),
      )
      .sort((left, right) => right.total - left.total || left.name.localeCompare(right.name))
  },
})

export const renameCategory = mutation({
  args: {
    from: v.string(),
    to: v.string(),
  },
  handler: async (ctx, args) => {
    const identity = await requireIdentity(ctx)
    const from = validateRequiredText(args.from, 'Category', 'from', 60)
    const to = validateRequiredText(args.to, 'New category name', 'to', 60)
    if (from === to) {
      throw new ValidationError('to', 'New category name must be different.')
    }

    const result = await moveCategory(ctx.db, identity.subject, from, to)

    await recordAuditEvent(ctx.db, {
      userId: identity.subject,
      entityType: 'category',
      entityId: from,
      action: 'renamed',
      before: { name: from },
      after: { name: to },
      metadata: result,
      occurredAt: ctx.now.getTime(),
    })

    return { category: to, ...result }
  },
})

export const removeCategory = mutation({
  args: {
    name: v.string(),
    mergeInto: v.optional(v.string()),
  },
  handler: async (ctx, args) => {
    const identity = await requireIdentity(ctx)
    const name = validateRequiredText(args.name, 'Category', 'name', 60)
    const mergeInto = validateCategory(args.mergeInto, 'mergeInto')
    if (name === mergeInto) {
      throw new ValidationError(
        'mergeInto',
        name === DEFAULT_CATEGORY ? `${DEFAULT_CATEGORY} cannot be removed.` : 'Cannot merge a category into itself.',
      )
    }

    const result = await moveCategory(ctx.db, identity.subject, name, mergeInto)

    await recordAuditEvent(ctx.db, {
      userId: identity.subject,
      entityType: 'category',
      entityId: name,
      action: 'removed',
      before: { name },
      after: { name: mergeInto },
      metadata: result,
      occurredAt: ctx.now.getTime(),
    })

    return {
      message: `Category "${name}" removed, items moved to "${mergeInto}"`,
      category: mergeInto,
      ...result,
    }
  },
})
