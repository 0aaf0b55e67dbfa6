import { v } from 'convex/values'
import { deleteTransaction, editTransaction, postTransaction, type TransactionChanges } from './ledger'
import { getOwned, requireIdentity } from './lib/authz'
import { toIsoDate } from './lib/dates'
import { mutation, query } from './lib/functions'
import {
  validateCategory,
  validateIsoDate,
  validatePositive,
  validateRequiredText,
} from './lib/validation'
import { transactionType } from './schema'
import { toAccountView, toTransactionView } from './views'

export const createTransaction = mutation({
  args: {
    accountId: v.string(),
    description: v.string(),
    amount: v.number(),
    transactionType,
    category: v.optional(v.string()),
    date: v.optional(v.string()),
  },
  handler: async (ctx, args) => {
    const identity = await requireIdentity(ctx)

    const result = await postTransaction(
      ctx.db,
      identity.subject,
      {
        accountId: args.accountId,
        description: validateRequiredText(args.description, 'Description', 'description'),
        amount: validatePositive(args.amount, 'Transaction amount', 'amount'),
        category: validateCategory(args.category),
        transactionType: args.transactionType,
        date: args.date === undefined ? toIsoDate(ctx.now) : validateIsoDate(args.date, 'Date', 'date'),
      },
      ctx.now.getTime(),
    )

    return {
      transaction: toTransactionView(result.transaction),
      account: toAccountView(result.account),
    }
  },
})

export const updateTransaction = mutation({
  args: {
    id: v.string(),
    accountId: v.optional(v.string()),
    description: v.optional(v.string()),
    amount: v.optional(v.number()),
    transactionType: v.optional(transactionType),
    category: v.optional(v.string()),
    date: v.optional(v.string()),
  },
  handler: async (ctx, args) => {
    const identity = await requireIdentity(ctx)

    const changes: TransactionChanges = {
      accountId: args.accountId,
      transactionType: args.transactionType,
      description:
        args.description === undefined
          ? undefined
          : validateRequiredText(args.description, 'Description', 'description'),
      amount: args.amount === undefined ? undefined : validatePositive(args.amount, 'Transaction amount', 'amount'),
      category: args.category === undefined ? undefined : validateCategory(args.category),
      date: args.date === undefined ? undefined : validateIsoDate(args.date, 'Date', 'date'),
    }

    const result = await editTransaction(ctx.db, identity.subject, args.id, changes, ctx.now.getTime())

    return {
      transaction: toTransactionView(result.transaction),
      accounts: result.accounts.map((account) => toAccountView(account)),
    }
  },
})

export const removeTransaction = mutation({
  args: {
    id: v.string(),
  },
  handler: async (ctx, args) => {
    const identity = await requireIdentity(ctx)
    const result = await deleteTransaction(ctx.db, identity.subject, args.id, ctx.now.getTime())
    return {
      transactionId: result.transactionId,
      account: toAccountView(result.account),
    }
  },
})

export const listTransactions = query({
  args: {
    accountId: v.optional(v.string()),
    category: v.optional(v.string()),
  },
  handler: async (ctx, args) => {
    const identity = await requireIdentity(ctx)
    if (args.accountId !== undefined) {
      await getOwned(ctx.db, 'accounts', args.accountId, identity.subject, 'Account')
    }

    const category = args.category?.trim()
    const transactions = await ctx.db.listByUser('transactions', identity.subject)

    return transactions
      .filter((transaction) => args.accountId === undefined || transaction.accountId === args.accountId)
      .filter((transaction) => !category || transaction.category === category)
      .sort((left, right) => right.date.localeCompare(left.date) || right.createdAt - left.createdAt)
      .map(toTransactionView)
  },
})
