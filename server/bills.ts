import { v } from 'convex/values'
import { isPaidForMonth, paidStateFor } from './billCycle'
import { postBillPayment, reverseBillPayment } from './ledger'
import { recordAuditEvent } from './lib/audit'
import { getOwned, requireIdentity } from './lib/authz'
import type { DatabaseReader } from './lib/database'
import { formatMonthLabel, toCalendarMonth } from './lib/dates'
import { ValidationError } from './lib/errors'
import { mutation, query } from './lib/functions'
import {
  validateCategory,
  validateDayOfMonth,
  validatePositive,
  validateRequiredText,
} from './lib/validation'
import type { Doc } from './schema'
import { toAccountView, toBillView } from './views'

const resolvePayingAccountId = async (db: DatabaseReader, userId: string, accountId: string) => {
  const account = await getOwned(db, 'accounts', accountId, userId, 'Account')
  if (account.kind === 'loan') {
    throw new ValidationError('accountId', 'Bills must be paid from a checking, savings, investment or credit account.')
  }
  return account._id
}

const resolveLoanAccountId = async (db: DatabaseReader, userId: string, loanAccountId: string) => {
  const account = await db.get('accounts', loanAccountId)
  if (!account || account.userId !== userId || account.kind !== 'loan') {
    throw new ValidationError('loanAccountId', 'Linked loan account must be one of your loan accounts.')
  }
  return account._id
}

const snapshotBill = (bill: Pick<Doc<'bills'>, 'name' | 'amount' | 'category' | 'dayOfMonth' | 'accountId' | 'isActive'>) => ({
  name: bill.name,
  amount: bill.amount,
  category: bill.category,
  dayOfMonth: bill.dayOfMonth,
  accountId: bill.accountId,
  isActive: bill.isActive,
})

export const createBill = mutation({
  args: {
    name: v.string(),
    amount: v.number(),
    dayOfMonth: v.number(),
    accountId: v.string(),
    category: v.optional(v.string()),
    isActive: v.optional(v.boolean()),
    loanAccountId: v.optional(v.string()),
  },
  handler: async (ctx, args) => {
    const identity = await requireIdentity(ctx)

    const name = validateRequiredText(args.name, 'Bill name', 'name')
    const amount = validatePositive(args.amount, 'Bill amount', 'amount')
    const dayOfMonth = validateDayOfMonth(args.dayOfMonth)
    const accountId = await resolvePayingAccountId(ctx.db, identity.subject, args.accountId)
    const loanAccountId =
      args.loanAccountId === undefined
        ? undefined
        : await resolveLoanAccountId(ctx.db, identity.subject, args.loanAccountId)

    const document = {
      userId: identity.subject,
      accountId,
      name,
      amount,
      category: validateCategory(args.category),
      dayOfMonth,
      isActive: args.isActive ?? true,
      isPaid: false,
      loanAccountId,
      createdAt: ctx.now.getTime(),
    }
    const billId = await ctx.db.insert('bills', document)

    await recordAuditEvent(ctx.db, {
      userId: identity.subject,
      entityType: 'bill',
      entityId: billId,
      action: 'created',
      after: { ...snapshotBill(document), loanAccountId },
      occurredAt: ctx.now.getTime(),
    })

    return toBillView({ ...document, _id: billId, _creationTime: ctx.now.getTime() }, ctx.now)
  },
})

export const updateBill = mutation({
  args: {
    id: v.string(),
    name: v.optional(v.string()),
    amount: v.optional(v.number()),
    dayOfMonth: v.optional(v.number()),
    accountId: v.optional(v.string()),
    category: v.optional(v.string()),
    isActive: v.optional(v.boolean()),
    // null unlinks the loan account.
    loanAccountId: v.optional(v.union(v.string(), v.null())),
  },
  handler: async (ctx, args) => {
    const identity = await requireIdentity(ctx)
    const existing = await getOwned(ctx.db, 'bills', args.id, identity.subject, 'Bill')

    const next: Doc<'bills'> = {
      ...existing,
      name: args.name === undefined ? existing.name : validateRequiredText(args.name, 'Bill name', 'name'),
      amount: args.amount === undefined ? existing.amount : validatePositive(args.amount, 'Bill amount', 'amount'),
      dayOfMonth: args.dayOfMonth === undefined ? existing.dayOfMonth : validateDayOfMonth(args.dayOfMonth),
      accountId:
        args.accountId === undefined
          ? existing.accountId
          : await resolvePayingAccountId(ctx.db, identity.subject, args.accountId),
      category: args.category === undefined ? existing.category : validateCategory(args.category),
      isActive: args.isActive ?? existing.isActive,
      loanAccountId:
        args.loanAccountId === undefined
          ? existing.loanAccountId
          : args.loanAccountId === null
            ? undefined
            : await resolveLoanAccountId(ctx.db, identity.subject, args.loanAccountId),
    }

    await ctx.db.patch('bills', existing._id, {
      name: next.name,
      amount: next.amount,
      dayOfMonth: next.dayOfMonth,
      accountId: next.accountId,
      category: next.category,
      isActive: next.isActive,
      loanAccountId: next.loanAccountId,
    })

    await recordAuditEvent(ctx.db, {
      userId: identity.subject,
      entityType: 'bill',
      entityId: existing._id,
      action: 'updated',
      before: { ...snapshotBill(existing), loanAccountId: existing.loanAccountId },
      after: { ...snapshotBill(next), loanAccountId: next.loanAccountId },
      occurredAt: ctx.now.getTime(),
    })

    return toBillView(next, ctx.now)
  },
})

export const removeBill = mutation({
  args: {
    id: v.string(),
  },
  handler: async (ctx, args) => {
    const identity = await requireIdentity(ctx)
    const existing = await getOwned(ctx.db, 'bills', args.id, identity.subject, 'Bill')

    await ctx.db.delete('bills', existing._id)

    await recordAuditEvent(ctx.db, {
      userId: identity.subject,
      entityType: 'bill',
      entityId: existing._id,
      action: 'removed',
      before: snapshotBill(existing),
      occurredAt: ctx.now.getTime(),
    })

    return { billId: existing._id }
  },
})

/**
 * Paid this month: clears the payment state and leaves the generated transaction in place.
 * Otherwise marks the bill paid and posts a `Bill Payment` expense on the paying account.
 */
export const toggleBillPaid = mutation({
  args: {
    id: v.string(),
  },
  handler: async (ctx, args) => {
    const identity = await requireIdentity(ctx)
    const bill = await getOwned(ctx.db, 'bills', args.id, identity.subject, 'Bill')
    const monthLabel = formatMonthLabel(ctx.now)

    if (isPaidForMonth(bill, toCalendarMonth(ctx.now))) {
      await reverseBillPayment(ctx.db, bill)
      await recordAuditEvent(ctx.db, {
        userId: identity.subject,
        entityType: 'bill',
        entityId: bill._id,
        action: 'marked_unpaid',
        before: { lastPaidMonth: bill.lastPaidMonth, lastPaidYear: bill.lastPaidYear },
        occurredAt: ctx.now.getTime(),
      })

      return {
        billId: bill._id,
        isPaid: false,
        transactionId: null,
        account: null,
        message: `Bill '${bill.name}' marked as unpaid for ${monthLabel}`,
      }
    }

    const payment = await postBillPayment(ctx.db, identity.subject, bill, ctx.now)
    const paidState = paidStateFor(ctx.now)
    await recordAuditEvent(ctx.db, {
      userId: identity.subject,
      entityType: 'bill',
      entityId: bill._id,
      action: 'marked_paid',
      after: { lastPaidMonth: paidState.lastPaidMonth, lastPaidYear: paidState.lastPaidYear },
      metadata: { transactionId: payment.transaction._id },
      occurredAt: ctx.now.getTime(),
    })

    return {
      billId: bill._id,
      isPaid: true,
      transactionId: payment.transaction._id,
      account: toAccountView(payment.account),
      message: `Bill '${bill.name}' marked as paid for ${monthLabel}`,
    }
  },
})

export const resetAllBills = mutation({
  args: {},
  handler: async (ctx) => {
    const identity = await requireIdentity(ctx)
    const bills = await ctx.db.listByUser('bills', identity.subject)

    for (const bill of bills) {
      await reverseBillPayment(ctx.db, bill)
    }

    await recordAuditEvent(ctx.db, {
      userId: identity.subject,
      entityType: 'bill',
      entityId: 'all',
      action: 'reset_payment_state',
      metadata: { billCount: bills.length },
      occurredAt: ctx.now.getTime(),
    })

    return { resetCount: bills.length }
  },
})

export const listBills = query({
  args: {
    category: v.optional(v.string()),
    activeOnly: v.optional(v.boolean()),
  },
  handler: async (ctx, args) => {
    const identity = await requireIdentity(ctx)
    const category = args.category?.trim()
    const bills = await ctx.db.listByUser('bills', identity.subject)

    return bills
      .filter((bill) => !args.activeOnly || bill.isActive)
      .filter((bill) => !category || bill.category === category)
      .sort((left, right) => left.dayOfMonth - right.dayOfMonth || left.name.localeCompare(right.name))
      .map((bill) => toBillView(bill, ctx.now))
  },
})
