import { v } from 'convex/values'
import { parseAuditJson } from './lib/audit'
import { requireIdentity } from './lib/authz'
import { ValidationError } from './lib/errors'
import { mutation, query } from './lib/functions'
import { clamp } from './lib/money'
import type { AccountKind } from './schema'

const CALC_VERSION = 'ledger_calc_2026_10'
const DEFAULT_AUDIT_LIMIT = 50

export const health = query({
  args: {},
  handler: async (ctx) => {
    return {
      ok: true,
      serverTime: ctx.now.getTime(),
      environment: ctx.config.environment,
      deployment: ctx.config.deployment,
      version: CALC_VERSION,
    }
  },
})

export const getLedgerMetrics = query({
  args: {},
  handler: async (ctx) => {
    const identity = await requireIdentity(ctx)
    const [accounts, transactions, bills, goals] = await Promise.all([
      ctx.db.listByUser('accounts', identity.subject),
      ctx.db.listByUser('transactions', identity.subject),
      ctx.db.listByUser('bills', identity.subject),
      ctx.db.listByUser('savingsGoals', identity.subject),
    ])

    const accountsByKind: Record<AccountKind, number> = {
      checking: 0,
      savings: 0,
      investment: 0,
      credit: 0,
      loan: 0,
    }
    for (const account of accounts) {
      accountsByKind[account.kind] += 1
    }

    return {
      accounts: accounts.length,
      accountsByKind,
      transactions: transactions.length,
      generatedBillPayments: transactions.filter((transaction) => transaction.billId !== undefined).length,
      bills: bills.length,
      activeBills: bills.filter((bill) => bill.isActive).length,
      goals: goals.length,
      activeGoals: goals.filter((goal) => goal.isActive).length,
    }
  },
})

export const listAuditEvents = query({
  args: {
    entityType: v.optional(v.string()),
    entityId: v.optional(v.string()),
    limit: v.optional(v.number()),
  },
  handler: async (ctx, args) => {
    const identity = await requireIdentity(ctx)
    if (args.limit !== undefined && !Number.isFinite(args.limit)) {
      throw new ValidationError('limit', 'Limit must be a finite number.')
    }
    const limit = clamp(Math.floor(args.limit ?? DEFAULT_AUDIT_LIMIT), 1, 500)
    const events = await ctx.db.listByUser('auditEvents', identity.subject)

    return events
      .filter((event) => args.entityType === undefined || event.entityType === args.entityType)
      .filter((event) => args.entityId === undefined || event.entityId === args.entityId)
      // Newest first; among equal timestamps the later insert wins.
      .reverse()
      .sort((left, right) => right.createdAt - left.createdAt)
      .slice(0, limit)
      .map((event) => ({
        id: event._id,
        entityType: event.entityType,
        entityId: event.entityId,
        action: event.action,
        before: parseAuditJson(event.beforeJson),
        after: parseAuditJson(event.afterJson),
        metadata: parseAuditJson(event.metadataJson),
        createdAt: event.createdAt,
      }))
  },
})

export const purgeAuditEvents = mutation({
  args: {
    olderThan: v.number(),
  },
  handler: async (ctx, args) => {
    const identity = await requireIdentity(ctx)
    const events = await ctx.db.listByUser('auditEvents', identity.subject)
    const expired = events.filter((event) => event.createdAt < args.olderThan)
    for (const event of expired) {
      await ctx.db.delete('auditEvents', event._id)
    }
    return { deleted: expired.length }
  },
})
