import { v } from 'convex/values'
import { recordAuditEvent } from './lib/audit'
import { getOwned, requireIdentity } from './lib/authz'
import type { DatabaseWriter } from './lib/database'
import { mutation, query } from './lib/functions'
import { toMajorUnits, toMinorUnits } from './lib/money'
import { validateNonNegative, validatePositive, validateRequiredText } from './lib/validation'
import { addFunds, withdrawFunds } from './savingsGoal'
import type { Doc, GoalEventType } from './schema'
import { toGoalView } from './views'

const recordGoalEvent = async (
  db: DatabaseWriter,
  args: {
    userId: string
    goalId: string
    eventType: GoalEventType
    before?: number
    after?: number
    occurredAt: number
  },
) => {
  await db.insert('goalEvents', {
    userId: args.userId,
    goalId: args.goalId,
    eventType: args.eventType,
    amountDelta: args.before === undefined || args.after === undefined ? undefined : args.after - args.before,
    beforeCurrentAmount: args.before,
    afterCurrentAmount: args.after,
    occurredAt: args.occurredAt,
  })
}

const snapshotGoal = (goal: Pick<Doc<'savingsGoals'>, 'name' | 'currentAmount' | 'targetAmount' | 'isActive'>) => ({
  name: goal.name,
  currentAmount: goal.currentAmount,
  targetAmount: goal.targetAmount,
  isActive: goal.isActive,
})

const moveGoalFunds = async (
  db: DatabaseWriter,
  userId: string,
  goal: Doc<'savingsGoals'>,
  nextAmount: number,
  eventType: 'contribution' | 'withdrawal',
  occurredAt: number,
) => {
  await db.patch('savingsGoals', goal._id, { currentAmount: nextAmount })
  await recordGoalEvent(db, {
    userId,
    goalId: goal._id,
    eventType,
    before: goal.currentAmount,
    after: nextAmount,
    occurredAt,
  })
  await recordAuditEvent(db, {
    userId,
    entityType: 'savings_goal',
    entityId: goal._id,
    action: eventType,
    before: { currentAmount: goal.currentAmount },
    after: { currentAmount: nextAmount },
    occurredAt,
  })
  return toGoalView({ ...goal, currentAmount: nextAmount })
}

export const createGoal = mutation({
  args: {
    name: v.string(),
    targetAmount: v.number(),
    currentAmount: v.optional(v.number()),
  },
  handler: async (ctx, args) => {
    const identity = await requireIdentity(ctx)

    const document = {
      userId: identity.subject,
      name: validateRequiredText(args.name, 'Goal name', 'name'),
      targetAmount: validatePositive(args.targetAmount, 'Target amount', 'targetAmount'),
      currentAmount:
        args.currentAmount === undefined
          ? 0
          : validateNonNegative(args.currentAmount, 'Current amount', 'currentAmount'),
      isActive: true,
      createdAt: ctx.now.getTime(),
    }
    const goalId = await ctx.db.insert('savingsGoals', document)

    await recordGoalEvent(ctx.db, {
      userId: identity.subject,
      goalId,
      eventType: 'created',
      before: 0,
      after: document.currentAmount,
      occurredAt: ctx.now.getTime(),
    })
    await recordAuditEvent(ctx.db, {
      userId: identity.subject,
      entityType: 'savings_goal',
      entityId: goalId,
      action: 'created',
      after: snapshotGoal(document),
      occurredAt: ctx.now.getTime(),
    })

    return toGoalView({ ...document, _id: goalId, _creationTime: ctx.now.getTime() })
  },
})

export const updateGoal = mutation({
  args: {
    id: v.string(),
    name: v.optional(v.string()),
    targetAmount: v.optional(v.number()),
    currentAmount: v.optional(v.number()),
    isActive: v.optional(v.boolean()),
  },
  handler: async (ctx, args) => {
    const identity = await requireIdentity(ctx)
    const existing = await getOwned(ctx.db, 'savingsGoals', args.id, identity.subject, 'Savings goal')

    const next: Doc<'savingsGoals'> = {
      ...existing,
      name: args.name === undefined ? existing.name : validateRequiredText(args.name, 'Goal name', 'name'),
      targetAmount:
        args.targetAmount === undefined
          ? existing.targetAmount
          : validatePositive(args.targetAmount, 'Target amount', 'targetAmount'),
      currentAmount:
        args.currentAmount === undefined
          ? existing.currentAmount
          : validateNonNegative(args.currentAmount, 'Current amount', 'currentAmount'),
      isActive: args.isActive ?? existing.isActive,
    }

    await ctx.db.patch('savingsGoals', existing._id, snapshotGoal(next))

    await recordGoalEvent(ctx.db, {
      userId: identity.subject,
      goalId: existing._id,
      eventType: 'edited',
      before: existing.currentAmount,
      after: next.currentAmount,
      occurredAt: ctx.now.getTime(),
    })
    await recordAuditEvent(ctx.db, {
      userId: identity.subject,
      entityType: 'savings_goal',
      entityId: existing._id,
      action: 'updated',
      before: snapshotGoal(existing),
      after: snapshotGoal(next),
      occurredAt: ctx.now.getTime(),
    })

    return toGoalView(next)
  },
})

export const removeGoal = mutation({
  args: {
    id: v.string(),
  },
  handler: async (ctx, args) => {
    const identity = await requireIdentity(ctx)
    const existing = await getOwned(ctx.db, 'savingsGoals', args.id, identity.subject, 'Savings goal')

    await ctx.db.delete('savingsGoals', existing._id)

    await recordGoalEvent(ctx.db, {
      userId: identity.subject,
      goalId: existing._id,
      eventType: 'removed',
      before: existing.currentAmount,
      occurredAt: ctx.now.getTime(),
    })
    await recordAuditEvent(ctx.db, {
      userId: identity.subject,
      entityType: 'savings_goal',
      entityId: existing._id,
      action: 'removed',
      before: snapshotGoal(existing),
      occurredAt: ctx.now.getTime(),
    })

    return { goalId: existing._id }
  },
})

export const addGoalFunds = mutation({
  args: {
    id: v.string(),
    amount: v.number(),
  },
  handler: async (ctx, args) => {
    const identity = await requireIdentity(ctx)
    const goal = await getOwned(ctx.db, 'savingsGoals', args.id, identity.subject, 'Savings goal')
    const nextAmount = addFunds(goal, toMinorUnits(args.amount))
    return moveGoalFunds(ctx.db, identity.subject, goal, nextAmount, 'contribution', ctx.now.getTime())
  },
})

export const withdrawGoalFunds = mutation({
  args: {
    id: v.string(),
    amount: v.number(),
  },
  handler: async (ctx, args) => {
    const identity = await requireIdentity(ctx)
    const goal = await getOwned(ctx.db, 'savingsGoals', args.id, identity.subject, 'Savings goal')
    const nextAmount = withdrawFunds(goal, toMinorUnits(args.amount))
    return moveGoalFunds(ctx.db, identity.subject, goal, nextAmount, 'withdrawal', ctx.now.getTime())
  },
})

export const listGoals = query({
  args: {
    includeInactive: v.optional(v.boolean()),
  },
  handler: async (ctx, args) => {
    const identity = await requireIdentity(ctx)
    const goals = await ctx.db.listByUser('savingsGoals', identity.subject)
    return goals
      .filter((goal) => args.includeInactive === true || goal.isActive)
      .sort((left, right) => left.createdAt - right.createdAt || left.name.localeCompare(right.name))
      .map(toGoalView)
  },
})

export const listGoalEvents = query({
  args: {
    goalId: v.string(),
  },
  handler: async (ctx, args) => {
    const identity = await requireIdentity(ctx)
    const events = await ctx.db.listByUser('goalEvents', identity.subject)
    return events
      .filter((event) => event.goalId === args.goalId)
      .sort((left, right) => left.occurredAt - right.occurredAt)
      .map((event) => ({
        id: event._id,
        eventType: event.eventType,
        amountDelta: event.amountDelta === undefined ? null : toMajorUnits(event.amountDelta),
        beforeCurrentAmount:
          event.beforeCurrentAmount === undefined ? null : toMajorUnits(event.beforeCurrentAmount),
        afterCurrentAmount: event.afterCurrentAmount === undefined ? null : toMajorUnits(event.afterCurrentAmount),
        occurredAt: event.occurredAt,
      }))
  },
})
