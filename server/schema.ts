import { v, type Infer } from 'convex/values'

// Monetary fields hold integer minor units (cents). Conversion to decimal amounts happens at the
// function boundary.

export const accountKind = v.union(
  v.literal('checking'),
  v.literal('savings'),
  v.literal('investment'),
  v.literal('credit'),
  v.literal('loan'),
)

export const transactionType = v.union(v.literal('income'), v.literal('expense'))

const goalEventType = v.union(
  v.literal('created'),
  v.literal('edited'),
  v.literal('contribution'),
  v.literal('withdrawal'),
  v.literal('removed'),
)

export const tables = {
  accounts: v.object({
    userId: v.string(),
    name: v.string(),
    kind: accountKind,
    balance: v.number(),
    currentBalance: v.number(),
    creditLimit: v.optional(v.number()),
    createdAt: v.number(),
  }),
  loanDetails: v.object({
    userId: v.string(),
    accountId: v.string(),
    originalAmount: v.number(),
    currentPrincipal: v.number(),
    interestRate: v.number(),
    loanTermMonths: v.number(),
    monthlyPayment: v.number(),
    loanStartDate: v.string(),
    nextPaymentDate: v.string(),
    lender: v.optional(v.string()),
    loanType: v.optional(v.string()),
    notes: v.optional(v.string()),
    createdAt: v.number(),
  }),
  transactions: v.object({
    userId: v.string(),
    accountId: v.string(),
    description: v.string(),
    amount: v.number(),
    category: v.string(),
    transactionType,
    date: v.string(),
    billId: v.optional(v.string()),
    createdAt: v.number(),
  }),
  bills: v.object({
    userId: v.string(),
    accountId: v.string(),
    name: v.string(),
    amount: v.number(),
    category: v.string(),
    dayOfMonth: v.number(),
    isActive: v.boolean(),
    isPaid: v.boolean(),
    paidDate: v.optional(v.number()),
    lastPaidMonth: v.optional(v.number()),
    lastPaidYear: v.optional(v.number()),
    loanAccountId: v.optional(v.string()),
    createdAt: v.number(),
  }),
  savingsGoals: v.object({
    userId: v.string(),
    name: v.string(),
    currentAmount: v.number(),
    targetAmount: v.number(),
    isActive: v.boolean(),
    createdAt: v.number(),
  }),
  goalEvents: v.object({
    userId: v.string(),
    goalId: v.string(),
    eventType: goalEventType,
    amountDelta: v.optional(v.number()),
    beforeCurrentAmount: v.optional(v.number()),
    afterCurrentAmount: v.optional(v.number()),
    occurredAt: v.number(),
  }),
  auditEvents: v.object({
    userId: v.string(),
    entityType: v.string(),
    entityId: v.string(),
    action: v.string(),
    beforeJson: v.optional(v.string()),
    afterJson: v.optional(v.string()),
    metadataJson: v.optional(v.string()),
    createdAt: v.number(),
  }),
}

export type TableName = keyof typeof tables

export type SystemFields = {
  _id: string
  _creationTime: number
}

export type DocFields<T extends TableName> = Infer<(typeof tables)[T]>
export type Doc<T extends TableName> = DocFields<T> & SystemFields

export type AccountKind = Infer<typeof accountKind>
export type TransactionType = Infer<typeof transactionType>
export type GoalEventType = Infer<typeof goalEventType>
