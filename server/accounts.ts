import { v, type ObjectType } from 'convex/values'
import { authoritativeBalance, balanceModelFor, isAssetKind, type SummaryBucket } from './accountBalance'
import { recordAuditEvent } from './lib/audit'
import { getOwned, requireIdentity } from './lib/authz'
import type { DatabaseReader } from './lib/database'
import { parseIsoDate } from './lib/dates'
import { ValidationError } from './lib/errors'
import { mutation, query } from './lib/functions'
import { toMajorUnits } from './lib/money'
import {
  MAX_BILL_DAY_OF_MONTH,
  validateCategory,
  validateDayOfMonth,
  validateFinite,
  validateIsoDate,
  validateNonNegative,
  validateOptionalText,
  validatePercent,
  validatePositive,
  validatePositiveInteger,
  validateRequiredText,
} from './lib/validation'
import { accountKind, type Doc } from './schema'
import { toAccountView, toBillView } from './views'

const loanTermsArgs = {
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
}

type LoanTermsInput = ObjectType<typeof loanTermsArgs>

const LOAN_PAYMENT_CATEGORY = 'Loan Payment'

const validateLoanTerms = (input: LoanTermsInput) => {
  const originalAmount = validatePositive(input.originalAmount, 'Original amount', 'originalAmount')
  const currentPrincipal = validateNonNegative(input.currentPrincipal, 'Current principal', 'currentPrincipal')
  if (currentPrincipal > originalAmount) {
    throw new ValidationError('currentPrincipal', 'Current principal cannot exceed the original amount.')
  }

  return {
    originalAmount,
    currentPrincipal,
    interestRate: validatePercent(input.interestRate, 'Interest rate', 'interestRate'),
    loanTermMonths: validatePositiveInteger(input.loanTermMonths, 'Loan term', 'loanTermMonths'),
    monthlyPayment: validatePositive(input.monthlyPayment, 'Monthly payment', 'monthlyPayment'),
    loanStartDate: validateIsoDate(input.loanStartDate, 'Loan start date', 'loanStartDate'),
    nextPaymentDate: validateIsoDate(input.nextPaymentDate, 'Next payment date', 'nextPaymentDate'),
    lender: validateOptionalText(input.lender, 'Lender', 'lender', 80),
    loanType: validateOptionalText(input.loanType, 'Loan type', 'loanType', 80),
    notes: validateOptionalText(input.notes, 'Notes', 'notes', 2000),
  }
}

const findLoanDetails = async (db: DatabaseReader, userId: string, accountId: string) => {
  const rows = await db.listByUser('loanDetails', userId)
  return rows.find((row) => row.accountId === accountId) ?? null
}

const snapshotAccount = (account: Pick<Doc<'accounts'>, 'name' | 'kind' | 'balance' | 'currentBalance' | 'creditLimit'>) => ({
  name: account.name,
  kind: account.kind,
  balance: account.balance,
  currentBalance: account.currentBalance,
  creditLimit: account.creditLimit,
})

export const createAccount = mutation({
  args: {
    name: v.string(),
    kind: accountKind,
    balance: v.optional(v.number()),
    currentBalance: v.optional(v.number()),
    creditLimit: v.optional(v.number()),
    loan: v.optional(v.object(loanTermsArgs)),
    paymentBill: v.optional(
      v.object({
        accountId: v.string(),
        dayOfMonth: v.optional(v.number()),
        category: v.optional(v.string()),
      }),
    ),
  },
  handler: async (ctx, args) => {
    const identity = await requireIdentity(ctx)
    const name = validateRequiredText(args.name, 'Account name', 'name')

    if (args.balance !== undefined && !isAssetKind(args.kind)) {
      throw new ValidationError('balance', 'Balance only applies to checking, savings and investment accounts.')
    }
    if (args.kind !== 'credit') {
      if (args.currentBalance !== undefined) {
        throw new ValidationError('currentBalance', 'Current balance only applies to credit accounts.')
      }
      if (args.creditLimit !== undefined) {
        throw new ValidationError('creditLimit', 'Credit limit only applies to credit accounts.')
      }
    }
    if (args.kind !== 'loan') {
      if (args.loan !== undefined) {
        throw new ValidationError('loan', 'Loan details only apply to loan accounts.')
      }
      if (args.paymentBill !== undefined) {
        throw new ValidationError('paymentBill', 'Payment bills can only be generated for loan accounts.')
      }
    }
    if (args.kind === 'loan' && args.loan === undefined) {
      throw new ValidationError('loan', 'Loan accounts require loan details.')
    }

    const loanTerms = args.loan === undefined ? null : validateLoanTerms(args.loan)
    const occurredAt = ctx.now.getTime()

    const document = {
      userId: identity.subject,
      name,
      kind: args.kind,
      balance: args.balance === undefined ? 0 : validateFinite(args.balance, 'Balance', 'balance'),
      currentBalance:
        args.currentBalance === undefined ? 0 : validateFinite(args.currentBalance, 'Current balance', 'currentBalance'),
      creditLimit:
        args.creditLimit === undefined ? undefined : validateNonNegative(args.creditLimit, 'Credit limit', 'creditLimit'),
      createdAt: occurredAt,
    }

    const payingAccount =
      args.paymentBill === undefined
        ? null
        : await getOwned(ctx.db, 'accounts', args.paymentBill.accountId, identity.subject, 'Account')
    if (payingAccount?.kind === 'loan') {
      throw new ValidationError('paymentBill', 'Loan payments must be drawn from a non-loan account.')
    }
    const paymentBillDay =
      loanTerms && args.paymentBill
        ? validateDayOfMonth(
            args.paymentBill.dayOfMonth ??
              Math.min(parseIsoDate(loanTerms.nextPaymentDate)?.getDate() ?? 1, MAX_BILL_DAY_OF_MONTH),
            'paymentBill.dayOfMonth',
          )
        : null

    const accountId = await ctx.db.insert('accounts', document)
    const account: Doc<'accounts'> = { ...document, _id: accountId, _creationTime: occurredAt }

    let loan: Doc<'loanDetails'> | null = null
    if (loanTerms) {
      const loanDocument = { userId: identity.subject, accountId, ...loanTerms, createdAt: occurredAt }
      const loanId = await ctx.db.insert('loanDetails', loanDocument)
      loan = { ...loanDocument, _id: loanId, _creationTime: occurredAt }
    }

    await recordAuditEvent(ctx.db, {
      userId: identity.subject,
      entityType: 'account',
      entityId: accountId,
      action: 'created',
      after: { ...snapshotAccount(document), loan: loanTerms },
      occurredAt,
    })

    let paymentBill: Doc<'bills'> | null = null
    if (loan && payingAccount && args.paymentBill && paymentBillDay !== null) {
      const billDocument = {
        userId: identity.subject,
        accountId: payingAccount._id,
        name: `${name} Payment`,
        amount: loan.monthlyPayment,
        category: validateCategory(args.paymentBill.category ?? LOAN_PAYMENT_CATEGORY),
        dayOfMonth: paymentBillDay,
        isActive: true,
        isPaid: false,
        loanAccountId: accountId,
        createdAt: occurredAt,
      }
      const billId = await ctx.db.insert('bills', billDocument)
      paymentBill = { ...billDocument, _id: billId, _creationTime: occurredAt }

      await recordAuditEvent(ctx.db, {
        userId: identity.subject,
        entityType: 'bill',
        entityId: billId,
        action: 'created',
        after: { name: billDocument.name, amount: billDocument.amount, loanAccountId: accountId },
        metadata: { source: 'loan_account' },
        occurredAt,
      })
    }

    return {
      account: toAccountView(account, loan),
      paymentBill: paymentBill ? toBillView(paymentBill, ctx.now) : null,
    }
  },
})

export const updateAccount = mutation({
  args: {
    id: v.string(),
    name: v.optional(v.string()),
    // Manual corrections of the authoritative balance for the account's kind.
    balance: v.optional(v.number()),
    currentBalance: v.optional(v.number()),
    // null removes the limit.
    creditLimit: v.optional(v.union(v.number(), v.null())),
  },
  handler: async (ctx, args) => {
    const identity = await requireIdentity(ctx)
    const existing = await getOwned(ctx.db, 'accounts', args.id, identity.subject, 'Account')

    if (args.balance !== undefined && !isAssetKind(existing.kind)) {
      throw new ValidationError('balance', 'Balance only applies to checking, savings and investment accounts.')
    }
    if (existing.kind !== 'credit') {
      if (args.currentBalance !== undefined) {
        throw new ValidationError('currentBalance', 'Current balance only applies to credit accounts.')
      }
      if (args.creditLimit !== undefined) {
        throw new ValidationError('creditLimit', 'Credit limit only applies to credit accounts.')
      }
    }

    const next: Doc<'accounts'> = {
      ...existing,
      name: args.name === undefined ? existing.name : validateRequiredText(args.name, 'Account name', 'name'),
      balance: args.balance === undefined ? existing.balance : validateFinite(args.balance, 'Balance', 'balance'),
      currentBalance:
        args.currentBalance === undefined
          ? existing.currentBalance
          : validateFinite(args.currentBalance, 'Current balance', 'currentBalance'),
      creditLimit:
        args.creditLimit === undefined
          ? existing.creditLimit
          : args.creditLimit === null
            ? undefined
            : validateNonNegative(args.creditLimit, 'Credit limit', 'creditLimit'),
    }

    await ctx.db.patch('accounts', existing._id, {
      name: next.name,
      balance: next.balance,
      currentBalance: next.currentBalance,
      creditLimit: next.creditLimit,
    })

    const balanceCorrected =
      next.balance !== existing.balance || next.currentBalance !== existing.currentBalance
    await recordAuditEvent(ctx.db, {
      userId: identity.subject,
      entityType: 'account',
      entityId: existing._id,
      action: balanceCorrected ? 'balance_corrected' : 'updated',
      before: snapshotAccount(existing),
      after: snapshotAccount(next),
      occurredAt: ctx.now.getTime(),
    })

    return toAccountView(next, await findLoanDetails(ctx.db, identity.subject, existing._id))
  },
})

export const updateLoanDetails = mutation({
  args: {
    accountId: v.string(),
    originalAmount: v.optional(v.number()),
    currentPrincipal: v.optional(v.number()),
    interestRate: v.optional(v.number()),
    loanTermMonths: v.optional(v.number()),
    monthlyPayment: v.optional(v.number()),
    loanStartDate: v.optional(v.string()),
    nextPaymentDate: v.optional(v.string()),
    lender: v.optional(v.string()),
    loanType: v.optional(v.string()),
    notes: v.optional(v.string()),
  },
  handler: async (ctx, args) => {
    const identity = await requireIdentity(ctx)
    const account = await getOwned(ctx.db, 'accounts', args.accountId, identity.subject, 'Account')
    const existing = await findLoanDetails(ctx.db, identity.subject, account._id)
    if (account.kind !== 'loan' || !existing) {
      throw new ValidationError('accountId', 'Loan details only apply to loan accounts.')
    }

    const terms = validateLoanTerms({
      originalAmount: args.originalAmount ?? toMajorUnits(existing.originalAmount),
      currentPrincipal: args.currentPrincipal ?? toMajorUnits(existing.currentPrincipal),
      interestRate: args.interestRate ?? existing.interestRate,
      loanTermMonths: args.loanTermMonths ?? existing.loanTermMonths,
      monthlyPayment: args.monthlyPayment ?? toMajorUnits(existing.monthlyPayment),
      loanStartDate: args.loanStartDate ?? existing.loanStartDate,
      nextPaymentDate: args.nextPaymentDate ?? existing.nextPaymentDate,
      lender: args.lender ?? existing.lender,
      loanType: args.loanType ?? existing.loanType,
      notes: args.notes ?? existing.notes,
    })

    await ctx.db.patch('loanDetails', existing._id, terms)

    await recordAuditEvent(ctx.db, {
      userId: identity.subject,
      entityType: 'loan',
      entityId: account._id,
      action: 'updated',
      before: {
        originalAmount: existing.originalAmount,
        currentPrincipal: existing.currentPrincipal,
        interestRate: existing.interestRate,
        monthlyPayment: existing.monthlyPayment,
        nextPaymentDate: existing.nextPaymentDate,
      },
      after: {
        originalAmount: terms.originalAmount,
        currentPrincipal: terms.currentPrincipal,
        interestRate: terms.interestRate,
        monthlyPayment: terms.monthlyPayment,
        nextPaymentDate: terms.nextPaymentDate,
      },
      occurredAt: ctx.now.getTime(),
    })

    return toAccountView(account, { ...existing, ...terms })
  },
})

/**
 * Deletes the account with its loan details, its transactions and the bills paid from it. Bills
 * that only reference it as their loan account are unlinked.
 */
export const removeAccount = mutation({
  args: {
    id: v.string(),
  },
  handler: async (ctx, args) => {
    const identity = await requireIdentity(ctx)
    const existing = await getOwned(ctx.db, 'accounts', args.id, identity.subject, 'Account')

    const transactions = (await ctx.db.listByUser('transactions', identity.subject)).filter(
      (transaction) => transaction.accountId === existing._id,
    )
    const bills = await ctx.db.listByUser('bills', identity.subject)
    const paidFromAccount = bills.filter((bill) => bill.accountId === existing._id)
    const linkedToLoan = bills.filter((bill) => bill.accountId !== existing._id && bill.loanAccountId === existing._id)
    const loan = await findLoanDetails(ctx.db, identity.subject, existing._id)

    for (const transaction of transactions) {
      await ctx.db.delete('transactions', transaction._id)
    }
    for (const bill of paidFromAccount) {
      await ctx.db.delete('bills', bill._id)
    }
    for (const bill of linkedToLoan) {
      await ctx.db.patch('bills', bill._id, { loanAccountId: undefined })
    }
    if (loan) {
      await ctx.db.delete('loanDetails', loan._id)
    }
    await ctx.db.delete('accounts', existing._id)

    const summary = {
      removedTransactions: transactions.length,
      removedBills: paidFromAccount.length,
      unlinkedBills: linkedToLoan.length,
    }

    await recordAuditEvent(ctx.db, {
      userId: identity.subject,
      entityType: 'account',
      entityId: existing._id,
      action: 'removed',
      before: snapshotAccount(existing),
      metadata: summary,
      occurredAt: ctx.now.getTime(),
    })

    return { accountId: existing._id, ...summary }
  },
})

export const getAccount = query({
  args: {
    id: v.string(),
  },
  handler: async (ctx, args) => {
    const identity = await requireIdentity(ctx)
    const account = await getOwned(ctx.db, 'accounts', args.id, identity.subject, 'Account')
    return toAccountView(account, await findLoanDetails(ctx.db, identity.subject, account._id))
  },
})

export const listAccounts = query({
  args: {},
  handler: async (ctx) => {
    const identity = await requireIdentity(ctx)
    const [accounts, loans] = await Promise.all([
      ctx.db.listByUser('accounts', identity.subject),
      ctx.db.listByUser('loanDetails', identity.subject),
    ])
    const loanByAccountId = new Map(loans.map((loan) => [loan.accountId, loan]))

    return accounts
      .sort((left, right) => left.createdAt - right.createdAt || left.name.localeCompare(right.name))
      .map((account) => toAccountView(account, loanByAccountId.get(account._id) ?? null))
  },
})

export const getFinanceSummary = query({
  args: {},
  handler: async (ctx) => {
    const identity = await requireIdentity(ctx)
    const [accounts, loans, bills, goals] = await Promise.all([
      ctx.db.listByUser('accounts', identity.subject),
      ctx.db.listByUser('loanDetails', identity.subject),
      ctx.db.listByUser('bills', identity.subject),
      ctx.db.listByUser('savingsGoals', identity.subject),
    ])
    const loanByAccountId = new Map(loans.map((loan) => [loan.accountId, loan]))

    const totals: Record<SummaryBucket, number> = { totalAssets: 0, creditOwed: 0, loanPrincipal: 0 }
    for (const account of accounts) {
      const { summaryBucket } = balanceModelFor(account.kind)
      const principal = loanByAccountId.get(account._id)?.currentPrincipal ?? 0
      totals[summaryBucket] += authoritativeBalance(account.kind, account, principal)
    }
    const { totalAssets, creditOwed, loanPrincipal } = totals
    const monthlyBills = bills.filter((bill) => bill.isActive).reduce((sum, bill) => sum + bill.amount, 0)
    const savedTowardGoals = goals
      .filter((goal) => goal.isActive)
      .reduce((sum, goal) => sum + goal.currentAmount, 0)

    return {
      totalAssets: toMajorUnits(totalAssets),
      creditOwed: toMajorUnits(creditOwed),
      loanPrincipal: toMajorUnits(loanPrincipal),
      netWorth: toMajorUnits(totalAssets - creditOwed - loanPrincipal),
      monthlyBills: toMajorUnits(monthlyBills),
      savedTowardGoals: toMajorUnits(savedTowardGoals),
      accountCount: accounts.length,
    }
  },
})
