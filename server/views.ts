import { authoritativeBalance } from './accountBalance'
import { resolveBillCycleStatus } from './billCycle'
import { estimateLoan } from './loanMath'
import { clampPercent, roundCurrency, toMajorUnits } from './lib/money'
import { percentageComplete, remainingAmount } from './savingsGoal'
import type { AccountKind, Doc, TransactionType } from './schema'

export type LoanView = {
  originalAmount: number
  currentPrincipal: number
  interestRate: number
  loanTermMonths: number
  monthlyPayment: number
  loanStartDate: string
  nextPaymentDate: string
  lender: string | null
  loanType: string | null
  notes: string | null
  progressPercentage: number
  remainingPayments: number
  totalInterestPaidEstimate: number
  payoffDateEstimate: string | null
}

export type AccountView = {
  id: string
  name: string
  kind: AccountKind
  /** Asset: funds available. Credit: amount owed. Loan: outstanding principal. */
  displayBalance: number
  balance: number
  currentBalance: number
  creditLimit: number | null
  availableCredit: number | null
  utilizationPercent: number | null
  loan: LoanView | null
  createdAt: number
}

export type TransactionView = {
  id: string
  accountId: string
  description: string
  amount: number
  category: string
  transactionType: TransactionType
  date: string
  billId: string | null
  createdAt: number
}

export type BillView = {
  id: string
  accountId: string
  name: string
  amount: number
  category: string
  dayOfMonth: number
  isActive: boolean
  currentMonthDueDate: string
  /** Paid for the month of `now`, not the raw flag. */
  isPaid: boolean
  isOverdue: boolean
  paidDate: number | null
  lastPaidMonth: number | null
  lastPaidYear: number | null
  loanAccountId: string | null
}

export type GoalView = {
  id: string
  name: string
  currentAmount: number
  targetAmount: number
  percentageComplete: number
  remainingAmount: number
  isActive: boolean
  createdAt: number
}

export const toLoanView = (details: Doc<'loanDetails'>): LoanView => {
  const estimate = estimateLoan(details)
  return {
    originalAmount: toMajorUnits(details.originalAmount),
    currentPrincipal: toMajorUnits(details.currentPrincipal),
    interestRate: details.interestRate,
    loanTermMonths: details.loanTermMonths,
    monthlyPayment: toMajorUnits(details.monthlyPayment),
    loanStartDate: details.loanStartDate,
    nextPaymentDate: details.nextPaymentDate,
    lender: details.lender ?? null,
    loanType: details.loanType ?? null,
    notes: details.notes ?? null,
    progressPercentage: roundCurrency(estimate.progressPercentage),
    remainingPayments: estimate.remainingPayments,
    totalInterestPaidEstimate: toMajorUnits(estimate.totalInterestPaidEstimate),
    payoffDateEstimate: estimate.payoffDateEstimate,
  }
}

const resolveDisplayBalance = (account: Doc<'accounts'>, loan: Doc<'loanDetails'> | null) =>
  authoritativeBalance(account.kind, account, loan?.currentPrincipal ?? 0)

export const toAccountView = (account: Doc<'accounts'>, loan: Doc<'loanDetails'> | null = null): AccountView => {
  const creditLimit = account.kind === 'credit' ? account.creditLimit ?? null : null
  const availableCredit = creditLimit === null ? null : Math.max(creditLimit - account.currentBalance, 0)
  const utilizationPercent =
    creditLimit === null || creditLimit <= 0
      ? null
      : roundCurrency(clampPercent((account.currentBalance / creditLimit) * 100))

  return {
    id: account._id,
    name: account.name,
    kind: account.kind,
    displayBalance: toMajorUnits(resolveDisplayBalance(account, loan)),
    balance: toMajorUnits(account.balance),
    currentBalance: toMajorUnits(account.currentBalance),
    creditLimit: creditLimit === null ? null : toMajorUnits(creditLimit),
    availableCredit: availableCredit === null ? null : toMajorUnits(availableCredit),
    utilizationPercent,
    loan: loan ? toLoanView(loan) : null,
    createdAt: account.createdAt,
  }
}

export const toTransactionView = (transaction: Doc<'transactions'>): TransactionView => ({
  id: transaction._id,
  accountId: transaction.accountId,
  description: transaction.description,
  amount: toMajorUnits(transaction.amount),
  category: transaction.category,
  transactionType: transaction.transactionType,
  date: transaction.date,
  billId: transaction.billId ?? null,
  createdAt: transaction.createdAt,
})

export const toBillView = (bill: Doc<'bills'>, now: Date): BillView => ({
  id: bill._id,
  accountId: bill.accountId,
  name: bill.name,
  amount: toMajorUnits(bill.amount),
  category: bill.category,
  dayOfMonth: bill.dayOfMonth,
  isActive: bill.isActive,
  ...resolveBillCycleStatus(bill, now),
  paidDate: bill.paidDate ?? null,
  lastPaidMonth: bill.lastPaidMonth ?? null,
  lastPaidYear: bill.lastPaidYear ?? null,
  loanAccountId: bill.loanAccountId ?? null,
})

export const toGoalView = (goal: Doc<'savingsGoals'>): GoalView => ({
  id: goal._id,
  name: goal.name,
  currentAmount: toMajorUnits(goal.currentAmount),
  targetAmount: toMajorUnits(goal.targetAmount),
  percentageComplete: roundCurrency(percentageComplete(goal)),
  remainingAmount: toMajorUnits(remainingAmount(goal)),
  isActive: goal.isActive,
  createdAt: goal.createdAt,
})
