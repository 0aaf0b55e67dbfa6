import { ValidationError } from './lib/errors'
import type { AccountKind, TransactionType } from './schema'

/** Amount is a positive magnitude in minor units; direction comes from the transaction type. */
export type Posting = {
  amount: number
  transactionType: TransactionType
}

export type AccountBalances = {
  balance: number
  currentBalance: number
}

export type SummaryBucket = 'totalAssets' | 'creditOwed' | 'loanPrincipal'

export type BalanceModel = {
  /** The stored field that is authoritative for this kind, or null when the loan principal is. */
  field: keyof AccountBalances | null
  summaryBucket: SummaryBucket
  apply: (balances: AccountBalances, posting: Posting) => AccountBalances
  reverse: (balances: AccountBalances, posting: Posting) => AccountBalances
}

const signedAmount = (posting: Posting) => (posting.transactionType === 'income' ? posting.amount : -posting.amount)

const assetModel: BalanceModel = {
  field: 'balance',
  summaryBucket: 'totalAssets',
  apply: (balances, posting) => ({ ...balances, balance: balances.balance + signedAmount(posting) }),
  reverse: (balances, posting) => ({ ...balances, balance: balances.balance - signedAmount(posting) }),
}

// Credit balances are debt owed: spending raises it, payments lower it.
const creditModel: BalanceModel = {
  field: 'currentBalance',
  summaryBucket: 'creditOwed',
  apply: (balances, posting) => ({ ...balances, currentBalance: balances.currentBalance - signedAmount(posting) }),
  reverse: (balances, posting) => ({ ...balances, currentBalance: balances.currentBalance + signedAmount(posting) }),
}

const rejectLoanPosting = (): AccountBalances => {
  throw new ValidationError(
    'accountId',
    'Loan accounts do not take transactions directly. Record loan payments as a bill.',
  )
}

const loanModel: BalanceModel = {
  field: null,
  summaryBucket: 'loanPrincipal',
  apply: rejectLoanPosting,
  reverse: rejectLoanPosting,
}

export const balanceModels: Record<AccountKind, BalanceModel> = {
  checking: assetModel,
  savings: assetModel,
  investment: assetModel,
  credit: creditModel,
  loan: loanModel,
}

export const balanceModelFor = (kind: AccountKind) => balanceModels[kind]

export const isAssetKind = (kind: AccountKind) => balanceModels[kind] === assetModel

export const authoritativeBalance = (kind: AccountKind, balances: AccountBalances, loanPrincipal: number) => {
  const { field } = balanceModelFor(kind)
  return field === null ? loanPrincipal : balances[field]
}

export const invertPosting = (posting: Posting): Posting => ({
  ...posting,
  transactionType: posting.transactionType === 'income' ? 'expense' : 'income',
})

export const applyPosting = (kind: AccountKind, balances: AccountBalances, posting: Posting) =>
  balanceModelFor(kind).apply(balances, posting)

export const reversePosting = (kind: AccountKind, balances: AccountBalances, posting: Posting) =>
  balanceModelFor(kind).reverse(balances, posting)
