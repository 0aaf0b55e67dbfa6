import { addCalendarMonthsKeepingDay, parseIsoDate, toIsoDate } from './lib/dates'
import { clampPercent } from './lib/money'
import type { Doc } from './schema'

export type LoanTerms = Pick<
  Doc<'loanDetails'>,
  'originalAmount' | 'currentPrincipal' | 'interestRate' | 'monthlyPayment' | 'nextPaymentDate'
>

export type LoanEstimate = {
  progressPercentage: number
  remainingPayments: number
  /** Minor units. Half the simple interest on the repaid principal, not an amortization schedule. */
  totalInterestPaidEstimate: number
  payoffDateEstimate: string | null
}

export const loanProgressPercentage = (terms: LoanTerms) => {
  if (terms.originalAmount <= 0) {
    return 0
  }
  return clampPercent(((terms.originalAmount - terms.currentPrincipal) / terms.originalAmount) * 100)
}

export const remainingLoanPayments = (terms: LoanTerms) => {
  if (terms.monthlyPayment <= 0) {
    return 0
  }
  return Math.max(Math.floor(terms.currentPrincipal / terms.monthlyPayment), 0)
}

export const totalInterestPaidEstimate = (terms: LoanTerms) =>
  Math.round((terms.originalAmount - terms.currentPrincipal) * (terms.interestRate / 100) * 0.5)

export const payoffDateEstimate = (terms: LoanTerms) => {
  const nextPayment = parseIsoDate(terms.nextPaymentDate)
  if (!nextPayment) {
    return null
  }
  return toIsoDate(addCalendarMonthsKeepingDay(nextPayment, remainingLoanPayments(terms)))
}

export const estimateLoan = (terms: LoanTerms): LoanEstimate => ({
  progressPercentage: loanProgressPercentage(terms),
  remainingPayments: remainingLoanPayments(terms),
  totalInterestPaidEstimate: totalInterestPaidEstimate(terms),
  payoffDateEstimate: payoffDateEstimate(terms),
})
