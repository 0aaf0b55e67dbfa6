import { toCalendarMonth, toIsoDate, type CalendarMonth } from './lib/dates'
import { MAX_BILL_DAY_OF_MONTH } from './lib/validation'
import type { Doc } from './schema'

export type BillPaymentState = Pick<Doc<'bills'>, 'isPaid' | 'paidDate' | 'lastPaidMonth' | 'lastPaidYear'>

type BillSchedule = Pick<Doc<'bills'>, 'dayOfMonth'>

/**
 * Paid state is scoped to a calendar month: `isPaid` only counts when the last paid month and
 * year match the month being asked about. Every paid check goes through here.
 */
export const isPaidForMonth = (bill: BillPaymentState, { year, month }: CalendarMonth) =>
  bill.isPaid && bill.lastPaidMonth === month && bill.lastPaidYear === year

export const dueDateForMonth = (bill: BillSchedule, { year, month }: CalendarMonth) =>
  new Date(year, month - 1, Math.min(bill.dayOfMonth, MAX_BILL_DAY_OF_MONTH))

export const isOverdue = (bill: BillSchedule & BillPaymentState, now: Date) => {
  const cycle = toCalendarMonth(now)
  return dueDateForMonth(bill, cycle) < now && !isPaidForMonth(bill, cycle)
}

export const paidStateFor = (now: Date): BillPaymentState => {
  const { year, month } = toCalendarMonth(now)
  return {
    isPaid: true,
    paidDate: now.getTime(),
    lastPaidMonth: month,
    lastPaidYear: year,
  }
}

export const clearedPaymentState = (): BillPaymentState => ({
  isPaid: false,
  paidDate: undefined,
  lastPaidMonth: undefined,
  lastPaidYear: undefined,
})

export type BillCycleStatus = {
  currentMonthDueDate: string
  isPaid: boolean
  isOverdue: boolean
}

export const resolveBillCycleStatus = (bill: BillSchedule & BillPaymentState, now: Date): BillCycleStatus => {
  const cycle = toCalendarMonth(now)
  return {
    currentMonthDueDate: toIsoDate(dueDateForMonth(bill, cycle)),
    isPaid: isPaidForMonth(bill, cycle),
    isOverdue: isOverdue(bill, now),
  }
}
