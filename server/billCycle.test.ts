import { describe, expect, it } from 'vitest'
import {
  clearedPaymentState,
  dueDateForMonth,
  isOverdue,
  isPaidForMonth,
  paidStateFor,
  resolveBillCycleStatus,
} from './billCycle'

const unpaid = { dayOfMonth: 15, ...clearedPaymentState() }

describe('billCycle', () => {
  it('counts a payment only for the month it was made in', () => {
    const paidInOctober = { ...unpaid, ...paidStateFor(new Date(2026, 9, 3, 8, 0)) }

    expect(isPaidForMonth(paidInOctober, { year: 2026, month: 10 })).toBe(true)
    expect(isPaidForMonth(paidInOctober, { year: 2026, month: 11 })).toBe(false)
    expect(isPaidForMonth(paidInOctober, { year: 2025, month: 10 })).toBe(false)
  })

  it('ignores a stale paid flag from an earlier month', () => {
    const stale = { ...unpaid, isPaid: true, lastPaidMonth: 9, lastPaidYear: 2026 }
    expect(isPaidForMonth(stale, { year: 2026, month: 10 })).toBe(false)
  })

  it('clamps due days past the 28th', () => {
    expect(dueDateForMonth({ dayOfMonth: 30 }, { year: 2027, month: 2 })).toEqual(new Date(2027, 1, 28))
    expect(dueDateForMonth({ dayOfMonth: 28 }, { year: 2028, month: 2 })).toEqual(new Date(2028, 1, 28))
    expect(dueDateForMonth({ dayOfMonth: 5 }, { year: 2026, month: 12 })).toEqual(new Date(2026, 11, 5))
  })

  it('marks an unpaid bill overdue once its due date has started', () => {
    expect(isOverdue(unpaid, new Date(2026, 9, 14, 23, 59))).toBe(false)
    expect(isOverdue(unpaid, new Date(2026, 9, 15, 0, 0))).toBe(false)
    expect(isOverdue(unpaid, new Date(2026, 9, 15, 9, 30))).toBe(true)
  })

  it('never marks a bill paid this month as overdue', () => {
    const now = new Date(2026, 9, 20, 12, 0)
    expect(isOverdue({ ...unpaid, ...paidStateFor(now) }, now)).toBe(false)
  })

  it('records and clears the payment fields together', () => {
    const now = new Date(2026, 9, 19, 12, 0)
    expect(paidStateFor(now)).toEqual({
      isPaid: true,
      paidDate: now.getTime(),
      lastPaidMonth: 10,
      lastPaidYear: 2026,
    })
    expect(clearedPaymentState()).toEqual({
      isPaid: false,
      paidDate: undefined,
      lastPaidMonth: undefined,
      lastPaidYear: undefined,
    })
  })

  it('resolves the current month status', () => {
    const now = new Date(2027, 1, 10, 12, 0)
    expect(resolveBillCycleStatus({ ...unpaid, dayOfMonth: 28 }, now)).toEqual({
      currentMonthDueDate: '2027-02-28',
      isPaid: false,
      isOverdue: false,
    })
    expect(resolveBillCycleStatus({ ...unpaid, dayOfMonth: 1 }, now)).toEqual({
      currentMonthDueDate: '2027-02-01',
      isPaid: false,
      isOverdue: true,
    })
  })
})
