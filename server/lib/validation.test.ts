import { describe, expect, it } from 'vitest'
import { formatMonthLabel, parseIsoDate, toIsoDate } from './dates'
import {
  validateCategory,
  validateDayOfMonth,
  validateIsoDate,
  validatePositive,
  validateRequiredText,
} from './validation'

describe('validation', () => {
  it('converts positive amounts to minor units', () => {
    expect(validatePositive(19.99, 'Bill amount', 'amount')).toBe(1_999)
    expect(validatePositive(0.1 + 0.2, 'Bill amount', 'amount')).toBe(30)
  })

  it('rejects zero, negative and non-finite amounts', () => {
    expect(() => validatePositive(0, 'Transaction amount', 'amount')).toThrow('Transaction amount must be greater than 0.')
    expect(() => validatePositive(-3, 'Transaction amount', 'amount')).toThrow('Transaction amount must be greater than 0.')
    expect(() => validatePositive(Number.NaN, 'Transaction amount', 'amount')).toThrow(
      'Transaction amount must be greater than 0.',
    )
    expect(() => validatePositive(0.001, 'Transaction amount', 'amount')).toThrow(
      'Transaction amount must be greater than 0.',
    )
  })

  it('allows due days 1 through 28 only', () => {
    expect(validateDayOfMonth(1)).toBe(1)
    expect(validateDayOfMonth(28)).toBe(28)
    expect(() => validateDayOfMonth(0)).toThrow('Day of month must be between 1 and 28.')
    expect(() => validateDayOfMonth(31)).toThrow('Day of month must be between 1 and 28.')
    expect(() => validateDayOfMonth(12.5)).toThrow('Day of month must be between 1 and 28.')
  })

  it('trims required text and enforces its length', () => {
    expect(validateRequiredText('  Rent  ', 'Bill name', 'name')).toBe('Rent')
    expect(() => validateRequiredText('   ', 'Bill name', 'name')).toThrow('Bill name is required.')
    expect(() => validateRequiredText('x'.repeat(141), 'Bill name', 'name')).toThrow(
      'Bill name must be 140 characters or less.',
    )
  })

  it('defaults blank categories', () => {
    expect(validateCategory(undefined)).toBe('Uncategorized')
    expect(validateCategory('  ')).toBe('Uncategorized')
    expect(validateCategory(' Groceries ')).toBe('Groceries')
  })

  it('accepts real calendar dates only', () => {
    expect(validateIsoDate('2028-02-29', 'Date', 'date')).toBe('2028-02-29')
    expect(() => validateIsoDate('2027-02-29', 'Date', 'date')).toThrow('Date must use YYYY-MM-DD format.')
    expect(() => validateIsoDate('10/19/2026', 'Date', 'date')).toThrow('Date must use YYYY-MM-DD format.')
  })
})

describe('dates', () => {
  it('round-trips local calendar dates', () => {
    const parsed = parseIsoDate('2026-03-09')
    expect(parsed).toEqual(new Date(2026, 2, 9))
    expect(parsed && toIsoDate(parsed)).toBe('2026-03-09')
  })

  it('formats month labels in English', () => {
    expect(formatMonthLabel(new Date(2026, 9, 19))).toBe('October 2026')
  })
})
