import { parseIsoDate } from './dates'
import { ValidationError } from './errors'
import { toMinorUnits } from './money'
import type { TransactionType } from '../schema'

export const MAX_BILL_DAY_OF_MONTH = 28

/** Validates a decimal currency amount and returns it in minor units. */
export const validatePositive = (value: number, fieldName: string, field: string) => {
  const minor = Number.isFinite(value) ? toMinorUnits(value) : Number.NaN
  if (!Number.isSafeInteger(minor) || minor <= 0) {
    throw new ValidationError(field, `${fieldName} must be greater than 0.`)
  }
  return minor
}

export const validateNonNegative = (value: number, fieldName: string, field: string) => {
  const minor = Number.isFinite(value) ? toMinorUnits(value) : Number.NaN
  if (!Number.isSafeInteger(minor) || minor < 0) {
    throw new ValidationError(field, `${fieldName} cannot be negative.`)
  }
  return minor
}

/** Signed amounts such as opening balances. */
export const validateFinite = (value: number, fieldName: string, field: string) => {
  const minor = Number.isFinite(value) ? toMinorUnits(value) : Number.NaN
  if (!Number.isSafeInteger(minor)) {
    throw new ValidationError(field, `${fieldName} must be a valid number.`)
  }
  return minor
}

export const validatePercent = (value: number, fieldName: string, field: string) => {
  if (!Number.isFinite(value) || value < 0 || value > 100) {
    throw new ValidationError(field, `${fieldName} must be between 0 and 100.`)
  }
  return value
}

export const validateDayOfMonth = (value: number, field = 'dayOfMonth') => {
  if (!Number.isInteger(value) || value < 1 || value > MAX_BILL_DAY_OF_MONTH) {
    throw new ValidationError(field, `Day of month must be between 1 and ${MAX_BILL_DAY_OF_MONTH}.`)
  }
  return value
}

export const validatePositiveInteger = (value: number, fieldName: string, field: string, maxValue = 600) => {
  if (!Number.isInteger(value) || value < 1 || value > maxValue) {
    throw new ValidationError(field, `${fieldName} must be an integer between 1 and ${maxValue}.`)
  }
  return value
}

export const validateRequiredText = (value: string, fieldName: string, field: string, maxLength = 140) => {
  const trimmed = value.trim()
  if (!trimmed) {
    throw new ValidationError(field, `${fieldName} is required.`)
  }
  if (trimmed.length > maxLength) {
    throw new ValidationError(field, `${fieldName} must be ${maxLength} characters or less.`)
  }
  return trimmed
}

export const validateOptionalText = (
  value: string | undefined,
  fieldName: string,
  field: string,
  maxLength: number,
) => {
  const trimmed = value?.trim()
  if (!trimmed) {
    return undefined
  }
  if (trimmed.length > maxLength) {
    throw new ValidationError(field, `${fieldName} must be ${maxLength} characters or less.`)
  }
  return trimmed
}

export const validateIsoDate = (value: string, fieldName: string, field: string) => {
  if (!parseIsoDate(value)) {
    throw new ValidationError(field, `${fieldName} must use YYYY-MM-DD format.`)
  }
  return value
}

export const validateTransactionType = (value: string, field = 'transactionType'): TransactionType => {
  if (value === 'income' || value === 'expense') {
    return value
  }
  throw new ValidationError(field, 'Transaction type must be income or expense.')
}

export const DEFAULT_CATEGORY = 'Uncategorized'

export const validateCategory = (value: string | undefined, field = 'category') =>
  validateOptionalText(value, 'Category', field, 60) ?? DEFAULT_CATEGORY
