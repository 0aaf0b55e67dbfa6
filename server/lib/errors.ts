export type LedgerErrorCode = 'validation' | 'not_found' | 'conflict' | 'unauthenticated'

export class LedgerError extends Error {
  readonly code: LedgerErrorCode
  readonly retryable: boolean

  constructor(code: LedgerErrorCode, message: string, options: { retryable?: boolean; cause?: unknown } = {}) {
    super(message, { cause: options.cause })
    this.name = 'LedgerError'
    this.code = code
    this.retryable = options.retryable ?? false
  }
}

export class ValidationError extends LedgerError {
  readonly field: string

  constructor(field: string, message: string) {
    super('validation', message)
    this.name = 'ValidationError'
    this.field = field
  }
}

export class NotFoundError extends LedgerError {
  constructor(message: string) {
    super('not_found', message)
    this.name = 'NotFoundError'
  }
}

/** Storage-level write conflict. The caller may retry the same operation once. */
export class ConflictError extends LedgerError {
  constructor(message = 'The ledger changed while this operation was running. Try again.', cause?: unknown) {
    super('conflict', message, { retryable: true, cause })
    this.name = 'ConflictError'
  }
}

export class UnauthenticatedError extends LedgerError {
  constructor(message = 'You must be signed in.') {
    super('unauthenticated', message)
    this.name = 'UnauthenticatedError'
  }
}

export const isLedgerError = (error: unknown): error is LedgerError => error instanceof LedgerError
