import * as accounts from './accounts'
import * as bills from './bills'
import * as categories from './categories'
import { loadLedgerConfig, type LedgerConfig } from './config'
import * as goals from './goals'
import { flushDiagnostics, initDiagnostics } from './lib/diagnostics'
import { LedgerClient, type UserIdentity } from './lib/functions'
import { MemoryLedgerStore } from './lib/memoryStore'
import * as ops from './ops'
import * as transactions from './transactions'
import type { LedgerStore } from './lib/database'

export const api = {
  accounts,
  bills,
  categories,
  goals,
  ops,
  transactions,
}

export type CreateLedgerOptions = {
  config?: LedgerConfig
  store?: LedgerStore
  now?: () => Date
}

/**
 * Wires configuration, diagnostics and storage. Call `clientFor` once per request with the caller's
 * identity, and `close` on shutdown to flush pending error reports.
 */
export const createLedger = (options: CreateLedgerOptions = {}) => {
  const config = options.config ?? loadLedgerConfig()
  initDiagnostics(config)

  const store = options.store ?? new MemoryLedgerStore()
  return {
    config,
    store,
    clientFor: (identity: UserIdentity | null) => new LedgerClient({ store, identity, now: options.now, config }),
    close: () => flushDiagnostics(),
  }
}

export { loadLedgerConfig, type LedgerConfig } from './config'
export { applyPosting, balanceModels, invertPosting, reversePosting } from './accountBalance'
export type { AccountBalances, BalanceModel, Posting } from './accountBalance'
export {
  clearedPaymentState,
  dueDateForMonth,
  isOverdue,
  isPaidForMonth,
  paidStateFor,
  resolveBillCycleStatus,
} from './billCycle'
export {
  estimateLoan,
  loanProgressPercentage,
  payoffDateEstimate,
  remainingLoanPayments,
  totalInterestPaidEstimate,
} from './loanMath'
export { addFunds, percentageComplete, remainingAmount, withdrawFunds } from './savingsGoal'
export {
  ConflictError,
  isLedgerError,
  LedgerError,
  NotFoundError,
  UnauthenticatedError,
  ValidationError,
} from './lib/errors'
export { LedgerClient, mutation, query } from './lib/functions'
export type { MutationCtx, QueryCtx, UserIdentity } from './lib/functions'
export type { DatabaseReader, DatabaseWriter, LedgerStore } from './lib/database'
export { MemoryLedgerStore } from './lib/memoryStore'
export type { AccountView, BillView, GoalView, LoanView, TransactionView } from './views'
