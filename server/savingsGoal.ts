import { ValidationError } from './lib/errors'
import { clampPercent } from './lib/money'
import type { Doc } from './schema'

type GoalAmounts = Pick<Doc<'savingsGoals'>, 'currentAmount' | 'targetAmount'>

export const percentageComplete = (goal: GoalAmounts) => {
  if (goal.targetAmount <= 0) {
    return 0
  }
  return clampPercent((goal.currentAmount / goal.targetAmount) * 100)
}

export const remainingAmount = (goal: GoalAmounts) => Math.max(goal.targetAmount - goal.currentAmount, 0)

const requirePositiveAmount = (amount: number) => {
  if (!Number.isSafeInteger(amount) || amount <= 0) {
    throw new ValidationError('amount', 'Amount must be positive.')
  }
}

/** Returns the goal's next current amount. Amounts are minor units. */
export const addFunds = (goal: GoalAmounts, amount: number) => {
  requirePositiveAmount(amount)
  return goal.currentAmount + amount
}

export const withdrawFunds = (goal: GoalAmounts, amount: number) => {
  requirePositiveAmount(amount)
  if (amount > goal.currentAmount) {
    throw new ValidationError('amount', 'Cannot withdraw more than current amount.')
  }
  return goal.currentAmount - amount
}
