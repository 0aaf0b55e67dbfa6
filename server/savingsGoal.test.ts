import { describe, expect, it } from 'vitest'
import { addFunds, percentageComplete, remainingAmount, withdrawFunds } from './savingsGoal'

describe('savingsGoal', () => {
  it('caps the percentage at 100 and the remainder at 0', () => {
    const overfunded = { currentAmount: 120_000, targetAmount: 100_000 }
    expect(percentageComplete(overfunded)).toBe(100)
    expect(remainingAmount(overfunded)).toBe(0)
  })

  it('reports partial progress', () => {
    const goal = { currentAmount: 25_000, targetAmount: 100_000 }
    expect(percentageComplete(goal)).toBe(25)
    expect(remainingAmount(goal)).toBe(75_000)
  })

  it('returns zero percent for a non-positive target', () => {
    expect(percentageComplete({ currentAmount: 500, targetAmount: 0 })).toBe(0)
  })

  it('adds positive amounts only', () => {
    const goal = { currentAmount: 10_000, targetAmount: 100_000 }
    expect(addFunds(goal, 2_550)).toBe(12_550)
    expect(() => addFunds(goal, 0)).toThrow('Amount must be positive.')
    expect(() => addFunds(goal, -100)).toThrow('Amount must be positive.')
  })

  it('withdraws down to zero but never below', () => {
    const goal = { currentAmount: 10_000, targetAmount: 100_000 }
    expect(withdrawFunds(goal, 10_000)).toBe(0)
    expect(() => withdrawFunds(goal, 15_000)).toThrow('Cannot withdraw more than current amount.')
    expect(() => withdrawFunds(goal, 0)).toThrow('Amount must be positive.')
  })
})
