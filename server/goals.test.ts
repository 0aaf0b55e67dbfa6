import { describe, expect, it } from 'vitest'
import { api } from './index'
import { ValidationError } from './lib/errors'
import { createTestLedger, openAccount } from './testing/ledgerHarness'

describe('savings goals', () => {
  it('refuses to withdraw more than the goal holds', async () => {
    const { alice } = createTestLedger()
    const goal = await alice.mutation(api.goals.createGoal, { name: 'Vacation', targetAmount: 1_000, currentAmount: 100 })

    await expect(alice.mutation(api.goals.withdrawGoalFunds, { id: goal.id, amount: 150 })).rejects.toThrow(
      new ValidationError('amount', 'Cannot withdraw more than current amount.'),
    )

    const [stored] = await alice.query(api.goals.listGoals, {})
    expect(stored?.currentAmount).toBe(100)
  })

  it('caps progress once the target is passed', async () => {
    const { alice } = createTestLedger()
    const goal = await alice.mutation(api.goals.createGoal, { name: 'Laptop', targetAmount: 1_000 })

    const funded = await alice.mutation(api.goals.addGoalFunds, { id: goal.id, amount: 1_200 })

    expect(funded).toMatchObject({ currentAmount: 1_200, percentageComplete: 100, remainingAmount: 0 })
  })

  it('returns the new amount, percentage and remainder after a withdrawal', async () => {
    const { alice } = createTestLedger()
    const goal = await alice.mutation(api.goals.createGoal, { name: 'Bike', targetAmount: 1_000, currentAmount: 100 })

    const result = await alice.mutation(api.goals.withdrawGoalFunds, { id: goal.id, amount: 40 })

    expect(result).toMatchObject({ currentAmount: 60, percentageComplete: 6, remainingAmount: 940 })
  })

  it('rejects non-positive fund movements', async () => {
    const { alice } = createTestLedger()
    const goal = await alice.mutation(api.goals.createGoal, { name: 'Bike', targetAmount: 500 })

    await expect(alice.mutation(api.goals.addGoalFunds, { id: goal.id, amount: 0 })).rejects.toThrow(
      'Amount must be positive.',
    )
    await expect(alice.mutation(api.goals.withdrawGoalFunds, { id: goal.id, amount: -5 })).rejects.toThrow(
      'Amount must be positive.',
    )
  })

  it('never touches account balances', async () => {
    const { alice } = createTestLedger()
    const savings = await openAccount(alice, 'Rainy day', 'savings', 2_000)
    const goal = await alice.mutation(api.goals.createGoal, { name: 'Car', targetAmount: 5_000 })

    await alice.mutation(api.goals.addGoalFunds, { id: goal.id, amount: 300 })
    await alice.mutation(api.goals.withdrawGoalFunds, { id: goal.id, amount: 100 })

    await expect(alice.query(api.accounts.getAccount, { id: savings.id })).resolves.toMatchObject({ balance: 2_000 })
  })

  it('validates targets and starting amounts', async () => {
    const { alice } = createTestLedger()

    await expect(alice.mutation(api.goals.createGoal, { name: 'Nothing', targetAmount: 0 })).rejects.toThrow(
      'Target amount must be greater than 0.',
    )
    await expect(
      alice.mutation(api.goals.createGoal, { name: 'Debt', targetAmount: 100, currentAmount: -1 }),
    ).rejects.toThrow('Current amount cannot be negative.')
  })

  it('lists active goals unless inactive ones are requested', async () => {
    const { alice } = createTestLedger()
    const active = await alice.mutation(api.goals.createGoal, { name: 'Active', targetAmount: 100 })
    const archived = await alice.mutation(api.goals.createGoal, { name: 'Archived', targetAmount: 100 })
    await alice.mutation(api.goals.updateGoal, { id: archived.id, isActive: false })

    const visible = await alice.query(api.goals.listGoals, {})
    const everything = await alice.query(api.goals.listGoals, { includeInactive: true })

    expect(visible.map((goal) => goal.id)).toEqual([active.id])
    expect(everything.map((goal) => goal.name)).toEqual(['Active', 'Archived'])
  })

  it('keeps a history of goal changes', async () => {
    const { alice } = createTestLedger()
    const goal = await alice.mutation(api.goals.createGoal, { name: 'Trip', targetAmount: 2_000, currentAmount: 100 })
    await alice.mutation(api.goals.addGoalFunds, { id: goal.id, amount: 250.5 })
    await alice.mutation(api.goals.withdrawGoalFunds, { id: goal.id, amount: 50.5 })
    await alice.mutation(api.goals.removeGoal, { id: goal.id })

    const events = await alice.query(api.goals.listGoalEvents, { goalId: goal.id })

    expect(events.map((event) => [event.eventType, event.amountDelta])).toEqual([
      ['created', 100],
      ['contribution', 250.5],
      ['withdrawal', -50.5],
      ['removed', null],
    ])
    expect(events[2]).toMatchObject({ beforeCurrentAmount: 350.5, afterCurrentAmount: 300 })
    await expect(alice.mutation(api.goals.addGoalFunds, { id: goal.id, amount: 1 })).rejects.toThrow(
      'Savings goal not found.',
    )
  })
})
