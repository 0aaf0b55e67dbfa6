import { describe, expect, it } from 'vitest'
import { api } from './index'
import { NotFoundError } from './lib/errors'
import { createTestLedger, openAccount } from './testing/ledgerHarness'

const seed = async () => {
  const ledger = createTestLedger()
  const checking = await openAccount(ledger.alice, 'Everyday', 'checking', 3_000)
  const entries = [
    { description: 'Market', amount: 50, category: 'Groceries', transactionType: 'expense' as const },
    { description: 'Bakery', amount: 25, category: 'Groceries', transactionType: 'expense' as const },
    { description: 'Paycheck', amount: 2_000, category: 'Salary', transactionType: 'income' as const },
  ]
  for (const entry of entries) {
    await ledger.alice.mutation(api.transactions.createTransaction, { ...entry, accountId: checking.id })
  }
  await ledger.alice.mutation(api.bills.createBill, {
    name: 'Rent',
    amount: 900,
    dayOfMonth: 1,
    accountId: checking.id,
    category: 'Housing',
  })

  const bobsChecking = await openAccount(ledger.bob, 'Bob checking', 'checking')
  await ledger.bob.mutation(api.transactions.createTransaction, {
    accountId: bobsChecking.id,
    description: 'Corner shop',
    amount: 10,
    category: 'Groceries',
    transactionType: 'expense',
  })

  return { ...ledger, checking }
}

describe('categories', () => {
  it('lists categories most used first, then by name', async () => {
    const { alice } = await seed()

    await expect(alice.query(api.categories.listCategories, {})).resolves.toEqual([
      { name: 'Groceries', transactionCount: 2, billCount: 0, total: 2 },
      { name: 'Housing', transactionCount: 0, billCount: 1, total: 1 },
      { name: 'Salary', transactionCount: 1, billCount: 0, total: 1 },
    ])
  })

  it('ranks by how often a category is used, not by amount', async () => {
    const { alice, checking } = await seed()
    await alice.mutation(api.transactions.createTransaction, {
      accountId: checking.id,
      description: 'Corner shop',
      amount: 5,
      category: 'Groceries',
      transactionType: 'expense',
    })

    const [first, second] = await alice.query(api.categories.listCategories, {})

    expect(first).toEqual({ name: 'Groceries', transactionCount: 3, billCount: 0, total: 3 })
    expect(second?.name).toBe('Housing')
  })

  it('renames only the acting user categories and leaves balances alone', async () => {
    const { alice, bob, checking } = await seed()

    const result = await alice.mutation(api.categories.renameCategory, { from: 'Groceries', to: 'Food' })

    expect(result).toEqual({ category: 'Food', updatedTransactions: 2, updatedBills: 0 })
    const food = await alice.query(api.transactions.listTransactions, { category: 'Food' })
    expect(food).toHaveLength(2)
    const bobs = await bob.query(api.transactions.listTransactions, {})
    expect(bobs.map((transaction) => transaction.category)).toEqual(['Groceries'])
    await expect(alice.query(api.accounts.getAccount, { id: checking.id })).resolves.toMatchObject({ balance: 4_925 })
  })

  it('moves removed categories into Uncategorized by default', async () => {
    const { alice } = await seed()

    const result = await alice.mutation(api.categories.removeCategory, { name: 'Housing' })

    expect(result).toEqual({
      message: 'Category "Housing" removed, items moved to "Uncategorized"',
      category: 'Uncategorized',
      updatedTransactions: 0,
      updatedBills: 1,
    })
    const [rent] = await alice.query(api.bills.listBills, {})
    expect(rent?.category).toBe('Uncategorized')
  })

  it('merges a removed category into another one', async () => {
    const { alice } = await seed()

    await alice.mutation(api.categories.removeCategory, { name: 'Groceries', mergeInto: 'Salary' })

    const categories = await alice.query(api.categories.listCategories, {})
    expect(categories.map((category) => [category.name, category.transactionCount])).toEqual([
      ['Salary', 3],
      ['Housing', 0],
    ])
  })

  it('rejects unknown or unchanged categories', async () => {
    const { alice } = await seed()

    await expect(alice.mutation(api.categories.renameCategory, { from: 'Travel', to: 'Trips' })).rejects.toThrow(
      new NotFoundError('Category not found.'),
    )
    await expect(alice.mutation(api.categories.renameCategory, { from: 'Salary', to: ' Salary ' })).rejects.toThrow(
      'New category name must be different.',
    )
    await expect(alice.mutation(api.categories.removeCategory, { name: 'Uncategorized' })).rejects.toThrow(
      'Uncategorized cannot be removed.',
    )
  })
})
