import { describe, expect, it } from 'vitest'
import { api, createLedger, MemoryLedgerStore } from './index'

describe('createLedger', () => {
  it('serves every client from one store', async () => {
    const store = new MemoryLedgerStore()
    const ledger = createLedger({
      config: { environment: 'test', deployment: 'local', sentryTracesSampleRate: 0 },
      store,
      now: () => new Date(2026, 9, 19, 12, 0),
    })
    const alice = ledger.clientFor({ subject: 'user_alice' })

    const { account } = await alice.mutation(api.accounts.createAccount, { name: 'Everyday', kind: 'checking' })
    const sameStore = createLedger({ config: ledger.config, store }).clientFor({ subject: 'user_alice' })

    expect(ledger.store).toBe(store)
    await expect(sameStore.query(api.accounts.getAccount, { id: account.id })).resolves.toMatchObject({
      name: 'Everyday',
      createdAt: new Date(2026, 9, 19, 12, 0).getTime(),
    })
  })

  it('rejects anonymous clients', async () => {
    const ledger = createLedger({ config: { environment: 'test', deployment: 'local', sentryTracesSampleRate: 0 } })

    await expect(ledger.clientFor(null).query(api.accounts.listAccounts, {})).rejects.toMatchObject({
      code: 'unauthenticated',
    })
  })

  it('reports health from the configuration it was created with', async () => {
    const ledger = createLedger({
      config: { environment: 'production', deployment: 'eu-1', sentryTracesSampleRate: 0 },
      now: () => new Date(2026, 9, 19, 12, 0),
    })

    await expect(ledger.clientFor(null).query(api.ops.health, {})).resolves.toEqual({
      ok: true,
      serverTime: new Date(2026, 9, 19, 12, 0).getTime(),
      environment: 'production',
      deployment: 'eu-1',
      version: 'ledger_calc_2026_10',
    })
  })

  it('closes cleanly when diagnostics are off', async () => {
    const ledger = createLedger({ config: { environment: 'test', deployment: 'local', sentryTracesSampleRate: 0 } })

    await expect(ledger.close()).resolves.toBe(true)
  })
})
