import { describe, expect, it } from 'vitest'
import { loadLedgerConfig } from './config'

describe('loadLedgerConfig', () => {
  it('falls back to local development defaults', () => {
    expect(loadLedgerConfig({})).toEqual({
      environment: 'development',
      deployment: 'local',
      sentryDsn: undefined,
      sentryTracesSampleRate: 0.05,
    })
  })

  it('reads and trims the ledger variables', () => {
    expect(
      loadLedgerConfig({
        LEDGER_ENVIRONMENT: ' production ',
        LEDGER_DEPLOYMENT: 'eu-1',
        LEDGER_SENTRY_DSN: 'https://public@example.invalid/1',
        LEDGER_SENTRY_TRACES_SAMPLE_RATE: '0.2',
      }),
    ).toEqual({
      environment: 'production',
      deployment: 'eu-1',
      sentryDsn: 'https://public@example.invalid/1',
      sentryTracesSampleRate: 0.2,
    })
  })

  it('treats blank values as unset', () => {
    const config = loadLedgerConfig({ LEDGER_SENTRY_DSN: '  ', LEDGER_SENTRY_TRACES_SAMPLE_RATE: '' })
    expect(config.sentryDsn).toBeUndefined()
    expect(config.sentryTracesSampleRate).toBe(0.05)
  })

  it('rejects sample rates outside 0..1', () => {
    expect(() => loadLedgerConfig({ LEDGER_SENTRY_TRACES_SAMPLE_RATE: '1.5' })).toThrow(
      'LEDGER_SENTRY_TRACES_SAMPLE_RATE must be a number between 0 and 1.',
    )
    expect(() => loadLedgerConfig({ LEDGER_SENTRY_TRACES_SAMPLE_RATE: 'often' })).toThrow(
      'LEDGER_SENTRY_TRACES_SAMPLE_RATE must be a number between 0 and 1.',
    )
  })
})
