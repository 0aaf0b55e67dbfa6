import * as Sentry from '@sentry/node'
import { describe, expect, it, vi } from 'vitest'
import { captureException, diagnosticsEnabled, flushDiagnostics, initDiagnostics } from './diagnostics'

vi.mock('@sentry/node', () => ({
  init: vi.fn(),
  captureException: vi.fn(),
  flush: vi.fn(async () => true),
}))

const config = { environment: 'test', deployment: 'local', sentryTracesSampleRate: 0.25 }

// These share the module's initialization state and depend on their order.
describe('diagnostics', () => {
  it('stays off without a DSN', async () => {
    initDiagnostics(config)
    captureException(new Error('ignored'), 'query')

    expect(diagnosticsEnabled()).toBe(false)
    await expect(flushDiagnostics()).resolves.toBe(true)
    expect(Sentry.init).not.toHaveBeenCalled()
    expect(Sentry.captureException).not.toHaveBeenCalled()
    expect(Sentry.flush).not.toHaveBeenCalled()
  })

  it('initializes once with PII disabled and the deployment tagged', () => {
    initDiagnostics({ ...config, sentryDsn: 'https://public@example.invalid/1' })
    initDiagnostics({ ...config, sentryDsn: 'https://public@example.invalid/2', environment: 'other' })

    expect(diagnosticsEnabled()).toBe(true)
    expect(Sentry.init).toHaveBeenCalledTimes(1)
    expect(Sentry.init).toHaveBeenCalledWith(
      expect.objectContaining({
        dsn: 'https://public@example.invalid/1',
        environment: 'test',
        sendDefaultPii: false,
        tracesSampleRate: 0.25,
        initialScope: { tags: { deployment: 'local' } },
      }),
    )
  })

  it('tags captured errors with the function type', () => {
    const error = new Error('store offline')
    captureException(error, 'mutation')

    expect(Sentry.captureException).toHaveBeenCalledWith(error, { tags: { functionType: 'mutation' } })
  })

  it('flushes pending events once enabled', async () => {
    await expect(flushDiagnostics(500)).resolves.toBe(true)
    expect(Sentry.flush).toHaveBeenCalledWith(500)
  })
})
