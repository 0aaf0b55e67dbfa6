import * as Sentry from '@sentry/node'
import type { LedgerConfig } from '../config'

type FunctionType = 'mutation' | 'query'

let initialized = false

// Events keep the stack and tags only; ledger rows never leave the process.
const scrubbedFields = {
  request: undefined,
  user: undefined,
  breadcrumbs: undefined,
  contexts: undefined,
  extra: undefined,
}

type DiagnosticsConfig = Pick<LedgerConfig, 'environment' | 'deployment' | 'sentryDsn' | 'sentryTracesSampleRate'>

export const initDiagnostics = (config: DiagnosticsConfig) => {
  if (initialized || !config.sentryDsn) return

  Sentry.init({
    dsn: config.sentryDsn,
    environment: config.environment,
    sendDefaultPii: false,
    tracesSampleRate: config.sentryTracesSampleRate,
    initialScope: { tags: { deployment: config.deployment } },
    beforeSend: (event) => ({ ...event, ...scrubbedFields }),
  })

  initialized = true
}

export const diagnosticsEnabled = () => initialized

export const captureException = (error: unknown, functionType: FunctionType) => {
  if (!initialized) return
  Sentry.captureException(error, { tags: { functionType } })
}

/** Waits for queued events. Resolves `true` when nothing is pending or diagnostics are off. */
export const flushDiagnostics = async (timeoutMs = 2_000) => {
  if (!initialized) return true
  return Sentry.flush(timeoutMs)
}
