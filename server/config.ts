export type LedgerConfig = {
  environment: string
  deployment: string
  sentryDsn?: string
  sentryTracesSampleRate: number
}

const DEFAULT_TRACES_SAMPLE_RATE = 0.05

const parseSampleRate = (value: string | undefined) => {
  if (value === undefined || value.trim() === '') {
    return DEFAULT_TRACES_SAMPLE_RATE
  }

  const rate = Number(value)
  if (!Number.isFinite(rate) || rate < 0 || rate > 1) {
    throw new Error('LEDGER_SENTRY_TRACES_SAMPLE_RATE must be a number between 0 and 1.')
  }
  return rate
}

export const loadLedgerConfig = (env: NodeJS.ProcessEnv = process.env): LedgerConfig => ({
  environment: env.LEDGER_ENVIRONMENT?.trim() || 'development',
  deployment: env.LEDGER_DEPLOYMENT?.trim() || 'local',
  sentryDsn: env.LEDGER_SENTRY_DSN?.trim() || undefined,
  sentryTracesSampleRate: parseSampleRate(env.LEDGER_SENTRY_TRACES_SAMPLE_RATE),
})
