import type { GenericValidator, ObjectType, PropertyValidators } from 'convex/values'
import { loadLedgerConfig, type LedgerConfig } from '../config'
import type { DatabaseReader, DatabaseWriter, LedgerStore } from './database'
import { captureException } from './diagnostics'
import { isLedgerError, ValidationError } from './errors'

export type UserIdentity = {
  subject: string
  name?: string
}

export type Auth = {
  getUserIdentity: () => Promise<UserIdentity | null>
}

export type QueryCtx = {
  db: DatabaseReader
  auth: Auth
  now: Date
  config: LedgerConfig
}

export type MutationCtx = {
  db: DatabaseWriter
  auth: Auth
  now: Date
  config: LedgerConfig
}

export type RegisteredMutation<Args extends PropertyValidators, Result> = {
  type: 'mutation'
  args: Args
  handler: (ctx: MutationCtx, args: ObjectType<Args>) => Promise<Result>
}

export type RegisteredQuery<Args extends PropertyValidators, Result> = {
  type: 'query'
  args: Args
  handler: (ctx: QueryCtx, args: ObjectType<Args>) => Promise<Result>
}

export const mutation = <Args extends PropertyValidators, Result>(definition: {
  args: Args
  handler: (ctx: MutationCtx, args: ObjectType<Args>) => Promise<Result>
}): RegisteredMutation<Args, Result> => ({ type: 'mutation', ...definition })

export const query = <Args extends PropertyValidators, Result>(definition: {
  args: Args
  handler: (ctx: QueryCtx, args: ObjectType<Args>) => Promise<Result>
}): RegisteredQuery<Args, Result> => ({ type: 'query', ...definition })

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === 'object' && value !== null && !Array.isArray(value)

const matchesValidator = (validator: GenericValidator, value: unknown): boolean => {
  if (value === undefined) {
    return validator.isOptional === 'optional'
  }

  switch (validator.kind) {
    case 'string':
    case 'id':
      return typeof value === 'string'
    case 'float64':
      return typeof value === 'number'
    case 'int64':
      return typeof value === 'bigint'
    case 'boolean':
      return typeof value === 'boolean'
    case 'null':
      return value === null
    case 'any':
      return true
    case 'literal':
      return value === validator.value
    case 'union':
      return validator.members.some((member: GenericValidator) => matchesValidator(member, value))
    case 'array':
      return Array.isArray(value) && value.every((item: unknown) => matchesValidator(validator.element, item))
    case 'object':
      return isRecord(value) && matchesFields(validator.fields, value)
    default:
      return false
  }
}

const matchesFields = (validators: PropertyValidators, value: Record<string, unknown>) =>
  Object.entries(validators).every(([name, validator]) => matchesValidator(validator, value[name]))

/** Checks call arguments against a function's validators before its handler runs. */
export const assertArgs = (validators: PropertyValidators, args: unknown) => {
  if (!isRecord(args)) {
    throw new ValidationError('args', 'Arguments must be an object.')
  }

  for (const name of Object.keys(args)) {
    if (!(name in validators)) {
      throw new ValidationError(name, `Unexpected argument "${name}".`)
    }
  }

  for (const [name, validator] of Object.entries(validators)) {
    if (!matchesValidator(validator, args[name])) {
      throw new ValidationError(name, `Invalid value for argument "${name}".`)
    }
  }
}

export type LedgerClientOptions = {
  store: LedgerStore
  identity?: UserIdentity | null
  now?: () => Date
  /** Defaults to the configuration read from the environment. */
  config?: LedgerConfig
}

/** Request-scoped entry point: one client per caller identity. */
export class LedgerClient {
  private readonly store: LedgerStore
  private readonly auth: Auth
  private readonly now: () => Date
  private readonly config: LedgerConfig

  constructor(options: LedgerClientOptions) {
    const identity = options.identity ?? null
    this.store = options.store
    this.auth = { getUserIdentity: async () => identity }
    this.now = options.now ?? (() => new Date())
    this.config = options.config ?? loadLedgerConfig()
  }

  async mutation<Args extends PropertyValidators, Result>(
    fn: RegisteredMutation<Args, Result>,
    args: ObjectType<Args>,
  ): Promise<Result> {
    assertArgs(fn.args, args)
    const ctxBase = { auth: this.auth, now: this.now(), config: this.config }
    return this.report(fn.type, () =>
      this.store.runTransaction((db) => fn.handler({ ...ctxBase, db }, args), { now: ctxBase.now }),
    )
  }

  async query<Args extends PropertyValidators, Result>(
    fn: RegisteredQuery<Args, Result>,
    args: ObjectType<Args>,
  ): Promise<Result> {
    assertArgs(fn.args, args)
    const ctxBase = { auth: this.auth, now: this.now(), config: this.config }
    return this.report(fn.type, () => this.store.runQuery((db) => fn.handler({ ...ctxBase, db }, args)))
  }

  private async report<R>(functionType: 'mutation' | 'query', run: () => Promise<R>): Promise<R> {
    try {
      return await run()
    } catch (error) {
      if (!isLedgerError(error)) {
        captureException(error, functionType)
      }
      throw error
    }
  }
}
