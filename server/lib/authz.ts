import type { TableName } from '../schema'
import type { DatabaseReader } from './database'
import { NotFoundError, UnauthenticatedError } from './errors'
import type { MutationCtx, QueryCtx } from './functions'

export const requireIdentity = async (
  ctx: QueryCtx | MutationCtx,
  message = 'You must be signed in to manage finance data.',
) => {
  const identity = await ctx.auth.getUserIdentity()
  if (!identity) {
    throw new UnauthenticatedError(message)
  }
  return identity
}

export const assertOwned = <TDoc extends { userId: string }>(
  doc: TDoc | null | undefined,
  userId: string,
  label: string,
) => {
  if (!doc || doc.userId !== userId) {
    throw new NotFoundError(`${label} not found.`)
  }
  return doc
}

export const getOwned = async <T extends TableName>(
  db: DatabaseReader,
  table: T,
  id: string,
  userId: string,
  label: string,
) => assertOwned(await db.get(table, id), userId, label)
