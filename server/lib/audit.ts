import type { DatabaseWriter } from './database'

const stringifyForAudit = (value: unknown) => {
  try {
    return JSON.stringify(value)
  } catch {
    return undefined
  }
}

export const parseAuditJson = (value?: string): unknown => {
  if (!value) return undefined
  try {
    return JSON.parse(value)
  } catch {
    return undefined
  }
}

export const recordAuditEvent = async (
  db: DatabaseWriter,
  args: {
    userId: string
    entityType: string
    entityId: string
    action: string
    before?: unknown
    after?: unknown
    metadata?: Record<string, unknown>
    occurredAt: number
  },
) => {
  const metadata = {
    actorUserId: args.userId,
    recordedAt: args.occurredAt,
    ...args.metadata,
  }

  await db.insert('auditEvents', {
    userId: args.userId,
    entityType: args.entityType,
    entityId: args.entityId,
    action: args.action,
    beforeJson: args.before === undefined ? undefined : stringifyForAudit(args.before),
    afterJson: args.after === undefined ? undefined : stringifyForAudit(args.after),
    metadataJson: stringifyForAudit(metadata),
    createdAt: args.occurredAt,
  })
}
