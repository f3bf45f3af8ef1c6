/**
 * Notification Record
 *
 * Building engine-owned records from transport input, comparing them and
 * handing out read-only copies.
 */

import {
  type ClosedSignal,
  type CloseReason,
  type Clock,
  type DuplicateField,
  type Notification,
  type NotificationInput,
  type QueuePolicy,
  UNASSIGNED_ID,
} from '@root/types/notification.types.js'

export interface RecordFactoryDeps {
  policy: Pick<QueuePolicy, 'defaultTimeouts'>
  clock: Clock
}

/**
 * Copy transport input into a fresh record, resolving defaults.
 * The caller's object is never kept.
 */
export function createNotification(
  input: NotificationInput,
  deps: RecordFactoryDeps,
): Notification {
  const urgency = input.urgency ?? 'normal'
  const timeout =
    input.timeout === undefined || input.timeout < 0
      ? deps.policy.defaultTimeouts[urgency]
      : input.timeout
  const now = deps.clock.now()

  return {
    id:
      input.id !== undefined && Number.isInteger(input.id) && input.id > 0
        ? input.id
        : UNASSIGNED_ID,
    appName: input.appName,
    summary: input.summary,
    body: input.body ?? '',
    icon: input.icon ?? '',
    category: input.category ?? '',
    urgency,
    timeout,
    transient: input.transient ?? false,
    stackTag: input.stackTag ?? null,
    progress: input.progress ?? null,
    fullscreen: input.fullscreen ?? 'show',
    historyIgnore: input.historyIgnore ?? false,
    timestamp: now,
    start: now,
    dupCount: 0,
    redisplayed: false,
    closeReason: null,
  }
}

/**
 * Read-only copy of a record for the renderer and the transport
 */
export function snapshotNotification(
  record: Notification,
): Readonly<Notification> {
  return Object.freeze({ ...record })
}

/**
 * Two records are duplicates when they share a stack tag within the same
 * application, or when every configured field is equal.
 */
export function isDuplicate(
  existing: Notification,
  incoming: Notification,
  fields: readonly DuplicateField[],
): boolean {
  if (
    existing.stackTag !== null &&
    existing.stackTag === incoming.stackTag &&
    existing.appName === incoming.appName
  ) {
    return true
  }

  return (
    fields.length > 0 &&
    fields.every((field) => existing[field] === incoming[field])
  )
}

const REASON_CODES: Record<CloseReason, ClosedSignal['code']> = {
  timeout: 1,
  'dismissed-by-user': 2,
  'closed-by-signal': 3,
  replaced: 4,
  undefined: 4,
}

/**
 * freedesktop.org NotificationClosed reason code
 */
export function closeReasonCode(reason: CloseReason): ClosedSignal['code'] {
  return REASON_CODES[reason]
}
