/**
 * Insertion
 *
 * New notifications, duplicate stacking and replacement by id.
 */

import {
  type Clock,
  type Notification,
  type NotificationInput,
  type QueueName,
  type QueuePolicy,
  UNASSIGNED_ID,
} from '@root/types/notification.types.js'
import type { FastifyBaseLogger } from 'fastify'
import { createNotification, isDuplicate } from '../records/index.js'
import type { QueueStore } from '../store/queue-store.js'

export interface InsertDeps {
  store: QueueStore
  policy: Pick<
    QueuePolicy,
    'stackDuplicates' | 'duplicateFields' | 'defaultTimeouts'
  >
  clock: Clock
  logger: FastifyBaseLogger
}

// Duplicates are looked for on screen first
const STACKABLE_QUEUES: readonly QueueName[] = ['displayed', 'waiting']

/**
 * Find a live record the incoming one duplicates
 */
export function findDuplicate(
  incoming: Notification,
  deps: InsertDeps,
): { record: Notification; queue: QueueName } | null {
  for (const queue of STACKABLE_QUEUES) {
    const record = deps.store
      .list(queue)
      .find((existing) =>
        isDuplicate(existing, incoming, deps.policy.duplicateFields),
      )
    if (record) {
      return { record, queue }
    }
  }
  return null
}

/**
 * Fold an incoming record into an equivalent live one.
 *
 * A different progress value is an update of the same notification rather
 * than a repeat, so it replaces the progress instead of counting up.
 *
 * @returns true when the incoming record was absorbed and must be dropped
 */
export function stackDuplicate(
  incoming: Notification,
  deps: InsertDeps,
): boolean {
  const match = findDuplicate(incoming, deps)
  if (!match) {
    return false
  }

  const { record, queue } = match
  if (record.progress === incoming.progress) {
    record.dupCount++
  } else {
    record.progress = incoming.progress
  }
  if (queue === 'displayed') {
    record.start = deps.clock.now()
  }

  deps.logger.debug(
    {
      id: record.id,
      queue,
      dupCount: record.dupCount,
      appName: record.appName,
    },
    'Stacked duplicate notification',
  )
  return true
}

/**
 * Put a record into the slot of the live record sharing its id.
 * The old record is freed; its duplicate count carries over.
 */
export function replaceInPlace(
  record: Notification,
  deps: InsertDeps,
): boolean {
  const { store, clock, logger } = deps

  if (record.id === UNASSIGNED_ID) {
    return false
  }

  const location = store.locate(record.id)
  if (!location) {
    return false
  }

  const old = store.at(location)
  record.dupCount = old.dupCount
  if (location.queue === 'displayed') {
    record.start = clock.now()
  }
  if (location.queue === 'history') {
    record.closeReason = old.closeReason
  }
  store.replaceAt(location, record)

  logger.debug(
    { id: record.id, queue: location.queue, index: location.index },
    'Replaced notification in place',
  )
  return true
}

/**
 * Build a record from input and replace the live record with the same id
 *
 * @returns false when the input has no id or the id is unknown
 */
export function replaceNotification(
  input: NotificationInput,
  deps: InsertDeps,
): boolean {
  deps.store.assertReady('replaceById')
  return replaceInPlace(createNotification(input, deps), deps)
}

/**
 * Give a record without a usable id a fresh one. Ids that were handed out
 * before are not reused until the counter wraps past MAX_NOTIFICATION_ID.
 */
export function assignId(record: Notification, store: QueueStore): number {
  if (record.id === UNASSIGNED_ID || !store.claimId(record.id)) {
    record.id = store.nextId()
  }
  return record.id
}

/**
 * Insert a notification into the queues.
 *
 * - id 0: a new id is assigned; with duplicate stacking an equivalent live
 *   record absorbs it and 0 is returned
 * - id of a live record: the new record takes its exact position
 * - any other id: used when it was never handed out, else replaced by a
 *   fresh one
 *
 * @returns the record's id, or 0 when it was dismissed as a duplicate
 */
export function insertNotification(
  input: NotificationInput,
  deps: InsertDeps,
): number {
  const { store, policy, logger } = deps
  store.assertReady('insert')

  const record = createNotification(input, deps)

  if (record.id === UNASSIGNED_ID) {
    record.id = store.nextId()
    if (policy.stackDuplicates && stackDuplicate(record, deps)) {
      return 0
    }
  } else if (replaceInPlace(record, deps)) {
    return record.id
  } else {
    const requested = record.id
    assignId(record, store)
    if (record.id !== requested) {
      logger.debug(
        { requested, assigned: record.id },
        'Requested id unavailable, assigned a new one',
      )
    }
  }

  store.attach('waiting', record, 'back')
  logger.debug(
    { id: record.id, appName: record.appName, urgency: record.urgency },
    'Queued notification',
  )
  return record.id
}
