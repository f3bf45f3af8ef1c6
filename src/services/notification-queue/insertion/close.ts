/**
 * Closing
 *
 * Takes a record off the screen (or out of waiting), archives it and tells
 * the transport.
 */

import type {
  ClosedSignal,
  CloseReason,
  Notification,
} from '@root/types/notification.types.js'
import { closeReasonCode, snapshotNotification } from '../records/index.js'
import { type HistoryDeps, historyPush } from '../scheduling/history.js'

export interface CloseDeps extends HistoryDeps {
  signalClosed: (signal: ClosedSignal) => void
}

/**
 * Close the live record with the given id.
 *
 * Unknown ids and records already in history are ignored, which makes
 * closing idempotent. Records restored from history were already reported
 * once and are archived again without a signal.
 *
 * @returns true when a record was closed
 */
export function closeById(
  id: number,
  reason: CloseReason,
  deps: CloseDeps,
): boolean {
  const { store, logger, signalClosed } = deps
  store.assertReady('close')

  const location = store.locate(id, ['displayed', 'waiting'])
  if (!location) {
    logger.trace({ id, reason }, 'Ignoring close of untracked notification')
    return false
  }

  const record = store.detach(location)
  record.closeReason = reason
  const notification = snapshotNotification(record)

  historyPush(record, deps)

  logger.debug(
    { id, reason, from: location.queue, redisplayed: record.redisplayed },
    'Closed notification',
  )

  if (!record.redisplayed) {
    signalClosed({ id, reason, code: closeReasonCode(reason), notification })
  }
  return true
}

/**
 * Close a record by handle. Equivalent to closing its id.
 */
export function closeNotification(
  record: Pick<Notification, 'id'>,
  reason: CloseReason,
  deps: CloseDeps,
): boolean {
  return closeById(record.id, reason, deps)
}
