/**
 * Expiry
 *
 * Closes records whose timeout has passed. Never promotes.
 */

import type {
  Clock,
  CloseReason,
  QueuePolicy,
} from '@root/types/notification.types.js'
import type { FastifyBaseLogger } from 'fastify'
import type { QueueStore } from '../store/queue-store.js'
import { timeoutCandidates } from '../timing/next-datachange.js'
import { type ExpiryContext, isExpired } from '../timing/timeout-policy.js'

export interface TimeoutDeps {
  store: QueueStore
  policy: Pick<QueuePolicy, 'fullscreenOverride' | 'fullscreenTimeout'>
  clock: Clock
  logger: FastifyBaseLogger
  closeNotification: (id: number, reason: CloseReason) => boolean
}

/**
 * Expiry pass over displayed records and transient waiting records.
 *
 * While the user is idle (and no fullscreen window is up) non-transient
 * displayed records are held: their start is moved to now so that they get
 * their full duration once the user is back. The age shown for a held
 * record is measured from that same start, so it also restarts at 0.
 *
 * @returns ids of the records closed with reason `timeout`
 */
export function checkTimeouts(
  idle: boolean,
  fullscreen: boolean,
  deps: TimeoutDeps,
): number[] {
  const { store, policy, clock, logger, closeNotification } = deps

  if (store.paused) {
    return []
  }

  const now = clock.now()
  store.recordDesktopState(idle, fullscreen, now)

  const holding = idle && !fullscreen
  if (holding) {
    for (const record of store.list('displayed')) {
      if (!record.transient) {
        record.start = now
      }
    }
  }

  const context: ExpiryContext = {
    now,
    idle,
    idleSince: store.desktop.idleSince,
    fullscreen,
    policy,
  }

  const expired = timeoutCandidates(store)
    .filter((record) => isExpired(record, context))
    .map((record) => record.id)

  const closed = expired.filter((id) => closeNotification(id, 'timeout'))

  if (closed.length > 0) {
    logger.debug({ ids: closed, idle, fullscreen }, 'Notifications timed out')
  }

  return closed
}
