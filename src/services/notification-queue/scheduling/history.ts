/**
 * History
 *
 * Archiving records, pulling the latest one back, and clearing the screen.
 */

import type {
  Clock,
  CloseReason,
  Notification,
  QueuePolicy,
} from '@root/types/notification.types.js'
import type { FastifyBaseLogger } from 'fastify'
import type { QueueStore } from '../store/queue-store.js'

export interface HistoryDeps {
  store: QueueStore
  policy: Pick<QueuePolicy, 'historyLength' | 'stickyHistory'>
  clock: Clock
  logger: FastifyBaseLogger
}

export interface HistoryPushAllDeps {
  store: QueueStore
  closeNotification: (id: number, reason: CloseReason) => boolean
}

/**
 * Archive a record that no queue holds any more (most recent first).
 * Evicts and frees the oldest entries beyond the configured history length.
 */
export function historyPush(record: Notification, deps: HistoryDeps): void {
  const { store, policy, logger } = deps

  if (record.historyIgnore) {
    store.free(record)
    logger.debug({ id: record.id }, 'Freed notification excluded from history')
    return
  }

  store.attach('history', record, 'front')

  if (policy.historyLength > 0) {
    while (store.length('history') > policy.historyLength) {
      const evicted = store.detach({
        queue: 'history',
        index: store.length('history') - 1,
      })
      store.free(evicted)
      logger.debug(
        { id: evicted.id, historyLength: policy.historyLength },
        'Evicted oldest notification from history',
      )
    }
  }
}

/**
 * Move the most recently archived record back on screen, or into waiting
 * when the display limit (or pause) does not allow it.
 *
 * @returns the id of the restored record, null when history is empty
 */
export function historyPop(deps: HistoryDeps): number | null {
  const { store, policy, clock, logger } = deps

  if (store.length('history') === 0) {
    return null
  }

  const record = store.detach({ queue: 'history', index: 0 })
  record.redisplayed = true
  record.closeReason = null
  record.start = clock.now()
  if (policy.stickyHistory) {
    record.timeout = 0
  }

  const target =
    !store.paused && store.hasDisplayCapacity() ? 'displayed' : 'waiting'
  store.attach(target, record, target === 'displayed' ? 'back' : 'sorted')

  logger.debug(
    { id: record.id, queue: target },
    'Restored notification from history',
  )
  return record.id
}

/**
 * Close everything on screen and everything waiting, in arrival order
 *
 * @returns the number of records moved to history
 */
export function historyPushAll(deps: HistoryPushAllDeps): number {
  const { store, closeNotification } = deps
  const ids = [...store.ids('displayed'), ...store.ids('waiting')]

  let closed = 0
  for (const id of ids) {
    if (closeNotification(id, 'dismissed-by-user')) {
      closed++
    }
  }
  return closed
}
