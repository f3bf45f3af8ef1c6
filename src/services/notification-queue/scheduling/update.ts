/**
 * Promotion
 *
 * Moves waiting records onto the screen under the display limit.
 */

import type { Clock } from '@root/types/notification.types.js'
import type { FastifyBaseLogger } from 'fastify'
import type { QueueStore } from '../store/queue-store.js'

export interface UpdateDeps {
  store: QueueStore
  clock: Clock
  logger: FastifyBaseLogger
}

/**
 * Send displayed records that give way to fullscreen windows back to waiting
 *
 * @returns the number of records pushed back
 */
export function pushBackForFullscreen(deps: UpdateDeps): number {
  const { store } = deps
  let pushed = 0

  for (const record of store.list('displayed')) {
    if (record.fullscreen !== 'pushback') continue
    const index = store.indexOf('displayed', record.id)
    const pushedRecord = store.detach({ queue: 'displayed', index })
    store.attach('waiting', pushedRecord, 'sorted')
    pushed++
  }

  return pushed
}

/**
 * Send the most recently promoted records back to waiting until the displayed
 * queue fits a display limit that was lowered
 *
 * @returns the number of records moved back
 */
export function trimToDisplayLimit(deps: UpdateDeps): number {
  const { store } = deps
  const limit = store.displayLimit
  let trimmed = 0

  while (limit > 0 && store.length('displayed') > limit) {
    const record = store.detach({
      queue: 'displayed',
      index: store.length('displayed') - 1,
    })
    store.attach('waiting', record, 'sorted')
    trimmed++
  }

  return trimmed
}

/**
 * Reconciliation pass: fit the displayed queue to the display limit, then
 * promote waiting records in arrival order until the limit is reached.
 * Does nothing while paused.
 *
 * @returns true when the set of displayed records changed
 */
export function updateQueues(fullscreen: boolean, deps: UpdateDeps): boolean {
  const { store, clock, logger } = deps

  if (store.paused) {
    return false
  }

  const pushedBack =
    (fullscreen ? pushBackForFullscreen(deps) : 0) + trimToDisplayLimit(deps)
  let promoted = 0
  let index = 0

  while (store.hasDisplayCapacity() && index < store.length('waiting')) {
    const candidate = store.at({ queue: 'waiting', index })

    // Fullscreen keeps delayed and pushed-back records waiting
    if (fullscreen && candidate.fullscreen !== 'show') {
      index++
      continue
    }

    const record = store.detach({ queue: 'waiting', index })
    record.start = clock.now()
    store.attach('displayed', record, 'back')
    promoted++
  }

  if (promoted > 0 || pushedBack > 0) {
    logger.debug(
      {
        promoted,
        pushedBack,
        displayed: store.length('displayed'),
        waiting: store.length('waiting'),
        displayLimit: store.displayLimit,
      },
      'Updated displayed notifications',
    )
    return true
  }

  return false
}
