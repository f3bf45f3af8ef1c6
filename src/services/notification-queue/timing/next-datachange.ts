/**
 * Next-Event Calculator
 *
 * Tells the event loop how long it may sleep before something visible to the
 * user changes: a record hitting its timeout, or a displayed record's age
 * crossing the next reportable unit.
 */

import type { Notification, QueuePolicy } from '@root/types/notification.types.js'
import type { QueueStore } from '../store/queue-store.js'
import { computeExpiry, type ExpiryContext } from './timeout-policy.js'

const SECOND = 1000

export interface NextDatachangeDeps {
  store: QueueStore
  policy: Pick<
    QueuePolicy,
    'fullscreenOverride' | 'fullscreenTimeout' | 'showAgeThreshold'
  >
}

/**
 * Build the expiry context from the desktop state last reported to the store
 */
export function expiryContextAt(
  now: number,
  deps: NextDatachangeDeps,
): ExpiryContext {
  const { idle, fullscreen, idleSince } = deps.store.desktop
  return { now, idle, idleSince, fullscreen, policy: deps.policy }
}

/**
 * Records the timeout pass evaluates: everything displayed plus transient
 * records still waiting.
 */
export function timeoutCandidates(store: QueueStore): Notification[] {
  return [
    ...store.list('displayed'),
    ...store.list('waiting').filter((record) => record.transient),
  ]
}

/**
 * Delay (ms) until the displayed age of a record changes
 */
export function ageDelay(age: number, threshold: number): number {
  if (age > threshold - SECOND) {
    return SECOND - (Math.max(0, age) % SECOND)
  }
  return threshold - age
}

/**
 * Minimum non-negative delay until the queues need another pass, or null
 * when nothing is scheduled.
 */
export function getNextDatachange(
  now: number,
  deps: NextDatachangeDeps,
): number | null {
  const { store, policy } = deps
  let sleep = Number.POSITIVE_INFINITY

  // A paused engine evaluates no timeouts, so they cannot wake it
  if (!store.paused) {
    const context = expiryContextAt(now, deps)
    for (const record of timeoutCandidates(store)) {
      const expiry = computeExpiry(record, context)
      if (expiry !== Number.POSITIVE_INFINITY) {
        sleep = Math.min(sleep, Math.max(0, expiry - now))
      }
    }
  }

  if (policy.showAgeThreshold >= 0) {
    for (const record of store.list('displayed')) {
      sleep = Math.min(
        sleep,
        ageDelay(now - record.start, policy.showAgeThreshold),
      )
    }
  }

  return sleep === Number.POSITIVE_INFINITY ? null : sleep
}
