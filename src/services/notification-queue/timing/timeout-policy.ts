/**
 * Timeout Policy
 *
 * Maps a record and the desktop's idle/fullscreen state to the absolute time
 * (ms) at which the record expires. Pure: no clock reads, no mutation.
 */

import {
  NEVER_EXPIRE,
  type Notification,
  type QueuePolicy,
} from '@root/types/notification.types.js'

export interface ExpiryContext {
  now: number
  idle: boolean
  /** Start of the current idle period, null while the user is active */
  idleSince: number | null
  fullscreen: boolean
  policy: Pick<QueuePolicy, 'fullscreenOverride' | 'fullscreenTimeout'>
}

type TimedRecord = Pick<Notification, 'timeout' | 'transient' | 'start'>

/**
 * Duration the record gets under the current desktop state.
 * Transient records use the fullscreen override while fullscreen.
 */
export function effectiveTimeout(
  record: TimedRecord,
  context: ExpiryContext,
): number {
  if (
    context.fullscreen &&
    record.transient &&
    context.policy.fullscreenOverride
  ) {
    return context.policy.fullscreenTimeout
  }
  return record.timeout
}

/**
 * Absolute expiry time of a record, `Infinity` when it never expires.
 *
 * While the user is idle (and no fullscreen window hides the desktop), a
 * non-transient record's duration counts from the start of the idle period
 * at the earliest, and never lands at or before `now`.
 */
export function computeExpiry(
  record: TimedRecord,
  context: ExpiryContext,
): number {
  if (record.timeout === NEVER_EXPIRE) {
    return Number.POSITIVE_INFINITY
  }

  const duration = effectiveTimeout(record, context)
  if (duration === NEVER_EXPIRE) {
    return Number.POSITIVE_INFINITY
  }

  if (context.idle && !context.fullscreen && !record.transient) {
    const from = Math.max(record.start, context.idleSince ?? context.now)
    return Math.max(from + duration, context.now + 1)
  }

  return record.start + duration
}

export function isExpired(record: TimedRecord, context: ExpiryContext): boolean {
  return computeExpiry(record, context) <= context.now
}
