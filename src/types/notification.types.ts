/**
 * Notification Types
 *
 * Records owned by the notification queue engine and the values that flow
 * in and out of it.
 */

export type Urgency = 'low' | 'normal' | 'critical'

/**
 * How a record behaves while the desktop reports a fullscreen window:
 * - show: promoted as usual
 * - delay: kept in waiting until fullscreen ends
 * - pushback: kept in waiting, and pulled back out of displayed
 */
export type FullscreenBehavior = 'show' | 'delay' | 'pushback'

export type CloseReason =
  | 'timeout'
  | 'dismissed-by-user'
  | 'closed-by-signal'
  | 'replaced'
  | 'undefined'

/** Timeout value meaning the record never expires */
export const NEVER_EXPIRE = 0

/** Timeout value asking for the per-urgency default */
export const USE_DEFAULT_TIMEOUT = -1

/** Id of a record that has not been assigned one yet */
export const UNASSIGNED_ID = 0

/** Highest id a record can carry, the range of a freedesktop uint32 id */
export const MAX_NOTIFICATION_ID = 0xffffffff

/**
 * A notification as handed to the engine by the transport.
 * Everything except the text fields is optional and defaulted on insertion.
 */
export interface NotificationInput {
  id?: number
  appName: string
  summary: string
  body?: string
  icon?: string
  category?: string
  urgency?: Urgency
  /** Milliseconds; -1 for the urgency default, 0 for never */
  timeout?: number
  transient?: boolean
  stackTag?: string | null
  progress?: number | null
  fullscreen?: FullscreenBehavior
  historyIgnore?: boolean
}

/**
 * A record owned by the engine. Only the engine mutates it; everything
 * handed back out is a frozen snapshot.
 */
export interface Notification {
  id: number
  appName: string
  summary: string
  body: string
  icon: string
  category: string
  urgency: Urgency
  /** Resolved timeout in milliseconds, 0 when the record never expires */
  timeout: number
  transient: boolean
  stackTag: string | null
  progress: number | null
  fullscreen: FullscreenBehavior
  historyIgnore: boolean
  /** Creation time (ms) */
  timestamp: number
  /** Time the record was last shown or re-armed (ms) */
  start: number
  dupCount: number
  redisplayed: boolean
  closeReason: CloseReason | null
}

/** Fields a duplicate check may compare */
export type DuplicateField =
  | 'appName'
  | 'summary'
  | 'body'
  | 'icon'
  | 'category'
  | 'urgency'

export type QueueName = 'waiting' | 'displayed' | 'history'

export interface ClosedSignal {
  id: number
  reason: CloseReason
  /** freedesktop.org NotificationClosed reason code */
  code: 1 | 2 | 3 | 4
  notification: Readonly<Notification>
}

export interface QueueLengths {
  waiting: number
  displayed: number
  history: number
}

/**
 * Static policy values the engine reads from configuration.
 */
export interface QueuePolicy {
  /** Maximum number of displayed records, 0 for unlimited */
  displayLimit: number
  /** Maximum number of history records, 0 for unlimited */
  historyLength: number
  /** Records popped from history never time out */
  stickyHistory: boolean
  stackDuplicates: boolean
  duplicateFields: DuplicateField[]
  defaultTimeouts: Record<Urgency, number>
  /** Use fullscreenTimeout for transient records while fullscreen */
  fullscreenOverride: boolean
  fullscreenTimeout: number
  /** Age (ms) from which the UI shows a record's age, -1 to disable */
  showAgeThreshold: number
}

export interface DesktopState {
  idle: boolean
  fullscreen: boolean
}

export interface Clock {
  now(): number
}
