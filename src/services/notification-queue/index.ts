/**
 * Notification Queue Module
 *
 * Re-exports from submodules for the notification queue engine.
 */

// Insertion
export {
  assignId,
  type CloseDeps,
  closeById,
  closeNotification,
  findDuplicate,
  type InsertDeps,
  insertNotification,
  replaceInPlace,
  replaceNotification,
  stackDuplicate,
} from './insertion/index.js'

// Records
export {
  closeReasonCode,
  createNotification,
  isDuplicate,
  type RecordFactoryDeps,
  snapshotNotification,
} from './records/index.js'

// Scheduling
export {
  checkTimeouts,
  type HistoryDeps,
  type HistoryPushAllDeps,
  historyPop,
  historyPush,
  historyPushAll,
  pushBackForFullscreen,
  type TimeoutDeps,
  trimToDisplayLimit,
  type UpdateDeps,
  updateQueues,
} from './scheduling/index.js'

// Store
export {
  type DesktopSnapshot,
  QueueLifecycleError,
  QueueStore,
  type RecordLocation,
} from './store/index.js'

// Timing
export {
  ageDelay,
  computeExpiry,
  effectiveTimeout,
  type ExpiryContext,
  expiryContextAt,
  getNextDatachange,
  isExpired,
  type NextDatachangeDeps,
  timeoutCandidates,
} from './timing/index.js'
