/**
 * Store Module
 *
 * Ownership of records and queue ordering.
 */

export {
  type AttachPosition,
  type DesktopSnapshot,
  QueueLifecycleError,
  QueueStore,
  type RecordLocation,
} from './queue-store.js'
