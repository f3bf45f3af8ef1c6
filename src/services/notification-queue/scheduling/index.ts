/**
 * Scheduling Module
 *
 * Promotion, expiry and history transitions.
 */

export {
  type HistoryDeps,
  type HistoryPushAllDeps,
  historyPop,
  historyPush,
  historyPushAll,
} from './history.js'

export { checkTimeouts, type TimeoutDeps } from './timeouts.js'

export {
  pushBackForFullscreen,
  trimToDisplayLimit,
  type UpdateDeps,
  updateQueues,
} from './update.js'
