/**
 * Timing Module
 *
 * Expiry calculation and wake-up scheduling.
 */

export {
  ageDelay,
  expiryContextAt,
  getNextDatachange,
  type NextDatachangeDeps,
  timeoutCandidates,
} from './next-datachange.js'

export {
  computeExpiry,
  effectiveTimeout,
  type ExpiryContext,
  isExpired,
} from './timeout-policy.js'
