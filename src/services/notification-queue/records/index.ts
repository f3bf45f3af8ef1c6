export {
  closeReasonCode,
  createNotification,
  isDuplicate,
  type RecordFactoryDeps,
  snapshotNotification,
} from './notification-record.js'
