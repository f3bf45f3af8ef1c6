/**
 * Insertion Module
 *
 * Inserting, stacking, replacing and closing notifications.
 */

export { type CloseDeps, closeById, closeNotification } from './close.js'

export {
  assignId,
  findDuplicate,
  type InsertDeps,
  insertNotification,
  replaceInPlace,
  replaceNotification,
  stackDuplicate,
} from './insert.js'
