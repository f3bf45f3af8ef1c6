/**
 * Notification Queue Service
 *
 * Public face of the notification queue engine. Owns the queue store, wires
 * the insertion, scheduling and timing modules together and emits close
 * signals for the transport.
 *
 * Responsible for:
 * - Accepting, stacking, replacing and closing notifications
 * - Promoting waiting notifications under the display limit
 * - Expiring notifications and archiving them into history
 * - Computing how long the event loop may sleep
 *
 * Every operation is synchronous. The service is built once by the
 * notification-queue plugin and handed by reference to everything else.
 *
 * @example
 * const queues = new NotificationQueueService(log, policy)
 * queues.init()
 * const id = queues.insert({ appName: 'mail', summary: 'New message' })
 * queues.update(false)
 */

import { EventEmitter } from 'node:events'
import type {
  Clock,
  ClosedSignal,
  CloseReason,
  Notification,
  NotificationInput,
  QueueLengths,
  QueuePolicy,
} from '@root/types/notification.types.js'
import { createServiceLogger } from '@utils/logger.js'
import type { FastifyBaseLogger } from 'fastify'
import {
  assignId,
  type CloseDeps,
  checkTimeouts,
  closeById,
  closeNotification,
  createNotification,
  getNextDatachange,
  type HistoryDeps,
  historyPop,
  historyPush,
  historyPushAll,
  type InsertDeps,
  insertNotification,
  type NextDatachangeDeps,
  QueueStore,
  replaceNotification,
  snapshotNotification,
  type TimeoutDeps,
  type UpdateDeps,
  updateQueues,
} from './notification-queue/index.js'

export type ChangeKind =
  | 'insert'
  | 'replace'
  | 'close'
  | 'history'
  | 'pause'
  | 'display-limit'

export const systemClock: Clock = { now: () => Date.now() }

export class NotificationQueueService {
  private readonly log: FastifyBaseLogger
  private readonly store = new QueueStore()
  private readonly events = new EventEmitter()
  private readonly _policy: QueuePolicy

  constructor(
    baseLog: FastifyBaseLogger,
    policy: QueuePolicy,
    private readonly clock: Clock = systemClock,
  ) {
    this.log = createServiceLogger(baseLog, 'NOTIFICATION_QUEUE')
    this._policy = policy
    // SSE consumers each hold a listener
    this.events.setMaxListeners(100)
  }

  // ============================================================================
  // Getters
  // ============================================================================

  get policy(): Readonly<QueuePolicy> {
    return this._policy
  }

  get initialized(): boolean {
    return this.store.initialized
  }

  // ============================================================================
  // Dependencies
  // ============================================================================

  private get insertDeps(): InsertDeps {
    return {
      store: this.store,
      policy: this._policy,
      clock: this.clock,
      logger: this.log,
    }
  }

  private get historyDeps(): HistoryDeps {
    return {
      store: this.store,
      policy: this._policy,
      clock: this.clock,
      logger: this.log,
    }
  }

  private get closeDeps(): CloseDeps {
    return {
      ...this.historyDeps,
      signalClosed: (signal) => this.events.emit('closed', signal),
    }
  }

  private get timeoutDeps(): TimeoutDeps {
    return {
      store: this.store,
      policy: this._policy,
      clock: this.clock,
      logger: this.log,
      closeNotification: (id, reason) => closeById(id, reason, this.closeDeps),
    }
  }

  private get updateDeps(): UpdateDeps {
    return { store: this.store, clock: this.clock, logger: this.log }
  }

  private get nextDatachangeDeps(): NextDatachangeDeps {
    return { store: this.store, policy: this._policy }
  }

  // ============================================================================
  // Lifecycle
  // ============================================================================

  init(): void {
    this.store.init(this._policy.displayLimit)
    this.log.debug(
      { displayLimit: this._policy.displayLimit },
      'Notification queues initialized',
    )
  }

  /**
   * Frees every record in every queue
   */
  teardown(): void {
    const lengths = this.store.initialized ? this.lengths() : null
    this.store.teardown()
    this.log.debug({ freed: lengths }, 'Notification queues torn down')
  }

  // ============================================================================
  // Queue state
  // ============================================================================

  setDisplayLimit(limit: number): void {
    this.store.assertReady('setDisplayLimit')
    this.store.displayLimit = limit
    this.log.debug({ limit: this.store.displayLimit }, 'Display limit set')
    this.emitChanged('display-limit')
  }

  getDisplayLimit(): number {
    this.store.assertReady('getDisplayLimit')
    return this.store.displayLimit
  }

  /**
   * Read-only view of the displayed notifications in promotion order
   */
  getDisplayed(): readonly Readonly<Notification>[] {
    this.store.assertReady('getDisplayed')
    return this.store.list('displayed').map(snapshotNotification)
  }

  getWaiting(): readonly Readonly<Notification>[] {
    this.store.assertReady('getWaiting')
    return this.store.list('waiting').map(snapshotNotification)
  }

  /**
   * Read-only view of history, most recent first
   */
  getHistory(): readonly Readonly<Notification>[] {
    this.store.assertReady('getHistory')
    return this.store.list('history').map(snapshotNotification)
  }

  lengthWaiting(): number {
    this.store.assertReady('lengthWaiting')
    return this.store.length('waiting')
  }

  lengthDisplayed(): number {
    this.store.assertReady('lengthDisplayed')
    return this.store.length('displayed')
  }

  lengthHistory(): number {
    this.store.assertReady('lengthHistory')
    return this.store.length('history')
  }

  lengths(): QueueLengths {
    return {
      waiting: this.lengthWaiting(),
      displayed: this.lengthDisplayed(),
      history: this.lengthHistory(),
    }
  }

  // ============================================================================
  // Insertion and closing
  // ============================================================================

  /**
   * @returns the notification's id, or 0 when it was stacked onto a duplicate
   */
  insert(input: NotificationInput): number {
    const id = insertNotification(input, this.insertDeps)
    this.emitChanged('insert')
    return id
  }

  replaceById(input: NotificationInput): boolean {
    const replaced = replaceNotification(input, this.insertDeps)
    if (replaced) {
      this.emitChanged('replace')
    }
    return replaced
  }

  closeById(id: number, reason: CloseReason): boolean {
    const closed = closeById(id, reason, this.closeDeps)
    if (closed) {
      this.emitChanged('close')
    }
    return closed
  }

  close(record: Pick<Notification, 'id'>, reason: CloseReason): boolean {
    const closed = closeNotification(record, reason, this.closeDeps)
    if (closed) {
      this.emitChanged('close')
    }
    return closed
  }

  // ============================================================================
  // History
  // ============================================================================

  /**
   * @returns the id of the restored notification, null when history is empty
   */
  historyPop(): number | null {
    this.store.assertReady('historyPop')
    const id = historyPop(this.historyDeps)
    if (id !== null) {
      this.emitChanged('history')
    }
    return id
  }

  /**
   * Archive a notification that never went through the queues
   *
   * @returns the id it was archived under
   */
  historyPush(input: NotificationInput): number {
    this.store.assertReady('historyPush')
    const record = createNotification(input, this.insertDeps)
    assignId(record, this.store)
    record.closeReason = 'undefined'
    historyPush(record, this.historyDeps)
    this.emitChanged('history')
    return record.id
  }

  /**
   * @returns the number of notifications moved to history
   */
  historyPushAll(): number {
    this.store.assertReady('historyPushAll')
    const closed = historyPushAll({
      store: this.store,
      closeNotification: (id, reason) => closeById(id, reason, this.closeDeps),
    })
    if (closed > 0) {
      this.emitChanged('history')
    }
    return closed
  }

  // ============================================================================
  // Scheduling
  // ============================================================================

  /**
   * @returns ids of the notifications that timed out
   */
  checkTimeouts(idle: boolean, fullscreen: boolean): number[] {
    this.store.assertReady('checkTimeouts')
    return checkTimeouts(idle, fullscreen, this.timeoutDeps)
  }

  /**
   * @returns true when the displayed set changed
   */
  update(fullscreen: boolean): boolean {
    this.store.assertReady('update')
    return updateQueues(fullscreen, this.updateDeps)
  }

  /**
   * @returns milliseconds until the next pass is due, null when nothing is scheduled
   */
  getNextDatachange(now: number = this.clock.now()): number | null {
    this.store.assertReady('getNextDatachange')
    return getNextDatachange(now, this.nextDatachangeDeps)
  }

  // ============================================================================
  // Pause
  // ============================================================================

  pauseOn(): void {
    this.store.assertReady('pauseOn')
    this.store.paused = true
    this.log.info('Notification display paused')
    this.emitChanged('pause')
  }

  pauseOff(): void {
    this.store.assertReady('pauseOff')
    this.store.paused = false
    this.log.info('Notification display resumed')
    this.emitChanged('pause')
  }

  pauseStatus(): boolean {
    this.store.assertReady('pauseStatus')
    return this.store.paused
  }

  // ============================================================================
  // Events
  // ============================================================================

  /**
   * @returns a function removing the listener
   */
  onClosed(listener: (signal: ClosedSignal) => void): () => void {
    this.events.on('closed', listener)
    return () => this.events.off('closed', listener)
  }

  /**
   * Fires after every externally requested change that may alter what is
   * on screen. Passes driven by the event loop itself do not fire it.
   */
  onChanged(listener: (kind: ChangeKind) => void): () => void {
    this.events.on('changed', listener)
    return () => this.events.off('changed', listener)
  }

  getEventEmitter(): EventEmitter {
    return this.events
  }

  private emitChanged(kind: ChangeKind): void {
    this.events.emit('changed', kind)
  }
}
