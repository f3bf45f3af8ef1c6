/**
 * Queue Store
 *
 * Arena of notification records keyed by id, plus the three ordered id
 * sequences (waiting, displayed, history) and the engine-wide flags.
 * All mutation of queue state goes through this class.
 */

import {
  MAX_NOTIFICATION_ID,
  type Notification,
  type QueueName,
} from '@root/types/notification.types.js'

/**
 * Raised when the store is used outside its init/teardown lifecycle.
 * This is a programming error, not a runtime condition to recover from.
 */
export class QueueLifecycleError extends Error {
  constructor(operation: string) {
    super(`Notification queues used before init() or after teardown(): ${operation}`)
    this.name = 'QueueLifecycleError'

    // Fix prototype chain – important after TS → JS down-emit
    Object.setPrototypeOf(this, new.target.prototype)
  }
}

export interface RecordLocation {
  queue: QueueName
  index: number
}

export interface DesktopSnapshot {
  idle: boolean
  fullscreen: boolean
  /** When the current idle period began, null while the user is active */
  idleSince: number | null
}

/** Where attach() places a record in its queue */
export type AttachPosition = 'front' | 'back' | 'sorted'

const QUEUE_NAMES: readonly QueueName[] = ['waiting', 'displayed', 'history']

export class QueueStore {
  private readonly records = new Map<number, Notification>()
  private readonly queues: Record<QueueName, number[]> = {
    waiting: [],
    displayed: [],
    history: [],
  }
  private _initialized = false
  private _paused = false
  private _displayLimit = 0
  // Survives teardown so that ids stay unique for the whole process
  private lastId = 0
  private _desktop: DesktopSnapshot = {
    idle: false,
    fullscreen: false,
    idleSince: null,
  }

  // ============================================================================
  // Lifecycle
  // ============================================================================

  init(displayLimit = 0): void {
    if (this._initialized) {
      this.teardown()
    }
    this._initialized = true
    this._paused = false
    this._displayLimit = displayLimit
    this._desktop = { idle: false, fullscreen: false, idleSince: null }
  }

  /**
   * Frees every record in every queue
   */
  teardown(): void {
    this.records.clear()
    for (const name of QUEUE_NAMES) {
      this.queues[name].length = 0
    }
    this._initialized = false
  }

  get initialized(): boolean {
    return this._initialized
  }

  assertReady(operation: string): void {
    if (!this._initialized) {
      throw new QueueLifecycleError(operation)
    }
  }

  // ============================================================================
  // Flags
  // ============================================================================

  get paused(): boolean {
    return this._paused
  }

  set paused(value: boolean) {
    this._paused = value
  }

  get displayLimit(): number {
    return this._displayLimit
  }

  set displayLimit(limit: number) {
    this._displayLimit = Math.max(0, Math.floor(limit))
  }

  /**
   * True when the displayed queue may take one more record
   */
  hasDisplayCapacity(): boolean {
    return (
      this._displayLimit === 0 ||
      this.queues.displayed.length < this._displayLimit
    )
  }

  get desktop(): Readonly<DesktopSnapshot> {
    return this._desktop
  }

  recordDesktopState(idle: boolean, fullscreen: boolean, now: number): void {
    const idleSince = idle ? (this._desktop.idleSince ?? now) : null
    this._desktop = { idle, fullscreen, idleSince }
  }

  // ============================================================================
  // Ids
  // ============================================================================

  /**
   * Next free id. Past MAX_NOTIFICATION_ID the counter wraps to 1 and skips
   * ids still held by a record.
   */
  nextId(): number {
    let candidate = this.lastId
    for (let attempt = 0; attempt <= this.records.size; attempt++) {
      candidate = candidate >= MAX_NOTIFICATION_ID ? 1 : candidate + 1
      if (!this.records.has(candidate)) {
        this.lastId = candidate
        return candidate
      }
    }
    throw new RangeError('No notification id left to assign')
  }

  /**
   * Reserve a caller-chosen id. Only free ids above every id handed out so
   * far and within MAX_NOTIFICATION_ID can be claimed; the counter then
   * continues from there.
   */
  claimId(id: number): boolean {
    if (
      !Number.isInteger(id) ||
      id <= this.lastId ||
      id > MAX_NOTIFICATION_ID ||
      this.records.has(id)
    ) {
      return false
    }
    this.lastId = id
    return true
  }

  // ============================================================================
  // Queries
  // ============================================================================

  length(queue: QueueName): number {
    return this.queues[queue].length
  }

  ids(queue: QueueName): readonly number[] {
    return this.queues[queue]
  }

  get(id: number): Notification | undefined {
    return this.records.get(id)
  }

  /**
   * Live records of a queue in order. The array is a copy, the records are not.
   */
  list(queue: QueueName): Notification[] {
    return this.queues[queue].map((id) => this.require(id))
  }

  at(location: RecordLocation): Notification {
    return this.require(this.queues[location.queue][location.index])
  }

  indexOf(queue: QueueName, id: number): number {
    return this.queues[queue].indexOf(id)
  }

  locate(
    id: number,
    queues: readonly QueueName[] = QUEUE_NAMES,
  ): RecordLocation | null {
    for (const queue of queues) {
      const index = this.queues[queue].indexOf(id)
      if (index !== -1) {
        return { queue, index }
      }
    }
    return null
  }

  // ============================================================================
  // Mutation
  // ============================================================================

  /**
   * Take ownership of a record and place its id in a queue
   */
  attach(
    queue: QueueName,
    record: Notification,
    position: AttachPosition = 'back',
  ): void {
    this.records.set(record.id, record)
    const ids = this.queues[queue]

    if (position === 'front') {
      ids.unshift(record.id)
    } else if (position === 'back') {
      ids.push(record.id)
    } else {
      const index = ids.findIndex((existing) => existing > record.id)
      ids.splice(index === -1 ? ids.length : index, 0, record.id)
    }
  }

  /**
   * Remove a record's id from its queue. The record stays in the arena until
   * it is attached again or freed.
   */
  detach(location: RecordLocation): Notification {
    const record = this.at(location)
    this.queues[location.queue].splice(location.index, 1)
    return record
  }

  /**
   * Put a record in the exact slot another record occupies, freeing the old one
   */
  replaceAt(location: RecordLocation, record: Notification): Notification {
    const old = this.at(location)
    this.records.delete(old.id)
    this.records.set(record.id, record)
    this.queues[location.queue][location.index] = record.id
    return old
  }

  free(record: Notification): void {
    this.records.delete(record.id)
  }

  private require(id: number | undefined): Notification {
    const record = id === undefined ? undefined : this.records.get(id)
    if (!record) {
      throw new Error(`Queue store lost track of notification ${id}`)
    }
    return record
  }
}
