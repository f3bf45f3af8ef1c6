/**
 * Queue Driver Service
 *
 * Event loop for the notification queues. Each pass expires notifications,
 * promotes waiting ones and re-arms a single timer for the moment the queues
 * next need attention. External signals (new notifications, close requests,
 * idle/fullscreen reports) wake it up early.
 */

import type { DesktopState } from '@root/types/notification.types.js'
import { createServiceLogger } from '@utils/logger.js'
import type { FastifyBaseLogger } from 'fastify'
import type { NotificationQueueService } from './notification-queue.service.js'

// setTimeout fires after 1 ms for anything longer
const MAX_TIMER_DELAY = 2 ** 31 - 1

export interface QueueDriverConfig {
  /** Delay (ms) before retrying after a failed pass */
  fallbackInterval: number
}

export interface DriverPassResult {
  timedOut: number[]
  changed: boolean
  nextWakeUp: number | null
}

export class QueueDriverService {
  private readonly log: FastifyBaseLogger
  private readonly _config: QueueDriverConfig
  private timeoutId: NodeJS.Timeout | null = null
  private _nextDelay: number | null = null
  private _isRunning = false
  private _desktop: DesktopState = { idle: false, fullscreen: false }
  private unsubscribe: (() => void) | null = null

  constructor(
    baseLog: FastifyBaseLogger,
    private readonly queues: NotificationQueueService,
    config?: Partial<QueueDriverConfig>,
  ) {
    this.log = createServiceLogger(baseLog, 'QUEUE_DRIVER')
    this._config = {
      fallbackInterval: config?.fallbackInterval ?? 1000,
    }
  }

  // ============================================================================
  // Getters
  // ============================================================================

  get isRunning(): boolean {
    return this._isRunning
  }

  get desktopState(): Readonly<DesktopState> {
    return this._desktop
  }

  /**
   * Delay the timer was last armed with, null while disarmed
   */
  get nextDelay(): number | null {
    return this._nextDelay
  }

  // ============================================================================
  // Lifecycle
  // ============================================================================

  start(): void {
    if (this._isRunning) {
      return
    }
    this._isRunning = true
    this.unsubscribe = this.queues.onChanged((kind) => {
      this.log.trace({ kind }, 'Queue change, waking up')
      this.wakeUp()
    })
    this.log.info('Queue driver started')
    this.wakeUp()
  }

  stop(): void {
    if (!this._isRunning) {
      return
    }
    this._isRunning = false
    this.unsubscribe?.()
    this.unsubscribe = null
    this.clearTimer()
    this.log.info('Queue driver stopped')
  }

  // ============================================================================
  // Signals
  // ============================================================================

  /**
   * Record the renderer's idle/fullscreen report and run a pass
   */
  setDesktopState(state: Partial<DesktopState>): Readonly<DesktopState> {
    const next = { ...this._desktop, ...state }
    const changed =
      next.idle !== this._desktop.idle ||
      next.fullscreen !== this._desktop.fullscreen
    this._desktop = next

    if (changed) {
      this.log.debug({ ...next }, 'Desktop state changed')
      this.wakeUp()
    }
    return this._desktop
  }

  /**
   * Run one pass now and re-arm the timer. Does nothing while stopped or
   * once the queues are torn down.
   */
  wakeUp(): DriverPassResult | null {
    if (!this._isRunning) {
      return null
    }
    this.clearTimer()

    if (!this.queues.initialized) {
      this.log.debug('Notification queues torn down, skipping pass')
      return null
    }

    let result: DriverPassResult
    try {
      result = this.runPass()
    } catch (error) {
      this.log.error({ error }, 'Queue pass failed')
      this.arm(this._config.fallbackInterval)
      return null
    }

    this.arm(result.nextWakeUp)
    return result
  }

  // ============================================================================
  // Internals
  // ============================================================================

  private runPass(): DriverPassResult {
    const { idle, fullscreen } = this._desktop
    const timedOut = this.queues.checkTimeouts(idle, fullscreen)
    const changed = this.queues.update(fullscreen)
    const nextWakeUp = this.queues.getNextDatachange()

    if (timedOut.length > 0 || changed) {
      this.log.debug(
        {
          timedOut: timedOut.length,
          ...this.queues.lengths(),
          nextWakeUp,
        },
        'Queue pass changed the screen',
      )
    }

    return { timedOut, changed, nextWakeUp }
  }

  private arm(delay: number | null): void {
    // A listener may have run a nested pass that already armed the timer
    this.clearTimer()
    this._nextDelay = delay
    if (delay === null) {
      return
    }
    // Longer delays wake up early, find nothing to do and re-arm
    this.timeoutId = setTimeout(
      () => {
        this.timeoutId = null
        this.wakeUp()
      },
      Math.min(delay, MAX_TIMER_DELAY),
    )
  }

  private clearTimer(): void {
    if (this.timeoutId) {
      clearTimeout(this.timeoutId)
      this.timeoutId = null
    }
    this._nextDelay = null
  }
}
