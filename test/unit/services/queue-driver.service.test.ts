import { NotificationQueueService } from '@services/notification-queue.service.js'
import { QueueDriverService } from '@services/queue-driver.service.js'
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest'
import { createMockLogger } from '../../mocks/logger.js'
import { createInput, createTestPolicy } from '../../helpers/notifications.js'

describe('QueueDriverService', () => {
  let queues: NotificationQueueService
  let driver: QueueDriverService

  beforeEach(() => {
    vi.useFakeTimers()
    queues = new NotificationQueueService(
      createMockLogger(),
      createTestPolicy({ displayLimit: 1 }),
    )
    queues.init()
    driver = new QueueDriverService(createMockLogger(), queues, {
      fallbackInterval: 250,
    })
  })

  afterEach(() => {
    driver.stop()
    vi.useRealTimers()
  })

  describe('start and stop', () => {
    it('should run a pass on start', () => {
      queues.insert(createInput({ timeout: 4000 }))

      driver.start()

      expect(driver.isRunning).toBe(true)
      expect(queues.lengthDisplayed()).toBe(1)
      expect(driver.nextDelay).toBe(4000)
    })

    it('should stay disarmed with nothing to wait for', () => {
      driver.start()
      expect(driver.nextDelay).toBeNull()
    })

    it('should stop reacting once stopped', () => {
      driver.start()
      driver.stop()

      queues.insert(createInput())

      expect(driver.isRunning).toBe(false)
      expect(queues.lengthDisplayed()).toBe(0)
      expect(driver.wakeUp()).toBeNull()
    })
  })

  describe('wake-ups', () => {
    it('should promote a new notification as soon as it is inserted', () => {
      driver.start()

      queues.insert(createInput({ timeout: 4000 }))

      expect(queues.lengthDisplayed()).toBe(1)
      expect(driver.nextDelay).toBe(4000)
    })

    it('should expire and promote when the timer fires', () => {
      driver.start()
      queues.insert(createInput({ summary: 'First', timeout: 4000 }))
      queues.insert(createInput({ summary: 'Second', timeout: 0 }))
      expect(queues.getWaiting().map((n) => n.summary)).toEqual(['Second'])

      vi.advanceTimersByTime(4000)

      expect(queues.getDisplayed().map((n) => n.summary)).toEqual(['Second'])
      expect(queues.getHistory().map((n) => n.summary)).toEqual(['First'])
      expect(driver.nextDelay).toBeNull()
    })

    it('should report what a pass did', () => {
      driver.start()
      queues.pauseOn()
      queues.insert(createInput({ timeout: 4000 }))
      queues.pauseOff()

      vi.advanceTimersByTime(4000)

      expect(driver.wakeUp()).toEqual({
        timedOut: [],
        changed: false,
        nextWakeUp: null,
      })
      expect(queues.lengthHistory()).toBe(1)
    })

    it('should skip passes once the queues are torn down', () => {
      driver.start()
      queues.teardown()

      expect(driver.wakeUp()).toBeNull()
      expect(driver.nextDelay).toBeNull()
    })

    it('should retry after the fallback interval when a pass fails', () => {
      driver.start()
      const update = vi.spyOn(queues, 'update').mockImplementationOnce(() => {
        throw new Error('render failed')
      })

      expect(driver.wakeUp()).toBeNull()
      expect(driver.nextDelay).toBe(250)

      vi.advanceTimersByTime(250)
      expect(update).toHaveBeenCalledTimes(2)
    })
  })

  describe('long timeouts', () => {
    const MAX_TIMER_DELAY = 2 ** 31 - 1
    const month = 30 * 24 * 3600 * 1000

    it('should wait in capped steps until a long timeout expires', () => {
      driver.start()
      queues.insert(createInput({ timeout: month }))
      expect(driver.nextDelay).toBe(month)
      const checkTimeouts = vi.spyOn(queues, 'checkTimeouts')

      vi.advanceTimersByTime(100)
      expect(checkTimeouts).not.toHaveBeenCalled()

      vi.advanceTimersByTime(MAX_TIMER_DELAY - 100)
      expect(checkTimeouts).toHaveBeenCalledTimes(1)
      expect(queues.lengthDisplayed()).toBe(1)
      expect(driver.nextDelay).toBe(month - MAX_TIMER_DELAY)

      vi.advanceTimersByTime(month - MAX_TIMER_DELAY)
      expect(checkTimeouts).toHaveBeenCalledTimes(2)
      expect(queues.lengthDisplayed()).toBe(0)
      expect(queues.getHistory()).toHaveLength(1)
    })
  })

  describe('setDesktopState', () => {
    it('should run a pass when the state changes', () => {
      driver.start()
      const checkTimeouts = vi.spyOn(queues, 'checkTimeouts')

      expect(driver.setDesktopState({ idle: true })).toEqual({
        idle: true,
        fullscreen: false,
      })
      expect(checkTimeouts).toHaveBeenCalledWith(true, false)
    })

    it('should not run a pass when nothing changed', () => {
      driver.start()
      const checkTimeouts = vi.spyOn(queues, 'checkTimeouts')

      driver.setDesktopState({ idle: false, fullscreen: false })

      expect(checkTimeouts).not.toHaveBeenCalled()
    })

    it('should hold back delayed notifications while fullscreen', () => {
      driver.start()
      driver.setDesktopState({ fullscreen: true })

      queues.insert(createInput({ fullscreen: 'delay' }))
      expect(queues.lengthDisplayed()).toBe(0)

      driver.setDesktopState({ fullscreen: false })
      expect(queues.lengthDisplayed()).toBe(1)
    })
  })
})
