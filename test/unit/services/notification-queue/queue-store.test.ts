import {
  MAX_NOTIFICATION_ID,
  type Notification,
} from '@root/types/notification.types.js'
import {
  QueueLifecycleError,
  QueueStore,
} from '@services/notification-queue/store/index.js'
import { beforeEach, describe, expect, it } from 'vitest'

function makeRecord(id: number): Notification {
  return {
    id,
    appName: 'mail',
    summary: `Message ${id}`,
    body: '',
    icon: '',
    category: '',
    urgency: 'normal',
    timeout: 10000,
    transient: false,
    stackTag: null,
    progress: null,
    fullscreen: 'show',
    historyIgnore: false,
    timestamp: 0,
    start: 0,
    dupCount: 0,
    redisplayed: false,
    closeReason: null,
  }
}

describe('QueueStore', () => {
  let store: QueueStore

  beforeEach(() => {
    store = new QueueStore()
  })

  describe('lifecycle', () => {
    it('should reject use before init', () => {
      expect(store.initialized).toBe(false)
      expect(() => store.assertReady('insert')).toThrow(QueueLifecycleError)
      expect(() => store.assertReady('insert')).toThrow(
        'Notification queues used before init() or after teardown(): insert',
      )
    })

    it('should reject use after teardown', () => {
      store.init()
      store.teardown()
      expect(() => store.assertReady('update')).toThrow(QueueLifecycleError)
    })

    it('should free every queue on teardown', () => {
      store.init()
      store.attach('waiting', makeRecord(1))
      store.attach('displayed', makeRecord(2))
      store.attach('history', makeRecord(3))

      store.teardown()
      store.init()

      expect(store.length('waiting')).toBe(0)
      expect(store.length('displayed')).toBe(0)
      expect(store.length('history')).toBe(0)
      expect(store.get(1)).toBeUndefined()
    })

    it('should reset flags on init', () => {
      store.init(3)
      store.paused = true
      store.recordDesktopState(true, true, 100)

      store.init(2)

      expect(store.paused).toBe(false)
      expect(store.displayLimit).toBe(2)
      expect(store.desktop).toEqual({
        idle: false,
        fullscreen: false,
        idleSince: null,
      })
    })
  })

  describe('ids', () => {
    it('should hand out increasing ids that survive teardown', () => {
      store.init()
      expect(store.nextId()).toBe(1)
      expect(store.nextId()).toBe(2)

      store.teardown()
      store.init()

      expect(store.nextId()).toBe(3)
    })

    it('should only claim ids above the last one handed out', () => {
      store.init()
      store.nextId()
      store.nextId()

      expect(store.claimId(2)).toBe(false)
      expect(store.claimId(10)).toBe(true)
      expect(store.nextId()).toBe(11)
    })

    it('should refuse ids beyond the highest notification id', () => {
      store.init()

      expect(store.claimId(MAX_NOTIFICATION_ID + 1)).toBe(false)
      expect(store.claimId(Number.MAX_SAFE_INTEGER)).toBe(false)
      expect(store.nextId()).toBe(1)
    })

    it('should wrap to 1 past the highest id and skip live records', () => {
      store.init()
      store.attach('waiting', makeRecord(1))

      expect(store.claimId(MAX_NOTIFICATION_ID)).toBe(true)
      expect(store.nextId()).toBe(2)
      expect(store.nextId()).toBe(3)
    })
  })

  describe('display capacity', () => {
    it('should treat a limit of 0 as unlimited', () => {
      store.init(0)
      for (let id = 1; id <= 5; id++) {
        store.attach('displayed', makeRecord(id))
      }
      expect(store.hasDisplayCapacity()).toBe(true)
    })

    it('should report no capacity once the limit is reached', () => {
      store.init(2)
      store.attach('displayed', makeRecord(1))
      expect(store.hasDisplayCapacity()).toBe(true)
      store.attach('displayed', makeRecord(2))
      expect(store.hasDisplayCapacity()).toBe(false)
    })

    it('should floor and clamp the display limit', () => {
      store.init()
      store.displayLimit = 2.7
      expect(store.displayLimit).toBe(2)
      store.displayLimit = -4
      expect(store.displayLimit).toBe(0)
    })
  })

  describe('desktop state', () => {
    it('should keep the start of an ongoing idle period', () => {
      store.init()
      store.recordDesktopState(true, false, 100)
      store.recordDesktopState(true, false, 250)
      expect(store.desktop.idleSince).toBe(100)

      store.recordDesktopState(false, false, 300)
      expect(store.desktop.idleSince).toBeNull()
    })
  })

  describe('attach and detach', () => {
    beforeEach(() => {
      store.init()
    })

    it('should place records at the front, back or in id order', () => {
      store.attach('waiting', makeRecord(5))
      store.attach('waiting', makeRecord(2), 'front')
      store.attach('waiting', makeRecord(9))
      store.attach('waiting', makeRecord(7), 'sorted')

      expect(store.ids('waiting')).toEqual([2, 5, 7, 9])
    })

    it('should append a sorted record with the highest id at the back', () => {
      store.attach('waiting', makeRecord(1))
      store.attach('waiting', makeRecord(4), 'sorted')
      expect(store.ids('waiting')).toEqual([1, 4])
    })

    it('should locate records across queues', () => {
      store.attach('waiting', makeRecord(1))
      store.attach('displayed', makeRecord(2))
      store.attach('history', makeRecord(3))

      expect(store.locate(3)).toEqual({ queue: 'history', index: 0 })
      expect(store.locate(3, ['displayed', 'waiting'])).toBeNull()
      expect(store.locate(42)).toBeNull()
    })

    it('should keep a detached record in the arena until freed', () => {
      const record = makeRecord(1)
      store.attach('displayed', record)

      const detached = store.detach({ queue: 'displayed', index: 0 })

      expect(detached).toBe(record)
      expect(store.length('displayed')).toBe(0)
      expect(store.get(1)).toBe(record)

      store.free(record)
      expect(store.get(1)).toBeUndefined()
    })

    it('should replace a record in its exact slot', () => {
      store.attach('displayed', makeRecord(1))
      store.attach('displayed', makeRecord(2))
      store.attach('displayed', makeRecord(3))
      const replacement = { ...makeRecord(2), summary: 'Updated' }

      const old = store.replaceAt({ queue: 'displayed', index: 1 }, replacement)

      expect(old.summary).toBe('Message 2')
      expect(store.ids('displayed')).toEqual([1, 2, 3])
      expect(store.get(2)).toBe(replacement)
    })

    it('should list live records in queue order', () => {
      store.attach('history', makeRecord(1))
      store.attach('history', makeRecord(2), 'front')
      expect(store.list('history').map((record) => record.id)).toEqual([2, 1])
    })
  })
})
