/**
 * Tests for timing utilities
 *
 * Verifies debug timing measurement for slow sort detection.
 */

import { afterEach, describe, expect, it, vi } from 'vitest'

import { createTiming, type OnSlowOperation } from '~/utils/timing'

const busyWait = (ms: number) => {
  const start = Date.now()
  while (Date.now() - start < ms) {
    // busy wait
  }
  return 'done'
}

describe('createTiming', () => {
  describe('when timing is enabled', () => {
    const config = {
      timing: true,
      timingThreshold: 5,
    }

    it('should return the function result', () => {
      const timing = createTiming(config)
      const result = timing.run('sort', () => 42, {
        path: 'name',
        name: 'ascending',
      })
      expect(result).toBe(42)
    })

    it('should call onSlowOperation when operation exceeds threshold', () => {
      const onSlowOperation = vi.fn<OnSlowOperation>()
      const timing = createTiming({ ...config, onSlowOperation })

      timing.run('sort', () => busyWait(10), {
        path: 'favoriteFood.calories',
        name: 'ascending',
      })

      expect(onSlowOperation).toHaveBeenCalledTimes(1)
      expect(onSlowOperation).toHaveBeenCalledWith(
        expect.objectContaining({
          type: 'sort',
          path: 'favoriteFood.calories',
          name: 'ascending',
          threshold: 5,
        }),
      )

      const event = onSlowOperation.mock.calls[0]![0]
      expect(event.duration).toBeGreaterThan(5)
    })

    it('should deduplicate warnings for same operation', () => {
      const onSlowOperation = vi.fn<OnSlowOperation>()

      for (let i = 0; i < 3; i++) {
        createTiming({ ...config, onSlowOperation }).run(
          'sort',
          () => busyWait(10),
          { path: 'name', name: 'ascending' },
        )
      }

      expect(onSlowOperation).toHaveBeenCalledTimes(1)
    })

    it('should deduplicate per reporter', () => {
      const first = vi.fn<OnSlowOperation>()
      const second = vi.fn<OnSlowOperation>()
      const meta = { path: 'name', name: 'ascending' }

      createTiming({ ...config, onSlowOperation: first }).run('sort', () => busyWait(10), meta)
      createTiming({ ...config, onSlowOperation: second }).run('sort', () => busyWait(10), meta)

      expect(first).toHaveBeenCalledTimes(1)
      expect(second).toHaveBeenCalledTimes(1)
    })

    it('should warn separately for different operations', () => {
      const onSlowOperation = vi.fn<OnSlowOperation>()
      const timing = createTiming({ ...config, onSlowOperation })

      timing.run('sort', () => busyWait(10), { path: 'name', name: 'ascending' })
      timing.run('sort', () => busyWait(10), { path: 'name', name: 'descending' })

      expect(onSlowOperation).toHaveBeenCalledTimes(2)
    })

    it('should not warn for fast operations', () => {
      const onSlowOperation = vi.fn<OnSlowOperation>()
      const timing = createTiming({
        ...config,
        timingThreshold: 1000,
        onSlowOperation,
      })

      timing.run('sort', () => 1, { path: 'name', name: 'ascending' })

      expect(onSlowOperation).not.toHaveBeenCalled()
    })
  })

  describe('default reporter', () => {
    afterEach(() => {
      vi.restoreAllMocks()
    })

    it('should print a prefixed console warning', () => {
      const warn = vi.spyOn(console, 'warn').mockImplementation(() => undefined)
      const timing = createTiming({ timing: true, timingThreshold: 1 })
      timing.run('sort', () => busyWait(5), { path: 'name', name: 'byName' })

      expect(warn).toHaveBeenCalledTimes(1)
      expect(String(warn.mock.calls[0]![0])).toMatch(
        /^\[keyed-paths\] Slow sort: name\/byName took \d+\.\d{2}ms \(threshold: 1ms\)$/,
      )
    })
  })

  describe('when timing is disabled', () => {
    it('should just call through', () => {
      const onSlowOperation = vi.fn<OnSlowOperation>()
      const timing = createTiming({
        timing: false,
        timingThreshold: 0,
        onSlowOperation,
      })

      expect(timing.run('sort', () => busyWait(2), { path: 'a', name: 'b' })).toBe(
        'done',
      )
      expect(onSlowOperation).not.toHaveBeenCalled()
    })
  })
})
