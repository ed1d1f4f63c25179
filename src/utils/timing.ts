/**
 * Debug Timing Utilities
 *
 * Provides timing measurement for sorts to detect slow key paths or
 * predicates during development.
 */

type TimingType = 'sort'

interface TimingMeta {
  path: string
  name: string
}

export interface TimingEvent extends TimingMeta {
  type: TimingType
  duration: number
  threshold: number
}

export type OnSlowOperation = (event: TimingEvent) => void

const defaultOnSlowOperation: OnSlowOperation = (event) => {
  console.warn(
    `[keyed-paths] Slow ${event.type}: ${event.path}/${event.name} took ${event.duration.toFixed(2)}ms (threshold: ${event.threshold}ms)`,
  )
}

export interface Timing {
  run: <T>(type: TimingType, fn: () => T, meta: TimingMeta) => T
}

export interface TimingConfig {
  timing: boolean
  timingThreshold: number
  onSlowOperation?: OnSlowOperation
}

// Operations already reported, per reporter. Dropped with the reporter.
const warnedByReporter = new WeakMap<OnSlowOperation, Set<string>>()
const MAX_WARNED = 1000

const warnOnce = (
  onSlowOperation: OnSlowOperation,
  key: string,
  event: TimingEvent,
): void => {
  let warned = warnedByReporter.get(onSlowOperation)
  if (!warned) {
    warned = new Set()
    warnedByReporter.set(onSlowOperation, warned)
  }
  if (warned.has(key)) return
  if (warned.size >= MAX_WARNED) {
    warned.clear()
  }
  warned.add(key)
  onSlowOperation(event)
}

/**
 * Create a timing instance.
 * If timing is disabled, `run` just calls through.
 */
export const createTiming = (options: TimingConfig): Timing => {
  const {
    timing,
    timingThreshold,
    onSlowOperation = defaultOnSlowOperation,
  } = options

  if (!timing) {
    return {
      run: (_type, fn) => fn(),
    }
  }

  return {
    run: <T>(type: TimingType, fn: () => T, meta: TimingMeta): T => {
      const start = performance.now()
      const result = fn()
      const duration = performance.now() - start

      if (duration > timingThreshold) {
        warnOnce(onSlowOperation, `${type}:${meta.path}:${meta.name}`, {
          ...meta,
          type,
          duration,
          threshold: timingThreshold,
        })
      }

      return result
    },
  }
}
