/**
 * Sort Observer: debug logging for keyed sorts.
 *
 * Call sites use one `observer.xyz()` call per event.
 * Zero runtime cost when all flags are false (returns no-op object).
 */

import type { DebugConfig } from '../core/types'

export interface OrderingViolation {
  /** Which strict-weak-ordering law failed */
  law: 'irreflexivity' | 'asymmetry'
  /** The resolved keys the predicate was called with */
  left: unknown
  right: unknown
}

export interface SortObserver {
  sortStart: (path: string, count: number) => void
  keysResolved: (keys: unknown[]) => void
  orderingViolation: (path: string, violation: OrderingViolation) => void
  sortEnd: () => void
}

const noop = () => {
  // no-op
}

const NOOP_OBSERVER: SortObserver = {
  sortStart: noop,
  keysResolved: noop,
  orderingViolation: noop,
  sortEnd: noop,
}

const PREFIX = 'keyed-paths'

const describePath = (path: string): string => (path === '' ? '(self)' : path)

/**
 * Create a sort observer from the debug flags.
 * `logSort` drives the grouped sort log, `checkOrdering` the violation warnings.
 */
export const createSortObserver = (config: DebugConfig): SortObserver => {
  const { logSort = false, checkOrdering = false } = config

  if (!logSort && !checkOrdering) return NOOP_OBSERVER

  return {
    ...NOOP_OBSERVER,

    ...(logSort
      ? {
          sortStart: (path: string, count: number) => {
            console.group(
              `${PREFIX}:sort | ${describePath(path)} (${String(count)} items)`,
            )
          },
          keysResolved: (keys: unknown[]) => {
            console.log(`${PREFIX}:sort | keys `, keys)
          },
          sortEnd: () => {
            console.groupEnd()
          },
        }
      : {}),

    ...(checkOrdering
      ? {
          orderingViolation: (path: string, violation: OrderingViolation) => {
            console.warn(
              `${PREFIX}:ordering | ${describePath(path)} predicate breaks ${violation.law}`,
              { left: violation.left, right: violation.right },
            )
          },
        }
      : {}),
  }
}
