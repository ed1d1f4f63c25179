/**
 * Type checking utilities, similar to lodash type guards
 *
 * Provides type-safe predicates for the checks the path walkers need.
 */

/**
 * Check if value can hold properties a path walks through:
 * plain objects, arrays, class instances. Functions are excluded.
 */
const isContainer = (value: unknown): value is object =>
  value != null && typeof value === 'object'

/** Check if value is an array */
const isArray = (value: unknown): value is unknown[] => Array.isArray(value)

/** Check two string lists for equal length and equal items in order */
const isSameSequence = (
  a: readonly string[],
  b: readonly string[],
): boolean => {
  if (a.length !== b.length) return false
  for (let i = 0; i < a.length; i++) {
    if (a[i] !== b[i]) return false
  }
  return true
}

/**
 * Unified namespace for type checking
 *
 * @example
 * ```typescript
 * import { is } from './utils/is'
 *
 * if (is.container(value)) { ... }
 * if (is.sameSequence(a.segments, b.segments)) { ... }
 * ```
 */
export const is = {
  container: isContainer,
  array: isArray,
  sameSequence: isSameSequence,
} as const
