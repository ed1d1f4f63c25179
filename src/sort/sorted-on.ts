/**
 * Keyed sorting
 *
 * Orders elements by the value a key path reaches in each of them. The
 * ordering itself is `Array.prototype.sort`'s: this module only turns
 * "compare by key path" into "compare by value".
 *
 * @example
 * ```typescript
 * const cat = keyPaths<Cat>()
 *
 * sortedOn(cats, cat.readonly('name'), ascending)
 * sortedOn(cats, cat.readonly('favoriteFood.calories'), (a, b) => a < b)
 * ```
 */

import { resolveConfig } from '../core/defaults'
import type { KeyPathConfig } from '../core/types'
import type { KeyPath } from '../key-path/types'
import { createSortObserver } from '../utils/debug-log'
import { __DEV__ } from '../utils/guards'
import { createTiming } from '../utils/timing'
import { findOrderingViolations } from './ordering-check'
import type { IsOrderedBefore } from './orderings'

/**
 * Comparator for `Array.prototype.sort` that resolves both elements through
 * `path` and asks `isOrderedBefore` about the keys: -1, 1, or 0 when neither
 * key comes first.
 */
export const comparing =
  <E, V>(path: KeyPath<E, V>, isOrderedBefore: IsOrderedBefore<V>) =>
  (a: E, b: E): number => {
    const left = path.get(a)
    const right = path.get(b)
    if (isOrderedBefore(left, right)) return -1
    if (isOrderedBefore(right, left)) return 1
    return 0
  }

const sortInPlace = <E, V>(
  array: E[],
  path: KeyPath<E, V>,
  isOrderedBefore: IsOrderedBefore<V>,
  options?: KeyPathConfig,
): E[] => {
  const { debug } = resolveConfig(options)
  const observer = createSortObserver(debug)
  const timing = createTiming(debug)
  const label = path.path === '' ? '(self)' : path.path

  observer.sortStart(path.path, array.length)

  try {
    timing.run('sort', () => array.sort(comparing(path, isOrderedBefore)), {
      path: label,
      name: isOrderedBefore.name || '(anonymous)',
    })

    if (debug.logSort || debug.checkOrdering) {
      const keys = array.map((element) => path.get(element))
      observer.keysResolved(keys)
      if (debug.checkOrdering && __DEV__) {
        for (const violation of findOrderingViolations(keys, isOrderedBefore)) {
          observer.orderingViolation(path.path, violation)
        }
      }
    }
  } finally {
    observer.sortEnd()
  }

  return array
}

/**
 * Returns a new array holding the elements of `items` ordered by the value
 * `path` reaches in each. `items` is not modified.
 *
 * Ties keep their input order, since `Array.prototype.sort` is stable.
 * `isOrderedBefore` must be a strict weak ordering; the result is otherwise
 * some permutation of the input.
 */
export const sortedOn = <E, V>(
  items: Iterable<E>,
  path: KeyPath<E, V>,
  isOrderedBefore: IsOrderedBefore<V>,
  options?: KeyPathConfig,
): E[] => sortInPlace(Array.from(items), path, isOrderedBefore, options)

/** In-place counterpart of `sortedOn`. Returns the same array. */
export const sortOn = <E, V>(
  array: E[],
  path: KeyPath<E, V>,
  isOrderedBefore: IsOrderedBefore<V>,
  options?: KeyPathConfig,
): E[] => sortInPlace(array, path, isOrderedBefore, options)
