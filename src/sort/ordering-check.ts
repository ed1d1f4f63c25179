/**
 * Sampling check for strict weak orderings
 *
 * The sort never relies on this: a predicate that breaks the laws still
 * produces some permutation. The check only reports what it sees on the keys
 * it is given.
 */

import type { OrderingViolation } from '../utils/debug-log'
import type { IsOrderedBefore } from './orderings'

/**
 * Checks irreflexivity on every key and asymmetry on each adjacent pair.
 * Returns at most one violation per law, the first found.
 */
export const findOrderingViolations = <V>(
  keys: readonly V[],
  isOrderedBefore: IsOrderedBefore<V>,
): OrderingViolation[] => {
  let irreflexive: OrderingViolation | undefined
  let asymmetric: OrderingViolation | undefined

  for (let i = 0; i < keys.length; i++) {
    const left = keys[i]!
    if (!irreflexive && isOrderedBefore(left, left)) {
      irreflexive = { law: 'irreflexivity', left, right: left }
    }
    if (i + 1 < keys.length && !asymmetric) {
      const right = keys[i + 1]!
      if (isOrderedBefore(left, right) && isOrderedBefore(right, left)) {
        asymmetric = { law: 'asymmetry', left, right }
      }
    }
  }

  return [irreflexive, asymmetric].filter(
    (violation): violation is OrderingViolation => violation !== undefined,
  )
}
