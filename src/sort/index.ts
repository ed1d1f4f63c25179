export { findOrderingViolations } from './ordering-check'
export {
  ascending,
  type Comparable,
  descending,
  type IsOrderedBefore,
  localeAscending,
} from './orderings'
export { comparing, sortOn, sortedOn } from './sorted-on'
