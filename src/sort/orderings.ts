/**
 * Stock ordering predicates
 *
 * Each returns true when its first argument belongs before its second,
 * which is the shape `sortedOn` expects.
 */

/** A strict "belongs before" test between two keys */
export type IsOrderedBefore<V> = (a: V, b: V) => boolean

/** Values `<` orders meaningfully. Dates compare by timestamp. */
export type Comparable = number | string | bigint | Date

/** `a < b` */
export const ascending = <V extends Comparable>(a: V, b: V): boolean => a < b

/** `a > b` */
export const descending = <V extends Comparable>(a: V, b: V): boolean => a > b

/** Locale-aware string order, `'a' < 'B' < 'c'` instead of code-unit order */
export const localeAscending = (a: string, b: string): boolean =>
  a.localeCompare(b) < 0
