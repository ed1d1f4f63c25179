/**
 * Capability narrowing for key paths
 *
 * @example
 * ```typescript
 * if (isWritable(path)) {
 *   cat = path.set(cat, value)
 * } else if (isReferenceWritable(path)) {
 *   path.set(cat, value)
 * }
 * ```
 */

import type {
  KeyPath,
  ReadonlyKeyPath,
  ReferenceWritableKeyPath,
  WritableKeyPath,
} from './types'

const hasSetter = <Root, Value>(path: KeyPath<Root, Value>): boolean =>
  'set' in path && typeof path.set === 'function'

/** Writes return an updated copy of the root */
export const isWritable = <Root, Value>(
  path: KeyPath<Root, Value>,
): path is WritableKeyPath<Root, Value> =>
  path.mode === 'value' && hasSetter(path)

/** Writes mutate the root in place */
export const isReferenceWritable = <Root, Value>(
  path: KeyPath<Root, Value>,
): path is ReferenceWritableKeyPath<Root, Value> =>
  path.mode === 'reference' && hasSetter(path)

/** No write capability */
export const isReadonly = <Root, Value>(
  path: KeyPath<Root, Value>,
): path is ReadonlyKeyPath<Root, Value> => path.mode === 'readonly'
