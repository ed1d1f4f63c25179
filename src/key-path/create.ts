/**
 * Key path construction
 *
 * `keyPaths<T>()` fixes the root type once, then each builder method infers
 * the path literal and resolves the value type from it. A path that does not
 * exist on `T`, or a writable path through a `readonly` property, is a
 * compile error.
 *
 * @example
 * ```typescript
 * const cat = keyPaths<Cat>()
 *
 * const name = cat.readonly('name')                         // KeyPath<Cat, string>
 * const kcal = cat.writable('favoriteFood.calories')        // WritableKeyPath<Cat, number>
 * const food = cat.referenceWritable('favoriteFood')        // ReferenceWritableKeyPath<Cat, Food>
 *
 * kcal.get(whiskers)                 // 999
 * const lighter = kcal.set(whiskers, 500) // new Cat, whiskers unchanged
 * ```
 */

import type {
  DeepValue,
  ResolvableDeepKey,
  WritableDeepKey,
} from '../types'
import { dot } from '../utils/dot'
import { guard } from '../utils/guards'
import type {
  KeyPath,
  ReferenceWritableKeyPath,
  WritableKeyPath,
} from './types'

/** Writable paths, also known to be readable ones */
export type WritablePath<T> = WritableDeepKey<T> & ResolvableDeepKey<T>

export interface KeyPathBuilder<T extends object> {
  /** Read-only key path to any data property reachable from `T` */
  readonly: <P extends ResolvableDeepKey<T>>(
    path: P,
  ) => KeyPath<T, DeepValue<T, P>>
  /** Key path whose writes return an updated copy of the root */
  writable: <P extends WritablePath<T>>(
    path: P,
  ) => WritableKeyPath<T, DeepValue<T, P>>
  /** Key path whose writes mutate the root in place */
  referenceWritable: <P extends WritablePath<T>>(
    path: P,
  ) => ReferenceWritableKeyPath<T, DeepValue<T, P>>
  /** Identity key path: reads the root itself, writing replaces it */
  self: () => WritableKeyPath<T, T>
}

const checkedSegments = (path: string): readonly string[] => {
  guard.pathSegments(path)
  return dot.split(path)
}

export const keyPaths = <T extends object>(): KeyPathBuilder<T> => ({
  readonly: (path) => {
    const segments = checkedSegments(path)
    return Object.freeze({
      mode: 'readonly' as const,
      erasure: 'none' as const,
      segments,
      path: dot.join(segments),
      get: (root: T) => dot.get(root, path),
    })
  },

  writable: (path) => {
    const segments = checkedSegments(path)
    return Object.freeze({
      mode: 'value' as const,
      erasure: 'none' as const,
      segments,
      path: dot.join(segments),
      get: (root: T) => dot.get(root, path),
      set: (root: T, value: DeepValue<T, typeof path>) =>
        dot.update(root, path, value),
    })
  },

  referenceWritable: (path) => {
    const segments = checkedSegments(path)
    return Object.freeze({
      mode: 'reference' as const,
      erasure: 'none' as const,
      segments,
      path: dot.join(segments),
      get: (root: T) => dot.get(root, path),
      set: (root: T, value: DeepValue<T, typeof path>) => {
        dot.set(root, path, value)
      },
    })
  },

  self: () =>
    Object.freeze({
      mode: 'value' as const,
      erasure: 'none' as const,
      segments: [],
      path: '',
      get: (root: T) => root,
      set: (_root: T, value: T) => value,
    }),
})
