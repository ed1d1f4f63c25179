/**
 * Type utilities for typed property paths
 *
 * - Path enumeration (DeepKey, ResolvableDeepKey, WritableDeepKey)
 * - Value resolution at a path (DeepValue)
 */

export type {
  AnyFunction,
  DeepKey,
  DefaultDepth,
  DepthLimitMarker,
  IsAny,
  LeafLike,
  Primitive,
  ResolvableDeepKey,
} from './deep-key'
export type { DeepValue } from './deep-value'
export type { MutableKeys, WritableDeepKey } from './writable-deep-key'
