/**
 * keyed-paths
 *
 * Typed property paths over plain TypeScript objects:
 * - Key paths with read-only, copy-on-write and in-place capabilities
 * - Composition of key paths end to end
 * - Erasure for heterogeneous storage, with schema-checked narrowing
 * - Sorting any iterable by the value a key path reaches
 */

// =============================================================================
// KEY PATHS
// =============================================================================

export {
  appendedMode,
  appendPath,
  eraseAll,
  eraseValue,
  isReadonly,
  isReferenceWritable,
  isSamePath,
  isWritable,
  keyPaths,
  narrowValue,
  readAs,
  resolves,
} from './key-path'
export type {
  AnyKeyPath,
  KeyPath,
  KeyPathBuilder,
  KeyPathErasure,
  KeyPathMode,
  PartialKeyPath,
  ReadonlyKeyPath,
  ReferenceWritableKeyPath,
  SomeKeyPath,
  WritableKeyPath,
  WritablePath,
} from './key-path'

// =============================================================================
// SORTING
// =============================================================================

export {
  ascending,
  comparing,
  descending,
  findOrderingViolations,
  localeAscending,
  sortedOn,
  sortOn,
} from './sort'
export type { Comparable, IsOrderedBefore } from './sort'

// =============================================================================
// CONFIGURATION & TYPES
// =============================================================================

export { DEFAULT_CONFIG } from './core'
export type {
  DebugConfig,
  KeyPathConfig,
  ResolvedDebugConfig,
  ResolvedKeyPathConfig,
} from './core'
export type {
  DeepKey,
  DeepValue,
  MutableKeys,
  ResolvableDeepKey,
  WritableDeepKey,
} from './types'
export type { OrderingViolation } from './utils/debug-log'
export { dot } from './utils/dot'
export type { OnSlowOperation, TimingEvent } from './utils/timing'
