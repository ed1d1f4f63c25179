/**
 * Core Types
 *
 * Configuration shared by the sort utilities and the debug tooling.
 */

import type { OnSlowOperation } from '../utils/timing'

/**
 * Debug configuration for development tooling
 */
export interface DebugConfig {
  /** Log each sort: path, element count, resolved keys (default: false) */
  logSort?: boolean
  /** Check output keys and warn when the predicate is not a strict weak ordering (default: false) */
  checkOrdering?: boolean
  /** Enable timing measurement for sorts */
  timing?: boolean
  /** Threshold in milliseconds for slow operation warnings (default: 5ms) */
  timingThreshold?: number
  /**
   * Receives slow-sort reports instead of `console.warn`.
   * Each reporter hears about a given path and predicate once.
   */
  onSlowOperation?: OnSlowOperation
}

export interface KeyPathConfig {
  /** Debug configuration for development tooling */
  debug?: DebugConfig
}

/** Debug flags after defaults are applied. The reporter stays optional. */
export type ResolvedDebugConfig = Required<
  Omit<DebugConfig, 'onSlowOperation'>
> &
  Pick<DebugConfig, 'onSlowOperation'>

export interface ResolvedKeyPathConfig {
  debug: ResolvedDebugConfig
}
