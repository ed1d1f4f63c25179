/**
 * Core module exports
 */

export { DEFAULT_CONFIG, resolveConfig } from './defaults'
export type {
  DebugConfig,
  KeyPathConfig,
  ResolvedDebugConfig,
  ResolvedKeyPathConfig,
} from './types'
