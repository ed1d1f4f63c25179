import type { KeyPathConfig, ResolvedKeyPathConfig } from './types'

export const DEFAULT_CONFIG: ResolvedKeyPathConfig = {
  debug: {
    logSort: false,
    checkOrdering: false,
    timing: false,
    timingThreshold: 5,
  },
}

/** Fill the caller's partial config with defaults. Undefined flags keep the default. */
export const resolveConfig = (
  config: KeyPathConfig = {},
): ResolvedKeyPathConfig => {
  const debug = config.debug ?? {}
  const defaults = DEFAULT_CONFIG.debug
  return {
    debug: {
      logSort: debug.logSort ?? defaults.logSort,
      checkOrdering: debug.checkOrdering ?? defaults.checkOrdering,
      timing: debug.timing ?? defaults.timing,
      timingThreshold: debug.timingThreshold ?? defaults.timingThreshold,
      ...(debug.onSlowOperation
        ? { onSlowOperation: debug.onSlowOperation }
        : {}),
    },
  }
}
