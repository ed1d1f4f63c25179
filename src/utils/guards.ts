/**
 * Runtime Guards and Validation
 *
 * Guards are always called at call sites; they self-gate internally.
 * Dev-only checks are tree-shaken in production builds.
 */

/**
 * Development mode flag.
 *
 * - Bundlers (Vite, Next.js, Webpack, esbuild) replace at build time
 * - typeof check prevents ReferenceError in edge runtimes
 * - Evaluates to `false` in production → dead-code eliminated
 */
export const __DEV__ =
  typeof process !== 'undefined' &&
  typeof process.env !== 'undefined' &&
  process.env.NODE_ENV !== 'production'

/**
 * Centralized guard object. Always call, internally decides whether to act.
 *
 * - `pathSegments`: Always runs (a malformed path can never resolve)
 */
export const guard = {
  /**
   * Rejects key paths that slipped past the DeepKey types: empty segments
   * ("a..b", ".a", "a.") and the `??` depth-limit marker.
   *
   * The empty string is the identity path and is accepted.
   *
   * @throws Error naming the offending path
   *
   * @example
   * ```typescript
   * guard.pathSegments('favoriteFood.calories') // OK
   * guard.pathSegments('favoriteFood..calories') // throws
   * guard.pathSegments('a.b.??') // throws
   * ```
   */
  pathSegments: (path: string): void => {
    if (path === '') return
    for (const part of path.split('.')) {
      if (part === '') {
        throw new Error(`Invalid key path '${path}': empty segment.`)
      }
      if (part === '??') {
        throw new Error(
          `Invalid key path '${path}': '??' marks the DeepKey depth limit. Increase the depth or shorten the path.`,
        )
      }
    }
  },
} as const
