/**
 * DeepValue utility type
 *
 * Extracts the value type for a given dot-notation path string.
 * An optional (nullable) hop on the way adds `undefined` to the result,
 * since reading stops there.
 *
 * @example
 * ```typescript
 * type Cat = {
 *   favoriteFood: { name: string; calories: number }
 *   owner?: { name: string }
 * }
 *
 * // DeepValue<Cat, "favoriteFood.calories"> = number
 * // DeepValue<Cat, "owner.name"> = string | undefined
 * ```
 */

import type { IsAny } from './deep-key'

type Nullish<T> = T extends null | undefined ? undefined : never

export type DeepValue<T, Path extends string> =
  IsAny<T> extends true
    ? never
    : Path extends ''
      ? T
      : Path extends `${infer First}.${infer Rest}`
        ? First extends keyof NonNullable<T>
          ? DeepValue<NonNullable<T>[First], Rest> | Nullish<T>
          : unknown
        : Path extends keyof NonNullable<T>
          ? NonNullable<T>[Path] | Nullish<T>
          : unknown
