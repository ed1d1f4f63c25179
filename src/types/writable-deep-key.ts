/**
 * WritableDeepKey - the subset of DeepKey<T> that can be assigned to.
 *
 * A path is writable when no property along it is declared `readonly`.
 * Arrays, records and functions are leaves here as in DeepKey.
 *
 * @example
 * ```typescript
 * type Cat = {
 *   readonly id: string
 *   name: string
 *   favoriteFood: { readonly name: string; calories: number }
 * }
 *
 * // WritableDeepKey<Cat> = "name" | "favoriteFood" | "favoriteFood.calories"
 * ```
 */

import type {
  AnyFunction,
  DefaultDepth,
  IsAny,
  LeafLike,
  Prev2,
} from './deep-key'

type IfEquals<X, Y, A, B> =
  (<G>() => G extends X ? 1 : 2) extends <G>() => G extends Y ? 1 : 2 ? A : B

type Mutable<T> = { -readonly [K in keyof T]: T[K] }

// Pick keeps the `?` and `readonly` modifiers of K, Mutable drops only `readonly`
type IsMutable<T, K extends keyof T> = IfEquals<
  Pick<T, K>,
  Mutable<Pick<T, K>>,
  true,
  false
>

/** Keys of T that are neither `readonly` nor methods. */
export type MutableKeys<T> = {
  [K in keyof T & string]: NonNullable<T[K]> extends AnyFunction
    ? never
    : IsMutable<T, K> extends true
      ? K
      : never
}[keyof T & string]

export type WritableDeepKey<
  T,
  Depth extends number = DefaultDepth,
> = WritableUnrolled<T, Depth> & string

type WritableUnrolled<T, Depth extends number> = Depth extends 0
  ? never
  : IsAny<T> extends true
    ? never
    : T extends LeafLike
      ? never
      : string extends keyof T
        ? never
        : {
            [K in keyof T & string]: NonNullable<T[K]> extends AnyFunction
              ? never
              : IsMutable<T, K> extends true
                ?
                    | K
                    | (NonNullable<T[K]> extends LeafLike
                        ? never
                        : WritableLevel2<NonNullable<T[K]>, K, Depth>)
                : never
          }[keyof T & string]

type WritableLevel2<V, ParentKey extends string, Depth extends number> =
  string extends keyof V
    ? never
    : {
        [K2 in keyof V & string]: NonNullable<V[K2]> extends AnyFunction
          ? never
          : IsMutable<V, K2> extends true
            ?
                | `${ParentKey}.${K2}`
                | (NonNullable<V[K2]> extends LeafLike
                    ? never
                    : `${ParentKey}.${K2}.${WritableUnrolled<NonNullable<V[K2]>, Prev2<Depth>> & string}`)
            : never
      }[keyof V & string]
