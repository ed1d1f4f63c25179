/**
 * DeepKey utility type
 *
 * Generates a union of every dot-notation path reachable on an object type.
 * Arrays, functions and string-indexed records are treated as leaves: the
 * path to them is emitted, nothing below them is.
 *
 * Uses loop unrolling: processes 2 nesting levels per recursion call,
 * halving recursion depth while keeping the bottom-up evaluation that
 * TypeScript can cache (no prefix parameter).
 *
 * @example
 * ```typescript
 * type Cat = {
 *   name: string
 *   favoriteFood: { name: string; calories: number }
 * }
 *
 * // DeepKey<Cat> = "name" | "favoriteFood" | "favoriteFood.name" | "favoriteFood.calories"
 * ```
 *
 * @example Depth limit marker: `??` appears at the cutoff point
 * ```typescript
 * type Paths = DeepKey<VeryDeepType, 4>
 * // "a.b.c.d.??" signals that the type goes deeper than the limit
 * ```
 */

export type Primitive =
  | string
  | number
  | boolean
  | bigint
  | symbol
  | null
  | undefined

export type IsAny<T> = 0 extends 1 & T ? true : false

/**
 * Types never descended into. Their own path is still a valid key.
 */
export type LeafLike =
  | Primitive
  | Date
  | RegExp
  | readonly unknown[]
  | ((...args: never[]) => unknown)

/**
 * Default recursion depth for DeepKey and the types built on it
 * (WritableDeepKey, ResolvableDeepKey).
 */
export type DefaultDepth = 10

/**
 * Marker emitted when DeepKey reaches its depth limit on an object type,
 * or when it meets an `any`-typed property (unknowable structure).
 */
export type DepthLimitMarker = '??'

export type DeepKey<T, Depth extends number = DefaultDepth> = DeepKeyUnrolled<
  T,
  Depth
> &
  string

/**
 * DeepKey with `??` marker paths excluded. Use where a path must resolve to a
 * real value type (key-path construction, DeepValue lookups).
 */
export type ResolvableDeepKey<T, Depth extends number = DefaultDepth> = Exclude<
  DeepKey<T, Depth>,
  `${string}??` | '??'
>

export type AnyFunction = (...args: never[]) => unknown

type DeepKeyUnrolled<T, Depth extends number> = Depth extends 0
  ? T extends LeafLike
    ? never
    : DepthLimitMarker
  : IsAny<T> extends true
    ? never
    : T extends LeafLike
      ? never
      : string extends keyof T
        ? never
        : {
            [K in keyof T & string]: NonNullable<T[K]> extends AnyFunction
              ? never
              :
                  | K
                  | (IsAny<T[K]> extends true
                      ? `${K}.${DepthLimitMarker}`
                      : NonNullable<T[K]> extends LeafLike
                        ? never
                        : Level2<NonNullable<T[K]>, K, Depth>)
          }[keyof T & string]

/**
 * Level 2 expansion: enumerates V's keys inline and recurses for level 3+.
 */
type Level2<V, ParentKey extends string, Depth extends number> =
  string extends keyof V
    ? never
    : {
        [K2 in keyof V & string]: NonNullable<V[K2]> extends AnyFunction
          ? never
          :
              | `${ParentKey}.${K2}`
              | (IsAny<V[K2]> extends true
                  ? `${ParentKey}.${K2}.${DepthLimitMarker}`
                  : NonNullable<V[K2]> extends LeafLike
                    ? never
                    : `${ParentKey}.${K2}.${DeepKeyUnrolled<NonNullable<V[K2]>, Prev2<Depth>> & string}`)
      }[keyof V & string]

// Depth counter: decrement by 2, handling odd depths
export type Prev2<N extends number> = N extends 10
  ? 8
  : N extends 9
    ? 7
    : N extends 8
      ? 6
      : N extends 7
        ? 5
        : N extends 6
          ? 4
          : N extends 5
            ? 3
            : N extends 4
              ? 2
              : N extends 3
                ? 1
                : N extends 2
                  ? 0
                  : N extends 1
                    ? 0
                    : never
