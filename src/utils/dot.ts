/**
 * Deep access utilities for nested object access
 *
 * Uses native Reflect for reads and writes. Paths are dot-notation strings
 * on the typed entry points and pre-split segment lists on the `__unsafe`
 * ones, which the key-path layer calls with segments it already owns.
 */

import type { DeepKey, DeepValue, WritableDeepKey } from '../types'
import { is } from './is'

type Segments = readonly string[]

// Cache split paths to avoid repeated string splitting overhead
const pathCache = new Map<string, Segments>()
const MAX_CACHE_SIZE = 1000

const split = (path: string): Segments => {
  let parts = pathCache.get(path)
  if (!parts) {
    parts = path === '' ? [] : Object.freeze(path.split('.'))
    if (pathCache.size >= MAX_CACHE_SIZE) {
      pathCache.clear()
    }
    pathCache.set(path, parts)
  }
  return parts
}

const join = (segments: Segments): string => segments.join('.')

/** Shallow copy that keeps arrays as arrays and class instances on their prototype */
const shallowCopy = (value: object): object => {
  if (is.array(value)) return value.slice()
  const copy: object = Object.create(Object.getPrototypeOf(value))
  return Object.assign(copy, value)
}

const get__unsafe = (obj: unknown, segments: Segments): unknown => {
  let current = obj
  for (const part of segments) {
    if (!is.container(current)) {
      return undefined
    }
    current = Reflect.get(current, part)
  }
  return current
}

const set__unsafe = (obj: object, segments: Segments, value: unknown): void => {
  if (segments.length === 0) {
    throw new Error('Cannot assign to the root of an object in place.')
  }
  const last = segments.length - 1
  let current: object = obj
  for (let i = 0; i < last; i++) {
    const next: unknown = Reflect.get(current, segments[i]!)
    if (is.container(next)) {
      current = next
    } else {
      const created: object = {}
      Reflect.set(current, segments[i]!, created)
      current = created
    }
  }
  Reflect.set(current, segments[last]!, value)
}

const assignCopy = (
  container: unknown,
  segments: Segments,
  index: number,
  value: unknown,
): unknown => {
  if (index === segments.length) return value
  const source: object = is.container(container) ? container : {}
  const copy = shallowCopy(source)
  const key = segments[index]!
  Reflect.set(
    copy,
    key,
    assignCopy(Reflect.get(source, key), segments, index + 1, value),
  )
  return copy
}

const update__unsafe = (
  obj: unknown,
  segments: Segments,
  value: unknown,
): unknown => assignCopy(obj, segments, 0, value)

const has__unsafe = (obj: unknown, segments: Segments): boolean => {
  let current = obj
  for (const part of segments) {
    if (!is.container(current) || !(part in current)) {
      return false
    }
    current = Reflect.get(current, part)
  }
  return true
}

/**
 * Gets a value from a nested object using dot notation (type-safe)
 *
 * @example
 * ```typescript
 * const cat = { favoriteFood: { calories: 723 } }
 * dot.get(cat, 'favoriteFood.calories') // 723
 * ```
 */
const get = <T, P extends DeepKey<T>>(obj: T, path: P): DeepValue<T, P> =>
  get__unsafe(obj, split(path)) as DeepValue<T, P>

/**
 * Sets a value in a nested object in place. Missing intermediate
 * objects are created.
 *
 * @example
 * ```typescript
 * const cat = { favoriteFood: { calories: 723 } }
 * dot.set(cat, 'favoriteFood.calories', 700)
 * // cat.favoriteFood.calories is now 700
 * ```
 */
const set = <T extends object, P extends WritableDeepKey<T>>(
  obj: T,
  path: P,
  value: DeepValue<T, P>,
): void => {
  set__unsafe(obj, split(path), value)
}

/**
 * Returns a copy of `obj` with the value at `path` replaced. Every object on
 * the path is shallow-copied, everything else is shared with the input.
 *
 * @example
 * ```typescript
 * const cat = { name: 'Nala', favoriteFood: { calories: 340 } }
 * const next = dot.update(cat, 'favoriteFood.calories', 360)
 * // cat.favoriteFood.calories is still 340
 * ```
 */
const update = <T extends object, P extends WritableDeepKey<T>>(
  obj: T,
  path: P,
  value: DeepValue<T, P>,
): T => update__unsafe(obj, split(path), value) as T

/**
 * Checks that every segment of a path exists on the object
 * (own or inherited), whatever the value stored at the end.
 */
const has = <T extends object, P extends DeepKey<T>>(
  obj: T,
  path: P,
): boolean => has__unsafe(obj, split(path))

/**
 * Unified namespace for dot notation path operations
 *
 * Provides type-safe and unsafe variants for working with nested objects
 * using dot notation paths (e.g., 'favoriteFood.calories')
 */
export const dot = {
  split,
  join,
  get,
  get__unsafe,
  set,
  set__unsafe,
  update,
  update__unsafe,
  has,
  has__unsafe,
}
