/**
 * Key path erasure
 *
 * Erasing trades static knowledge for the ability to store key paths of
 * different shapes side by side:
 *
 * - `eraseValue` keeps the root type, forgets the value type (PartialKeyPath)
 * - `eraseAll` forgets both (AnyKeyPath)
 *
 * Getting a typed value back is always an explicit narrowing step that can
 * fail: the value read through the erased path is checked against a zod
 * schema and `undefined` comes back on mismatch.
 *
 * @example
 * ```typescript
 * const columns: AnyKeyPath[] = [eraseAll(cat.readonly('name')), eraseAll(food.readonly('calories'))]
 *
 * readAs(columns[0], whiskers, z.string())   // 'Whiskers'
 * readAs(columns[0], whiskers, z.number())   // undefined
 * ```
 */

import type { z } from 'zod'

import { dot } from '../utils/dot'
import { is } from '../utils/is'
import type {
  AnyKeyPath,
  KeyPath,
  PartialKeyPath,
  SomeKeyPath,
} from './types'

/** Forget the value type, keep the root type. */
export const eraseValue = <Root, Value>(
  path: KeyPath<Root, Value>,
): PartialKeyPath<Root> =>
  Object.freeze({
    mode: path.mode,
    erasure: 'value' as const,
    segments: path.segments,
    path: path.path,
    get: (root: Root): unknown => path.get(root),
  })

/**
 * Forget every type. Reads walk the segments on whatever root they are given
 * and resolve to `undefined` where the root does not carry the path.
 */
export const eraseAll = <Root>(path: SomeKeyPath<Root>): AnyKeyPath => {
  const { segments } = path
  return Object.freeze({
    mode: path.mode,
    erasure: 'all' as const,
    segments,
    path: path.path,
    get: (root: unknown): unknown => dot.get__unsafe(root, segments),
  })
}

/** True when every segment of the path exists on `root`, own or inherited. */
export const resolves = (path: SomeKeyPath, root: unknown): boolean =>
  dot.has__unsafe(root, path.segments)

/**
 * Read through an erased path and narrow the value with a schema.
 * Returns the parsed value, or `undefined` when it does not match.
 */
export function readAs<Root, V>(
  path: PartialKeyPath<Root>,
  root: Root,
  schema: z.ZodType<V>,
): V | undefined
export function readAs<V>(
  path: AnyKeyPath,
  root: unknown,
  schema: z.ZodType<V>,
): V | undefined
export function readAs<V>(
  path: PartialKeyPath<unknown> | AnyKeyPath,
  root: unknown,
  schema: z.ZodType<V>,
): V | undefined {
  const result = schema.safeParse(path.get(root))
  return result.success ? result.data : undefined
}

/**
 * Recover a typed, read-only key path from a partial one. Every read is
 * validated, so the value type widens to `V | undefined`.
 */
export const narrowValue = <Root, V>(
  path: PartialKeyPath<Root>,
  schema: z.ZodType<V>,
): KeyPath<Root, V | undefined> =>
  Object.freeze({
    mode: 'readonly' as const,
    erasure: 'none' as const,
    segments: path.segments,
    path: path.path,
    get: (root: Root): V | undefined => {
      const result = schema.safeParse(path.get(root))
      return result.success ? result.data : undefined
    },
  })

/** Same location and same capability, at any erasure level. */
export const isSamePath = (a: SomeKeyPath, b: SomeKeyPath): boolean =>
  a.mode === b.mode && is.sameSequence(a.segments, b.segments)
