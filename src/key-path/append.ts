/**
 * Key path composition
 *
 * `appendPath(head, tail)` joins a `Root → Middle` path with a
 * `Middle → Value` path into a `Root → Value` path. Neither input changes.
 *
 * The capability of the result follows its weakest hop, except that a
 * reference-writable hop makes everything before it irrelevant for writing:
 *
 * | head \ tail | readonly | value     | reference |
 * |-------------|----------|-----------|-----------|
 * | readonly    | readonly | readonly  | reference |
 * | value       | readonly | value     | reference |
 * | reference   | readonly | reference | reference |
 *
 * @example
 * ```typescript
 * const favoriteFood = keyPaths<Cat>().writable('favoriteFood')
 * const calories = keyPaths<Food>().writable('calories')
 *
 * const kcal = appendPath(favoriteFood, calories) // WritableKeyPath<Cat, number>
 * kcal.get(whiskers) // 999
 * ```
 */

import { is } from '../utils/is'
import { isReferenceWritable, isWritable } from './guards'
import type {
  KeyPath,
  KeyPathMode,
  ReferenceWritableKeyPath,
  WritableKeyPath,
} from './types'

export const appendedMode = (
  head: KeyPathMode,
  tail: KeyPathMode,
): KeyPathMode => {
  if (tail === 'reference') return 'reference'
  if (tail === 'readonly' || head === 'readonly') return 'readonly'
  return head
}

const describe = (segments: readonly string[]): string =>
  segments.length === 0 ? '(self)' : segments.join('.')

export function appendPath<Root, Middle, Value>(
  head: ReferenceWritableKeyPath<Root, Middle>,
  tail:
    | WritableKeyPath<Middle, Value>
    | ReferenceWritableKeyPath<Middle, Value>,
): ReferenceWritableKeyPath<Root, Value>
export function appendPath<Root, Middle, Value>(
  head: KeyPath<Root, Middle>,
  tail: ReferenceWritableKeyPath<Middle, Value>,
): ReferenceWritableKeyPath<Root, Value>
export function appendPath<Root, Middle, Value>(
  head: WritableKeyPath<Root, Middle>,
  tail: WritableKeyPath<Middle, Value>,
): WritableKeyPath<Root, Value>
export function appendPath<Root, Middle, Value>(
  head: KeyPath<Root, Middle>,
  tail: KeyPath<Middle, Value>,
): KeyPath<Root, Value>
export function appendPath(
  head: KeyPath<unknown, unknown>,
  tail: KeyPath<unknown, unknown>,
): KeyPath<unknown, unknown> {
  const segments = Object.freeze([...head.segments, ...tail.segments])
  const path = segments.join('.')
  const get = (root: unknown): unknown => tail.get(head.get(root))
  const mode = appendedMode(head.mode, tail.mode)

  if (mode === 'reference' && isReferenceWritable(tail)) {
    const inner = tail
    return Object.freeze({
      mode: 'reference' as const,
      erasure: 'none' as const,
      segments,
      path,
      get,
      set: (root: unknown, value: unknown): void => {
        const middle = head.get(root)
        if (!is.container(middle)) {
          throw new Error(
            `Cannot write through '${path}': '${describe(head.segments)}' does not hold an object.`,
          )
        }
        inner.set(middle, value)
      },
    })
  }

  if (mode === 'reference' && isReferenceWritable(head) && isWritable(tail)) {
    const outer = head
    const inner = tail
    return Object.freeze({
      mode: 'reference' as const,
      erasure: 'none' as const,
      segments,
      path,
      get,
      set: (root: unknown, value: unknown): void => {
        outer.set(root, inner.set(outer.get(root), value))
      },
    })
  }

  if (mode === 'value' && isWritable(head) && isWritable(tail)) {
    const outer = head
    const inner = tail
    return Object.freeze({
      mode: 'value' as const,
      erasure: 'none' as const,
      segments,
      path,
      get,
      set: (root: unknown, value: unknown): unknown =>
        outer.set(root, inner.set(outer.get(root), value)),
    })
  }

  return Object.freeze({
    mode: 'readonly' as const,
    erasure: 'none' as const,
    segments,
    path,
    get,
  })
}
