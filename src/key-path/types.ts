/**
 * Key Path Types
 *
 * A key path is a first-class reference to a location inside a value of type
 * `Root` that holds a `Value`. Three capability variants exist, tagged by
 * `mode`:
 *
 * - `readonly`: read only
 * - `value`: writes return an updated copy of the owner
 * - `reference`: writes mutate the owner in place
 *
 * Erased forms (`PartialKeyPath`, `AnyKeyPath`) forget the value type, or the
 * root type as well, so key paths of different shapes can share a container.
 */

export type KeyPathMode = 'readonly' | 'value' | 'reference'

/** Static knowledge a key path still carries: none erased, value erased, all erased */
export type KeyPathErasure = 'none' | 'value' | 'all'

interface KeyPathShape {
  readonly mode: KeyPathMode
  /** Property names walked from the root, in order. Empty for the identity path. */
  readonly segments: readonly string[]
  /** Segments joined with '.', '' for the identity path */
  readonly path: string
}

export interface KeyPath<Root, Value> extends KeyPathShape {
  readonly erasure: 'none'
  get(root: Root): Value
}

/** A key path known to have no write capability */
export interface ReadonlyKeyPath<Root, Value> extends KeyPath<Root, Value> {
  readonly mode: 'readonly'
}

export interface WritableKeyPath<Root, Value> extends KeyPath<Root, Value> {
  readonly mode: 'value'
  /** Returns a copy of `root` holding `value` at this path. `root` is left untouched. */
  set(root: Root, value: Value): Root
}

export interface ReferenceWritableKeyPath<Root, Value>
  extends KeyPath<Root, Value> {
  readonly mode: 'reference'
  /** Stores `value` at this path inside `root` itself. */
  set(root: Root, value: Value): void
}

export interface PartialKeyPath<Root> extends KeyPathShape {
  readonly erasure: 'value'
  get(root: Root): unknown
}

export interface AnyKeyPath extends KeyPathShape {
  readonly erasure: 'all'
  /** `undefined` when `root` does not carry the path */
  get(root: unknown): unknown
}

/** Any key path at any erasure level */
export type SomeKeyPath<Root = never> =
  | KeyPath<Root, unknown>
  | PartialKeyPath<Root>
  | AnyKeyPath
