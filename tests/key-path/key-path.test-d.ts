/**
 * Type tests for key path construction and composition
 */

import { describe, expectTypeOf, it } from 'vitest'
import { z } from 'zod'

import {
  type AnyKeyPath,
  appendPath,
  eraseAll,
  eraseValue,
  isReadonly,
  type KeyPath,
  keyPaths,
  narrowValue,
  type PartialKeyPath,
  type ReadonlyKeyPath,
  type ReferenceWritableKeyPath,
  type WritableKeyPath,
} from '~/key-path'

import type { Cat, Food, Household } from '../fixtures/cats'

const cat = keyPaths<Cat>()
const food = keyPaths<Food>()
const household = keyPaths<Household>()

describe('keyPaths', () => {
  it('resolves the value type from the path', () => {
    expectTypeOf(cat.readonly('name')).toEqualTypeOf<KeyPath<Cat, string>>()
    expectTypeOf(cat.writable('favoriteFood.calories')).toEqualTypeOf<
      WritableKeyPath<Cat, number>
    >()
    expectTypeOf(cat.referenceWritable('favoriteFood')).toEqualTypeOf<
      ReferenceWritableKeyPath<Cat, Food>
    >()
    expectTypeOf(cat.self()).toEqualTypeOf<WritableKeyPath<Cat, Cat>>()
  })

  it('adds undefined below an optional property', () => {
    expectTypeOf(household.readonly('sitter.name').get).returns.toEqualTypeOf<
      string | undefined
    >()
  })

  it('returns the root from value writes and nothing from reference writes', () => {
    expectTypeOf(cat.writable('name').set).returns.toEqualTypeOf<Cat>()
    expectTypeOf(cat.referenceWritable('name').set).returns.toEqualTypeOf<void>()
  })

  it('rejects paths that do not exist', () => {
    // @ts-expect-error - no such property
    expectTypeOf(cat.readonly).toBeCallableWith('age')
    // @ts-expect-error - no such nested property
    expectTypeOf(cat.readonly).toBeCallableWith('favoriteFood.brand')
  })

  it('rejects writable paths through readonly properties', () => {
    expectTypeOf(household.readonly).toBeCallableWith('address')
    // @ts-expect-error - readonly property
    expectTypeOf(household.writable).toBeCallableWith('address')
    // @ts-expect-error - readonly property of a class
    expectTypeOf(household.referenceWritable).toBeCallableWith('owner.id')
  })

  it('narrows to the read-only variant', () => {
    const path: KeyPath<Cat, string> = cat.writable('name')
    if (isReadonly(path)) {
      expectTypeOf(path).toEqualTypeOf<ReadonlyKeyPath<Cat, string>>()
      expectTypeOf(path.mode).toEqualTypeOf<'readonly'>()
    }
  })

  it('has no setter on readonly paths', () => {
    expectTypeOf(cat.readonly('name')).not.toHaveProperty('set')
  })
})

describe('appendPath', () => {
  it('keeps value writability when both sides have it', () => {
    expectTypeOf(
      appendPath(cat.writable('favoriteFood'), food.writable('calories')),
    ).toEqualTypeOf<WritableKeyPath<Cat, number>>()
  })

  it('is reference writable when the tail is', () => {
    expectTypeOf(
      appendPath(cat.readonly('favoriteFood'), food.referenceWritable('calories')),
    ).toEqualTypeOf<ReferenceWritableKeyPath<Cat, number>>()
  })

  it('is reference writable for a reference head and a value tail', () => {
    expectTypeOf(
      appendPath(cat.referenceWritable('favoriteFood'), food.writable('calories')),
    ).toEqualTypeOf<ReferenceWritableKeyPath<Cat, number>>()
  })

  it('is read-only otherwise', () => {
    expectTypeOf(
      appendPath(cat.writable('favoriteFood'), food.readonly('calories')),
    ).toEqualTypeOf<KeyPath<Cat, number>>()
    expectTypeOf(
      appendPath(cat.readonly('favoriteFood'), food.writable('calories')),
    ).toEqualTypeOf<KeyPath<Cat, number>>()
  })
})

describe('erasure', () => {
  it('forgets the value type, then the root type', () => {
    expectTypeOf(eraseValue(cat.readonly('name'))).toEqualTypeOf<
      PartialKeyPath<Cat>
    >()
    expectTypeOf(eraseAll(cat.readonly('name'))).toEqualTypeOf<AnyKeyPath>()
  })

  it('narrows to an optional value', () => {
    const narrowed = narrowValue(eraseValue(cat.readonly('name')), z.string())
    expectTypeOf(narrowed).toEqualTypeOf<KeyPath<Cat, string | undefined>>()
  })
})
