/**
 * Type tests for DeepKey utility
 *
 * These tests verify that DeepKey enumerates every data path of a type,
 * stops at leaves, and marks its depth limit.
 */

import { describe, expectTypeOf, it } from 'vitest'

import type { DeepKey, ResolvableDeepKey } from '~/types'

import type { Cat, Household } from '../fixtures/cats'

describe('DeepKey', () => {
  it('enumerates nested paths', () => {
    expectTypeOf<DeepKey<Cat>>().toEqualTypeOf<
      'name' | 'favoriteFood' | 'favoriteFood.name' | 'favoriteFood.calories'
    >()
  })

  it('skips methods, stops at arrays and walks optional objects', () => {
    expectTypeOf<DeepKey<Household>>().toEqualTypeOf<
      | 'address'
      | 'owner'
      | 'owner.name'
      | 'owner.id'
      | 'pet'
      | 'pet.name'
      | 'pet.favoriteFood'
      | 'pet.favoriteFood.name'
      | 'pet.favoriteFood.calories'
      | 'sitter'
      | 'sitter.name'
      | 'sitter.phone'
      | 'tags'
    >()
  })

  it('treats dates and records as leaves', () => {
    interface Visit {
      at: Date
      notes: Record<string, string>
    }
    expectTypeOf<DeepKey<Visit>>().toEqualTypeOf<'at' | 'notes'>()
  })

  it('emits the ?? marker at the depth limit', () => {
    interface Deep {
      a: { b: { c: { d: string } } }
    }
    expectTypeOf<DeepKey<Deep, 2>>().toEqualTypeOf<'a' | 'a.b' | 'a.b.??'>()
    expectTypeOf<ResolvableDeepKey<Deep, 2>>().toEqualTypeOf<'a' | 'a.b'>()
  })
})
