import { afterEach, describe, expect, it, vi } from 'vitest'

import { catFoodWalkthrough, main } from '../../examples/cat-food'

afterEach(() => {
  vi.restoreAllMocks()
})

describe('cat food walkthrough', () => {
  it('should produce the walkthrough lines', () => {
    expect(catFoodWalkthrough()).toEqual([
      'Whiskers eats 999 kcal',
      'by name: Nala, Tacco, Whiskers',
      'by favourite food kcal: Nala (340), Tacco (723), Whiskers (999)',
      'Whiskers on a diet eats 450 kcal, before 999',
    ])
  })

  it('should print each line', () => {
    const log = vi.spyOn(console, 'log').mockImplementation(() => {})
    main()
    expect(log).toHaveBeenCalledTimes(4)
    expect(log).toHaveBeenNthCalledWith(1, 'Whiskers eats 999 kcal')
  })
})
