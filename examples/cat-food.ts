/**
 * Cat food walkthrough: key paths, composition and keyed sorting.
 *
 * Run with `npm run example`.
 */

import {
  appendPath,
  ascending,
  keyPaths,
  sortedOn,
} from '../src'

export interface Food {
  name: string
  calories: number
}

export interface Cat {
  name: string
  favoriteFood: Food
}

// Chaining
const favoriteFood = keyPaths<Cat>().writable('favoriteFood')
const calories = keyPaths<Food>().writable('calories')
const favoriteFoodCalories = appendPath(favoriteFood, calories)

export const catFoodWalkthrough = (): string[] => {
  const skittles: Food = { name: 'Skittles', calories: 999 }
  const whiskers: Cat = { name: 'Whiskers', favoriteFood: skittles }
  const tacco: Cat = {
    name: 'Tacco',
    favoriteFood: { name: 'Tacco 🌮', calories: 723 },
  }
  const nala: Cat = {
    name: 'Nala',
    favoriteFood: { name: 'Fish 🐟', calories: 340 },
  }

  const lines: string[] = []
  lines.push(`${whiskers.name} eats ${String(favoriteFoodCalories.get(whiskers))} kcal`)

  // Sorting
  const cats = [whiskers, tacco, nala]
  const byName = sortedOn(cats, keyPaths<Cat>().readonly('name'), ascending)
  const byKcal = sortedOn(cats, favoriteFoodCalories, (a, b) => a < b)

  lines.push(`by name: ${byName.map((cat) => cat.name).join(', ')}`)
  lines.push(
    `by favourite food kcal: ${byKcal
      .map((cat) => `${cat.name} (${String(cat.favoriteFood.calories)})`)
      .join(', ')}`,
  )

  // Writing through a composed path leaves the original cat alone
  const dieting = favoriteFoodCalories.set(whiskers, 450)
  lines.push(
    `${dieting.name} on a diet eats ${String(dieting.favoriteFood.calories)} kcal, before ${String(whiskers.favoriteFood.calories)}`,
  )

  return lines
}

export const main = (): void => {
  for (const line of catFoodWalkthrough()) {
    console.log(line)
  }
}
