import { describe, expect, it } from '@effect/vitest'
import { Effect } from 'effect'
import { Distance } from '../measurements/distance.js'
import { isIndexValid, isUnique, isUniqueBy, isUniqueWith } from './array.js'

describe('array helpers', () => {
  it.effect('isIndexValid', () =>
    Effect.gen(function* () {
      const items = ['a', 'b', 'c']
      expect(isIndexValid(items, 0)).toBe(true)
      expect(isIndexValid(items, 2)).toBe(true)
      expect(isIndexValid(items, 3)).toBe(false)
      expect(isIndexValid(items, -1)).toBe(false)
      expect(isIndexValid(items, 1.5)).toBe(false)
    }),
  )

  it.effect('isUnique uses structural equality', () =>
    Effect.gen(function* () {
      expect(isUnique([1, 2, 3])).toBe(true)
      expect(isUnique([1, 2, 1])).toBe(false)
      expect(isUnique([Distance.make(1, 'Kilometer'), Distance.make(1000)])).toBe(false)
      expect(isUnique([])).toBe(true)
    }),
  )

  it.effect('isUniqueBy compares keys', () =>
    Effect.gen(function* () {
      expect(isUniqueBy([{ id: 1 }, { id: 2 }], (item) => item.id)).toBe(true)
      expect(isUniqueBy([{ id: 1 }, { id: 2 }, { id: 1 }], (item) => item.id)).toBe(false)
    }),
  )

  it.effect('isUniqueWith uses the given equivalence', () =>
    Effect.gen(function* () {
      const sameLetter = (a: string, b: string) => a.toLowerCase() === b.toLowerCase()
      expect(isUniqueWith(['a', 'B'], sameLetter)).toBe(true)
      expect(isUniqueWith(['a', 'A'], sameLetter)).toBe(false)
    }),
  )
})
