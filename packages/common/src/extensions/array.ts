import { HashSet } from 'effect'

export const isIndexValid = <A>(self: ReadonlyArray<A>, index: number): boolean =>
  Number.isInteger(index) && index >= 0 && index < self.length

/** True when no two elements are `Equal.equals` */
export const isUnique = <A>(self: ReadonlyArray<A>): boolean => HashSet.size(HashSet.fromIterable(self)) === self.length

/** True when no two elements share a key under `Equal.equals` */
export const isUniqueBy = <A, K>(self: ReadonlyArray<A>, key: (a: A) => K): boolean =>
  isUnique(self.map(key))

/** Pairwise check, for element types without a structural hash */
export const isUniqueWith = <A>(self: ReadonlyArray<A>, isEquivalent: (a: A, b: A) => boolean): boolean =>
  self.every((a, i) => self.findIndex((b) => isEquivalent(a, b)) === i)
