import { Either, Equal, Hash, Order } from 'effect'
import { IncomparableValueError, InvalidUnitError, UnitFormatError, type QuantityFamily } from '../errors/index.js'
import type { UnitFamily } from './unit-family.js'

// ============================================
// Conversions
// ============================================

/**
 * A pair of pure functions between a unit and the canonical unit of its family.
 */
export interface Conversion {
  readonly toCanonical: (value: number) => number
  readonly fromCanonical: (canonical: number) => number
}

export const Conversion = {
  identity: { toCanonical: (value: number) => value, fromCanonical: (canonical: number) => canonical },
  multiplyBy: (factor: number): Conversion => ({
    toCanonical: (value) => value * factor,
    fromCanonical: (canonical) => canonical / factor,
  }),
  divideBy: (divisor: number): Conversion => ({
    toCanonical: (value) => value / divisor,
    fromCanonical: (canonical) => canonical * divisor,
  }),
} as const

/** Clamps into `[0, Number.MAX_VALUE]`. NaN and -0 become 0, overflow becomes `Number.MAX_VALUE`. */
export const clampNonNegative = (value: number): number => (value > 0 ? Math.min(value, Number.MAX_VALUE) : 0)

/**
 * Static description of one quantity family.
 */
export interface QuantitySpec<U extends string> {
  readonly units: UnitFamily<U>
  readonly conversions: Readonly<Record<U, Conversion>>
  readonly canonicalUnit: U
  /** Unit used by `toString()` and by `format()` without argument */
  readonly defaultUnit: U
  /** Unit string written by the JSON codec */
  readonly wireUnit: string
}

const conversionFor = <U extends string>(spec: QuantitySpec<U>, unit: U): Conversion => {
  const conversion: Conversion | undefined = spec.conversions[unit]
  if (conversion === undefined) {
    throw new InvalidUnitError({
      family: spec.units.family,
      input: String(unit),
      message: `Invalid ${spec.units.family.toLowerCase()} unit: ${String(unit)}`,
    })
  }
  return conversion
}

export const toCanonical = <U extends string>(spec: QuantitySpec<U>, value: number, unit: U): number =>
  clampNonNegative(conversionFor(spec, unit).toCanonical(value))

export const fromCanonical = <U extends string>(spec: QuantitySpec<U>, canonical: number, unit: U): number =>
  conversionFor(spec, unit).fromCanonical(canonical)

// ============================================
// Quantity Base
// ============================================

/**
 * Immutable measurement holding a single non-negative value in the canonical
 * unit of its family. Equality, hashing and ordering look at that value only.
 */
export abstract class Quantity<Self extends Quantity<Self, U>, U extends string> implements Equal.Equal {
  abstract readonly _tag: QuantityFamily
  protected abstract readonly spec: QuantitySpec<U>

  protected constructor(readonly canonicalValue: number) {}

  protected abstract rewrap(canonical: number): Self

  /** The value expressed in `unit` */
  to(unit: U): number {
    return fromCanonical(this.spec, this.canonicalValue, unit)
  }

  /** A new quantity holding `value` interpreted in `unit` */
  with(value: number, unit: U): Self {
    return this.rewrap(toCanonical(this.spec, value, unit))
  }

  add(that: Self): Self {
    return this.rewrap(clampNonNegative(this.canonicalValue + that.canonicalValue))
  }

  subtract(that: Self): Self {
    return this.rewrap(clampNonNegative(this.canonicalValue - that.canonicalValue))
  }

  equals(that: Self): boolean {
    return this.canonicalValue === that.canonicalValue
  }

  /**
   * Total order on the canonical value. Untyped callers passing null or a
   * quantity of another kind get an `IncomparableValueError` thrown.
   */
  compareTo(that: Self): -1 | 0 | 1 {
    if (!(that instanceof Quantity) || that._tag !== this._tag) {
      throw new IncomparableValueError({
        expected: this._tag,
        message: `Object is not a ${this._tag}`,
      })
    }
    return Order.number(this.canonicalValue, that.canonicalValue)
  }

  formatIn(unit: U): string {
    return `${String(this.to(unit))} ${this.spec.units.format(unit)}`
  }

  /** Renders the value in the unit named by `format` (any accepted alias). */
  format(format?: string): Either.Either<string, UnitFormatError> {
    if (format === undefined || format === '') {
      return Either.right(this.formatIn(this.spec.defaultUnit))
    }
    return Either.match(this.spec.units.parse(format), {
      onLeft: () =>
        Either.left(
          new UnitFormatError({
            family: this._tag,
            format,
            message: `Invalid format string: ${format}`,
          }),
        ),
      onRight: (unit) => Either.right(this.formatIn(unit)),
    })
  }

  toString(): string {
    return this.formatIn(this.spec.defaultUnit)
  }

  /** Default wire shape, so `JSON.stringify` emits `{"value":…,"unit":…}` */
  toJSON(): { readonly value: number; readonly unit: string } {
    return { value: this.canonicalValue, unit: this.spec.wireUnit }
  }

  [Equal.symbol](that: Equal.Equal): boolean {
    return that instanceof Quantity && that._tag === this._tag && that.canonicalValue === this.canonicalValue
  }

  [Hash.symbol](): number {
    return Hash.combine(Hash.string(this._tag))(Hash.number(this.canonicalValue))
  }
}

/** Order by canonical value, for use with `Array.sort`, `Order.max` and friends */
export const quantityOrder = <Q extends { readonly canonicalValue: number }>(): Order.Order<Q> =>
  Order.mapInput(Order.number, (quantity: Q) => quantity.canonicalValue)
