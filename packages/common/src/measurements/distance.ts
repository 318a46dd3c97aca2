import { Schema } from 'effect'
import { Conversion, Quantity, quantityOrder, toCanonical, type QuantitySpec } from './quantity.js'
import { makeUnitFamily, normalizeCompact } from './unit-family.js'

// ============================================
// Distance Units
// ============================================

export const DistanceUnit = Schema.Literal(
  'Millimeter',
  'Centimeter',
  'Meter',
  'Kilometer',
  'Inch',
  'Foot',
  'Yard',
  'Mile',
  'NauticalMile',
)
export type DistanceUnit = typeof DistanceUnit.Type

export const DistanceUnits = makeUnitFamily<DistanceUnit>({
  family: 'Distance',
  unit: DistanceUnit,
  units: DistanceUnit.literals,
  normalize: normalizeCompact,
  symbols: {
    Millimeter: 'mm',
    Centimeter: 'cm',
    Meter: 'm',
    Kilometer: 'km',
    Inch: 'in',
    Foot: 'ft',
    Yard: 'yd',
    Mile: 'mi',
    NauticalMile: 'nmi',
  },
  aliases: {
    Millimeter: ['mm', 'millimeter', 'millimeters'],
    Centimeter: ['cm', 'centimeter', 'centimeters'],
    Meter: ['m', 'meter', 'meters'],
    Kilometer: ['km', 'kilometer', 'kilometers'],
    Inch: ['in', 'inch', 'inches'],
    Foot: ['ft', 'foot', 'feet'],
    Yard: ['yd', 'yard', 'yards'],
    Mile: ['mi', 'mile', 'miles'],
    NauticalMile: ['nmi', 'nauticalmile', 'nauticalmiles'],
  },
})

const DistanceSpec: QuantitySpec<DistanceUnit> = {
  units: DistanceUnits,
  canonicalUnit: 'Meter',
  defaultUnit: 'Meter',
  wireUnit: 'm',
  conversions: {
    Millimeter: Conversion.divideBy(1000),
    Centimeter: Conversion.divideBy(100),
    Meter: Conversion.identity,
    Kilometer: Conversion.multiplyBy(1000),
    Inch: Conversion.multiplyBy(0.0254),
    Foot: Conversion.multiplyBy(0.3048),
    Yard: Conversion.multiplyBy(0.9144),
    Mile: Conversion.multiplyBy(1609.34),
    NauticalMile: Conversion.multiplyBy(1852),
  },
}

// ============================================
// Distance
// ============================================

/**
 * A non-negative length, stored in meters.
 */
export class Distance extends Quantity<Distance, DistanceUnit> {
  readonly _tag = 'Distance' as const
  protected readonly spec = DistanceSpec

  static readonly Spec = DistanceSpec
  static readonly Order = quantityOrder<Distance>()

  private constructor(meters: number) {
    super(meters)
  }

  static make(value: number, unit: DistanceUnit = 'Meter'): Distance {
    return new Distance(toCanonical(DistanceSpec, value, unit))
  }

  static readonly zero = Distance.make(0)
  static readonly minValue = Distance.make(0)
  static readonly maxValue = Distance.make(Number.MAX_VALUE)

  static fromMillimeters(value: number): Distance {
    return Distance.make(value, 'Millimeter')
  }
  static fromCentimeters(value: number): Distance {
    return Distance.make(value, 'Centimeter')
  }
  static fromMeters(value: number): Distance {
    return Distance.make(value, 'Meter')
  }
  static fromKilometers(value: number): Distance {
    return Distance.make(value, 'Kilometer')
  }
  static fromInches(value: number): Distance {
    return Distance.make(value, 'Inch')
  }
  static fromFeet(value: number): Distance {
    return Distance.make(value, 'Foot')
  }
  static fromYards(value: number): Distance {
    return Distance.make(value, 'Yard')
  }
  static fromMiles(value: number): Distance {
    return Distance.make(value, 'Mile')
  }
  static fromNauticalMiles(value: number): Distance {
    return Distance.make(value, 'NauticalMile')
  }

  protected rewrap(meters: number): Distance {
    return new Distance(meters)
  }

  get millimeters(): number {
    return this.to('Millimeter')
  }
  get centimeters(): number {
    return this.to('Centimeter')
  }
  get meters(): number {
    return this.canonicalValue
  }
  get kilometers(): number {
    return this.to('Kilometer')
  }
  get inches(): number {
    return this.to('Inch')
  }
  get feet(): number {
    return this.to('Foot')
  }
  get yards(): number {
    return this.to('Yard')
  }
  get miles(): number {
    return this.to('Mile')
  }
  get nauticalMiles(): number {
    return this.to('NauticalMile')
  }

  withMillimeters(value: number): Distance {
    return this.with(value, 'Millimeter')
  }
  withCentimeters(value: number): Distance {
    return this.with(value, 'Centimeter')
  }
  withMeters(value: number): Distance {
    return this.with(value, 'Meter')
  }
  withKilometers(value: number): Distance {
    return this.with(value, 'Kilometer')
  }
  withInches(value: number): Distance {
    return this.with(value, 'Inch')
  }
  withFeet(value: number): Distance {
    return this.with(value, 'Foot')
  }
  withYards(value: number): Distance {
    return this.with(value, 'Yard')
  }
  withMiles(value: number): Distance {
    return this.with(value, 'Mile')
  }
  withNauticalMiles(value: number): Distance {
    return this.with(value, 'NauticalMile')
  }
}
