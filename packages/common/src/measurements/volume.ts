import { Schema } from 'effect'
import type { Distance } from './distance.js'
import { Conversion, Quantity, clampNonNegative, quantityOrder, toCanonical, type QuantitySpec } from './quantity.js'
import { makeUnitFamily, normalizeCompact } from './unit-family.js'

// ============================================
// Volume Units
// ============================================

export const VolumeUnit = Schema.Literal('CubicCentimeter', 'CubicMeter', 'CubicFeet', 'Liter', 'Milliliter', 'Gallon')
export type VolumeUnit = typeof VolumeUnit.Type

export const VolumeUnits = makeUnitFamily<VolumeUnit>({
  family: 'Volume',
  unit: VolumeUnit,
  units: VolumeUnit.literals,
  normalize: normalizeCompact,
  symbols: {
    CubicCentimeter: 'cm³',
    CubicMeter: 'm³',
    CubicFeet: 'ft³',
    Liter: 'l',
    Milliliter: 'ml',
    Gallon: 'gal',
  },
  aliases: {
    CubicCentimeter: ['cm³', 'cm3', 'cubiccentimeter', 'cubiccentimeters'],
    CubicMeter: ['m³', 'm3', 'cubicmeter', 'cubicmeters'],
    CubicFeet: ['ft³', 'ft3', 'cubicfoot', 'cubicfoots', 'cubicfeet', 'cubicfeets'],
    Liter: ['l', 'liter', 'liters'],
    Milliliter: ['ml', 'milliliter', 'milliliters'],
    Gallon: ['gal', 'gallon', 'gallons'],
  },
})

// The wire unit stays ASCII ("m3") while the display symbol is "m³"
const VolumeSpec: QuantitySpec<VolumeUnit> = {
  units: VolumeUnits,
  canonicalUnit: 'CubicMeter',
  defaultUnit: 'CubicMeter',
  wireUnit: 'm3',
  conversions: {
    CubicCentimeter: Conversion.multiplyBy(0.000001),
    CubicMeter: Conversion.identity,
    CubicFeet: Conversion.multiplyBy(0.0283168),
    Liter: Conversion.multiplyBy(0.001),
    Milliliter: Conversion.multiplyBy(0.000001),
    Gallon: Conversion.multiplyBy(0.00378541),
  },
}

// ============================================
// Volume
// ============================================

/**
 * A non-negative volume, stored in cubic meters.
 */
export class Volume extends Quantity<Volume, VolumeUnit> {
  readonly _tag = 'Volume' as const
  protected readonly spec = VolumeSpec

  static readonly Spec = VolumeSpec
  static readonly Order = quantityOrder<Volume>()

  private constructor(cubicMeters: number) {
    super(cubicMeters)
  }

  static make(value: number, unit: VolumeUnit = 'CubicMeter'): Volume {
    return new Volume(toCanonical(VolumeSpec, value, unit))
  }

  /** Box volume from three edge lengths */
  static fromDimensions(width: Distance, height: Distance, depth: Distance): Volume {
    return new Volume(clampNonNegative(width.meters * height.meters * depth.meters))
  }

  static readonly zero = Volume.make(0)
  static readonly minValue = Volume.make(0)
  static readonly maxValue = Volume.make(Number.MAX_VALUE)
  /** Same value as `maxValue`: infinite input clamps to the largest finite value */
  static readonly infinity = Volume.make(Number.POSITIVE_INFINITY)

  static fromCubicCentimeters(value: number): Volume {
    return Volume.make(value, 'CubicCentimeter')
  }
  static fromCubicMeters(value: number): Volume {
    return Volume.make(value, 'CubicMeter')
  }
  static fromCubicFeet(value: number): Volume {
    return Volume.make(value, 'CubicFeet')
  }
  static fromLiters(value: number): Volume {
    return Volume.make(value, 'Liter')
  }
  static fromMilliliters(value: number): Volume {
    return Volume.make(value, 'Milliliter')
  }
  static fromGallons(value: number): Volume {
    return Volume.make(value, 'Gallon')
  }

  protected rewrap(cubicMeters: number): Volume {
    return new Volume(cubicMeters)
  }

  get cubicCentimeters(): number {
    return this.to('CubicCentimeter')
  }
  get cubicMeters(): number {
    return this.canonicalValue
  }
  get cubicFeet(): number {
    return this.to('CubicFeet')
  }
  get liters(): number {
    return this.to('Liter')
  }
  get milliliters(): number {
    return this.to('Milliliter')
  }
  get gallons(): number {
    return this.to('Gallon')
  }

  withCubicCentimeters(value: number): Volume {
    return this.with(value, 'CubicCentimeter')
  }
  withCubicMeters(value: number): Volume {
    return this.with(value, 'CubicMeter')
  }
  withCubicFeet(value: number): Volume {
    return this.with(value, 'CubicFeet')
  }
  withLiters(value: number): Volume {
    return this.with(value, 'Liter')
  }
  withMilliliters(value: number): Volume {
    return this.with(value, 'Milliliter')
  }
  withGallons(value: number): Volume {
    return this.with(value, 'Gallon')
  }
}
