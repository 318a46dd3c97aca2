import { Schema } from 'effect'
import { Conversion, Quantity, quantityOrder, toCanonical, type QuantitySpec } from './quantity.js'
import { makeUnitFamily, normalizeCompact } from './unit-family.js'

// ============================================
// Weight Units
// ============================================

export const WeightUnit = Schema.Literal(
  'Microgram',
  'Milligram',
  'Gram',
  'Kilogram',
  'Ton',
  'Pound',
  'Ounce',
  'Stone',
  'Carat',
  'LongTon',
  'ShortTon',
)
export type WeightUnit = typeof WeightUnit.Type

/**
 * Note the two "st" spellings: `st.` is the stone, bare `st` the short ton.
 */
export const WeightUnits = makeUnitFamily<WeightUnit>({
  family: 'Weight',
  unit: WeightUnit,
  units: WeightUnit.literals,
  normalize: normalizeCompact,
  symbols: {
    Microgram: 'µg',
    Milligram: 'mg',
    Gram: 'g',
    Kilogram: 'kg',
    Ton: 't',
    Pound: 'lb',
    Ounce: 'oz',
    Stone: 'st.',
    Carat: 'ct',
    LongTon: 'lt',
    ShortTon: 'st',
  },
  aliases: {
    Microgram: ['µg', 'μg', 'microgram', 'micrograms'],
    Milligram: ['mg', 'milligram', 'milligrams'],
    Gram: ['g', 'gram', 'grams'],
    Kilogram: ['kg', 'kilogram', 'kilograms'],
    Ton: ['t', 'ton', 'tons'],
    Pound: ['lb', 'pound', 'pounds'],
    Ounce: ['oz', 'ounce', 'ounces'],
    Stone: ['st.', 'stone', 'stones'],
    Carat: ['ct', 'carat', 'carats'],
    LongTon: ['lt', 'longton', 'longtons'],
    ShortTon: ['st', 'shortton', 'shorttons'],
  },
})

const WeightSpec: QuantitySpec<WeightUnit> = {
  units: WeightUnits,
  canonicalUnit: 'Gram',
  defaultUnit: 'Gram',
  wireUnit: 'g',
  conversions: {
    Microgram: Conversion.divideBy(1_000_000),
    Milligram: Conversion.divideBy(1000),
    Gram: Conversion.identity,
    Kilogram: Conversion.multiplyBy(1000),
    Ton: Conversion.multiplyBy(1_000_000),
    Pound: Conversion.multiplyBy(453.59237),
    Ounce: Conversion.multiplyBy(28.349523125),
    Stone: Conversion.multiplyBy(6350.29318),
    Carat: Conversion.divideBy(5),
    LongTon: Conversion.multiplyBy(1_016_046.9088),
    ShortTon: Conversion.multiplyBy(907_184.74),
  },
}

// ============================================
// Weight
// ============================================

/**
 * A non-negative mass, stored in grams.
 */
export class Weight extends Quantity<Weight, WeightUnit> {
  readonly _tag = 'Weight' as const
  protected readonly spec = WeightSpec

  static readonly Spec = WeightSpec
  static readonly Order = quantityOrder<Weight>()

  private constructor(grams: number) {
    super(grams)
  }

  static make(value: number, unit: WeightUnit = 'Gram'): Weight {
    return new Weight(toCanonical(WeightSpec, value, unit))
  }

  static readonly zero = Weight.make(0)
  static readonly minValue = Weight.make(0)
  static readonly maxValue = Weight.make(Number.MAX_VALUE)
  /** Same value as `maxValue`: infinite input clamps to the largest finite value */
  static readonly infinity = Weight.make(Number.POSITIVE_INFINITY)

  static fromMicrograms(value: number): Weight {
    return Weight.make(value, 'Microgram')
  }
  static fromMilligrams(value: number): Weight {
    return Weight.make(value, 'Milligram')
  }
  static fromGrams(value: number): Weight {
    return Weight.make(value, 'Gram')
  }
  static fromKilograms(value: number): Weight {
    return Weight.make(value, 'Kilogram')
  }
  static fromTons(value: number): Weight {
    return Weight.make(value, 'Ton')
  }
  static fromPounds(value: number): Weight {
    return Weight.make(value, 'Pound')
  }
  static fromOunces(value: number): Weight {
    return Weight.make(value, 'Ounce')
  }
  static fromStones(value: number): Weight {
    return Weight.make(value, 'Stone')
  }
  static fromCarats(value: number): Weight {
    return Weight.make(value, 'Carat')
  }
  static fromLongTons(value: number): Weight {
    return Weight.make(value, 'LongTon')
  }
  static fromShortTons(value: number): Weight {
    return Weight.make(value, 'ShortTon')
  }

  protected rewrap(grams: number): Weight {
    return new Weight(grams)
  }

  get micrograms(): number {
    return this.to('Microgram')
  }
  get milligrams(): number {
    return this.to('Milligram')
  }
  get grams(): number {
    return this.canonicalValue
  }
  get kilograms(): number {
    return this.to('Kilogram')
  }
  get tons(): number {
    return this.to('Ton')
  }
  get pounds(): number {
    return this.to('Pound')
  }
  get ounces(): number {
    return this.to('Ounce')
  }
  get stones(): number {
    return this.to('Stone')
  }
  get carats(): number {
    return this.to('Carat')
  }
  get longTons(): number {
    return this.to('LongTon')
  }
  get shortTons(): number {
    return this.to('ShortTon')
  }

  withMicrograms(value: number): Weight {
    return this.with(value, 'Microgram')
  }
  withMilligrams(value: number): Weight {
    return this.with(value, 'Milligram')
  }
  withGrams(value: number): Weight {
    return this.with(value, 'Gram')
  }
  withKilograms(value: number): Weight {
    return this.with(value, 'Kilogram')
  }
  withTons(value: number): Weight {
    return this.with(value, 'Ton')
  }
  withPounds(value: number): Weight {
    return this.with(value, 'Pound')
  }
  withOunces(value: number): Weight {
    return this.with(value, 'Ounce')
  }
  withStones(value: number): Weight {
    return this.with(value, 'Stone')
  }
  withCarats(value: number): Weight {
    return this.with(value, 'Carat')
  }
  withLongTons(value: number): Weight {
    return this.with(value, 'LongTon')
  }
  withShortTons(value: number): Weight {
    return this.with(value, 'ShortTon')
  }
}
