import { Schema } from 'effect'
import { Quantity, quantityOrder, toCanonical, type QuantitySpec } from './quantity.js'
import { makeUnitFamily } from './unit-family.js'

// ============================================
// Temperature Units
// ============================================

export const TemperatureUnit = Schema.Literal('Celsius', 'Fahrenheit', 'Kelvin')
export type TemperatureUnit = typeof TemperatureUnit.Type

const ABSOLUTE_ZERO_CELSIUS = 273.15
const ABSOLUTE_ZERO_RANKINE = 459.67

export const TemperatureUnits = makeUnitFamily<TemperatureUnit>({
  family: 'Temperature',
  unit: TemperatureUnit,
  units: TemperatureUnit.literals,
  normalize: (text) => text.replaceAll('°', '').toLowerCase().trim(),
  symbols: {
    Celsius: '°C',
    Fahrenheit: '°F',
    Kelvin: 'K',
  },
  aliases: {
    Celsius: ['c', 'celsius'],
    Fahrenheit: ['f', 'fahrenheit'],
    Kelvin: ['k', 'kelvin'],
  },
})

const TemperatureSpec: QuantitySpec<TemperatureUnit> = {
  units: TemperatureUnits,
  canonicalUnit: 'Kelvin',
  defaultUnit: 'Celsius',
  wireUnit: 'k',
  conversions: {
    Celsius: {
      toCanonical: (value) => value + ABSOLUTE_ZERO_CELSIUS,
      fromCanonical: (kelvin) => kelvin - ABSOLUTE_ZERO_CELSIUS,
    },
    Fahrenheit: {
      toCanonical: (value) => ((value + ABSOLUTE_ZERO_RANKINE) * 5) / 9,
      fromCanonical: (kelvin) => (kelvin * 9) / 5 - ABSOLUTE_ZERO_RANKINE,
    },
    Kelvin: {
      toCanonical: (value) => value,
      fromCanonical: (kelvin) => kelvin,
    },
  },
}

// ============================================
// Temperature
// ============================================

/**
 * A thermodynamic temperature, stored in kelvin. Values below absolute zero
 * are raised to 0 K; Celsius and Fahrenheit inputs may be negative.
 */
export class Temperature extends Quantity<Temperature, TemperatureUnit> {
  readonly _tag = 'Temperature' as const
  protected readonly spec = TemperatureSpec

  static readonly Spec = TemperatureSpec
  static readonly Order = quantityOrder<Temperature>()

  private constructor(kelvin: number) {
    super(kelvin)
  }

  static make(value: number, unit: TemperatureUnit = 'Kelvin'): Temperature {
    return new Temperature(toCanonical(TemperatureSpec, value, unit))
  }

  static readonly zero = Temperature.make(0)
  static readonly minValue = Temperature.make(0)
  static readonly maxValue = Temperature.make(Number.MAX_VALUE)

  static fromCelsius(value: number): Temperature {
    return Temperature.make(value, 'Celsius')
  }
  static fromFahrenheit(value: number): Temperature {
    return Temperature.make(value, 'Fahrenheit')
  }
  static fromKelvin(value: number): Temperature {
    return Temperature.make(value, 'Kelvin')
  }

  protected rewrap(kelvin: number): Temperature {
    return new Temperature(kelvin)
  }

  get celsius(): number {
    return this.to('Celsius')
  }
  get fahrenheit(): number {
    return this.to('Fahrenheit')
  }
  get kelvin(): number {
    return this.canonicalValue
  }

  withCelsius(value: number): Temperature {
    return this.with(value, 'Celsius')
  }
  withFahrenheit(value: number): Temperature {
    return this.with(value, 'Fahrenheit')
  }
  withKelvin(value: number): Temperature {
    return this.with(value, 'Kelvin')
  }
}
