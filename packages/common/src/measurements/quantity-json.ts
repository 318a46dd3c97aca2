import { Either } from 'effect'
import { optionalNumber, optionalString, readObject, writeObject, type JsonCodec } from '../json/codec.js'
import { defaultJsonOptions } from '../json/options.js'
import { Distance } from './distance.js'
import type { QuantitySpec } from './quantity.js'
import { Temperature } from './temperature.js'
import { Volume } from './volume.js'
import { Weight } from './weight.js'

// ============================================
// Quantity Codecs
// ============================================

/**
 * `{"value": <canonical>, "unit": <wire unit>}`. On read a missing value
 * means 0 and a missing unit means the canonical unit; the value is
 * interpreted in whatever unit the document names.
 */
export const makeQuantityCodec = <Q extends { readonly canonicalValue: number }, U extends string>(
  name: string,
  spec: QuantitySpec<U>,
  make: (value: number, unit: U) => Q,
): JsonCodec<Q> => ({
  name,
  encode: (quantity, options = defaultJsonOptions) =>
    writeObject(
      [
        ['value', quantity.canonicalValue],
        ['unit', spec.wireUnit],
      ],
      options,
    ),
  decode: (input, options = defaultJsonOptions) =>
    Either.gen(function* () {
      const fields = yield* readObject(input, ['value', 'unit'], options)
      const value = yield* optionalNumber(fields.value, 'value', 0)
      const unitText = yield* optionalString(fields.unit, 'unit')
      const unit = unitText === undefined ? spec.canonicalUnit : yield* spec.units.parse(unitText)
      return make(value, unit)
    }),
})

export const DistanceJson = makeQuantityCodec('Distance', Distance.Spec, Distance.make)
export const WeightJson = makeQuantityCodec('Weight', Weight.Spec, Weight.make)
export const VolumeJson = makeQuantityCodec('Volume', Volume.Spec, Volume.make)
export const TemperatureJson = makeQuantityCodec('Temperature', Temperature.Spec, Temperature.make)

export type AnyQuantity = Distance | Weight | Volume | Temperature

/** Explicit registry from quantity tag to its codec */
export const QuantityCodecs = {
  Distance: DistanceJson,
  Weight: WeightJson,
  Volume: VolumeJson,
  Temperature: TemperatureJson,
} as const

export const encodeQuantity = (quantity: AnyQuantity, options = defaultJsonOptions): unknown => {
  switch (quantity._tag) {
    case 'Distance':
      return QuantityCodecs.Distance.encode(quantity, options)
    case 'Weight':
      return QuantityCodecs.Weight.encode(quantity, options)
    case 'Volume':
      return QuantityCodecs.Volume.encode(quantity, options)
    case 'Temperature':
      return QuantityCodecs.Temperature.encode(quantity, options)
  }
}
