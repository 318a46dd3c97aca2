import { describe, expect, it } from '@effect/vitest'
import { Arbitrary, Effect, Either, Equal, Schema } from 'effect'
import * as FC from 'effect/FastCheck'
import { Json, type JsonCodec } from '../json/codec.js'
import type { JsonOptionsShape } from '../json/options.js'
import { Distance, DistanceUnit } from './distance.js'
import {
  DistanceJson,
  QuantityCodecs,
  TemperatureJson,
  VolumeJson,
  WeightJson,
  encodeQuantity,
} from './quantity-json.js'
import { Temperature, TemperatureUnit } from './temperature.js'
import { Volume, VolumeUnit } from './volume.js'
import { Weight, WeightUnit } from './weight.js'

const runProperty = <A>(arbitrary: FC.Arbitrary<A>, predicate: (value: A) => boolean, numRuns = 100): void => {
  FC.assert(
    FC.property(arbitrary, (value) => predicate(value)),
    { numRuns },
  )
}

// Any double, plus the values that leave the finite non-negative range
const anyValue = FC.oneof(
  FC.double(),
  FC.constantFrom(Number.NaN, Number.POSITIVE_INFINITY, Number.NEGATIVE_INFINITY, -0, Number.MAX_VALUE),
)

const roundTrips = <Q extends Equal.Equal, U extends string>(
  codec: JsonCodec<Q>,
  make: (value: number, unit: U) => Q,
  unit: Schema.Schema<U>,
  wireUnit: string,
): void =>
  runProperty(FC.tuple(anyValue, Arbitrary.make(unit)), ([value, from]) => {
    const quantity = make(value, from)
    const text = Json.stringify(codec, quantity)
    const written: unknown = JSON.parse(text)
    const back = Json.parse(codec, text)
    return (
      typeof written === 'object' &&
      written !== null &&
      'unit' in written &&
      written.unit === wireUnit &&
      Either.isRight(back) &&
      Equal.equals(back.right, quantity)
    )
  })

const options = (overrides: Partial<JsonOptionsShape>): JsonOptionsShape => ({
  namingPolicy: 'camelCase',
  propertyNameCaseInsensitive: false,
  ...overrides,
})

describe('Quantity JSON', () => {
  // ============================================
  // Writing
  // ============================================
  describe('encode', () => {
    it.effect('writes the canonical value and unit, value first', () =>
      Effect.gen(function* () {
        expect(Json.stringify(DistanceJson, Distance.make(2, 'Kilometer'))).toBe('{"value":2000,"unit":"m"}')
        expect(Json.stringify(WeightJson, Weight.make(1, 'Kilogram'))).toBe('{"value":1000,"unit":"g"}')
        expect(Json.stringify(TemperatureJson, Temperature.make(0, 'Celsius'))).toBe('{"value":273.15,"unit":"k"}')
      }),
    )

    it.effect('renames properties by naming policy', () =>
      Effect.gen(function* () {
        const distance = Distance.make(1)
        expect(Json.stringify(DistanceJson, distance, options({ namingPolicy: 'PascalCase' }))).toBe(
          '{"Value":1,"Unit":"m"}',
        )
        expect(Json.stringify(DistanceJson, distance, options({ namingPolicy: 'snake_case' }))).toBe(
          '{"value":1,"unit":"m"}',
        )
      }),
    )

    it.effect('encodeQuantity dispatches on the tag', () =>
      Effect.gen(function* () {
        expect(encodeQuantity(Volume.make(3))).toEqual({ value: 3, unit: 'm3' })
        expect(encodeQuantity(Temperature.fromKelvin(5))).toEqual({ value: 5, unit: 'k' })
        expect(QuantityCodecs.Weight.name).toBe('Weight')
      }),
    )
  })

  // ============================================
  // Reading
  // ============================================
  describe('decode', () => {
    it.effect('interprets the value in the unit given', () =>
      Effect.gen(function* () {
        const distance = yield* Json.parse(DistanceJson, '{"value":1,"unit":"km"}')
        expect(distance.meters).toBe(1000)
      }),
    )

    it.effect('accepts properties in any order', () =>
      Effect.gen(function* () {
        const weight = yield* Json.parse(WeightJson, '{"unit":"kg","value":2}')
        expect(weight.grams).toBe(2000)
      }),
    )

    it.effect('defaults a missing unit to the canonical unit', () =>
      Effect.gen(function* () {
        const distance = yield* Json.parse(DistanceJson, '{"value":5}')
        expect(distance.meters).toBe(5)
      }),
    )

    it.effect('defaults a missing value to zero', () =>
      Effect.gen(function* () {
        const distance = yield* Json.parse(DistanceJson, '{"unit":"ft"}')
        expect(distance.meters).toBe(0)
      }),
    )

    it.effect('clamps negative values on read', () =>
      Effect.gen(function* () {
        const distance = yield* Json.parse(DistanceJson, '{"value":-3,"unit":"m"}')
        expect(distance.meters).toBe(0)
      }),
    )

    it.effect('round-trips through the canonical unit', () =>
      Effect.gen(function* () {
        const text = Json.stringify(WeightJson, Weight.make(2, 'Kilogram'))
        const weight = yield* Json.parse(WeightJson, text)
        expect(weight.grams).toBe(2000)
      }),
    )

    it.effect('round-trips every distance in the canonical unit (property test)', () =>
      Effect.gen(function* () {
        roundTrips(DistanceJson, Distance.make, DistanceUnit, 'm')
      }),
    )

    it.effect('round-trips every weight in the canonical unit (property test)', () =>
      Effect.gen(function* () {
        roundTrips(WeightJson, Weight.make, WeightUnit, 'g')
      }),
    )

    it.effect('round-trips every volume in the canonical unit (property test)', () =>
      Effect.gen(function* () {
        roundTrips(VolumeJson, Volume.make, VolumeUnit, 'm3')
      }),
    )

    it.effect('round-trips every temperature in the canonical unit (property test)', () =>
      Effect.gen(function* () {
        roundTrips(TemperatureJson, Temperature.make, TemperatureUnit, 'k')
      }),
    )

    it.effect('round-trips the infinity constants and overflowed values', () =>
      Effect.gen(function* () {
        const weight = yield* Json.parse(WeightJson, Json.stringify(WeightJson, Weight.infinity))
        expect(weight.grams).toBe(Number.MAX_VALUE)

        const volume = yield* Json.parse(VolumeJson, Json.stringify(VolumeJson, Volume.infinity))
        expect(Equal.equals(volume, Volume.maxValue)).toBe(true)

        const overflow = Distance.make(Number.MAX_VALUE, 'Kilometer')
        expect(overflow.meters).toBe(Number.MAX_VALUE)
        const distance = yield* Json.parse(DistanceJson, Json.stringify(DistanceJson, overflow))
        expect(distance.equals(overflow)).toBe(true)
      }),
    )

    it.effect('rejects unknown properties', () =>
      Effect.gen(function* () {
        const error = yield* Effect.flip(Json.parse(DistanceJson, '{"value":1,"unit":"m","extra":1}'))
        expect(error).toMatchObject({ _tag: 'MalformedPayloadError', reason: 'UnknownProperty', property: 'extra' })
      }),
    )

    it.effect('rejects documents that are not objects', () =>
      Effect.gen(function* () {
        const error = yield* Effect.flip(Json.parse(DistanceJson, '[1,2]'))
        expect(error).toMatchObject({ _tag: 'MalformedPayloadError', reason: 'ExpectedObject' })
      }),
    )

    it.effect('rejects a value that is not a number', () =>
      Effect.gen(function* () {
        const error = yield* Effect.flip(Json.parse(DistanceJson, '{"value":"1"}'))
        expect(error).toMatchObject({ reason: 'InvalidPropertyValue', property: 'value' })
      }),
    )

    it.effect('fails with InvalidUnitError for an unknown unit', () =>
      Effect.gen(function* () {
        const error = yield* Effect.flip(Json.parse(DistanceJson, '{"value":1,"unit":"furlong"}'))
        expect(error).toMatchObject({ _tag: 'InvalidUnitError', family: 'Distance', input: 'furlong' })
      }),
    )

    it.effect('matches names case-insensitively only when enabled', () =>
      Effect.gen(function* () {
        const text = '{"VALUE":2,"Unit":"m"}'
        const distance = yield* Json.parse(DistanceJson, text, options({ propertyNameCaseInsensitive: true }))
        expect(distance.meters).toBe(2)

        const error = yield* Effect.flip(Json.parse(DistanceJson, text))
        expect(error).toMatchObject({ reason: 'UnknownProperty', property: 'VALUE' })
      }),
    )

    it.effect('reads PascalCase names under the PascalCase policy', () =>
      Effect.gen(function* () {
        const distance = yield* Json.parse(
          DistanceJson,
          '{"Value":3,"Unit":"m"}',
          options({ namingPolicy: 'PascalCase' }),
        )
        expect(distance.meters).toBe(3)
      }),
    )
  })
})
