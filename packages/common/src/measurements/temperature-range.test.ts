import { describe, expect, it } from '@effect/vitest'
import { Effect, Equal } from 'effect'
import { Json } from '../json/codec.js'
import { Temperature } from './temperature.js'
import { TemperatureRange, TemperatureRangeJson } from './temperature-range.js'

describe('TemperatureRange', () => {
  it.effect('accepts min <= max', () =>
    Effect.gen(function* () {
      const range = yield* TemperatureRange.make(Temperature.fromCelsius(2), Temperature.fromCelsius(8))
      expect(range.min.kelvin).toBe(275.15)
      expect(range.isSingleTemperature).toBe(false)
    }),
  )

  it.effect('rejects min > max', () =>
    Effect.gen(function* () {
      const error = yield* Effect.flip(TemperatureRange.make(Temperature.fromCelsius(10), Temperature.fromCelsius(0)))
      expect(error._tag).toBe('InvalidRangeError')
    }),
  )

  it.effect('a range of one temperature is a single temperature', () =>
    Effect.gen(function* () {
      const range = yield* TemperatureRange.make(Temperature.fromCelsius(0), Temperature.fromKelvin(273.15))
      expect(range.isSingleTemperature).toBe(true)
    }),
  )

  it.effect('default spans the whole scale', () =>
    Effect.gen(function* () {
      expect(Equal.equals(TemperatureRange.default.min, Temperature.minValue)).toBe(true)
      expect(Equal.equals(TemperatureRange.default.max, Temperature.maxValue)).toBe(true)
    }),
  )

  it.effect('compares by both bounds', () =>
    Effect.gen(function* () {
      const a = yield* TemperatureRange.make(Temperature.fromKelvin(1), Temperature.fromKelvin(2))
      const b = yield* TemperatureRange.make(Temperature.fromKelvin(1), Temperature.fromKelvin(2))
      const c = yield* TemperatureRange.make(Temperature.fromKelvin(1), Temperature.fromKelvin(3))
      expect(Equal.equals(a, b)).toBe(true)
      expect(Equal.equals(a, c)).toBe(false)
    }),
  )

  describe('JSON', () => {
    it.effect('writes min and max as temperatures', () =>
      Effect.gen(function* () {
        const range = yield* TemperatureRange.make(Temperature.fromKelvin(270), Temperature.fromKelvin(280))
        expect(Json.stringify(TemperatureRangeJson, range)).toBe(
          '{"min":{"value":270,"unit":"k"},"max":{"value":280,"unit":"k"}}',
        )
      }),
    )

    it.effect('reads bounds in any temperature unit', () =>
      Effect.gen(function* () {
        const range = yield* Json.parse(
          TemperatureRangeJson,
          '{"min":{"value":0,"unit":"c"},"max":{"value":300,"unit":"k"}}',
        )
        expect(range.min.kelvin).toBe(273.15)
        expect(range.max.kelvin).toBe(300)
      }),
    )

    it.effect('requires both bounds', () =>
      Effect.gen(function* () {
        const error = yield* Effect.flip(Json.parse(TemperatureRangeJson, '{"min":{"value":0}}'))
        expect(error).toMatchObject({ _tag: 'MalformedPayloadError', reason: 'MissingProperty', property: 'max' })
      }),
    )

    it.effect('rejects an inverted range', () =>
      Effect.gen(function* () {
        const error = yield* Effect.flip(
          Json.parse(TemperatureRangeJson, '{"min":{"value":10,"unit":"k"},"max":{"value":5,"unit":"k"}}'),
        )
        expect(error._tag).toBe('InvalidRangeError')
      }),
    )
  })
})
