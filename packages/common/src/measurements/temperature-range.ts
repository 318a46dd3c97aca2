import { Either, Equal, Hash, Order } from 'effect'
import { InvalidRangeError } from '../errors/index.js'
import { missingProperty, readObject, writeObject, type JsonCodec } from '../json/codec.js'
import { defaultJsonOptions } from '../json/options.js'
import { TemperatureJson } from './quantity-json.js'
import { Temperature } from './temperature.js'

/**
 * Closed interval of temperatures with `min <= max`.
 */
export class TemperatureRange implements Equal.Equal {
  private constructor(
    readonly min: Temperature,
    readonly max: Temperature,
  ) {}

  static make(min: Temperature, max: Temperature): Either.Either<TemperatureRange, InvalidRangeError> {
    if (Order.greaterThan(Temperature.Order)(min, max)) {
      return Either.left(
        new InvalidRangeError({
          message: 'The minimum temperature must be less than or equal to the maximum temperature',
        }),
      )
    }
    return Either.right(new TemperatureRange(min, max))
  }

  /** From absolute zero up to `Temperature.maxValue` */
  static readonly default = new TemperatureRange(Temperature.minValue, Temperature.maxValue)

  get isSingleTemperature(): boolean {
    return this.min.equals(this.max)
  }

  equals(that: TemperatureRange): boolean {
    return this.min.equals(that.min) && this.max.equals(that.max)
  }

  toString(): string {
    return `${this.min.toString()} - ${this.max.toString()}`
  }

  toJSON(): { readonly min: unknown; readonly max: unknown } {
    return { min: this.min.toJSON(), max: this.max.toJSON() }
  }

  [Equal.symbol](that: Equal.Equal): boolean {
    return that instanceof TemperatureRange && this.equals(that)
  }

  [Hash.symbol](): number {
    return Hash.combine(Hash.hash(this.min))(Hash.hash(this.max))
  }
}

export const TemperatureRangeJson: JsonCodec<TemperatureRange> = {
  name: 'TemperatureRange',
  encode: (range, options = defaultJsonOptions) =>
    writeObject(
      [
        ['min', TemperatureJson.encode(range.min, options)],
        ['max', TemperatureJson.encode(range.max, options)],
      ],
      options,
    ),
  decode: (input, options = defaultJsonOptions) =>
    Either.gen(function* () {
      const fields = yield* readObject(input, ['min', 'max'], options)
      if (fields.min === undefined) return yield* Either.left(missingProperty('min'))
      if (fields.max === undefined) return yield* Either.left(missingProperty('max'))
      const min = yield* TemperatureJson.decode(fields.min, options)
      const max = yield* TemperatureJson.decode(fields.max, options)
      return yield* TemperatureRange.make(min, max)
    }),
}
