import { Either, ParseResult, Schema } from 'effect'
import { MalformedPayloadError } from '../errors/index.js'
import { invalidProperty, missingProperty, readObject, writeObject, type JsonCodec } from '../json/codec.js'
import { defaultJsonOptions } from '../json/options.js'
import { Distance } from '../measurements/distance.js'

/** Mean Earth radius used by the haversine distance, in meters */
export const EARTH_RADIUS_METERS = 6_376_500

const toRadians = (degrees: number): number => degrees * (Math.PI / 180)

export const Latitude = Schema.Number.pipe(Schema.between(-90, 90))
export const Longitude = Schema.Number.pipe(Schema.between(-180, 180))

/**
 * A point on the globe in decimal degrees. Construction fails with a
 * `ParseError` when a coordinate is out of range.
 */
export class GeoCoordinate extends Schema.Class<GeoCoordinate>('GeoCoordinate')({
  latitude: Latitude,
  longitude: Longitude,
}) {
  static readonly zero = new GeoCoordinate({ latitude: 0, longitude: 0 })

  static fromDegrees(latitude: number, longitude: number): Either.Either<GeoCoordinate, ParseResult.ParseError> {
    return Schema.decodeUnknownEither(GeoCoordinate)({ latitude, longitude })
  }

  /** Great-circle distance by the haversine formula */
  distanceTo(other: GeoCoordinate): Distance {
    const lat1 = toRadians(this.latitude)
    const lat2 = toRadians(other.latitude)
    const deltaLat = lat2 - lat1
    const deltaLon = toRadians(other.longitude) - toRadians(this.longitude)

    const a = Math.sin(deltaLat / 2) ** 2 + Math.cos(lat1) * Math.cos(lat2) * Math.sin(deltaLon / 2) ** 2
    const c = 2 * Math.atan2(Math.sqrt(a), Math.sqrt(1 - a))
    return Distance.fromMeters(EARTH_RADIUS_METERS * c)
  }

  toString(): string {
    return `Latitude: ${String(this.latitude)}, Longitude: ${String(this.longitude)}`
  }
}

export const GeoCoordinateJson: JsonCodec<GeoCoordinate> = {
  name: 'GeoCoordinate',
  encode: (coordinate, options = defaultJsonOptions) =>
    writeObject(
      [
        ['latitude', coordinate.latitude],
        ['longitude', coordinate.longitude],
      ],
      options,
    ),
  decode: (input, options = defaultJsonOptions) =>
    Either.gen(function* () {
      const fields = yield* readObject(input, ['latitude', 'longitude'], options)
      const { latitude, longitude } = fields
      if (latitude === undefined) return yield* Either.left(missingProperty('latitude'))
      if (longitude === undefined) return yield* Either.left(missingProperty('longitude'))
      if (typeof latitude !== 'number') return yield* Either.left(invalidProperty('latitude', 'a number'))
      if (typeof longitude !== 'number') return yield* Either.left(invalidProperty('longitude', 'a number'))
      return yield* Either.mapLeft(
        GeoCoordinate.fromDegrees(latitude, longitude),
        (error) =>
          new MalformedPayloadError({
            reason: 'InvalidPropertyValue',
            message: ParseResult.TreeFormatter.formatErrorSync(error),
          }),
      )
    }),
}
