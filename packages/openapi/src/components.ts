import { JSONSchema, type Schema } from 'effect'
import {
  AddressWire,
  ApiResponseWire,
  DistanceWire,
  GeoCoordinateWire,
  TemperatureWire,
  VolumeWire,
  WeightWire,
} from './schemas.js'

export const toJsonSchema = <A, I>(schema: Schema.Schema<A, I>): JSONSchema.JsonSchema7Root => JSONSchema.make(schema)

/**
 * Entries for an OpenAPI `components.schemas` section, one per wire shape.
 */
export const components = () => ({
  Distance: toJsonSchema(DistanceWire),
  Weight: toJsonSchema(WeightWire),
  Volume: toJsonSchema(VolumeWire),
  Temperature: toJsonSchema(TemperatureWire),
  Address: toJsonSchema(AddressWire),
  GeoCoordinate: toJsonSchema(GeoCoordinateWire),
  ApiResponse: toJsonSchema(ApiResponseWire),
})
