import {
  Distance,
  Latitude,
  Longitude,
  Temperature,
  Volume,
  Weight,
  type QuantityFamily,
  type QuantitySpec,
} from '@measurekit/common'
import { Schema } from 'effect'

// ============================================
// Quantity Wire Shapes
// ============================================

const symbols = <U extends string>(spec: QuantitySpec<U>): string =>
  spec.units.units.map((unit) => spec.units.format(unit)).join(', ')

const quantityWire = <U extends string>(family: QuantityFamily, spec: QuantitySpec<U>) =>
  Schema.Struct({
    value: Schema.Number.annotations({
      description: `Magnitude in ${spec.canonicalUnit}, or in the unit named by "unit" on input`,
    }),
    unit: Schema.String.annotations({
      description: `Written as "${spec.wireUnit}". Read as any of ${symbols(spec)} or their names`,
    }),
  }).annotations({
    title: family,
    examples: [{ value: 1, unit: spec.wireUnit }],
  })

export const DistanceWire = quantityWire('Distance', Distance.Spec)
export const WeightWire = quantityWire('Weight', Weight.Spec)
export const VolumeWire = quantityWire('Volume', Volume.Spec)
export const TemperatureWire = quantityWire('Temperature', Temperature.Spec)

/** Shapes shared by all quantity families */
export const QuantityWire = {
  Distance: DistanceWire,
  Weight: WeightWire,
  Volume: VolumeWire,
  Temperature: TemperatureWire,
} as const

// ============================================
// Collaborator Wire Shapes
// ============================================

const AddressLine = Schema.optional(Schema.String)

export const AddressWire = Schema.Struct({
  addressLine1: AddressLine,
  addressLine2: AddressLine,
  city: AddressLine,
  postalCode: AddressLine,
  stateOrProvince: AddressLine,
  country: AddressLine,
}).annotations({ title: 'Address', description: 'Missing lines read as empty strings' })

export const GeoCoordinateWire = Schema.Struct({
  latitude: Latitude,
  longitude: Longitude,
}).annotations({ title: 'GeoCoordinate' })

// ============================================
// API Response Wire Shapes
// ============================================

const SuccessStatus = Schema.Int.pipe(Schema.between(200, 299))
const ErrorStatus = Schema.Int.pipe(Schema.between(100, 599)).annotations({
  description: 'Any valid status outside 200-299',
})

const ErrorWire = Schema.Struct({
  statusCode: ErrorStatus,
  errorMessage: Schema.String,
})

export const ApiResponseWire = Schema.Union(Schema.Struct({ statusCode: SuccessStatus }), ErrorWire).annotations({
  title: 'ApiResponse',
})

export const PayloadApiResponseWire = <A, I>(payload: Schema.Schema<A, I>) =>
  Schema.Union(Schema.Struct({ statusCode: SuccessStatus, payload }), ErrorWire)
