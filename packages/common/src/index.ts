// Errors
export * from './errors/index.js'

// Quantities
export * from './measurements/unit-family.js'
export * from './measurements/quantity.js'
export * from './measurements/distance.js'
export * from './measurements/weight.js'
export * from './measurements/volume.js'
export * from './measurements/temperature.js'
export * from './measurements/temperature-range.js'
export * from './measurements/quantity-json.js'

// JSON
export * from './json/options.js'
export * from './json/codec.js'

// API responses
export * from './api/api-response.js'
export * as HttpStatus from './api/http-status.js'

// Collaborators
export * from './maps/address.js'
export * from './maps/geo-coordinate.js'
export * from './time/date-time-range.js'
export * as Arrays from './extensions/array.js'
