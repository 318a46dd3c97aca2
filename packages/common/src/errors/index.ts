import { Schema } from 'effect'

// ============================================
// Unit Errors
// ============================================

/** The quantity families that own a unit table */
export const QuantityFamily = Schema.Literal('Distance', 'Weight', 'Volume', 'Temperature')
export type QuantityFamily = typeof QuantityFamily.Type

/**
 * A unit string (or unit value) that is not part of the family's alias table.
 */
export class InvalidUnitError extends Schema.TaggedError<InvalidUnitError>()('InvalidUnitError', {
  family: QuantityFamily,
  input: Schema.String,
  message: Schema.String,
}) {}

/**
 * A format string passed to `format` that does not name a unit.
 */
export class UnitFormatError extends Schema.TaggedError<UnitFormatError>()('UnitFormatError', {
  family: QuantityFamily,
  format: Schema.String,
  message: Schema.String,
}) {}

/**
 * Comparison against null or a value of another kind.
 */
export class IncomparableValueError extends Schema.TaggedError<IncomparableValueError>()('IncomparableValueError', {
  expected: Schema.String,
  message: Schema.String,
}) {}

/**
 * A range whose lower bound lies above its upper bound.
 */
export class InvalidRangeError extends Schema.TaggedError<InvalidRangeError>()('InvalidRangeError', {
  message: Schema.String,
}) {}

// ============================================
// API Response Errors
// ============================================

export class InvalidStatusCodeError extends Schema.TaggedError<InvalidStatusCodeError>()('InvalidStatusCodeError', {
  statusCode: Schema.Number,
  message: Schema.String,
}) {}

/**
 * A required argument (payload, handler, mapper) was absent.
 */
export class MissingArgumentError extends Schema.TaggedError<MissingArgumentError>()('MissingArgumentError', {
  argument: Schema.String,
  message: Schema.String,
}) {}

// ============================================
// JSON Errors
// ============================================

export const MalformedPayloadReason = Schema.Literal(
  'ExpectedObject',
  'UnknownProperty',
  'InvalidPropertyValue',
  'MissingProperty',
  'UnexpectedEnd',
  'InvalidJson',
)
export type MalformedPayloadReason = typeof MalformedPayloadReason.Type

/**
 * Structural violation found while decoding a JSON document.
 */
export class MalformedPayloadError extends Schema.TaggedError<MalformedPayloadError>()('MalformedPayloadError', {
  reason: MalformedPayloadReason,
  property: Schema.optional(Schema.String),
  message: Schema.String,
}) {}

// ============================================
// Union Types for Convenience
// ============================================

export type JsonDecodeError =
  | MalformedPayloadError
  | InvalidUnitError
  | InvalidStatusCodeError
  | MissingArgumentError
  | InvalidRangeError
