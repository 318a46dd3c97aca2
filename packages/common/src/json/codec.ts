import { Effect, Either, ParseResult, Schema } from 'effect'
import { MalformedPayloadError, type JsonDecodeError } from '../errors/index.js'
import { JsonOptions, defaultJsonOptions, propertyName, propertyNameMatches, type JsonOptionsShape } from './options.js'

// ============================================
// Codec Interface
// ============================================

/**
 * Two-way mapping between a value and its JSON document form. `decode`
 * receives an already parsed document (the result of `JSON.parse`).
 */
export interface JsonCodec<A> {
  readonly name: string
  readonly encode: (value: A, options?: JsonOptionsShape) => unknown
  readonly decode: (input: unknown, options?: JsonOptionsShape) => Either.Either<A, JsonDecodeError>
}

// ============================================
// Object Reading
// ============================================

export type JsonObject = { readonly [key: string]: unknown }

const isJsonObject = (input: unknown): input is JsonObject =>
  typeof input === 'object' && input !== null && !Array.isArray(input)

/**
 * Collects the known properties of a JSON object, keyed by their camelCase
 * name. Any other property fails with `UnknownProperty`.
 */
export const readObject = <K extends string>(
  input: unknown,
  properties: ReadonlyArray<K>,
  options: JsonOptionsShape,
): Either.Either<Partial<Record<K, unknown>>, MalformedPayloadError> => {
  if (!isJsonObject(input)) {
    return Either.left(
      new MalformedPayloadError({ reason: 'ExpectedObject', message: 'Expected a JSON object' }),
    )
  }
  const fields: Partial<Record<K, unknown>> = {}
  for (const [key, value] of Object.entries(input)) {
    const known = properties.find((property) =>
      propertyNameMatches(key, propertyName(property, options.namingPolicy), options),
    )
    if (known === undefined) {
      return Either.left(
        new MalformedPayloadError({ reason: 'UnknownProperty', property: key, message: `Unknown property: ${key}` }),
      )
    }
    fields[known] = value
  }
  return Either.right(fields)
}

/** Builds an object whose keys follow the naming policy, keeping insertion order */
export const writeObject = (
  entries: ReadonlyArray<readonly [string, unknown]>,
  options: JsonOptionsShape,
): Record<string, unknown> => {
  const result: Record<string, unknown> = {}
  for (const [name, value] of entries) {
    result[propertyName(name, options.namingPolicy)] = value
  }
  return result
}

export const invalidProperty = (property: string, expected: string): MalformedPayloadError =>
  new MalformedPayloadError({
    reason: 'InvalidPropertyValue',
    property,
    message: `Property ${property} must be ${expected}`,
  })

export const missingProperty = (property: string): MalformedPayloadError =>
  new MalformedPayloadError({ reason: 'MissingProperty', property, message: `Missing property: ${property}` })

/** Reads an optional number property; absent yields `fallback` */
export const optionalNumber = (
  value: unknown,
  property: string,
  fallback: number,
): Either.Either<number, MalformedPayloadError> => {
  if (value === undefined) return Either.right(fallback)
  return typeof value === 'number' ? Either.right(value) : Either.left(invalidProperty(property, 'a number'))
}

export const optionalString = (
  value: unknown,
  property: string,
): Either.Either<string | undefined, MalformedPayloadError> => {
  if (value === undefined) return Either.right(undefined)
  return typeof value === 'string' ? Either.right(value) : Either.left(invalidProperty(property, 'a string'))
}

// ============================================
// Text Parsing
// ============================================

/**
 * True when the text stops before the document is complete: nothing but
 * whitespace, an unterminated string, or an opening bracket never closed.
 */
const isTruncated = (text: string): boolean => {
  if (text.trim() === '') return true
  let depth = 0
  let inString = false
  let escaped = false
  for (const char of text) {
    if (inString) {
      if (escaped) escaped = false
      else if (char === '\\') escaped = true
      else if (char === '"') inString = false
      continue
    }
    if (char === '"') inString = true
    else if (char === '{' || char === '[') depth++
    else if (char === '}' || char === ']') depth--
  }
  return inString || depth > 0
}

const parseText = (text: string): Either.Either<unknown, MalformedPayloadError> =>
  Either.try({
    try: (): unknown => JSON.parse(text),
    catch: (cause) =>
      isTruncated(text)
        ? new MalformedPayloadError({ reason: 'UnexpectedEnd', message: 'Unexpected end of JSON input' })
        : new MalformedPayloadError({
            reason: 'InvalidJson',
            message: cause instanceof Error ? cause.message : 'Invalid JSON',
          }),
  })

// ============================================
// Json Module
// ============================================

/**
 * Adapts an Effect schema into a codec. Property names come from the schema,
 * the naming policy does not apply.
 */
const fromSchema = <A, I>(schema: Schema.Schema<A, I>, name = 'Schema'): JsonCodec<A> => {
  const encode = Schema.encodeSync(schema)
  const decode = Schema.decodeUnknownEither(schema)
  return {
    name,
    encode: (value) => encode(value),
    decode: (input) =>
      Either.mapLeft(
        decode(input),
        (error) =>
          new MalformedPayloadError({
            reason: 'InvalidPropertyValue',
            message: ParseResult.TreeFormatter.formatErrorSync(error),
          }),
      ),
  }
}

const stringify = <A>(codec: JsonCodec<A>, value: A, options: JsonOptionsShape = defaultJsonOptions): string =>
  JSON.stringify(codec.encode(value, options))

const parse = <A>(
  codec: JsonCodec<A>,
  text: string,
  options: JsonOptionsShape = defaultJsonOptions,
): Either.Either<A, JsonDecodeError> => Either.flatMap(parseText(text), (input) => codec.decode(input, options))

const encodeEffect = <A>(codec: JsonCodec<A>, value: A): Effect.Effect<string, never, JsonOptions> =>
  Effect.gen(function* () {
    const options = yield* JsonOptions
    const text = stringify(codec, value, options)
    yield* Effect.logDebug('JSON encoded').pipe(Effect.annotateLogs({ codec: codec.name, length: text.length }))
    return text
  })

const decodeEffect = <A>(codec: JsonCodec<A>, text: string): Effect.Effect<A, JsonDecodeError, JsonOptions> =>
  Effect.gen(function* () {
    const options = yield* JsonOptions
    return yield* parse(codec, text, options)
  }).pipe(
    Effect.tap(() => Effect.logDebug('JSON decoded').pipe(Effect.annotateLogs({ codec: codec.name }))),
    Effect.tapError((error) =>
      Effect.logDebug('JSON decode failed').pipe(
        Effect.annotateLogs({ codec: codec.name, error: error._tag, detail: error.message }),
      ),
    ),
  )

export const Json = {
  fromSchema,
  stringify,
  parse,
  encodeEffect,
  decodeEffect,
} as const
