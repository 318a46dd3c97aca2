import { Either, ParseResult, Schema } from 'effect'
import { InvalidUnitError, type QuantityFamily } from '../errors/index.js'

// ============================================
// Unit Families
// ============================================

/**
 * Parsing and formatting for the closed set of units of one quantity family.
 */
export interface UnitFamily<U extends string> {
  readonly family: QuantityFamily
  readonly units: ReadonlyArray<U>
  /** Resolves a lenient unit string (symbol, singular or plural word) */
  readonly parse: (text: string) => Either.Either<U, InvalidUnitError>
  /** Canonical short symbol; throws `InvalidUnitError` for a value outside the set */
  readonly format: (unit: U) => string
  readonly isValid: (text: string) => boolean
  /** Decodes a unit string into a unit, encodes a unit into its symbol */
  readonly FromString: Schema.Schema<U, string>
}

export interface UnitFamilyConfig<U extends string> {
  readonly family: QuantityFamily
  readonly unit: Schema.Schema<U>
  readonly units: ReadonlyArray<U>
  readonly symbols: Readonly<Record<U, string>>
  /** Accepted spellings per unit, already in normalized form */
  readonly aliases: Readonly<Record<U, ReadonlyArray<string>>>
  readonly normalize: (text: string) => string
}

/** Lower-cases, drops every space, trims. Used by the multi-word families. */
export const normalizeCompact = (text: string): string => text.toLowerCase().replaceAll(' ', '').trim()

const hasOwn = <U extends string>(record: Readonly<Record<U, string>>, key: string): key is U =>
  Object.prototype.hasOwnProperty.call(record, key)

export const makeUnitFamily = <U extends string>(config: UnitFamilyConfig<U>): UnitFamily<U> => {
  const lookup = new Map<string, U>()
  for (const unit of config.units) {
    for (const alias of config.aliases[unit]) {
      lookup.set(alias, unit)
    }
  }

  const invalid = (input: string) =>
    new InvalidUnitError({
      family: config.family,
      input,
      message: `Invalid ${config.family.toLowerCase()} unit: ${input}`,
    })

  const parse = (text: string): Either.Either<U, InvalidUnitError> => {
    const unit = lookup.get(config.normalize(text))
    return unit === undefined ? Either.left(invalid(text)) : Either.right(unit)
  }

  const format = (unit: U): string => {
    if (!hasOwn(config.symbols, unit)) {
      throw invalid(String(unit))
    }
    return config.symbols[unit]
  }

  const FromString = Schema.transformOrFail(Schema.String, config.unit, {
    strict: true,
    decode: (text, _options, ast) =>
      Either.mapLeft(parse(text), (error) => new ParseResult.Type(ast, text, error.message)),
    encode: (unit) => ParseResult.succeed(config.symbols[unit]),
  })

  return {
    family: config.family,
    units: config.units,
    parse,
    format,
    isValid: (text) => lookup.has(config.normalize(text)),
    FromString,
  }
}
