import { Config, Context, Effect, Layer, Schema, String } from 'effect'

// ============================================
// Naming Policies
// ============================================

export const NamingPolicy = Schema.Literal('PascalCase', 'camelCase', 'snake_case', 'kebab-case')
export type NamingPolicy = typeof NamingPolicy.Type

/**
 * Renders a camelCase property name under the given policy.
 * `statusCode` becomes `StatusCode`, `status_code` or `status-code`.
 */
export const propertyName = (name: string, policy: NamingPolicy): string => {
  switch (policy) {
    case 'PascalCase':
      return String.capitalize(name)
    case 'camelCase':
      return name
    case 'snake_case':
      return String.camelToSnake(name)
    case 'kebab-case':
      return String.snakeToKebab(String.camelToSnake(name))
  }
}

// ============================================
// JsonOptions Service
// ============================================

export interface JsonOptionsShape {
  readonly namingPolicy: NamingPolicy
  readonly propertyNameCaseInsensitive: boolean
}

export const defaultJsonOptions: JsonOptionsShape = {
  namingPolicy: 'camelCase',
  propertyNameCaseInsensitive: false,
}

/** True when a property read from a document names the expected (already policy-renamed) property */
export const propertyNameMatches = (actual: string, expected: string, options: JsonOptionsShape): boolean =>
  options.propertyNameCaseInsensitive ? actual.toLowerCase() === expected.toLowerCase() : actual === expected

const JsonOptionsConfig = Config.all({
  namingPolicy: Config.literal('PascalCase', 'camelCase', 'snake_case', 'kebab-case')('JSON_NAMING_POLICY').pipe(
    Config.withDefault('camelCase'),
  ),
  propertyNameCaseInsensitive: Config.boolean('JSON_CASE_INSENSITIVE').pipe(Config.withDefault(false)),
})

export class JsonOptions extends Context.Tag('@measurekit/common/JsonOptions')<JsonOptions, JsonOptionsShape>() {
  static readonly Default = Layer.succeed(JsonOptions, defaultJsonOptions)

  /** Overrides the defaults with the options given; `undefined` entries keep the default */
  static readonly layer = (options: Partial<JsonOptionsShape>) =>
    Layer.succeed(JsonOptions, {
      namingPolicy: options.namingPolicy ?? defaultJsonOptions.namingPolicy,
      propertyNameCaseInsensitive: options.propertyNameCaseInsensitive ?? defaultJsonOptions.propertyNameCaseInsensitive,
    })

  static readonly layerConfig = Layer.effect(
    JsonOptions,
    Effect.gen(function* () {
      const options = yield* JsonOptionsConfig
      return options
    }),
  )
}
