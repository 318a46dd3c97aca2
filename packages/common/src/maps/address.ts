import { Either, Equal, Schema } from 'effect'
import { invalidProperty, readObject, writeObject, type JsonCodec } from '../json/codec.js'
import { defaultJsonOptions } from '../json/options.js'

const AddressField = Schema.optionalWith(Schema.String, { default: () => '' })

/**
 * Postal address. Every line defaults to the empty string.
 */
export class Address extends Schema.Class<Address>('Address')({
  addressLine1: AddressField,
  addressLine2: AddressField,
  city: AddressField,
  postalCode: AddressField,
  stateOrProvince: AddressField,
  country: AddressField,
}) {
  static readonly empty = new Address({})

  get isEmpty(): boolean {
    return Equal.equals(this, Address.empty)
  }
}

const addressProperties = [
  'addressLine1',
  'addressLine2',
  'city',
  'postalCode',
  'stateOrProvince',
  'country',
] as const

export const AddressJson: JsonCodec<Address> = {
  name: 'Address',
  encode: (address, options = defaultJsonOptions) =>
    writeObject(
      addressProperties.map((property) => [property, address[property]] as const),
      options,
    ),
  decode: (input, options = defaultJsonOptions) =>
    Either.gen(function* () {
      const fields = yield* readObject(input, addressProperties, options)
      const lines: Partial<Record<(typeof addressProperties)[number], string>> = {}
      for (const property of addressProperties) {
        const value = fields[property]
        if (value === undefined) continue
        if (typeof value !== 'string') return yield* Either.left(invalidProperty(property, 'a string'))
        lines[property] = value
      }
      return new Address(lines)
    }),
}
