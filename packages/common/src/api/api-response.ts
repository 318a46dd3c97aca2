import { Data, Either } from 'effect'
import { InvalidStatusCodeError, MissingArgumentError } from '../errors/index.js'
import {
  missingProperty,
  optionalNumber,
  optionalString,
  readObject,
  writeObject,
  type JsonCodec,
} from '../json/codec.js'
import { defaultJsonOptions } from '../json/options.js'
import * as HttpStatus from './http-status.js'

// ============================================
// Variants
// ============================================

export class ApiSuccess<A> extends Data.TaggedClass('Success')<{
  readonly statusCode: number
  readonly payload: A
}> {}

export class ApiError extends Data.TaggedClass('Error')<{
  readonly statusCode: number
  readonly message: string
}> {}

/**
 * Outcome of an API call: a 2xx success carrying a payload, or an error
 * status with a message. `ApiResponse<void>` is the payload-less form.
 */
export type ApiResponse<A = void> = ApiSuccess<A> | ApiError

export interface ApiResponseHandlers<A, R> {
  readonly onSuccess: (statusCode: number, payload: A) => R
  readonly onError: (statusCode: number, message: string) => R
}

// ============================================
// Constructors
// ============================================

const invalidStatus = (statusCode: number, message: string) => new InvalidStatusCodeError({ statusCode, message })

const validStatus = (statusCode: number): Either.Either<number, InvalidStatusCodeError> =>
  HttpStatus.isValid(statusCode)
    ? Either.right(statusCode)
    : Either.left(invalidStatus(statusCode, 'The status code is not a valid HTTP status code'))

const successStatus = (statusCode: number): Either.Either<number, InvalidStatusCodeError> =>
  Either.flatMap(validStatus(statusCode), (code) =>
    HttpStatus.isSuccess(code)
      ? Either.right(code)
      : Either.left(invalidStatus(code, 'The status code does not indicate success')),
  )

const errorStatus = (statusCode: number): Either.Either<number, InvalidStatusCodeError> =>
  Either.flatMap(validStatus(statusCode), (code) =>
    HttpStatus.isSuccess(code) ? Either.left(invalidStatus(code, 'The status code indicates success')) : Either.right(code),
  )

const success = (statusCode = 200): Either.Either<ApiResponse, InvalidStatusCodeError> =>
  Either.map(successStatus(statusCode), (code) => new ApiSuccess<void>({ statusCode: code, payload: undefined }))

const missingPayload = () =>
  new MissingArgumentError({ argument: 'payload', message: 'A success response requires a payload' })

/** A success carrying `payload`; a `null` or `undefined` payload is rejected before the status is checked. */
const succeed = <A>(
  payload: A,
  statusCode = 200,
): Either.Either<ApiResponse<A>, InvalidStatusCodeError | MissingArgumentError> =>
  Either.gen(function* () {
    if (payload === null || payload === undefined) {
      return yield* Either.left(missingPayload())
    }
    const code = yield* successStatus(statusCode)
    return new ApiSuccess({ statusCode: code, payload })
  })

const error = (statusCode: number, message = ''): Either.Either<ApiResponse<never>, InvalidStatusCodeError> =>
  Either.map(errorStatus(statusCode), (code) => new ApiError({ statusCode: code, message }))

/** Error response from a caught exception, using its message */
const fromError = (cause: unknown, statusCode = 500): Either.Either<ApiResponse<never>, InvalidStatusCodeError> =>
  error(statusCode, cause instanceof Error ? cause.message : String(cause))

// ============================================
// Combinators
// ============================================

const isSuccess = <A>(self: ApiResponse<A>): self is ApiSuccess<A> => self._tag === 'Success'

const isError = <A>(self: ApiResponse<A>): self is ApiError => self._tag === 'Error'

const requireFunction = (value: unknown, argument: string): void => {
  if (typeof value !== 'function') {
    throw new MissingArgumentError({ argument, message: `Missing function: ${argument}` })
  }
}

/**
 * Dispatches on the variant. Both handlers are checked before either runs,
 * so a missing `onSuccess` throws even for an error response.
 */
const match = <A, R>(self: ApiResponse<A>, handlers: ApiResponseHandlers<A, R>): R => {
  requireFunction(handlers.onSuccess, 'onSuccess')
  requireFunction(handlers.onError, 'onError')
  return isSuccess(self)
    ? handlers.onSuccess(self.statusCode, self.payload)
    : handlers.onError(self.statusCode, self.message)
}

/**
 * Maps the payload of a success, keeping its status. Errors pass through and `f` is not called.
 * Throws `MissingArgumentError` when `f` returns `null` or `undefined`.
 */
const map = <A, B>(self: ApiResponse<A>, f: (payload: A) => B): ApiResponse<B> => {
  requireFunction(f, 'f')
  if (isError(self)) {
    return self
  }
  const payload = f(self.payload)
  if (payload === null || payload === undefined) {
    throw missingPayload()
  }
  return new ApiSuccess({ statusCode: self.statusCode, payload })
}

const getOrThrow = <A>(self: ApiResponse<A>): A => {
  if (isError(self)) {
    throw new MissingArgumentError({
      argument: 'payload',
      message: `Error response ${String(self.statusCode)} has no payload: ${self.message}`,
    })
  }
  return self.payload
}

// ============================================
// JSON
// ============================================

const encodeError = (self: ApiError, options = defaultJsonOptions) =>
  writeObject(
    [
      ['statusCode', self.statusCode],
      ['errorMessage', self.message],
    ],
    options,
  )

/**
 * Payload-less form: `{"statusCode":201}` or `{"statusCode":500,"errorMessage":"…"}`.
 * A missing status code reads as 0 and fails the range check.
 */
const Json: JsonCodec<ApiResponse> = {
  name: 'ApiResponse',
  encode: (self, options = defaultJsonOptions) =>
    isSuccess(self) ? writeObject([['statusCode', self.statusCode]], options) : encodeError(self, options),
  decode: (input, options = defaultJsonOptions) =>
    Either.gen(function* () {
      const fields = yield* readObject(input, ['statusCode', 'errorMessage'], options)
      const statusCode = yield* optionalNumber(fields.statusCode, 'statusCode', 0)
      const message = yield* optionalString(fields.errorMessage, 'errorMessage')
      return HttpStatus.isSuccess(statusCode) ? yield* success(statusCode) : yield* error(statusCode, message)
    }),
}

/**
 * Payload form: `{"statusCode":200,"payload":…}` or `{"statusCode":404,"errorMessage":"…"}`.
 * The payload is required for success statuses and ignored otherwise.
 */
const jsonCodec = <A>(payloadCodec: JsonCodec<A>): JsonCodec<ApiResponse<A>> => ({
  name: `ApiResponse<${payloadCodec.name}>`,
  encode: (self, options = defaultJsonOptions) =>
    isSuccess(self)
      ? writeObject(
          [
            ['statusCode', self.statusCode],
            ['payload', payloadCodec.encode(self.payload, options)],
          ],
          options,
        )
      : encodeError(self, options),
  decode: (input, options = defaultJsonOptions) =>
    Either.gen(function* () {
      const fields = yield* readObject(input, ['statusCode', 'payload', 'errorMessage'], options)
      const statusCode = yield* optionalNumber(fields.statusCode, 'statusCode', 0)
      const message = yield* optionalString(fields.errorMessage, 'errorMessage')
      if (!HttpStatus.isSuccess(statusCode)) {
        return yield* error(statusCode, message)
      }
      if (fields.payload === undefined || fields.payload === null) {
        return yield* Either.left(missingProperty('payload'))
      }
      const payload = yield* payloadCodec.decode(fields.payload, options)
      return yield* succeed(payload, statusCode)
    }),
})

export const ApiResponse = {
  success,
  succeed,
  error,
  fromError,
  isSuccess,
  isError,
  match,
  map,
  getOrThrow,
  Json,
  jsonCodec,
} as const
