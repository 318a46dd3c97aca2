/**
 * Predicates over numeric HTTP status codes.
 */

const inRange = (statusCode: number, from: number, until: number): boolean =>
  Number.isInteger(statusCode) && statusCode >= from && statusCode < until

export const isValid = (statusCode: number): boolean => inRange(statusCode, 100, 600)
export const isInformational = (statusCode: number): boolean => inRange(statusCode, 100, 200)
export const isSuccess = (statusCode: number): boolean => inRange(statusCode, 200, 300)
export const isRedirect = (statusCode: number): boolean => inRange(statusCode, 300, 400)
export const isClientError = (statusCode: number): boolean => inRange(statusCode, 400, 500)
export const isServerError = (statusCode: number): boolean => inRange(statusCode, 500, 600)

export const isNotFound = (statusCode: number): boolean => statusCode === 404
export const isUnauthorized = (statusCode: number): boolean => statusCode === 401
export const isForbidden = (statusCode: number): boolean => statusCode === 403
export const isInternalServerError = (statusCode: number): boolean => statusCode === 500
