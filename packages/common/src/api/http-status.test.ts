import { describe, expect, it } from '@effect/vitest'
import { Effect } from 'effect'
import * as HttpStatus from './http-status.js'

describe('HttpStatus', () => {
  it.effect('accepts 100-599 only', () =>
    Effect.gen(function* () {
      expect(HttpStatus.isValid(100)).toBe(true)
      expect(HttpStatus.isValid(599)).toBe(true)
      expect(HttpStatus.isValid(99)).toBe(false)
      expect(HttpStatus.isValid(600)).toBe(false)
      expect(HttpStatus.isValid(200.5)).toBe(false)
    }),
  )

  it.effect('classifies status classes', () =>
    Effect.gen(function* () {
      expect(HttpStatus.isInformational(101)).toBe(true)
      expect(HttpStatus.isSuccess(204)).toBe(true)
      expect(HttpStatus.isSuccess(300)).toBe(false)
      expect(HttpStatus.isRedirect(302)).toBe(true)
      expect(HttpStatus.isClientError(418)).toBe(true)
      expect(HttpStatus.isServerError(503)).toBe(true)
    }),
  )

  it.effect('recognises common statuses', () =>
    Effect.gen(function* () {
      expect(HttpStatus.isNotFound(404)).toBe(true)
      expect(HttpStatus.isUnauthorized(401)).toBe(true)
      expect(HttpStatus.isForbidden(403)).toBe(true)
      expect(HttpStatus.isInternalServerError(500)).toBe(true)
      expect(HttpStatus.isInternalServerError(502)).toBe(false)
    }),
  )
})
