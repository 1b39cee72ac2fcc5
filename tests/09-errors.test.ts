/**
 * Segment 09: Error System Tests
 *
 * CspError base class, error code table, and all error subclasses.
 */
import { describe, it, expect } from 'vitest'
import {
  CspError,
  CspErrorCode,
  InvalidInputError,
  InvalidRangeError,
  ParseError,
} from '../src/errors'

describe('Segment 09: Error System', () => {
  describe('CspError base class', () => {
    it('constructor sets code and message', () => {
      const err = new CspError(CspErrorCode.INVALID_INPUT, 'test message')
      expect(err.code).toBe('INVALID_INPUT')
      expect(err.message).toBe('test message')
    })

    it('is instanceof Error', () => {
      expect(new CspError(CspErrorCode.PARSE_ERROR, 'x')).toBeInstanceOf(Error)
    })

    it('name property is CspError', () => {
      expect(new CspError(CspErrorCode.PARSE_ERROR, 'x').name).toBe('CspError')
    })
  })

  describe('CspErrorCode', () => {
    it('has exactly 3 unique code values', () => {
      const values = Object.values(CspErrorCode)
      expect(values).toHaveLength(3)
      expect(new Set(values).size).toBe(3)
    })

    it('code values match their key names', () => {
      for (const [key, value] of Object.entries(CspErrorCode)) {
        expect(value).toBe(key)
      }
    })
  })

  describe('subclasses', () => {
    const cases = [
      { Ctor: InvalidInputError, name: 'InvalidInputError', code: 'INVALID_INPUT' },
      { Ctor: InvalidRangeError, name: 'InvalidRangeError', code: 'INVALID_RANGE' },
      { Ctor: ParseError, name: 'ParseError', code: 'PARSE_ERROR' },
    ] as const

    for (const { Ctor, name, code } of cases) {
      it(`${name} carries code ${code}`, () => {
        const err = new Ctor('boom')
        expect(err).toBeInstanceOf(CspError)
        expect(err).toBeInstanceOf(Ctor)
        expect(err.name).toBe(name)
        expect(err.code).toBe(code)
        expect(err.message).toBe('boom')
      })
    }
  })
})
