/**
 * Segment 09: Error System Tests
 *
 * Tests the consolidated error system in errors.ts: TemporalError base
 * class, error codes, subclasses and the re-exports from each module.
 */

import { describe, it, expect } from 'vitest'
import {
  TemporalError,
  TemporalErrorCode,
  TemporalRangeError,
  TemporalTypeError,
  isTemporalError,
} from '../src/errors'
import { TemporalRangeError as IsoDateRangeError, createIsoDate } from '../src/iso-date'
import { TemporalRangeError as IsoTimeRangeError } from '../src/iso-time'
import { TemporalRangeError as IsoDateTimeRangeError } from '../src/iso-date-time'
import { ArithmeticOverflow } from '../src/options'

describe('Segment 09: Error System', () => {
  // ========================================================================
  // TemporalError Base Class
  // ========================================================================

  describe('TemporalError base class', () => {
    it('constructor sets code and message', () => {
      const err = new TemporalError(TemporalErrorCode.RANGE, 'test message')
      expect(err.code).toBe('RANGE')
      expect(err.message).toBe('test message')
    })

    it('is instanceof Error', () => {
      expect(new TemporalError(TemporalErrorCode.TYPE, 'x')).toBeInstanceOf(Error)
    })

    it('name property is TemporalError', () => {
      expect(new TemporalError(TemporalErrorCode.TYPE, 'x').name).toBe('TemporalError')
    })
  })

  // ========================================================================
  // TemporalErrorCode
  // ========================================================================

  describe('TemporalErrorCode', () => {
    it('has exactly 2 unique code values', () => {
      const values = Object.values(TemporalErrorCode)
      expect(values).toHaveLength(2)
      expect(new Set(values).size).toBe(2)
    })

    it('code values match their key names', () => {
      for (const [key, value] of Object.entries(TemporalErrorCode)) {
        expect(value).toBe(key)
      }
    })
  })

  // ========================================================================
  // Subclasses
  // ========================================================================

  describe('TemporalRangeError', () => {
    it('carries the RANGE code and its own name', () => {
      const err = new TemporalRangeError('out of range')
      expect(err).toBeInstanceOf(TemporalError)
      expect(err.code).toBe(TemporalErrorCode.RANGE)
      expect(err.name).toBe('TemporalRangeError')
      expect(err.message).toBe('out of range')
    })
  })

  describe('TemporalTypeError', () => {
    it('carries the TYPE code and its own name', () => {
      const err = new TemporalTypeError('wrong type')
      expect(err).toBeInstanceOf(TemporalError)
      expect(err.code).toBe(TemporalErrorCode.TYPE)
      expect(err.name).toBe('TemporalTypeError')
    })
  })

  describe('isTemporalError', () => {
    it('recognizes library errors only', () => {
      expect(isTemporalError(new TemporalRangeError('x'))).toBe(true)
      expect(isTemporalError(new TemporalTypeError('x'))).toBe(true)
      expect(isTemporalError(new RangeError('x'))).toBe(false)
      expect(isTemporalError('x')).toBe(false)
    })
  })

  // ========================================================================
  // Re-exports
  // ========================================================================

  describe('module re-exports', () => {
    it('every module exposes the same class', () => {
      expect(IsoDateRangeError).toBe(TemporalRangeError)
      expect(IsoTimeRangeError).toBe(TemporalRangeError)
      expect(IsoDateTimeRangeError).toBe(TemporalRangeError)
    })

    it('thrown errors carry the message and code', () => {
      let caught: unknown
      try {
        createIsoDate(2021, 2, 30, ArithmeticOverflow.Reject)
      } catch (error) {
        caught = error
      }
      expect(caught).toBeInstanceOf(TemporalRangeError)
      expect(isTemporalError(caught) && caught.code).toBe('RANGE')
      expect(isTemporalError(caught) && caught.message).toBe('Invalid ISO date: 2021-2-30')
    })
  })
})
