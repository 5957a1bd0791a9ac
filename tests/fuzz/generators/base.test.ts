/**
 * Tests for base generator utilities.
 */
import { describe, it, expect } from 'vitest'
import * as fc from 'fast-check'
import {
  isoDateGen,
  isoTimeGen,
  isoDateTimeGen,
  dateDurationGen,
  boundaryDateGen,
  boundaryTimeGen,
  MODERN_YEARS,
} from './base'
import { isValidIsoDate } from '../../../src/iso-date'
import { isValidIsoTime } from '../../../src/iso-time'
import { isIsoDateTimeWithinLimits } from '../../../src/iso-date-time'
import { hasConsistentSign } from '../lib/utils'

describe('base generators', () => {
  describe('isoDateGen', () => {
    it('generates valid dates', () => {
      fc.assert(
        fc.property(isoDateGen(), (date) => {
          expect(isValidIsoDate(date.year, date.month, date.day)).toBe(true)
        })
      )
    })

    it('respects year range', () => {
      fc.assert(
        fc.property(isoDateGen({ minYear: 2020, maxYear: 2025 }), (date) => {
          expect(date.year).toBeGreaterThanOrEqual(2020)
          expect(date.year).toBeLessThanOrEqual(2025)
        })
      )
    })

    it('respects maxDay', () => {
      fc.assert(
        fc.property(isoDateGen({ maxDay: 28 }), (date) => {
          expect(date.day).toBeLessThanOrEqual(28)
        })
      )
    })
  })

  describe('isoTimeGen', () => {
    it('generates valid times', () => {
      fc.assert(
        fc.property(isoTimeGen(), (time) => {
          expect(isValidIsoTime(time)).toBe(true)
        })
      )
    })
  })

  describe('isoDateTimeGen', () => {
    it('stays in the modern range and the instant window', () => {
      fc.assert(
        fc.property(isoDateTimeGen(), (dt) => {
          expect(dt.date.year).toBeGreaterThanOrEqual(MODERN_YEARS.min)
          expect(dt.date.year).toBeLessThanOrEqual(MODERN_YEARS.max)
          expect(isIsoDateTimeWithinLimits(dt.date, dt.time)).toBe(true)
        })
      )
    })
  })

  describe('dateDurationGen', () => {
    it('never mixes signs', () => {
      fc.assert(
        fc.property(dateDurationGen(), (duration) => {
          expect(hasConsistentSign(duration)).toBe(true)
        })
      )
    })
  })

  describe('boundary generators', () => {
    it('boundary dates are valid', () => {
      fc.assert(
        fc.property(boundaryDateGen(), (date) => {
          expect(isValidIsoDate(date.year, date.month, date.day)).toBe(true)
        })
      )
    })

    it('boundary times are valid', () => {
      fc.assert(
        fc.property(boundaryTimeGen(), (time) => {
          expect(isValidIsoTime(time)).toBe(true)
        })
      )
    })
  })
})
