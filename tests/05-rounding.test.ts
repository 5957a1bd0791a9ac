/**
 * Segment 05: Increment Rounding Tests
 *
 * Every rounding mode on positive and negative quantities, exact ties and
 * exact multiples.
 */

import { describe, it, expect } from 'vitest'
import { roundToIncrement } from '../src/rounding'
import { RoundingMode } from '../src/options'
import { TemporalRangeError } from '../src/errors'

describe('Segment 05: roundToIncrement', () => {
  // ========================================================================
  // Ties
  // ========================================================================

  describe('exact ties (±25 to 10)', () => {
    const cases: Array<[RoundingMode, bigint, bigint]> = [
      ['ceil', 30n, -20n],
      ['floor', 20n, -30n],
      ['expand', 30n, -30n],
      ['trunc', 20n, -20n],
      ['halfCeil', 30n, -20n],
      ['halfFloor', 20n, -30n],
      ['halfExpand', 30n, -30n],
      ['halfTrunc', 20n, -20n],
      ['halfEven', 20n, -20n],
    ]

    for (const [mode, positive, negative] of cases) {
      it(`${mode}`, () => {
        expect(roundToIncrement(25n, 10n, mode)).toBe(positive)
        expect(roundToIncrement(-25n, 10n, mode)).toBe(negative)
      })
    }
  })

  it('halfEven picks the even multiple above when the lower one is odd', () => {
    expect(roundToIncrement(35n, 10n, 'halfEven')).toBe(40n)
    expect(roundToIncrement(-35n, 10n, 'halfEven')).toBe(-40n)
  })

  // ========================================================================
  // Off-tie values
  // ========================================================================

  describe('off-tie values', () => {
    it('half modes go to the nearer multiple', () => {
      expect(roundToIncrement(24n, 10n, 'halfExpand')).toBe(20n)
      expect(roundToIncrement(26n, 10n, 'halfTrunc')).toBe(30n)
      expect(roundToIncrement(-26n, 10n, 'halfCeil')).toBe(-30n)
    })

    it('directional modes ignore distance', () => {
      expect(roundToIncrement(21n, 10n, 'ceil')).toBe(30n)
      expect(roundToIncrement(29n, 10n, 'floor')).toBe(20n)
      expect(roundToIncrement(-21n, 10n, 'expand')).toBe(-30n)
      expect(roundToIncrement(-29n, 10n, 'trunc')).toBe(-20n)
    })
  })

  // ========================================================================
  // Multiples & magnitudes
  // ========================================================================

  it('exact multiples are unchanged under every mode', () => {
    for (const mode of Object.values(RoundingMode)) {
      expect(roundToIncrement(40n, 10n, mode)).toBe(40n)
      expect(roundToIncrement(-40n, 10n, mode)).toBe(-40n)
      expect(roundToIncrement(0n, 10n, mode)).toBe(0n)
    }
  })

  it('quantities below one increment', () => {
    expect(roundToIncrement(3n, 10n, 'ceil')).toBe(10n)
    expect(roundToIncrement(3n, 10n, 'floor')).toBe(0n)
    expect(roundToIncrement(-3n, 10n, 'floor')).toBe(-10n)
  })

  it('stays exact for day-scale nanosecond counts', () => {
    const day = 86_400_000_000_000n
    expect(roundToIncrement(day * 1_000_000n + 1n, day, 'ceil')).toBe(day * 1_000_001n)
  })

  it('increment of one is the identity', () => {
    expect(roundToIncrement(-17n, 1n, 'halfEven')).toBe(-17n)
  })

  it('rejects a non-positive increment', () => {
    expect(() => roundToIncrement(5n, 0n, 'trunc')).toThrow(TemporalRangeError)
    expect(() => roundToIncrement(5n, -1n, 'trunc')).toThrow(TemporalRangeError)
  })
})
