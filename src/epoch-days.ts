/**
 * Epoch-Day Utilities
 *
 * Pure conversions between proleptic Gregorian (year, month, day) triples and
 * signed day counts from 1970-01-01. Uses the 400-year era decomposition so
 * every step is an exact integer operation for any 32-bit year.
 */

import { MS_PER_DAY } from './constants'

// ============================================================================
// Helpers
// ============================================================================

export function isLeapYear(year: number): boolean {
  return (year % 4 === 0 && year % 100 !== 0) || year % 400 === 0
}

export function daysInMonth(year: number, month: number): number {
  const days = [0, 31, 28, 31, 30, 31, 30, 31, 31, 30, 31, 30, 31]
  if (month === 2 && isLeapYear(year)) return 29
  return days[month]!
}

export function daysInYear(year: number): number {
  return isLeapYear(year) ? 366 : 365
}

/** Floored division: the quotient rounds toward negative infinity. */
export function floorDiv(dividend: number, divisor: number): number {
  return Math.floor(dividend / divisor)
}

/** Euclidean modulo: the result is always in [0, |divisor|). */
export function euclidMod(dividend: number, divisor: number): number {
  const r = dividend % divisor
  return r < 0 ? r + Math.abs(divisor) : r + 0
}

// ============================================================================
// Era Arithmetic
// ============================================================================

const DAYS_PER_ERA = 146097
// Days from 0000-03-01 to 1970-01-01
const EPOCH_SHIFT = 719468

function daysFromCivil(year: number, month: number, day: number): number {
  // Years start in March so the leap day falls at the end
  const y = month <= 2 ? year - 1 : year
  const era = floorDiv(y, 400)
  const yoe = y - era * 400
  const mp = month > 2 ? month - 3 : month + 9
  const doy = floorDiv(153 * mp + 2, 5) + day - 1
  const doe = yoe * 365 + floorDiv(yoe, 4) - floorDiv(yoe, 100) + doy
  return era * DAYS_PER_ERA + doe - EPOCH_SHIFT
}

function civilFromDays(days: number): { year: number; month: number; day: number } {
  const z = days + EPOCH_SHIFT
  const era = floorDiv(z, DAYS_PER_ERA)
  const doe = z - era * DAYS_PER_ERA
  const yoe = floorDiv(doe - floorDiv(doe, 1460) + floorDiv(doe, 36524) - floorDiv(doe, 146096), 365)
  const doy = doe - (365 * yoe + floorDiv(yoe, 4) - floorDiv(yoe, 100))
  const mp = floorDiv(5 * doy + 2, 153)
  const day = doy - floorDiv(153 * mp + 2, 5) + 1
  const month = mp < 10 ? mp + 3 : mp - 9
  const year = yoe + era * 400 + (month <= 2 ? 1 : 0)
  return { year, month, day }
}

// ============================================================================
// Public Conversions
// ============================================================================

/**
 * Day number of (year, monthIndex, day) relative to 1970-01-01.
 *
 * `monthIndex` is zero-based and may fall outside [0, 11]; whole years are
 * carried out of it first. `day` may fall outside the month and is applied as
 * a linear offset from the first of the resolved month.
 */
export function dateToEpochDays(year: number, monthIndex: number, day: number): number {
  const resolvedYear = year + floorDiv(monthIndex, 12)
  const resolvedMonth = euclidMod(monthIndex, 12)
  return daysFromCivil(resolvedYear, resolvedMonth + 1, 1) + day - 1
}

/** Inverse of dateToEpochDays; the returned month is one-based. */
export function epochDaysToDate(days: number): { year: number; month: number; day: number } {
  return civilFromDays(days)
}

/** Carries a one-based month outside [1, 12] into the year. */
export function balanceIsoYearMonth(year: number, month: number): { year: number; month: number } {
  return {
    year: year + floorDiv(month - 1, 12),
    month: euclidMod(month - 1, 12) + 1,
  }
}

export function epochDaysToEpochMs(days: number, msOfDay: number): number {
  return days * MS_PER_DAY + msOfDay
}
