/**
 * IsoDate
 *
 * Proleptic Gregorian calendar date record with regulation, balancing,
 * duration addition and calendar difference. Year/month movement carries
 * field by field; week/day movement is linear through epoch days.
 */

import { createDateDuration } from './duration'
import type { DateDuration } from './duration'
import {
  balanceIsoYearMonth,
  dateToEpochDays,
  daysInMonth,
  epochDaysToDate,
} from './epoch-days'
import { isWithinIsoLimits } from './limits'
import { ArithmeticOverflow, isDateUnit } from './options'
import type { DateUnit } from './options'

// ============================================================================
// Types
// ============================================================================

declare const __isoDate: unique symbol

export type IsoDateFields = {
  readonly year: number
  readonly month: number
  readonly day: number
}

export type IsoDate = IsoDateFields & { readonly [__isoDate]: true }

// ============================================================================
// Errors
// ============================================================================

export { TemporalRangeError } from './errors'
import { TemporalRangeError } from './errors'

const NOON_NS = 43_200_000_000_000n

// ============================================================================
// Construction
// ============================================================================

/**
 * Builds an IsoDate without validation. Only for values a computation has
 * already proven valid, such as the output of epochDaysToDate.
 */
export function createIsoDateUnchecked(year: number, month: number, day: number): IsoDate {
  return Object.freeze({ year, month, day }) as IsoDate
}

export function isValidIsoDate(year: number, month: number, day: number): boolean {
  if (!Number.isInteger(year) || !Number.isInteger(month) || !Number.isInteger(day)) return false
  if (month < 1 || month > 12) return false
  return day >= 1 && day <= daysInMonth(year, month)
}

/**
 * Regulated constructor.
 *
 * Constrain clamps the month into 1–12 and then the day into the clamped
 * month. Reject throws unless both are already valid. Either way the result
 * must lie inside the representable window when taken at noon.
 */
export function createIsoDate(year: number, month: number, day: number, overflow: ArithmeticOverflow): IsoDate {
  if (!Number.isInteger(year) || !Number.isInteger(month) || !Number.isInteger(day)) {
    throw new TemporalRangeError(`Date fields must be integers: ${year}-${month}-${day}`)
  }

  let date: IsoDate
  if (overflow === ArithmeticOverflow.Constrain) {
    const m = Math.min(Math.max(month, 1), 12)
    const d = Math.min(Math.max(day, 1), daysInMonth(year, m))
    date = createIsoDateUnchecked(year, m, d)
  } else {
    if (!isValidIsoDate(year, month, day)) {
      throw new TemporalRangeError(`Invalid ISO date: ${year}-${month}-${day}`)
    }
    date = createIsoDateUnchecked(year, month, day)
  }

  if (!isWithinIsoLimits(isoDateToEpochDays(date), NOON_NS)) {
    throw new TemporalRangeError(`Date ${year}-${month}-${day} is outside the representable range`)
  }
  return date
}

// ============================================================================
// Linearization
// ============================================================================

export function isoDateToEpochDays(date: IsoDateFields): number {
  return dateToEpochDays(date.year, date.month - 1, date.day)
}

export function epochDaysToIsoDate(days: number): IsoDate {
  const { year, month, day } = epochDaysToDate(days)
  return createIsoDateUnchecked(year, month, day)
}

/**
 * Canonicalizes any month/day combination through epoch days. Range limits
 * are not enforced here.
 */
export function balanceIsoDate(year: number, month: number, day: number): IsoDate {
  return epochDaysToIsoDate(dateToEpochDays(year, month - 1, day))
}

// ============================================================================
// Comparison
// ============================================================================

export function compareIsoDates(a: IsoDateFields, b: IsoDateFields): -1 | 0 | 1 {
  if (a.year !== b.year) return a.year < b.year ? -1 : 1
  if (a.month !== b.month) return a.month < b.month ? -1 : 1
  if (a.day !== b.day) return a.day < b.day ? -1 : 1
  return 0
}

export function isoDateEquals(a: IsoDateFields, b: IsoDateFields): boolean {
  return compareIsoDates(a, b) === 0
}

/** True when `candidate` lies past `target` in the direction of `sign`. */
function surpasses(candidate: IsoDateFields, target: IsoDateFields, sign: -1 | 1): boolean {
  return compareIsoDates(candidate, target) * sign === 1
}

// ============================================================================
// Arithmetic
// ============================================================================

/**
 * Adds a date duration.
 *
 * Years and months carry field-wise first, and the original day is regulated
 * against the resulting month with `overflow` (Jan 31 + 1 month constrains to
 * the end of February). Weeks and days are then added as a linear offset.
 */
export function addDurationToIsoDate(date: IsoDate, duration: DateDuration, overflow: ArithmeticOverflow): IsoDate {
  const balanced = balanceIsoYearMonth(date.year + duration.years, date.month + duration.months)
  const intermediate = createIsoDate(balanced.year, balanced.month, date.day, overflow)
  const day = intermediate.day + duration.days + 7 * duration.weeks
  return balanceIsoDate(intermediate.year, intermediate.month, day)
}

/**
 * Signed difference `two − one` broken down up to `largestUnit`.
 *
 * Years and months are counted greedily: a candidate count advances while the
 * date shifted by it does not pass `two`. Leftover days are measured from
 * the shifted date after constraining its day to the month length.
 */
export function differenceIsoDate(one: IsoDate, two: IsoDate, largestUnit: DateUnit): DateDuration {
  if (!isDateUnit(largestUnit)) {
    throw new TemporalRangeError(`largestUnit must be a date unit, got '${largestUnit}'`)
  }

  const comparison = compareIsoDates(one, two)
  if (comparison === 0) return createDateDuration(0, 0, 0, 0)
  const sign = comparison === -1 ? 1 : -1

  let years = 0
  if (largestUnit === 'year') {
    // Start one year short of the raw year difference
    let candidate = two.year - one.year
    if (candidate !== 0) candidate -= sign
    while (!surpasses({ year: one.year + candidate, month: one.month, day: one.day }, two, sign)) {
      years = candidate
      candidate += sign
    }
  }

  let months = 0
  if (largestUnit === 'year' || largestUnit === 'month') {
    let candidate: number = sign
    let intermediate = balanceIsoYearMonth(one.year + years, one.month + candidate)
    while (!surpasses({ year: intermediate.year, month: intermediate.month, day: one.day }, two, sign)) {
      months = candidate
      candidate += sign
      intermediate = balanceIsoYearMonth(intermediate.year, intermediate.month + sign)
    }
  }

  const shifted = balanceIsoYearMonth(one.year + years, one.month + months)
  const constrained = createIsoDate(shifted.year, shifted.month, one.day, ArithmeticOverflow.Constrain)
  let days = isoDateToEpochDays(two) - isoDateToEpochDays(constrained)

  let weeks = 0
  if (largestUnit === 'week') {
    weeks = Math.trunc(days / 7)
    days = days % 7
  }

  return createDateDuration(years, months, weeks, days)
}
