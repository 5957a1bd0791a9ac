/**
 * IsoDateTime
 *
 * Pairs an IsoDate with an IsoTime and owns the combined instant window.
 * Conversions to and from epoch nanoseconds are exact bigint arithmetic.
 */

import type { CalendarProtocol } from './calendar'
import { MS_PER_DAY, MS_PER_HOUR, MS_PER_MINUTE, NS_PER_DAY, NS_PER_DAY_NUMBER, NS_PER_MS } from './constants'
import { createDateDuration } from './duration'
import type { DateDuration, NormalizedTimeDuration } from './duration'
import { epochDaysToDate, floorDiv } from './epoch-days'
import {
  balanceIsoDate,
  compareIsoDates,
  isoDateToEpochDays,
} from './iso-date'
import type { IsoDate } from './iso-date'
import {
  addToIsoTime,
  balanceIsoTime,
  compareIsoTimes,
  isoTimeToNanoseconds,
  roundIsoTime,
} from './iso-time'
import type { IsoTime } from './iso-time'
import { isInstantWithinLimits, isWithinIsoLimits } from './limits'
import type { ArithmeticOverflow, RoundingIncrement, RoundingMode, TemporalUnit } from './options'

// ============================================================================
// Types
// ============================================================================

declare const __isoDateTime: unique symbol

export type IsoDateTime = {
  readonly date: IsoDate
  readonly time: IsoTime
  readonly [__isoDateTime]: true
}

// ============================================================================
// Errors
// ============================================================================

export { TemporalRangeError } from './errors'
import { TemporalRangeError } from './errors'

// ============================================================================
// Construction
// ============================================================================

/** Pairs a date and time without checking the instant window. */
export function createIsoDateTimeUnchecked(date: IsoDate, time: IsoTime): IsoDateTime {
  return Object.freeze({ date, time }) as IsoDateTime
}

export function isIsoDateTimeWithinLimits(date: IsoDate, time: IsoTime): boolean {
  return isWithinIsoLimits(isoDateToEpochDays(date), isoTimeToNanoseconds(time))
}

export function createIsoDateTime(date: IsoDate, time: IsoTime): IsoDateTime {
  if (!isIsoDateTimeWithinLimits(date, time)) {
    throw new TemporalRangeError(
      `Date-time ${date.year}-${date.month}-${date.day} ${time.hour}:${time.minute}:${time.second} is outside the representable range`
    )
  }
  return createIsoDateTimeUnchecked(date, time)
}

/**
 * Balances all nine fields: time first, then its day carry into the date.
 * The result is not range-checked.
 */
export function balanceIsoDateTime(
  year: number,
  month: number,
  day: number,
  hour: number,
  minute: number,
  second: number,
  millisecond: number,
  microsecond: number,
  nanosecond: number
): IsoDateTime {
  const balanced = balanceIsoTime(hour, minute, second, millisecond, microsecond, nanosecond)
  const date = balanceIsoDate(year, month, day + balanced.days)
  return createIsoDateTimeUnchecked(date, balanced.time)
}

// ============================================================================
// Epoch Nanoseconds
// ============================================================================

function assertOffset(offsetNs: number): void {
  if (!Number.isInteger(offsetNs) || Math.abs(offsetNs) >= NS_PER_DAY_NUMBER) {
    throw new TemporalRangeError(`Offset must be an integer number of nanoseconds under one day, got ${offsetNs}`)
  }
}

/** Epoch nanoseconds of the wall-clock value, shifted back by `offsetNs`. */
export function isoDateTimeToEpochNanoseconds(dateTime: IsoDateTime, offsetNs = 0): bigint {
  assertOffset(offsetNs)
  return (
    BigInt(isoDateToEpochDays(dateTime.date)) * NS_PER_DAY +
    isoTimeToNanoseconds(dateTime.time) -
    BigInt(offsetNs)
  )
}

/**
 * Wall-clock fields of an instant with `offsetNs` added.
 *
 * The instant is split into epoch milliseconds and a non-negative
 * sub-millisecond remainder without passing through floating point; the
 * offset enters through the nanosecond field and is balanced out. The
 * instant must lie in the closed instant range; the window's extra day is
 * what the offset may push the wall clock into.
 */
export function isoDateTimeFromEpochNanoseconds(epochNanoseconds: bigint, offsetNs = 0): IsoDateTime {
  if (!isInstantWithinLimits(epochNanoseconds)) {
    throw new TemporalRangeError(`Epoch nanoseconds ${epochNanoseconds} are outside the instant range`)
  }
  assertOffset(offsetNs)

  let epochMs = epochNanoseconds / NS_PER_MS
  let remainder = epochNanoseconds % NS_PER_MS
  if (remainder < 0n) {
    remainder += NS_PER_MS
    epochMs -= 1n
  }

  const ms = Number(epochMs)
  const epochDays = floorDiv(ms, MS_PER_DAY)
  const msOfDay = ms - epochDays * MS_PER_DAY
  const { year, month, day } = epochDaysToDate(epochDays)

  const hour = Math.floor(msOfDay / MS_PER_HOUR)
  const minute = Math.floor(msOfDay / MS_PER_MINUTE) % 60
  const second = Math.floor(msOfDay / 1000) % 60
  const millisecond = msOfDay % 1000

  const subMillisecond = Number(remainder)
  const microsecond = Math.floor(subMillisecond / 1000)
  const nanosecond = subMillisecond % 1000

  return balanceIsoDateTime(year, month, day, hour, minute, second, millisecond, microsecond, nanosecond + offsetNs)
}

// ============================================================================
// Comparison
// ============================================================================

export function compareIsoDateTimes(a: IsoDateTime, b: IsoDateTime): -1 | 0 | 1 {
  const byDate = compareIsoDates(a.date, b.date)
  return byDate !== 0 ? byDate : compareIsoTimes(a.time, b.time)
}

// ============================================================================
// Arithmetic
// ============================================================================

/**
 * Adds a date duration and a normalized time duration.
 *
 * The time part is added first; its day carry joins the duration's days
 * before the calendar moves the date. Duration validation and calendar
 * errors propagate unchanged, and the combined result is range-checked.
 */
export function addDurationToIsoDateTime(
  dateTime: IsoDateTime,
  calendar: CalendarProtocol,
  dateDuration: DateDuration,
  norm: NormalizedTimeDuration,
  overflow: ArithmeticOverflow
): IsoDateTime {
  const timeResult = addToIsoTime(dateTime.time, norm)
  const duration = createDateDuration(
    dateDuration.years,
    dateDuration.months,
    dateDuration.weeks,
    dateDuration.days + timeResult.days
  )
  const date = calendar.dateAdd(dateTime.date, duration, overflow)
  return createIsoDateTime(date, timeResult.time)
}

/** Rounds the time of day and carries any resulting day into the date. */
export function roundIsoDateTime(
  dateTime: IsoDateTime,
  increment: RoundingIncrement,
  unit: TemporalUnit,
  mode: RoundingMode,
  dayLengthNs?: bigint
): IsoDateTime {
  const rounded = roundIsoTime(dateTime.time, increment, unit, mode, dayLengthNs)
  const { year, month, day } = dateTime.date
  const date = balanceIsoDate(year, month, day + rounded.days)
  return createIsoDateTime(date, rounded.time)
}
