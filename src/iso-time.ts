/**
 * IsoTime
 *
 * Time-of-day record: hour, minute, second and three sub-second fields. It
 * is a sub-day offset with no calendar meaning. Values are frozen; every
 * operation returns a new record.
 */

import { MAX_ROUNDING_STEP_NS, MS_PER_HOUR, MS_PER_MINUTE, MS_PER_SECOND, NS_PER_DAY } from './constants'
import { createTimeDuration, normalizedSeconds, normalizedSubseconds } from './duration'
import type { NormalizedTimeDuration, TimeDuration } from './duration'
import { euclidMod, floorDiv } from './epoch-days'
import { ArithmeticOverflow, nanosecondsPerUnit } from './options'
import type { RoundingIncrement, RoundingMode, TemporalUnit } from './options'
import { roundToIncrement } from './rounding'

// ============================================================================
// Types
// ============================================================================

declare const __isoTime: unique symbol

export type IsoTimeFields = {
  readonly hour: number
  readonly minute: number
  readonly second: number
  readonly millisecond: number
  readonly microsecond: number
  readonly nanosecond: number
}

export type IsoTime = IsoTimeFields & { readonly [__isoTime]: true }

/** A time of day together with the whole days carried out of it. */
export type TimeWithDayCarry = {
  readonly days: number
  readonly time: IsoTime
}

// ============================================================================
// Errors
// ============================================================================

export { TemporalRangeError } from './errors'
import { TemporalRangeError } from './errors'

// ============================================================================
// Construction
// ============================================================================

/**
 * Builds an IsoTime without any validation. The caller guarantees every field
 * is an integer within its range, e.g. because the values came out of
 * balanceIsoTime.
 */
export function createIsoTimeUnchecked(
  hour: number,
  minute: number,
  second: number,
  millisecond: number,
  microsecond: number,
  nanosecond: number
): IsoTime {
  return Object.freeze({ hour, minute, second, millisecond, microsecond, nanosecond }) as IsoTime
}

const MIDNIGHT = createIsoTimeUnchecked(0, 0, 0, 0, 0, 0)
const NOON = createIsoTimeUnchecked(12, 0, 0, 0, 0, 0)

export function midnightIsoTime(): IsoTime {
  return MIDNIGHT
}

export function noonIsoTime(): IsoTime {
  return NOON
}

function clamp(value: number, min: number, max: number): number {
  return Math.min(Math.max(value, min), max)
}

/**
 * Regulated constructor. Constrain clamps each field into its own range with
 * no carry between fields; Reject throws unless every field is in range.
 */
export function createIsoTime(
  hour: number,
  minute: number,
  second: number,
  millisecond: number,
  microsecond: number,
  nanosecond: number,
  overflow: ArithmeticOverflow
): IsoTime {
  const fields = [hour, minute, second, millisecond, microsecond, nanosecond]
  if (!fields.every(Number.isInteger)) {
    throw new TemporalRangeError(`Time fields must be integers: ${fields.join(', ')}`)
  }

  if (overflow === ArithmeticOverflow.Constrain) {
    return createIsoTimeUnchecked(
      clamp(hour, 0, 23),
      clamp(minute, 0, 59),
      clamp(second, 0, 59),
      clamp(millisecond, 0, 999),
      clamp(microsecond, 0, 999),
      clamp(nanosecond, 0, 999)
    )
  }

  const candidate = { hour, minute, second, millisecond, microsecond, nanosecond }
  if (!isValidIsoTime(candidate)) {
    throw new TemporalRangeError(
      `Invalid time: ${hour}:${minute}:${second}.${millisecond}.${microsecond}.${nanosecond}`
    )
  }
  return createIsoTimeUnchecked(hour, minute, second, millisecond, microsecond, nanosecond)
}

/**
 * Builds a time from whole fields and a fraction of a second in [0, 1).
 * Milliseconds and microseconds are truncated; the last nanosecond digit is
 * rounded half up so that binary fractions like 0.123456789 keep their final
 * digit.
 */
export function isoTimeFromComponents(hour: number, minute: number, second: number, fraction: number): IsoTime {
  if (!Number.isFinite(fraction) || fraction < 0 || fraction >= 1) {
    throw new TemporalRangeError(`Fractional second must be in [0, 1), got ${fraction}`)
  }
  const millisecond = fraction * 1000
  const microsecond = euclidMod(millisecond, 1) * 1000
  const nanosecond = Math.floor(euclidMod(microsecond, 1) * 1000 + 0.5)

  return createIsoTime(
    hour,
    minute,
    second,
    Math.trunc(millisecond),
    Math.trunc(microsecond),
    nanosecond,
    ArithmeticOverflow.Reject
  )
}

// ============================================================================
// Validation
// ============================================================================

function inRange(value: number, max: number): boolean {
  return Number.isInteger(value) && value >= 0 && value <= max
}

/** Field-range check only. */
export function isValidIsoTime(fields: IsoTimeFields): boolean {
  return (
    inRange(fields.hour, 23) &&
    inRange(fields.minute, 59) &&
    inRange(fields.second, 59) &&
    inRange(fields.millisecond, 999) &&
    inRange(fields.microsecond, 999) &&
    inRange(fields.nanosecond, 999)
  )
}

// ============================================================================
// Balancing
// ============================================================================

/**
 * Normalizes arbitrary finite field values, carrying upward from nanoseconds
 * to days. Every stage uses floored division so the retained remainder is
 * non-negative even for negative inputs. Fractions are not spread into finer
 * fields; each balanced field is truncated.
 */
export function balanceIsoTime(
  hour: number,
  minute: number,
  second: number,
  millisecond: number,
  microsecond: number,
  nanosecond: number
): TimeWithDayCarry {
  const fields = [hour, minute, second, millisecond, microsecond, nanosecond]
  if (!fields.every(Number.isFinite)) {
    throw new TemporalRangeError('Cannot balance non-finite time fields')
  }

  microsecond += floorDiv(nanosecond, 1000)
  nanosecond = euclidMod(nanosecond, 1000)

  millisecond += floorDiv(microsecond, 1000)
  microsecond = euclidMod(microsecond, 1000)

  second += floorDiv(millisecond, 1000)
  millisecond = euclidMod(millisecond, 1000)

  minute += floorDiv(second, 60)
  second = euclidMod(second, 60)

  hour += floorDiv(minute, 60)
  minute = euclidMod(minute, 60)

  const days = floorDiv(hour, 24)
  hour = euclidMod(hour, 24)

  return {
    days: days + 0,
    time: createIsoTimeUnchecked(
      Math.trunc(hour),
      Math.trunc(minute),
      Math.trunc(second),
      Math.trunc(millisecond),
      Math.trunc(microsecond),
      Math.trunc(nanosecond)
    ),
  }
}

// ============================================================================
// Arithmetic
// ============================================================================

/** Adds a normalized time duration and balances, reporting the day carry. */
export function addToIsoTime(time: IsoTime, norm: NormalizedTimeDuration): TimeWithDayCarry {
  return balanceIsoTime(
    time.hour,
    time.minute,
    time.second + normalizedSeconds(norm),
    time.millisecond,
    time.microsecond,
    time.nanosecond + normalizedSubseconds(norm)
  )
}

/** Raw per-field deltas of `two − one`; the caller normalizes them. */
export function differenceIsoTime(one: IsoTime, two: IsoTime): TimeDuration {
  return createTimeDuration(
    two.hour - one.hour,
    two.minute - one.minute,
    two.second - one.second,
    two.millisecond - one.millisecond,
    two.microsecond - one.microsecond,
    two.nanosecond - one.nanosecond
  )
}

// ============================================================================
// Conversion & Comparison
// ============================================================================

/** Milliseconds since midnight, ignoring microseconds and nanoseconds. */
export function isoTimeToEpochMs(time: IsoTime): number {
  return time.hour * MS_PER_HOUR + time.minute * MS_PER_MINUTE + time.second * MS_PER_SECOND + time.millisecond
}

export function isoTimeToNanoseconds(time: IsoTime): bigint {
  return (
    BigInt(isoTimeToEpochMs(time)) * 1_000_000n +
    BigInt(time.microsecond) * 1_000n +
    BigInt(time.nanosecond)
  )
}

export function compareIsoTimes(a: IsoTime, b: IsoTime): -1 | 0 | 1 {
  const left = [a.hour, a.minute, a.second, a.millisecond, a.microsecond, a.nanosecond]
  const right = [b.hour, b.minute, b.second, b.millisecond, b.microsecond, b.nanosecond]
  for (let i = 0; i < left.length; i++) {
    const l = left[i]!
    const r = right[i]!
    if (l !== r) return l < r ? -1 : 1
  }
  return 0
}

// ============================================================================
// Rounding
// ============================================================================

/** Nanoseconds of `time` at and below `unit`; Day and Hour count from midnight. */
function roundingQuantity(time: IsoTime, unit: TemporalUnit): bigint {
  const nanoseconds = BigInt(time.nanosecond)
  const microseconds = BigInt(time.microsecond) * 1_000n + nanoseconds
  const milliseconds = BigInt(time.millisecond) * 1_000_000n + microseconds
  const seconds = BigInt(time.second) * 1_000_000_000n + milliseconds
  const minutes = BigInt(time.minute) * 60_000_000_000n + seconds
  const hours = BigInt(time.hour) * 3_600_000_000_000n + minutes

  switch (unit) {
    case 'day':
    case 'hour':
      return hours
    case 'minute':
      return minutes
    case 'second':
      return seconds
    case 'millisecond':
      return milliseconds
    case 'microsecond':
      return microseconds
    case 'nanosecond':
      return nanoseconds
    default:
      throw new TemporalRangeError(`Cannot round a time to '${unit}'`)
  }
}

/**
 * Rounds `time` to `increment` multiples of `unit`.
 *
 * Fields coarser than `unit` are kept; `unit` and finer fields are replaced
 * by the rounded quantity and re-balanced. Rounding to Day yields the
 * rounded day count as the carry with a midnight time.
 *
 * @param dayLengthNs - length of the day when `unit` is Day; 24 hours if omitted
 */
export function roundIsoTime(
  time: IsoTime,
  increment: RoundingIncrement,
  unit: TemporalUnit,
  mode: RoundingMode,
  dayLengthNs?: bigint
): TimeWithDayCarry {
  const quantity = roundingQuantity(time, unit)

  const nsPerUnit = unit === 'day' ? (dayLengthNs ?? NS_PER_DAY) : nanosecondsPerUnit(unit)
  if (nsPerUnit === undefined || nsPerUnit <= 0n) {
    throw new TemporalRangeError(`Unit '${unit}' must have a positive nanosecond length`)
  }

  const step = nsPerUnit * BigInt(increment)
  if (step > MAX_ROUNDING_STEP_NS) {
    throw new TemporalRangeError(`Rounding step of ${increment} ${unit} is not representable`)
  }

  const result = Number(roundToIncrement(quantity, step, mode) / nsPerUnit)

  switch (unit) {
    case 'day':
      return { days: result, time: MIDNIGHT }
    case 'hour':
      return balanceIsoTime(result, 0, 0, 0, 0, 0)
    case 'minute':
      return balanceIsoTime(time.hour, result, 0, 0, 0, 0)
    case 'second':
      return balanceIsoTime(time.hour, time.minute, result, 0, 0, 0)
    case 'millisecond':
      return balanceIsoTime(time.hour, time.minute, time.second, result, 0, 0)
    case 'microsecond':
      return balanceIsoTime(time.hour, time.minute, time.second, time.millisecond, result, 0)
    default:
      return balanceIsoTime(time.hour, time.minute, time.second, time.millisecond, time.microsecond, result)
  }
}
