/**
 * Duration Records
 *
 * The date part of a duration (years, months, weeks, days), a raw time part,
 * and the normalized form of a time part as a single nanosecond total.
 */

import {
  MAX_CALENDAR_DURATION_COMPONENT,
  MAX_TIME_DURATION_NS,
} from './constants'
import { TemporalRangeError } from './errors'

// ============================================================================
// Types
// ============================================================================

export type DateDuration = {
  readonly years: number
  readonly months: number
  readonly weeks: number
  readonly days: number
}

/** Per-field time deltas, not carried or normalized. */
export type TimeDuration = {
  readonly hours: number
  readonly minutes: number
  readonly seconds: number
  readonly milliseconds: number
  readonly microseconds: number
  readonly nanoseconds: number
}

declare const __normalizedTimeDuration: unique symbol

/** A time-only duration held as one nanosecond total below 2^53 seconds. */
export type NormalizedTimeDuration = {
  readonly totalNanoseconds: bigint
  readonly [__normalizedTimeDuration]: true
}

// ============================================================================
// Date Durations
// ============================================================================

const MAX_DAYS = Number.MAX_SAFE_INTEGER / 86_400

export function createDateDuration(years: number, months: number, weeks: number, days: number): DateDuration {
  const components = [years, months, weeks, days]
  for (const value of components) {
    if (!Number.isInteger(value)) {
      throw new TemporalRangeError(`Duration components must be integers, got ${value}`)
    }
  }

  const signs = new Set(components.filter((v) => v !== 0).map(Math.sign))
  if (signs.size > 1) {
    throw new TemporalRangeError('Duration components must not have mixed signs')
  }

  for (const value of [years, months, weeks]) {
    if (Math.abs(value) >= MAX_CALENDAR_DURATION_COMPONENT) {
      throw new TemporalRangeError(`Duration component ${value} is out of range`)
    }
  }
  if (Math.abs(days) > MAX_DAYS) {
    throw new TemporalRangeError(`Duration days ${days} is out of range`)
  }

  return Object.freeze({ years: years + 0, months: months + 0, weeks: weeks + 0, days: days + 0 })
}

export const ZERO_DATE_DURATION: DateDuration = Object.freeze({ years: 0, months: 0, weeks: 0, days: 0 })

export function dateDurationSign(duration: DateDuration): -1 | 0 | 1 {
  for (const value of [duration.years, duration.months, duration.weeks, duration.days]) {
    if (value < 0) return -1
    if (value > 0) return 1
  }
  return 0
}

export function negateDateDuration(duration: DateDuration): DateDuration {
  return createDateDuration(-duration.years, -duration.months, -duration.weeks, -duration.days)
}

// ============================================================================
// Time Durations
// ============================================================================

export function createTimeDuration(
  hours: number,
  minutes: number,
  seconds: number,
  milliseconds: number,
  microseconds: number,
  nanoseconds: number
): TimeDuration {
  return Object.freeze({ hours, minutes, seconds, milliseconds, microseconds, nanoseconds })
}

function toBigIntExact(value: number, field: string): bigint {
  if (!Number.isInteger(value)) {
    throw new TemporalRangeError(`${field} must be an integer, got ${value}`)
  }
  return BigInt(value)
}

export function normalizedTimeDurationFromNanoseconds(totalNanoseconds: bigint): NormalizedTimeDuration {
  const magnitude = totalNanoseconds < 0n ? -totalNanoseconds : totalNanoseconds
  if (magnitude >= MAX_TIME_DURATION_NS) {
    throw new TemporalRangeError('Time duration exceeds the maximum of 2^53 seconds')
  }
  return Object.freeze({ totalNanoseconds }) as NormalizedTimeDuration
}

/** Sums all fields of `duration` into one nanosecond total. */
export function normalizeTimeDuration(duration: TimeDuration): NormalizedTimeDuration {
  const total =
    toBigIntExact(duration.hours, 'hours') * 3_600_000_000_000n +
    toBigIntExact(duration.minutes, 'minutes') * 60_000_000_000n +
    toBigIntExact(duration.seconds, 'seconds') * 1_000_000_000n +
    toBigIntExact(duration.milliseconds, 'milliseconds') * 1_000_000n +
    toBigIntExact(duration.microseconds, 'microseconds') * 1_000n +
    toBigIntExact(duration.nanoseconds, 'nanoseconds')
  return normalizedTimeDurationFromNanoseconds(total)
}

export const ZERO_TIME_DURATION: NormalizedTimeDuration = normalizedTimeDurationFromNanoseconds(0n)

/** Whole seconds, truncated toward zero. */
export function normalizedSeconds(norm: NormalizedTimeDuration): number {
  return Number(norm.totalNanoseconds / 1_000_000_000n)
}

/** Nanoseconds left after whole seconds; shares the sign of the total. */
export function normalizedSubseconds(norm: NormalizedTimeDuration): number {
  return Number(norm.totalNanoseconds % 1_000_000_000n)
}
