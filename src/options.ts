/**
 * Options
 *
 * Overflow policy, units, rounding modes and rounding increments, plus the
 * parsers that turn loosely typed option values into them.
 */

import { TemporalRangeError, TemporalTypeError } from './errors'

// ============================================================================
// Overflow Policy
// ============================================================================

export const ArithmeticOverflow = {
  Constrain: 'constrain',
  Reject: 'reject',
} as const

export type ArithmeticOverflow = (typeof ArithmeticOverflow)[keyof typeof ArithmeticOverflow]

// ============================================================================
// Units
// ============================================================================

export const TemporalUnit = {
  Year: 'year',
  Month: 'month',
  Week: 'week',
  Day: 'day',
  Hour: 'hour',
  Minute: 'minute',
  Second: 'second',
  Millisecond: 'millisecond',
  Microsecond: 'microsecond',
  Nanosecond: 'nanosecond',
} as const

export type TemporalUnit = (typeof TemporalUnit)[keyof typeof TemporalUnit]

export type DateUnit = 'year' | 'month' | 'week' | 'day'

export type TimeUnit = 'hour' | 'minute' | 'second' | 'millisecond' | 'microsecond' | 'nanosecond'

const DATE_UNITS: readonly string[] = ['year', 'month', 'week', 'day']
const TIME_UNITS: readonly string[] = ['hour', 'minute', 'second', 'millisecond', 'microsecond', 'nanosecond']

export function isDateUnit(unit: string): unit is DateUnit {
  return DATE_UNITS.includes(unit)
}

export function isTimeUnit(unit: string): unit is TimeUnit {
  return TIME_UNITS.includes(unit)
}

const NS_PER_UNIT: Partial<Record<TemporalUnit, bigint>> = {
  day: 86_400_000_000_000n,
  hour: 3_600_000_000_000n,
  minute: 60_000_000_000n,
  second: 1_000_000_000n,
  millisecond: 1_000_000n,
  microsecond: 1_000n,
  nanosecond: 1n,
}

/** Fixed width of a unit in nanoseconds; undefined for year, month and week. */
export function nanosecondsPerUnit(unit: TemporalUnit): bigint | undefined {
  return NS_PER_UNIT[unit]
}

const MAX_INCREMENT: Partial<Record<TemporalUnit, number>> = {
  hour: 24,
  minute: 60,
  second: 60,
  millisecond: 1000,
  microsecond: 1000,
  nanosecond: 1000,
}

/** Count of `unit` in the next larger unit, or undefined when unbounded. */
export function maximumRoundingIncrement(unit: TemporalUnit): number | undefined {
  return MAX_INCREMENT[unit]
}

// ============================================================================
// Rounding Modes
// ============================================================================

export const RoundingMode = {
  Ceil: 'ceil',
  Floor: 'floor',
  Expand: 'expand',
  Trunc: 'trunc',
  HalfCeil: 'halfCeil',
  HalfFloor: 'halfFloor',
  HalfExpand: 'halfExpand',
  HalfTrunc: 'halfTrunc',
  HalfEven: 'halfEven',
} as const

export type RoundingMode = (typeof RoundingMode)[keyof typeof RoundingMode]

// ============================================================================
// Rounding Increment
// ============================================================================

declare const __roundingIncrement: unique symbol

/** Integer in [1, 10^9]. */
export type RoundingIncrement = number & { readonly [__roundingIncrement]: true }

export const MAX_ROUNDING_INCREMENT = 1_000_000_000

export function createRoundingIncrement(value: number): RoundingIncrement {
  if (!Number.isInteger(value) || value < 1 || value > MAX_ROUNDING_INCREMENT) {
    throw new TemporalRangeError(
      `roundingIncrement must be an integer from 1 to ${MAX_ROUNDING_INCREMENT}, got ${value}`
    )
  }
  return value as RoundingIncrement
}

/**
 * Checks that `increment` evenly divides `dividend` and stays below it
 * (or at most equal to it when `inclusive`).
 */
export function validateRoundingIncrement(
  increment: RoundingIncrement,
  dividend: number,
  inclusive: boolean
): void {
  const maximum = inclusive ? dividend : dividend - 1
  if (increment > maximum) {
    throw new TemporalRangeError(`roundingIncrement ${increment} exceeds maximum ${maximum}`)
  }
  if (dividend % increment !== 0) {
    throw new TemporalRangeError(`roundingIncrement ${increment} does not divide evenly into ${dividend}`)
  }
}

// ============================================================================
// Option Parsing
// ============================================================================

function readStringOption<T extends string>(
  name: string,
  value: unknown,
  allowed: readonly T[],
  fallback: T
): T {
  if (value === undefined) return fallback
  if (typeof value !== 'string') {
    throw new TemporalTypeError(`${name} must be a string, got ${typeof value}`)
  }
  const match = allowed.find((candidate) => candidate === value)
  if (match === undefined) {
    throw new TemporalRangeError(`${name} must be one of ${allowed.join(', ')}, got '${value}'`)
  }
  return match
}

export function toArithmeticOverflow(value: unknown): ArithmeticOverflow {
  return readStringOption('overflow', value, Object.values(ArithmeticOverflow), ArithmeticOverflow.Constrain)
}

export function toRoundingMode(value: unknown, fallback: RoundingMode): RoundingMode {
  return readStringOption('roundingMode', value, Object.values(RoundingMode), fallback)
}

export function toTemporalUnit(value: unknown, fallback: TemporalUnit): TemporalUnit {
  return readStringOption('unit', value, Object.values(TemporalUnit), fallback)
}
