/**
 * Shared numeric limits.
 *
 * Instant bounds are ±10^8 days from the epoch, expressed in nanoseconds.
 */

export const MS_PER_SECOND = 1_000
export const MS_PER_MINUTE = 60_000
export const MS_PER_HOUR = 3_600_000
export const MS_PER_DAY = 86_400_000

export const NS_PER_MS = 1_000_000n
export const NS_PER_DAY = 86_400_000_000_000n
export const NS_PER_DAY_NUMBER = 86_400_000_000_000

export const NS_MAX_INSTANT = 8_640_000_000_000_000_000_000n
export const NS_MIN_INSTANT = -8_640_000_000_000_000_000_000n

/** Largest distance, in days, a representable date may sit from 1970-01-01. */
export const MAX_EPOCH_DAYS = 100_000_001

/** Rounding steps are limited to an unsigned 64-bit nanosecond count. */
export const MAX_ROUNDING_STEP_NS = 2n ** 64n - 1n

/** Duration year/month/week components stay below this magnitude. */
export const MAX_CALENDAR_DURATION_COMPONENT = 2 ** 32

/** Time-only durations stay below 2^53 seconds. */
export const MAX_TIME_DURATION_NS = 2n ** 53n * 1_000_000_000n
