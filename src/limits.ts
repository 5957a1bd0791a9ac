/**
 * Instant Window
 *
 * A date-time is representable when its epoch nanoseconds at zero offset lie
 * strictly inside [min instant − 1 day, max instant + 1 day]. The extra day
 * leaves room for a sub-day UTC offset to be applied afterwards.
 */

import {
  MAX_EPOCH_DAYS,
  NS_MAX_INSTANT,
  NS_MIN_INSTANT,
  NS_PER_DAY,
} from './constants'

const UPPER_BOUND = NS_MAX_INSTANT + NS_PER_DAY
const LOWER_BOUND = NS_MIN_INSTANT - NS_PER_DAY

/** True when `epochNanoseconds` lies in the closed instant range. */
export function isInstantWithinLimits(epochNanoseconds: bigint): boolean {
  return NS_MIN_INSTANT <= epochNanoseconds && epochNanoseconds <= NS_MAX_INSTANT
}

export function isEpochNanosecondsWithinLimits(epochNanoseconds: bigint): boolean {
  return LOWER_BOUND < epochNanoseconds && epochNanoseconds < UPPER_BOUND
}

/**
 * @param epochDays - day number of the date
 * @param nanosecondsOfDay - time of day in nanoseconds since midnight
 */
export function isWithinIsoLimits(epochDays: number, nanosecondsOfDay: bigint): boolean {
  if (!Number.isFinite(epochDays) || Math.abs(epochDays) > MAX_EPOCH_DAYS) return false
  return isEpochNanosecondsWithinLimits(BigInt(epochDays) * NS_PER_DAY + nanosecondsOfDay)
}
