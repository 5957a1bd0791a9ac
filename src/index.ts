/**
 * temporal-iso-core
 *
 * Public API exports
 */

// Error system
export {
  TemporalError, TemporalErrorCode,
  TemporalRangeError, TemporalTypeError,
  isTemporalError,
} from './errors'
export type { TemporalErrorCode as TemporalErrorCodeType } from './errors'

// Limits
export {
  NS_PER_DAY, NS_MAX_INSTANT, NS_MIN_INSTANT,
  MAX_EPOCH_DAYS, MAX_ROUNDING_STEP_NS, MAX_TIME_DURATION_NS,
} from './constants'
export { isInstantWithinLimits, isEpochNanosecondsWithinLimits, isWithinIsoLimits } from './limits'

// Options
export {
  ArithmeticOverflow, TemporalUnit, RoundingMode,
  MAX_ROUNDING_INCREMENT,
  isDateUnit, isTimeUnit, nanosecondsPerUnit, maximumRoundingIncrement,
  createRoundingIncrement, validateRoundingIncrement,
  toArithmeticOverflow, toRoundingMode, toTemporalUnit,
} from './options'
export type { DateUnit, TimeUnit, RoundingIncrement } from './options'

// Epoch days
export {
  isLeapYear, daysInMonth, daysInYear,
  dateToEpochDays, epochDaysToDate, balanceIsoYearMonth, epochDaysToEpochMs,
} from './epoch-days'

// Rounding
export { roundToIncrement } from './rounding'

// Durations
export type { DateDuration, TimeDuration, NormalizedTimeDuration } from './duration'
export {
  createDateDuration, ZERO_DATE_DURATION, dateDurationSign, negateDateDuration,
  createTimeDuration, normalizeTimeDuration, normalizedTimeDurationFromNanoseconds,
  ZERO_TIME_DURATION, normalizedSeconds, normalizedSubseconds,
} from './duration'

// IsoDate
export type { IsoDate, IsoDateFields } from './iso-date'
export {
  createIsoDate, createIsoDateUnchecked, isValidIsoDate,
  isoDateToEpochDays, epochDaysToIsoDate, balanceIsoDate,
  compareIsoDates, isoDateEquals,
  addDurationToIsoDate, differenceIsoDate,
} from './iso-date'

// IsoTime
export type { IsoTime, IsoTimeFields, TimeWithDayCarry } from './iso-time'
export {
  createIsoTime, createIsoTimeUnchecked, midnightIsoTime, noonIsoTime,
  isoTimeFromComponents, isValidIsoTime, balanceIsoTime,
  addToIsoTime, differenceIsoTime, roundIsoTime,
  isoTimeToEpochMs, isoTimeToNanoseconds, compareIsoTimes,
} from './iso-time'

// IsoDateTime
export type { IsoDateTime } from './iso-date-time'
export {
  createIsoDateTime, createIsoDateTimeUnchecked, isIsoDateTimeWithinLimits,
  balanceIsoDateTime, isoDateTimeToEpochNanoseconds, isoDateTimeFromEpochNanoseconds,
  compareIsoDateTimes, addDurationToIsoDateTime, roundIsoDateTime,
} from './iso-date-time'

// Calendar capability
export type { CalendarProtocol } from './calendar'
export { isoCalendar } from './calendar'
