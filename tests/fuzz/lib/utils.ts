/**
 * Shared utility functions for fuzz testing.
 */
import type { IsoDate } from '../../../src/iso-date'
import type { IsoTime } from '../../../src/iso-time'
import type { IsoDateTime } from '../../../src/iso-date-time'
import type { DateDuration } from '../../../src/duration'

const MS_PER_DAY = 86_400_000

// ============================================================================
// Reference Oracle
// ============================================================================

/**
 * Epoch days computed through the platform Date. setUTCFullYear is used so
 * years 0–99 are not mapped onto 1900–1999. Only valid while the result lies
 * within ±10^8 days.
 */
export function oracleEpochDays(year: number, month: number, day: number): number {
  const d = new Date(0)
  d.setUTCFullYear(year, month - 1, day)
  const ms = d.getTime()
  if (isNaN(ms)) throw new Error(`Oracle cannot represent ${year}-${month}-${day}`)
  return ms / MS_PER_DAY
}

/**
 * Inverse oracle: calendar fields of an epoch day via the platform Date.
 */
export function oracleDateFromEpochDays(days: number): { year: number; month: number; day: number } {
  const d = new Date(days * MS_PER_DAY)
  if (isNaN(d.getTime())) throw new Error(`Oracle cannot represent epoch day ${days}`)
  return { year: d.getUTCFullYear(), month: d.getUTCMonth() + 1, day: d.getUTCDate() }
}

// ============================================================================
// Field Extraction
// ============================================================================

/**
 * Plain date fields, dropping the brand so values compare with toEqual.
 */
export function dateFields(date: IsoDate): { year: number; month: number; day: number } {
  return { year: date.year, month: date.month, day: date.day }
}

export function timeFields(time: IsoTime): number[] {
  return [time.hour, time.minute, time.second, time.millisecond, time.microsecond, time.nanosecond]
}

export function dateTimeFields(dateTime: IsoDateTime): number[] {
  const { year, month, day } = dateTime.date
  return [year, month, day, ...timeFields(dateTime.time)]
}

/**
 * True when no two non-zero components of a duration disagree in sign.
 */
export function hasConsistentSign(duration: DateDuration): boolean {
  const components = [duration.years, duration.months, duration.weeks, duration.days]
  return !(components.some((v) => v > 0) && components.some((v) => v < 0))
}
