/**
 * Calendar Capability
 *
 * Date movement for a date-time is delegated to a calendar. The built-in
 * ISO calendar runs on this core; other calendar systems are supplied by the
 * caller and treated as opaque synchronous calls.
 */

import type { DateDuration } from './duration'
import { addDurationToIsoDate, createIsoDate } from './iso-date'
import type { IsoDate } from './iso-date'
import { ArithmeticOverflow } from './options'

export interface CalendarProtocol {
  readonly id: string

  /** Moves `date` by `duration`; returns a date inside the representable range. */
  dateAdd(date: IsoDate, duration: DateDuration, overflow: ArithmeticOverflow): IsoDate
}

export const isoCalendar: CalendarProtocol = {
  id: 'iso8601',

  dateAdd(date, duration, overflow) {
    const { year, month, day } = addDurationToIsoDate(date, duration, overflow)
    return createIsoDate(year, month, day, ArithmeticOverflow.Reject)
  },
}
