import { format, isMatch } from 'date-fns'
import { InvalidDateRangeError } from '@/shared/errors'

export const DATE_FORMAT = 'yyyy-MM-dd'
export const TIMESTAMP_FORMAT = 'yyyy-MM-dd HH:mm:ss'

/** Inclusive range of calendar days, both ends as `YYYY-MM-DD` */
export interface DateRange {
  from: string
  to: string
}

const ISO_DAY = /^\d{4}-\d{2}-\d{2}$/

function isCalendarDay(value: string): boolean {
  return ISO_DAY.test(value) && isMatch(value, DATE_FORMAT)
}

export function createDateRange(from: string, to: string): DateRange {
  const range = { from: from.trim(), to: to.trim() }

  if (!isCalendarDay(range.from)) {
    throw new InvalidDateRangeError(`Invalid start date '${from}', expected YYYY-MM-DD`)
  }
  if (!isCalendarDay(range.to)) {
    throw new InvalidDateRangeError(`Invalid end date '${to}', expected YYYY-MM-DD`)
  }
  // Zero-padded ISO days order lexically
  if (range.from > range.to) {
    throw new InvalidDateRangeError(`Start date ${range.from} is after end date ${range.to}`)
  }

  return range
}

/** First day of the current month up to today, the default export window */
export function currentMonthRange(now: Date = new Date()): DateRange {
  return {
    from: format(now, 'yyyy-MM-01'),
    to: format(now, DATE_FORMAT)
  }
}

export function isDayInRange(day: string, range: DateRange): boolean {
  return range.from <= day && day <= range.to
}
